import type { MediaFilter } from '@/types/anilist';

export const APP_TITLE = 'Anime & Manga';

export const HEADER_TITLE = 'New releases';

export const SEARCH_PLACEHOLDER = 'Search title…';

export const EMPTY_DETAIL_MESSAGE =
  'Click Download to fetch the last 7 days of new anime/manga start dates.\n\n' +
  'Note: This is based on AniList startDate; it is not a store/volume release tracker.';

export const NO_DESCRIPTION_MESSAGE = 'No description provided.';

export const FILTER_OPTIONS: ReadonlyArray<{ value: MediaFilter; label: string }> = [
  { value: 'ALL', label: 'All' },
  { value: 'ANIME', label: 'Anime' },
  { value: 'MANGA', label: 'Manga' },
];

// Status bar messages
export const STATUS_MESSAGES = {
  ready: 'Ready.',
  fetching: 'Fetching from AniList…',
  failed: 'Fetch failed.',
  copied: 'Link copied to clipboard.',
} as const;

export function loadedStatus(count: number): string {
  return `Loaded ${count} items.`;
}

interface StatusInput {
  isLoading: boolean;
  error: string | null;
  itemCount: number | null;
}

/**
 * Status bar text for the current download state.
 * `itemCount` is null until a download has succeeded.
 */
export function getStatusMessage({ isLoading, error, itemCount }: StatusInput): string {
  if (isLoading) return STATUS_MESSAGES.fetching;
  if (error) return STATUS_MESSAGES.failed;
  if (itemCount !== null) return loadedStatus(itemCount);
  return STATUS_MESSAGES.ready;
}
