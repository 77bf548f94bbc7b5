/**
 * List operations over fetched media: merge, order and filter.
 */

import type { MediaFilter, MediaItem } from '@/types/anilist';
import { getDateKey, getPublicationDay } from '@/types/anilist';

export interface MediaFilterOptions {
  type: MediaFilter;
  query: string;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Collapse repeated (mediaType, id) pairs. The last record for a pair wins
 * and keeps the position of the first.
 */
export function dedupeMedia(items: readonly MediaItem[]): MediaItem[] {
  const unique = new Map<string, MediaItem>();
  for (const item of items) {
    unique.set(`${item.mediaType}:${item.id}`, item);
  }
  return Array.from(unique.values());
}

/**
 * Comparator for release order: descending on
 * (date key, media type, lowercase title).
 */
export function compareMedia(a: MediaItem, b: MediaItem): number {
  return (
    compareStrings(getDateKey(b), getDateKey(a)) ||
    compareStrings(b.mediaType, a.mediaType) ||
    compareStrings(b.title.toLowerCase(), a.title.toLowerCase())
  );
}

export function sortMedia(items: readonly MediaItem[]): MediaItem[] {
  return [...items].sort(compareMedia);
}

/**
 * Combine per-type result lists into one deduplicated, ordered list.
 */
export function mergeReleases(lists: ReadonlyArray<readonly MediaItem[]>): MediaItem[] {
  return sortMedia(dedupeMedia(lists.flat()));
}

export function matchesType(item: MediaItem, type: MediaFilter): boolean {
  return type === 'ALL' || item.mediaType === type;
}

export function matchesQuery(item: MediaItem, query: string): boolean {
  const needle = query.trim().toLowerCase();
  if (!needle) return true;
  return (
    item.title.toLowerCase().includes(needle) ||
    (item.titleNative !== '' && item.titleNative.toLowerCase().includes(needle))
  );
}

/**
 * Apply the type filter and title search, preserving order.
 */
export function filterMedia(
  items: readonly MediaItem[],
  { type, query }: MediaFilterOptions
): MediaItem[] {
  return items.filter((item) => matchesType(item, type) && matchesQuery(item, query));
}

export function formatItemCount(count: number): string {
  return `${count} items`;
}

/**
 * One-line summary shown under a card title.
 */
export function formatCardMeta(item: MediaItem): string {
  return [
    getPublicationDay(item),
    item.country,
    item.language,
    item.format,
    item.status,
  ].join(' • ');
}
