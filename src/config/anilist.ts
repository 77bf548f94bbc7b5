import type { MediaType } from '@/types/anilist';

// AniList GraphQL endpoint
export const ANILIST_GRAPHQL_URL = 'https://graphql.anilist.co';

// Media types queried on every download, in request order
export const RELEASE_MEDIA_TYPES: readonly MediaType[] = ['ANIME', 'MANGA'];

// One page per media type
export const RELEASES_PER_PAGE = 40;

// Per-request timeout for AniList queries
export const ANILIST_TIMEOUT_MS = 25_000;

export const ANILIST_USER_AGENT = 'AnimeMangaReleases/1.0 (Next.js; personal use)';

// Error bodies are cut to this many characters before being shown
export const ERROR_BODY_MAX_LENGTH = 2000;

// Default lookback when the page first opens
export const DEFAULT_RANGE_DAYS = 7;

/**
 * Hosts the image proxy is allowed to fetch from.
 * AniList serves covers from s4.anilist.co and img.anili.st.
 */
export const IMAGE_HOSTS = ['anilist.co', 'anili.st'] as const;

export function isAllowedImageHost(hostname: string): boolean {
  return IMAGE_HOSTS.some(
    (host) => hostname === host || hostname.endsWith(`.${host}`)
  );
}

// Redirect hops the image proxy follows before giving up
export const IMAGE_MAX_REDIRECTS = 3;

/**
 * Build the local proxy URL for a cover image.
 */
export function buildImageProxyUrl(imageUrl: string): string {
  return `/api/images?url=${encodeURIComponent(imageUrl)}`;
}
