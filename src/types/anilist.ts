// ============================================
// Core Media Types
// ============================================

export type MediaType = 'ANIME' | 'MANGA';

export type MediaFilter = 'ALL' | MediaType;

/**
 * One anime or manga release as shown in the list and detail views.
 * Produced once per fetch and never mutated afterwards.
 */
export interface MediaItem {
  id: number;
  mediaType: MediaType;
  title: string;
  titleNative: string;
  imageUrl: string;
  countryCode: string;
  country: string;
  language: string;
  /** ISO date (YYYY-MM-DD), or null when AniList has no complete start date */
  startDate: string | null;
  format: string;
  status: string;
  description: string;
  siteUrl: string;
}

// ============================================
// Date Range
// ============================================

/** Inclusive range of ISO dates (YYYY-MM-DD). */
export interface DateRange {
  from: string;
  to: string;
}

// ============================================
// Type Guards
// ============================================

export function isMediaType(value: unknown): value is MediaType {
  return value === 'ANIME' || value === 'MANGA';
}

// ============================================
// Helper Functions
// ============================================

export const UNKNOWN_LABEL = 'Unknown';

/** Key used for undated items so they sort after every real date. */
export const UNDATED_KEY = '1900-01-01';

export function getPublicationDay(item: MediaItem): string {
  return item.startDate ?? UNKNOWN_LABEL;
}

export function getDateKey(item: MediaItem): string {
  return item.startDate ?? UNDATED_KEY;
}
