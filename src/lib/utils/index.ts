export {
  isIsoDate,
  toFuzzyDateInt,
  fuzzyDateToIso,
  toIsoDate,
  addDays,
  normalizeRange,
  getDefaultRange,
  formatRangeSubtitle,
} from './date';
export { cleanDescription, truncate } from './text';
export {
  dedupeMedia,
  compareMedia,
  sortMedia,
  mergeReleases,
  matchesType,
  matchesQuery,
  filterMedia,
  formatItemCount,
  formatCardMeta,
  type MediaFilterOptions,
} from './media';
