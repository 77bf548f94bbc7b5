export { MediaCard, MediaCardSkeleton } from './MediaCard';
export { MediaList, MediaListSkeleton, getMediaKey } from './MediaList';
export { MediaDetails } from './MediaDetails';
export { CoverImage } from './CoverImage';
