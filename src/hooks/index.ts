export { useReleases, buildReleasesUrl } from './useReleases';
export {
  useCachedImage,
  useImageCache,
  ImageCacheProvider,
} from './useCachedImage';
