'use client';

import { createContext, useContext, useEffect, useState } from 'react';
import { ImageCache, imageCache } from '@/lib/image-cache';

const ImageCacheContext = createContext<ImageCache>(imageCache);

export const ImageCacheProvider = ImageCacheContext.Provider;

export function useImageCache(): ImageCache {
  return useContext(ImageCacheContext);
}

/**
 * Resolve a cover URL to a displayable source, requesting it on first use.
 * Re-renders when the download for this URL completes.
 */
export function useCachedImage(url: string): string | null {
  const cache = useImageCache();
  const [source, setSource] = useState<string | null>(() => cache.get(url));

  useEffect(() => {
    setSource(cache.get(url));
    if (!url) return;

    const unsubscribe = cache.subscribe((readyUrl) => {
      if (readyUrl === url) {
        setSource(cache.get(url));
      }
    });
    void cache.request(url);

    return unsubscribe;
  }, [cache, url]);

  return source;
}
