import { buildImageProxyUrl } from '@/config/anilist';
import { APIError } from '@/lib/errors';

/** Turns a cover URL into a source an <img> can display. */
export type ImageLoader = (url: string) => Promise<string>;

export type ImageReadyListener = (url: string) => void;

/**
 * Download a cover through the local proxy and expose it as an object URL.
 */
export async function loadImageThroughProxy(url: string): Promise<string> {
  const response = await fetch(buildImageProxyUrl(url));
  if (!response.ok) {
    throw new APIError(`Image request failed: HTTP ${response.status}`, response.status);
  }
  const blob = await response.blob();
  return URL.createObjectURL(blob);
}

/**
 * In-memory cover cache keyed by image URL.
 *
 * Each URL is downloaded at most once at a time; concurrent requests for a
 * URL share the in-flight download. Listeners hear about every URL whose
 * download completes. Failed downloads leave no entry so a later request
 * can try again. Entries are never evicted.
 */
export class ImageCache {
  private readonly images = new Map<string, string>();
  private readonly pending = new Map<string, Promise<void>>();
  private readonly listeners = new Set<ImageReadyListener>();

  constructor(private readonly loader: ImageLoader = loadImageThroughProxy) {}

  get(url: string): string | null {
    if (!url) return null;
    return this.images.get(url) ?? null;
  }

  isPending(url: string): boolean {
    return this.pending.has(url);
  }

  /**
   * Start downloading a URL unless it is empty, cached or in flight.
   * The returned promise settles when that download does and never rejects.
   */
  request(url: string): Promise<void> {
    if (!url || this.images.has(url)) {
      return Promise.resolve();
    }

    const inFlight = this.pending.get(url);
    if (inFlight) {
      return inFlight;
    }

    const download = this.loader(url)
      .then((source) => {
        this.images.set(url, source);
        this.notify(url);
      })
      .catch((error: unknown) => {
        console.warn(`[ImageCache] Failed to load ${url}:`, error);
      })
      .finally(() => {
        this.pending.delete(url);
      });

    this.pending.set(url, download);
    return download;
  }

  subscribe(listener: ImageReadyListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(url: string): void {
    for (const listener of Array.from(this.listeners)) {
      listener(url);
    }
  }
}

// Shared cache for the whole page
export const imageCache = new ImageCache();
