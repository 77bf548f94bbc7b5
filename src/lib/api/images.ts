import { IMAGE_MAX_REDIRECTS, isAllowedImageHost } from '@/config/anilist';
import { APIError, ValidationError } from '@/lib/errors';

export interface ImagePayload {
  body: ArrayBuffer;
  contentType: string;
}

function isAllowedImageUrl(url: URL): boolean {
  return url.protocol === 'https:' && isAllowedImageHost(url.hostname);
}

function isRedirect(status: number): boolean {
  return status >= 300 && status < 400;
}

/**
 * Check that a cover URL is an https URL on an AniList image host.
 * @throws ValidationError when it is not
 */
export function validateImageUrl(value: string | null): URL {
  if (!value) {
    throw new ValidationError('Image URL is required');
  }

  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ValidationError('Image URL is not a valid URL');
  }

  if (!isAllowedImageUrl(url)) {
    throw new ValidationError(`Image host is not allowed: ${url.hostname}`);
  }

  return url;
}

/**
 * Download a cover image. Redirects are followed one hop at a time and
 * each target must pass the same host check as the first URL.
 */
export async function fetchImage(
  url: URL,
  signal?: AbortSignal,
  fetchImpl: typeof fetch = fetch
): Promise<ImagePayload> {
  let current = url;

  for (let hop = 0; hop <= IMAGE_MAX_REDIRECTS; hop++) {
    const response = await fetchImpl(current.toString(), { signal, redirect: 'manual' });

    if (isRedirect(response.status)) {
      const location = response.headers.get('Location');
      if (!location) {
        throw new APIError(`Image redirect without a location: HTTP ${response.status}`);
      }
      const next = new URL(location, current);
      if (!isAllowedImageUrl(next)) {
        throw new APIError(`Image redirect is not allowed: ${next.protocol}//${next.host}`);
      }
      current = next;
      continue;
    }

    if (!response.ok) {
      throw new APIError(
        `Image request failed: HTTP ${response.status}`,
        response.status === 404 ? 404 : 502
      );
    }

    const contentType = response.headers.get('Content-Type') ?? '';
    if (!contentType.startsWith('image/')) {
      throw new APIError(`Unexpected image content type: ${contentType || 'none'}`);
    }

    return { body: await response.arrayBuffer(), contentType };
  }

  throw new APIError(`Image redirected more than ${IMAGE_MAX_REDIRECTS} times`);
}
