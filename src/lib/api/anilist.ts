import {
  ANILIST_GRAPHQL_URL,
  ANILIST_TIMEOUT_MS,
  ANILIST_USER_AGENT,
  ERROR_BODY_MAX_LENGTH,
  RELEASE_MEDIA_TYPES,
  RELEASES_PER_PAGE,
} from '@/config/anilist';
import { resolveCountry } from '@/config/countries';
import { APIError, GraphQLError, createAbortError, isAbortError } from '@/lib/errors';
import { fuzzyDateToIso, normalizeRange, toFuzzyDateInt } from '@/lib/utils/date';
import { mergeReleases } from '@/lib/utils/media';
import { cleanDescription, truncate } from '@/lib/utils/text';
import type { DateRange, MediaItem, MediaType } from '@/types/anilist';
import { UNKNOWN_LABEL, isMediaType } from '@/types/anilist';

const RELEASES_QUERY = `
  query ($type: MediaType, $startGreater: FuzzyDateInt, $startLesser: FuzzyDateInt, $perPage: Int) {
    Page(page: 1, perPage: $perPage) {
      media(type: $type, startDate_greater: $startGreater, startDate_lesser: $startLesser, sort: START_DATE_DESC) {
        id
        type
        format
        status
        title { romaji english native }
        startDate { year month day }
        countryOfOrigin
        description(asHtml: false)
        siteUrl
        coverImage { large medium color }
      }
    }
  }
`;

// ============================================
// Raw AniList Response Types
// ============================================

interface AniListRawMedia {
  id?: number | null;
  type?: string | null;
  format?: string | null;
  status?: string | null;
  title?: {
    romaji?: string | null;
    english?: string | null;
    native?: string | null;
  } | null;
  startDate?: {
    year?: number | null;
    month?: number | null;
    day?: number | null;
  } | null;
  countryOfOrigin?: string | null;
  description?: string | null;
  siteUrl?: string | null;
  coverImage?: {
    large?: string | null;
    medium?: string | null;
    color?: string | null;
  } | null;
}

interface AniListResponse<T> {
  data?: T | null;
  errors?: unknown;
}

interface ReleasesPage {
  Page?: {
    media?: unknown;
  } | null;
}

type Variables = Record<string, string | number>;

export interface AniListClientOptions {
  endpoint?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export interface FetchReleasesOptions {
  signal?: AbortSignal;
}

function isRawMedia(value: unknown): value is AniListRawMedia {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw createAbortError();
  }
}

// ============================================
// AniList Client
// ============================================

class AniListClient {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch | undefined;

  constructor(options: AniListClientOptions = {}) {
    this.endpoint = options.endpoint ?? ANILIST_GRAPHQL_URL;
    this.timeoutMs = options.timeoutMs ?? ANILIST_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl;
  }

  /**
   * POST a GraphQL query and return its `data` block.
   * The caller's signal and the request timeout both abort the fetch.
   */
  private async request<T>(
    query: string,
    variables: Variables,
    signal?: AbortSignal
  ): Promise<T | null> {
    throwIfAborted(signal);

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    const doFetch = this.fetchImpl ?? fetch;
    let status: number;
    let body: string;

    try {
      const response = await doFetch(this.endpoint, {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          'User-Agent': ANILIST_USER_AGENT,
        },
        body: JSON.stringify({ query, variables }),
        signal: controller.signal,
      });
      status = response.status;
      body = await response.text();
    } catch (error) {
      if (timedOut) {
        throw new APIError(`AniList request timed out after ${this.timeoutMs} ms`, 504);
      }
      if (isAbortError(error) || signal?.aborted) {
        throw createAbortError();
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new APIError(`AniList request failed: ${reason}`);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    if (status !== 200) {
      throw new APIError(`HTTP ${status}\n\n${truncate(body, ERROR_BODY_MAX_LENGTH)}`, status);
    }

    let payload: AniListResponse<T> | null;
    try {
      payload = JSON.parse(body);
    } catch {
      throw new APIError('AniList returned a response that is not valid JSON');
    }

    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
      throw new APIError('AniList returned an unexpected response');
    }

    // Anything but an empty list (or no list) counts as an error report
    const { errors } = payload;
    if (errors !== undefined && errors !== null && !(Array.isArray(errors) && errors.length === 0)) {
      throw new GraphQLError(
        'AniList GraphQL error:\n' +
          truncate(JSON.stringify(errors, null, 2), ERROR_BODY_MAX_LENGTH)
      );
    }

    return payload.data ?? null;
  }

  // ----------------------------------------
  // Transform Functions
  // ----------------------------------------

  private transformMedia(raw: AniListRawMedia, fallbackType: MediaType): MediaItem {
    const countryCode = raw.countryOfOrigin ?? '';
    const { country, language } = resolveCountry(countryCode);

    return {
      id: raw.id ?? 0,
      mediaType: isMediaType(raw.type) ? raw.type : fallbackType,
      title: raw.title?.english || raw.title?.romaji || 'Untitled',
      titleNative: raw.title?.native || '',
      imageUrl: raw.coverImage?.large || raw.coverImage?.medium || '',
      countryCode,
      country,
      language,
      startDate: fuzzyDateToIso(
        raw.startDate?.year,
        raw.startDate?.month,
        raw.startDate?.day
      ),
      format: raw.format || UNKNOWN_LABEL,
      status: raw.status || UNKNOWN_LABEL,
      description: cleanDescription(raw.description),
      siteUrl: raw.siteUrl || '',
    };
  }

  // ----------------------------------------
  // Public API Methods
  // ----------------------------------------

  /**
   * Fetch one page of media of a single type whose start date falls
   * strictly between the range bounds.
   */
  async fetchNew(
    mediaType: MediaType,
    range: DateRange,
    perPage: number = RELEASES_PER_PAGE,
    signal?: AbortSignal
  ): Promise<MediaItem[]> {
    const data = await this.request<ReleasesPage>(
      RELEASES_QUERY,
      {
        type: mediaType,
        startGreater: toFuzzyDateInt(range.from),
        startLesser: toFuzzyDateInt(range.to),
        perPage,
      },
      signal
    );

    const media = data?.Page?.media;
    if (!Array.isArray(media)) return [];
    return media.filter(isRawMedia).map((raw) => this.transformMedia(raw, mediaType));
  }

  /**
   * Fetch anime and manga for a date range, merged into release order.
   * Stops with an AbortError as soon as the signal is seen aborted.
   */
  async fetchReleases(
    range: DateRange,
    { signal }: FetchReleasesOptions = {}
  ): Promise<MediaItem[]> {
    const normalized = normalizeRange(range);
    const lists: MediaItem[][] = [];

    for (const mediaType of RELEASE_MEDIA_TYPES) {
      throwIfAborted(signal);
      lists.push(await this.fetchNew(mediaType, normalized, RELEASES_PER_PAGE, signal));
    }

    throwIfAborted(signal);
    return mergeReleases(lists);
  }
}

// Export singleton instance
export const anilistClient = new AniListClient();

// Export class for testing
export { AniListClient };
