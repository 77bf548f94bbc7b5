'use client';

import { useState, useEffect, useCallback, useRef } from 'react';
import { isAbortError } from '@/lib/errors';
import { normalizeRange } from '@/lib/utils/date';
import type { DateRange, MediaItem } from '@/types/anilist';

// ============================================
// Hook State Type
// ============================================

interface FetchState<T> {
  data: T | null;
  isLoading: boolean;
  error: string | null;
}

export interface UseReleasesResult extends FetchState<MediaItem[]> {
  download: (range: DateRange) => void;
}

// ============================================
// Fetch Helper with AbortController
// ============================================

function readErrorMessage(body: unknown): string | null {
  if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
    return body.error;
  }
  return null;
}

async function fetchAPI<T>(url: string, signal?: AbortSignal): Promise<T> {
  const response = await fetch(url, { signal });

  if (!response.ok) {
    const errorData: unknown = await response.json().catch(() => null);
    throw new Error(
      readErrorMessage(errorData) ?? `Request failed: ${response.statusText || response.status}`
    );
  }

  return response.json() as Promise<T>;
}

export function buildReleasesUrl(range: DateRange): string {
  const { from, to } = normalizeRange(range);
  return `/api/anilist/releases?from=${encodeURIComponent(from)}&to=${encodeURIComponent(to)}`;
}

// ============================================
// useReleases
// ============================================

/**
 * Download releases for a date range on demand.
 * Starting a download aborts the one in flight; a failed download keeps
 * the previously loaded list and reports the error.
 */
export function useReleases(): UseReleasesResult {
  const [state, setState] = useState<FetchState<MediaItem[]>>({
    data: null,
    isLoading: false,
    error: null,
  });
  const abortControllerRef = useRef<AbortController | null>(null);

  const download = useCallback(async (range: DateRange) => {
    // Cancel any in-flight request
    if (abortControllerRef.current) {
      abortControllerRef.current.abort();
    }

    const controller = new AbortController();
    abortControllerRef.current = controller;
    setState((prev) => ({ ...prev, isLoading: true, error: null }));

    try {
      const data = await fetchAPI<MediaItem[]>(buildReleasesUrl(range), controller.signal);
      if (controller.signal.aborted) return;
      setState({ data, isLoading: false, error: null });
    } catch (error) {
      if (isAbortError(error) || controller.signal.aborted) {
        return;
      }
      setState((prev) => ({
        data: prev.data,
        isLoading: false,
        error: error instanceof Error ? error.message : 'Failed to fetch releases',
      }));
    }
  }, []);

  // Cleanup on unmount
  useEffect(() => {
    return () => {
      if (abortControllerRef.current) {
        abortControllerRef.current.abort();
      }
    };
  }, []);

  const start = useCallback(
    (range: DateRange) => {
      void download(range);
    },
    [download]
  );

  return { ...state, download: start };
}
