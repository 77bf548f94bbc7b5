'use client';

import { useCallback, useEffect, useMemo, useState } from 'react';
import { Header, StatusBar } from '@/components/layout';
import { MediaDetails, MediaList, getMediaKey } from '@/components/media';
import { SearchBar } from '@/components/search';
import { ProgressBar, useToast } from '@/components/ui';
import { STATUS_MESSAGES, getStatusMessage } from '@/config/ui';
import { useReleases } from '@/hooks';
import { filterMedia, formatItemCount, getDefaultRange } from '@/lib/utils';
import type { DateRange, MediaFilter, MediaItem } from '@/types/anilist';

export default function ReleasesPage() {
  const { showToast } = useToast();
  const { data, isLoading, error, download } = useReleases();

  const [range, setRange] = useState<DateRange>(() => getDefaultRange());
  const [filter, setFilter] = useState<MediaFilter>('ALL');
  const [query, setQuery] = useState('');
  // A pick only holds for the list it was made in
  const [selection, setSelection] = useState<{ list: MediaItem[]; key: string } | null>(null);
  const [notice, setNotice] = useState<string | null>(null);

  const visibleItems = useMemo(
    () => filterMedia(data ?? [], { type: filter, query }),
    [data, filter, query]
  );

  // Every rebuild of the list falls back to its first entry
  const selectedItem = useMemo(() => {
    const pickedKey = selection?.list === visibleItems ? selection.key : null;
    const picked = pickedKey
      ? visibleItems.find((item) => getMediaKey(item) === pickedKey)
      : undefined;
    return picked ?? visibleItems[0] ?? null;
  }, [visibleItems, selection]);

  useEffect(() => {
    if (error) {
      showToast('error', error, 0);
    }
  }, [error, showToast]);

  // A transient notice lasts until the download state changes
  useEffect(() => {
    setNotice(null);
  }, [isLoading, error, data]);

  const handleDownload = useCallback(() => {
    download(range);
  }, [download, range]);

  const handleSelect = useCallback(
    (item: MediaItem) => {
      setSelection({ list: visibleItems, key: getMediaKey(item) });
    },
    [visibleItems]
  );

  const handleCopyLink = useCallback(
    (url: string) => {
      navigator.clipboard.writeText(url).then(
        () => setNotice(STATUS_MESSAGES.copied),
        (copyError: unknown) => {
          console.error('Clipboard write error:', copyError);
          showToast('error', 'Could not copy the link to the clipboard');
        }
      );
    },
    [showToast]
  );

  const status =
    notice ??
    getStatusMessage({ isLoading, error, itemCount: data ? data.length : null });

  return (
    <div className="flex h-screen flex-col gap-3 p-4 pb-10 sm:p-5 sm:pb-10">
      <Header
        range={range}
        onRangeChange={setRange}
        filter={filter}
        onFilterChange={setFilter}
        onDownload={handleDownload}
        isLoading={isLoading}
      />

      <div className="grid min-h-0 flex-1 gap-3 lg:grid-cols-[minmax(0,52fr)_minmax(0,44fr)]">
        {/* Master */}
        <section
          aria-label="Release list"
          className="flex min-h-0 flex-col gap-2.5 rounded-xl border border-border bg-bg-primary p-3"
        >
          <div className="flex items-center gap-2.5">
            <SearchBar value={query} onChange={setQuery} onClear={() => setQuery('')} />
            <span className="whitespace-nowrap text-sm text-text-secondary">
              {formatItemCount(visibleItems.length)}
            </span>
          </div>

          <div className="min-h-0 flex-1 overflow-y-auto pr-1">
            <MediaList
              items={visibleItems}
              selectedKey={selectedItem ? getMediaKey(selectedItem) : null}
              onSelect={handleSelect}
              isLoading={isLoading}
            />
          </div>

          {isLoading && <ProgressBar label="Fetching releases" />}
        </section>

        {/* Detail */}
        <section
          aria-label="Release details"
          className="min-h-0 rounded-xl border border-border bg-bg-primary p-3.5"
        >
          <MediaDetails item={selectedItem} onCopyLink={handleCopyLink} />
        </section>
      </div>

      <StatusBar message={status} />
    </div>
  );
}
