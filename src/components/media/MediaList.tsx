'use client';

import type { MediaItem } from '@/types/anilist';
import { MediaCard, MediaCardSkeleton } from './MediaCard';

interface MediaListProps {
  items: MediaItem[];
  selectedKey: string | null;
  onSelect: (item: MediaItem) => void;
  isLoading?: boolean;
  emptyMessage?: string;
}

/** Stable identity of a record across fetches. */
export function getMediaKey(item: MediaItem): string {
  return `${item.mediaType}-${item.id}`;
}

export function MediaList({
  items,
  selectedKey,
  onSelect,
  isLoading = false,
  emptyMessage = 'No releases to show.',
}: MediaListProps) {
  if (items.length === 0) {
    if (isLoading) {
      return <MediaListSkeleton />;
    }
    return (
      <p className="py-16 text-center text-sm text-text-secondary">{emptyMessage}</p>
    );
  }

  return (
    <ul role="listbox" aria-label="Releases" className="flex flex-col gap-2.5">
      {items.map((item) => {
        const key = getMediaKey(item);
        return (
          <MediaCard
            key={key}
            item={item}
            selected={key === selectedKey}
            onSelect={onSelect}
          />
        );
      })}
    </ul>
  );
}

export function MediaListSkeleton({ count = 6 }: { count?: number }) {
  return (
    <div className="flex flex-col gap-2.5">
      {Array.from({ length: count }).map((_, i) => (
        <MediaCardSkeleton key={i} />
      ))}
    </div>
  );
}
