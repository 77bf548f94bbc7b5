'use client';

import { Pill, Skeleton, SkeletonText, pillVariantFor } from '@/components/ui';
import { formatCardMeta } from '@/lib/utils/media';
import type { MediaItem } from '@/types/anilist';
import { CoverImage } from './CoverImage';

interface MediaCardProps {
  item: MediaItem;
  selected?: boolean;
  onSelect?: (item: MediaItem) => void;
}

export function MediaCard({ item, selected = false, onSelect }: MediaCardProps) {
  return (
    <li
      role="option"
      aria-selected={selected}
      aria-label={item.title}
      tabIndex={selected ? 0 : -1}
      onClick={() => onSelect?.(item)}
      onKeyDown={(e) => {
        if (e.key === 'Enter' || e.key === ' ') {
          e.preventDefault();
          onSelect?.(item);
        }
      }}
      className={`
        flex items-center gap-3 p-2.5
        rounded-xl border cursor-pointer shadow-card
        transition-colors duration-200 motion-reduce:transition-none
        focus:outline-none focus-visible:ring-2 focus-visible:ring-accent-blue
        ${selected
          ? 'bg-bg-active border-accent-blue/60'
          : 'bg-bg-elevated border-border hover:bg-bg-hover'
        }
      `}
    >
      <CoverImage url={item.imageUrl} alt={item.title} />

      <div className="flex-1 min-w-0 space-y-1">
        <div className="flex items-center gap-2">
          <p className="flex-1 truncate text-sm font-semibold text-white">{item.title}</p>
          <Pill label={item.mediaType} variant={pillVariantFor(item.mediaType)} />
        </div>
        {item.titleNative && (
          <p className="truncate text-xs text-text-secondary">{item.titleNative}</p>
        )}
        <p className="truncate text-xs text-text-muted">{formatCardMeta(item)}</p>
      </div>
    </li>
  );
}

export function MediaCardSkeleton() {
  return (
    <div className="flex items-center gap-3 p-2.5 rounded-xl border border-border bg-bg-elevated">
      <Skeleton width={60} height={84} rounded="lg" />
      <div className="flex-1 space-y-2">
        <Skeleton height={14} className="w-2/3" />
        <SkeletonText lines={2} />
      </div>
    </div>
  );
}
