'use client';

import { DateRangePicker, TypeFilter } from '@/components/browse';
import { Button, DownloadIcon } from '@/components/ui';
import { HEADER_TITLE } from '@/config/ui';
import { formatRangeSubtitle } from '@/lib/utils';
import type { DateRange, MediaFilter } from '@/types/anilist';

interface HeaderProps {
  range: DateRange;
  onRangeChange: (range: DateRange) => void;
  filter: MediaFilter;
  onFilterChange: (filter: MediaFilter) => void;
  onDownload: () => void;
  isLoading: boolean;
}

export function Header({
  range,
  onRangeChange,
  filter,
  onFilterChange,
  onDownload,
  isLoading,
}: HeaderProps) {
  return (
    <header
      className="
        flex flex-wrap items-center gap-3
        rounded-xl border border-border bg-bg-elevated
        p-3.5 shadow-card
      "
    >
      <div className="flex-1 min-w-[220px]">
        <h1 className="text-2xl font-bold text-white">{HEADER_TITLE}</h1>
        <p className="text-sm text-text-secondary">{formatRangeSubtitle(range)}</p>
      </div>

      <DateRangePicker value={range} onChange={onRangeChange} />
      <TypeFilter value={filter} onChange={onFilterChange} />

      <Button
        variant="primary"
        onClick={onDownload}
        isLoading={isLoading}
        icon={<DownloadIcon size={18} />}
      >
        Download
      </Button>
    </header>
  );
}
