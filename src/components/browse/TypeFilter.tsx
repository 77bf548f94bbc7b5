'use client';

import { Button } from '@/components/ui';
import { FILTER_OPTIONS } from '@/config/ui';
import type { MediaFilter } from '@/types/anilist';

interface TypeFilterProps {
  value: MediaFilter;
  onChange: (value: MediaFilter) => void;
}

/**
 * Segmented All / Anime / Manga switch.
 */
export function TypeFilter({ value, onChange }: TypeFilterProps) {
  return (
    <div
      role="group"
      aria-label="Media type"
      className="flex gap-1.5 rounded-lg border border-border bg-bg-elevated p-1"
    >
      {FILTER_OPTIONS.map((option) => (
        <Button
          key={option.value}
          variant="segment"
          size="sm"
          active={value === option.value}
          aria-pressed={value === option.value}
          onClick={() => onChange(option.value)}
        >
          {option.label}
        </Button>
      ))}
    </div>
  );
}
