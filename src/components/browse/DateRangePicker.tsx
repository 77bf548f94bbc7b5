'use client';

import { CalendarIcon, Input } from '@/components/ui';
import { isIsoDate, normalizeRange } from '@/lib/utils/date';
import type { DateRange } from '@/types/anilist';

interface DateRangePickerProps {
  value: DateRange;
  onChange: (range: DateRange) => void;
  disabled?: boolean;
}

/**
 * From / To date inputs. An inverted selection is reported with its
 * bounds swapped; cleared or partial input is ignored.
 */
export function DateRangePicker({ value, onChange, disabled = false }: DateRangePickerProps) {
  function update(bound: keyof DateRange, next: string) {
    if (!isIsoDate(next)) return;
    onChange(normalizeRange({ ...value, [bound]: next }));
  }

  return (
    <div className="flex items-center gap-3 rounded-lg border border-border bg-bg-elevated px-3 py-1.5">
      <CalendarIcon size={16} className="text-text-muted" />
      <Input
        id="range-from"
        type="date"
        label="From:"
        layout="inline"
        value={value.from}
        disabled={disabled}
        onChange={(e) => update('from', e.target.value)}
      />
      <Input
        id="range-to"
        type="date"
        label="To:"
        layout="inline"
        value={value.to}
        disabled={disabled}
        onChange={(e) => update('to', e.target.value)}
      />
    </div>
  );
}
