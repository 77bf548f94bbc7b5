'use client';

import { SearchIcon, XIcon } from '@/components/ui';
import { SEARCH_PLACEHOLDER } from '@/config/ui';

interface SearchBarProps {
  value: string;
  onChange: (value: string) => void;
  onClear: () => void;
  placeholder?: string;
}

/**
 * Title search over the loaded list. Filtering happens as the user types.
 */
export function SearchBar({
  value,
  onChange,
  onClear,
  placeholder = SEARCH_PLACEHOLDER,
}: SearchBarProps) {
  return (
    <div
      className="
        flex flex-1 items-center gap-2.5
        bg-bg-elevated border border-border rounded-lg
        px-3 h-10
        focus-within:ring-2 focus-within:ring-accent-blue focus-within:border-transparent
        transition-all
      "
    >
      <SearchIcon size={18} className="text-text-muted" />
      <input
        type="search"
        value={value}
        onChange={(e) => onChange(e.target.value)}
        placeholder={placeholder}
        className="
          flex-1 bg-transparent border-none outline-none
          text-sm text-white placeholder-text-muted
        "
        aria-label="Search title"
      />
      {value && (
        <button
          type="button"
          onClick={onClear}
          className="
            p-1 text-text-muted hover:text-white
            transition-colors rounded
            focus:outline-none focus-visible:ring-2 focus-visible:ring-accent-blue
          "
          aria-label="Clear search"
        >
          <XIcon size={14} />
        </button>
      )}
    </div>
  );
}
