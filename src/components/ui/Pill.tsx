import type { MediaType } from '@/types/anilist';

export type PillVariant = 'anime' | 'manga' | 'neutral';

interface PillProps {
  label: string;
  variant?: PillVariant;
  className?: string;
}

const variantStyles: Record<PillVariant, string> = {
  anime: 'bg-accent-blue/20 text-accent-blue border-accent-blue/30',
  manga: 'bg-accent-green/20 text-accent-green border-accent-green/30',
  neutral: 'bg-white/10 text-text-secondary border-white/10',
};

export function pillVariantFor(mediaType: MediaType): PillVariant {
  return mediaType === 'ANIME' ? 'anime' : 'manga';
}

/**
 * Small rounded label for media type, country and language.
 */
export function Pill({ label, variant = 'neutral', className = '' }: PillProps) {
  return (
    <span
      className={`
        inline-flex items-center justify-center
        min-h-[22px] px-2.5 py-0.5
        rounded-full border
        text-xs font-semibold uppercase tracking-wide whitespace-nowrap
        ${variantStyles[variant]}
        ${className}
      `}
    >
      {label}
    </span>
  );
}
