'use client';

import Image from 'next/image';
import { FilmIcon } from '@/components/ui';
import { useCachedImage } from '@/hooks/useCachedImage';

type CoverSize = 'thumb' | 'detail';

interface CoverImageProps {
  url: string;
  alt: string;
  size?: CoverSize;
}

const sizeStyles: Record<CoverSize, string> = {
  thumb: 'w-[60px] h-[84px] rounded-lg',
  detail: 'w-[140px] h-[196px] rounded-xl',
};

const placeholderLabel: Record<CoverSize, string> = {
  thumb: 'No Image',
  detail: 'Cover',
};

/**
 * Cover art served from the image cache, with a placeholder until the
 * download completes (or when the item has no cover at all).
 */
export function CoverImage({ url, alt, size = 'thumb' }: CoverImageProps) {
  const source = useCachedImage(url);

  return (
    <div
      className={`
        relative flex-shrink-0 overflow-hidden
        border border-white/10
        bg-gradient-to-br from-[#2d3440] to-[#161a21]
        ${sizeStyles[size]}
      `}
    >
      {source ? (
        <Image
          src={source}
          alt={alt}
          fill
          unoptimized
          sizes={size === 'thumb' ? '60px' : '140px'}
          className="object-cover"
        />
      ) : (
        <div
          className="absolute inset-0 flex flex-col items-center justify-center gap-1 text-text-muted"
          data-testid="cover-placeholder"
        >
          <FilmIcon size={size === 'thumb' ? 20 : 40} />
          <span className="text-[10px] font-semibold uppercase tracking-wide">
            {placeholderLabel[size]}
          </span>
        </div>
      )}
    </div>
  );
}
