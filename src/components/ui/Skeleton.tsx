import { HTMLAttributes } from 'react';

type SkeletonRounding = 'md' | 'lg' | 'full';

interface SkeletonProps extends HTMLAttributes<HTMLDivElement> {
  rounded?: SkeletonRounding;
  width?: string | number;
  height?: string | number;
}

const roundingStyles: Record<SkeletonRounding, string> = {
  md: 'rounded-md',
  lg: 'rounded-lg',
  full: 'rounded-full',
};

function toCssSize(value: string | number | undefined): string | undefined {
  return typeof value === 'number' ? `${value}px` : value;
}

export function Skeleton({
  rounded = 'md',
  width,
  height,
  className = '',
  style,
  ...props
}: SkeletonProps) {
  return (
    <div
      className={`bg-bg-hover animate-pulse motion-reduce:animate-none ${roundingStyles[rounded]} ${className}`}
      style={{ width: toCssSize(width), height: toCssSize(height), ...style }}
      aria-hidden="true"
      {...props}
    />
  );
}

export function SkeletonText({
  lines = 1,
  className = '',
}: {
  lines?: number;
  className?: string;
}) {
  return (
    <div className={`space-y-2 ${className}`}>
      {Array.from({ length: lines }).map((_, i) => (
        <Skeleton
          key={i}
          height={14}
          className={i === lines - 1 && lines > 1 ? 'w-2/3' : 'w-full'}
        />
      ))}
    </div>
  );
}
