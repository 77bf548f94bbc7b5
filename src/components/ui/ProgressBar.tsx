interface ProgressBarProps {
  label?: string;
}

/**
 * Indeterminate progress strip shown while a download runs.
 */
export function ProgressBar({ label = 'Loading' }: ProgressBarProps) {
  return (
    <div
      role="progressbar"
      aria-label={label}
      aria-busy="true"
      className="relative h-1 w-full overflow-hidden rounded-full bg-bg-hover"
    >
      <div className="absolute inset-y-0 w-1/3 rounded-full bg-accent-blue animate-progress motion-reduce:animate-none" />
    </div>
  );
}
