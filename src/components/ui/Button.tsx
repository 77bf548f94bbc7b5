import { ButtonHTMLAttributes, ReactNode, forwardRef } from 'react';

type ButtonVariant = 'primary' | 'secondary' | 'ghost' | 'segment';
type ButtonSize = 'sm' | 'md';

interface ButtonProps extends ButtonHTMLAttributes<HTMLButtonElement> {
  variant?: ButtonVariant;
  size?: ButtonSize;
  isLoading?: boolean;
  /** Icon rendered before the label; replaced by a spinner while loading */
  icon?: ReactNode;
  /** Highlight state for segment buttons */
  active?: boolean;
}

const variantStyles: Record<ButtonVariant, string> = {
  primary: 'bg-accent-blue hover:bg-blue-600 text-white font-semibold',
  secondary:
    'bg-white/10 hover:bg-white/20 text-white font-medium border border-white/20',
  ghost:
    'bg-transparent hover:bg-white/10 text-text-secondary hover:text-white font-medium border border-border',
  segment: 'font-medium',
};

const sizeStyles: Record<ButtonSize, string> = {
  sm: 'h-9 px-3 text-sm',
  md: 'h-11 px-5 text-base',
};

function segmentStyles(active: boolean): string {
  return active
    ? 'bg-accent-blue text-white'
    : 'bg-transparent text-text-secondary hover:bg-bg-hover hover:text-white';
}

function Spinner() {
  return (
    <svg
      className="animate-spin motion-reduce:animate-none h-4 w-4"
      xmlns="http://www.w3.org/2000/svg"
      fill="none"
      viewBox="0 0 24 24"
      aria-hidden="true"
    >
      <circle className="opacity-25" cx="12" cy="12" r="10" stroke="currentColor" strokeWidth="4" />
      <path
        className="opacity-75"
        fill="currentColor"
        d="M4 12a8 8 0 018-8V0C5.373 0 0 5.373 0 12h4zm2 5.291A7.962 7.962 0 014 12H0c0 3.042 1.135 5.824 3 7.938l3-2.647z"
      />
    </svg>
  );
}

export const Button = forwardRef<HTMLButtonElement, ButtonProps>(
  function Button(
    {
      variant = 'primary',
      size = 'md',
      isLoading = false,
      icon,
      active = false,
      disabled,
      className = '',
      children,
      type = 'button',
      ...props
    },
    ref
  ) {
    const isDisabled = disabled || isLoading;

    return (
      <button
        ref={ref}
        type={type}
        disabled={isDisabled}
        className={`
          inline-flex items-center justify-center gap-2
          rounded-md
          transition-colors duration-200 motion-reduce:transition-none
          focus:outline-none focus-visible:ring-2 focus-visible:ring-accent-blue
          focus-visible:ring-offset-2 focus-visible:ring-offset-bg-primary
          disabled:opacity-50 disabled:cursor-not-allowed
          ${variantStyles[variant]}
          ${variant === 'segment' ? segmentStyles(active) : ''}
          ${sizeStyles[size]}
          ${className}
        `}
        {...props}
      >
        {isLoading ? <Spinner /> : icon}
        {children}
      </button>
    );
  }
);
