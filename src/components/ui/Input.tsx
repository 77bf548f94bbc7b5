import { InputHTMLAttributes, forwardRef } from 'react';

interface InputProps extends InputHTMLAttributes<HTMLInputElement> {
  label?: string;
  /** 'inline' puts the label beside the field, as in the header date bar */
  layout?: 'stacked' | 'inline';
}

export const Input = forwardRef<HTMLInputElement, InputProps>(
  function Input({ label, layout = 'stacked', id, className = '', ...props }, ref) {
    const inputId = id || props.name;
    const isInline = layout === 'inline';

    return (
      <div className={isInline ? 'flex items-center gap-2' : 'w-full'}>
        {label && (
          <label
            htmlFor={inputId}
            className={`
              text-sm font-medium text-text-secondary
              ${isInline ? 'whitespace-nowrap' : 'block mb-2'}
            `}
          >
            {label}
          </label>
        )}
        <input
          ref={ref}
          id={inputId}
          className={`
            h-9 px-3
            bg-bg-elevated border border-border rounded-md
            text-sm text-white placeholder-text-muted
            transition-colors duration-200
            hover:border-text-muted
            focus:outline-none focus:ring-2 focus:ring-accent-blue focus:border-transparent
            disabled:opacity-50 disabled:cursor-not-allowed
            [color-scheme:dark]
            ${isInline ? '' : 'w-full'}
            ${className}
          `}
          {...props}
        />
      </div>
    );
  }
);
