'use client';

import {
  createContext,
  useContext,
  useState,
  useCallback,
  useEffect,
  useRef,
  ReactNode,
} from 'react';
import { AlertCircleIcon, XIcon } from './Icons';

// The app only raises failures as toasts
type ToastVariant = 'error';

interface Toast {
  id: number;
  variant: ToastVariant;
  message: string;
}

interface ToastContextValue {
  toasts: Toast[];
  /** Show a toast; a duration of 0 keeps it until dismissed */
  showToast: (variant: ToastVariant, message: string, duration?: number) => void;
  dismissToast: (id: number) => void;
}

const ToastContext = createContext<ToastContextValue | null>(null);

export function useToast() {
  const context = useContext(ToastContext);
  if (!context) {
    throw new Error('useToast must be used within a ToastProvider');
  }
  return context;
}

const variantStyles: Record<ToastVariant, string> = {
  error: 'bg-red-900/20 border-red-500/30 text-red-400',
};

function ToastItem({
  toast,
  onDismiss,
}: {
  toast: Toast;
  onDismiss: () => void;
}) {
  return (
    <div
      className={`
        flex items-start gap-3 px-4 py-3
        border rounded-lg shadow-dropdown
        animate-fade-in
        ${variantStyles[toast.variant]}
      `}
      role="alert"
    >
      <AlertCircleIcon size={20} className="flex-shrink-0" />
      <span className="flex-1 text-sm font-medium whitespace-pre-line break-words max-h-64 overflow-y-auto">
        {toast.message}
      </span>
      <button
        type="button"
        onClick={onDismiss}
        className="p-1 -m-1 hover:opacity-70 transition-opacity"
        aria-label="Dismiss"
      >
        <XIcon size={16} />
      </button>
    </div>
  );
}

export function ToastProvider({ children }: { children: ReactNode }) {
  const [toasts, setToasts] = useState<Toast[]>([]);
  const nextIdRef = useRef(1);
  const timersRef = useRef(new Map<number, ReturnType<typeof setTimeout>>());

  const dismissToast = useCallback((id: number) => {
    const timer = timersRef.current.get(id);
    if (timer) {
      clearTimeout(timer);
      timersRef.current.delete(id);
    }
    setToasts((prev) => prev.filter((t) => t.id !== id));
  }, []);

  const showToast = useCallback(
    (variant: ToastVariant, message: string, duration = 5000) => {
      const id = nextIdRef.current++;
      setToasts((prev) => [...prev, { id, variant, message }]);

      if (duration > 0) {
        timersRef.current.set(
          id,
          setTimeout(() => dismissToast(id), duration)
        );
      }
    },
    [dismissToast]
  );

  // Clear pending timers on unmount
  useEffect(() => {
    const timers = timersRef.current;
    return () => {
      timers.forEach((timer) => clearTimeout(timer));
      timers.clear();
    };
  }, []);

  return (
    <ToastContext.Provider value={{ toasts, showToast, dismissToast }}>
      {children}
      <div
        className="fixed bottom-10 right-4 z-50 flex flex-col gap-2 max-w-md w-full pointer-events-none"
        aria-live="polite"
      >
        {toasts.map((toast) => (
          <div key={toast.id} className="pointer-events-auto">
            <ToastItem toast={toast} onDismiss={() => dismissToast(toast.id)} />
          </div>
        ))}
      </div>
    </ToastContext.Provider>
  );
}
