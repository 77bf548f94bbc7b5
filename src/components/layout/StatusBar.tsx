interface StatusBarProps {
  message: string;
}

export function StatusBar({ message }: StatusBarProps) {
  return (
    <footer
      role="status"
      className="fixed inset-x-0 bottom-0 border-t border-border bg-bg-primary/95 px-5 py-1.5 text-xs text-text-secondary"
    >
      {message}
    </footer>
  );
}
