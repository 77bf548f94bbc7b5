'use client';

import { Component, ErrorInfo, ReactNode } from 'react';
import { Button, AlertCircleIcon } from '@/components/ui';

interface ErrorBoundaryProps {
  children: ReactNode;
  fallback?: ReactNode;
}

interface ErrorBoundaryState {
  error: Error | null;
}

/**
 * Catches render errors below it and offers to rebuild the view.
 */
export class ErrorBoundary extends Component<ErrorBoundaryProps, ErrorBoundaryState> {
  state: ErrorBoundaryState = { error: null };

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { error };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo): void {
    console.error('ErrorBoundary caught an error:', error, errorInfo.componentStack);
  }

  handleReset = (): void => {
    this.setState({ error: null });
  };

  render(): ReactNode {
    const { error } = this.state;
    if (!error) {
      return this.props.children;
    }

    if (this.props.fallback) {
      return this.props.fallback;
    }

    return (
      <div role="alert" className="flex flex-col items-center justify-center min-h-[50vh] px-4">
        <div className="text-center max-w-md">
          <AlertCircleIcon size={48} className="mx-auto mb-4 text-red-400" />
          <h2 className="text-xl font-semibold text-white mb-2">Something went wrong</h2>
          <p className="text-text-secondary mb-6 whitespace-pre-line">
            {error.message || 'An unexpected error occurred'}
          </p>
          <Button variant="primary" onClick={this.handleReset}>
            Try Again
          </Button>
        </div>
      </div>
    );
  }
}
