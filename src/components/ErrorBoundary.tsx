import { ErrorBoundary as SolidErrorBoundary } from 'solid-js';
import type { Component, JSX } from 'solid-js';
import AlertTriangleIcon from 'lucide-solid/icons/alert-triangle';
import { Button } from '@/components/shared/Button';
import { errorMessage, handleError } from '@/utils/errorHandler';

interface ErrorBoundaryProps {
  children: JSX.Element;
  fallback?: (error: unknown, reset: () => void) => JSX.Element;
  onError?: (error: unknown) => void;
}

const DefaultErrorFallback: Component<{ error: unknown; reset: () => void }> = (props) => (
  <div role="alert" class="m-4 rounded-md border border-red-200 bg-red-50 p-4 dark:border-red-800 dark:bg-red-900/20">
    <div class="mb-2 flex items-center gap-2 text-sm font-semibold text-red-800 dark:text-red-200">
      <AlertTriangleIcon class="h-5 w-5" />
      Something went wrong
    </div>
    <p class="mb-3 text-sm text-red-700 dark:text-red-300">{errorMessage(props.error)}</p>
    <div class="flex gap-2">
      <Button size="sm" variant="primary" onClick={() => props.reset()}>
        Try Again
      </Button>
      <Button size="sm" onClick={() => window.location.reload()}>
        Reload Page
      </Button>
    </div>
  </div>
);

export const ErrorBoundary: Component<ErrorBoundaryProps> = (props) => (
  <SolidErrorBoundary
    fallback={(error: unknown, reset) => {
      if (props.onError) props.onError(error);
      else handleError(error, { component: 'ErrorBoundary', action: 'render' });
      return props.fallback ? props.fallback(error, reset) : <DefaultErrorFallback error={error} reset={reset} />;
    }}
  >
    {props.children}
  </SolidErrorBoundary>
);

/** Boundary around one panel; the failure is logged with the panel's name. */
export const ComponentErrorBoundary: Component<{ name: string; children: JSX.Element }> = (props) => (
  <ErrorBoundary
    onError={(error) => handleError(error, { component: props.name, action: 'render' })}
    fallback={(error, reset) => (
      <div role="alert" class="rounded border border-red-200 bg-red-50 p-4 dark:border-red-800 dark:bg-red-900/20">
        <p class="mb-2 text-sm font-medium text-red-800 dark:text-red-200">{`Error in ${props.name}`}</p>
        <p class="mb-2 text-xs text-red-700 dark:text-red-300">{errorMessage(error)}</p>
        <Button size="sm" variant="danger" onClick={() => reset()}>
          Retry
        </Button>
      </div>
    )}
  >
    {props.children}
  </ErrorBoundary>
);
