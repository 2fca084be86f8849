import { logger } from './logger';
import { ApiError, TaskFailedError } from './apiClient';
import { showError } from './toast';

export interface ErrorContext {
  component?: string;
  action?: string;
  data?: unknown;
}

export class AppError extends Error {
  public readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'AppError';
    this.context = context;
  }
}

/** Text to show the user for an error of any kind. */
export function errorMessage(error: unknown): string {
  if (error instanceof TaskFailedError) return `Task failed: ${error.exitStatus}`;
  if (error instanceof ApiError || error instanceof Error) return error.message || 'Unknown error';
  if (typeof error === 'string') return error;
  return String(error);
}

export interface HandleErrorOptions {
  /** Show an error toast with this title. */
  toastTitle?: string;
}

export function handleError(error: unknown, context: ErrorContext = {}, options: HandleErrorOptions = {}): void {
  const component = context.component || 'Unknown';
  const details =
    error instanceof AppError ? { ...error.context, ...context } : { ...context };

  if (error instanceof Error) {
    logger.error(`[${component}] ${error.message}`, { ...details, error: error.stack });
  } else {
    logger.error(`[${component}] Unknown error`, { ...details, error: String(error) });
  }

  if (options.toastTitle) {
    showError(options.toastTitle, errorMessage(error));
  }
}

export function handleAsyncError<T>(
  promise: Promise<T>,
  context: ErrorContext = {},
  options: HandleErrorOptions = {},
): Promise<T> {
  return promise.catch((error: unknown) => {
    handleError(error, context, options);
    throw error;
  });
}

export function createErrorBoundary(component: string) {
  return (action: string) => (error: unknown) => {
    handleError(error, { component, action });
  };
}
