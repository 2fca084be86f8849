/**
 * useLoader - state of a data-bound panel.
 *
 * Runs `load` once when created and again on `reload()` or every
 * `interval` ms. Only the result of the newest request is kept; older ones
 * finishing late are dropped. Timers are cleared when the owner is disposed.
 */

import { createSignal, onCleanup } from 'solid-js';
import type { Accessor } from 'solid-js';
import { errorMessage } from '@/utils/errorHandler';
import { logger } from '@/utils/logger';

export interface LoaderOptions<T> {
  /** Repeat the load every `interval` ms. */
  interval?: number;
  initialValue?: T;
  /** Do not load on creation; wait for the first `reload()`. */
  lazy?: boolean;
  onLoaded?: (data: T) => void;
  onError?: (message: string) => void;
}

export interface LoaderState<T> {
  data: Accessor<T | undefined>;
  loading: Accessor<boolean>;
  error: Accessor<string | null>;
  reload: () => Promise<void>;
  /** Replace the data without loading. */
  mutate: (data: T | undefined) => void;
}

export function useLoader<T>(load: () => Promise<T>, options: LoaderOptions<T> = {}): LoaderState<T> {
  const [data, setData] = createSignal<T | undefined>(options.initialValue);
  const [loading, setLoading] = createSignal(false);
  const [error, setError] = createSignal<string | null>(null);
  let generation = 0;
  let disposed = false;

  const reload = async () => {
    const current = ++generation;
    setLoading(true);
    try {
      const result = await load();
      if (disposed || current !== generation) return;
      setData(() => result);
      setError(null);
      options.onLoaded?.(result);
    } catch (err) {
      if (disposed || current !== generation) return;
      logger.debug('load failed', err);
      const message = errorMessage(err);
      setError(message);
      options.onError?.(message);
    } finally {
      if (!disposed && current === generation) setLoading(false);
    }
  };

  if (!options.lazy) void reload();

  if (options.interval && options.interval > 0) {
    const timer = setInterval(() => {
      if (!loading()) void reload();
    }, options.interval);
    onCleanup(() => clearInterval(timer));
  }

  onCleanup(() => {
    disposed = true;
  });

  return { data, loading, error, reload, mutate: (value) => setData(() => value) };
}

export default useLoader;
