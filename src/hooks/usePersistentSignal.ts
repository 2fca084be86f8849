import { Accessor, Setter, createEffect, createSignal } from 'solid-js';
import { logger } from '@/utils/logger';

export type PersistentSignalOptions<T> = {
  /** Parse a stored value; throw to fall back to the default. */
  deserialize: (value: string) => T;
  /** Defaults to `String(value)`. */
  serialize?: (value: T) => string;
  equals?: (prev: T, next: T) => boolean;
  /** Defaults to `window.localStorage`. */
  storage?: Storage;
};

/**
 * Creates a Solid signal that persists its value to localStorage (or a custom storage).
 * The initial value is read synchronously.
 */
export function usePersistentSignal<T>(
  key: string,
  defaultValue: T,
  options: PersistentSignalOptions<T>,
): [Accessor<T>, Setter<T>] {
  const storage = options.storage ?? (typeof window !== 'undefined' ? window.localStorage : undefined);
  const serialize = options.serialize ?? ((value: T) => String(value));

  const initialValue = (() => {
    if (!storage) return defaultValue;
    try {
      const raw = storage.getItem(key);
      return raw === null ? defaultValue : options.deserialize(raw);
    } catch (err) {
      logger.warn(`[usePersistentSignal] Failed to read "${key}" from storage`, err);
      return defaultValue;
    }
  })();

  const [value, setValue] = createSignal<T>(initialValue, options.equals ? { equals: options.equals } : undefined);

  createEffect(() => {
    if (!storage) return;
    const current = value();
    try {
      if (current === undefined || current === null) {
        storage.removeItem(key);
      } else {
        storage.setItem(key, serialize(current));
      }
    } catch (err) {
      logger.warn(`[usePersistentSignal] Failed to persist "${key}"`, err);
    }
  });

  return [value, setValue];
}
