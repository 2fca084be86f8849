import { createSignal, createEffect, onCleanup, Signal } from 'solid-js';
import { EVENTS } from '@/constants';
import { logger } from '@/utils/logger';

type LocalStorageSyncDetail = {
  key: string;
  value: string | null;
};

const isSyncEvent = (event: Event): event is CustomEvent<LocalStorageSyncDetail> =>
  event instanceof CustomEvent &&
  typeof event.detail === 'object' &&
  event.detail !== null &&
  typeof event.detail.key === 'string';

function broadcastLocalStorageChange(key: string, value: string | null): void {
  if (typeof window === 'undefined') return;
  window.dispatchEvent(
    new CustomEvent<LocalStorageSyncDetail>(EVENTS.LOCAL_STORAGE_SYNC, {
      detail: { key, value },
    }),
  );
}

function readItem(key: string): string | null {
  try {
    return localStorage.getItem(key);
  } catch (err) {
    logger.warn(`Unable to read "${key}" from localStorage`, err);
    return null;
  }
}

/**
 * Signal backed by a localStorage entry. Instances using the same key stay in
 * sync, in this tab through a custom event and across tabs through `storage`.
 */
function createLocalStorageSignal<T>(
  key: string,
  defaultValue: T,
  parse: (value: string) => T,
  stringify: (value: T) => string,
): Signal<T> {
  const stored = readItem(key);
  const [value, setValue] = createSignal<T>(stored !== null ? parse(stored) : defaultValue);

  if (typeof window !== 'undefined') {
    const applyRaw = (raw: string | null) => {
      const next = raw !== null ? parse(raw) : defaultValue;
      if (Object.is(next, value())) return;
      setValue(() => next);
    };

    const handleStorage = (e: StorageEvent) => {
      if (e.storageArea !== window.localStorage || e.key !== key) return;
      applyRaw(e.newValue);
    };

    const handleCustom = (e: Event) => {
      if (!isSyncEvent(e) || e.detail.key !== key) return;
      applyRaw(e.detail.value);
    };

    window.addEventListener('storage', handleStorage);
    window.addEventListener(EVENTS.LOCAL_STORAGE_SYNC, handleCustom);
    onCleanup(() => {
      window.removeEventListener('storage', handleStorage);
      window.removeEventListener(EVENTS.LOCAL_STORAGE_SYNC, handleCustom);
    });
  }

  createEffect(() => {
    const raw = stringify(value());
    if (readItem(key) === raw) return;
    try {
      localStorage.setItem(key, raw);
    } catch (err) {
      logger.warn(`Unable to persist "${key}"`, err);
      return;
    }
    broadcastLocalStorageChange(key, raw);
  });

  return [value, setValue];
}

export function createLocalStorageBooleanSignal(key: string, defaultValue: boolean = false): Signal<boolean> {
  return createLocalStorageSignal(key, defaultValue, (val) => val === 'true', (val) => String(val));
}

export function createLocalStorageStringSignal(key: string, defaultValue: string = ''): Signal<string> {
  return createLocalStorageSignal(key, defaultValue, (val) => val, (val) => val);
}

/** Remove an entry and tell live signals to fall back to their default. */
export function removeLocalStorageItem(key: string): void {
  try {
    localStorage.removeItem(key);
  } catch (err) {
    logger.warn(`Unable to remove "${key}"`, err);
    return;
  }
  broadcastLocalStorageChange(key, null);
}
