import { createSignal, createEffect, onCleanup, Accessor } from 'solid-js';

/**
 * Follows `value` once it has been stable for `delay` milliseconds.
 * Used by filter toolbars so typing does not reload on every key press.
 */
export function useDebouncedValue<T>(value: Accessor<T>, delay: number = 300): Accessor<T> {
  const [debounced, setDebounced] = createSignal<T>(value());

  createEffect(() => {
    const next = value();
    const timer = setTimeout(() => setDebounced(() => next), delay);
    onCleanup(() => clearTimeout(timer));
  });

  return debounced;
}
