import { afterEach, describe, expect, it, vi } from 'vitest';
import { createRoot } from 'solid-js';
import { useLoader, type LoaderOptions } from '../useLoader';

describe('useLoader', () => {
  let dispose: (() => void) | undefined;

  afterEach(() => {
    dispose?.();
    dispose = undefined;
    vi.useRealTimers();
  });

  const setup = <T,>(load: () => Promise<T>, options?: LoaderOptions<T>) =>
    createRoot((d) => {
      dispose = d;
      return useLoader(load, options);
    });

  it('loads when created', async () => {
    const onLoaded = vi.fn();
    const state = setup(async () => ['eno1', 'vmbr0'], { onLoaded });

    expect(state.loading()).toBe(true);
    await vi.waitFor(() => expect(state.loading()).toBe(false));
    expect(state.data()).toEqual(['eno1', 'vmbr0']);
    expect(state.error()).toBeNull();
    expect(onLoaded).toHaveBeenCalledWith(['eno1', 'vmbr0']);
  });

  it('keeps the previous data and reports the error message', async () => {
    const state = setup(
      async (): Promise<string> => {
        throw new Error('permission check failed');
      },
      { initialValue: 'cached' },
    );

    await vi.waitFor(() => expect(state.error()).toBe('permission check failed'));
    expect(state.data()).toBe('cached');
    expect(state.loading()).toBe(false);
  });

  it('passes the error message to onError', async () => {
    const onError = vi.fn();
    const onLoaded = vi.fn();
    setup(
      async (): Promise<string> => {
        throw new Error('connection refused');
      },
      { onError, onLoaded },
    );

    await vi.waitFor(() => expect(onError).toHaveBeenCalledWith('connection refused'));
    expect(onLoaded).not.toHaveBeenCalled();
  });

  it('waits for reload when lazy', async () => {
    const load = vi.fn(async () => 42);
    const state = setup(load, { lazy: true });

    expect(load).not.toHaveBeenCalled();
    await state.reload();
    expect(state.data()).toBe(42);
  });

  it('drops results of older requests', async () => {
    const resolvers: Array<(value: string) => void> = [];
    const state = setup(() => new Promise<string>((resolve) => resolvers.push(resolve)));

    const second = state.reload();
    resolvers[1]('new');
    await second;
    resolvers[0]('old');
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(state.data()).toBe('new');
    expect(state.loading()).toBe(false);
  });

  it('repeats on the interval until disposed', async () => {
    vi.useFakeTimers();
    const load = vi.fn(async () => 'ok');
    setup(load, { interval: 1000 });

    await vi.advanceTimersByTimeAsync(1000);
    expect(load).toHaveBeenCalledTimes(2);

    dispose?.();
    dispose = undefined;
    await vi.advanceTimersByTimeAsync(3000);
    expect(load).toHaveBeenCalledTimes(2);
  });

  it('replaces data with mutate', () => {
    const state = setup(async () => 1, { lazy: true });
    state.mutate(5);
    expect(state.data()).toBe(5);
  });
});
