import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createRoot } from 'solid-js';
import { usePersistentSignal } from '../usePersistentSignal';

const localStorageMock = (() => {
  let store: Record<string, string> = {};
  return {
    getItem: vi.fn((key: string) => store[key] ?? null),
    setItem: vi.fn((key: string, value: string) => {
      store[key] = value;
    }),
    removeItem: vi.fn((key: string) => {
      delete store[key];
    }),
    clear: vi.fn(() => {
      store = {};
    }),
    key: vi.fn(() => null),
    get length() {
      return Object.keys(store).length;
    },
  };
})();

const asText = (value: string) => value;
const asBoolean = (value: string) => value === 'true';

describe('usePersistentSignal', () => {
  let dispose: (() => void) | undefined;

  beforeEach(() => {
    vi.stubGlobal('localStorage', localStorageMock);
    localStorageMock.clear();
    vi.clearAllMocks();
  });

  afterEach(() => {
    dispose?.();
    dispose = undefined;
    vi.unstubAllGlobals();
  });

  const withRoot = <T,>(fn: () => T): T =>
    createRoot((d) => {
      dispose = d;
      return fn();
    });

  it('returns default value when storage is empty', () => {
    const [value] = withRoot(() => usePersistentSignal('test-key', 'default', { deserialize: asText }));
    expect(value()).toBe('default');
  });

  it('returns the stored value', () => {
    localStorageMock.setItem('test-key', 'stored-value');
    const [value] = withRoot(() => usePersistentSignal('test-key', 'default', { deserialize: asText }));
    expect(value()).toBe('stored-value');
  });

  it('writes changes to storage', () => {
    const [value, setValue] = withRoot(() => usePersistentSignal('test-key', 'default', { deserialize: asText }));

    setValue('new-value');

    expect(localStorageMock.setItem).toHaveBeenLastCalledWith('test-key', 'new-value');
    expect(value()).toBe('new-value');
  });

  it('removes the entry when the value becomes null', () => {
    const [, setValue] = withRoot(() =>
      usePersistentSignal<string | null>('test-key', 'default', { deserialize: asText }),
    );

    setValue(null);

    expect(localStorageMock.removeItem).toHaveBeenCalledWith('test-key');
  });

  it('uses a custom serializer', () => {
    const serialize = vi.fn((val: { a?: number; b?: number }) => JSON.stringify(val));
    const [, setValue] = withRoot(() =>
      usePersistentSignal<{ a?: number; b?: number }>('test-key', { a: 1 }, {
        serialize,
        deserialize: (raw) => JSON.parse(raw),
      }),
    );

    setValue({ b: 2 });

    expect(serialize).toHaveBeenCalledWith({ b: 2 });
    expect(localStorageMock.setItem).toHaveBeenLastCalledWith('test-key', '{"b":2}');
  });

  it('parses stored booleans', () => {
    localStorageMock.setItem('flag', 'true');
    const [value, setValue] = withRoot(() => usePersistentSignal('flag', false, { deserialize: asBoolean }));

    expect(value()).toBe(true);
    setValue(false);
    expect(localStorageMock.setItem).toHaveBeenLastCalledWith('flag', 'false');
  });

  it('falls back to the default when the stored value cannot be parsed', () => {
    localStorageMock.setItem('test-key', '{broken');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const [value] = withRoot(() =>
      usePersistentSignal('test-key', { a: 1 }, { deserialize: (raw): { a: number } => JSON.parse(raw) }),
    );

    expect(value()).toEqual({ a: 1 });
    expect(warn).toHaveBeenCalled();
    warn.mockRestore();
  });

  it('uses a custom storage implementation', () => {
    const custom = {
      getItem: vi.fn(() => 'custom-stored'),
      setItem: vi.fn(),
      removeItem: vi.fn(),
      clear: vi.fn(),
      key: vi.fn(() => null),
      length: 0,
    };

    const [value] = withRoot(() =>
      usePersistentSignal('test-key', 'default', { deserialize: asText, storage: custom }),
    );

    expect(custom.getItem).toHaveBeenCalledWith('test-key');
    expect(value()).toBe('custom-stored');
  });
});
