import '@testing-library/jest-dom';
import { beforeEach } from 'vitest';

const isStorage = (candidate: unknown): candidate is Storage => {
  if (typeof candidate !== 'object' || candidate === null) return false;
  return (
    'getItem' in candidate &&
    typeof candidate.getItem === 'function' &&
    'setItem' in candidate &&
    typeof candidate.setItem === 'function' &&
    'removeItem' in candidate &&
    typeof candidate.removeItem === 'function' &&
    'clear' in candidate &&
    typeof candidate.clear === 'function'
  );
};

class MemoryStorage implements Storage {
  private entries = new Map<string, string>();

  get length() {
    return this.entries.size;
  }

  key(index: number): string | null {
    return Array.from(this.entries.keys())[index] ?? null;
  }

  getItem(key: string): string | null {
    return this.entries.get(key) ?? null;
  }

  setItem(key: string, value: string) {
    this.entries.set(key, String(value));
  }

  removeItem(key: string) {
    this.entries.delete(key);
  }

  clear() {
    this.entries.clear();
  }
}

// Node 22+ ships an experimental Web Storage global that warns on access, so
// look at the property descriptor instead of reading the value.
const installStorage = (name: 'localStorage' | 'sessionStorage') => {
  const desc = Object.getOwnPropertyDescriptor(globalThis, name);
  const existing: unknown = desc && 'value' in desc ? desc.value : undefined;
  if (isStorage(existing)) return;

  const storage = new MemoryStorage();
  Object.defineProperty(globalThis, name, { value: storage, writable: true, configurable: true });
  if (typeof window !== 'undefined') {
    Object.defineProperty(window, name, { value: storage, writable: true, configurable: true });
  }
};

installStorage('localStorage');
installStorage('sessionStorage');

beforeEach(() => {
  installStorage('localStorage');
  installStorage('sessionStorage');
  localStorage.clear();
  sessionStorage.clear();
});
