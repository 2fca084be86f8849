import { createSignal } from 'solid-js';
import type { Accessor } from 'solid-js';
import { createStore, reconcile, unwrap } from 'solid-js/store';

export type FormValue = string | number | boolean | string[] | null | undefined;
export type FormValues = Record<string, FormValue>;

/** Shared state of the fields inside an edit window. */
export interface FormContext {
  readonly values: FormValues;
  text: (name: string) => string;
  checked: (name: string, fallback?: boolean) => boolean;
  list: (name: string) => string[];
  set: (name: string, value: FormValue) => void;
  /** Replace all values and make them the new reset point. */
  load: (values: FormValues) => void;
  reset: () => void;
  dirty: Accessor<boolean>;
  snapshot: () => FormValues;
  setError: (name: string, message: string | null) => void;
  error: (name: string) => string | null;
  valid: Accessor<boolean>;
  advanced: Accessor<boolean>;
  setAdvanced: (value: boolean) => void;
}

const sameValue = (a: FormValue, b: FormValue): boolean => {
  const empty = (v: FormValue) => v === undefined || v === null || v === '';
  if (empty(a) && empty(b)) return true;
  if (Array.isArray(a) && Array.isArray(b)) return a.length === b.length && a.every((v, i) => v === b[i]);
  return a === b;
};

export function createFormContext(initial: FormValues = {}): FormContext {
  let original: FormValues = { ...initial };
  const [values, setValues] = createStore<FormValues>({ ...initial });
  const [errors, setErrors] = createStore<Record<string, string | null>>({});
  const [advanced, setAdvanced] = createSignal(false);

  const dirty = () => {
    const keys = new Set([...Object.keys(original), ...Object.keys(values)]);
    for (const key of keys) {
      if (!sameValue(original[key], values[key])) return true;
    }
    return false;
  };

  return {
    values,
    text: (name) => {
      const value = values[name];
      if (value === undefined || value === null) return '';
      return Array.isArray(value) ? value.join(',') : String(value);
    },
    checked: (name, fallback = false) => {
      const value = values[name];
      return typeof value === 'boolean' ? value : fallback;
    },
    list: (name) => {
      const value = values[name];
      if (Array.isArray(value)) return [...value];
      return typeof value === 'string' && value ? value.split(',') : [];
    },
    set: (name, value) => setValues(name, value),
    load: (next) => {
      original = { ...next };
      setValues(reconcile({ ...next }));
    },
    reset: () => setValues(reconcile({ ...original })),
    dirty,
    snapshot: () => ({ ...unwrap(values) }),
    setError: (name, message) => setErrors(name, message),
    error: (name) => errors[name] ?? null,
    valid: () => Object.values(errors).every((message) => !message),
    advanced,
    setAdvanced,
  };
}
