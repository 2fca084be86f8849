// Helpers for turning form values into API parameters

export interface AuthDomainInfo {
  type: string;
  add: boolean;
  edit: boolean;
  tfa: boolean;
  pwchange: boolean;
  sync: boolean;
}

/** Capabilities of an authentication realm type, `undefined` for unknown types. */
export function getAuthDomainInfo(type: string): AuthDomainInfo | undefined {
  switch (type) {
    case 'pam':
      return { type, add: false, edit: false, tfa: true, pwchange: false, sync: false };
    case 'pve':
    case 'pbs':
    case 'pdm':
      return { type, add: false, edit: false, tfa: true, pwchange: true, sync: false };
    case 'openid':
      return { type, add: true, edit: true, tfa: false, pwchange: false, sync: false };
    case 'ldap':
    case 'ad':
      return { type, add: true, edit: true, tfa: true, pwchange: false, sync: true };
    default:
      return undefined;
  }
}

const isEmptyValue = (value: unknown) => value === null || value === undefined || value === '';

/**
 * Drop the listed keys whose value is empty. With `addDelete`, those keys
 * (and listed keys missing from `data`) are collected in a `delete` array so
 * the server clears them.
 */
export function deleteEmptyValues(
  data: Record<string, unknown>,
  keys: readonly string[],
  addDelete: boolean,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const toDelete: string[] = [];

  for (const [key, value] of Object.entries(data)) {
    if (keys.includes(key) && isEmptyValue(value)) {
      toDelete.push(key);
    } else {
      result[key] = value;
    }
  }

  if (addDelete) {
    for (const key of keys) {
      if (!(key in data)) toDelete.push(key);
    }
    if (toDelete.length > 0) result.delete = toDelete;
  }

  return result;
}

export type PropertyRecord = Record<string, string>;

/**
 * Parse `value,key=value,...`; a bare value is assigned to `defaultKey`.
 */
export function parsePropertyString(text: string, defaultKey?: string): PropertyRecord {
  const result: PropertyRecord = {};
  for (const part of text.split(',')) {
    const item = part.trim();
    if (!item) continue;
    const eq = item.indexOf('=');
    if (eq < 0) {
      if (!defaultKey) throw new Error(`value without key in property string: '${item}'`);
      result[defaultKey] = item;
    } else {
      result[item.slice(0, eq).trim()] = item.slice(eq + 1).trim();
    }
  }
  return result;
}

/** Inverse of {@link parsePropertyString}; empty values are skipped. */
export function printPropertyString(record: Record<string, string | undefined>, defaultKey?: string): string {
  const parts: string[] = [];
  if (defaultKey && record[defaultKey]) parts.push(String(record[defaultKey]));
  for (const [key, value] of Object.entries(record)) {
    if (key === defaultKey || value === undefined || value === '') continue;
    parts.push(`${key}=${value}`);
  }
  return parts.join(',');
}

/** Trimmed string value of a form field, `undefined` when empty. */
export function optionalText(value: string | null | undefined): string | undefined {
  const trimmed = (value ?? '').trim();
  return trimmed ? trimmed : undefined;
}
