// LDAP / Active Directory realm config <-> edit form values.
//
// The server keeps the sync settings in two property strings:
//   sync-defaults-options: enable-new=<bool>,remove-vanished=acl;entry;properties
//   sync-attributes:       firstname=<attr>,lastname=<attr>,email=<attr>
// The edit form shows them as separate fields.

import type { FormValue, FormValues } from '@/components/shared/formContext';
import { deleteEmptyValues } from '@/utils/forms';

export const REMOVE_VANISHED_OPTIONS = ['acl', 'entry', 'properties'] as const;
export const SYNC_ATTRIBUTES = ['firstname', 'lastname', 'email'] as const;

export const LDAP_MODES = [
  { value: 'ldap', label: 'LDAP' },
  { value: 'ldap+starttls', label: 'STARTTLS' },
  { value: 'ldaps', label: 'LDAPS' },
] as const;

/** Keys cleared on update when left empty. */
export const LDAP_DELETABLE_KEYS = [
  'server2',
  'port',
  'mode',
  'verify',
  'comment',
  'user-classes',
  'filter',
  'sync-attributes',
  'sync-defaults-options',
] as const;

export const OPENID_DELETABLE_KEYS = ['acr-values', 'autocreate', 'comment', 'client-key', 'scopes', 'prompt'] as const;

const toFormValue = (value: unknown): FormValue => {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return String(value);
};

/** Server config of a LDAP/AD realm to form values. */
export function ldapConfigToForm(config: Record<string, unknown>): FormValues {
  const values: FormValues = {};
  for (const [key, value] of Object.entries(config)) {
    if (key === 'sync-defaults-options' || key === 'sync-attributes') continue;
    values[key] = toFormValue(value);
  }
  values.anonymous_search = typeof config['bind-dn'] !== 'string';

  const defaults = config['sync-defaults-options'];
  if (typeof defaults === 'string') {
    for (const part of defaults.split(',')) {
      const [name, value] = part.split('=');
      if (name === 'enable-new') {
        values['enable-new'] = value === 'true' || value === '1' ? 'true' : 'false';
      } else if (name === 'remove-vanished' && value) {
        for (const option of value.split(';')) {
          if (option) values[`remove-vanished-${option}`] = true;
        }
      }
    }
  }

  const attributes = config['sync-attributes'];
  if (typeof attributes === 'string') {
    for (const part of attributes.split(',')) {
      const [name, value] = part.split('=');
      if (name && value !== undefined) values[name] = value;
    }
  }

  return values;
}

/**
 * Form values of a LDAP/AD realm to request data. Form only fields and
 * empty values are dropped.
 */
export function ldapFormToConfig(values: FormValues): Record<string, unknown> {
  const data: Record<string, unknown> = {};
  const anonymous = values.anonymous_search === true;

  const defaults: string[] = [];
  const enableNew = values['enable-new'];
  if (enableNew === 'true' || enableNew === 'false') defaults.push(`enable-new=${enableNew}`);
  else if (typeof enableNew === 'boolean') defaults.push(`enable-new=${enableNew}`);

  const vanished = REMOVE_VANISHED_OPTIONS.filter((option) => values[`remove-vanished-${option}`] === true);
  if (vanished.length > 0) defaults.push(`remove-vanished=${vanished.join(';')}`);

  const attributes = SYNC_ATTRIBUTES.flatMap((name) => {
    const value = values[name];
    return typeof value === 'string' && value.trim() ? [`${name}=${value.trim()}`] : [];
  });

  const skip = new Set<string>([
    'anonymous_search',
    'enable-new',
    ...REMOVE_VANISHED_OPTIONS.map((option) => `remove-vanished-${option}`),
    ...SYNC_ATTRIBUTES,
  ]);
  if (anonymous) {
    skip.add('bind-dn');
    skip.add('password');
  }

  for (const [key, value] of Object.entries(values)) {
    if (skip.has(key) || value === undefined || value === null || value === '') continue;
    data[key] = value;
  }
  if (defaults.length > 0) data['sync-defaults-options'] = defaults.join(',');
  if (attributes.length > 0) data['sync-attributes'] = attributes.join(',');

  return data;
}

/** Update data: the realm name moves into the url, empty optional keys are deleted. */
export function realmUpdateData(
  data: Record<string, unknown>,
  deletable: readonly string[],
): Record<string, unknown> {
  const { realm: _realm, type: _type, digest, ...rest } = data;
  const result = deleteEmptyValues(rest, deletable, true);
  if (typeof digest === 'string' && digest) result.digest = digest;
  return result;
}
