import type { PendingConfig, PendingConfigValue } from '@/types/pending';

/**
 * Split a pending config list into the current and the pending record.
 * Properties marked for deletion have no pending value.
 */
export function pendingConfigToObjects(data: readonly PendingConfigValue[]): PendingConfig {
  const config: PendingConfig = { current: {}, pending: {}, keys: new Set() };

  for (const item of data) {
    config.keys.add(item.key);
    if (item.value !== undefined && item.value !== null) config.current[item.key] = item.value;
    if (item.delete === 1 || item.delete === 2) continue;
    const pending = item.pending ?? item.value;
    if (pending !== undefined && pending !== null) config.pending[item.key] = pending;
  }

  return config;
}

const valueText = (value: unknown): string => {
  if (value === undefined || value === null) return '';
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
};

/** Whether the pending value of `key` differs from the current one. */
export const hasPendingChange = (config: PendingConfig, key: string): boolean =>
  valueText(config.current[key]) !== valueText(config.pending[key]);
