// ACME domain and DNS plugin configuration helpers

import { LIMITS } from '@/constants';
import type { AcmeConfig, AcmeDomain, AcmeChallengeSchema } from '@/types/acme';
import { parsePropertyString, printPropertyString } from '@/utils/forms';

export function parseAcmeDomainString(text: string): AcmeDomain {
  const record = parsePropertyString(text, 'domain');
  if (!record.domain) throw new Error(`missing domain in '${text}'`);
  return { domain: record.domain, alias: record.alias, plugin: record.plugin };
}

export const createAcmeDomainString = (config: AcmeDomain): string =>
  printPropertyString({ domain: config.domain, alias: config.alias, plugin: config.plugin }, 'domain');

export function parseAcmeConfigString(text: string): AcmeConfig {
  const record = parsePropertyString(text, 'account');
  if (!record.account) throw new Error(`missing account in '${text}'`);
  return { account: record.account };
}

export const createAcmeConfigString = (config: AcmeConfig): string =>
  printPropertyString({ account: config.account }, 'account');

export interface AcmeDomainEntry {
  /** `acmedomain0` .. `acmedomain4` */
  configKey: string;
  type: 'dns' | 'standalone';
  config: AcmeDomain;
}

export const acmeDomainKey = (index: number) => `acmedomain${index}`;

/** Configured domains from the node config. */
export function acmeDomainsFromConfig(config: Record<string, unknown>): AcmeDomainEntry[] {
  const list: AcmeDomainEntry[] = [];
  for (let i = 0; i < LIMITS.ACME_DOMAIN_SLOTS; i++) {
    const key = acmeDomainKey(i);
    const value = config[key];
    if (typeof value !== 'string') continue;
    const domain = parseAcmeDomainString(value);
    list.push({ configKey: key, type: domain.plugin ? 'dns' : 'standalone', config: domain });
  }
  return list;
}

export function nextFreeAcmeDomainKey(entries: readonly AcmeDomainEntry[]): string | undefined {
  for (let i = 0; i < LIMITS.ACME_DOMAIN_SLOTS; i++) {
    const key = acmeDomainKey(i);
    if (!entries.some((entry) => entry.configKey === key)) return key;
  }
  return undefined;
}

export function encodeBase64(text: string): string {
  let binary = '';
  for (const byte of new TextEncoder().encode(text)) binary += String.fromCharCode(byte);
  return btoa(binary);
}

export function decodeBase64(data: string): string {
  const binary = atob(data);
  const bytes = Uint8Array.from(binary, (char) => char.charCodeAt(0));
  return new TextDecoder().decode(bytes);
}

/** `key=value` lines of a plugin's API data. */
export function parsePluginData(data: string): Record<string, string> {
  const map: Record<string, string> = {};
  for (const line of data.split('\n')) {
    const eq = line.indexOf('=');
    if (eq < 0) continue;
    map[line.slice(0, eq)] = line.slice(eq + 1);
  }
  return map;
}

/**
 * base64 API data for a plugin. With a schema, the non-empty field values are
 * joined as `key=value` lines; otherwise the raw text is used.
 */
export function assemblePluginData(
  schema: AcmeChallengeSchema | undefined,
  values: Record<string, string>,
  rawText: string,
): string {
  const fields = schema?.schema.fields;
  if (!fields) return encodeBase64(rawText);
  const lines: string[] = [];
  for (const name of Object.keys(fields)) {
    const value = (values[name] ?? '').trim();
    if (value) lines.push(`${name}=${value}`);
  }
  return encodeBase64(lines.join('\n'));
}
