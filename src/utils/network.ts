// Helpers for the network interface view and editor

import type { RequestData } from '@/types/api';
import type { BondXmitHashPolicy, LinuxBondMode, NetworkInterface, NetworkInterfaceType } from '@/types/network';
import { deleteEmptyValues } from '@/utils/forms';
import { jsonArrayToFlatString } from '@/utils/format';

export const BOND_MODES: readonly LinuxBondMode[] = [
  'balance-rr',
  'active-backup',
  'balance-xor',
  'broadcast',
  '802.3ad',
  'balance-tlb',
  'balance-alb',
];

export const XMIT_HASH_POLICIES: readonly BondXmitHashPolicy[] = ['layer2', 'layer2+3', 'layer3+4'];

export function formatNetworkInterfaceType(type: NetworkInterfaceType): string {
  switch (type) {
    case 'loopback':
      return 'Loopback';
    case 'eth':
      return 'Network Device';
    case 'bridge':
      return 'Linux Bridge';
    case 'bond':
      return 'Linux Bond';
    case 'vlan':
      return 'Linux VLAN';
    case 'alias':
      return 'Alias';
    default:
      return 'Unknown';
  }
}

export const formatBondMode = (mode?: LinuxBondMode): string =>
  mode === '802.3ad' ? 'LACP (802.3ad)' : mode ?? '';

export function formatPortsSlaves(iface: NetworkInterface): string {
  if (iface.type === 'bridge') return (iface.bridge_ports ?? []).join(' ');
  if (iface.type === 'bond') return (iface.slaves ?? []).join(' ');
  return '';
}

/** First unused `{prefix}{n}` name, e.g. `vmbr1` */
export function findNextFreeInterfaceId(prefix: string, list: readonly NetworkInterface[]): string | undefined {
  const names = new Set(list.map((item) => item.name));
  for (let next = 0; next < 9999; next++) {
    const id = `${prefix}${next}`;
    if (!names.has(id)) return id;
  }
  return undefined;
}

export const allowXmitHashPolicy = (mode: string) => mode === 'balance-xor' || mode === '802.3ad';
export const allowBondPrimary = (mode: string) => mode === 'active-backup';

/** Editor values for a loaded interface: port lists become space separated text. */
export function interfaceToFormValues(data: RequestData): RequestData {
  const values: RequestData = { ...data };
  if (Array.isArray(data.bridge_ports)) values.bridge_ports = jsonArrayToFlatString(data.bridge_ports);
  if (Array.isArray(data.slaves)) values.slaves = jsonArrayToFlatString(data.slaves);
  // some server releases send a spurious null
  if (values.bond_xmit_hash_policy === null) delete values.bond_xmit_hash_policy;
  return values;
}

export function createInterfaceData(values: RequestData, type: NetworkInterfaceType): RequestData {
  const { name, ...rest } = values;
  return { ...rest, iface: name, type };
}

export const NETWORK_DELETE_EMPTY = [
  'bridge_vlan_aware',
  'bond_xmit_hash_policy',
  'cidr',
  'cidr6',
  'gateway',
  'gateway6',
  'mtu',
] as const;

export const updateInterfaceData = (values: RequestData): RequestData =>
  deleteEmptyValues(values, NETWORK_DELETE_EMPTY, true);

export function isIpV4(text: string): boolean {
  const parts = text.split('.');
  return parts.length === 4 && parts.every((part) => /^\d{1,3}$/.test(part) && Number(part) <= 255);
}

export function isIpV6(text: string): boolean {
  if (!/^[0-9A-Fa-f:.]+$/.test(text)) return false;
  const halves = text.split('::');
  if (halves.length > 2) return false;

  const groups = (half: string) => (half ? half.split(':') : []);
  const all = halves.flatMap(groups);
  // an embedded IPv4 address takes two groups
  const last = all[all.length - 1] ?? '';
  const v4 = last.includes('.');
  if (v4 && !isIpV4(last)) return false;
  const hexGroups = v4 ? all.slice(0, -1) : all;
  if (!hexGroups.every((group) => /^[0-9A-Fa-f]{1,4}$/.test(group))) return false;

  const count = hexGroups.length + (v4 ? 2 : 0);
  return halves.length === 2 ? count < 8 : count === 8;
}

function validateCidr(text: string, isAddress: (addr: string) => boolean, maxPrefix: number): boolean {
  const slash = text.indexOf('/');
  if (slash < 0) return false;
  const prefix = text.slice(slash + 1);
  return isAddress(text.slice(0, slash)) && /^\d{1,3}$/.test(prefix) && Number(prefix) <= maxPrefix;
}

export const validateIpV4 = (text: string) => (isIpV4(text) ? null : 'Invalid IPv4 address.');
export const validateIpV6 = (text: string) => (isIpV6(text) ? null : 'Invalid IPv6 address.');
export const validateCidrV4 = (text: string) => (validateCidr(text, isIpV4, 32) ? null : 'Invalid IPv4/CIDR.');
export const validateCidrV6 = (text: string) => (validateCidr(text, isIpV6, 128) ? null : 'Invalid IPv6/CIDR.');
export const validateIpV4OrV6 = (text: string) =>
  isIpV4(text) || isIpV6(text) ? null : 'Invalid IP address.';
