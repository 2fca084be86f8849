import { describe, expect, it } from 'vitest';
import type { NetworkInterface } from '@/types/network';
import {
  allowBondPrimary,
  allowXmitHashPolicy,
  createInterfaceData,
  findNextFreeInterfaceId,
  formatBondMode,
  formatNetworkInterfaceType,
  formatPortsSlaves,
  interfaceToFormValues,
  isIpV4,
  isIpV6,
  updateInterfaceData,
  validateCidrV4,
  validateCidrV6,
  validateIpV4OrV6,
} from '../network';

describe('address checks', () => {
  it('accepts dotted quads only', () => {
    expect(isIpV4('10.0.0.1')).toBe(true);
    expect(isIpV4('192.168.1.256')).toBe(false);
    expect(isIpV4('1.2.3')).toBe(false);
  });

  it('accepts full and compressed IPv6 notation', () => {
    expect(isIpV6('2001:0db8:85a3:0000:0000:8a2e:0370:7334')).toBe(true);
    expect(isIpV6('2001:db8::ff00:42:8329')).toBe(true);
    expect(isIpV6('::1')).toBe(true);
    expect(isIpV6('::ffff:192.0.2.1')).toBe(true);
  });

  it('rejects malformed IPv6 addresses', () => {
    expect(isIpV6('1:2:3:4:5:6:7')).toBe(false);
    expect(isIpV6('1::2::3')).toBe(false);
    expect(isIpV6('gggg::1')).toBe(false);
    expect(isIpV6('::ffff:192.0.2.300')).toBe(false);
  });

  it('validates CIDR notation', () => {
    expect(validateCidrV4('192.168.0.1/24')).toBeNull();
    expect(validateCidrV4('192.168.0.1/33')).toBe('Invalid IPv4/CIDR.');
    expect(validateCidrV4('192.168.0.1')).toBe('Invalid IPv4/CIDR.');
    expect(validateCidrV6('fd00::1/64')).toBeNull();
    expect(validateCidrV6('fd00::1/129')).toBe('Invalid IPv6/CIDR.');
  });

  it('validates DNS servers of either family', () => {
    expect(validateIpV4OrV6('9.9.9.9')).toBeNull();
    expect(validateIpV4OrV6('2620:fe::fe')).toBeNull();
    expect(validateIpV4OrV6('dns.example')).toBe('Invalid IP address.');
  });
});

describe('interface display', () => {
  const bridge: NetworkInterface = { name: 'vmbr0', type: 'bridge', bridge_ports: ['eno1', 'eno2'] };

  it('names interface types', () => {
    expect(formatNetworkInterfaceType('eth')).toBe('Network Device');
    expect(formatNetworkInterfaceType('bond')).toBe('Linux Bond');
    expect(formatNetworkInterfaceType('unknown')).toBe('Unknown');
  });

  it('labels LACP', () => {
    expect(formatBondMode('802.3ad')).toBe('LACP (802.3ad)');
    expect(formatBondMode('active-backup')).toBe('active-backup');
    expect(formatBondMode()).toBe('');
  });

  it('lists bridge ports and bond slaves', () => {
    expect(formatPortsSlaves(bridge)).toBe('eno1 eno2');
    expect(formatPortsSlaves({ name: 'bond0', type: 'bond', slaves: ['eno3'] })).toBe('eno3');
    expect(formatPortsSlaves({ name: 'eno1', type: 'eth' })).toBe('');
  });

  it('finds the next free name', () => {
    expect(findNextFreeInterfaceId('vmbr', [bridge, { name: 'vmbr2', type: 'bridge' }])).toBe('vmbr1');
  });

  it('allows hash policy and primary only for matching bond modes', () => {
    expect(allowXmitHashPolicy('balance-xor')).toBe(true);
    expect(allowXmitHashPolicy('802.3ad')).toBe(true);
    expect(allowXmitHashPolicy('active-backup')).toBe(false);
    expect(allowBondPrimary('active-backup')).toBe(true);
    expect(allowBondPrimary('balance-rr')).toBe(false);
  });
});

describe('editor data', () => {
  it('flattens port lists and drops a null hash policy', () => {
    expect(interfaceToFormValues({ name: 'bond0', slaves: ['eno1', 'eno2'], bond_xmit_hash_policy: null, mtu: 9000 })).toEqual(
      { name: 'bond0', slaves: 'eno1 eno2', mtu: 9000 },
    );
  });

  it('sends the name as iface on create', () => {
    expect(createInterfaceData({ name: 'vmbr1', autostart: true }, 'bridge')).toEqual({
      autostart: true,
      iface: 'vmbr1',
      type: 'bridge',
    });
  });

  it('clears empty and missing optional values on update', () => {
    expect(updateInterfaceData({ cidr: '', comments: 'uplink', mtu: 1500 })).toEqual({
      comments: 'uplink',
      mtu: 1500,
      delete: ['cidr', 'bridge_vlan_aware', 'bond_xmit_hash_policy', 'cidr6', 'gateway', 'gateway6'],
    });
  });
});
