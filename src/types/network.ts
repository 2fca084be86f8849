export type NetworkInterfaceType = 'loopback' | 'eth' | 'bridge' | 'bond' | 'vlan' | 'alias' | 'unknown';

export type LinuxBondMode =
  | 'balance-rr'
  | 'active-backup'
  | 'balance-xor'
  | 'broadcast'
  | '802.3ad'
  | 'balance-tlb'
  | 'balance-alb';

export type BondXmitHashPolicy = 'layer2' | 'layer2+3' | 'layer3+4';

export interface NetworkInterface {
  name: string;
  type: NetworkInterfaceType;
  active?: boolean;
  autostart?: boolean;
  bridge_vlan_aware?: boolean;
  bridge_ports?: string[];
  slaves?: string[];
  bond_mode?: LinuxBondMode;
  bond_xmit_hash_policy?: BondXmitHashPolicy | null;
  'bond-primary'?: string;
  cidr?: string;
  cidr6?: string;
  gateway?: string;
  gateway6?: string;
  mtu?: number;
  comments?: string;
}

export interface NetworkList {
  interfaces: NetworkInterface[];
  /** Pending changes as a diff, empty when there are none. */
  changes: string;
}
