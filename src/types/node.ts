// Node status, DNS, time and network types

export interface UsageInfo {
  used: number;
  total: number;
  free?: number;
}

export interface KernelInfo {
  sysname: string;
  release: string;
  version: string;
  machine?: string;
}

export type BootMode = 'efi' | 'legacy-bios';

export interface NodeStatus {
  cpu: number;
  wait?: number;
  /** Backup server: numbers, virtual environment: strings */
  loadavg: Array<number | string>;
  memory: UsageInfo;
  swap?: UsageInfo;
  root?: UsageInfo;
  rootfs?: UsageInfo;
  cpuinfo: { cpus: number; model: string; sockets: number };
  pveversion?: string;
  'current-kernel': KernelInfo;
  'boot-info'?: { mode: BootMode; secureboot?: boolean };
  info?: { fingerprint: string };
  uptime?: number;
}

export type NodePowerCommand = 'reboot' | 'shutdown';

export interface DnsConfig {
  search?: string;
  dns1?: string;
  dns2?: string;
  dns3?: string;
  digest?: string;
}

export interface TimeConfig {
  timezone: string;
  /** Epoch seconds, UTC */
  time: number;
  localtime: number;
}

export interface NodeConfig {
  description?: string;
  digest?: string;
  [key: string]: unknown;
}
