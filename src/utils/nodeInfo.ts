// Rows of the node status overview

import type { NodeStatus } from '@/types/node';
import { formatBytes, formatBytesDecimal } from '@/utils/format';

export type NodeInfoIcon = 'cpu' | 'clock' | 'memory' | 'load' | 'disk' | 'swap';

export interface MeterRow {
  kind: 'meter';
  key: string;
  title: string;
  icon: NodeInfoIcon;
  /** Fraction 0..1, `undefined` when not applicable */
  value?: number;
  status?: string;
  low: number;
  high: number;
  optimum: number;
}

export interface StatusRowInfo {
  kind: 'status';
  key: string;
  title: string;
  icon?: NodeInfoIcon;
  status: string;
  /** spans the whole grid width */
  wide: boolean;
}

export type NodeInfoRow = MeterRow | StatusRowInfo;

const meter = (
  key: string,
  title: string,
  icon: NodeInfoIcon,
  value: number | undefined,
  status?: string,
  range: { low?: number; high?: number } = {},
): MeterRow => ({
  kind: 'meter',
  key,
  title,
  icon,
  value,
  status,
  low: range.low ?? 0.75,
  high: range.high ?? 0.9,
  optimum: 0,
});

const ratio = (used: number, total: number) => (total > 0 ? used / total : 0);

const percent = (fraction: number) => `${(fraction * 100).toFixed(2)}%`;

function formatLoad(loadavg: ReadonlyArray<number | string>): string {
  if (loadavg.length === 0) return 'N/A';
  return loadavg.map((value) => (typeof value === 'number' ? value.toFixed(2) : value)).join(' ');
}

/** `(build date)` part of a kernel version string, e.g. `#1 SMP PREEMPT_DYNAMIC PMX 6.8.12-4 (2024-11-06T15:04Z)`. */
export function kernelBuildDate(version: string): string {
  const parts = version.split(/[()]/);
  return parts.length > 1 ? parts[1] : 'unknown';
}

export function bootModeText(bootInfo: NodeStatus['boot-info']): string | undefined {
  if (!bootInfo) return undefined;
  if (bootInfo.mode === 'efi') return bootInfo.secureboot ? 'UEFI (Secure Boot Enabled)' : 'UEFI';
  return 'Legacy BIOS';
}

/** Node status as meter and text rows; `null` renders placeholders. */
export function nodeInfoRows(status: NodeStatus | null): NodeInfoRow[] {
  const cpu = status?.cpu ?? 0;
  const cpus = status?.cpuinfo.cpus ?? 1;
  const memory = status?.memory ?? { used: 0, total: 1 };
  const root = status?.root ?? status?.rootfs ?? { used: 0, total: 1 };
  const swap = status ? status.swap ?? { used: 0, total: 0 } : { used: 0, total: 1 };

  const memoryFraction = ratio(memory.used, memory.total);
  const rootFraction = ratio(root.used, root.total);
  const swapFraction = swap.total > 0 ? ratio(swap.used, swap.total) : undefined;

  const sockets = status?.cpuinfo.sockets ?? 1;
  const kernel = status?.['current-kernel'];

  const rows: NodeInfoRow[] = [
    meter('cpu', 'CPU Usage', 'cpu', cpu, `${percent(cpu)} of ${cpus} CPU(s)`),
    meter('wait', 'IO delay', 'clock', status?.wait ?? 0),
    // memory is there to be used
    meter(
      'memory',
      'RAM Usage',
      'memory',
      memoryFraction,
      `${percent(memoryFraction)} (${formatBytes(memory.used)} of ${formatBytes(memory.total)})`,
      { low: 0.9, high: 0.975 },
    ),
    {
      kind: 'status',
      key: 'loadavg',
      title: 'Load Average',
      icon: 'load',
      status: status ? formatLoad(status.loadavg) : 'N/A',
      wide: false,
    },
    meter(
      'root',
      'HD space (root)',
      'disk',
      rootFraction,
      `${percent(rootFraction)} (${formatBytesDecimal(root.used)} of ${formatBytesDecimal(root.total)})`,
    ),
    meter(
      'swap',
      'SWAP usage',
      'swap',
      swapFraction,
      swapFraction === undefined
        ? 'N/A'
        : `${percent(swapFraction)} (${formatBytes(swap.used)} of ${formatBytes(swap.total)})`,
    ),
    {
      kind: 'status',
      key: 'cpus',
      title: 'CPU(s)',
      status: `${cpus} x ${status?.cpuinfo.model ?? ''} (${sockets === 1 ? '1 Socket' : `${sockets} Sockets`})`,
      wide: true,
    },
  ];

  if (status?.pveversion) {
    rows.push({ kind: 'status', key: 'version', title: 'Version', status: status.pveversion, wide: true });
  }

  rows.push({
    kind: 'status',
    key: 'kernel',
    title: 'Kernel Version',
    status: kernel ? `${kernel.sysname} ${kernel.release} (${kernelBuildDate(kernel.version)})` : '',
    wide: true,
  });

  const bootMode = bootModeText(status?.['boot-info']);
  if (bootMode) rows.push({ kind: 'status', key: 'bootmode', title: 'Boot Mode', status: bootMode, wide: true });

  return rows;
}
