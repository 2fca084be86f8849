// Formatting helpers for durations, epochs, sizes and flags

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

/**
 * Human readable duration, e.g. `1d 2h` or `5m 3s`.
 *
 * Minutes are dropped once years are shown, seconds once days are shown.
 */
export function formatDurationHuman(seconds: number): string {
  if (!(seconds >= 1)) return '<1s';

  let remaining = Math.floor(seconds);
  const secs = remaining % 60;
  remaining = Math.floor(remaining / 60);
  const minutes = remaining % 60;
  remaining = Math.floor(remaining / 60);
  const hours = remaining % 24;
  remaining = Math.floor(remaining / 24);
  const days = remaining % 365; // leap years ignored
  const years = Math.floor(remaining / 365);

  const parts: string[] = [];
  if (years > 0) parts.push(`${years}y`);
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);

  if (years === 0) {
    if (minutes > 0) parts.push(`${minutes}m`);
    if (days === 0 && secs > 0) parts.push(`${secs}s`);
  }

  return parts.join(' ');
}

/** epoch to `Mon DD HH:MM:SS` (local time) */
export function renderEpochShort(epoch: number): string {
  const date = new Date(epoch * 1000);
  return `${MONTHS[date.getMonth()]} ${pad(date.getDate())} ${pad(date.getHours())}:${pad(
    date.getMinutes(),
  )}:${pad(date.getSeconds())}`;
}

/** epoch to `YYYY-MM-DD HH:MM:SS` (local time) */
export function renderEpoch(epoch: number): string {
  const date = new Date(epoch * 1000);
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(
    date.getHours(),
  )}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** epoch to `YYYY-MM-DD HH:MM:SS` (UTC) */
export function renderEpochUtc(epoch: number): string {
  const date = new Date(epoch * 1000);
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ${pad(
    date.getUTCHours(),
  )}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

export const renderBoolean = (value: boolean): string => (value ? 'Yes' : 'No');

/** Value for `<input type="datetime-local">`; empty for invalid dates. */
export function epochToInputValue(epoch: number): string {
  const date = new Date(epoch * 1000);
  if (Number.isNaN(date.getTime())) return '';
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}T${pad(
    date.getHours(),
  )}:${pad(date.getMinutes())}`;
}

/** Parse a date or datetime-local input value to epoch seconds. */
export function inputValueToEpoch(value: string): number | null {
  if (!value.trim()) return null;
  const time = new Date(value).getTime();
  return Number.isNaN(time) ? null : Math.floor(time / 1000);
}

export const isHttpUrl = (url: string): boolean =>
  url.startsWith('http://') || url.startsWith('https://');

/** Space separated list of the non-empty strings in `list`. */
export function jsonArrayToFlatString(list: unknown): string {
  if (!Array.isArray(list)) return '';
  return list.filter((item): item is string => typeof item === 'string' && item !== '').join(' ');
}

function formatScaled(value: number, base: number, units: readonly string[]): string {
  if (!Number.isFinite(value) || value <= 0) return `0 ${units[0]}`;
  let index = 0;
  let scaled = value;
  while (scaled >= base && index < units.length - 1) {
    scaled /= base;
    index++;
  }
  if (index === 0) return `${Math.round(scaled)} ${units[0]}`;
  const precision = scaled < 10 ? 2 : scaled < 100 ? 1 : 0;
  return `${parseFloat(scaled.toFixed(precision))} ${units[index]}`;
}

const BINARY_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB', 'EiB'] as const;
const DECIMAL_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB', 'EB'] as const;

/** Bytes with binary prefixes, e.g. `1.5 GiB`. */
export const formatBytes = (bytes: number): string => formatScaled(bytes, 1024, BINARY_UNITS);

/** Bytes with decimal prefixes, e.g. `1.5 GB`. */
export const formatBytesDecimal = (bytes: number): string => formatScaled(bytes, 1000, DECIMAL_UNITS);

export function formatPercent(fraction: number, digits = 2): string {
  if (!Number.isFinite(fraction)) return '-';
  return `${(fraction * 100).toFixed(digits)}%`;
}

/** epoch to the `YYYY-MM-DD HH:MM:SS` form the syslog API takes (local time) */
export const epochToSyslogApi = (epoch: number): string => renderEpoch(epoch);

/**
 * `YYYY-MM-DD` date input to epoch seconds at the start (00:00:00) or end
 * (23:59:59) of that local day.
 */
export function dateInputToEpoch(value: string, endOfDay: boolean): number | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) return null;
  const date = endOfDay
    ? new Date(Number(match[1]), Number(match[2]) - 1, Number(match[3]), 23, 59, 59)
    : new Date(Number(match[1]), Number(match[2]) - 1, Number(match[3]), 0, 0, 0);
  return Math.floor(date.getTime() / 1000);
}
