import { describe, expect, it } from 'vitest';
import {
  dateInputToEpoch,
  epochToInputValue,
  formatBytes,
  formatBytesDecimal,
  formatDurationHuman,
  formatPercent,
  inputValueToEpoch,
  isHttpUrl,
  jsonArrayToFlatString,
  renderBoolean,
  renderEpoch,
  renderEpochShort,
  renderEpochUtc,
} from '../format';

const localEpoch = (...args: [number, number, number, number?, number?, number?]) =>
  new Date(args[0], args[1], args[2], args[3] ?? 0, args[4] ?? 0, args[5] ?? 0).getTime() / 1000;

describe('formatDurationHuman', () => {
  it('handles sub-second values', () => {
    expect(formatDurationHuman(0)).toBe('<1s');
    expect(formatDurationHuman(0.5)).toBe('<1s');
    expect(formatDurationHuman(Number.NaN)).toBe('<1s');
  });

  it('shows seconds below a day', () => {
    expect(formatDurationHuman(59)).toBe('59s');
    expect(formatDurationHuman(3661)).toBe('1h 1m 1s');
  });

  it('drops seconds once days are shown', () => {
    expect(formatDurationHuman(90061)).toBe('1d 1h 1m');
  });

  it('drops minutes once years are shown', () => {
    expect(formatDurationHuman(366 * 86400 + 3660)).toBe('1y 1d 1h');
  });
});

describe('epoch rendering', () => {
  const epoch = localEpoch(2024, 0, 5, 7, 8, 9);

  it('renders local time', () => {
    expect(renderEpoch(epoch)).toBe('2024-01-05 07:08:09');
    expect(renderEpochShort(epoch)).toBe('Jan 05 07:08:09');
  });

  it('renders UTC', () => {
    expect(renderEpochUtc(0)).toBe('1970-01-01 00:00:00');
  });

  it('converts to and from datetime-local input values', () => {
    const minute = localEpoch(2024, 1, 3, 4, 5);
    expect(epochToInputValue(minute)).toBe('2024-02-03T04:05');
    expect(inputValueToEpoch('2024-02-03T04:05')).toBe(minute);
    expect(inputValueToEpoch('  ')).toBeNull();
    expect(inputValueToEpoch('nonsense')).toBeNull();
    expect(epochToInputValue(Number.NaN)).toBe('');
  });

  it('converts date inputs to day boundaries', () => {
    expect(dateInputToEpoch('2024-03-10', false)).toBe(localEpoch(2024, 2, 10));
    expect(dateInputToEpoch('2024-03-10', true)).toBe(localEpoch(2024, 2, 10, 23, 59, 59));
    expect(dateInputToEpoch('10.03.2024', false)).toBeNull();
  });
});

describe('sizes and ratios', () => {
  it('uses binary prefixes', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KiB');
    expect(formatBytes(200 * 1024 ** 3)).toBe('200 GiB');
  });

  it('uses decimal prefixes', () => {
    expect(formatBytesDecimal(1_500_000)).toBe('1.5 MB');
  });

  it('formats fractions as percent', () => {
    expect(formatPercent(0.1234)).toBe('12.34%');
    expect(formatPercent(0.5, 0)).toBe('50%');
    expect(formatPercent(Number.NaN)).toBe('-');
  });
});

describe('misc', () => {
  it('joins string arrays', () => {
    expect(jsonArrayToFlatString(['eno1', '', 3, 'eno2'])).toBe('eno1 eno2');
    expect(jsonArrayToFlatString('eno1')).toBe('');
  });

  it('recognizes http URLs', () => {
    expect(isHttpUrl('https://www.proxmox.com')).toBe(true);
    expect(isHttpUrl('ftp://example.com')).toBe(false);
  });

  it('renders booleans', () => {
    expect(renderBoolean(true)).toBe('Yes');
    expect(renderBoolean(false)).toBe('No');
  });
});
