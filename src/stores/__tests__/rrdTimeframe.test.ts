import { describe, expect, it, vi } from 'vitest';
import {
  isRRDTimeframe,
  parseTimeframeLabel,
  reloadRRDTimeframe,
  rrdTimeframe,
  setRRDTimeframe,
  timeframeApiParams,
} from '../rrdTimeframe';

describe('rrdTimeframe store', () => {
  it('persists the selection and announces it', () => {
    const listener = vi.fn();
    document.addEventListener('proxmox-rrd-timeframe-changed', listener);

    setRRDTimeframe('WeekMax');
    document.removeEventListener('proxmox-rrd-timeframe-changed', listener);

    expect(rrdTimeframe()).toBe('WeekMax');
    expect(localStorage.getItem('ProxmoxRRDTimeframe')).toBe('"WeekMax"');
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('re-reads the stored value', () => {
    localStorage.setItem('ProxmoxRRDTimeframe', '"YearAvg"');
    expect(reloadRRDTimeframe()).toBe('YearAvg');
    expect(rrdTimeframe()).toBe('YearAvg');
  });

  it('falls back to the day average for unknown values', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    localStorage.setItem('ProxmoxRRDTimeframe', 'not json');
    expect(reloadRRDTimeframe()).toBe('DayAvg');

    localStorage.setItem('ProxmoxRRDTimeframe', '"Fortnight"');
    expect(reloadRRDTimeframe()).toBe('DayAvg');
  });

  it('maps timeframes to API parameters and labels', () => {
    expect(timeframeApiParams('MonthMax')).toEqual({ timeframe: 'month', cf: 'MAX' });
    expect(parseTimeframeLabel('Week (maximum)')).toBe('WeekMax');
    expect(parseTimeframeLabel('Week')).toBeNull();
    expect(isRRDTimeframe('HourAvg')).toBe(true);
    expect(isRRDTimeframe('hour')).toBe(false);
  });
});
