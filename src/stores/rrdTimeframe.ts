/**
 * RRD Timeframe Store
 *
 * The timeframe shown by all RRD graphs. Persisted in localStorage and
 * announced with a `proxmox-rrd-timeframe-changed` DOM event on document so
 * panels outside this store can reload their data.
 */

import { createSignal } from 'solid-js';
import { EVENTS, STORAGE_KEYS } from '@/constants';
import { logger } from '@/utils/logger';

export type RRDTimeframe =
  | 'HourAvg'
  | 'HourMax'
  | 'DayAvg'
  | 'DayMax'
  | 'WeekAvg'
  | 'WeekMax'
  | 'MonthAvg'
  | 'MonthMax'
  | 'YearAvg'
  | 'YearMax'
  | 'DecadeAvg'
  | 'DecadeMax';

export type RRDTimeframeSpan = 'hour' | 'day' | 'week' | 'month' | 'year' | 'decade';
export type RRDConsolidation = 'AVERAGE' | 'MAX';

export interface RRDTimeframeInfo {
  value: RRDTimeframe;
  label: string;
  timeframe: RRDTimeframeSpan;
  cf: RRDConsolidation;
}

const entry = (
  value: RRDTimeframe,
  label: string,
  timeframe: RRDTimeframeSpan,
  cf: RRDConsolidation,
): RRDTimeframeInfo => ({ value, label, timeframe, cf });

export const RRD_TIMEFRAMES: ReadonlyArray<RRDTimeframeInfo> = [
  entry('HourAvg', 'Hour (average)', 'hour', 'AVERAGE'),
  entry('HourMax', 'Hour (maximum)', 'hour', 'MAX'),
  entry('DayAvg', 'Day (average)', 'day', 'AVERAGE'),
  entry('DayMax', 'Day (maximum)', 'day', 'MAX'),
  entry('WeekAvg', 'Week (average)', 'week', 'AVERAGE'),
  entry('WeekMax', 'Week (maximum)', 'week', 'MAX'),
  entry('MonthAvg', 'Month (average)', 'month', 'AVERAGE'),
  entry('MonthMax', 'Month (maximum)', 'month', 'MAX'),
  entry('YearAvg', 'Year (average)', 'year', 'AVERAGE'),
  entry('YearMax', 'Year (maximum)', 'year', 'MAX'),
  entry('DecadeAvg', 'Decade (average)', 'decade', 'AVERAGE'),
  entry('DecadeMax', 'Decade (maximum)', 'decade', 'MAX'),
];

export const DEFAULT_RRD_TIMEFRAME: RRDTimeframe = 'DayAvg';

export function isRRDTimeframe(value: unknown): value is RRDTimeframe {
  return RRD_TIMEFRAMES.some((info) => info.value === value);
}

export function timeframeInfo(value: RRDTimeframe): RRDTimeframeInfo {
  return RRD_TIMEFRAMES.find((entry) => entry.value === value) ?? RRD_TIMEFRAMES[2];
}

/** Parse a label as shown by the selector, e.g. `Week (maximum)`. */
export function parseTimeframeLabel(label: string): RRDTimeframe | null {
  return RRD_TIMEFRAMES.find((entry) => entry.label === label)?.value ?? null;
}

/** Query parameters for the `rrddata` API calls. */
export function timeframeApiParams(value: RRDTimeframe): { timeframe: RRDTimeframeSpan; cf: RRDConsolidation } {
  const info = timeframeInfo(value);
  return { timeframe: info.timeframe, cf: info.cf };
}

function loadStoredTimeframe(): RRDTimeframe {
  try {
    const raw = localStorage.getItem(STORAGE_KEYS.RRD_TIMEFRAME);
    if (raw === null) return DEFAULT_RRD_TIMEFRAME;
    const parsed: unknown = JSON.parse(raw);
    return isRRDTimeframe(parsed) ? parsed : DEFAULT_RRD_TIMEFRAME;
  } catch (err) {
    logger.debug('Ignoring stored RRD timeframe', err);
    return DEFAULT_RRD_TIMEFRAME;
  }
}

const [rrdTimeframe, setRRDTimeframeSignal] = createSignal<RRDTimeframe>(loadStoredTimeframe());

export { rrdTimeframe };

export function setRRDTimeframe(value: RRDTimeframe): void {
  setRRDTimeframeSignal(value);
  try {
    localStorage.setItem(STORAGE_KEYS.RRD_TIMEFRAME, JSON.stringify(value));
  } catch (err) {
    logger.error('RRDTimeframe: unable to store timeframe', err);
    return;
  }
  document.dispatchEvent(new Event(EVENTS.RRD_TIMEFRAME_CHANGED));
}

/** Re-read the stored value, e.g. after another tab changed it. */
export function reloadRRDTimeframe(): RRDTimeframe {
  const value = loadStoredTimeframe();
  setRRDTimeframeSignal(value);
  return value;
}
