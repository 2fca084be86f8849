// Zoom window, grid lines and labels of an RRD graph

import type { DataRange, TimeRange } from './units';

/** `[start, end)` sample indexes of the zoomed part of a graph. */
export type ViewRange = readonly [number, number];

/** A selection must span more than this many samples to zoom in. */
export const MIN_ZOOM_SAMPLES = 10;

export interface ViewData {
  time: number[];
  series: number[][];
}

/** Samples inside `range`; series shorter than the time axis are clipped. */
export function sliceView(
  time: ReadonlyArray<number>,
  series: ReadonlyArray<ReadonlyArray<number>>,
  range: ViewRange | null,
): ViewData {
  if (!range) return { time: [...time], series: series.map((data) => [...data]) };
  const [start, end] = range;
  return {
    time: time.slice(start, end),
    series: series.map((data) => data.slice(Math.min(start, Math.max(data.length - 1, 0)), Math.min(end, data.length))),
  };
}

/**
 * Apply a selection from sample `a` to sample `b` (indexes into the current
 * view). Short selections leave the range unchanged.
 */
export function zoomViewRange(current: ViewRange | null, a: number, b: number): ViewRange | null {
  const start = Math.min(a, b);
  const end = Math.max(a, b);
  if (end - start <= MIN_ZOOM_SAMPLES) return current;
  const offset = current ? current[0] : 0;
  return [offset + start, offset + end];
}

const pad = (value: number) => String(value).padStart(2, '0');

/** Local `HH:MM` and `YYYY-MM-DD` of an epoch. */
export function formatRRDTime(epoch: number): { time: string; date: string } {
  const d = new Date(epoch * 1000);
  return {
    time: `${pad(d.getHours())}:${pad(d.getMinutes())}`,
    date: `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`,
  };
}

export function formatRRDDateTime(epoch: number): string {
  const { time, date } = formatRRDTime(epoch);
  return `${date} ${time}`;
}

/** Values of the horizontal grid lines, from min to max. */
export function valueGridLines(range: DataRange): number[] {
  const lines: number[] = [];
  if (!(range.interval > 0)) return lines;
  // by step count, repeated addition drifts past max
  const steps = Math.round((range.max - range.min) / range.interval);
  for (let i = 0; i <= steps; i++) lines.push(range.min + i * range.interval);
  return lines;
}

/** Epochs of the vertical grid lines. */
export function timeGridLines(range: TimeRange): number[] {
  const lines: number[] = [];
  if (!(range.interval > 0)) return lines;
  for (let t = range.start; t <= range.max; t += range.interval) lines.push(t);
  return lines;
}
