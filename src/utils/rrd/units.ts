// Axis scaling for RRD graphs

/**
 * Distance between value grid lines for base 10 units; always between 1/2
 * and 1/10 of the range.
 */
export function getGridUnitBase10(min: number, max: number): number {
  const range = max - min;
  if (!(range > 0)) {
    throw new RangeError(`getGridUnitBase10: got zero or negative range (${min} .. ${max})`);
  }

  let l = Math.trunc(Math.log10(range));
  // count between 1 and 10
  if (range / Math.pow(10, l) < 2) l -= 1;

  // count between 2 and 20
  let res = Math.pow(10, l);
  const count = range / res;
  if (count > 15) {
    res *= 5;
  } else if (count > 10) {
    res *= 2;
  }
  return res;
}

/** Grid distance for binary units; always smaller than 1/4 of the range. */
export function getGridUnitBase2(min: number, max: number): number {
  const range = max - min;
  if (!(range > 0)) {
    throw new RangeError(`getGridUnitBase2: got zero or negative range (${min} .. ${max})`);
  }

  let l = Math.trunc(Math.log2(range)) - 2;
  if (range / Math.pow(2, l) < 4) l -= 1;
  return Math.pow(2, l);
}

const TIME_UNITS = [
  3600 * 24, 3600 * 12, 3600 * 6, 3600 * 4, 3600 * 2, 3600,
  60 * 30, 60 * 15, 60 * 10, 60 * 5, 60 * 2, 60,
  30, 15, 10, 5, 2, 1,
];

/** Grid distance in seconds for a time axis from `min` to `max`. */
export function getTimeGridUnit(min: number, max: number): number {
  const range = max - min;
  if (range < 10) return 1;

  const largest = TIME_UNITS[0];
  let unit = largest;
  for (const candidate of TIME_UNITS) {
    if (Math.trunc(range / candidate) > 5) {
      unit = candidate;
      break;
    }
  }

  while (unit >= largest && Math.trunc(range / unit) > 10) {
    unit *= 2;
  }
  return unit;
}

export interface DataRange {
  min: number;
  max: number;
  /** Distance between value grid lines. */
  interval: number;
}

/**
 * Value axis bounds for the given series, snapped to the grid. Non finite
 * values are ignored; without data the range is 0..1.
 */
export function computeMinMax(
  series: ReadonlyArray<ReadonlyArray<number>>,
  includeZero: boolean,
  binary: boolean,
): DataRange {
  let min = Infinity;
  let max = -Infinity;

  for (const data of series) {
    for (const value of data) {
      if (!Number.isFinite(value)) continue;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }
  }

  if (!Number.isFinite(min) || !Number.isFinite(max)) {
    min = 0;
    max = 1;
  }

  if (includeZero) {
    max = Math.max(max, 0);
    min = Math.min(min, 0);
  }

  // stretch to at least 0.0005 difference
  if (max - min < 0.0005) {
    if (min > 0.0003) {
      max += 0.0002;
      min -= 0.0003;
    } else {
      max += 0.0005;
    }
  }

  const interval = binary ? getGridUnitBase2(min, max) : getGridUnitBase10(min, max);

  const snappedMin = Math.trunc(min / interval) * interval;
  min = snappedMin > min ? snappedMin - interval : snappedMin;

  const snappedMax = Math.trunc(max / interval) * interval;
  max = snappedMax < max ? snappedMax + interval : snappedMax;

  return { min, max, interval };
}

export interface TimeRange {
  min: number;
  max: number;
  interval: number;
  /** First grid line, `min` rounded up to the interval. */
  start: number;
}

export function computeTimeRange(timeData: ReadonlyArray<number>): TimeRange {
  const min = timeData.length > 0 ? timeData[0] : 0;
  const max = timeData.length > 0 ? timeData[timeData.length - 1] : 0;
  const interval = getTimeGridUnit(min, max);
  const start = Math.trunc((min + interval - 1) / interval) * interval;
  return { min, max, interval, start };
}

/** Round to a readable number of digits for axis labels and tooltips. */
export function reduceFloatPrecision(value: number): number {
  if (value === 0) return 0;

  const mag = Math.floor(Math.log10(Math.abs(value)));
  const base = mag > 0 ? Math.pow(10, Math.min(mag, 3)) : Math.pow(10, 3 - mag);
  return Math.round(value * base) / base;
}
