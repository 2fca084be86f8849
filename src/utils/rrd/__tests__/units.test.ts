import { describe, expect, it } from 'vitest';
import {
  computeMinMax,
  computeTimeRange,
  getGridUnitBase10,
  getGridUnitBase2,
  getTimeGridUnit,
  reduceFloatPrecision,
} from '../units';

const MiB = 1024 * 1024;

describe('getGridUnitBase2', () => {
  it.each([
    [0, 0.01, Math.pow(2, -9)],
    [0, 2, Math.pow(2, -1)],
    [0, 100, Math.pow(2, 4)],
    [0, 1_000_000, Math.pow(2, 17)],
    [10 * MiB, 12.5 * MiB, Math.pow(2, 19)],
    [-500, -100, Math.pow(2, 6)],
    [-500, 100, Math.pow(2, 7)],
  ])('%s .. %s -> %s', (min, max, expected) => {
    expect(getGridUnitBase2(min, max)).toBeCloseTo(expected, 10);
  });

  it('rejects empty and negative ranges', () => {
    expect(() => getGridUnitBase2(0, 0)).toThrow(RangeError);
    expect(() => getGridUnitBase2(100, 0.01)).toThrow(RangeError);
  });
});

describe('getGridUnitBase10', () => {
  it.each([
    [0, 0.01, 0.001],
    [0, 2, 1],
    [0, 100, 10],
    [0, 1_000_000, 100_000],
    [10 * MiB, 12.5 * MiB, 1_000_000],
    [-500, -100, 100],
    [-500, 100, 100],
  ])('%s .. %s -> %s', (min, max, expected) => {
    expect(getGridUnitBase10(min, max)).toBeCloseTo(expected, 10);
  });

  it('rejects empty and negative ranges', () => {
    expect(() => getGridUnitBase10(0, 0)).toThrow(RangeError);
    expect(() => getGridUnitBase10(100, 0.01)).toThrow(RangeError);
  });
});

describe('getTimeGridUnit', () => {
  it.each([
    [0, 10, 1],
    [0, 100, 15],
    [0, 1_000_000, 172800],
    [-1000, 1_000_000, 172800],
    [0, 0, 1],
    [1, 0, 1],
  ])('%s .. %s -> %s', (min, max, expected) => {
    expect(getTimeGridUnit(min, max)).toBe(expected);
  });
});

describe('computeMinMax', () => {
  it('snaps the data range to the grid', () => {
    expect(computeMinMax([[1, 2, 3]], false, false)).toEqual({ min: 1, max: 3, interval: 1 });
  });

  it('includes zero when asked to', () => {
    expect(computeMinMax([[1, 2, 3]], true, false)).toEqual({ min: 0, max: 3, interval: 1 });
  });

  it('uses 0..1 without finite data', () => {
    expect(computeMinMax([], false, false)).toEqual({ min: 0, max: 1, interval: 0.1 });
    expect(computeMinMax([[NaN, Infinity]], false, false)).toEqual({ min: 0, max: 1, interval: 0.1 });
  });

  it('rounds the maximum up to the next binary grid line', () => {
    expect(computeMinMax([[0, 100]], false, true)).toEqual({ min: 0, max: 112, interval: 16 });
  });

  it('looks at all series', () => {
    expect(computeMinMax([[2], [8]], false, false)).toEqual({ min: 2, max: 8, interval: 1 });
  });
});

describe('computeTimeRange', () => {
  it('rounds the first grid line up to the interval', () => {
    expect(computeTimeRange([65, 100, 130])).toEqual({ min: 65, max: 130, interval: 10, start: 70 });
  });

  it('handles empty data', () => {
    expect(computeTimeRange([])).toEqual({ min: 0, max: 0, interval: 1, start: 0 });
  });
});

describe('reduceFloatPrecision', () => {
  it('keeps three decimals for large values', () => {
    expect(reduceFloatPrecision(1234.5678)).toBeCloseTo(1234.568, 9);
    expect(reduceFloatPrecision(123456)).toBe(123456);
  });

  it('keeps significant digits for small values', () => {
    expect(reduceFloatPrecision(0.0123456)).toBeCloseTo(0.01235, 12);
    expect(reduceFloatPrecision(5)).toBe(5);
    expect(reduceFloatPrecision(-2.5)).toBe(-2.5);
    expect(reduceFloatPrecision(0)).toBe(0);
  });
});
