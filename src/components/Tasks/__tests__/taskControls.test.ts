import { describe, expect, it } from 'vitest';
import { lastLogPage } from '../LogView';
import { toggleStatusFilter } from '../TaskStatusSelector';

describe('lastLogPage', () => {
  it('counts pages of 500 lines from zero', () => {
    expect(lastLogPage(0)).toBe(0);
    expect(lastLogPage(500)).toBe(0);
    expect(lastLogPage(501)).toBe(1);
    expect(lastLogPage(1500)).toBe(2);
  });
});

describe('toggleStatusFilter', () => {
  it('adds and removes values in display order', () => {
    expect(toggleStatusFilter(['warning'], 'ok')).toEqual(['ok', 'warning']);
    expect(toggleStatusFilter(['ok', 'warning'], 'ok')).toEqual(['warning']);
    expect(toggleStatusFilter([], 'unknown')).toEqual(['unknown']);
  });
});
