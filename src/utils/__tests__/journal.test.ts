import { describe, expect, it } from 'vitest';
import { emptyJournal, journalRequestParams, journalScrollPosition, mergeJournalPage } from '../journal';

describe('journalRequestParams', () => {
  it('asks for the last entries first', () => {
    expect(journalRequestParams('initial', emptyJournal())).toEqual({ lastentries: 500 });
  });

  it('continues after the end cursor', () => {
    expect(journalRequestParams('bottom', { lines: [], start: 's=1', end: 's=9' })).toEqual({ startcursor: 's=9' });
  });

  it('reads backwards from the start cursor', () => {
    expect(journalRequestParams('top', { lines: [], start: 's=1', end: 's=9' })).toEqual({
      endcursor: 's=1',
      lastentries: 500,
    });
  });

  it('falls back to the last entries without cursors', () => {
    expect(journalRequestParams('top', emptyJournal())).toEqual({ lastentries: 500 });
  });
});

describe('mergeJournalPage', () => {
  const loaded = { lines: ['b', 'c'], start: 's=2', end: 's=3' };

  it('replaces everything on the initial load', () => {
    expect(mergeJournalPage(loaded, ['s=5', 'x', 'y', 's=6'], 'initial')).toEqual({
      lines: ['x', 'y'],
      start: 's=5',
      end: 's=6',
    });
  });

  it('appends newer lines and moves the end cursor', () => {
    expect(mergeJournalPage(loaded, ['s=3', 'd', 's=4'], 'bottom')).toEqual({
      lines: ['b', 'c', 'd'],
      start: 's=2',
      end: 's=4',
    });
  });

  it('prepends older lines and moves the start cursor', () => {
    expect(mergeJournalPage(loaded, ['s=1', 'a', 's=2'], 'top')).toEqual({
      lines: ['a', 'b', 'c'],
      start: 's=1',
      end: 's=3',
    });
  });

  it('keeps the lines when nothing new arrived', () => {
    expect(mergeJournalPage(loaded, ['s=3', 's=3'], 'bottom').lines).toEqual(['b', 'c']);
  });

  it('rejects responses without cursors', () => {
    expect(() => mergeJournalPage(loaded, ['s=3'], 'bottom')).toThrow('invalid response');
  });
});

describe('journalScrollPosition', () => {
  it('is at the bottom within the load zone', () => {
    expect(journalScrollPosition(940, 400, 1380)).toBe('bottom');
    expect(journalScrollPosition(0, 400, 300)).toBe('bottom');
  });

  it('is at the top near the first line', () => {
    expect(journalScrollPosition(49, 400, 2000)).toBe('top');
  });

  it('is in the middle otherwise', () => {
    expect(journalScrollPosition(50, 400, 2000)).toBe('middle');
  });
});
