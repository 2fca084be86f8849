import { LIMITS } from '@/constants';
import type { QueryParams } from '@/types/api';

export type JournalRequest = 'initial' | 'top' | 'bottom';
export type JournalScrollPosition = 'top' | 'middle' | 'bottom';

export interface JournalState {
  lines: string[];
  /** Cursor of the first loaded entry. */
  start?: string;
  /** Cursor of the last loaded entry. */
  end?: string;
}

export const emptyJournal = (): JournalState => ({ lines: [] });

/** Query parameters for the next page in the given direction. */
export function journalRequestParams(request: JournalRequest, state: JournalState): QueryParams {
  if (request === 'bottom' && state.end !== undefined) return { startcursor: state.end };
  if (request === 'top' && state.start !== undefined) {
    return { endcursor: state.start, lastentries: LIMITS.JOURNAL_PAGE_SIZE };
  }
  return { lastentries: LIMITS.JOURNAL_PAGE_SIZE };
}

/**
 * Merge a journal response into the loaded lines. The first and the last
 * line of every response carry the start and end cursor.
 */
export function mergeJournalPage(state: JournalState, response: readonly string[], request: JournalRequest): JournalState {
  if (response.length < 2) throw new Error('invalid response');
  const start = response[0];
  const end = response[response.length - 1];
  const lines = response.slice(1, -1);

  switch (request) {
    case 'initial':
      return { lines, start, end };
    case 'bottom':
      return { lines: [...state.lines, ...lines], start: state.start ?? start, end };
    case 'top':
      return { lines: [...lines, ...state.lines], start, end: state.end ?? end };
  }
}

export function journalScrollPosition(scrollTop: number, clientHeight: number, scrollHeight: number): JournalScrollPosition {
  if (scrollHeight - (scrollTop + clientHeight) <= LIMITS.JOURNAL_LOAD_ZONE) return 'bottom';
  if (scrollTop < LIMITS.JOURNAL_LOAD_ZONE) return 'top';
  return 'middle';
}
