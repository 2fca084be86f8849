import { For, Show, createSignal, onCleanup, onMount } from 'solid-js';
import { POLLING_INTERVALS } from '@/constants';
import { NodeAPI } from '@/api/node';
import { errorMessage } from '@/utils/errorHandler';
import {
  emptyJournal,
  journalRequestParams,
  journalScrollPosition,
  mergeJournalPage,
  type JournalRequest,
  type JournalScrollPosition,
} from '@/utils/journal';
import { logger } from '@/utils/logger';

export interface JournalViewProps {
  url?: string;
  class?: string;
  /** Called around every request; `tail` is set while the view follows new entries. */
  onLoadingChange?: (loading: boolean, tail: boolean) => void;
}

/**
 * Cursor based journal. Scrolling to the top reads older entries; while the
 * view sits at the bottom new entries are fetched every second.
 */
export function JournalView(props: JournalViewProps) {
  const [journal, setJournal] = createSignal(emptyJournal());
  const [error, setError] = createSignal<string | null>(null);
  let scroller: HTMLDivElement | undefined;
  let position: JournalScrollPosition = 'bottom';
  let timer: ReturnType<typeof setTimeout> | undefined;
  let busy = false;
  let disposed = false;

  const cancelTail = () => {
    clearTimeout(timer);
    timer = undefined;
  };

  const scheduleTail = () => {
    cancelTail();
    timer = setTimeout(() => {
      timer = undefined;
      void load('bottom');
    }, POLLING_INTERVALS.JOURNAL_TAIL);
  };

  const restoreScroll = (request: JournalRequest, oldHeight: number) => {
    if (!scroller) return;
    if (request === 'top') scroller.scrollTop = scroller.scrollHeight - oldHeight;
    else if (position === 'bottom') scroller.scrollTop = scroller.scrollHeight;
  };

  async function load(request: JournalRequest) {
    if (busy) return;
    busy = true;
    props.onLoadingChange?.(true, position === 'bottom');
    const oldHeight = scroller?.scrollHeight ?? 0;

    try {
      const response = await NodeAPI.journal(journalRequestParams(request, journal()), props.url);
      if (disposed) return;
      setJournal(mergeJournalPage(journal(), response, request));
      setError(null);
      restoreScroll(request, oldHeight);
    } catch (err) {
      if (disposed) return;
      logger.debug('journal load failed', err);
      setError(errorMessage(err));
    } finally {
      busy = false;
      if (!disposed) {
        props.onLoadingChange?.(false, position === 'bottom');
        if (position === 'bottom') scheduleTail();
      }
    }
  }

  const onScroll = () => {
    if (!scroller) return;
    const next = journalScrollPosition(scroller.scrollTop, scroller.clientHeight, scroller.scrollHeight);
    if (next === position) return;
    position = next;

    if (next === 'middle') {
      cancelTail();
    } else if (next === 'top') {
      cancelTail();
      void load('top');
    } else {
      void load('bottom');
    }
  };

  onMount(() => void load('initial'));

  onCleanup(() => {
    disposed = true;
    cancelTail();
  });

  return (
    <div
      ref={(el) => {
        scroller = el;
      }}
      class={`overflow-auto bg-gray-50 p-2 font-mono text-xs text-gray-900 dark:bg-gray-950 dark:text-gray-100 ${props.class ?? ''}`.trim()}
      onScroll={onScroll}
      data-testid="journal-view"
    >
      <Show when={error()}>
        {(message) => <div role="alert" class="mb-2 text-red-600">{message()}</div>}
      </Show>
      <pre class="whitespace-pre-wrap break-all">
        <For each={journal().lines}>{(line) => <div>{line}</div>}</For>
      </pre>
    </div>
  );
}

export default JournalView;
