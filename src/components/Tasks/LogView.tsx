import { For, Show, createEffect, createMemo, createSignal, on, onCleanup } from 'solid-js';
import { LIMITS, POLLING_INTERVALS } from '@/constants';
import { TasksAPI } from '@/api/tasks';
import type { TaskLogLine } from '@/types/tasks';
import { errorMessage } from '@/utils/errorHandler';
import { logger } from '@/utils/logger';

export interface LogViewProps {
  url: string;
  /** Follow the end of the log while set. */
  active?: boolean;
  service?: string;
  since?: number;
  until?: number;
  class?: string;
}

type PageMap = Record<number, TaskLogLine[]>;

export const lastLogPage = (total: number) => Math.max(0, Math.ceil(total / LIMITS.LOG_PAGE_SIZE) - 1);

/**
 * Paged log output. The first and the last page are loaded up front; the
 * pages between are loaded on request. While active the last page is
 * re-read every second and the view sticks to the bottom.
 */
export function LogView(props: LogViewProps) {
  const [pages, setPages] = createSignal<PageMap>({});
  const [total, setTotal] = createSignal(0);
  const [error, setError] = createSignal<string | null>(null);
  let scroller: HTMLDivElement | undefined;
  let stickToBottom = true;
  let generation = 0;

  const options = () => ({ service: props.service, since: props.since, until: props.until });

  const loadPage = async (page: number, current: number) => {
    try {
      const result = await TasksAPI.logPage(props.url, page, options());
      if (current !== generation) return;
      setPages((prev) => ({ ...prev, [result.page]: result.lines }));
      setTotal(Math.min(result.total, LIMITS.LOG_MAX_LINES));
      setError(null);
    } catch (err) {
      if (current !== generation) return;
      logger.debug('log page load failed', err);
      setError(errorMessage(err));
    }
  };

  const loadTail = async (current: number) => {
    const last = lastLogPage(total());
    await loadPage(last, current);
    // the last page filled up since the previous read
    if (current === generation && lastLogPage(total()) > last) await loadPage(lastLogPage(total()), current);
  };

  createEffect(
    on(
      () => [props.url, props.service, props.since, props.until],
      () => {
        const current = ++generation;
        setPages({});
        setTotal(0);
        stickToBottom = true;
        void (async () => {
          await loadPage(0, current);
          if (current === generation && lastLogPage(total()) > 0) await loadTail(current);
        })();
      },
    ),
  );

  createEffect(() => {
    if (!props.active) return;
    const timer = setInterval(() => void loadTail(generation), POLLING_INTERVALS.LOG_TAIL);
    onCleanup(() => clearInterval(timer));
  });

  const pageNumbers = createMemo(() =>
    Object.keys(pages())
      .map(Number)
      .sort((a, b) => a - b),
  );

  createEffect(() => {
    pages();
    if (scroller && stickToBottom && props.active) {
      queueMicrotask(() => {
        if (scroller) scroller.scrollTop = scroller.scrollHeight;
      });
    }
  });

  const onScroll = () => {
    if (!scroller) return;
    stickToBottom = scroller.scrollTop + scroller.clientHeight >= scroller.scrollHeight - 4;
  };

  return (
    <div
      ref={(el) => {
        scroller = el;
      }}
      class={`overflow-auto bg-gray-50 p-2 font-mono text-xs text-gray-900 dark:bg-gray-950 dark:text-gray-100 ${props.class ?? ''}`.trim()}
      onScroll={onScroll}
      data-testid="log-view"
    >
      <Show when={error()}>
        {(message) => <div role="alert" class="mb-2 text-red-600">{message()}</div>}
      </Show>
      <For each={pageNumbers()}>
        {(page, index) => (
          <>
            <Show when={index() > 0 && pageNumbers()[index() - 1] !== page - 1}>
              <button
                type="button"
                class="my-1 w-full rounded border border-dashed border-gray-300 py-1 text-gray-500 hover:bg-gray-100 dark:border-gray-700"
                onClick={() => void loadPage(page - 1, generation)}
              >
                {`Load lines ${(page - 1) * LIMITS.LOG_PAGE_SIZE + 1} - ${page * LIMITS.LOG_PAGE_SIZE}`}
              </button>
            </Show>
            <pre class="whitespace-pre-wrap break-all">
              <For each={pages()[page]}>{(line) => <div>{line.t}</div>}</For>
            </pre>
          </>
        )}
      </For>
    </div>
  );
}

export default LogView;
