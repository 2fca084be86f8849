import { For, Show, createMemo, createSignal } from 'solid-js';
import type { JSX } from 'solid-js';
import ChevronUpIcon from 'lucide-solid/icons/chevron-up';
import ChevronDownIcon from 'lucide-solid/icons/chevron-down';

export interface DataTableColumn<T> {
  id: string;
  header: string;
  render: (row: T) => JSX.Element;
  sorter?: (a: T, b: T) => number;
  width?: string;
  align?: 'left' | 'center' | 'right';
  /** Take the remaining width. */
  flex?: boolean;
}

export interface DataTableProps<T> {
  columns: readonly DataTableColumn<T>[];
  rows: readonly T[];
  getKey: (row: T) => string;
  selectedKey?: string | null;
  onSelect?: (key: string | null, row: T | undefined) => void;
  onRowDblClick?: (row: T) => void;
  /** Called when the view is scrolled to within `scrollEndMargin` px of its end. */
  onScrollEnd?: () => void;
  scrollEndMargin?: number;
  rowClass?: (row: T) => string;
  emptyText?: string;
  loading?: boolean;
  class?: string;
  ariaLabel?: string;
}

interface SortState {
  column: string;
  ascending: boolean;
}

const alignClass = { left: 'text-left', center: 'text-center', right: 'text-right' } as const;

/** Table with single row selection and sortable columns. */
export function DataTable<T>(props: DataTableProps<T>) {
  const [sort, setSort] = createSignal<SortState | null>(null);

  const sortedRows = createMemo(() => {
    const state = sort();
    const column = state ? props.columns.find((col) => col.id === state.column) : undefined;
    if (!state || !column?.sorter) return props.rows;
    const sorter = column.sorter;
    const list = [...props.rows].sort(sorter);
    return state.ascending ? list : list.reverse();
  });

  const toggleSort = (column: DataTableColumn<T>) => {
    if (!column.sorter) return;
    const current = sort();
    setSort(
      current?.column === column.id ? { column: column.id, ascending: !current.ascending } : { column: column.id, ascending: true },
    );
  };

  const select = (row: T) => {
    const key = props.getKey(row);
    props.onSelect?.(key === props.selectedKey ? null : key, key === props.selectedKey ? undefined : row);
  };

  const moveSelection = (event: KeyboardEvent) => {
    if (event.key !== 'ArrowDown' && event.key !== 'ArrowUp') return;
    const rows = sortedRows();
    if (rows.length === 0) return;
    event.preventDefault();
    const current = rows.findIndex((row) => props.getKey(row) === props.selectedKey);
    const next =
      event.key === 'ArrowDown' ? Math.min(rows.length - 1, current + 1) : Math.max(0, current < 0 ? 0 : current - 1);
    props.onSelect?.(props.getKey(rows[next]), rows[next]);
  };

  const onScroll = (event: Event & { currentTarget: HTMLDivElement }) => {
    if (!props.onScrollEnd) return;
    const el = event.currentTarget;
    if (el.scrollTop + el.clientHeight >= el.scrollHeight - (props.scrollEndMargin ?? 0)) props.onScrollEnd();
  };

  return (
    <div class={`relative w-full overflow-auto ${props.class ?? ''}`.trim()} onScroll={onScroll}>
      <table class="w-full border-collapse text-left text-sm" aria-label={props.ariaLabel} tabindex="0" onKeyDown={moveSelection}>
        <thead class="sticky top-0 z-10 border-b border-gray-200 bg-gray-50 text-xs text-gray-600 dark:border-gray-700 dark:bg-gray-800 dark:text-gray-300">
          <tr>
            <For each={props.columns}>
              {(column) => (
                <th
                  scope="col"
                  class={`px-3 py-2 font-semibold whitespace-nowrap ${alignClass[column.align ?? 'left']} ${
                    column.sorter ? 'cursor-pointer select-none' : ''
                  } ${column.flex ? 'w-full' : ''}`}
                  style={column.width ? { width: column.width } : undefined}
                  aria-sort={
                    sort()?.column === column.id ? (sort()?.ascending ? 'ascending' : 'descending') : undefined
                  }
                  onClick={() => toggleSort(column)}
                >
                  <span class="inline-flex items-center gap-1">
                    {column.header}
                    <Show when={sort()?.column === column.id}>
                      <Show when={sort()?.ascending} fallback={<ChevronDownIcon class="h-3 w-3" />}>
                        <ChevronUpIcon class="h-3 w-3" />
                      </Show>
                    </Show>
                  </span>
                </th>
              )}
            </For>
          </tr>
        </thead>
        <tbody class="divide-y divide-gray-100 dark:divide-gray-800">
          <For
            each={sortedRows()}
            fallback={
              <tr>
                <td colSpan={props.columns.length} class="px-3 py-6 text-center text-gray-500">
                  {props.loading ? 'Loading...' : (props.emptyText ?? 'No data')}
                </td>
              </tr>
            }
          >
            {(row) => {
              const key = () => props.getKey(row);
              return (
                <tr
                  data-key={key()}
                  aria-selected={key() === props.selectedKey ? 'true' : 'false'}
                  class={`cursor-default ${
                    key() === props.selectedKey
                      ? 'bg-blue-100 dark:bg-blue-900/40'
                      : 'hover:bg-gray-50 dark:hover:bg-gray-800/60'
                  } ${props.rowClass?.(row) ?? ''}`}
                  onClick={() => select(row)}
                  onDblClick={() => props.onRowDblClick?.(row)}
                >
                  <For each={props.columns}>
                    {(column) => (
                      <td class={`px-3 py-1.5 align-middle ${alignClass[column.align ?? 'left']} ${column.flex ? '' : 'whitespace-nowrap'}`}>
                        {column.render(row)}
                      </td>
                    )}
                  </For>
                </tr>
              );
            }}
          </For>
        </tbody>
      </table>
    </div>
  );
}

export default DataTable;
