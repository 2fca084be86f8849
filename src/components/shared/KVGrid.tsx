import { For, Show } from 'solid-js';
import type { JSX } from 'solid-js';
import { isHttpUrl } from '@/utils/format';

export type KVRecord = Record<string, unknown>;

export interface KVRow {
  name: string;
  header: string;
  render?: (value: unknown, record: KVRecord) => JSX.Element;
  /** Shown when the value is missing. */
  placeholder?: string;
  /** Show the row even when the value is missing. */
  required?: boolean;
}

export function renderKVValue(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'boolean') return value ? 'Yes' : 'No';
  if (typeof value === 'string' || typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

/** http(s) URLs as links opening a new tab, anything else as text. */
export function renderUrl(value: unknown): JSX.Element {
  const text = renderKVValue(value);
  return isHttpUrl(text) ? (
    <a href={text} target="_blank" rel="noreferrer" class="text-blue-600 hover:underline">
      {text}
    </a>
  ) : (
    text
  );
}

export const visibleKVRows = (rows: readonly KVRow[], data: KVRecord) =>
  rows.filter((row) => row.required || (data[row.name] !== undefined && data[row.name] !== null));

export interface KVGridProps {
  rows: readonly KVRow[];
  data: KVRecord;
  selected?: string | null;
  onSelect?: (name: string) => void;
  onRowDblClick?: (name: string) => void;
  class?: string;
}

/** Two column table of record values. */
export function KVGrid(props: KVGridProps) {
  return (
    <table class={`w-full border-collapse text-sm ${props.class ?? ''}`.trim()}>
      <tbody class="divide-y divide-gray-100 dark:divide-gray-800">
        <For each={visibleKVRows(props.rows, props.data)}>
          {(row) => {
            const value = () => props.data[row.name];
            return (
              <tr
                data-name={row.name}
                aria-selected={props.selected === row.name ? 'true' : 'false'}
                class={props.selected === row.name ? 'bg-blue-100 dark:bg-blue-900/40' : 'hover:bg-gray-50 dark:hover:bg-gray-800/60'}
                onClick={() => props.onSelect?.(row.name)}
                onDblClick={() => props.onRowDblClick?.(row.name)}
              >
                <th scope="row" class="w-1/3 px-3 py-1.5 text-left font-medium text-gray-600 dark:text-gray-400">
                  {row.header}
                </th>
                <td class="px-3 py-1.5 text-gray-900 dark:text-gray-100 break-all">
                  <Show
                    when={value() !== undefined && value() !== null}
                    fallback={<span class="text-gray-400">{row.placeholder ?? ''}</span>}
                  >
                    {row.render ? row.render(value(), props.data) : renderKVValue(value())}
                  </Show>
                </td>
              </tr>
            );
          }}
        </For>
      </tbody>
    </table>
  );
}

export default KVGrid;
