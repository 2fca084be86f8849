import { For } from 'solid-js';
import type { TaskStatusFilter } from '@/types/tasks';

const ENTRIES: ReadonlyArray<{ value: TaskStatusFilter; label: string }> = [
  { value: 'ok', label: 'Ok' },
  { value: 'error', label: 'Errors' },
  { value: 'warning', label: 'Warnings' },
  { value: 'unknown', label: 'Unknown' },
];

/** Toggle `value` in the filter list; the result keeps the canonical order. */
export function toggleStatusFilter(list: readonly TaskStatusFilter[], value: TaskStatusFilter): TaskStatusFilter[] {
  const next = new Set(list);
  if (next.has(value)) next.delete(value);
  else next.add(value);
  return ENTRIES.map((entry) => entry.value).filter((entry) => next.has(entry));
}

const buttonClass = (pressed: boolean) =>
  `px-2.5 py-1 text-xs font-medium border-r last:border-r-0 border-gray-300 dark:border-gray-600 ${
    pressed ? 'bg-blue-100 text-blue-800 dark:bg-blue-900/40 dark:text-blue-200' : 'bg-white text-gray-700 hover:bg-gray-50 dark:bg-gray-800 dark:text-gray-200'
  }`;

/** Segmented All/Ok/Errors/Warnings/Unknown status filter. */
export function TaskStatusSelector(props: { value: TaskStatusFilter[]; onChange: (value: TaskStatusFilter[]) => void }) {
  return (
    <div role="group" aria-label="Status" class="inline-flex overflow-hidden rounded-md border border-gray-300 dark:border-gray-600">
      <button type="button" aria-pressed={props.value.length === 0} class={buttonClass(props.value.length === 0)} onClick={() => props.onChange([])}>
        All
      </button>
      <For each={ENTRIES}>
        {(entry) => (
          <button
            type="button"
            aria-pressed={props.value.includes(entry.value)}
            class={buttonClass(props.value.includes(entry.value))}
            onClick={() => props.onChange(toggleStatusFilter(props.value, entry.value))}
          >
            {entry.label}
          </button>
        )}
      </For>
    </div>
  );
}

export default TaskStatusSelector;
