import { Show } from 'solid-js';
import ExternalLinkIcon from 'lucide-solid/icons/external-link';
import { DataTable } from '@/components/shared/DataTable';
import type { DataTableColumn } from '@/components/shared/DataTable';
import { Button } from '@/components/shared/Button';
import type { TaskListItem } from '@/types/tasks';
import { formatDurationHuman, renderEpochShort } from '@/utils/format';
import { formatUpid } from '@/utils/taskDescriptions';
import { runningTaskRows } from './taskRows';

export interface RunningTasksProps {
  tasks: readonly TaskListItem[] | undefined;
  loading?: boolean;
  error?: string | null;
  onShowTask?: (upid: string, endtime: number | null) => void;
  /** Footer button; hidden when not set. */
  onShowAll?: () => void;
  class?: string;
}

/** The oldest running tasks in a compact table. */
export function RunningTasks(props: RunningTasksProps) {
  const rows = () => runningTaskRows(props.tasks ?? []);

  const columns: DataTableColumn<TaskListItem>[] = [
    { id: 'task', header: 'Task', flex: true, render: (task) => formatUpid(task.upid) },
    { id: 'starttime', header: 'Start Time', width: '130px', render: (task) => renderEpochShort(task.starttime) },
    {
      id: 'duration',
      header: 'Duration',
      width: '100px',
      render: (task) => formatDurationHuman((task.endtime ?? task.starttime) - task.starttime),
    },
    {
      id: 'action',
      header: 'Action',
      width: '60px',
      align: 'center',
      render: (task) => (
        <button
          type="button"
          title="Open Task"
          aria-label="Open Task"
          class="rounded p-1 text-gray-600 hover:bg-gray-100 dark:text-gray-300 dark:hover:bg-gray-800"
          onClick={() => props.onShowTask?.(task.upid, null)}
        >
          <ExternalLinkIcon class="h-4 w-4" />
        </button>
      ),
    },
  ];

  return (
    <section class={`flex min-w-[600px] flex-col rounded-md border border-gray-200 bg-white dark:border-gray-700 dark:bg-gray-900 ${props.class ?? ''}`.trim()}>
      <h3 class="border-b border-gray-200 px-3 py-2 text-sm font-semibold dark:border-gray-700">Running Tasks</h3>
      <Show when={props.error}>
        {(message) => <div role="alert" class="p-2 text-sm text-red-600">{message()}</div>}
      </Show>
      <Show when={rows().length > 0} fallback={<p class="p-2 text-sm text-gray-600">{props.loading && !props.tasks ? 'Loading...' : 'No running tasks'}</p>}>
        <DataTable columns={columns} rows={rows()} getKey={(task) => task.upid} onRowDblClick={(task) => props.onShowTask?.(task.upid, null)} />
      </Show>
      <Show when={props.onShowAll}>
        {(showAll) => (
          <div class="flex justify-end border-t border-gray-200 p-2 dark:border-gray-700">
            <Button size="sm" variant="primary" onClick={() => showAll()()}>
              Show All Tasks
            </Button>
          </div>
        )}
      </Show>
    </section>
  );
}

export default RunningTasks;
