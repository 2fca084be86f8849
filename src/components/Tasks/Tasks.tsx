import { Show, createEffect, createMemo, createSignal, on } from 'solid-js';
import { createStore, unwrap } from 'solid-js/store';
import FilterIcon from 'lucide-solid/icons/filter';
import FilterXIcon from 'lucide-solid/icons/filter-x';
import EyeIcon from 'lucide-solid/icons/eye';
import Loader2Icon from 'lucide-solid/icons/loader-2';
import { Button, RefreshButton } from '@/components/shared/Button';
import { DataTable } from '@/components/shared/DataTable';
import type { DataTableColumn } from '@/components/shared/DataTable';
import { Toolbar, ToolbarSpacer } from '@/components/shared/Toolbar';
import { formControl, formLabel } from '@/components/shared/Form';
import { TasksAPI, nodeTasksUrl } from '@/api/tasks';
import { DEBOUNCE, LIMITS, STORAGE_KEYS } from '@/constants';
import { useDebouncedValue } from '@/hooks/useDebouncedValue';
import { usePersistentSignal } from '@/hooks/usePersistentSignal';
import type { TaskListItem } from '@/types/tasks';
import { errorMessage } from '@/utils/errorHandler';
import { renderEpochShort } from '@/utils/format';
import { logger } from '@/utils/logger';
import { formatUpid } from '@/utils/taskDescriptions';
import { TaskStatusSelector } from './TaskStatusSelector';
import { TaskTypeSelector } from './TaskTypeSelector';
import { TaskViewer } from './TaskViewer';
import { EMPTY_TASK_FILTER, activeTaskFilterCount, taskFilterParams } from './taskRows';
import type { TaskFilterValues } from './taskRows';

export interface TasksProps {
  /** Defaults to the tasks of `node`. */
  baseUrl?: string;
  node?: string;
  columns?: DataTableColumn<TaskListItem>[];
  /** Handle opening a task; the built-in viewer is used when not set. */
  onShowTask?: (upid: string, endtime: number | null) => void;
}

const spinner = () => (
  <span class="flex justify-center">
    <Loader2Icon class="h-4 w-4 animate-spin text-gray-500" aria-label="running" />
  </span>
);

export const DEFAULT_TASK_COLUMNS: DataTableColumn<TaskListItem>[] = [
  { id: 'starttime', header: 'Start Time', width: '130px', render: (task) => renderEpochShort(task.starttime) },
  {
    id: 'endtime',
    header: 'End Time',
    width: '130px',
    render: (task) => (task.endtime ? renderEpochShort(task.endtime) : spinner()),
  },
  { id: 'user', header: 'User name', width: '150px', render: (task) => task.user },
  { id: 'description', header: 'Description', flex: true, render: (task) => formatUpid(task.upid) },
  {
    id: 'status',
    header: 'Status',
    width: '200px',
    render: (task) => (!task.status || task.status === 'RUNNING' ? spinner() : task.status),
  },
];

/**
 * Task history with a filter toolbar. Tasks are loaded in batches of 500;
 * the next batch is requested when the list is scrolled near its end.
 */
export function Tasks(props: TasksProps) {
  const baseUrl = () => props.baseUrl ?? nodeTasksUrl(props.node);
  const [showFilter, setShowFilter] = usePersistentSignal(STORAGE_KEYS.TASKS_SHOW_FILTER, false, {
    deserialize: (value) => value === 'true',
  });
  const [filter, setFilter] = createStore<TaskFilterValues>({ ...EMPTY_TASK_FILTER, statusfilter: [] });
  const [rows, setRows] = createSignal<TaskListItem[]>([]);
  const [loading, setLoading] = createSignal(false);
  const [error, setError] = createSignal<string | null>(null);
  const [selected, setSelected] = createSignal<string | null>(null);
  const [viewing, setViewing] = createSignal<TaskListItem | null>(null);
  let generation = 0;
  let exhausted = false;
  let requestedStart = -1;

  const filterKey = createMemo(() =>
    JSON.stringify({ ...filter, statusfilter: [...filter.statusfilter] }),
  );
  const debouncedFilter = useDebouncedValue(filterKey, DEBOUNCE.TASK_FILTER);

  const loadBatch = async (start: number) => {
    const current = start === 0 ? ++generation : generation;
    requestedStart = start;
    setLoading(true);
    try {
      const data = await TasksAPI.list(baseUrl(), taskFilterParams(unwrap(filter)), start, LIMITS.TASK_PAGE_SIZE);
      if (current !== generation) return;
      exhausted = data.length < LIMITS.TASK_PAGE_SIZE;
      setRows((prev) => (start === 0 ? data : [...prev, ...data]));
      setError(null);
    } catch (err) {
      if (current !== generation) return;
      logger.debug('task list load failed', err);
      setError(errorMessage(err));
    } finally {
      if (current === generation) setLoading(false);
    }
  };

  createEffect(on(debouncedFilter, () => void loadBatch(0)));

  const loadMore = () => {
    const length = rows().length;
    if (exhausted || loading() || length === 0 || requestedStart >= length) return;
    void loadBatch(length);
  };

  const selectedTask = () => rows().find((task) => task.upid === selected());

  const showTask = (task: TaskListItem | undefined) => {
    if (!task) return;
    if (props.onShowTask) props.onShowTask(task.upid, task.endtime ?? null);
    else setViewing(task);
  };

  const clearFilter = () => setFilter({ ...EMPTY_TASK_FILTER, statusfilter: [] });

  return (
    <div class="flex h-full flex-col">
      <Toolbar>
        <Button size="sm" icon={<EyeIcon class="h-4 w-4" />} disabled={!selectedTask()} onClick={() => showTask(selectedTask())}>
          View
        </Button>
        <ToolbarSpacer />
        <Button
          size="sm"
          icon={<FilterXIcon class="h-4 w-4" />}
          disabled={activeTaskFilterCount(filter) === 0}
          onClick={clearFilter}
        >
          {`Clear Filter (${activeTaskFilterCount(filter)})`}
        </Button>
        <Button
          size="sm"
          icon={<FilterIcon class="h-4 w-4" />}
          aria-pressed={showFilter()}
          onClick={() => setShowFilter(!showFilter())}
        >
          Filter
        </Button>
        <RefreshButton loading={loading()} onClick={() => void loadBatch(0)} />
      </Toolbar>
      <Show when={showFilter()}>
        <div class="grid grid-cols-[auto_1fr_auto_1fr] items-center gap-2 border-b border-gray-200 p-2 dark:border-gray-700">
          <label class={formLabel} for="tasks-since">Since</label>
          <input
            id="tasks-since"
            type="date"
            class={formControl}
            value={filter.since}
            onInput={(event) => setFilter('since', event.currentTarget.value)}
          />
          <label class={`${formLabel} text-right`} for="tasks-type">Task Type</label>
          <TaskTypeSelector id="tasks-type" value={filter.typefilter} onChange={(value) => setFilter('typefilter', value)} />
          <label class={formLabel} for="tasks-until">Until:</label>
          <input
            id="tasks-until"
            type="date"
            class={formControl}
            value={filter.until}
            onInput={(event) => setFilter('until', event.currentTarget.value)}
          />
          <label class={`${formLabel} text-right`} for="tasks-user">User name</label>
          <input
            id="tasks-user"
            class={formControl}
            value={filter.userfilter}
            onInput={(event) => setFilter('userfilter', event.currentTarget.value)}
          />
          <span class={formLabel}>Status</span>
          <div class="col-span-3">
            <TaskStatusSelector value={filter.statusfilter} onChange={(value) => setFilter('statusfilter', value)} />
          </div>
        </div>
      </Show>
      <Show when={error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <DataTable
        class="min-h-0 flex-1"
        ariaLabel="Tasks"
        columns={props.columns ?? DEFAULT_TASK_COLUMNS}
        rows={rows()}
        getKey={(task) => task.upid}
        selectedKey={selected()}
        onSelect={(key) => setSelected(key)}
        onRowDblClick={showTask}
        onScrollEnd={loadMore}
        scrollEndMargin={LIMITS.TASK_PREFETCH_MARGIN}
        loading={loading()}
        emptyText="No tasks"
      />
      <Show when={viewing()}>
        {(task) => <TaskViewer upid={task().upid} endtime={task().endtime} baseUrl={baseUrl()} onClose={() => setViewing(null)} />}
      </Show>
    </div>
  );
}

export default Tasks;
