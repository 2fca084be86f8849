import { LIMITS } from '@/constants';
import type { KVRow } from '@/components/shared/KVGrid';
import type { TaskListFilter, TaskListItem, TaskStatusFilter } from '@/types/tasks';
import { dateInputToEpoch, renderEpoch } from '@/utils/format';

/** The oldest running tasks, at most ten, with `endtime` set to `now`. */
export function runningTaskRows(tasks: readonly TaskListItem[], now = Math.floor(Date.now() / 1000)): TaskListItem[] {
  return [...tasks]
    .sort((a, b) => a.starttime - b.starttime)
    .slice(0, LIMITS.RUNNING_TASKS_SHOWN)
    .map((task) => (task.endtime ? task : { ...task, endtime: now }));
}

/** Text of the `Status` row of the task viewer. */
export function taskStatusText(status: unknown, exitstatus: unknown): string {
  if (typeof status !== 'string') return 'unknown';
  if (status !== 'stopped') return status;
  return `${status}: ${typeof exitstatus === 'string' ? exitstatus : 'unknown'}`;
}

/** User name, with the token name appended for API tokens. */
export function taskUserText(user: unknown, tokenid: unknown): string {
  if (typeof user !== 'string') return 'unknown';
  return typeof tokenid === 'string' && tokenid ? `${user}!${tokenid} (API Token)` : user;
}

export function taskDurationText(starttime: unknown, endtime: unknown, now = Date.now() / 1000): string {
  if (typeof starttime !== 'number') return '-';
  if (typeof endtime === 'number') return endtime >= starttime ? `${(endtime - starttime).toFixed(0)}s` : '-';
  return `${(now - starttime).toFixed(0)}s`;
}

const epochText = (value: unknown) => (typeof value === 'number' ? renderEpoch(value) : 'unknown (wrong format)');

/** Rows of the task viewer's Status tab. */
export const TASK_STATUS_ROWS: readonly KVRow[] = [
  {
    name: 'status',
    header: 'Status',
    placeholder: 'unknown',
    required: true,
    render: (value, record) => taskStatusText(value, record.exitstatus),
  },
  { name: 'type', header: 'Task type', required: true },
  { name: 'user', header: 'User name', required: true, render: (value, record) => taskUserText(value, record.tokenid) },
  { name: 'node', header: 'Node', required: true },
  { name: 'pid', header: 'Process ID', required: true },
  { name: 'task_id', header: 'Task ID' },
  { name: 'starttime', header: 'Start Time', required: true, render: epochText },
  { name: 'endtime', header: 'End Time', render: epochText },
  {
    name: 'duration',
    header: 'Duration',
    required: true,
    render: (_value, record) => taskDurationText(record.starttime, record.endtime),
  },
  { name: 'upid', header: 'Unique task ID' },
];

/** Values of the task filter toolbar. */
export interface TaskFilterValues {
  since: string;
  until: string;
  typefilter: string;
  statusfilter: TaskStatusFilter[];
  userfilter: string;
}

export const EMPTY_TASK_FILTER: TaskFilterValues = {
  since: '',
  until: '',
  typefilter: '',
  statusfilter: [],
  userfilter: '',
};

export function taskFilterParams(values: TaskFilterValues): TaskListFilter {
  const filter: TaskListFilter = {};
  const since = dateInputToEpoch(values.since, false);
  const until = dateInputToEpoch(values.until, true);
  if (since !== null) filter.since = since;
  if (until !== null) filter.until = until;
  if (values.typefilter.trim()) filter.typefilter = values.typefilter.trim();
  if (values.userfilter.trim()) filter.userfilter = values.userfilter.trim();
  if (values.statusfilter.length > 0) filter.statusfilter = [...values.statusfilter];
  return filter;
}

/** Number of filter fields that differ from the empty filter. */
export function activeTaskFilterCount(values: TaskFilterValues): number {
  let count = 0;
  if (values.since) count++;
  if (values.until) count++;
  if (values.typefilter) count++;
  if (values.userfilter) count++;
  if (values.statusfilter.length > 0) count++;
  return count;
}
