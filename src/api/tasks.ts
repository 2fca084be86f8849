import { httpDelete, httpGet, httpGetFull } from '@/utils/apiClient';
import { LIMITS } from '@/constants';
import type { QueryParams } from '@/types/api';
import type { TaskListFilter, TaskListItem, TaskLogLine, TaskStatus } from '@/types/tasks';
import { epochToSyslogApi } from '@/utils/format';

export interface LogPage {
  page: number;
  lines: TaskLogLine[];
  total: number;
}

export interface LogPageOptions {
  service?: string;
  /** Epoch seconds */
  since?: number;
  until?: number;
}

/** Default task list url of a node. */
export const nodeTasksUrl = (node = 'localhost') => `/nodes/${encodeURIComponent(node)}/tasks`;

export const taskUrl = (baseUrl: string, upid: string) => `${baseUrl}/${encodeURIComponent(upid)}`;

function filterParams(filter: TaskListFilter, start: number, limit: number): QueryParams {
  const params: QueryParams = { start, limit };
  if (filter.since !== undefined) params.since = filter.since;
  if (filter.until !== undefined) params.until = filter.until;
  if (filter.typefilter) params.typefilter = filter.typefilter;
  if (filter.userfilter) params.userfilter = filter.userfilter;
  if (filter.statusfilter && filter.statusfilter.length > 0) params.statusfilter = filter.statusfilter;
  if (filter.running !== undefined) params.running = filter.running;
  return params;
}

export class TasksAPI {
  static async list(
    baseUrl: string,
    filter: TaskListFilter = {},
    start = 0,
    limit: number = LIMITS.TASK_PAGE_SIZE,
  ): Promise<TaskListItem[]> {
    return httpGet<TaskListItem[]>(baseUrl, filterParams(filter, start, limit));
  }

  static async status(baseUrl: string, upid: string): Promise<TaskStatus> {
    return httpGet<TaskStatus>(`${taskUrl(baseUrl, upid)}/status`);
  }

  static async stop(baseUrl: string, upid: string): Promise<unknown> {
    return httpDelete(taskUrl(baseUrl, upid));
  }

  /** Running tasks of the whole cluster (or of a custom url). */
  static async running(url = '/nodes/localhost/tasks'): Promise<TaskListItem[]> {
    const tasks = await httpGet<TaskListItem[]>(url, { running: true, limit: LIMITS.TASK_PAGE_SIZE });
    return tasks.filter((task) => !task.endtime);
  }

  /**
   * One page of a log (task log, syslog or journal). The total line count is
   * taken from the response envelope, falling back to the page length.
   */
  static async logPage(url: string, page: number, options: LogPageOptions = {}): Promise<LogPage> {
    const params: QueryParams = { start: page * LIMITS.LOG_PAGE_SIZE, limit: LIMITS.LOG_PAGE_SIZE };
    if (options.service) params.service = options.service;
    if (options.since !== undefined) params.since = epochToSyslogApi(options.since);
    if (options.until !== undefined) params.until = epochToSyslogApi(options.until);

    const resp = await httpGetFull<TaskLogLine[]>(url, params);
    const total = typeof resp.attribs.total === 'number' ? resp.attribs.total : resp.data.length;
    return { page, lines: resp.data, total };
  }
}
