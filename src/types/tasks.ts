export interface Upid {
  node: string;
  pid: number;
  pstart: number;
  /** Only present in backup server UPIDs. */
  taskId?: number;
  starttime: number;
  workerType: string;
  workerId?: string;
  authId: string;
}

/** Row of `GET /nodes/{node}/tasks`. */
export interface TaskListItem {
  upid: string;
  node: string;
  pid: number;
  pstart: number;
  starttime: number;
  worker_type: string;
  worker_id?: string | null;
  user: string;
  endtime?: number | null;
  status?: string | null;
}

/** Result of `GET /nodes/{node}/tasks/{upid}/status`. */
export interface TaskStatus {
  upid: string;
  node: string;
  pid: number;
  pstart: number;
  starttime: number;
  type: string;
  id?: string | null;
  user: string;
  tokenid?: string | null;
  status: 'running' | 'stopped' | string;
  exitstatus?: string | null;
}

export interface TaskLogLine {
  n: number;
  t: string;
}

export type TaskStatusClass = 'ok' | 'warning' | 'error';

export type TaskStatusFilter = 'ok' | 'error' | 'warning' | 'unknown';

export interface TaskListFilter {
  since?: number;
  until?: number;
  typefilter?: string;
  statusfilter?: TaskStatusFilter[];
  userfilter?: string;
  running?: boolean;
}
