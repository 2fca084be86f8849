import { Show, createSignal, onCleanup } from 'solid-js';
import XCircleIcon from 'lucide-solid/icons/x-circle';
import { Dialog } from '@/components/shared/Dialog';
import { Button } from '@/components/shared/Button';
import { KVGrid } from '@/components/shared/KVGrid';
import { TabPanel } from '@/components/shared/TabPanel';
import { Toolbar } from '@/components/shared/Toolbar';
import { TasksAPI, nodeTasksUrl, taskUrl } from '@/api/tasks';
import { POLLING_INTERVALS } from '@/constants';
import { useLoader } from '@/hooks/useLoader';
import type { TaskStatus } from '@/types/tasks';
import { handleError } from '@/utils/errorHandler';
import { formatUpid } from '@/utils/taskDescriptions';
import { LogView } from './LogView';
import { TASK_STATUS_ROWS } from './taskRows';

export interface TaskViewerProps {
  upid: string;
  baseUrl?: string;
  /** Known end time of a finished task. */
  endtime?: number | null;
  onClose: () => void;
}

/** Task output and status, polled every second until the task stops. */
export function TaskViewer(props: TaskViewerProps) {
  const baseUrl = () => props.baseUrl ?? nodeTasksUrl();
  const [endtime, setEndtime] = createSignal<number | undefined>(props.endtime ?? undefined);
  let timer: ReturnType<typeof setTimeout> | undefined;

  const poll = () => {
    clearTimeout(timer);
    timer = setTimeout(() => void status.reload(), POLLING_INTERVALS.TASK_STATUS);
  };

  const status = useLoader<TaskStatus>(() => TasksAPI.status(baseUrl(), props.upid), {
    onLoaded: (data) => {
      if (data.status !== 'stopped') {
        poll();
      } else {
        clearTimeout(timer);
        if (endtime() === undefined) setEndtime(Math.floor(Date.now() / 1000));
      }
    },
    // a failed status read counts as still running
    onError: poll,
  });
  onCleanup(() => clearTimeout(timer));

  const active = () => status.error() !== null || status.data()?.status !== 'stopped';

  const stop = async () => {
    try {
      await TasksAPI.stop(baseUrl(), props.upid);
    } catch (err) {
      handleError(err, { component: 'TaskViewer', action: 'stop task' }, { toastTitle: 'Stop task failed' });
    }
    await status.reload();
  };

  const toolbar = () => (
    <Toolbar>
      <Button size="sm" icon={<XCircleIcon class="h-4 w-4" />} disabled={!active()} onClick={() => void stop()}>
        Stop
      </Button>
    </Toolbar>
  );

  const record = (): Record<string, unknown> => {
    const data = status.data();
    if (!data) return {};
    const end = endtime();
    return end !== undefined ? { ...data, endtime: end } : { ...data };
  };

  return (
    <Dialog isOpen title={`Task Viewer: ${formatUpid(props.upid)}`} onClose={props.onClose} panelClass="max-w-4xl h-[600px]">
      <Show when={status.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <TabPanel
        class="h-full"
        tabs={[
          {
            id: 'output',
            label: 'Output',
            render: () => (
              <div class="flex h-full flex-col">
                {toolbar()}
                <LogView class="min-h-0 flex-1" url={`${taskUrl(baseUrl(), props.upid)}/log`} active={active()} />
              </div>
            ),
          },
          {
            id: 'status',
            label: 'Status',
            render: () => (
              <div class="flex flex-col">
                {toolbar()}
                <KVGrid rows={TASK_STATUS_ROWS} data={record()} />
              </div>
            ),
          },
        ]}
      />
    </Dialog>
  );
}

export default TaskViewer;
