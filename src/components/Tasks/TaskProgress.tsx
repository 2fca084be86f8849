import { Show, createSignal, onCleanup } from 'solid-js';
import { Dialog } from '@/components/shared/Dialog';
import { Button } from '@/components/shared/Button';
import { TasksAPI, nodeTasksUrl } from '@/api/tasks';
import { POLLING_INTERVALS } from '@/constants';
import { useLoader } from '@/hooks/useLoader';
import type { TaskStatus } from '@/types/tasks';
import { TaskViewer } from './TaskViewer';

export interface TaskProgressProps {
  upid: string;
  baseUrl?: string;
  onClose: () => void;
  /** Close by itself when the task ends, unless details were opened. */
  autoClose?: boolean;
}

export function taskResultText(status: TaskStatus | undefined): string {
  if (!status || status.status !== 'stopped') return 'running';
  const exitStatus = status.exitstatus ?? 'unknown';
  return exitStatus === 'OK' ? 'Done! Task finished successfully.' : `Task failed: ${exitStatus}`;
}

/** Progress window following a worker task. */
export function TaskProgress(props: TaskProgressProps) {
  const [showDetails, setShowDetails] = createSignal(false);
  let timer: ReturnType<typeof setTimeout> | undefined;

  const poll = () => {
    clearTimeout(timer);
    timer = setTimeout(() => void status.reload(), POLLING_INTERVALS.TASK_STATUS);
  };

  const status = useLoader<TaskStatus>(() => TasksAPI.status(props.baseUrl ?? nodeTasksUrl(), props.upid), {
    onLoaded: (data) => {
      if (data.status !== 'stopped') {
        poll();
        return;
      }
      clearTimeout(timer);
      if (props.autoClose && !showDetails()) props.onClose();
    },
    onError: poll,
  });
  onCleanup(() => clearTimeout(timer));

  const running = () => status.error() !== null || status.data()?.status !== 'stopped';

  return (
    <Show
      when={!showDetails()}
      fallback={<TaskViewer upid={props.upid} baseUrl={props.baseUrl} onClose={props.onClose} />}
    >
      <Dialog
        isOpen
        title="Task Progress"
        onClose={props.onClose}
        footer={
          <Button size="sm" onClick={() => setShowDetails(true)}>
            Details
          </Button>
        }
      >
        <div class="min-w-[300px] space-y-2 p-4">
          <div class="h-2 w-full overflow-hidden rounded bg-gray-200 dark:bg-gray-700">
            <div class={`h-full bg-blue-600 ${running() ? 'w-1/3 animate-pulse' : 'w-full'}`} />
          </div>
          <Show when={status.error()} fallback={<p class="text-sm">{taskResultText(status.data())}</p>}>
            {(message) => <p class="text-sm text-red-600">{message()}</p>}
          </Show>
        </div>
      </Dialog>
    </Show>
  );
}

export default TaskProgress;
