import { Show, createSignal, onCleanup, onMount } from 'solid-js';
import ListFilterIcon from 'lucide-solid/icons/list-filter';
import ChevronDownIcon from 'lucide-solid/icons/chevron-down';
import { Button } from '@/components/shared/Button';
import { TasksAPI } from '@/api/tasks';
import { POLLING_INTERVALS } from '@/constants';
import { useLoader } from '@/hooks/useLoader';
import type { LoaderState } from '@/hooks/useLoader';
import type { TaskListItem } from '@/types/tasks';
import { RunningTasks } from './RunningTasks';

/** Running tasks, reloaded every five seconds. */
export function useRunningTasks(url = '/cluster/tasks'): LoaderState<TaskListItem[]> {
  return useLoader(() => TasksAPI.running(url), { interval: POLLING_INTERVALS.RUNNING_TASKS });
}

export interface RunningTasksButtonProps {
  runningTasks: LoaderState<TaskListItem[]>;
  onShowTask?: (upid: string, endtime: number | null) => void;
  onShowAll?: () => void;
}

/** `Tasks: N` button with a drop-down of the running tasks. */
export function RunningTasksButton(props: RunningTasksButtonProps) {
  const [open, setOpen] = createSignal(false);
  let container: HTMLDivElement | undefined;

  onMount(() => {
    const onPointerDown = (event: MouseEvent) => {
      if (container && event.target instanceof Node && !container.contains(event.target)) setOpen(false);
    };
    document.addEventListener('mousedown', onPointerDown);
    onCleanup(() => document.removeEventListener('mousedown', onPointerDown));
  });

  const count = () => props.runningTasks.data()?.length ?? 0;

  const onKeyDown = (event: KeyboardEvent) => {
    if (event.key === 'Escape') setOpen(false);
    else if (event.key === 'ArrowDown') setOpen(true);
    else return;
    event.preventDefault();
    event.stopPropagation();
  };

  return (
    <div
      ref={(el) => {
        container = el;
      }}
      class="relative inline-block"
      onKeyDown={onKeyDown}
    >
      <Button
        variant="primary"
        size="sm"
        icon={<ListFilterIcon class="h-4 w-4" />}
        aria-haspopup="true"
        aria-expanded={open() ? 'true' : undefined}
        onClick={() => setOpen(!open())}
      >
        {`Tasks: ${count()}`}
        <ChevronDownIcon class="h-3 w-3" />
      </Button>
      <Show when={open()}>
        <div role="none" class="absolute right-0 z-50 mt-1 shadow-lg">
          <RunningTasks
            tasks={props.runningTasks.data()}
            loading={props.runningTasks.loading()}
            error={props.runningTasks.error()}
            onShowTask={(upid, endtime) => {
              setOpen(false);
              props.onShowTask?.(upid, endtime);
            }}
            onShowAll={() => {
              setOpen(false);
              props.onShowAll?.();
            }}
          />
        </div>
      </Show>
    </div>
  );
}

export default RunningTasksButton;
