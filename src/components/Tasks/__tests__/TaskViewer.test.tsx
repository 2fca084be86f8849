import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { cleanup, fireEvent, render, screen } from '@solidjs/testing-library';
import { TasksAPI } from '@/api/tasks';
import type { TaskStatus } from '@/types/tasks';
import { TaskProgress } from '../TaskProgress';
import { TaskViewer } from '../TaskViewer';

vi.mock('@/api/tasks', async () => {
  const actual = await vi.importActual<typeof import('@/api/tasks')>('@/api/tasks');
  return {
    ...actual,
    TasksAPI: {
      list: vi.fn(),
      status: vi.fn(),
      stop: vi.fn(),
      running: vi.fn(),
      logPage: vi.fn(),
    },
  };
});

const UPID = 'UPID:pbs1:000004D2:0000162E:00000001:6512BC00:aptupdate::root@pam:';

const taskStatus = (status: string, exitstatus?: string): TaskStatus => ({
  upid: UPID,
  node: 'pbs1',
  pid: 1234,
  pstart: 5678,
  starttime: 0x6512bc00,
  type: 'aptupdate',
  user: 'root@pam',
  status,
  exitstatus,
});

describe('TaskViewer', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.mocked(TasksAPI.logPage).mockResolvedValue({ page: 0, lines: [{ n: 1, t: 'starting apt-get update' }], total: 1 });
  });

  afterEach(() => {
    cleanup();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('polls the status every second while the task runs', async () => {
    vi.mocked(TasksAPI.status)
      .mockResolvedValueOnce(taskStatus('running'))
      .mockResolvedValueOnce(taskStatus('running'))
      .mockResolvedValue(taskStatus('stopped', 'OK'));

    render(() => <TaskViewer upid={UPID} onClose={() => {}} />);
    await vi.advanceTimersByTimeAsync(3500);

    expect(TasksAPI.status).toHaveBeenCalledTimes(3);
    expect(TasksAPI.status).toHaveBeenCalledWith('/nodes/localhost/tasks', UPID);
    expect(screen.getByRole('button', { name: 'Stop' })).toBeDisabled();
  });

  it('keeps polling after a failed status request', async () => {
    vi.mocked(TasksAPI.status)
      .mockRejectedValueOnce(new Error('connection refused'))
      .mockResolvedValue(taskStatus('running'));

    render(() => <TaskViewer upid={UPID} onClose={() => {}} />);
    await vi.advanceTimersByTimeAsync(0);
    expect(screen.getByRole('alert')).toHaveTextContent('connection refused');
    expect(screen.getByRole('button', { name: 'Stop' })).toBeEnabled();

    await vi.advanceTimersByTimeAsync(3500);
    expect(TasksAPI.status).toHaveBeenCalledTimes(4);
    expect(screen.queryByRole('alert')).toBeNull();
  });

  it('stops a running task', async () => {
    vi.mocked(TasksAPI.status).mockResolvedValue(taskStatus('running'));
    vi.mocked(TasksAPI.stop).mockResolvedValueOnce(null);

    render(() => <TaskViewer upid={UPID} baseUrl="/nodes/pbs1/tasks" onClose={() => {}} />);
    await vi.advanceTimersByTimeAsync(0);

    fireEvent.click(screen.getByRole('button', { name: 'Stop' }));
    await vi.advanceTimersByTimeAsync(0);
    expect(TasksAPI.stop).toHaveBeenCalledWith('/nodes/pbs1/tasks', UPID);
  });
});

describe('TaskProgress', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    cleanup();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('shows the result once the task stops', async () => {
    vi.mocked(TasksAPI.status)
      .mockResolvedValueOnce(taskStatus('running'))
      .mockResolvedValue(taskStatus('stopped', 'OK'));

    render(() => <TaskProgress upid={UPID} onClose={() => {}} />);
    await vi.advanceTimersByTimeAsync(0);
    expect(screen.getByText('running')).toBeInTheDocument();

    await vi.advanceTimersByTimeAsync(1000);
    expect(screen.getByText('Done! Task finished successfully.')).toBeInTheDocument();
  });

  it('reaches the result after a failed status request', async () => {
    vi.mocked(TasksAPI.status)
      .mockRejectedValueOnce(new Error('connection refused'))
      .mockResolvedValue(taskStatus('stopped', 'command failed'));

    render(() => <TaskProgress upid={UPID} onClose={() => {}} />);
    await vi.advanceTimersByTimeAsync(0);
    expect(screen.getByText('connection refused')).toBeInTheDocument();

    await vi.advanceTimersByTimeAsync(1000);
    expect(screen.getByText('Task failed: command failed')).toBeInTheDocument();
    expect(TasksAPI.status).toHaveBeenCalledTimes(2);
  });

  it('closes by itself when asked to', async () => {
    const onClose = vi.fn();
    vi.mocked(TasksAPI.status).mockResolvedValue(taskStatus('stopped', 'OK'));

    render(() => <TaskProgress upid={UPID} autoClose onClose={onClose} />);
    await vi.advanceTimersByTimeAsync(0);
    expect(onClose).toHaveBeenCalledTimes(1);
  });
});
