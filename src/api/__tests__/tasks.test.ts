import { beforeEach, describe, expect, it, vi } from 'vitest';
import { httpDelete, httpGet, httpGetFull } from '@/utils/apiClient';
import { TasksAPI, nodeTasksUrl } from '../tasks';

vi.mock('@/utils/apiClient', () => ({
  httpGet: vi.fn(),
  httpGetFull: vi.fn(),
  httpDelete: vi.fn(),
}));

const UPID = 'UPID:pbs1:000004D2:0000162E:00000001:6512BC00:aptupdate::root@pam:';

describe('TasksAPI', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('builds the node task url', () => {
    expect(nodeTasksUrl()).toBe('/nodes/localhost/tasks');
    expect(nodeTasksUrl('pbs 2')).toBe('/nodes/pbs%202/tasks');
  });

  it('sends only the filters that are set', async () => {
    vi.mocked(httpGet).mockResolvedValueOnce([]);

    await TasksAPI.list(
      '/nodes/localhost/tasks',
      { since: 100, typefilter: 'garbage_collection', statusfilter: ['error', 'warning'], userfilter: '' },
      500,
      50,
    );
    expect(httpGet).toHaveBeenCalledWith('/nodes/localhost/tasks', {
      start: 500,
      limit: 50,
      since: 100,
      typefilter: 'garbage_collection',
      statusfilter: ['error', 'warning'],
    });
  });

  it('encodes the UPID for status and stop', async () => {
    await TasksAPI.status('/nodes/localhost/tasks', UPID);
    await TasksAPI.stop('/nodes/localhost/tasks', UPID);

    expect(httpGet).toHaveBeenCalledWith(`/nodes/localhost/tasks/${encodeURIComponent(UPID)}/status`);
    expect(httpDelete).toHaveBeenCalledWith(`/nodes/localhost/tasks/${encodeURIComponent(UPID)}`);
  });

  it('keeps only tasks without end time as running', async () => {
    vi.mocked(httpGet).mockResolvedValueOnce([
      { upid: 'a', endtime: null },
      { upid: 'b', endtime: 1700000000 },
      { upid: 'c' },
    ]);

    const running = await TasksAPI.running();
    expect(running.map((task) => task.upid)).toEqual(['a', 'c']);
    expect(httpGet).toHaveBeenCalledWith('/nodes/localhost/tasks', { running: true, limit: 500 });
  });

  it('loads a log page with the total from the envelope', async () => {
    vi.mocked(httpGetFull).mockResolvedValueOnce({ data: [{ n: 501, t: 'line' }], attribs: { total: 1200 } });

    await expect(TasksAPI.logPage('/nodes/localhost/tasks/x/log', 1)).resolves.toEqual({
      page: 1,
      lines: [{ n: 501, t: 'line' }],
      total: 1200,
    });
    expect(httpGetFull).toHaveBeenCalledWith('/nodes/localhost/tasks/x/log', { start: 500, limit: 500 });
  });

  it('falls back to the page length and passes syslog options', async () => {
    vi.mocked(httpGetFull).mockResolvedValueOnce({ data: [{ n: 1, t: 'boot' }], attribs: {} });
    const since = new Date(2024, 0, 2, 3, 4, 5).getTime() / 1000;

    const page = await TasksAPI.logPage('/nodes/localhost/syslog', 0, { service: 'sshd', since });
    expect(page.total).toBe(1);
    expect(httpGetFull).toHaveBeenCalledWith('/nodes/localhost/syslog', {
      start: 0,
      limit: 500,
      service: 'sshd',
      since: '2024-01-02 03:04:05',
    });
  });
});
