import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ApiError,
  TaskFailedError,
  apiClient,
  apiUrl,
  buildQueryString,
  httpGet,
  httpGetFull,
  httpPost,
  httpPostForm,
  waitForTask,
} from '../apiClient';

const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

const TICKET = 'PBS:root@pam:6512BC00::c2lnbmF0dXJl';

describe('buildQueryString', () => {
  it('encodes booleans as 1/0 and arrays as repeated keys', () => {
    expect(
      buildQueryString({ verbose: true, quiet: false, limit: 50, typefilter: ['a', 'b'], skip: undefined, none: null }),
    ).toBe('verbose=1&quiet=0&limit=50&typefilter=a&typefilter=b');
  });
});

describe('apiUrl', () => {
  it('prefixes relative paths and appends the query', () => {
    expect(apiUrl('/nodes', { start: 0 })).toBe('/api2/extjs/nodes?start=0');
    expect(apiUrl('/nodes', {})).toBe('/api2/extjs/nodes');
  });

  it('leaves prefixed and absolute URLs alone', () => {
    expect(apiUrl('/api2/extjs/version')).toBe('/api2/extjs/version');
    expect(apiUrl('https://pbs.example:8007/api2/json/version')).toBe('https://pbs.example:8007/api2/json/version');
  });
});

describe('apiClient requests', () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    apiClient.clearAuth();
  });

  afterEach(() => {
    apiClient.clearAuth();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('returns the data member and sends the CSRF token', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ success: 1, data: { version: '3.3' } }));
    apiClient.setAuth({ userid: 'root@pam', ticket: TICKET, csrfToken: 'test-csrf' });

    await expect(httpGet('/version')).resolves.toEqual({ version: '3.3' });
    expect(fetchMock).toHaveBeenCalledWith('/api2/extjs/version', {
      method: 'GET',
      headers: { 'cache-control': 'no-cache', CSRFPreventionToken: 'test-csrf' },
    });
  });

  it('keeps extra envelope attributes', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ success: 1, data: [], total: 42 }));

    await expect(httpGetFull('/nodes/localhost/tasks', { start: 0 })).resolves.toEqual({
      data: [],
      attribs: { total: 42 },
    });
  });

  it('turns an unsuccessful envelope into an ApiError with field errors', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ success: 0, data: null, message: 'parameter verification failed', errors: { userid: 'invalid format' } }),
    );

    await expect(httpGet('/access/users')).rejects.toMatchObject({
      name: 'ApiError',
      message: 'parameter verification failed\nuserid: invalid format',
      errors: { userid: 'invalid format' },
    });
  });

  it('uses the <pre> text of an HTML error page', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html><body><pre>proxy loop detected</pre></body></html>', { status: 502 }));

    const error = await httpGet('/version').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ message: 'proxy loop detected', status: 502 });
  });

  it('drops the session and calls the failure handler on 401', async () => {
    const onAuthFailure = vi.fn();
    apiClient.configure({ onAuthFailure });
    apiClient.setAuth({ userid: 'root@pam', ticket: TICKET, csrfToken: 'test-csrf' });
    fetchMock.mockResolvedValueOnce(jsonResponse({ data: null }, 401));

    await expect(httpGet('/version')).rejects.toMatchObject({ status: 401, message: 'HTTP status 401' });
    expect(apiClient.hasAuth()).toBe(false);
    expect(onAuthFailure).toHaveBeenCalledTimes(1);
  });

  it('posts JSON bodies', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ success: 1, data: null }));

    await httpPost('/access/users', { userid: 'alice@pbs', enable: true });
    expect(fetchMock).toHaveBeenCalledWith('/api2/extjs/access/users', {
      method: 'POST',
      headers: { 'cache-control': 'no-cache', 'content-type': 'application/json' },
      body: '{"userid":"alice@pbs","enable":true}',
    });
  });

  it('posts form encoded bodies for the ticket call', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ success: 1, data: {} }));

    await httpPostForm('/access/ticket', { username: 'root@pam', password: 'test-secret', append: true });
    expect(fetchMock).toHaveBeenCalledWith('/api2/extjs/access/ticket', {
      method: 'POST',
      headers: { 'cache-control': 'no-cache', 'content-type': 'application/x-www-form-urlencoded' },
      body: 'username=root%40pam&password=test-secret&append=1',
    });
  });

  it('repeats array values in form encoded bodies', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ success: 1, data: {} }));

    await httpPostForm('/access/ticket', { username: 'root@pam', delete: ['email', 'comment'], skip: undefined });
    expect(fetchMock.mock.calls[0][1]?.body).toBe('username=root%40pam&delete=email&delete=comment');
  });

  it('refuses to form encode nested objects', async () => {
    await expect(httpPostForm('/access/ticket', { username: 'root@pam', extra: { a: 1 } })).rejects.toThrow(
      "unable to encode parameter 'extra'",
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('restores the session from the auth cookie', () => {
    document.cookie = `PBSAuthCookie=${encodeURIComponent(TICKET)}`;
    sessionStorage.setItem('CSRFToken', 'test-csrf');
    const listener = vi.fn();
    const unsubscribe = apiClient.onAuthChange(listener);

    expect(apiClient.restoreAuthFromCookie()).toEqual({ userid: 'root@pam', ticket: TICKET, csrfToken: 'test-csrf' });
    expect(listener).toHaveBeenCalledWith({ userid: 'root@pam', ticket: TICKET, csrfToken: 'test-csrf' });
    unsubscribe();
  });

  it('ignores second factor tickets in the cookie', () => {
    const tfaTicket = `PBS:!tfa!${encodeURIComponent('{"totp":true}')}:6512BC00::c2ln`;
    document.cookie = `PBSAuthCookie=${encodeURIComponent(tfaTicket)}`;

    expect(apiClient.restoreAuthFromCookie()).toBeNull();
    expect(apiClient.hasAuth()).toBe(false);
  });
});

describe('waitForTask', () => {
  const upid = 'UPID:node1:000012AB:0001A2B3:6512BC00:aptupdate::root@pam:';

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('polls until the task stops', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ success: 1, data: { status: 'running' } }))
      .mockResolvedValueOnce(jsonResponse({ success: 1, data: { status: 'stopped', exitstatus: 'OK' } }));

    await expect(waitForTask(upid)).resolves.toBeUndefined();
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[0][0]).toBe(`/api2/extjs/nodes/localhost/tasks/${encodeURIComponent(upid)}/status`);
  });

  it('rejects with the exit status of a failed task', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ success: 1, data: { status: 'stopped', exitstatus: 'command failed' } }));

    const error = await waitForTask(upid).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TaskFailedError);
    expect(error).toMatchObject({ exitStatus: 'command failed' });
  });

  it('rejects without a UPID', async () => {
    await expect(waitForTask(undefined)).rejects.toThrow('waitForTask: missing UPID');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
