// API client for the `/api2/extjs` endpoints with ticket/CSRF authentication

import { API_PREFIX, TASK_POLL } from '@/constants';
import { DEFAULT_PRODUCT, PRODUCTS, type ProxmoxProduct } from '@/config/product';
import type {
  ApiEnvelope,
  ApiResponseData,
  Authentication,
  QueryParams,
  QueryValue,
  RequestData,
} from '@/types/api';
import { logger } from '@/utils/logger';
import {
  clearAuthCookie,
  loadCsrfToken,
  parseTicket,
  readCookie,
  setAuthCookie,
  storeCsrfToken,
} from '@/utils/ticket';

export class ApiError extends Error {
  public readonly status: number;
  public readonly errors: Record<string, string>;

  constructor(message: string, status = 0, errors: Record<string, string> = {}) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.errors = errors;
  }
}

export class TaskFailedError extends Error {
  public readonly exitStatus: string;

  constructor(exitStatus: string) {
    super(exitStatus);
    this.name = 'TaskFailedError';
    this.exitStatus = exitStatus;
  }
}

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

interface FetchOptions extends Omit<RequestInit, 'headers'> {
  headers?: Record<string, string>;
}

export interface ClientOptions {
  product?: ProxmoxProduct;
  onAuthFailure?: () => void;
}

type AuthListener = (auth: Authentication | null) => void;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Encode parameters the way the API server expects them: booleans as 1/0,
 * arrays as repeated keys. Nested objects cannot be expressed.
 */
export function buildQueryString(params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) continue;
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      switch (typeof item) {
        case 'boolean':
          search.append(key, item ? '1' : '0');
          break;
        case 'number':
        case 'string':
          search.append(key, String(item));
          break;
        default:
          throw new ApiError(`unable to encode parameter '${key}'`);
      }
    }
  }
  return search.toString();
}

export function apiUrl(path: string, params?: QueryParams): string {
  const base = /^https?:\/\//.test(path) || path.startsWith(API_PREFIX) ? path : `${API_PREFIX}${path}`;
  if (!params) return base;
  const query = buildQueryString(params);
  return query ? `${base}?${query}` : base;
}

function envelopeErrorMessage(envelope: Partial<ApiEnvelope<unknown>>, fallback: string): string {
  let message = typeof envelope.message === 'string' && envelope.message.trim() ? envelope.message.trim() : fallback;
  if (envelope.errors && isRecord(envelope.errors)) {
    const details = Object.entries(envelope.errors).map(([field, text]) => `${field}: ${String(text)}`);
    if (details.length > 0) message = `${message}\n${details.join('\n')}`;
  }
  return message;
}

function extractHtmlError(text: string): string | null {
  const match = text.match(/<pre>(.*?)<\/pre>/s);
  return match ? match[1] : null;
}

class ProxmoxApiClient {
  private product: ProxmoxProduct = DEFAULT_PRODUCT;
  private auth: Authentication | null = null;
  private authFailureHandler: (() => void) | null = null;
  private listeners = new Set<AuthListener>();

  configure(options: ClientOptions) {
    if (options.product) this.product = options.product;
    if (options.onAuthFailure) this.authFailureHandler = options.onAuthFailure;
  }

  getProduct(): ProxmoxProduct {
    return this.product;
  }

  getAuth(): Authentication | null {
    return this.auth;
  }

  hasAuth(): boolean {
    return this.auth !== null;
  }

  setAuth(auth: Authentication) {
    this.auth = auth;
    setAuthCookie(PRODUCTS[this.product].authCookieName, auth.ticket);
    storeCsrfToken(auth.csrfToken);
    this.notify();
  }

  clearAuth() {
    this.auth = null;
    clearAuthCookie(PRODUCTS[this.product].authCookieName);
    this.notify();
  }

  /** Rebuild the session from the auth cookie and the stored CSRF token. */
  restoreAuthFromCookie(): Authentication | null {
    const info = PRODUCTS[this.product];
    const value = readCookie(info.authCookieName);
    if (!value) return null;

    const ticket = parseTicket(value);
    if (!ticket || !info.ticketPrefixes.includes(ticket.prefix) || ticket.tfaChallenge) {
      return null;
    }

    this.auth = { userid: ticket.userid, ticket: value, csrfToken: loadCsrfToken() ?? '' };
    this.notify();
    return this.auth;
  }

  onAuthChange(listener: AuthListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify() {
    for (const listener of this.listeners) listener(this.auth);
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<Response> {
    const { headers = {}, ...fetchOptions } = options;
    const finalHeaders: Record<string, string> = { 'cache-control': 'no-cache', ...headers };

    if (this.auth) {
      if (this.auth.csrfToken) finalHeaders['CSRFPreventionToken'] = this.auth.csrfToken;
      // keep the cookie in sync with the ticket we hold
      setAuthCookie(PRODUCTS[this.product].authCookieName, this.auth.ticket);
    }

    const response = await fetch(url, { ...fetchOptions, headers: finalHeaders });

    if (response.status === 401) {
      logger.info('Got UNAUTHORIZED status - clearing auth cookie');
      this.clearAuth();
      this.authFailureHandler?.();
    }

    return response;
  }

  async request<T>(
    method: HttpMethod,
    path: string,
    options: { params?: QueryParams; data?: RequestData; form?: boolean } = {},
  ): Promise<ApiResponseData<T>> {
    const url = apiUrl(path, method === 'GET' || method === 'DELETE' ? options.params : undefined);

    const init: FetchOptions = { method };
    if ((method === 'POST' || method === 'PUT') && options.data) {
      if (options.form) {
        init.headers = { 'content-type': 'application/x-www-form-urlencoded' };
        init.body = buildQueryString(formParams(options.data));
      } else {
        init.headers = { 'content-type': 'application/json' };
        init.body = JSON.stringify(options.data);
      }
    }

    const response = await this.fetch(url, init);
    const text = await response.text();

    let envelope: ApiEnvelope<T> | undefined;
    try {
      envelope = text.trim() ? JSON.parse(text) : undefined;
    } catch {
      if (!response.ok) {
        const message = extractHtmlError(text) ?? (text.length < 200 ? text : response.statusText);
        throw new ApiError(message || `Request failed with status ${response.status}`, response.status);
      }
      logger.error('Failed to parse JSON response', text);
      throw new ApiError('Invalid JSON response from server', response.status);
    }

    if (!response.ok) {
      throw new ApiError(
        envelopeErrorMessage(envelope ?? {}, response.statusText || `HTTP status ${response.status}`),
        response.status,
        envelope?.errors ?? {},
      );
    }

    if (!envelope || typeof envelope !== 'object') {
      throw new ApiError('Invalid JSON response from server', response.status);
    }

    if (envelope.success === false || envelope.success === 0) {
      throw new ApiError(envelopeErrorMessage(envelope, 'Request failed'), response.status, envelope.errors ?? {});
    }

    const { data, success: _success, message: _message, errors: _errors, ...attribs } = envelope;
    return { data, attribs };
  }
}

const isQueryValue = (value: unknown): value is QueryValue =>
  typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';

function formParams(data: RequestData): QueryParams {
  const params: QueryParams = {};
  for (const [key, value] of Object.entries(data)) {
    if (value === null || value === undefined) continue;
    if (isQueryValue(value)) {
      params[key] = value;
    } else if (Array.isArray(value)) {
      const items: QueryValue[] = [];
      for (const item of value) {
        if (!isQueryValue(item)) throw new ApiError(`unable to encode parameter '${key}'`);
        items.push(item);
      }
      params[key] = items;
    } else {
      throw new ApiError(`unable to encode parameter '${key}'`);
    }
  }
  return params;
}

export const apiClient = new ProxmoxApiClient();

export const configureClient = (options: ClientOptions) => apiClient.configure(options);
export const setAuth = (auth: Authentication) => apiClient.setAuth(auth);
export const clearAuth = () => apiClient.clearAuth();
export const getAuth = () => apiClient.getAuth();
export const hasAuth = () => apiClient.hasAuth();

export const httpGetFull = <T>(path: string, params?: QueryParams) =>
  apiClient.request<T>('GET', path, { params });

export const httpGet = async <T>(path: string, params?: QueryParams): Promise<T> =>
  (await apiClient.request<T>('GET', path, { params })).data;

export const httpPost = async <T = unknown>(path: string, data?: RequestData): Promise<T> =>
  (await apiClient.request<T>('POST', path, { data })).data;

export const httpPut = async <T = unknown>(path: string, data?: RequestData): Promise<T> =>
  (await apiClient.request<T>('PUT', path, { data })).data;

export const httpDelete = async <T = unknown>(path: string, params?: QueryParams): Promise<T> =>
  (await apiClient.request<T>('DELETE', path, { params })).data;

/** Form encoded POST, used by the ticket endpoint. */
export const httpPostForm = async <T>(path: string, data: RequestData): Promise<T> =>
  (await apiClient.request<T>('POST', path, { data, form: true })).data;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Wait for a worker task started by an API call. Resolves when the task
 * exits with `OK`, rejects with {@link TaskFailedError} otherwise.
 */
export async function waitForTask(upid: unknown): Promise<void> {
  if (typeof upid !== 'string' || !upid) {
    throw new ApiError('waitForTask: missing UPID');
  }

  const url = `/nodes/localhost/tasks/${encodeURIComponent(upid)}/status`;
  let sleepMs: number = TASK_POLL.INITIAL_SLEEP;

  for (;;) {
    const status = await httpGet<{ status?: string; exitstatus?: string }>(url);
    if (status.status !== 'running') {
      const exitStatus = status.exitstatus ?? 'unknown';
      if (exitStatus === 'OK') return;
      throw new TaskFailedError(exitStatus);
    }
    await sleep(sleepMs);
    if (sleepMs < TASK_POLL.MAX_SLEEP) sleepMs *= 2;
  }
}

/** Wait for the task whose UPID is the result of `request`. */
export async function runTask(request: Promise<unknown>): Promise<void> {
  await waitForTask(await request);
}
