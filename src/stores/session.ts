/**
 * Session Store
 *
 * Mirrors the API client's authentication into a signal and keeps the
 * ticket fresh: every few seconds the ticket age is checked, expired tickets
 * end the session and old ones are renewed.
 */

import { createSignal } from 'solid-js';
import { refreshTicket } from '@/api/access';
import { POLLING_INTERVALS } from '@/constants';
import type { Authentication } from '@/types/api';
import { apiClient } from '@/utils/apiClient';
import { logger } from '@/utils/logger';
import { parseTicket, ticketValidity } from '@/utils/ticket';

const [auth, setAuthSignal] = createSignal<Authentication | null>(apiClient.getAuth());

apiClient.onAuthChange((value) => setAuthSignal(value));

let refreshTimer: ReturnType<typeof setInterval> | undefined;
let refreshing = false;
let expiredHandler: (() => void) | undefined;

export const currentAuth = auth;

export function isAuthenticated(): boolean {
  return auth() !== null;
}

export function currentUserid(): string | undefined {
  return auth()?.userid;
}

export function logout(): void {
  apiClient.clearAuth();
}

/**
 * Run one refresh check. Exported for the loop and for tests.
 */
export async function checkTicket(now = Date.now() / 1000): Promise<void> {
  const current = apiClient.getAuth();
  if (!current || refreshing) return;

  const ticket = parseTicket(current.ticket);
  if (!ticket) {
    logger.warn('Session ticket cannot be parsed, logging out');
    logout();
    expiredHandler?.();
    return;
  }

  switch (ticketValidity(ticket, now)) {
    case 'expired':
      logger.info('Ticket is expired');
      logout();
      expiredHandler?.();
      return;
    case 'refresh':
      refreshing = true;
      try {
        const result = await refreshTicket(current.userid, current.ticket);
        if (result.kind === 'authenticated') logger.info('Got ticket update');
      } catch (err) {
        logger.warn('Ticket refresh failed', err);
      } finally {
        refreshing = false;
      }
      return;
    case 'valid':
      return;
  }
}

export function startSessionRefresh(options: { onExpired?: () => void } = {}): () => void {
  expiredHandler = options.onExpired;
  stopSessionRefresh();
  refreshTimer = setInterval(() => {
    void checkTicket();
  }, POLLING_INTERVALS.AUTH_REFRESH_CHECK);
  return stopSessionRefresh;
}

export function stopSessionRefresh(): void {
  if (refreshTimer !== undefined) {
    clearInterval(refreshTimer);
    refreshTimer = undefined;
  }
}
