import {
  TICKET_EXPIRE_MARGIN,
  TICKET_LIFETIME,
  TICKET_REFRESH_AGE,
  STORAGE_KEYS,
} from '@/constants';
import type { TfaChallenge } from '@/types/tfa';
import { logger } from '@/utils/logger';

const TFA_MARKER = '!tfa!';

export interface ParsedTicket {
  raw: string;
  prefix: string;
  /** Empty for second factor tickets that do not embed the user. */
  userid: string;
  /** Issue time in epoch seconds. */
  timestamp: number;
  tfaChallenge?: TfaChallenge;
}

export type TicketValidity = 'valid' | 'refresh' | 'expired';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function parseChallengeJson(encoded: string): TfaChallenge | undefined {
  try {
    const parsed: unknown = JSON.parse(decodeURIComponent(encoded));
    if (!isRecord(parsed)) return undefined;
    const recovery = Array.isArray(parsed.recovery)
      ? parsed.recovery.filter((entry): entry is number => typeof entry === 'number')
      : [];
    return {
      totp: parsed.totp === true,
      yubico: parsed.yubico === true,
      recovery,
      webauthn: isRecord(parsed.webauthn) ? parsed.webauthn : undefined,
    };
  } catch (err) {
    logger.warn('Unable to parse second factor challenge', err);
    return undefined;
  }
}

/**
 * Split a ticket of the form `PREFIX:DATA:HEXTIME::SIGNATURE`.
 *
 * For second factor tickets DATA carries `!tfa!` followed by the URL encoded
 * challenge, optionally preceded by the user id.
 */
export function parseTicket(ticket: string): ParsedTicket | null {
  const sigStart = ticket.indexOf('::');
  if (sigStart < 0) return null;

  const parts = ticket.slice(0, sigStart).split(':');
  if (parts.length < 3) return null;

  const prefix = parts[0];
  const hexTime = parts[parts.length - 1];
  const data = parts.slice(1, -1).join(':');
  if (!prefix || !/^[0-9A-Fa-f]{8}$/.test(hexTime)) return null;

  const timestamp = parseInt(hexTime, 16);

  const markerPos = data.indexOf(TFA_MARKER);
  if (markerPos >= 0) {
    return {
      raw: ticket,
      prefix,
      userid: data.slice(0, markerPos),
      timestamp,
      tfaChallenge: parseChallengeJson(data.slice(markerPos + TFA_MARKER.length)),
    };
  }

  return { raw: ticket, prefix, userid: data, timestamp };
}

export const isTfaTicket = (ticket: string): boolean => ticket.includes(TFA_MARKER);

export function ticketAge(ticket: ParsedTicket, now = Date.now() / 1000): number {
  return now - ticket.timestamp;
}

export function ticketValidity(ticket: ParsedTicket, now = Date.now() / 1000): TicketValidity {
  const age = ticketAge(ticket, now);
  if (age > TICKET_LIFETIME - TICKET_EXPIRE_MARGIN) return 'expired';
  if (age > TICKET_REFRESH_AGE) return 'refresh';
  return 'valid';
}

// Cookie helpers

export function authCookieString(name: string, ticket: string): string {
  return `${name}=${encodeURIComponent(ticket)}; SameSite=Lax; Secure;`;
}

export function setAuthCookie(name: string, ticket: string): void {
  document.cookie = authCookieString(name, ticket);
}

export function clearAuthCookie(name: string): void {
  document.cookie = `${name}=; expires=Thu, 01-Jan-1970 00:00:01 GMT;`;
}

/** Returns the decoded value of the named cookie. */
export function readCookie(name: string, cookies = document.cookie): string | null {
  for (const part of cookies.split(';')) {
    const trimmed = part.trim();
    const eq = trimmed.indexOf('=');
    if (eq < 0 || trimmed.slice(0, eq) !== name) continue;
    try {
      return decodeURIComponent(trimmed.slice(eq + 1));
    } catch {
      logger.debug(`Skipping undecodable cookie ${name}`);
      return null;
    }
  }
  return null;
}

export function storeCsrfToken(token: string): void {
  try {
    sessionStorage.setItem(STORAGE_KEYS.CSRF_TOKEN, token);
  } catch (err) {
    logger.error('Unable to store CSRF token', err);
  }
}

export function loadCsrfToken(): string | null {
  try {
    return sessionStorage.getItem(STORAGE_KEYS.CSRF_TOKEN);
  } catch {
    return null;
  }
}
