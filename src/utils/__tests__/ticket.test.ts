import { describe, expect, it } from 'vitest';
import {
  authCookieString,
  isTfaTicket,
  loadCsrfToken,
  parseTicket,
  readCookie,
  storeCsrfToken,
  ticketValidity,
} from '../ticket';

const ISSUED = 0x6512bc00;

describe('parseTicket', () => {
  it('splits prefix, user and issue time', () => {
    const raw = 'PBS:root@pam:6512BC00::c2lnbmF0dXJl';
    expect(parseTicket(raw)).toEqual({ raw, prefix: 'PBS', userid: 'root@pam', timestamp: 1695726592 });
  });

  it('keeps colons inside the data part', () => {
    expect(parseTicket('PMGQUAR:quarantine:user@example.com:6512BC00::sig')?.userid).toBe(
      'quarantine:user@example.com',
    );
  });

  it('rejects malformed tickets', () => {
    expect(parseTicket('garbage')).toBeNull();
    expect(parseTicket('PBS:root@pam:XYZ::sig')).toBeNull();
    expect(parseTicket('PBS:6512BC00::sig')).toBeNull();
  });

  it('decodes the second factor challenge', () => {
    const challenge = encodeURIComponent(JSON.stringify({ totp: true, recovery: [0, 2, 'x'] }));
    const ticket = parseTicket(`PBS:!tfa!${challenge}:6512BC00::sig`);

    expect(ticket?.userid).toBe('');
    expect(ticket?.tfaChallenge).toEqual({ totp: true, yubico: false, recovery: [0, 2] });
  });

  it('detects second factor tickets', () => {
    expect(isTfaTicket('PBS:!tfa!%7B%7D:6512BC00::sig')).toBe(true);
    expect(isTfaTicket('PBS:root@pam:6512BC00::sig')).toBe(false);
  });
});

describe('ticketValidity', () => {
  const ticket = { raw: '', prefix: 'PBS', userid: 'root@pam', timestamp: ISSUED };

  it('is valid for the first hour', () => {
    expect(ticketValidity(ticket, ISSUED + 100)).toBe('valid');
    expect(ticketValidity(ticket, ISSUED + 3600)).toBe('valid');
  });

  it('asks for a refresh after an hour', () => {
    expect(ticketValidity(ticket, ISSUED + 3601)).toBe('refresh');
    expect(ticketValidity(ticket, ISSUED + 7140)).toBe('refresh');
  });

  it('expires a minute before the server does', () => {
    expect(ticketValidity(ticket, ISSUED + 7141)).toBe('expired');
  });
});

describe('cookies', () => {
  it('builds the auth cookie', () => {
    expect(authCookieString('PBSAuthCookie', 'PBS:a b')).toBe('PBSAuthCookie=PBS%3Aa%20b; SameSite=Lax; Secure;');
  });

  it('reads a named cookie', () => {
    expect(readCookie('B', 'A=1; B=hello%20world')).toBe('hello world');
    expect(readCookie('C', 'A=1; B=2')).toBeNull();
    expect(readCookie('B', 'B=%E0%A4%A')).toBeNull();
  });
});

describe('CSRF token', () => {
  it('is kept in session storage', () => {
    expect(loadCsrfToken()).toBeNull();
    storeCsrfToken('test-csrf');
    expect(loadCsrfToken()).toBe('test-csrf');
  });
});
