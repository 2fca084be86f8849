import { LIMITS } from '@/constants';

const BASE32_PATTERN = /^[A-Z2-7=]+$/;

/** Random base32 secret suitable for a TOTP authenticator app. */
export function randomizeSecret(length: number = LIMITS.TOTP_SECRET_LENGTH): string {
  const bytes = new Uint8Array(length);
  crypto.getRandomValues(bytes);

  let secret = '';
  for (const byte of bytes) {
    const value = byte & 0x1f;
    secret += value < 26 ? String.fromCharCode(65 + value) : String.fromCharCode(50 + value - 26);
  }
  return secret;
}

/** Returns an error text for values that are not base32, `null` when valid. */
export function validateSecret(secret: string): string | null {
  return BASE32_PATTERN.test(secret) ? null : 'Must be base32 [A-Z2-7=]';
}

export function totpLink(issuer: string, userid: string, secret: string): string {
  const encIssuer = encodeURIComponent(issuer);
  return (
    `otpauth://totp/${encIssuer}:${encodeURIComponent(userid)}` +
    `?secret=${secret}&period=30&digits=6&algorithm=SHA1&issuer=${encIssuer}`
  );
}
