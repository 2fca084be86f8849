import { describe, expect, it } from 'vitest';
import { randomizeSecret, totpLink, validateSecret } from '../totp';

describe('totp helpers', () => {
  it('generates base32 secrets of the requested length', () => {
    const secret = randomizeSecret(16);
    expect(secret).toHaveLength(16);
    expect(secret).toMatch(/^[A-Z2-7]+$/);
    expect(randomizeSecret()).toHaveLength(32);
  });

  it('validates base32 input', () => {
    expect(validateSecret('JBSWY3DPEHPK3PXP')).toBeNull();
    expect(validateSecret('jbswy3dp')).toBe('Must be base32 [A-Z2-7=]');
    expect(validateSecret('')).toBe('Must be base32 [A-Z2-7=]');
  });

  it('builds an otpauth link', () => {
    expect(totpLink('Proxmox Backup Server', 'root@pam', 'JBSWY3DPEHPK3PXP')).toBe(
      'otpauth://totp/Proxmox%20Backup%20Server:root%40pam?secret=JBSWY3DPEHPK3PXP&period=30&digits=6&algorithm=SHA1&issuer=Proxmox%20Backup%20Server',
    );
  });
});
