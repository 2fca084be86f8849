import { describe, expect, it } from 'vitest';
import { loginErrorText, splitUserid } from '../LoginPanel';
import { realmLabel, sortRealms } from '../RealmSelector';
import { recoveryKeyWarning } from '../TfaDialog';

describe('login helpers', () => {
  it('splits user ids with a realm', () => {
    expect(splitUserid('root@pam')).toEqual({ username: 'root', realm: 'pam' });
    expect(splitUserid('john@example.com@ldap1')).toEqual({ username: 'john@example.com', realm: 'ldap1' });
    expect(splitUserid('root')).toBeNull();
    expect(splitUserid('@pam')).toBeNull();
    expect(splitUserid('root@')).toBeNull();
  });

  it('formats login errors', () => {
    expect(loginErrorText('authentication failure')).toBe('Login failed. Please try again (authentication failure)');
  });

  it('puts the default realm first', () => {
    const realms = sortRealms([
      { realm: 'pbs', type: 'pbs', comment: 'Proxmox Backup authentication server' },
      { realm: 'ldap1', type: 'ldap' },
      { realm: 'pam', type: 'pam', default: true, comment: 'Linux PAM standard authentication' },
    ]);

    expect(realms.map((realm) => realm.realm)).toEqual(['pam', 'ldap1', 'pbs']);
    expect(realmLabel(realms[0])).toBe('Linux PAM standard authentication (pam)');
    expect(realmLabel(realms[1])).toBe('ldap1');
  });

  it('warns when few recovery keys remain', () => {
    expect(recoveryKeyWarning(Array.from({ length: 14 }, (_, i) => i))).toBeNull();
    expect(recoveryKeyWarning([0, 4, 7])).toBe(
      'Less than 4 recovery keys available. Please generate a new set after login!',
    );
  });
});
