import { describe, expect, it } from 'vitest';
import { LDAP_DELETABLE_KEYS, ldapConfigToForm, ldapFormToConfig, realmUpdateData } from '../authRealm';

describe('ldapConfigToForm', () => {
  it('splits the sync property strings into fields', () => {
    expect(
      ldapConfigToForm({
        realm: 'corp',
        type: 'ldap',
        'bind-dn': 'cn=admin,dc=example,dc=com',
        port: 389,
        'sync-defaults-options': 'enable-new=1,remove-vanished=acl;entry',
        'sync-attributes': 'email=mail,firstname=givenName',
      }),
    ).toEqual({
      realm: 'corp',
      type: 'ldap',
      'bind-dn': 'cn=admin,dc=example,dc=com',
      port: 389,
      anonymous_search: false,
      'enable-new': 'true',
      'remove-vanished-acl': true,
      'remove-vanished-entry': true,
      email: 'mail',
      firstname: 'givenName',
    });
  });

  it('treats a realm without bind dn as anonymous', () => {
    expect(ldapConfigToForm({ realm: 'corp' }).anonymous_search).toBe(true);
  });
});

describe('ldapFormToConfig', () => {
  it('joins the sync fields and drops credentials for anonymous search', () => {
    expect(
      ldapFormToConfig({
        realm: 'corp',
        anonymous_search: true,
        'bind-dn': 'cn=admin',
        password: 'test-secret',
        'enable-new': 'false',
        'remove-vanished-acl': true,
        'remove-vanished-entry': false,
        'remove-vanished-properties': true,
        email: ' mail ',
        lastname: '',
        comment: '',
      }),
    ).toEqual({
      realm: 'corp',
      'sync-defaults-options': 'enable-new=false,remove-vanished=acl;properties',
      'sync-attributes': 'email=mail',
    });
  });

  it('keeps the bind credentials otherwise', () => {
    expect(ldapFormToConfig({ realm: 'corp', anonymous_search: false, 'bind-dn': 'cn=admin', password: 'test-secret' })).toEqual({
      realm: 'corp',
      'bind-dn': 'cn=admin',
      password: 'test-secret',
    });
  });
});

describe('realmUpdateData', () => {
  it('moves realm and type out and deletes empty optional keys', () => {
    const data = realmUpdateData(
      { realm: 'corp', type: 'ldap', server1: 'ldap.example.com', comment: '', digest: 'abc123' },
      LDAP_DELETABLE_KEYS,
    );
    expect(data).toEqual({
      server1: 'ldap.example.com',
      digest: 'abc123',
      delete: [
        'comment',
        'server2',
        'port',
        'mode',
        'verify',
        'user-classes',
        'filter',
        'sync-attributes',
        'sync-defaults-options',
      ],
    });
  });
});
