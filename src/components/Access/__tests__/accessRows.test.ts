import { describe, expect, it } from 'vitest';
import type { UserWithTokens } from '@/types/access';
import { renderEpochShort } from '@/utils/format';
import {
  aclKey,
  authidList,
  buildPermissionTree,
  compareExpire,
  expireText,
  expireToForm,
  flattenTokens,
  passwordMismatch,
  permissionRows,
  roleLabel,
  sortRoles,
  splitUserRealm,
  tfaLockText,
  tokenSubmitData,
  userCreateData,
  userFullName,
  userUpdateData,
} from '../accessRows';

const users: UserWithTokens[] = [
  { userid: 'root@pam' },
  {
    userid: 'alice@pbs',
    tokens: [{ tokenid: 'alice@pbs!ci' }, { tokenid: 'alice@pbs!backup' }],
  },
];

describe('user rows', () => {
  it('splits user ids at the last @', () => {
    expect(splitUserRealm('john@example.com@ldap1')).toEqual({ username: 'john@example.com', realm: 'ldap1' });
    expect(splitUserRealm('root')).toEqual({ username: 'root', realm: '' });
  });

  it('joins the present name parts', () => {
    expect(userFullName({ firstname: 'Alice', lastname: 'Smith' })).toBe('Alice Smith');
    expect(userFullName({ lastname: 'Smith' })).toBe('Smith');
    expect(userFullName({})).toBe('');
  });

  it('renders never for missing expiry and sorts it first', () => {
    expect(expireText(0)).toBe('never');
    expect(expireText(undefined)).toBe('never');
    expect(expireText(1_700_000_000)).toBe(renderEpochShort(1_700_000_000));
    expect([300, 0, 100].sort(compareExpire)).toEqual([0, 100, 300]);
    expect(compareExpire(undefined, 100)).toBeLessThan(0);
  });

  it('describes TFA locks', () => {
    const now = 1_700_000_000;
    expect(tfaLockText({ userid: 'a@pbs', 'tfa-locked-until': now + 30 }, now)).toBe(
      `until ${renderEpochShort(now + 30)}`,
    );
    expect(tfaLockText({ userid: 'a@pbs', 'tfa-locked-until': now - 30, 'totp-locked': true }, now)).toBe('TOTP');
    expect(tfaLockText({ userid: 'a@pbs' }, now)).toBe('');
  });

  it('keys ACL entries by path, subject and role', () => {
    expect(
      aclKey({ path: '/datastore/store1', ugid: 'alice@pbs', ugid_type: 'user', roleid: 'DatastoreReader', propagate: true }),
    ).toBe('/datastore/store1 for alice@pbs - DatastoreReader');
  });
});

describe('auth ids and roles', () => {
  it('collects tokens of all users', () => {
    expect(flattenTokens(users).map((token) => token.tokenid)).toEqual(['alice@pbs!ci', 'alice@pbs!backup']);
  });

  it('lists users and tokens sorted', () => {
    expect(authidList(users)).toEqual(['alice@pbs', 'alice@pbs!backup', 'alice@pbs!ci', 'root@pam']);
    expect(authidList(users, { includeTokens: false })).toEqual(['alice@pbs', 'root@pam']);
    expect(authidList(users, { includeUsers: false })).toEqual(['alice@pbs!backup', 'alice@pbs!ci']);
  });

  it('sorts roles without touching the input', () => {
    const roles = [{ roleid: 'NoAccess' }, { roleid: 'Admin', comment: 'Administrator' }];
    expect(sortRoles(roles).map((role) => role.roleid)).toEqual(['Admin', 'NoAccess']);
    expect(roles[0].roleid).toBe('NoAccess');
    expect(roleLabel(roles[1])).toBe('Admin (Administrator)');
    expect(roleLabel(roles[0])).toBe('NoAccess');
  });
});

describe('user and token submit data', () => {
  it('flags differing password confirmation', () => {
    expect(passwordMismatch({ password: 'test-secret', confirm_password: 'test-secre' })).toBe(
      'Passwords do not match!',
    );
    expect(passwordMismatch({ password: 'test-secret', confirm_password: '' })).toBeNull();
    expect(passwordMismatch({ password: 'test-secret', confirm_password: 'test-secret' })).toBeNull();
  });

  it('converts expire to an input value', () => {
    const epoch = Math.floor(new Date(2024, 0, 15, 10, 30).getTime() / 1000);
    expect(expireToForm({ userid: 'a@pbs', expire: epoch })).toEqual({ userid: 'a@pbs', expire: '2024-01-15T10:30' });
    expect(expireToForm({ userid: 'a@pbs', expire: 0 })).toEqual({ userid: 'a@pbs', expire: '' });
  });

  it('builds the create parameters', () => {
    expect(
      userCreateData({
        username: ' alice ',
        realm: 'pbs',
        password: 'test-secret',
        confirm_password: 'test-secret',
        firstname: '',
        email: 'alice@example.com',
        enable: true,
        expire: '',
      }),
    ).toEqual({ userid: 'alice@pbs', password: 'test-secret', email: 'alice@example.com', enable: true });
  });

  it('sends the expire epoch on create', () => {
    const epoch = Math.floor(new Date(2024, 0, 15, 10, 30).getTime() / 1000);
    expect(userCreateData({ username: 'bob', realm: 'pbs', expire: '2024-01-15T10:30' })).toEqual({
      userid: 'bob@pbs',
      expire: epoch,
    });
  });

  it('deletes cleared fields on update', () => {
    expect(
      userUpdateData({
        userid: 'alice@pbs',
        enable: false,
        firstname: 'Alice',
        lastname: '',
        comment: 'ops',
        digest: 'abc',
        expire: '',
      }),
    ).toEqual({
      enable: false,
      firstname: 'Alice',
      comment: 'ops',
      digest: 'abc',
      expire: 0,
      delete: ['lastname', 'email'],
    });
  });

  it('builds token parameters', () => {
    expect(tokenSubmitData({ tokenname: 'ci', comment: '', enable: true, expire: '' }, true)).toEqual({ enable: true });
    expect(tokenSubmitData({ comment: 'nightly', expire: '' }, false)).toEqual({ comment: 'nightly', expire: 0 });
  });
});

describe('permission tree', () => {
  const tree = buildPermissionTree({
    '/datastore/store1': { 'Datastore.Backup': false, 'Datastore.Audit': true },
    '/': { 'Sys.Audit': false },
    '/datastore': {},
  });

  it('nests paths below the root', () => {
    expect(tree.permissions).toEqual([{ name: 'Sys.Audit', propagate: false }]);
    expect(tree.children.map((child) => child.path)).toEqual(['/datastore']);
    expect(tree.children[0].children[0].permissions.map((perm) => perm.name)).toEqual([
      'Datastore.Audit',
      'Datastore.Backup',
    ]);
  });

  it('lists the visible rows depth first', () => {
    expect(permissionRows(tree).map((row) => [row.key, row.depth])).toEqual([
      ['/', 0],
      ['Sys.Audit|/', 1],
      ['/datastore', 1],
      ['/datastore/store1', 2],
      ['Datastore.Audit|/datastore/store1', 3],
      ['Datastore.Backup|/datastore/store1', 3],
    ]);
  });

  it('hides the children of collapsed paths', () => {
    expect(permissionRows(tree, new Set(['/datastore'])).map((row) => row.key)).toEqual([
      '/',
      'Sys.Audit|/',
      '/datastore',
    ]);
  });
});
