import type { FormValues } from '@/components/shared/formContext';
import type { AclListItem, ApiToken, PermissionMap, RoleInfo, User, UserWithTokens } from '@/types/access';
import { deleteEmptyValues } from '@/utils/forms';
import { epochToInputValue, inputValueToEpoch, renderEpochShort } from '@/utils/format';

export const aclKey = (item: AclListItem) => `${item.path} for ${item.ugid} - ${item.roleid}`;

/** `user@realm` split into its parts; ids without realm keep an empty realm. */
export function splitUserRealm(userid: string): { username: string; realm: string } {
  const pos = userid.lastIndexOf('@');
  if (pos < 0) return { username: userid, realm: '' };
  return { username: userid.slice(0, pos), realm: userid.slice(pos + 1) };
}

export function userFullName(user: Pick<User, 'firstname' | 'lastname'>): string {
  return [user.firstname, user.lastname].filter((part) => part).join(' ');
}

export const expireText = (expire: number | undefined) => (expire ? renderEpochShort(expire) : 'never');

/** Expire sorter: `never` (0 or missing) sorts first. */
export const compareExpire = (a: number | undefined, b: number | undefined) => (a || 0) - (b || 0);

export function tfaLockText(user: User, now = Date.now() / 1000): string {
  const until = user['tfa-locked-until'];
  if (until !== undefined && until > now) return `until ${renderEpochShort(until)}`;
  if (user['totp-locked']) return 'TOTP';
  return '';
}

export function flattenTokens(users: readonly UserWithTokens[]): ApiToken[] {
  return users.flatMap((user) => user.tokens ?? []);
}

export interface AuthidOptions {
  includeUsers?: boolean;
  includeTokens?: boolean;
}

/** Sorted user and/or token ids for the auth id selector. */
export function authidList(users: readonly UserWithTokens[], options: AuthidOptions = {}): string[] {
  const includeUsers = options.includeUsers ?? true;
  const includeTokens = options.includeTokens ?? true;
  const ids: string[] = [];
  for (const user of users) {
    if (includeUsers) ids.push(user.userid);
    if (includeTokens) ids.push(...(user.tokens ?? []).map((token) => token.tokenid));
  }
  return ids.sort((a, b) => a.localeCompare(b));
}

export function sortRoles(roles: readonly RoleInfo[]): RoleInfo[] {
  return [...roles].sort((a, b) => a.roleid.localeCompare(b.roleid));
}

export function roleLabel(role: RoleInfo): string {
  return role.comment ? `${role.roleid} (${role.comment})` : role.roleid;
}

export const passwordMismatch = (values: FormValues): string | null => {
  const password = values.password ?? '';
  const confirm = values.confirm_password ?? '';
  return confirm !== '' && password !== confirm ? 'Passwords do not match!' : null;
};

/** Replace an epoch `expire` by the value of a date-time input. */
export function expireToForm(data: Record<string, unknown>): Record<string, unknown> {
  const expire = data.expire;
  return { ...data, expire: typeof expire === 'number' && expire > 0 ? epochToInputValue(expire) : '' };
}

const text = (value: unknown) => (typeof value === 'string' ? value.trim() : '');

export function userCreateData(values: FormValues): Record<string, unknown> {
  const { username, realm, confirm_password: _confirm, expire, ...rest } = values;
  const data: Record<string, unknown> = { ...rest, userid: `${text(username)}@${text(realm)}` };
  const epoch = inputValueToEpoch(text(expire));
  if (epoch !== null) data.expire = epoch;
  return deleteEmptyValues(data, ['firstname', 'lastname', 'email', 'comment', 'password'], false);
}

const USER_EDIT_KEYS = ['enable', 'firstname', 'lastname', 'email', 'comment', 'digest'] as const;

export function userUpdateData(values: FormValues): Record<string, unknown> {
  const data: Record<string, unknown> = {};
  for (const key of USER_EDIT_KEYS) {
    if (key in values) data[key] = values[key];
  }
  data.expire = inputValueToEpoch(text(values.expire)) ?? 0;
  return deleteEmptyValues(data, ['firstname', 'lastname', 'email', 'comment'], true);
}

export function tokenSubmitData(values: FormValues, create: boolean): Record<string, unknown> {
  const data: Record<string, unknown> = {};
  for (const key of ['enable', 'comment', 'privsep', 'digest']) {
    if (key in values) data[key] = values[key];
  }
  const epoch = inputValueToEpoch(text(values.expire));
  if (create) {
    if (epoch !== null) data.expire = epoch;
    return deleteEmptyValues(data, ['comment'], false);
  }
  data.expire = epoch ?? 0;
  return data;
}

export interface PermissionNode {
  path: string;
  name: string;
  children: PermissionNode[];
  permissions: Array<{ name: string; propagate: boolean }>;
}

/** Build the `/` rooted path tree; children and permissions sorted by name. */
export function buildPermissionTree(map: PermissionMap): PermissionNode {
  const root: PermissionNode = { path: '/', name: '/', children: [], permissions: [] };

  for (const [path, perms] of Object.entries(map)) {
    let node = root;
    for (const component of path.split('/').filter((part) => part)) {
      let child = node.children.find((candidate) => candidate.name === component);
      if (!child) {
        const childPath = node.path === '/' ? `/${component}` : `${node.path}/${component}`;
        child = { path: childPath, name: component, children: [], permissions: [] };
        node.children.push(child);
      }
      node = child;
    }
    for (const [name, propagate] of Object.entries(perms)) node.permissions.push({ name, propagate });
  }

  const sortNode = (node: PermissionNode) => {
    node.children.sort((a, b) => a.name.localeCompare(b.name));
    node.permissions.sort((a, b) => a.name.localeCompare(b.name));
    node.children.forEach(sortNode);
  };
  sortNode(root);
  return root;
}

export type PermissionRow =
  | { kind: 'path'; key: string; depth: number; node: PermissionNode }
  | { kind: 'permission'; key: string; depth: number; name: string; propagate: boolean };

/** Visible rows of the tree; `collapsed` holds the paths whose children are hidden. */
export function permissionRows(root: PermissionNode, collapsed: ReadonlySet<string> = new Set()): PermissionRow[] {
  const rows: PermissionRow[] = [];
  const visit = (node: PermissionNode, depth: number) => {
    rows.push({ kind: 'path', key: node.path, depth, node });
    if (collapsed.has(node.path)) return;
    for (const perm of node.permissions) {
      rows.push({
        kind: 'permission',
        key: `${perm.name}|${node.path}`,
        depth: depth + 1,
        name: perm.name,
        propagate: perm.propagate,
      });
    }
    for (const child of node.children) visit(child, depth + 1);
  };
  visit(root, 0);
  return rows;
}
