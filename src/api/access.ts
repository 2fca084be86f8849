import {
  httpDelete,
  httpGet,
  httpGetFull,
  httpPost,
  httpPostForm,
  httpPut,
  setAuth,
} from '@/utils/apiClient';
import { parseTicket } from '@/utils/ticket';
import type {
  AclListItem,
  AclUpdate,
  ApiToken,
  BasicRealmInfo,
  LoginResult,
  PermissionMap,
  SecondFactorChallenge,
  RoleInfo,
  TfaResponse,
  TicketResponse,
  TokenSecret,
  User,
  UserWithTokens,
} from '@/types/access';
import type { ApiResponseData, QueryParams, RequestData } from '@/types/api';

const enc = encodeURIComponent;

const userUrl = (userid: string) => `/access/users/${enc(userid)}`;
const tokenUrl = (userid: string, tokenname: string) => `${userUrl(userid)}/token/${enc(tokenname)}`;

/** `user@realm!token` split into its user and token name. */
export function splitTokenId(tokenid: string): { userid: string; tokenname: string } | null {
  const pos = tokenid.lastIndexOf('!');
  if (pos <= 0 || pos === tokenid.length - 1) return null;
  return { userid: tokenid.slice(0, pos), tokenname: tokenid.slice(pos + 1) };
}

function ticketResult(data: TicketResponse): LoginResult {
  const parsed = parseTicket(data.ticket);
  if (parsed?.tfaChallenge) {
    return {
      kind: 'tfa',
      challenge: { userid: data.username, ticket: data.ticket, challenge: parsed.tfaChallenge },
    };
  }
  if (!data.CSRFPreventionToken) {
    throw new Error('missing CSRF prevention token in ticket response');
  }
  return {
    kind: 'authenticated',
    userid: data.username,
    ticket: data.ticket,
    csrfToken: data.CSRFPreventionToken,
    cap: data.cap,
  };
}

function establish(result: LoginResult): LoginResult {
  if (result.kind === 'authenticated') {
    setAuth({ userid: result.userid, ticket: result.ticket, csrfToken: result.csrfToken, cap: result.cap });
  }
  return result;
}

/** The `password` value that answers a second factor challenge. */
export function tfaResponsePassword(response: TfaResponse): string {
  switch (response.type) {
    case 'totp':
      return `totp:${response.code}`;
    case 'yubico':
      return `yubico:${response.otp}`;
    case 'recovery':
      return `recovery:${response.key}`;
    case 'webauthn':
      return `webauthn:${response.response}`;
  }
}

/**
 * First login step. Returns the session (and stores it in the client) or the
 * second factor challenge to answer with {@link completeTfa}.
 */
export async function login(username: string, realm: string, password: string): Promise<LoginResult> {
  const data = await httpPostForm<TicketResponse>('/access/ticket', {
    username: `${username}@${realm}`,
    password,
  });
  return establish(ticketResult(data));
}

export async function completeTfa(challenge: SecondFactorChallenge, response: TfaResponse): Promise<LoginResult> {
  const data = await httpPostForm<TicketResponse>('/access/ticket', {
    username: challenge.userid,
    password: tfaResponsePassword(response),
    'tfa-challenge': challenge.ticket,
  });
  const result = ticketResult(data);
  if (result.kind === 'tfa') throw new Error('second factor was not accepted');
  return establish(result);
}

/** Renew a ticket: the old ticket is the password. */
export async function refreshTicket(userid: string, ticket: string): Promise<LoginResult> {
  const data = await httpPostForm<TicketResponse>('/access/ticket', { username: userid, password: ticket });
  return establish(ticketResult(data));
}

export const openidAuthUrl = (realm: string, redirectUrl: string) =>
  httpPost<string>('/access/openid/auth-url', { realm, 'redirect-url': redirectUrl });

export async function openidLogin(state: string, code: string, redirectUrl: string): Promise<LoginResult> {
  const data = await httpPost<TicketResponse & { 'ticket-info'?: string }>('/access/openid/login', {
    state,
    code,
    'redirect-url': redirectUrl,
  });
  const ticket = data.ticket || data['ticket-info'];
  if (!ticket) throw new Error('neither ticket nor ticket-info in openid login response');
  return establish(ticketResult({ ...data, ticket }));
}

/** `state` and `code` from an OpenID redirect, if present. */
export function openidRedirectParams(search = window.location.search): { state: string; code: string } | null {
  const params = new URLSearchParams(search);
  const state = params.get('state');
  const code = params.get('code');
  return state && code ? { state, code } : null;
}

export class AccessAPI {
  // ACL
  static async listAcl(path?: string): Promise<AclListItem[]> {
    return httpGet<AclListItem[]>('/access/acl', path ? { path } : undefined);
  }

  static async updateAcl(update: AclUpdate): Promise<unknown> {
    return httpPut('/access/acl', { ...update });
  }

  static async removeAcl(item: AclListItem): Promise<unknown> {
    return httpPut('/access/acl', {
      delete: true,
      path: item.path,
      role: item.roleid,
      ...(item.ugid_type === 'group' ? { group: item.ugid } : { 'auth-id': item.ugid }),
    });
  }

  // Users
  static async listUsers(includeTokens = false): Promise<UserWithTokens[]> {
    return httpGet<UserWithTokens[]>('/access/users', includeTokens ? { include_tokens: true } : undefined);
  }

  static async getUser(userid: string): Promise<ApiResponseData<User>> {
    return httpGetFull<User>(userUrl(userid));
  }

  static async createUser(data: RequestData): Promise<unknown> {
    return httpPost('/access/users', data);
  }

  static async updateUser(userid: string, data: RequestData): Promise<unknown> {
    return httpPut(userUrl(userid), data);
  }

  static async deleteUser(userid: string): Promise<unknown> {
    return httpDelete(userUrl(userid));
  }

  static async changePassword(userid: string, password: string): Promise<unknown> {
    return httpPut('/access/password', { userid, password });
  }

  static async unlockTfa(userid: string): Promise<unknown> {
    return httpPut(`${userUrl(userid)}/unlock-tfa`);
  }

  // API tokens
  static async listTokens(): Promise<ApiToken[]> {
    const users = await httpGet<UserWithTokens[]>('/access/users', { include_tokens: true });
    return users.flatMap((user) => user.tokens ?? []);
  }

  static async getToken(userid: string, tokenname: string): Promise<ApiResponseData<RequestData>> {
    return httpGetFull<RequestData>(tokenUrl(userid, tokenname));
  }

  static async createToken(userid: string, tokenname: string, data: RequestData): Promise<TokenSecret> {
    return httpPost<TokenSecret>(tokenUrl(userid, tokenname), data);
  }

  static async updateToken(userid: string, tokenname: string, data: RequestData): Promise<unknown> {
    return httpPut(tokenUrl(userid, tokenname), data);
  }

  static async regenerateToken(userid: string, tokenname: string): Promise<TokenSecret> {
    return httpPut<TokenSecret>(tokenUrl(userid, tokenname), { regenerate: true });
  }

  static async deleteToken(userid: string, tokenname: string): Promise<unknown> {
    return httpDelete(tokenUrl(userid, tokenname));
  }

  // Realms
  static async listDomains(base = '/access/domains'): Promise<BasicRealmInfo[]> {
    return httpGet<BasicRealmInfo[]>(base);
  }

  static async getDomain(realm: string, base = '/access/domains'): Promise<ApiResponseData<RequestData>> {
    return httpGetFull<RequestData>(`${base}/${enc(realm)}`);
  }

  static async createDomain(data: RequestData, base = '/access/domains'): Promise<unknown> {
    return httpPost(base, data);
  }

  static async updateDomain(realm: string, data: RequestData, base = '/access/domains'): Promise<unknown> {
    return httpPut(`${base}/${enc(realm)}`, data);
  }

  static async deleteDomain(realm: string, base = '/access/domains'): Promise<unknown> {
    return httpDelete(`${base}/${enc(realm)}`);
  }

  /** Returns the UPID of the sync task. */
  static async syncDomain(realm: string, base = '/access/domains'): Promise<string> {
    return httpPost<string>(`${base}/${enc(realm)}/sync`);
  }

  // Roles and permissions
  static async listRoles(): Promise<RoleInfo[]> {
    return httpGet<RoleInfo[]>('/access/roles');
  }

  static async permissions(authId?: string, base = '/access/permissions'): Promise<PermissionMap> {
    const params: QueryParams | undefined = authId ? { 'auth-id': authId } : undefined;
    return httpGet<PermissionMap>(base, params);
  }
}
