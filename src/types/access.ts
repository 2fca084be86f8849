// Access control API types (`/access/...`)

import type { TfaChallenge } from '@/types/tfa';

export type AclUgidType = 'user' | 'group';

export interface AclListItem {
  path: string;
  ugid: string;
  ugid_type: AclUgidType;
  roleid: string;
  propagate: boolean;
}

export interface AclUpdate {
  path: string;
  role: string;
  propagate?: boolean;
  'auth-id'?: string;
  group?: string;
  delete?: boolean;
}

export interface ApiToken {
  tokenid: string;
  comment?: string;
  enable?: boolean;
  /** Epoch seconds, 0 or missing for never. */
  expire?: number;
}

export interface User {
  userid: string;
  comment?: string;
  enable?: boolean;
  expire?: number;
  firstname?: string;
  lastname?: string;
  email?: string;
  'totp-locked'?: boolean;
  'tfa-locked-until'?: number;
}

export interface UserWithTokens extends User {
  tokens?: ApiToken[];
}

/** Result of creating a token or regenerating its secret. */
export interface TokenSecret {
  tokenid: string;
  value: string;
}

export interface BasicRealmInfo {
  realm: string;
  type: string;
  comment?: string;
  default?: boolean;
}

export interface RoleInfo {
  roleid: string;
  privs?: string[] | string;
  comment?: string;
}

/** `path -> privilege -> propagate` */
export type PermissionMap = Record<string, Record<string, boolean>>;

/** Raw data of a successful `/access/ticket` call. */
export interface TicketResponse {
  username: string;
  ticket: string;
  CSRFPreventionToken?: string;
  cap?: Record<string, unknown>;
  NeedTFA?: boolean | number;
}

export interface SecondFactorChallenge {
  userid: string;
  /** The partial ticket, sent back as `tfa-challenge`. */
  ticket: string;
  challenge: TfaChallenge;
}

export type LoginResult =
  | { kind: 'authenticated'; userid: string; ticket: string; csrfToken: string; cap?: Record<string, unknown> }
  | { kind: 'tfa'; challenge: SecondFactorChallenge };

export type TfaResponse =
  | { type: 'totp'; code: string }
  | { type: 'yubico'; otp: string }
  | { type: 'recovery'; key: string }
  | { type: 'webauthn'; response: string };
