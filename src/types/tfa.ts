/** Second factors offered by a TFA challenge ticket. */
export interface TfaChallenge {
  totp: boolean;
  yubico: boolean;
  /** Indices of the recovery keys that are still unused. */
  recovery: number[];
  webauthn?: Record<string, unknown>;
}

export type TfaType = 'totp' | 'u2f' | 'webauthn' | 'recovery' | 'yubico';

export interface TfaInfo {
  id: string;
  description: string;
  created: number;
  enable: boolean;
}

export interface TypedTfaInfo extends TfaInfo {
  type: TfaType;
}

export interface TfaUser {
  userid: string;
  entries: TypedTfaInfo[];
  'tfa-locked-until'?: number;
  'totp-locked'?: boolean;
}

/** One row of the TFA overview, flattened from {@link TfaUser}. */
export interface TfaEntry {
  fullId: string;
  userId: string;
  entryId: string;
  type: TfaType;
  description: string;
  created: number;
  enable: boolean;
  locked: boolean;
}

export interface TfaUpdateInfo {
  id?: string;
  challenge?: string;
  recovery?: string[];
}

export type TfaFactor = 'totp' | 'yubico' | 'recovery' | 'webauthn';
