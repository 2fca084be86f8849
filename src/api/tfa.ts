import { httpDelete, httpGet, httpGetFull, httpPost, httpPut } from '@/utils/apiClient';
import type { ApiResponseData } from '@/types/api';
import type { TfaEntry, TfaType, TfaUpdateInfo, TfaUser, TypedTfaInfo } from '@/types/tfa';
import { encodeAttestationResponse, prepareRegistrationChallenge } from '@/utils/webauthn';
import { totpLink } from '@/utils/totp';

export const DEFAULT_TFA_BASE_URL = '/access/tfa';

const enc = encodeURIComponent;

/**
 * Flatten per-user TFA data into table rows, sorted by user and type.
 * An entry is locked when the whole user is locked, or it is a TOTP entry and
 * TOTP is locked.
 */
export function flattenTfaUsers(users: readonly TfaUser[], now = Date.now() / 1000): TfaEntry[] {
  const list: TfaEntry[] = [];
  for (const user of users) {
    const tfaLocked = user['tfa-locked-until'] !== undefined && user['tfa-locked-until'] > now;
    const totpLocked = user['totp-locked'] === true;
    for (const entry of user.entries) {
      list.push({
        fullId: `${user.userid}/${entry.id}`,
        userId: user.userid,
        entryId: entry.id,
        type: entry.type,
        description: entry.description,
        created: entry.created,
        enable: entry.enable,
        locked: tfaLocked || (entry.type === 'totp' && totpLocked),
      });
    }
  }
  return list.sort((a, b) => a.userId.localeCompare(b.userId) || a.type.localeCompare(b.type));
}

/** Column text for the enabled state. */
export const tfaEnabledText = (entry: Pick<TfaEntry, 'locked' | 'enable'>): string =>
  entry.locked ? 'Locked' : entry.enable ? 'Yes' : 'No';

export const isEditableTfaType = (type: TfaType) => type !== 'recovery';

export interface AddTotpInput {
  userid: string;
  description: string;
  issuer: string;
  secret: string;
  /** Current code from the authenticator app. */
  value: string;
  password?: string;
}

const withPassword = (data: Record<string, unknown>, password?: string) =>
  password ? { ...data, password } : data;

export class TfaAPI {
  static async list(baseUrl = DEFAULT_TFA_BASE_URL, now?: number): Promise<TfaEntry[]> {
    return flattenTfaUsers(await httpGet<TfaUser[]>(baseUrl), now);
  }

  static async get(userid: string, id: string, baseUrl = DEFAULT_TFA_BASE_URL): Promise<ApiResponseData<TypedTfaInfo>> {
    return httpGetFull<TypedTfaInfo>(`${baseUrl}/${enc(userid)}/${enc(id)}`);
  }

  static async update(
    userid: string,
    id: string,
    data: { description?: string; enable?: boolean; password?: string },
    baseUrl = DEFAULT_TFA_BASE_URL,
  ): Promise<unknown> {
    return httpPut(`${baseUrl}/${enc(userid)}/${enc(id)}`, data);
  }

  static async remove(userid: string, id: string, password?: string, baseUrl = DEFAULT_TFA_BASE_URL): Promise<unknown> {
    return httpDelete(`${baseUrl}/${enc(userid)}/${enc(id)}`, password ? { password } : undefined);
  }

  static async addTotp(input: AddTotpInput, baseUrl = DEFAULT_TFA_BASE_URL): Promise<TfaUpdateInfo> {
    return httpPost<TfaUpdateInfo>(
      `${baseUrl}/${enc(input.userid)}`,
      withPassword(
        {
          type: 'totp',
          description: input.description,
          totp: totpLink(input.issuer, input.userid, input.secret),
          value: input.value,
        },
        input.password,
      ),
    );
  }

  /** Returns the freshly generated recovery keys. */
  static async addRecovery(userid: string, password?: string, baseUrl = DEFAULT_TFA_BASE_URL): Promise<string[]> {
    const info = await httpPost<TfaUpdateInfo>(`${baseUrl}/${enc(userid)}`, withPassword({ type: 'recovery' }, password));
    return info.recovery ?? [];
  }

  /**
   * Register a WebAuthn device: request a challenge, let the authenticator
   * create a credential, then send the attestation back.
   */
  static async addWebauthn(
    userid: string,
    description: string,
    password?: string,
    baseUrl = DEFAULT_TFA_BASE_URL,
    credentials: Pick<CredentialsContainer, 'create'> = navigator.credentials,
  ): Promise<void> {
    const url = `${baseUrl}/${enc(userid)}`;
    const update = await httpPost<TfaUpdateInfo>(url, withPassword({ type: 'webauthn', description }, password));
    if (!update.challenge) throw new Error('missing webauthn challenge in response');

    const prepared = prepareRegistrationChallenge(update.challenge);
    const credential = await credentials.create(prepared.options);

    await httpPost<TfaUpdateInfo>(
      url,
      withPassword(
        { type: 'webauthn', challenge: prepared.challenge, value: encodeAttestationResponse(credential) },
        password,
      ),
    );
  }
}
