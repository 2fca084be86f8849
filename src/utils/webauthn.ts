// WebAuthn helpers: the server sends challenges with base64url encoded
// binary members, the browser API wants ArrayBuffers.

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export function base64UrlToBuffer(text: string): ArrayBuffer {
  const normalized = text.replace(/-/g, '+').replace(/_/g, '/');
  const padded = normalized + '='.repeat((4 - (normalized.length % 4)) % 4);
  const binary = atob(padded);
  const buffer = new ArrayBuffer(binary.length);
  const view = new Uint8Array(buffer);
  for (let i = 0; i < binary.length; i++) view[i] = binary.charCodeAt(i);
  return buffer;
}

/** base64url without padding */
export function bufferToBase64Url(buffer: ArrayBuffer | ArrayBufferView): string {
  const bytes =
    buffer instanceof ArrayBuffer
      ? new Uint8Array(buffer)
      : new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  let binary = '';
  for (const byte of bytes) binary += String.fromCharCode(byte);
  return btoa(binary).replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

function requireString(record: Record<string, unknown>, key: string, context: string): string {
  const value = record[key];
  if (typeof value !== 'string') throw new Error(`missing '${context}.${key}' value in webauthn challenge`);
  return value;
}

function requireRecord(record: Record<string, unknown>, key: string, context: string): Record<string, unknown> {
  const value = record[key];
  if (!isRecord(value)) throw new Error(`missing '${context}.${key}' value in webauthn challenge`);
  return value;
}

function credentialDescriptors(value: unknown): PublicKeyCredentialDescriptor[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).map((cred) => ({
    type: 'public-key' as const,
    id: base64UrlToBuffer(requireString(cred, 'id', 'credential')),
  }));
}

const USER_VERIFICATION: readonly UserVerificationRequirement[] = ['discouraged', 'preferred', 'required'];
const ATTESTATION: readonly AttestationConveyancePreference[] = ['direct', 'enterprise', 'indirect', 'none'];

function pick<T extends string>(allowed: readonly T[], value: unknown): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

export interface PreparedChallenge<T> {
  options: T;
  /** The challenge as sent by the server, echoed back in the response. */
  challenge: string;
}

/** Turn a login challenge into options for `navigator.credentials.get`. */
export function prepareAssertionChallenge(raw: unknown): PreparedChallenge<CredentialRequestOptions> {
  const value: unknown = typeof raw === 'string' ? JSON.parse(raw) : raw;
  if (!isRecord(value)) throw new Error('invalid webauthn challenge');
  const publicKey = requireRecord(value, 'publicKey', 'challenge');
  const challenge = requireString(publicKey, 'challenge', 'publicKey');

  return {
    challenge,
    options: {
      publicKey: {
        challenge: base64UrlToBuffer(challenge),
        allowCredentials: credentialDescriptors(publicKey.allowCredentials),
        timeout: optionalNumber(publicKey.timeout),
        rpId: typeof publicKey.rpId === 'string' ? publicKey.rpId : undefined,
        userVerification: pick(USER_VERIFICATION, publicKey.userVerification),
      },
    },
  };
}

/** Turn a registration challenge into options for `navigator.credentials.create`. */
export function prepareRegistrationChallenge(raw: unknown): PreparedChallenge<CredentialCreationOptions> {
  const value: unknown = typeof raw === 'string' ? JSON.parse(raw) : raw;
  if (!isRecord(value)) throw new Error('invalid webauthn registration challenge');
  const publicKey = requireRecord(value, 'publicKey', 'challenge');
  const challenge = requireString(publicKey, 'challenge', 'publicKey');
  const user = requireRecord(publicKey, 'user', 'publicKey');
  const rp = requireRecord(publicKey, 'rp', 'publicKey');

  const params = Array.isArray(publicKey.pubKeyCredParams) ? publicKey.pubKeyCredParams.filter(isRecord) : [];
  const selection = isRecord(publicKey.authenticatorSelection) ? publicKey.authenticatorSelection : undefined;

  return {
    challenge,
    options: {
      publicKey: {
        challenge: base64UrlToBuffer(challenge),
        rp: {
          name: requireString(rp, 'name', 'rp'),
          id: typeof rp.id === 'string' ? rp.id : undefined,
        },
        user: {
          id: base64UrlToBuffer(requireString(user, 'id', 'user')),
          name: requireString(user, 'name', 'user'),
          displayName: typeof user.displayName === 'string' ? user.displayName : requireString(user, 'name', 'user'),
        },
        pubKeyCredParams: params
          .map((param) => optionalNumber(param.alg))
          .filter((alg): alg is number => alg !== undefined)
          .map((alg) => ({ type: 'public-key' as const, alg })),
        excludeCredentials: credentialDescriptors(publicKey.excludeCredentials),
        timeout: optionalNumber(publicKey.timeout),
        attestation: pick(ATTESTATION, publicKey.attestation),
        authenticatorSelection: selection
          ? { userVerification: pick(USER_VERIFICATION, selection.userVerification) }
          : undefined,
      },
    },
  };
}

function requirePublicKeyCredential(credential: Credential | null): PublicKeyCredential {
  if (!credential || !(credential instanceof PublicKeyCredential)) {
    throw new Error('no public key credential returned by the authenticator');
  }
  return credential;
}

/** JSON answer for a login challenge. */
export function encodeAssertionResponse(credential: Credential | null, challenge: string): string {
  const cred = requirePublicKeyCredential(credential);
  const response = cred.response;
  if (!(response instanceof AuthenticatorAssertionResponse)) {
    throw new Error("missing 'response' property in hardware response");
  }
  return JSON.stringify({
    id: cred.id,
    type: cred.type,
    challenge,
    rawId: bufferToBase64Url(cred.rawId),
    response: {
      authenticatorData: bufferToBase64Url(response.authenticatorData),
      clientDataJSON: bufferToBase64Url(response.clientDataJSON),
      signature: bufferToBase64Url(response.signature),
    },
  });
}

/** JSON answer for a registration challenge. */
export function encodeAttestationResponse(credential: Credential | null): string {
  const cred = requirePublicKeyCredential(credential);
  const response = cred.response;
  if (!(response instanceof AuthenticatorAttestationResponse)) {
    throw new Error("missing 'response' property in hardware response");
  }
  return JSON.stringify({
    id: cred.id,
    type: cred.type,
    rawId: bufferToBase64Url(cred.rawId),
    response: {
      attestationObject: bufferToBase64Url(response.attestationObject),
      clientDataJSON: bufferToBase64Url(response.clientDataJSON),
    },
  });
}
