import { describe, expect, it } from 'vitest';
import {
  base64UrlToBuffer,
  bufferToBase64Url,
  encodeAssertionResponse,
  prepareAssertionChallenge,
  prepareRegistrationChallenge,
} from '../webauthn';

const bytes = (buffer: BufferSource | undefined) =>
  buffer instanceof ArrayBuffer ? Array.from(new Uint8Array(buffer)) : [];

describe('base64url', () => {
  it('uses the URL safe alphabet without padding', () => {
    expect(bufferToBase64Url(new Uint8Array([251, 255]))).toBe('-_8');
    expect(bytes(base64UrlToBuffer('-_8'))).toEqual([251, 255]);
  });
});

describe('prepareAssertionChallenge', () => {
  it('decodes the challenge and allowed credentials', () => {
    const prepared = prepareAssertionChallenge(
      JSON.stringify({
        publicKey: {
          challenge: 'AQID',
          allowCredentials: [{ id: 'BAU', type: 'public-key' }],
          timeout: 60000,
          rpId: 'pbs.example',
          userVerification: 'preferred',
        },
      }),
    );

    expect(prepared.challenge).toBe('AQID');
    const publicKey = prepared.options.publicKey;
    expect(bytes(publicKey?.challenge)).toEqual([1, 2, 3]);
    expect(bytes(publicKey?.allowCredentials?.[0]?.id)).toEqual([4, 5]);
    expect(publicKey?.timeout).toBe(60000);
    expect(publicKey?.rpId).toBe('pbs.example');
    expect(publicKey?.userVerification).toBe('preferred');
  });

  it('rejects a challenge without publicKey.challenge', () => {
    expect(() => prepareAssertionChallenge({ publicKey: {} })).toThrow(
      "missing 'publicKey.challenge' value in webauthn challenge",
    );
  });
});

describe('prepareRegistrationChallenge', () => {
  it('fills in the user and keeps valid algorithms', () => {
    const { options } = prepareRegistrationChallenge({
      publicKey: {
        challenge: 'AQID',
        rp: { name: 'Proxmox Backup Server' },
        user: { id: 'Ag', name: 'root@pam' },
        pubKeyCredParams: [{ type: 'public-key', alg: -7 }, { type: 'public-key', alg: 'x' }],
        attestation: 'none',
        authenticatorSelection: { userVerification: 'discouraged' },
      },
    });

    const publicKey = options.publicKey;
    expect(publicKey?.rp).toEqual({ name: 'Proxmox Backup Server', id: undefined });
    expect(publicKey?.user.name).toBe('root@pam');
    expect(publicKey?.user.displayName).toBe('root@pam');
    expect(bytes(publicKey?.user.id)).toEqual([2]);
    expect(publicKey?.pubKeyCredParams).toEqual([{ type: 'public-key', alg: -7 }]);
    expect(publicKey?.attestation).toBe('none');
    expect(publicKey?.authenticatorSelection).toEqual({ userVerification: 'discouraged' });
  });
});

describe('encodeAssertionResponse', () => {
  it('requires a credential', () => {
    expect(() => encodeAssertionResponse(null, 'AQID')).toThrow('no public key credential returned by the authenticator');
  });
});
