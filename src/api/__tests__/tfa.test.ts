import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { httpDelete, httpPost } from '@/utils/apiClient';
import type { TfaUser } from '@/types/tfa';
import { TfaAPI, flattenTfaUsers, tfaEnabledText } from '../tfa';

vi.mock('@/utils/apiClient', () => ({
  httpGet: vi.fn(),
  httpGetFull: vi.fn(),
  httpPost: vi.fn(),
  httpPut: vi.fn(),
  httpDelete: vi.fn(),
}));

const NOW = 1_700_000_000;

const users: TfaUser[] = [
  {
    userid: 'root@pam',
    'totp-locked': true,
    entries: [
      { id: 'recovery', type: 'recovery', description: '', created: 1, enable: true },
      { id: 'totp-1', type: 'totp', description: 'phone', created: 2, enable: true },
    ],
  },
  {
    userid: 'alice@pbs',
    'tfa-locked-until': NOW + 60,
    entries: [{ id: 'webauthn-1', type: 'webauthn', description: 'key', created: 3, enable: false }],
  },
];

describe('flattenTfaUsers', () => {
  it('sorts by user and type and computes locks', () => {
    const rows = flattenTfaUsers(users, NOW);
    expect(rows.map((row) => [row.fullId, row.locked])).toEqual([
      ['alice@pbs/webauthn-1', true],
      ['root@pam/recovery', false],
      ['root@pam/totp-1', true],
    ]);
  });

  it('lifts an expired user lock', () => {
    expect(flattenTfaUsers(users, NOW + 61)[0].locked).toBe(false);
  });

  it('renders the enabled column', () => {
    expect(tfaEnabledText({ locked: true, enable: true })).toBe('Locked');
    expect(tfaEnabledText({ locked: false, enable: true })).toBe('Yes');
    expect(tfaEnabledText({ locked: false, enable: false })).toBe('No');
  });
});

describe('TfaAPI', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('adds a TOTP entry with its otpauth link', async () => {
    await TfaAPI.addTotp({
      userid: 'root@pam',
      description: 'phone',
      issuer: 'Proxmox Backup Server',
      secret: 'JBSWY3DPEHPK3PXP',
      value: '123456',
      password: 'test-secret',
    });

    expect(httpPost).toHaveBeenCalledWith('/access/tfa/root%40pam', {
      type: 'totp',
      description: 'phone',
      totp: 'otpauth://totp/Proxmox%20Backup%20Server:root%40pam?secret=JBSWY3DPEHPK3PXP&period=30&digits=6&algorithm=SHA1&issuer=Proxmox%20Backup%20Server',
      value: '123456',
      password: 'test-secret',
    });
  });

  it('returns generated recovery keys', async () => {
    vi.mocked(httpPost).mockResolvedValueOnce({ recovery: ['aaaa-bbbb', 'cccc-dddd'] });

    await expect(TfaAPI.addRecovery('alice@pbs')).resolves.toEqual(['aaaa-bbbb', 'cccc-dddd']);
    expect(httpPost).toHaveBeenCalledWith('/access/tfa/alice%40pbs', { type: 'recovery' });
  });

  it('removes an entry with the current password', async () => {
    await TfaAPI.remove('alice@pbs', 'totp-1', 'test-secret');
    await TfaAPI.remove('alice@pbs', 'totp-2');

    expect(httpDelete).toHaveBeenNthCalledWith(1, '/access/tfa/alice%40pbs/totp-1', { password: 'test-secret' });
    expect(httpDelete).toHaveBeenNthCalledWith(2, '/access/tfa/alice%40pbs/totp-2', undefined);
  });

  it('registers a webauthn device in two steps', async () => {
    class FakeAttestationResponse {
      attestationObject = new Uint8Array([1, 2]).buffer;
      clientDataJSON = new Uint8Array([3]).buffer;
    }
    class FakePublicKeyCredential {
      id = 'cred-1';
      type = 'public-key';
      rawId = new Uint8Array([4, 5]).buffer;
      response = new FakeAttestationResponse();
    }
    vi.stubGlobal('PublicKeyCredential', FakePublicKeyCredential);
    vi.stubGlobal('AuthenticatorAttestationResponse', FakeAttestationResponse);

    vi.mocked(httpPost).mockResolvedValueOnce({
      challenge: JSON.stringify({
        publicKey: { challenge: 'AQID', rp: { name: 'Proxmox' }, user: { id: 'Ag', name: 'alice@pbs' } },
      }),
    });
    vi.mocked(httpPost).mockResolvedValueOnce({ id: 'webauthn-1' });
    const create = vi.fn(async (_options?: CredentialCreationOptions) => new FakePublicKeyCredential());

    await TfaAPI.addWebauthn('alice@pbs', 'yubikey', undefined, '/access/tfa', { create });

    expect(create).toHaveBeenCalledTimes(1);
    expect(httpPost).toHaveBeenNthCalledWith(1, '/access/tfa/alice%40pbs', { type: 'webauthn', description: 'yubikey' });
    expect(httpPost).toHaveBeenNthCalledWith(2, '/access/tfa/alice%40pbs', {
      type: 'webauthn',
      challenge: 'AQID',
      value: JSON.stringify({
        id: 'cred-1',
        type: 'public-key',
        rawId: 'BAU',
        response: { attestationObject: 'AQI', clientDataJSON: 'Aw' },
      }),
    });
  });

  it('fails without a challenge', async () => {
    vi.mocked(httpPost).mockResolvedValueOnce({});
    const create = vi.fn(async () => null);

    await expect(TfaAPI.addWebauthn('alice@pbs', 'yubikey', undefined, '/access/tfa', { create })).rejects.toThrow(
      'missing webauthn challenge in response',
    );
    expect(create).not.toHaveBeenCalled();
  });
});
