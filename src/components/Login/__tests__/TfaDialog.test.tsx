import { afterEach, describe, expect, it, vi } from 'vitest';
import { cleanup, fireEvent, render, screen } from '@solidjs/testing-library';
import { TfaDialog } from '../TfaDialog';

describe('TfaDialog', () => {
  afterEach(() => {
    cleanup();
    vi.restoreAllMocks();
  });

  it('sends the TOTP code', () => {
    const onResponse = vi.fn();
    render(() => (
      <TfaDialog challenge={{ totp: true, yubico: false, recovery: [0, 1, 2] }} onResponse={onResponse} onClose={() => {}} />
    ));

    expect(screen.getAllByRole('tab').map((tab) => tab.textContent)).toEqual(['TOTP App', 'Recovery Key']);

    fireEvent.input(screen.getByLabelText('Please enter your TOTP verification code'), { target: { value: ' 123456 ' } });
    fireEvent.click(screen.getByRole('button', { name: 'Confirm' }));

    expect(onResponse).toHaveBeenCalledWith({ type: 'totp', code: '123456' });
  });

  it('lists the remaining recovery keys with a warning', () => {
    const onResponse = vi.fn();
    render(() => (
      <TfaDialog challenge={{ totp: true, yubico: false, recovery: [0, 4, 7] }} onResponse={onResponse} onClose={() => {}} />
    ));

    fireEvent.click(screen.getByRole('tab', { name: 'Recovery Key' }));

    expect(screen.getByText('Available recovery keys: 0, 4, 7')).toBeInTheDocument();
    expect(
      screen.getByText('Less than 4 recovery keys available. Please generate a new set after login!'),
    ).toBeInTheDocument();

    fireEvent.input(screen.getByLabelText('Please enter one of your single-use recovery keys'), {
      target: { value: 'abcd-ef01' },
    });
    fireEvent.click(screen.getByRole('button', { name: 'Confirm' }));
    expect(onResponse).toHaveBeenCalledWith({ type: 'recovery', key: 'abcd-ef01' });
  });

  it('tells when no factor is left', () => {
    render(() => (
      <TfaDialog challenge={{ totp: false, yubico: false, recovery: [] }} onResponse={() => {}} onClose={() => {}} />
    ));

    expect(screen.getByText('No more recovery keys available.')).toBeInTheDocument();
  });

  it('shows a failed WebAuthn attempt and retries', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const get = vi.fn(async (_options?: CredentialRequestOptions): Promise<Credential | null> => {
      throw new Error('The operation was not allowed.');
    });
    const credentials: CredentialsContainer = {
      get,
      create: vi.fn(async () => null),
      preventSilentAccess: vi.fn(async () => undefined),
      store: vi.fn(async () => undefined),
    };

    render(() => (
      <TfaDialog
        challenge={{ totp: false, yubico: false, recovery: [], webauthn: { publicKey: { challenge: 'AQID' } } }}
        credentials={credentials}
        onResponse={() => {}}
        onClose={() => {}}
      />
    ));

    expect(screen.getAllByRole('tab').map((tab) => tab.textContent)).toEqual(['WebAuthn']);
    expect(await screen.findByText('The operation was not allowed.')).toBeInTheDocument();
    expect(get).toHaveBeenCalledTimes(1);

    const retry = screen.getByRole('button', { name: 'Retry' });
    await vi.waitFor(() => expect(retry).not.toBeDisabled());
    fireEvent.click(retry);
    await vi.waitFor(() => expect(get).toHaveBeenCalledTimes(2));
  });
});
