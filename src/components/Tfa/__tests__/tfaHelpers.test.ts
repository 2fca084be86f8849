import { describe, expect, it } from 'vitest';
import { formatRecoveryKeys } from '../TfaAddRecovery';
import { tfaRemoveMessage } from '../TfaConfirmRemove';

describe('TFA helpers', () => {
  it('numbers recovery keys from zero', () => {
    expect(formatRecoveryKeys(['aaaa-bbbb', 'cccc-dddd'])).toBe('0: aaaa-bbbb\n1: cccc-dddd');
    expect(formatRecoveryKeys([])).toBe('');
  });

  it('names the entry to remove', () => {
    expect(tfaRemoveMessage({ userId: 'alice@pbs', type: 'totp', description: 'phone' })).toBe(
      'Are you sure you want to remove this totp entry of user alice@pbs (phone)?',
    );
  });
});
