import { describe, expect, it } from 'vitest';
import { createFormContext } from '@/components/shared/formContext';
import { aclUpdateFromForm } from '../AclEdit';
import { openidSubmitData } from '../AuthEditOpenId';

describe('aclUpdateFromForm', () => {
  it('sends the group for group permissions', () => {
    const form = createFormContext({ path: ' /datastore/store1 ', role: 'DatastoreAdmin', group: 'ops' });
    expect(aclUpdateFromForm('group', form)).toEqual({
      path: '/datastore/store1',
      role: 'DatastoreAdmin',
      propagate: true,
      group: 'ops',
    });
  });

  it('sends the auth id for users and tokens', () => {
    const form = createFormContext({ path: '/', role: 'Audit', 'auth-id': 'alice@pbs!ci', propagate: false });
    expect(aclUpdateFromForm('token', form)).toEqual({
      path: '/',
      role: 'Audit',
      propagate: false,
      'auth-id': 'alice@pbs!ci',
    });
  });
});

describe('openidSubmitData', () => {
  const values = {
    realm: 'sso',
    'issuer-url': 'https://id.example.com',
    'client-key': '',
    'username-claim': 'email',
    autocreate: false,
  };

  it('keeps the username claim on create', () => {
    expect(openidSubmitData(values, false)).toEqual({
      realm: 'sso',
      'issuer-url': 'https://id.example.com',
      'username-claim': 'email',
      autocreate: false,
    });
  });

  it('drops the username claim on edit', () => {
    expect(openidSubmitData(values, true)).toEqual({
      realm: 'sso',
      'issuer-url': 'https://id.example.com',
      autocreate: false,
    });
  });
});
