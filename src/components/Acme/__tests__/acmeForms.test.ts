import { describe, expect, it } from 'vitest';
import { createFormContext } from '@/components/shared/formContext';
import type { AcmeChallengeSchema } from '@/types/acme';
import { accountViewRecord } from '../AcmeAccountsPanel';
import { domainFromForm, domainToForm } from '../AcmeDomainsPanel';
import { pluginSubmitData, pluginToForm } from '../AcmePluginsPanel';
import { registerAccountData } from '../AcmeRegisterAccount';

const cloudflare: AcmeChallengeSchema = {
  id: 'cf',
  name: 'Cloudflare',
  type: 'dns',
  schema: { fields: { CF_Token: { description: 'API token' }, CF_Account_ID: { optional: true } } },
};

describe('plugin forms', () => {
  it('splits stored API data into schema fields', () => {
    const values = pluginToForm({
      plugin: 'cf1',
      type: 'dns',
      api: 'cf',
      data: btoa('CF_Token=test-secret\nCF_Account_ID=42'),
      digest: 'd1',
    });

    expect(values.data).toBe('CF_Token=test-secret\nCF_Account_ID=42');
    expect(values.data_CF_Token).toBe('test-secret');
    expect(values.data_CF_Account_ID).toBe('42');
    expect(values.plugin).toBe('cf1');
  });

  it('creates a DNS plugin from the non-empty fields', () => {
    const form = createFormContext({
      plugin: ' cf1 ',
      api: 'cf',
      'validation-delay': '',
      data_CF_Token: 'test-secret',
      data_CF_Account_ID: '',
    });

    expect(pluginSubmitData(form, cloudflare, true)).toEqual({
      id: 'cf1',
      type: 'dns',
      api: 'cf',
      data: btoa('CF_Token=test-secret'),
    });
  });

  it('sends raw data for APIs without a schema', () => {
    const form = createFormContext({ plugin: 'x', api: 'custom', data: 'KEY=value' });
    expect(pluginSubmitData(form, undefined, true).data).toBe(btoa('KEY=value'));
  });

  it('deletes a cleared validation delay on update', () => {
    const form = createFormContext({ api: 'cf', 'validation-delay': '', data_CF_Token: 'test-secret', digest: 'd1' });
    expect(pluginSubmitData(form, cloudflare, false)).toEqual({
      api: 'cf',
      data: btoa('CF_Token=test-secret'),
      digest: 'd1',
      delete: ['validation-delay'],
    });
  });

  it('keeps a set validation delay as a number', () => {
    const form = createFormContext({ api: 'cf', 'validation-delay': 30, data_CF_Token: 'test-secret' });
    expect(pluginSubmitData(form, cloudflare, false)).toEqual({
      api: 'cf',
      data: btoa('CF_Token=test-secret'),
      'validation-delay': 30,
    });
  });
});

describe('domain forms', () => {
  it('maps stored domains to the editor', () => {
    expect(
      domainToForm({ configKey: 'acmedomain0', type: 'dns', config: { domain: 'pbs.example.com', plugin: 'cf1' } }),
    ).toEqual({ type: 'DNS', domain: 'pbs.example.com', plugin: 'cf1', alias: undefined });
    expect(domainToForm({ configKey: 'acmedomain1', type: 'standalone', config: { domain: 'b.example.com' } }).type).toBe(
      'HTTP',
    );
  });

  it('drops plugin and alias for HTTP validation', () => {
    const form = createFormContext({ type: 'HTTP', domain: ' pbs.example.com ', plugin: 'cf1', alias: 'x.example.net' });
    expect(domainFromForm(form)).toEqual({ domain: 'pbs.example.com' });
  });

  it('keeps plugin and alias for DNS validation', () => {
    const form = createFormContext({ type: 'DNS', domain: 'pbs.example.com', plugin: 'cf1', alias: ' ' });
    expect(domainFromForm(form)).toEqual({ domain: 'pbs.example.com', plugin: 'cf1' });
  });
});

describe('accounts', () => {
  const directory = 'https://acme.example.com/directory';

  it('omits an empty name and a missing terms of service url', () => {
    expect(registerAccountData({ name: ' ', contact: ' admin@example.com ', directory })).toEqual({
      contact: 'admin@example.com',
      directory,
    });
  });

  it('sends the accepted terms of service', () => {
    expect(
      registerAccountData({ name: 'default', contact: 'admin@example.com', directory }, 'https://acme.example.com/tos.pdf'),
    ).toEqual({
      name: 'default',
      contact: 'admin@example.com',
      directory,
      tos_url: 'https://acme.example.com/tos.pdf',
    });
  });

  it('flattens the account view', () => {
    expect(
      accountViewRecord({
        account: { status: 'valid', contact: ['mailto:a@example.com', 'mailto:b@example.com'] },
        directory,
        location: `${directory}/acct/1`,
      }),
    ).toEqual({
      contact: 'mailto:a@example.com, mailto:b@example.com',
      createdAt: undefined,
      status: 'valid',
      directory,
      tos: undefined,
    });
  });
});
