import { describe, expect, it } from 'vitest';
import type { AptConfiguration, AptRepository, AptStandardRepository, AptUpdateInfo } from '@/types/apt';
import {
  aptConfigurationToTree,
  aptStatusLines,
  componentWarning,
  groupUpdatesByOrigin,
  originLabel,
  splitTitle,
  standardRepoInfo,
} from '../aptRepositories';

const PROJECT = 'Proxmox Backup Server';
const SOURCES = '/etc/apt/sources.list';

const standard = (handle: string, status?: boolean): AptStandardRepository => ({
  handle,
  status,
  name: handle,
  description: `${handle} repository`,
});

const repo = (overrides: Partial<AptRepository> = {}): AptRepository => ({
  Types: ['deb'],
  URIs: ['http://download.proxmox.com/debian/pbs'],
  Suites: ['bookworm'],
  Components: ['pbs-no-subscription'],
  FileType: 'list',
  Enabled: true,
  ...overrides,
});

const config = (overrides: Partial<AptConfiguration> = {}): AptConfiguration => ({
  digest: 'abc',
  files: [],
  'standard-repos': [],
  errors: [],
  infos: [],
  ...overrides,
});

describe('aptStatusLines', () => {
  it('reports production ready enterprise setups', () => {
    expect(aptStatusLines(config({ 'standard-repos': [standard('enterprise', true)] }), true, PROJECT)).toEqual([
      { status: 'ok', message: 'You get supported updates for Proxmox Backup Server' },
      { status: 'ok', message: 'All OK, you have production-ready repositories configured!' },
    ]);
  });

  it('warns about the no-subscription repository', () => {
    expect(aptStatusLines(config({ 'standard-repos': [standard('no-subscription', true)] }), false, PROJECT)).toEqual([
      { status: 'ok', message: 'You get updates for Proxmox Backup Server' },
      {
        status: 'warning',
        message: 'The Proxmox Backup Server no-subscription repository is not recommended for production use!',
      },
    ]);
  });

  it('warns about enterprise repositories without subscription', () => {
    const lines = aptStatusLines(
      config({ 'standard-repos': [standard('enterprise', true), standard('ceph-reef-enterprise', true)] }),
      false,
      PROJECT,
    );
    expect(lines).toEqual([
      {
        status: 'warning',
        message: 'The Proxmox Backup Server enterprise repository is enabled, but there is no active subscription!',
      },
      { status: 'warning', message: 'The Ceph enterprise repository is enabled, but there is no active subscription!' },
    ]);
  });

  it('reports parse errors and missing update channels', () => {
    const lines = aptStatusLines(
      config({ 'standard-repos': [standard('enterprise', false)], errors: [{ path: SOURCES, error: 'malformed line 3' }] }),
      true,
      PROJECT,
    );
    expect(lines).toEqual([
      { status: 'error', message: '/etc/apt/sources.list - malformed line 3' },
      { status: 'error', message: 'No Proxmox Backup Server repository is enabled, you do not get any updates!' },
      { status: 'error', message: 'Fatal parsing error for at least one repository' },
    ]);
  });

  it('flags suite warnings of enabled repositories', () => {
    const lines = aptStatusLines(
      config({
        'standard-repos': [standard('no-subscription', true)],
        files: [{ path: SOURCES, 'file-type': 'list', repositories: [repo()] }],
        infos: [{ path: SOURCES, index: 0, property: 'Suites', kind: 'warning', message: 'old suite' }],
      }),
      false,
      PROJECT,
    );
    expect(lines.map((line) => line.message)).toEqual([
      'You get updates for Proxmox Backup Server',
      'Some suites are misconfigured',
      'The Proxmox Backup Server no-subscription repository is not recommended for production use!',
    ]);
  });
});

describe('aptConfigurationToTree', () => {
  it('groups repositories by file with origin and warnings', () => {
    const first = repo();
    const second = repo({ Enabled: false, URIs: ['http://deb.debian.org/debian'], Components: ['main'] });
    const warning = { path: SOURCES, index: 1, property: 'Suites', kind: 'warning', message: 'old suite' };

    expect(
      aptConfigurationToTree(
        config({
          files: [
            { path: SOURCES, 'file-type': 'list', repositories: [first, second] },
            { 'file-type': 'sources', repositories: [repo()] },
          ],
          infos: [{ path: SOURCES, index: 0, kind: 'origin', message: 'Proxmox' }, warning],
        }),
      ),
    ).toEqual([
      {
        key: `file:${SOURCES}`,
        path: SOURCES,
        repositories: [
          { key: `repo:${SOURCES}:0`, path: SOURCES, index: 0, repo: first, origin: 'Proxmox', warnings: [] },
          { key: `repo:${SOURCES}:1`, path: SOURCES, index: 1, repo: second, origin: 'Other', warnings: [warning] },
        ],
      },
    ]);
  });
});

describe('standard repositories', () => {
  const repos = [standard('enterprise', false), standard('no-subscription', true)];

  it('describes the configured state', () => {
    expect(standardRepoInfo(repos, 'enterprise')).toEqual({
      status: 'Configured: disabled',
      description: 'enterprise repository',
      enabled: false,
    });
    expect(standardRepoInfo(repos, 'no-subscription').enabled).toBe(true);
    expect(standardRepoInfo(repos, 'test')).toEqual({
      status: 'Not yet configured',
      description: 'No description available',
      enabled: false,
    });
  });

  it('warns about non-production components of Proxmox repositories', () => {
    expect(componentWarning('Proxmox', 'pbs-no-subscription')).toBe('The no-subscription repository is NOT production-ready');
    expect(componentWarning('Proxmox', 'pbstest')).toBe('The test repository may contain unstable updates');
    expect(componentWarning('Proxmox', 'pbs-enterprise')).toBeUndefined();
    expect(componentWarning('Debian', 'main-no-subscription')).toBeUndefined();
  });
});

describe('package updates', () => {
  const update = (Package: string, Origin: string): AptUpdateInfo => ({
    Package,
    Origin,
    Title: Package,
    Arch: 'amd64',
    Description: `${Package} description`,
    Version: '2.0',
    OldVersion: '1.0',
    Priority: 'optional',
    Section: 'admin',
  });

  it('groups by origin, sorted at both levels', () => {
    const groups = groupUpdatesByOrigin([
      update('zlib1g', 'Debian'),
      update('proxmox-backup-server', 'Proxmox'),
      update('bash', 'Debian'),
    ]);
    expect(groups.map((group) => group.origin)).toEqual(['Debian', 'Proxmox']);
    expect(groups[0].packages.map((info) => info.Package)).toEqual(['bash', 'zlib1g']);
    expect(originLabel(groups[0])).toBe('Origin: Debian (2 items)');
    expect(originLabel(groups[1])).toBe('Origin: Proxmox (One item)');
  });

  it('splits a description into title and body', () => {
    expect(splitTitle('GNU shell\nBash is an sh-compatible shell.\nMore text')).toEqual({
      title: 'GNU shell',
      body: 'Bash is an sh-compatible shell.\nMore text',
    });
    expect(splitTitle('single line')).toEqual({ title: 'single line' });
  });
});
