// Status summary and file tree of the APT repository configuration

import type {
  AptConfiguration,
  AptUpdateInfo,
  AptRepository,
  AptRepositoryInfo,
  AptStandardRepository,
} from '@/types/apt';

export type AptStatusLevel = 'ok' | 'warning' | 'error';

export interface AptStatusLine {
  status: AptStatusLevel;
  message: string;
}

const line = (status: AptStatusLevel, message: string): AptStatusLine => ({ status, message });

const CEPH_ENTERPRISE = ['ceph-quincy-enterprise', 'ceph-reef-enterprise'];
const CEPH_NO_SUBSCRIPTION = ['ceph-quincy-no-subscription', 'ceph-reef-no-subscription'];
const CEPH_TEST = ['ceph-quincy-test', 'ceph-reef-test'];

const repoKey = (path: string, index: number) => `${path}:${index}`;

/**
 * Lines shown above the repository tree: parse errors, which update channels
 * are enabled and whether they fit the subscription.
 */
export function aptStatusLines(
  config: AptConfiguration,
  activeSubscription: boolean,
  projectText: string,
): AptStatusLine[] {
  const list: AptStatusLine[] = config.errors.map((error) => line('error', `${error.path} - ${error.error}`));

  const enabled = new Set(
    config['standard-repos'].filter((repo) => repo.status === true).map((repo) => repo.handle),
  );
  const hasEnterprise = enabled.has('enterprise');
  const hasNoSubscription = enabled.has('no-subscription');
  const hasTest = enabled.has('test');
  const hasCephEnterprise = CEPH_ENTERPRISE.some((handle) => enabled.has(handle));
  const hasCephNoSubscription = CEPH_NO_SUBSCRIPTION.some((handle) => enabled.has(handle));
  const hasCephTest = CEPH_TEST.some((handle) => enabled.has(handle));

  if (!(hasEnterprise || hasNoSubscription || hasTest)) {
    list.push(line('error', `No ${projectText} repository is enabled, you do not get any updates!`));
  } else if (config.errors.length === 0) {
    if (hasTest || hasNoSubscription) {
      list.push(line('ok', `You get updates for ${projectText}`));
    } else if (hasEnterprise && activeSubscription) {
      list.push(line('ok', `You get supported updates for ${projectText}`));
    }
  }

  const enabledRepos = new Set<string>();
  for (const file of config.files) {
    if (!file.path) continue;
    file.repositories.forEach((repo, index) => {
      if (repo.Enabled && file.path) enabledRepos.add(repoKey(file.path, index));
    });
  }

  let checkMixedSuites = false;
  const controlledOrigin = new Set<string>();
  for (const info of config.infos) {
    if (info.kind === 'ignore-pre-upgrade-warning') checkMixedSuites = true;
    if (info.kind === 'origin' && (info.message === 'Debian' || info.message === 'Proxmox')) {
      controlledOrigin.add(repoKey(info.path, info.index));
    }
  }

  const suitesWarning = config.infos.some(
    (info) =>
      info.kind === 'warning' && info.property === 'Suites' && enabledRepos.has(repoKey(info.path, info.index)),
  );
  if (suitesWarning) list.push(line('warning', 'Some suites are misconfigured'));

  const mixedSuites =
    checkMixedSuites &&
    config.files.some(
      (file) =>
        file.path !== undefined &&
        file.repositories.some(
          (repo, index) =>
            repo.Enabled &&
            repo.Types.includes('deb') &&
            file.path !== undefined &&
            controlledOrigin.has(repoKey(file.path, index)),
        ),
    );
  if (mixedSuites) list.push(line('warning', 'Detected mixed suites before upgrade'));

  const product = `${projectText} `;
  if (hasEnterprise && !activeSubscription) {
    list.push(line('warning', `The ${product}enterprise repository is enabled, but there is no active subscription!`));
  }
  if (hasNoSubscription) {
    list.push(line('warning', `The ${product}no-subscription repository is not recommended for production use!`));
  }
  if (hasTest) {
    list.push(
      line(
        'warning',
        `The ${product}test repository may pull in unstable updates and is not recommended for production use!`,
      ),
    );
  }

  if (hasCephEnterprise && !activeSubscription) {
    list.push(line('warning', 'The Ceph enterprise repository is enabled, but there is no active subscription!'));
  }
  if (hasCephNoSubscription) {
    list.push(line('warning', 'The Ceph no-subscription/main repository is not recommended for production use!'));
  }
  if (hasCephTest) {
    list.push(
      line('warning', 'The Ceph test repository may pull in unstable updates and is not recommended for production use!'),
    );
  }

  if (config.errors.length > 0) {
    list.push(line('error', 'Fatal parsing error for at least one repository'));
  }

  if (list.every((entry) => entry.status === 'ok')) {
    list.push(line('ok', 'All OK, you have production-ready repositories configured!'));
  }

  return list;
}

export type AptOrigin = 'Debian' | 'Proxmox' | 'Other';

export interface AptRepositoryEntry {
  key: string;
  path: string;
  index: number;
  repo: AptRepository;
  origin: AptOrigin;
  warnings: AptRepositoryInfo[];
}

export interface AptFileEntry {
  key: string;
  path: string;
  repositories: AptRepositoryEntry[];
}

/** Group repositories by file, with origin and warnings attached. */
export function aptConfigurationToTree(config: AptConfiguration): AptFileEntry[] {
  const infos = new Map<string, AptRepositoryInfo[]>();
  for (const info of config.infos) {
    const key = repoKey(info.path, info.index);
    const list = infos.get(key) ?? [];
    list.push(info);
    infos.set(key, list);
  }

  const result: AptFileEntry[] = [];
  for (const file of config.files) {
    const path = file.path;
    if (!path) continue;
    result.push({
      key: `file:${path}`,
      path,
      repositories: file.repositories.map((repo, index) => {
        let origin: AptOrigin = 'Other';
        const warnings: AptRepositoryInfo[] = [];
        for (const info of infos.get(repoKey(path, index)) ?? []) {
          if (info.kind === 'origin') {
            origin = info.message === 'Debian' || info.message === 'Proxmox' ? info.message : 'Other';
          } else if (info.kind === 'warning') {
            warnings.push(info);
          }
        }
        return { key: `repo:${path}:${index}`, path, index, repo, origin, warnings };
      }),
    });
  }
  return result;
}

export interface StandardRepoInfo {
  status: string;
  description: string;
  enabled: boolean;
}

export function standardRepoInfo(repos: readonly AptStandardRepository[], handle: string): StandardRepoInfo {
  const info = repos.find((repo) => repo.handle === handle);
  const description = info?.description ?? 'No description available';
  if (info?.status === undefined) {
    return { status: 'Not yet configured', description, enabled: false };
  }
  return {
    status: `Configured: ${info.status ? 'enabled' : 'disabled'}`,
    description,
    enabled: info.status,
  };
}

/** Warning shown next to a component of a Proxmox repository. */
export function componentWarning(origin: AptOrigin, component: string): string | undefined {
  if (origin !== 'Proxmox') return undefined;
  if (component.endsWith('-no-subscription')) return 'The no-subscription repository is NOT production-ready';
  if (component.endsWith('test')) return 'The test repository may contain unstable updates';
  return undefined;
}

export interface AptOriginGroup {
  origin: string;
  packages: AptUpdateInfo[];
}

/** Pending updates grouped by origin, both levels sorted by name. */
export function groupUpdatesByOrigin(updates: readonly AptUpdateInfo[]): AptOriginGroup[] {
  const groups = new Map<string, AptUpdateInfo[]>();
  for (const info of updates) {
    const list = groups.get(info.Origin) ?? [];
    list.push(info);
    groups.set(info.Origin, list);
  }
  return Array.from(groups, ([origin, packages]) => ({
    origin,
    packages: [...packages].sort((a, b) => a.Package.localeCompare(b.Package)),
  })).sort((a, b) => a.origin.localeCompare(b.origin));
}

export const originLabel = (group: AptOriginGroup): string =>
  `Origin: ${group.origin} (${group.packages.length === 1 ? 'One item' : `${group.packages.length} items`})`;

/** Split a package description or changelog into its first line and the rest. */
export function splitTitle(text: string): { title: string; body?: string } {
  const pos = text.indexOf('\n');
  return pos < 0 ? { title: text } : { title: text.slice(0, pos), body: text.slice(pos + 1) };
}
