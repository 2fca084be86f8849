// APT updates and repository configuration

export interface AptUpdateInfo {
  Package: string;
  Title: string;
  Arch: string;
  Description: string;
  Version: string;
  OldVersion: string;
  Origin: string;
  Priority: string;
  Section: string;
  ExtraInfo?: string;
}

export type AptRepositoryHandle =
  | 'enterprise'
  | 'no-subscription'
  | 'test'
  | 'ceph-quincy-enterprise'
  | 'ceph-quincy-no-subscription'
  | 'ceph-quincy-test'
  | 'ceph-reef-enterprise'
  | 'ceph-reef-no-subscription'
  | 'ceph-reef-test'
  | string;

export interface AptStandardRepository {
  handle: AptRepositoryHandle;
  /** `undefined`: not configured */
  status?: boolean;
  name: string;
  description: string;
}

export type AptRepositoryPackageType = 'deb' | 'deb-src';

export type AptRepositoryFileType = 'list' | 'sources';

export interface AptRepositoryOption {
  Key: string;
  Values: string[];
}

export interface AptRepository {
  Types: AptRepositoryPackageType[];
  URIs: string[];
  Suites: string[];
  Components: string[];
  Options?: AptRepositoryOption[];
  Comment?: string;
  FileType: AptRepositoryFileType;
  Enabled: boolean;
}

export interface AptRepositoryFile {
  path?: string;
  'file-type': AptRepositoryFileType;
  repositories: AptRepository[];
  digest?: number[];
}

export interface AptRepositoryFileError {
  path: string;
  error: string;
}

export interface AptRepositoryInfo {
  path: string;
  index: number;
  property?: string;
  kind: string;
  message: string;
}

export interface AptConfiguration {
  digest: string;
  files: AptRepositoryFile[];
  'standard-repos': AptStandardRepository[];
  errors: AptRepositoryFileError[];
  infos: AptRepositoryInfo[];
}
