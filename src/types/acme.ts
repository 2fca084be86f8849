// ACME accounts, plugins, domains and certificates

export interface AcmeDomain {
  domain: string;
  alias?: string;
  plugin?: string;
}

export interface AcmeConfig {
  account: string;
}

export interface AcmeAccountData {
  status: string;
  contact?: string[];
  createdAt?: string;
}

export interface AcmeAccountInfo {
  account: AcmeAccountData;
  directory: string;
  location: string;
  tos?: string;
}

export interface AcmeAccountEntry {
  name: string;
}

export interface AcmeDirectory {
  name: string;
  url: string;
}

export interface AcmePluginConfig {
  plugin: string;
  type: 'dns' | 'standalone' | string;
  api?: string;
  /** base64 encoded `key=value` lines */
  data?: string;
  'validation-delay'?: number;
  disable?: boolean;
  digest?: string;
}

/** One field of a DNS challenge plugin schema. */
export interface AcmeChallengeField {
  description?: string;
  default?: string;
  type?: string;
  optional?: boolean;
}

export interface AcmeChallengeSchema {
  id: string;
  name: string;
  type: string;
  schema: {
    name?: string;
    description?: string;
    fields?: Record<string, AcmeChallengeField>;
  };
}

export interface CertificateInfo {
  filename: string;
  subject: string;
  san: string[];
  issuer: string;
  notbefore?: number;
  notafter?: number;
  pem?: string;
  'public-key-type': string;
  'public-key-bits'?: number;
  fingerprint?: string;
}
