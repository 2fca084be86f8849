import { httpDelete, httpGet, httpGetFull, httpPost, httpPut } from '@/utils/apiClient';
import type { ApiResponseData, RequestData } from '@/types/api';
import type {
  AcmeAccountEntry,
  AcmeAccountInfo,
  AcmeChallengeSchema,
  AcmeDirectory,
  AcmePluginConfig,
  CertificateInfo,
} from '@/types/acme';

const enc = encodeURIComponent;

export const ACME_URLS = {
  accounts: '/config/acme/account',
  plugins: '/config/acme/plugins',
  directories: '/config/acme/directories',
  tos: '/config/acme/tos',
  challengeSchema: '/config/acme/challenge-schema',
  certificates: '/nodes/localhost/certificates',
} as const;

export class AcmeAPI {
  static async listAccounts(url: string = ACME_URLS.accounts): Promise<AcmeAccountEntry[]> {
    return httpGet<AcmeAccountEntry[]>(url);
  }

  static async getAccount(name: string): Promise<AcmeAccountInfo> {
    return httpGet<AcmeAccountInfo>(`${ACME_URLS.accounts}/${enc(name)}`);
  }

  /** Returns the UPID of the registration task. */
  static async registerAccount(data: RequestData): Promise<string> {
    return httpPost<string>(ACME_URLS.accounts, data);
  }

  /** Returns the UPID of the deactivation task. */
  static async deactivateAccount(name: string): Promise<string> {
    return httpDelete<string>(`${ACME_URLS.accounts}/${enc(name)}`);
  }

  static async listDirectories(url: string = ACME_URLS.directories): Promise<AcmeDirectory[]> {
    return httpGet<AcmeDirectory[]>(url);
  }

  static async termsOfService(directory: string): Promise<string | null> {
    return httpGet<string | null>(ACME_URLS.tos, { directory });
  }

  static async listPlugins(url: string = ACME_URLS.plugins): Promise<AcmePluginConfig[]> {
    return httpGet<AcmePluginConfig[]>(url);
  }

  static async getPlugin(id: string, url: string = ACME_URLS.plugins): Promise<ApiResponseData<AcmePluginConfig>> {
    return httpGetFull<AcmePluginConfig>(`${url}/${enc(id)}`);
  }

  static async createPlugin(data: RequestData, url: string = ACME_URLS.plugins): Promise<unknown> {
    return httpPost(url, data);
  }

  static async updatePlugin(id: string, data: RequestData, url: string = ACME_URLS.plugins): Promise<unknown> {
    return httpPut(`${url}/${enc(id)}`, data);
  }

  static async deletePlugin(id: string, url: string = ACME_URLS.plugins): Promise<unknown> {
    return httpDelete(`${url}/${enc(id)}`);
  }

  static async challengeSchema(url: string = ACME_URLS.challengeSchema): Promise<AcmeChallengeSchema[]> {
    return httpGet<AcmeChallengeSchema[]>(url);
  }

  /** Returns the UPID of the order task. */
  static async orderCertificate(): Promise<string> {
    return httpPost<string>(`${ACME_URLS.certificates}/acme/certificate`);
  }

  static async certificateInfo(): Promise<CertificateInfo[]> {
    return httpGet<CertificateInfo[]>(`${ACME_URLS.certificates}/info`);
  }

  static async uploadCustomCertificate(certificates: string, key?: string): Promise<CertificateInfo[]> {
    return httpPost<CertificateInfo[]>(`${ACME_URLS.certificates}/custom`, {
      certificates,
      ...(key ? { key } : {}),
      force: true,
      restart: true,
    });
  }

  static async deleteCustomCertificate(): Promise<unknown> {
    return httpDelete(`${ACME_URLS.certificates}/custom`, { restart: true });
  }
}
