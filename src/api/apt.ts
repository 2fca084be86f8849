import { httpGet, httpPost, httpPut } from '@/utils/apiClient';
import type { AptConfiguration, AptUpdateInfo } from '@/types/apt';

export const DEFAULT_APT_BASE_URL = '/nodes/localhost/apt';

export class AptAPI {
  static async listUpdates(baseUrl = DEFAULT_APT_BASE_URL): Promise<AptUpdateInfo[]> {
    return httpGet<AptUpdateInfo[]>(`${baseUrl}/update`);
  }

  /** Starts the package database update, returns the UPID. */
  static async refresh(baseUrl = DEFAULT_APT_BASE_URL): Promise<string> {
    return httpPost<string>(`${baseUrl}/update`);
  }

  static async changelog(packageName: string, baseUrl = DEFAULT_APT_BASE_URL): Promise<string> {
    return httpGet<string>(`${baseUrl}/changelog`, { name: packageName });
  }

  static async repositories(baseUrl = DEFAULT_APT_BASE_URL): Promise<AptConfiguration> {
    return httpGet<AptConfiguration>(`${baseUrl}/repositories`);
  }

  /** `digest` rejects the change when the configuration was modified meanwhile. */
  static async setRepositoryEnabled(
    path: string,
    index: number,
    enabled: boolean,
    digest?: string,
    baseUrl = DEFAULT_APT_BASE_URL,
  ): Promise<unknown> {
    return httpPost(`${baseUrl}/repositories`, { path, index, enabled, digest });
  }

  static async addStandardRepository(handle: string, baseUrl = DEFAULT_APT_BASE_URL): Promise<unknown> {
    return httpPut(`${baseUrl}/repositories`, { handle });
  }
}
