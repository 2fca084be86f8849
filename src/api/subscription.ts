import { httpDelete, httpGet, httpPost, httpPut } from '@/utils/apiClient';
import type { SubscriptionData } from '@/types/subscription';

const SUBSCRIPTION_URL = '/nodes/localhost/subscription';

export class SubscriptionAPI {
  static async get(url = SUBSCRIPTION_URL): Promise<SubscriptionData> {
    return httpGet<SubscriptionData>(url);
  }

  static async setKey(key: string, url = SUBSCRIPTION_URL): Promise<unknown> {
    return httpPut(url, { key });
  }

  /** Ask the server to re-check the key now. */
  static async check(url = SUBSCRIPTION_URL): Promise<unknown> {
    return httpPost(url, { force: true });
  }

  static async remove(url = SUBSCRIPTION_URL): Promise<unknown> {
    return httpDelete(url);
  }

  static async systemReport(): Promise<string> {
    return httpGet<string>('/nodes/localhost/report');
  }
}
