import { httpDelete, httpGet, httpGetFull, httpPost, httpPut } from '@/utils/apiClient';
import type { QueryParams, RequestData } from '@/types/api';
import type { NetworkList, NetworkInterface } from '@/types/network';
import type { PendingConfigValue } from '@/types/pending';
import type { DnsConfig, NodeConfig, NodePowerCommand, NodeStatus, TimeConfig } from '@/types/node';

const NODE = '/nodes/localhost';
const NETWORK = `${NODE}/network`;

export class NodeAPI {
  static async status(url = `${NODE}/status`): Promise<NodeStatus> {
    return httpGet<NodeStatus>(url);
  }

  static async power(command: NodePowerCommand, url = `${NODE}/status`): Promise<unknown> {
    return httpPost(url, { command });
  }

  static async getDns(): Promise<DnsConfig> {
    return httpGet<DnsConfig>(`${NODE}/dns`);
  }

  static async updateDns(data: RequestData): Promise<unknown> {
    return httpPut(`${NODE}/dns`, data);
  }

  static async getTime(): Promise<TimeConfig> {
    return httpGet<TimeConfig>(`${NODE}/time`);
  }

  static async setTimezone(timezone: string): Promise<unknown> {
    return httpPut(`${NODE}/time`, { timezone });
  }

  static async getConfig(url = `${NODE}/config`): Promise<NodeConfig> {
    return httpGet<NodeConfig>(url);
  }

  static async updateConfig(data: RequestData, url = `${NODE}/config`): Promise<unknown> {
    return httpPut(url, data);
  }

  /** Raw journal lines; the first and the last line are cursors. */
  static async journal(params: QueryParams, url = `${NODE}/journal`): Promise<string[]> {
    return httpGet<string[]>(url, params);
  }

  static async pendingConfig(url: string): Promise<PendingConfigValue[]> {
    return httpGet<PendingConfigValue[]>(url);
  }

  static async listNetwork(): Promise<NetworkList> {
    const resp = await httpGetFull<NetworkInterface[]>(NETWORK);
    const changes = typeof resp.attribs.changes === 'string' ? resp.attribs.changes : '';
    return { interfaces: resp.data, changes };
  }

  static async getInterface(name: string): Promise<RequestData> {
    return httpGet<RequestData>(`${NETWORK}/${encodeURIComponent(name)}`);
  }

  static async createInterface(data: RequestData): Promise<unknown> {
    return httpPost(NETWORK, data);
  }

  static async updateInterface(name: string, data: RequestData): Promise<unknown> {
    return httpPut(`${NETWORK}/${encodeURIComponent(name)}`, data);
  }

  static async deleteInterface(name: string): Promise<unknown> {
    return httpDelete(`${NETWORK}/${encodeURIComponent(name)}`);
  }

  static async revertNetwork(): Promise<unknown> {
    return httpDelete(NETWORK);
  }

  /** Returns the UPID of the reload task. */
  static async applyNetwork(): Promise<string> {
    return httpPut<string>(NETWORK);
  }
}
