// Configuration with pending changes, as returned by `.../pending` endpoints

export interface PendingConfigValue {
  key: string;
  value?: unknown;
  pending?: unknown;
  /** 1: delete pending, 2: forced delete pending. */
  delete?: number;
}

export interface PendingConfig {
  current: Record<string, unknown>;
  pending: Record<string, unknown>;
  keys: Set<string>;
}
