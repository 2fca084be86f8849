// Shapes of the `/api2/extjs` response envelope

export interface ApiEnvelope<T> {
  success?: boolean | number;
  data: T;
  message?: string;
  status?: number;
  errors?: Record<string, string>;
  [attribute: string]: unknown;
}

/** Data plus the extra envelope attributes (e.g. `total`, `changes`). */
export interface ApiResponseData<T> {
  data: T;
  attribs: Record<string, unknown>;
}

export type QueryValue = string | number | boolean;

export type QueryParams = Record<string, QueryValue | QueryValue[] | null | undefined>;

/** JSON body for POST and PUT requests. */
export type RequestData = Record<string, unknown>;

export interface Authentication {
  userid: string;
  ticket: string;
  csrfToken: string;
  /** Capability map returned by the ticket call, when present. */
  cap?: Record<string, unknown>;
}
