export type SubscriptionStatus = 'new' | 'notfound' | 'active' | 'invalid' | 'expired' | 'suspended';

/** `GET /nodes/localhost/subscription` */
export interface SubscriptionData {
  status: SubscriptionStatus | string;
  message?: string;
  productname?: string;
  key?: string;
  serverid?: string;
  checktime?: number;
  nextduedate?: string;
  signature?: string | boolean;
  url?: string;
}
