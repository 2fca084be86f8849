// Texts for the subscription status

import { DEFAULT_SUBSCRIPTION_URL } from '@/constants';

/** Short status line, as shown next to the status icon. */
export function subscriptionStatusText(status: string): string {
  switch (status) {
    case 'new':
      return 'Newly set subscription, not yet checked';
    case 'notfound':
      return 'No valid subscription';
    case 'active':
      return 'Your subscription status is valid.';
    default:
      return subscriptionAlertTitle(status);
  }
}

/** Title of the subscription reminder dialog. */
export function subscriptionAlertTitle(status: string): string {
  switch (status) {
    case 'new':
      return 'Newly set subscription, not yet checked';
    case 'notfound':
      return 'You do not have a valid subscription.';
    case 'active':
      return 'Subscription set and active.';
    case 'invalid':
      return 'Subscription set but invalid for this server.';
    case 'expired':
      return 'Subscription set but expired for this server.';
    case 'suspended':
      return 'Subscription got (recently) suspended';
    default:
      return 'Unable to get the subscription status (API problems).';
  }
}

export const isSubscriptionOk = (status: string | undefined): boolean => status === 'new' || status === 'active';

export type SubscriptionLevel = 'ok' | 'error' | 'warning';

export function subscriptionLevel(status: string): SubscriptionLevel {
  if (isSubscriptionOk(status)) return 'ok';
  if (status === 'notfound') return 'error';
  return 'warning';
}

/** `STATUS: message` as shown in the subscription grid. */
export function renderSubscriptionStatus(status: unknown, message: unknown): string {
  const text = typeof status === 'string' ? status : 'unknown';
  return `${text.toUpperCase()}: ${typeof message === 'string' ? message : 'internal error'}`;
}

export const subscriptionUrl = (url?: string | null): string => url || DEFAULT_SUBSCRIPTION_URL;
