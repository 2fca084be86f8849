// Location helpers for redirects and links to external pages

import { logger } from '@/utils/logger';

/** Origin of the console, without trailing slash. */
export function consoleOrigin(): string {
  const { origin, protocol, host } = window.location;
  if (origin && origin !== 'null') return origin;
  return `${protocol}//${host}`;
}

/** Navigate the whole page, e.g. to an OpenID provider. */
export function setLocationHref(url: string): void {
  logger.debug('redirecting to', url);
  window.location.assign(url);
}
