/**
 * Ad and tracker blocking
 *
 * Static deny-list matched as substrings of the request URL.
 */

import type { InterceptedRoute } from './browser.js';

export const BLOCKED_DOMAINS: readonly string[] = [
  'googletagmanager.com',
  'google-analytics.com',
  'doubleclick.net',
  'googlesyndication.com',
  'facebook.com/tr',
  'hotjar.com',
  'crazyegg.com',
  'mouseflow.com',
  'clarity.ms',
];

export function isBlockedUrl(url: string, blocked: readonly string[] = BLOCKED_DOMAINS): boolean {
  return blocked.some(domain => url.includes(domain));
}

/**
 * Route handler: abort deny-listed requests, let everything else through
 */
export async function blockAdsHandler(route: InterceptedRoute): Promise<void> {
  if (isBlockedUrl(route.request().url())) {
    await route.abort();
    return;
  }
  await route.continue();
}
