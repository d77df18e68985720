/**
 * Cover lookup through the public Steam store search. Any failure yields
 * `null`; covers are cosmetic and never block a sync.
 */

import { STEAM, TIMEOUTS } from '../config/constants.js';
import { logger } from '../utils/logging/logger.js';
import { SteamSearchResponseSchema } from './types.js';

export function steamSearchUrl(gameName: string): string {
  const url = new URL(STEAM.STORE_SEARCH_URL);
  url.searchParams.set('term', gameName);
  url.searchParams.set('l', 'english');
  url.searchParams.set('cc', 'US');
  return url.toString();
}

export function steamCoverUrl(appId: number): string {
  return STEAM.COVER_URL_TEMPLATE.replace('{appId}', String(appId));
}

/**
 * Header image URL of the first store search hit, or null.
 */
export async function findSteamCoverUrl(gameName: string): Promise<string | null> {
  try {
    const response = await fetch(steamSearchUrl(gameName), {
      signal: AbortSignal.timeout(TIMEOUTS.HTTP.REQUEST),
    });
    if (!response.ok) {
      logger.warn('Steam search failed', { component: 'SteamCovers', gameName, status: response.status });
      return null;
    }

    const parsed = SteamSearchResponseSchema.safeParse(await response.json());
    if (!parsed.success || parsed.data.items.length === 0) {
      logger.debug('No Steam match', { component: 'SteamCovers', gameName });
      return null;
    }

    return steamCoverUrl(parsed.data.items[0].id);
  } catch (error) {
    logger.warn('Steam search failed', {
      component: 'SteamCovers',
      gameName,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Image bytes behind `url`, or null on a non-200 answer or network failure.
 */
export async function downloadImage(url: string): Promise<Buffer | null> {
  try {
    const response = await fetch(url, { signal: AbortSignal.timeout(TIMEOUTS.HTTP.REQUEST) });
    if (response.status !== 200) {
      logger.warn('Image download failed', { component: 'SteamCovers', url, status: response.status });
      return null;
    }
    return Buffer.from(await response.arrayBuffer());
  } catch (error) {
    logger.warn('Image download failed', {
      component: 'SteamCovers',
      url,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}
