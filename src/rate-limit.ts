/**
 * Fixed-window request limits
 *
 * Counters live in the cache under `ratelimit:<scope>:<client>`. A window
 * opens with the first hit and does not slide, so a client can burst up to
 * twice the limit across a window boundary.
 */

import type { VercelRequest } from '@vercel/node';
import type { CacheClient } from './cache.js';
import type { AppContext } from './context.js';
import { RateLimitedError, ServiceUnavailableError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('rate-limit');

/** The TCP peer address. Forwarding headers are not trusted. */
export function clientAddress(req: Pick<VercelRequest, 'socket'>): string {
  return req.socket?.remoteAddress ?? 'unknown';
}

/**
 * Count one hit and throw 429 once the window is over its limit. A cache
 * failure answers 503 rather than letting the request through.
 */
export async function enforceRateLimit(
  cache: CacheClient,
  scope: string,
  client: string,
  limit: number,
  windowSeconds: number
): Promise<void> {
  const key = `ratelimit:${scope}:${client}`;
  let hit: { count: number; ttlSeconds: number };
  try {
    hit = await cache.incrWindow(key, windowSeconds);
  } catch (error) {
    log.error(`Rate limit check for ${key} failed:`, error);
    throw new ServiceUnavailableError('Service temporarily unavailable. Please retry.', error);
  }

  if (hit.count > limit) {
    log.warn(`Rate limit exceeded: ${key} count=${hit.count} limit=${limit}`);
    throw new RateLimitedError(`Rate limit exceeded. Try again in ${hit.ttlSeconds}s.`, hit.ttlSeconds);
  }
}

export function enforceInitRateLimit(ctx: AppContext, client: string): Promise<void> {
  const { limit, windowSeconds } = ctx.settings.initRateLimit;
  return enforceRateLimit(ctx.cache, 'init', client, limit, windowSeconds);
}
