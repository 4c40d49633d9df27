import type { VercelRequest, VercelResponse } from '@vercel/node';
import { sql } from 'drizzle-orm';
import { dispatch, queryParam } from '../../src/http.js';

const VERSION = '0.1.0';

/**
 * Health check
 *
 * GET /v1/health - basic liveness
 * GET /v1/health?detailed=true - database and cache round trips
 */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  res.setHeader('Cache-Control', 's-maxage=10, stale-while-revalidate=5');

  return dispatch(req, res, {
    GET: async ({ ctx }) => {
      const basic = { status: 'ok', timestamp: new Date().toISOString(), version: VERSION };
      if (queryParam(req, 'detailed') !== 'true') return basic;

      const dbStart = Date.now();
      await ctx.db.execute(sql`select 1`);
      const dbLatency = Date.now() - dbStart;

      const cacheStart = Date.now();
      let cacheStatus = 'connected';
      try {
        await ctx.cache.smembers('bdh:health');
      } catch (error) {
        cacheStatus = error instanceof Error ? `error: ${error.message}` : 'error';
      }

      return {
        ...basic,
        database: { status: 'connected', latency_ms: dbLatency },
        cache: { status: cacheStatus, backend: ctx.settings.redis ? 'upstash' : 'memory', latency_ms: Date.now() - cacheStart },
      };
    },
  });
}
