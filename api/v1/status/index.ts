import type { VercelRequest, VercelResponse } from '@vercel/node';
import { dispatch, queryParam } from '../../../src/http.js';
import { snapshot } from '../../../src/status.js';

/** GET /v1/status?repo=&branch=&alias= */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  res.setHeader('Cache-Control', 'no-store');
  return dispatch(req, res, {
    GET: async ({ ctx, identity }) => snapshot(ctx, await identity(), {
      repo: queryParam(req, 'repo'),
      branch: queryParam(req, 'branch'),
      alias: queryParam(req, 'alias'),
    }),
  });
}
