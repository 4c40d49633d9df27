import type { VercelRequest, VercelResponse } from '@vercel/node';
import { dispatch, queryParam } from '../../../src/http.js';
import { listPolicyHistory } from '../../../src/policies.js';

/** GET /v1/policies/history?limit=20 - newest first */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  return dispatch(req, res, {
    GET: async ({ ctx, identity }) => {
      const caller = await identity();
      const limit = Number(queryParam(req, 'limit') ?? 20);
      const policies = await listPolicyHistory(ctx.db, caller.projectId, Number.isNaN(limit) ? 20 : limit);
      return { policies };
    },
  });
}
