import type { VercelRequest, VercelResponse } from '@vercel/node';
import { readyBeads } from '../../../src/beads.js';
import { dispatch, queryParam } from '../../../src/http.js';
import { clampLimit } from '../../../src/pagination.js';

/** GET /v1/beads/ready - open beads with no open blockers */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  const limit = queryParam(req, 'limit');
  return dispatch(req, res, {
    GET: async ({ ctx, identity }) => readyBeads(
      ctx,
      await identity(),
      { repo: queryParam(req, 'repo'), branch: queryParam(req, 'branch'), assignee: queryParam(req, 'assignee') },
      clampLimit(limit === undefined ? undefined : Number(limit))
    ),
  });
}
