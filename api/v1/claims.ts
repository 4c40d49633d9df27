import type { VercelRequest, VercelResponse } from '@vercel/node';
import { listClaims } from '../../src/beads.js';
import { dispatch, queryParam } from '../../src/http.js';

/**
 * Active claims held by live workspaces.
 *
 * GET /v1/claims
 * GET /v1/claims?workspace_id=<uuid>
 */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  return dispatch(req, res, {
    GET: async ({ ctx, identity }) => listClaims(ctx, await identity(), queryParam(req, 'workspace_id')),
  });
}
