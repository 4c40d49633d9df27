import type { VercelRequest, VercelResponse } from '@vercel/node';
import { dispatch, queryParam } from '../../../src/http.js';
import { listWorkspaces } from '../../../src/workspaces.js';

/**
 * GET /v1/workspaces
 * GET /v1/workspaces?repo=github.com/org/repo&alias=alice-agent&include_deleted=true
 */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  return dispatch(req, res, {
    GET: async ({ ctx, identity }) => listWorkspaces(ctx, await identity(), {
      repo: queryParam(req, 'repo'),
      alias: queryParam(req, 'alias'),
      includeDeleted: queryParam(req, 'include_deleted') === 'true',
    }),
  });
}
