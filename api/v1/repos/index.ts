import type { VercelRequest, VercelResponse } from '@vercel/node';
import { dispatch, queryParam } from '../../../src/http.js';
import { parsePagination } from '../../../src/pagination.js';
import { listRepos } from '../../../src/workspaces.js';

/** GET /v1/repos?limit=&cursor= - live repos of the caller's project with workspace counts */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  return dispatch(req, res, {
    GET: async ({ ctx, identity }) => listRepos(
      ctx,
      await identity(),
      parsePagination(queryParam(req, 'limit'), queryParam(req, 'cursor'))
    ),
  });
}
