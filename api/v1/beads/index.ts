import type { VercelRequest, VercelResponse } from '@vercel/node';
import { listBeads } from '../../../src/beads.js';
import { dispatch, queryParam } from '../../../src/http.js';
import { parsePagination } from '../../../src/pagination.js';

/** GET /v1/beads?status=&repo=&branch=&assignee=&limit=&cursor= */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  return dispatch(req, res, {
    GET: async ({ ctx, identity }) => listBeads(
      ctx,
      await identity(),
      {
        status: queryParam(req, 'status'),
        repo: queryParam(req, 'repo'),
        branch: queryParam(req, 'branch'),
        assignee: queryParam(req, 'assignee'),
      },
      parsePagination(queryParam(req, 'limit'), queryParam(req, 'cursor'))
    ),
  });
}
