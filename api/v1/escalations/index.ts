import type { VercelRequest, VercelResponse } from '@vercel/node';
import { createEscalation, CreateEscalationSchema, listEscalations } from '../../../src/escalations.js';
import { dispatch, parseBody, queryParam } from '../../../src/http.js';
import { parsePagination } from '../../../src/pagination.js';

/**
 * GET  /v1/escalations?status=pending&alias=&limit=&cursor=
 * POST /v1/escalations { workspace_id, subject, situation, options?, expires_in_hours? }
 */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  return dispatch(req, res, {
    GET: async ({ ctx, identity }) => listEscalations(
      ctx,
      await identity(),
      { status: queryParam(req, 'status'), alias: queryParam(req, 'alias') },
      parsePagination(queryParam(req, 'limit'), queryParam(req, 'cursor'))
    ),
    POST: async ({ ctx, identity }) => createEscalation(ctx, await identity(), parseBody(req, CreateEscalationSchema)),
  });
}
