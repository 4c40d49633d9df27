import type { VercelRequest, VercelResponse } from '@vercel/node';
import { dispatch, parseBody, queryParam } from '../../../src/http.js';
import { listSubscriptions, subscribe, SubscribeSchema } from '../../../src/subscriptions.js';

/**
 * GET  /v1/subscriptions?workspace_id=
 * POST /v1/subscriptions { workspace_id, bead_id, repo?, event_types? }
 */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  return dispatch(req, res, {
    GET: async ({ ctx, identity }) => ({
      subscriptions: await listSubscriptions(ctx, await identity(), queryParam(req, 'workspace_id')),
    }),
    POST: async ({ ctx, identity }) => subscribe(ctx, await identity(), parseBody(req, SubscribeSchema)),
  });
}
