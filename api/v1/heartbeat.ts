import type { VercelRequest, VercelResponse } from '@vercel/node';
import { dispatch, parseBody } from '../../src/http.js';
import { heartbeatWorkspace, HeartbeatSchema } from '../../src/workspaces.js';

/** POST /v1/heartbeat - refresh last_seen_at and presence */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  return dispatch(req, res, {
    POST: async ({ ctx, identity }) => heartbeatWorkspace(ctx, await identity(), parseBody(req, HeartbeatSchema)),
  });
}
