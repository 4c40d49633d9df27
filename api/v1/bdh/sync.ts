import type { VercelRequest, VercelResponse } from '@vercel/node';
import { syncBeads, SyncRequestSchema } from '../../../src/beads-sync.js';
import { dispatch, parseBody } from '../../../src/http.js';

/**
 * Mirror a workspace's beads and reconcile claims.
 *
 * POST /v1/bdh/sync
 *   { workspace_id, sync_mode: "full", issues_jsonl | issues }
 *   { workspace_id, sync_mode: "incremental", changed_issues | changed_items, deleted_ids }
 *
 * Claim conflicts come back as `rejections` in a 200 response.
 */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  return dispatch(req, res, {
    POST: async ({ ctx, identity }) => syncBeads(ctx, await identity(), parseBody(req, SyncRequestSchema)),
  });
}
