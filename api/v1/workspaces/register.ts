import type { VercelRequest, VercelResponse } from '@vercel/node';
import { dispatch, parseBody } from '../../../src/http.js';
import { registerWorkspace, RegisterWorkspaceSchema } from '../../../src/workspaces.js';

/** POST /v1/workspaces/register - create or return the caller's workspace */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  return dispatch(req, res, {
    POST: async ({ ctx, identity }) => registerWorkspace(ctx, await identity(), parseBody(req, RegisterWorkspaceSchema)),
  });
}
