import type { VercelRequest, VercelResponse } from '@vercel/node';
import { dispatch, parseBody } from '../../../src/http.js';
import { ensureProjectRepo, RepoEnsureSchema } from '../../../src/workspaces.js';

/** POST /v1/repos/ensure { origin_url, project_id? } - get or create a repo in the caller's project */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  return dispatch(req, res, {
    POST: async ({ ctx, identity }) => ensureProjectRepo(ctx, await identity(), parseBody(req, RepoEnsureSchema)),
  });
}
