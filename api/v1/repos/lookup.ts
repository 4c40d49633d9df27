import type { VercelRequest, VercelResponse } from '@vercel/node';
import { dispatch, parseBody } from '../../../src/http.js';
import { lookupRepo, RepoLookupSchema } from '../../../src/workspaces.js';

/**
 * Which project a git origin belongs to. Unauthenticated, like /v1/init:
 * clients call it before they hold a key.
 *
 * POST /v1/repos/lookup { origin_url }
 */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  return dispatch(req, res, {
    POST: ({ ctx }) => lookupRepo(ctx.db, parseBody(req, RepoLookupSchema).origin_url),
  });
}
