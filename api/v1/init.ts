import type { VercelRequest, VercelResponse } from '@vercel/node';
import { initWorkspace, InitRequestSchema } from '../../src/bootstrap.js';
import { dispatch, parseBody } from '../../src/http.js';
import { clientAddress, enforceInitRateLimit } from '../../src/rate-limit.js';

/**
 * First contact for a new agent. Unauthenticated: it is how credentials are
 * obtained, so each client address gets a fixed number of calls per window.
 *
 * POST /v1/init
 */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  return dispatch(req, res, {
    POST: async ({ ctx }) => {
      await enforceInitRateLimit(ctx, clientAddress(req));
      return initWorkspace(ctx, parseBody(req, InitRequestSchema));
    },
  });
}
