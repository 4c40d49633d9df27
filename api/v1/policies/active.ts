import type { VercelRequest, VercelResponse } from '@vercel/node';
import { dispatch, headerValue, queryParam } from '../../../src/http.js';
import { getActivePolicy, policyEtag, renderPolicyForRole } from '../../../src/policies.js';
import { normalizeRole } from '../../../src/validation.js';

/**
 * GET /v1/policies/active?role=developer&only_selected=true
 *
 * Seeds the default policy on first read. Honors If-None-Match.
 */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  return dispatch(req, res, {
    GET: async ({ ctx, identity }) => {
      const caller = await identity();
      const rawRole = queryParam(req, 'role');
      const role = rawRole ? normalizeRole(rawRole) : undefined;
      const onlySelected = queryParam(req, 'only_selected') === 'true';

      const policy = await getActivePolicy(ctx.db, caller.projectId);
      const document = renderPolicyForRole(policy, role, onlySelected);
      const etag = policyEtag(policy, role, onlySelected);

      res.setHeader('ETag', etag);
      if (headerValue(req, 'if-none-match') === etag) {
        res.status(304).end();
        return undefined;
      }
      return document;
    },
  });
}
