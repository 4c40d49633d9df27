import type { VercelRequest, VercelResponse } from '@vercel/node';
import { z } from 'zod';
import { requireWriter } from '../../../src/auth.js';
import { publishEvent } from '../../../src/events.js';
import { dispatch, parseBody } from '../../../src/http.js';
import { resetPolicyToDefault } from '../../../src/policies.js';
import { uuidSchema } from '../../../src/validation.js';

const ResetSchema = z.object({ base_policy_id: uuidSchema.nullable().optional() });

/** POST /v1/policies/reset - new active version carrying the default bundle */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  return dispatch(req, res, {
    POST: async ({ ctx, identity }) => {
      const caller = await identity();
      requireWriter(caller);
      const input = parseBody(req, ResetSchema);

      const policy = await resetPolicyToDefault(ctx.db, caller.projectId, {
        basePolicyId: input.base_policy_id,
        createdByWorkspaceId: caller.actorId,
      });
      await publishEvent(ctx.cache, caller.projectId, {
        type: 'policy.activated',
        workspace_id: caller.actorId,
        policy_id: policy.policy_id,
        version: policy.version,
      });
      return policy;
    },
  });
}
