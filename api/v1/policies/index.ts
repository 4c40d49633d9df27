import type { VercelRequest, VercelResponse } from '@vercel/node';
import { z } from 'zod';
import { requireWriter } from '../../../src/auth.js';
import { publishEvent } from '../../../src/events.js';
import { dispatch, parseBody } from '../../../src/http.js';
import { createPolicyVersion, PolicyBundleSchema } from '../../../src/policies.js';
import { uuidSchema } from '../../../src/validation.js';

const CreatePolicySchema = z.object({
  bundle: PolicyBundleSchema,
  base_policy_id: uuidSchema.nullable().optional(),
  activate: z.boolean().default(true),
});

/**
 * POST /v1/policies
 *   { bundle, base_policy_id?, activate? }
 *
 * A stale base_policy_id answers 409 with the current active policy.
 */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  return dispatch(req, res, {
    POST: async ({ ctx, identity }) => {
      const caller = await identity();
      requireWriter(caller);
      const input = parseBody(req, CreatePolicySchema);

      const policy = await createPolicyVersion(ctx.db, caller.projectId, input.bundle, {
        basePolicyId: input.base_policy_id,
        activate: input.activate,
        createdByWorkspaceId: caller.actorId,
      });
      if (policy.is_active) {
        await publishEvent(ctx.cache, caller.projectId, {
          type: 'policy.activated',
          workspace_id: caller.actorId,
          policy_id: policy.policy_id,
          version: policy.version,
        });
      }
      return policy;
    },
  });
}
