import type { VercelRequest, VercelResponse } from '@vercel/node';
import { requireMember } from '../../../src/auth.js';
import { ValidationError } from '../../../src/errors.js';
import { dispatch, queryParam } from '../../../src/http.js';
import { listOutbox } from '../../../src/outbox.js';
import { parsePagination } from '../../../src/pagination.js';
import type { OutboxStatus } from '../../../src/db/schema.js';

const STATUSES: readonly OutboxStatus[] = ['pending', 'delivered', 'failed'];

function parseStatus(value: string | undefined): OutboxStatus | undefined {
  if (value === undefined) return undefined;
  const status = STATUSES.find(candidate => candidate === value);
  if (!status) throw new ValidationError(`Invalid status: must be one of ${STATUSES.join(', ')}`);
  return status;
}

/** GET /v1/notifications/outbox?status=failed&limit=&cursor= - operator view, members only */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  return dispatch(req, res, {
    GET: async ({ ctx, identity }) => {
      const caller = await identity();
      requireMember(caller);
      return listOutbox(ctx.db, caller.projectId, {
        status: parseStatus(queryParam(req, 'status')),
        ...parsePagination(queryParam(req, 'limit'), queryParam(req, 'cursor')),
      });
    },
  });
}
