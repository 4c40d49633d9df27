/**
 * Escalations
 *
 * An agent that is blocked on a human decision files an escalation. A
 * responder answers it once; the answer is mailed back to the escalating
 * workspace through the outbox, written in the same transaction as the
 * response. Pending escalations past their deadline become `expired`.
 */

import { and, desc, eq, isNotNull, lt, type SQL } from 'drizzle-orm';
import { z } from 'zod';
import { enforceActorBinding, redactForPrincipal, requireWriter, type AuthIdentity } from './auth.js';
import type { AppContext } from './context.js';
import type { Database } from './db/index.js';
import { escalations, type EscalationRow, type EscalationStatus } from './db/schema.js';
import { ConflictError, ForbiddenError, NotFoundError, ValidationError } from './errors.js';
import { publishEvent } from './events.js';
import { createLogger } from './logger.js';
import { recordNotificationIntents } from './outbox.js';
import { cursorOffset, toPage } from './pagination.js';
import { aliasSchema, isUuid, isValidAlias, uuidSchema } from './validation.js';
import { requireLiveWorkspace } from './workspaces.js';

const log = createLogger('escalations');

const STATUSES: readonly EscalationStatus[] = ['pending', 'responded', 'expired'];

function isEscalationStatus(value: string): value is EscalationStatus {
  return STATUSES.some(status => status === value);
}

export const CreateEscalationSchema = z.object({
  workspace_id: uuidSchema,
  alias: aliasSchema.optional(),
  subject: z.string().min(1).max(200),
  situation: z.string().min(1).max(10_000),
  options: z.array(z.string().min(1).max(500)).max(20).optional(),
  expires_in_hours: z.number().positive().max(24 * 30).optional(),
});

export const RespondEscalationSchema = z.object({
  response: z.string().min(1).max(10_000),
  note: z.string().max(10_000).optional(),
});

export interface EscalationView {
  escalation_id: string;
  project_id: string;
  workspace_id: string;
  alias: string;
  subject: string;
  situation: string;
  options: string[] | null;
  status: EscalationStatus;
  response: string | null;
  response_note: string | null;
  created_at: string;
  responded_at: string | null;
  expires_at: string | null;
}

export function toEscalationView(row: EscalationRow): EscalationView {
  return {
    escalation_id: row.id,
    project_id: row.projectId,
    workspace_id: row.workspaceId,
    alias: row.alias,
    subject: row.subject,
    situation: row.situation,
    options: row.options,
    status: row.status,
    response: row.response,
    response_note: row.responseNote,
    created_at: row.createdAt.toISOString(),
    responded_at: row.respondedAt ? row.respondedAt.toISOString() : null,
    expires_at: row.expiresAt ? row.expiresAt.toISOString() : null,
  };
}

export async function createEscalation(
  ctx: AppContext,
  identity: AuthIdentity,
  input: z.infer<typeof CreateEscalationSchema>,
  now = new Date()
) {
  enforceActorBinding(identity, input.workspace_id);
  const workspace = await requireLiveWorkspace(ctx.db, identity.projectId, input.workspace_id);
  if (input.alias && input.alias !== workspace.alias) {
    throw new ForbiddenError('alias does not match workspace', { alias: input.alias });
  }

  const expiresAt = input.expires_in_hours
    ? new Date(now.getTime() + input.expires_in_hours * 3_600_000)
    : null;

  const [row] = await ctx.db
    .insert(escalations)
    .values({
      projectId: identity.projectId,
      workspaceId: workspace.workspaceId,
      alias: workspace.alias,
      subject: input.subject,
      situation: input.situation,
      options: input.options ?? null,
      expiresAt,
    })
    .returning();

  log.info(`${workspace.alias} escalated: ${input.subject}`);
  await publishEvent(ctx.cache, identity.projectId, {
    type: 'escalation.created',
    workspace_id: workspace.workspaceId,
    alias: workspace.alias,
    escalation_id: row.id,
    subject: row.subject,
  });

  return {
    escalation_id: row.id,
    status: row.status,
    created_at: row.createdAt.toISOString(),
    expires_at: row.expiresAt ? row.expiresAt.toISOString() : null,
  };
}

export async function getEscalation(ctx: AppContext, identity: AuthIdentity, escalationId: string) {
  if (!isUuid(escalationId)) throw new NotFoundError(`Escalation ${escalationId} not found`);
  const [row] = await ctx.db
    .select()
    .from(escalations)
    .where(and(eq(escalations.id, escalationId), eq(escalations.projectId, identity.projectId)));
  if (!row) throw new NotFoundError(`Escalation ${escalationId} not found`);
  return redactForPrincipal(identity, toEscalationView(row));
}

export interface EscalationFilter {
  status?: string;
  alias?: string;
}

export async function listEscalations(
  ctx: AppContext,
  identity: AuthIdentity,
  filter: EscalationFilter,
  page: { limit: number; cursor: Record<string, unknown> | null }
) {
  const conditions: SQL[] = [eq(escalations.projectId, identity.projectId)];
  if (filter.status !== undefined) {
    if (!isEscalationStatus(filter.status)) {
      throw new ValidationError(`Invalid status: must be one of ${STATUSES.join(', ')}`);
    }
    conditions.push(eq(escalations.status, filter.status));
  }
  if (filter.alias !== undefined) {
    if (!isValidAlias(filter.alias)) throw new ValidationError('Invalid alias');
    conditions.push(eq(escalations.alias, filter.alias));
  }

  const offset = cursorOffset(page.cursor);
  const rows = await ctx.db
    .select()
    .from(escalations)
    .where(and(...conditions))
    .orderBy(desc(escalations.createdAt), desc(escalations.id))
    .limit(page.limit + 1)
    .offset(offset);

  return redactForPrincipal(
    identity,
    toPage(rows.map(toEscalationView), page.limit, () => ({ offset: offset + page.limit }))
  );
}

type RespondOutcome =
  | { kind: 'responded'; row: EscalationRow }
  | { kind: 'expired' }
  | { kind: 'not_pending'; status: EscalationStatus };

/** Answer a pending escalation and queue the reply for the escalating workspace. */
export async function respondToEscalation(
  ctx: AppContext,
  identity: AuthIdentity,
  escalationId: string,
  input: z.infer<typeof RespondEscalationSchema>,
  now = new Date()
) {
  requireWriter(identity);
  if (!isUuid(escalationId)) throw new NotFoundError(`Escalation ${escalationId} not found`);

  const outcome = await ctx.db.transaction(async (tx): Promise<RespondOutcome> => {
    const [row] = await tx
      .select()
      .from(escalations)
      .where(and(eq(escalations.id, escalationId), eq(escalations.projectId, identity.projectId)))
      .for('update');
    if (!row) throw new NotFoundError(`Escalation ${escalationId} not found`);
    if (row.status !== 'pending') return { kind: 'not_pending', status: row.status };

    // An overdue escalation is expired on contact, and that state change is kept.
    if (row.expiresAt && row.expiresAt.getTime() <= now.getTime()) {
      await tx.update(escalations).set({ status: 'expired' }).where(eq(escalations.id, row.id));
      return { kind: 'expired' };
    }

    const [updated] = await tx
      .update(escalations)
      .set({ status: 'responded', response: input.response, responseNote: input.note ?? null, respondedAt: now })
      .where(eq(escalations.id, row.id))
      .returning();

    await recordNotificationIntents(
      tx,
      identity.projectId,
      {
        eventType: 'escalation_response',
        payload: {
          escalation_id: row.id,
          subject: row.subject,
          response: input.response,
          note: input.note ?? null,
        },
      },
      [{ workspaceId: row.workspaceId, alias: row.alias }]
    );
    return { kind: 'responded', row: updated };
  });

  if (outcome.kind === 'expired') {
    throw new ConflictError(`Escalation ${escalationId} has expired`, { status: 'expired' }, 'escalation_expired');
  }
  if (outcome.kind === 'not_pending') {
    throw new ConflictError(
      `Escalation ${escalationId} is already ${outcome.status}`,
      { status: outcome.status },
      'escalation_not_pending'
    );
  }

  await publishEvent(ctx.cache, identity.projectId, {
    type: 'escalation.responded',
    workspace_id: outcome.row.workspaceId,
    escalation_id: outcome.row.id,
    response: input.response,
  });
  return redactForPrincipal(identity, toEscalationView(outcome.row));
}

/** Mark overdue pending escalations expired. Returns how many changed. */
export async function expireOverdueEscalations(db: Database, now = new Date()): Promise<number> {
  const expired = await db
    .update(escalations)
    .set({ status: 'expired' })
    .where(and(eq(escalations.status, 'pending'), isNotNull(escalations.expiresAt), lt(escalations.expiresAt, now)))
    .returning({ id: escalations.id });
  if (expired.length > 0) log.info(`Expired ${expired.length} overdue escalation(s)`);
  return expired.length;
}
