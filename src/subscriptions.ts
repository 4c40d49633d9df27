/**
 * Bead subscriptions
 *
 * A workspace subscribes to an exact bead id or to a prefix pattern ending
 * in `*` (e.g. `api-*`), optionally narrowed to one repo. Sync consults
 * these inside its transaction to write outbox entries on status changes.
 */

import { and, arrayContains, asc, eq, isNull } from 'drizzle-orm';
import { z } from 'zod';
import { enforceActorBinding, type AuthIdentity } from './auth.js';
import type { AppContext } from './context.js';
import type { Database } from './db/index.js';
import { subscriptions, workspaces, type SubscriptionRow } from './db/schema.js';
import { ForbiddenError, NotFoundError } from './errors.js';
import { createLogger } from './logger.js';
import { aliasSchema, BEAD_ID_PATTERN, repoOriginSchema, uuidSchema } from './validation.js';
import { requireLiveWorkspace } from './workspaces.js';

const log = createLogger('subscriptions');

export const SUBSCRIPTION_EVENT_TYPES = ['status_change'] as const;
export type SubscriptionEventType = (typeof SUBSCRIPTION_EVENT_TYPES)[number];

const BEAD_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]{0,98}\*$/;

export const SubscribeSchema = z.object({
  workspace_id: uuidSchema,
  alias: aliasSchema.optional(),
  bead_id: z.string().refine(
    value => BEAD_ID_PATTERN.test(value) || BEAD_PATTERN.test(value),
    'Invalid bead_id (use an id or a prefix ending in *)'
  ),
  repo: repoOriginSchema.optional(),
  event_types: z.array(z.enum(SUBSCRIPTION_EVENT_TYPES)).min(1).default(['status_change']),
});

export interface SubscriptionView {
  subscription_id: string;
  workspace_id: string;
  alias: string;
  bead_id: string;
  repo: string | null;
  event_types: string[];
  created_at: string;
}

function toView(row: SubscriptionRow): SubscriptionView {
  return {
    subscription_id: row.id,
    workspace_id: row.workspaceId,
    alias: row.alias,
    bead_id: row.beadId,
    repo: row.repo,
    event_types: row.eventTypes,
    created_at: row.createdAt.toISOString(),
  };
}

export function subscriptionMatches(pattern: string, beadId: string): boolean {
  if (pattern.endsWith('*')) return beadId.startsWith(pattern.slice(0, -1));
  return pattern === beadId;
}

/** Subscribing twice to the same bead returns the existing subscription. */
export async function subscribe(
  ctx: AppContext,
  identity: AuthIdentity,
  input: z.infer<typeof SubscribeSchema>
): Promise<SubscriptionView & { created: boolean }> {
  enforceActorBinding(identity, input.workspace_id);
  const workspace = await requireLiveWorkspace(ctx.db, identity.projectId, input.workspace_id);
  if (input.alias && input.alias !== workspace.alias) {
    throw new ForbiddenError('alias does not match workspace', { alias: input.alias });
  }

  const inserted = await ctx.db
    .insert(subscriptions)
    .values({
      projectId: identity.projectId,
      workspaceId: workspace.workspaceId,
      alias: workspace.alias,
      beadId: input.bead_id,
      repo: input.repo ?? null,
      eventTypes: [...input.event_types],
    })
    .onConflictDoNothing()
    .returning();

  if (inserted.length > 0) {
    log.info(`${workspace.alias} subscribed to ${input.bead_id}`);
    return { ...toView(inserted[0]), created: true };
  }

  const [existing] = await ctx.db
    .select()
    .from(subscriptions)
    .where(and(
      eq(subscriptions.projectId, identity.projectId),
      eq(subscriptions.workspaceId, workspace.workspaceId),
      eq(subscriptions.beadId, input.bead_id),
      input.repo ? eq(subscriptions.repo, input.repo) : isNull(subscriptions.repo)
    ));
  if (!existing) throw new Error(`Subscription for ${input.bead_id} vanished after conflict`);
  return { ...toView(existing), created: false };
}

export async function listSubscriptions(
  ctx: AppContext,
  identity: AuthIdentity,
  workspaceId?: string
): Promise<SubscriptionView[]> {
  const conditions = [eq(subscriptions.projectId, identity.projectId)];
  const target = workspaceId ?? identity.actorId;
  if (target) conditions.push(eq(subscriptions.workspaceId, target));

  const rows = await ctx.db
    .select()
    .from(subscriptions)
    .where(and(...conditions))
    .orderBy(asc(subscriptions.createdAt));
  return rows.map(toView);
}

export async function unsubscribe(ctx: AppContext, identity: AuthIdentity, subscriptionId: string) {
  const [row] = await ctx.db
    .select()
    .from(subscriptions)
    .where(and(eq(subscriptions.id, subscriptionId), eq(subscriptions.projectId, identity.projectId)));
  if (!row) throw new NotFoundError(`Subscription ${subscriptionId} not found`);
  enforceActorBinding(identity, row.workspaceId);

  await ctx.db.delete(subscriptions).where(eq(subscriptions.id, row.id));
  return { subscription_id: row.id, deleted: true };
}

export interface Subscriber {
  workspaceId: string;
  alias: string;
}

/**
 * Live workspaces subscribed to a bead for an event type. One entry per
 * workspace even when several of its patterns match.
 */
export async function subscribersForBead(
  db: Database,
  projectId: string,
  beadId: string,
  eventType: SubscriptionEventType,
  repo: string
): Promise<Subscriber[]> {
  const rows = await db
    .select({
      workspaceId: subscriptions.workspaceId,
      alias: subscriptions.alias,
      beadId: subscriptions.beadId,
      repo: subscriptions.repo,
    })
    .from(subscriptions)
    .innerJoin(workspaces, eq(workspaces.workspaceId, subscriptions.workspaceId))
    .where(and(
      eq(subscriptions.projectId, projectId),
      arrayContains(subscriptions.eventTypes, [eventType]),
      isNull(workspaces.deletedAt)
    ))
    .orderBy(asc(subscriptions.createdAt));

  const seen = new Map<string, Subscriber>();
  for (const row of rows) {
    if (row.repo !== null && row.repo !== repo) continue;
    if (!subscriptionMatches(row.beadId, beadId)) continue;
    if (!seen.has(row.workspaceId)) seen.set(row.workspaceId, { workspaceId: row.workspaceId, alias: row.alias });
  }
  return [...seen.values()];
}
