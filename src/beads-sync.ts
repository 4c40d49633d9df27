/**
 * Bead sync
 *
 * Clients push their work items; the server mirrors them and keeps claim
 * bookkeeping. One call is one transaction: upserts, claim changes and
 * outbox entries commit together or not at all.
 *
 * Claim arbitration: every bead touched by the call is locked with a
 * transaction-scoped advisory lock (in bead id order, so two calls never
 * wait on each other in opposite orders) before its claims are read. Two
 * workspaces racing for the same bead are therefore serialized, and the
 * second one sees the first one's claim and is rejected.
 */

import { and, asc, eq, inArray, isNull, sql } from 'drizzle-orm';
import { z } from 'zod';
import { enforceActorBinding, type AuthIdentity } from './auth.js';
import type { AppContext } from './context.js';
import type { Database } from './db/index.js';
import { claims, issues, workspaces, type BeadRef, type WorkspaceRow } from './db/schema.js';
import { ValidationError } from './errors.js';
import { publishEvents, type CoordinationEvent } from './events.js';
import { checkRecords, isJsonObject, parseJsonl, type JsonObject } from './jsonl.js';
import { createLogger } from './logger.js';
import { recordNotificationIntents } from './outbox.js';
import { claimsPolicy, getActivePolicy } from './policies.js';
import { subscribersForBead } from './subscriptions.js';
import { branchSchema, isValidBeadId, isValidBranch, isValidCanonicalOrigin, uuidSchema } from './validation.js';
import { requireLiveWorkspace, workspaceRepoOrigin } from './workspaces.js';

const log = createLogger('sync');

const MAX_APEX_DEPTH = 10;
const MAX_CREATED_BY_LENGTH = 255;

export const SyncRequestSchema = z.object({
  workspace_id: uuidSchema,
  sync_mode: z.enum(['full', 'incremental']).default('full'),
  branch: branchSchema.default('main'),
  issues_jsonl: z.string().optional(),
  issues: z.array(z.unknown()).optional(),
  changed_issues: z.string().optional(),
  changed_items: z.array(z.unknown()).optional(),
  deleted_ids: z.array(z.string()).max(10_000).default([]),
  coordinated: z.array(z.string()).max(1000).default([]),
  command_line: z.string().max(4096).optional(),
});

export type SyncRequest = z.infer<typeof SyncRequestSchema>;

export type ClaimChange =
  | { bead_id: string; action: 'acquired'; coordinated: boolean }
  | { bead_id: string; action: 'released'; workspace_id: string; alias: string };

export interface ClaimRejection {
  bead_id: string;
  claimed: false;
  held_by: string;
  held_by_workspace_id: string;
  held_since: string;
}

export interface SyncResult {
  status: 'completed';
  sync_mode: 'full' | 'incremental';
  repo: string;
  branch: string;
  issues_synced: number;
  issues_added: number;
  issues_updated: number;
  issues_deleted: number;
  skipped: number;
  conflicts: string[];
  claim_changes: ClaimChange[];
  rejections: ClaimRejection[];
  notifications_queued: number;
  synced_at: string;
}

interface ParsedItem {
  beadId: string;
  status: string | null;
  title: string | null;
  description: string | null;
  priority: number | null;
  issueType: string | null;
  assignee: string | null;
  createdBy: string | null;
  labels: string[] | null;
  blockedBy: BeadRef[];
  parentId: BeadRef | null;
  createdAt: Date | null;
  updatedAt: Date | null;
}

interface Scope {
  projectId: string;
  repo: string;
  branch: string;
}

// ============================================================================
// Item parsing
// ============================================================================

const optionalString = (value: unknown): string | null =>
  typeof value === 'string' && value.length > 0 ? value : null;

function parseTimestamp(value: unknown): Date | null {
  if (typeof value !== 'string' || !value) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/** `bd-1` (same repo) or `github.com/org/other:bd-1` (cross repo, same branch). */
export function parseDependencyRef(value: string, scope: Pick<Scope, 'repo' | 'branch'>): BeadRef | null {
  const ref = value.trim();
  if (!ref) return null;

  const colon = ref.indexOf(':');
  if (colon !== -1) {
    const repo = ref.slice(0, colon).trim();
    const beadId = ref.slice(colon + 1).trim();
    if (!repo || !isValidBeadId(beadId) || !isValidCanonicalOrigin(repo)) {
      log.warn(`Malformed cross-repo dependency ref: ${JSON.stringify(value)}`);
      return null;
    }
    return { repo, branch: scope.branch, bead_id: beadId };
  }

  if (!isValidBeadId(ref)) {
    log.warn(`Invalid bead ID in dependency ref: ${JSON.stringify(value)}`);
    return null;
  }
  return { repo: scope.repo, branch: scope.branch, bead_id: ref };
}

function parseStructuredRef(item: JsonObject, scope: Pick<Scope, 'repo' | 'branch'>): BeadRef | null {
  const beadId = item.bead_id;
  if (typeof beadId !== 'string' || !isValidBeadId(beadId)) return null;
  const repo = item.repo;
  if (repo !== undefined && repo !== null && (typeof repo !== 'string' || !isValidCanonicalOrigin(repo))) return null;
  const branch = item.branch;
  if (branch !== undefined && branch !== null && (typeof branch !== 'string' || !isValidBranch(branch))) return null;
  return {
    repo: typeof repo === 'string' && repo ? repo : scope.repo,
    branch: typeof branch === 'string' && branch ? branch : scope.branch,
    bead_id: beadId,
  };
}

export function parseBlockedBy(value: unknown, scope: Pick<Scope, 'repo' | 'branch'>): BeadRef[] {
  if (!Array.isArray(value)) return [];
  const refs: BeadRef[] = [];
  for (const entry of value) {
    const ref = typeof entry === 'string'
      ? parseDependencyRef(entry, scope)
      : isJsonObject(entry) ? parseStructuredRef(entry, scope) : null;
    if (ref) refs.push(ref);
  }
  return refs;
}

function parseItem(record: JsonObject, scope: Scope, statusById: Map<string, string | null>): ParsedItem {
  const beadId = String(record.id);
  const blockedBy = parseBlockedBy(record.blocked_by, scope);
  let parentId: BeadRef | null = null;

  const deps = Array.isArray(record.dependencies) ? record.dependencies : [];
  for (const dep of deps) {
    if (!isJsonObject(dep) || typeof dep.depends_on_id !== 'string') continue;
    const ref = parseDependencyRef(dep.depends_on_id, scope);
    if (!ref) continue;

    if (dep.type === 'parent-child') {
      parentId = parentId ?? ref;
    } else if (dep.type === 'blocks' && statusById.get(dep.depends_on_id) !== 'closed') {
      blockedBy.push(ref);
    }
  }

  let createdBy = record.created_by === undefined || record.created_by === null
    ? null
    : String(record.created_by).trim() || null;
  if (createdBy && createdBy.length > MAX_CREATED_BY_LENGTH) {
    log.warn(`Truncating created_by for ${beadId} (len=${createdBy.length})`);
    createdBy = createdBy.slice(0, MAX_CREATED_BY_LENGTH);
  }

  const labels = Array.isArray(record.labels)
    ? record.labels.filter((label): label is string => typeof label === 'string')
    : null;

  return {
    beadId,
    status: optionalString(record.status),
    title: optionalString(record.title),
    description: optionalString(record.description),
    priority: typeof record.priority === 'number' && Number.isInteger(record.priority) ? record.priority : null,
    issueType: optionalString(record.issue_type),
    assignee: optionalString(record.assignee),
    createdBy,
    labels: labels && labels.length > 0 ? labels : null,
    blockedBy,
    parentId,
    createdAt: parseTimestamp(record.created_at),
    updatedAt: parseTimestamp(record.updated_at),
  };
}

/** Records keyed by id; records without a valid id are counted as skipped. Later duplicates win. */
export function validateRecords(records: JsonObject[]): { valid: Map<string, JsonObject>; skipped: number } {
  const valid = new Map<string, JsonObject>();
  let skipped = 0;
  records.forEach((record, index) => {
    const id = record.id;
    if (typeof id !== 'string' || !isValidBeadId(id)) {
      log.warn(`Skipping record with missing or invalid bead ID at index ${index}`);
      skipped++;
      return;
    }
    valid.set(id, record);
  });
  return { valid, skipped };
}

function collectRecords(input: SyncRequest): JsonObject[] {
  if (input.sync_mode === 'full') {
    if (input.issues_jsonl !== undefined) return parseJsonl(input.issues_jsonl);
    if (input.issues !== undefined) return checkRecords(input.issues);
    throw new ValidationError('Full sync requires issues_jsonl or issues');
  }
  if (input.changed_issues !== undefined) return parseJsonl(input.changed_issues);
  if (input.changed_items !== undefined) return checkRecords(input.changed_items);
  return [];
}

// ============================================================================
// Claims
// ============================================================================

function isClaimIntent(item: ParsedItem, workspace: WorkspaceRow): boolean {
  if (item.status !== 'in_progress') return false;
  return !item.assignee || item.assignee === workspace.alias || item.assignee === workspace.workspaceId;
}

async function lockBead(tx: Database, projectId: string, beadId: string): Promise<void> {
  await tx.execute(sql`select pg_advisory_xact_lock(hashtext(${`${projectId}:${beadId}`}))`);
}

/** Walk parent links up to the top-most ancestor. */
async function findApex(
  tx: Database,
  scope: Scope,
  item: ParsedItem,
  parentsInPayload: Map<string, BeadRef | null>
): Promise<string> {
  let apex = item.beadId;
  let ref = item.parentId;
  const seen = new Set([item.beadId]);

  for (let depth = 0; ref && depth < MAX_APEX_DEPTH; depth++) {
    if (seen.has(ref.bead_id)) break;
    seen.add(ref.bead_id);
    apex = ref.bead_id;

    if (ref.repo === scope.repo && ref.branch === scope.branch && parentsInPayload.has(ref.bead_id)) {
      ref = parentsInPayload.get(ref.bead_id) ?? null;
      continue;
    }
    const [parent] = await tx
      .select({ parentId: issues.parentId })
      .from(issues)
      .where(and(
        eq(issues.projectId, scope.projectId),
        eq(issues.repo, ref.repo),
        eq(issues.branch, ref.branch),
        eq(issues.beadId, ref.bead_id)
      ));
    ref = parent?.parentId ?? null;
  }
  return apex;
}

// ============================================================================
// Sync
// ============================================================================

export async function syncBeads(ctx: AppContext, identity: AuthIdentity, input: SyncRequest): Promise<SyncResult> {
  enforceActorBinding(identity, input.workspace_id);
  const projectId = identity.projectId;

  const workspace = await requireLiveWorkspace(ctx.db, projectId, input.workspace_id);
  const repo = await workspaceRepoOrigin(ctx.db, workspace);
  if (!repo) {
    throw new ValidationError('Workspace has no repo; register it with a repo_origin before syncing', {
      workspace_id: workspace.workspaceId,
    });
  }
  const scope: Scope = { projectId, repo, branch: input.branch };

  const { valid, skipped: skippedRecords } = validateRecords(collectRecords(input));
  const deletedIds = input.deleted_ids.filter(isValidBeadId);
  const skipped = skippedRecords + (input.deleted_ids.length - deletedIds.length);
  const coordinatedIds = new Set(input.coordinated);

  const statusById = new Map<string, string | null>();
  for (const [id, record] of valid) statusById.set(id, optionalString(record.status));
  const items = [...valid.values()]
    .map(record => parseItem(record, scope, statusById))
    .sort((a, b) => (a.beadId < b.beadId ? -1 : a.beadId > b.beadId ? 1 : 0));
  const parentsInPayload = new Map(items.map(item => [item.beadId, item.parentId]));

  if (input.command_line) log.debug(`${workspace.alias}: ${input.command_line}`);

  const policy = claimsPolicy((await getActivePolicy(ctx.db, projectId)).bundle);
  const syncedAt = new Date();

  const result: SyncResult = {
    status: 'completed',
    sync_mode: input.sync_mode,
    repo,
    branch: input.branch,
    issues_synced: 0,
    issues_added: 0,
    issues_updated: 0,
    issues_deleted: 0,
    skipped,
    conflicts: [],
    claim_changes: [],
    rejections: [],
    notifications_queued: 0,
    synced_at: syncedAt.toISOString(),
  };
  const events: CoordinationEvent[] = [];

  await ctx.db.transaction(async (tx) => {
    const lockOrder = [...new Set([...items.map(item => item.beadId), ...deletedIds])].sort();
    for (const beadId of lockOrder) await lockBead(tx, projectId, beadId);

    for (const item of items) {
      const intent = isClaimIntent(item, workspace);
      const coordinated = intent && coordinatedIds.has(item.beadId) && policy.allow_coordinated;

      const holders = await tx
        .select({
          workspaceId: claims.workspaceId,
          alias: claims.alias,
          coordinated: claims.coordinated,
          claimedAt: claims.claimedAt,
        })
        .from(claims)
        .innerJoin(workspaces, eq(workspaces.workspaceId, claims.workspaceId))
        .where(and(eq(claims.projectId, projectId), eq(claims.beadId, item.beadId), isNull(workspaces.deletedAt)))
        .orderBy(asc(claims.claimedAt));
      const ownClaim = holders.find(holder => holder.workspaceId === workspace.workspaceId);
      const others = holders.filter(holder => holder.workspaceId !== workspace.workspaceId);

      if (intent && !ownClaim && others.length > 0 && !(coordinated && others.every(other => other.coordinated))) {
        const holder = others[0];
        result.rejections.push({
          bead_id: item.beadId,
          claimed: false,
          held_by: holder.alias,
          held_by_workspace_id: holder.workspaceId,
          held_since: holder.claimedAt.toISOString(),
        });
        continue;
      }

      const [existing] = await tx
        .select({ status: issues.status, updatedAt: issues.updatedAt })
        .from(issues)
        .where(and(
          eq(issues.projectId, projectId),
          eq(issues.repo, repo),
          eq(issues.branch, input.branch),
          eq(issues.beadId, item.beadId)
        ))
        .for('update');

      if (existing && item.updatedAt && existing.updatedAt && item.updatedAt < existing.updatedAt) {
        log.info(`Stale update for ${item.beadId}: incoming ${item.updatedAt.toISOString()} < stored ${existing.updatedAt.toISOString()}`);
        result.conflicts.push(item.beadId);
        continue;
      }

      if (existing) result.issues_updated++;
      else result.issues_added++;
      result.issues_synced++;

      const row = {
        projectId,
        repo,
        branch: input.branch,
        beadId: item.beadId,
        title: item.title,
        description: item.description,
        status: item.status,
        priority: item.priority,
        issueType: item.issueType,
        assignee: item.assignee,
        createdBy: item.createdBy,
        labels: item.labels,
        blockedBy: item.blockedBy,
        parentId: item.parentId,
        createdAt: item.createdAt,
        updatedAt: item.updatedAt,
        syncedAt,
      };
      await tx
        .insert(issues)
        .values(row)
        .onConflictDoUpdate({
          target: [issues.projectId, issues.repo, issues.branch, issues.beadId],
          set: { ...row, createdBy: sql`coalesce(excluded.created_by, ${issues.createdBy})` },
        });

      // New beads carry no prior status, so they never notify
      if (existing && existing.status !== null && item.status !== null && existing.status !== item.status) {
        const subscribers = await subscribersForBead(tx, projectId, item.beadId, 'status_change', repo);
        result.notifications_queued += await recordNotificationIntents(tx, projectId, {
          eventType: 'bead_status_change',
          payload: {
            bead_id: item.beadId,
            repo,
            branch: input.branch,
            old_status: existing.status,
            new_status: item.status,
            title: item.title,
          },
        }, subscribers);
        events.push({
          type: 'bead.status_changed',
          workspace_id: workspace.workspaceId,
          alias: workspace.alias,
          bead_id: item.beadId,
          repo,
          branch: input.branch,
          old_status: existing.status,
          new_status: item.status,
        });
      }

      if (intent) {
        if (!ownClaim) {
          await tx.insert(claims).values({
            projectId,
            workspaceId: workspace.workspaceId,
            alias: workspace.alias,
            humanName: workspace.humanName,
            beadId: item.beadId,
            apexBeadId: await findApex(tx, scope, item, parentsInPayload),
            coordinated,
          });
          result.claim_changes.push({ bead_id: item.beadId, action: 'acquired', coordinated });
          events.push({
            type: 'claim.acquired',
            workspace_id: workspace.workspaceId,
            alias: workspace.alias,
            bead_id: item.beadId,
            coordinated,
          });
        }
        continue;
      }

      // in_progress under someone else's name leaves claims alone
      if (item.status === 'in_progress') continue;
      const releaseAll = item.status === 'closed';
      const released = await tx
        .delete(claims)
        .where(and(
          eq(claims.projectId, projectId),
          eq(claims.beadId, item.beadId),
          releaseAll ? undefined : eq(claims.workspaceId, workspace.workspaceId)
        ))
        .returning({ workspaceId: claims.workspaceId, alias: claims.alias });
      for (const claim of released) {
        result.claim_changes.push({ bead_id: item.beadId, action: 'released', workspace_id: claim.workspaceId, alias: claim.alias });
        events.push({ type: 'claim.released', workspace_id: claim.workspaceId, alias: claim.alias, bead_id: item.beadId });
      }
    }

    if (deletedIds.length > 0) {
      const removed = await tx
        .delete(issues)
        .where(and(
          eq(issues.projectId, projectId),
          eq(issues.repo, repo),
          eq(issues.branch, input.branch),
          inArray(issues.beadId, deletedIds)
        ))
        .returning({ beadId: issues.beadId });
      result.issues_deleted = removed.length;

      const released = await tx
        .delete(claims)
        .where(and(eq(claims.projectId, projectId), inArray(claims.beadId, deletedIds)))
        .returning({ workspaceId: claims.workspaceId, alias: claims.alias, beadId: claims.beadId });
      for (const claim of released) {
        result.claim_changes.push({ bead_id: claim.beadId, action: 'released', workspace_id: claim.workspaceId, alias: claim.alias });
        events.push({ type: 'claim.released', workspace_id: claim.workspaceId, alias: claim.alias, bead_id: claim.beadId });
      }
    }

    await tx
      .update(workspaces)
      .set({ lastSeenAt: syncedAt })
      .where(eq(workspaces.workspaceId, workspace.workspaceId));
  });

  const currentIssue = await currentClaim(ctx.db, projectId, workspace.workspaceId);
  await ctx.presence.heartbeat(workspace.workspaceId, {
    projectId,
    alias: workspace.alias,
    role: workspace.role,
    humanName: workspace.humanName,
    repo,
    branch: input.branch,
    currentIssue,
  });
  await publishEvents(ctx.cache, projectId, events);

  log.info(
    `${workspace.alias} ${input.sync_mode} sync ${repo}@${input.branch}: ` +
    `${result.issues_added} added, ${result.issues_updated} updated, ${result.issues_deleted} deleted, ` +
    `${result.rejections.length} rejected, ${result.conflicts.length} stale`
  );
  return result;
}

async function currentClaim(db: Database, projectId: string, workspaceId: string): Promise<string | null> {
  const [claim] = await db
    .select({ beadId: claims.beadId })
    .from(claims)
    .where(and(eq(claims.projectId, projectId), eq(claims.workspaceId, workspaceId)))
    .orderBy(asc(claims.claimedAt))
    .limit(1);
  return claim?.beadId ?? null;
}
