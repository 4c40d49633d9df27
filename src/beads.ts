/**
 * Bead and claim reads
 */

import { and, asc, desc, eq, inArray, isNull, sql, type SQL } from 'drizzle-orm';
import { redactForPrincipal, type AuthIdentity } from './auth.js';
import type { AppContext } from './context.js';
import type { Database } from './db/index.js';
import { claims, issues, workspaces, type ClaimRow, type IssueRow } from './db/schema.js';
import { NotFoundError, ValidationError } from './errors.js';
import { cursorOffset, toPage } from './pagination.js';
import { isUuid } from './validation.js';

export interface BeadView {
  bead_id: string;
  repo: string;
  branch: string;
  title: string | null;
  description: string | null;
  status: string | null;
  priority: number | null;
  issue_type: string | null;
  assignee: string | null;
  created_by: string | null;
  labels: string[];
  blocked_by: IssueRow['blockedBy'];
  parent_id: IssueRow['parentId'];
  created_at: string | null;
  updated_at: string | null;
  synced_at: string;
}

export function toBeadView(row: IssueRow): BeadView {
  return {
    bead_id: row.beadId,
    repo: row.repo,
    branch: row.branch,
    title: row.title,
    description: row.description,
    status: row.status,
    priority: row.priority,
    issue_type: row.issueType,
    assignee: row.assignee,
    created_by: row.createdBy,
    labels: row.labels ?? [],
    blocked_by: row.blockedBy,
    parent_id: row.parentId,
    created_at: row.createdAt ? row.createdAt.toISOString() : null,
    updated_at: row.updatedAt ? row.updatedAt.toISOString() : null,
    synced_at: row.syncedAt.toISOString(),
  };
}

export interface ClaimView {
  bead_id: string;
  apex_bead_id: string | null;
  workspace_id: string;
  alias: string;
  human_name: string | null;
  coordinated: boolean;
  claimed_at: string;
}

export function toClaimView(row: ClaimRow): ClaimView {
  return {
    bead_id: row.beadId,
    apex_bead_id: row.apexBeadId,
    workspace_id: row.workspaceId,
    alias: row.alias,
    human_name: row.humanName,
    coordinated: row.coordinated,
    claimed_at: row.claimedAt.toISOString(),
  };
}

export interface BeadFilter {
  status?: string;
  repo?: string;
  branch?: string;
  assignee?: string;
}

function filterConditions(projectId: string, filter: BeadFilter): SQL[] {
  const conditions: SQL[] = [eq(issues.projectId, projectId)];
  if (filter.status) conditions.push(eq(issues.status, filter.status));
  if (filter.repo) conditions.push(eq(issues.repo, filter.repo));
  if (filter.branch) conditions.push(eq(issues.branch, filter.branch));
  if (filter.assignee) conditions.push(eq(issues.assignee, filter.assignee));
  return conditions;
}

export async function listBeads(
  ctx: AppContext,
  identity: AuthIdentity,
  filter: BeadFilter,
  page: { limit: number; cursor: Record<string, unknown> | null }
) {
  const offset = cursorOffset(page.cursor);
  const rows = await ctx.db
    .select()
    .from(issues)
    .where(and(...filterConditions(identity.projectId, filter)))
    .orderBy(asc(issues.repo), asc(issues.branch), asc(issues.beadId))
    .limit(page.limit + 1)
    .offset(offset);

  const result = toPage(rows.map(toBeadView), page.limit, () => ({ offset: offset + page.limit }));
  return redactForPrincipal(identity, result);
}

const refKey = (repo: string, branch: string, beadId: string) => `${repo}\u0000${branch}\u0000${beadId}`;

/**
 * Open beads whose blockers are all closed. A blocker the server has never
 * seen does not block.
 */
export async function readyBeads(ctx: AppContext, identity: AuthIdentity, filter: Omit<BeadFilter, 'status'>, limit = 50) {
  const open = await ctx.db
    .select()
    .from(issues)
    .where(and(...filterConditions(identity.projectId, { ...filter, status: 'open' })))
    .orderBy(sql`${issues.priority} asc nulls last`, asc(issues.beadId));

  const blockerIds = [...new Set(open.flatMap(row => row.blockedBy.map(ref => ref.bead_id)))];
  const openBlockers = new Set<string>();
  if (blockerIds.length > 0) {
    const blockers = await ctx.db
      .select({ repo: issues.repo, branch: issues.branch, beadId: issues.beadId, status: issues.status })
      .from(issues)
      .where(and(eq(issues.projectId, identity.projectId), inArray(issues.beadId, blockerIds)));
    for (const blocker of blockers) {
      if (blocker.status !== 'closed') openBlockers.add(refKey(blocker.repo, blocker.branch, blocker.beadId));
    }
  }

  const ready = open
    .filter(row => row.blockedBy.every(ref => !openBlockers.has(refKey(ref.repo, ref.branch, ref.bead_id))))
    .slice(0, limit);
  return redactForPrincipal(identity, { issues: ready.map(toBeadView), count: ready.length });
}

export async function getBead(
  ctx: AppContext,
  identity: AuthIdentity,
  beadId: string,
  scope: { repo?: string; branch?: string } = {}
) {
  const [row] = await ctx.db
    .select()
    .from(issues)
    .where(and(...filterConditions(identity.projectId, scope), eq(issues.beadId, beadId)))
    .orderBy(desc(issues.syncedAt))
    .limit(1);
  if (!row) throw new NotFoundError(`Bead ${beadId} not found`, { bead_id: beadId });

  const beadClaims = await ctx.db
    .select()
    .from(claims)
    .where(and(eq(claims.projectId, identity.projectId), eq(claims.beadId, beadId)))
    .orderBy(asc(claims.claimedAt));

  return redactForPrincipal(identity, { ...toBeadView(row), claims: beadClaims.map(toClaimView) });
}

/** Claims held by live workspaces, oldest first. */
export async function activeClaims(db: Database, projectId: string, workspaceId?: string): Promise<ClaimView[]> {
  const conditions: SQL[] = [eq(claims.projectId, projectId), isNull(workspaces.deletedAt)];
  if (workspaceId) conditions.push(eq(claims.workspaceId, workspaceId));

  const rows = await db
    .select({ claim: claims })
    .from(claims)
    .innerJoin(workspaces, eq(workspaces.workspaceId, claims.workspaceId))
    .where(and(...conditions))
    .orderBy(asc(claims.claimedAt));
  return rows.map(({ claim }) => toClaimView(claim));
}

export async function listClaims(ctx: AppContext, identity: AuthIdentity, workspaceId?: string) {
  if (workspaceId !== undefined && !isUuid(workspaceId)) throw new ValidationError('Invalid workspace_id');
  return redactForPrincipal(identity, { claims: await activeClaims(ctx.db, identity.projectId, workspaceId) });
}
