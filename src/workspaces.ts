/**
 * Repos and workspaces
 *
 * A workspace is one agent's working context. Its id is the actor id bound
 * to its credential, and its project and repo links never change after
 * creation. Workspaces are soft-deleted; a deleted workspace answers 410.
 */

import { and, asc, eq, inArray, isNull, sql } from 'drizzle-orm';
import { z } from 'zod';
import { enforceActorBinding, redactForPrincipal, requireWriter, type AuthIdentity } from './auth.js';
import type { AppContext } from './context.js';
import type { Database } from './db/index.js';
import { claims, projects, repos, workspaces, type RepoRow, type WorkspaceRow } from './db/schema.js';
import {
  ConflictError,
  ForbiddenError,
  GoneError,
  NotFoundError,
  pgErrorCode,
  UNIQUE_VIOLATION,
  ValidationError,
} from './errors.js';
import { publishEvent, publishEvents, type CoordinationEvent } from './events.js';
import { createLogger } from './logger.js';
import { cursorOffset, toPage } from './pagination.js';
import {
  aliasSchema,
  branchSchema,
  hostnameSchema,
  humanNameSchema,
  isUuid,
  repoNameFromOrigin,
  repoOriginSchema,
  roleSchema,
  uuidSchema,
  workspacePathSchema,
} from './validation.js';

const log = createLogger('workspaces');

// ============================================================================
// Repos
// ============================================================================

/**
 * Find or create the repo for a canonical origin, reviving it if it was
 * soft-deleted. `created` is true only for a fresh row.
 */
export async function upsertRepo(
  tx: Database,
  projectId: string,
  canonicalOrigin: string
): Promise<{ repo: RepoRow; created: boolean }> {
  const [inserted] = await tx
    .insert(repos)
    .values({ projectId, canonicalOrigin, name: repoNameFromOrigin(canonicalOrigin) })
    .onConflictDoNothing()
    .returning();
  if (inserted) return { repo: inserted, created: true };

  const [repo] = await tx
    .select()
    .from(repos)
    .where(and(eq(repos.projectId, projectId), eq(repos.canonicalOrigin, canonicalOrigin)));
  if (!repo) throw new Error(`Repo ${canonicalOrigin} vanished after insert`);

  if (repo.deletedAt) {
    const [revived] = await tx.update(repos).set({ deletedAt: null }).where(eq(repos.id, repo.id)).returning();
    return { repo: revived, created: false };
  }
  return { repo, created: false };
}

export async function ensureRepo(tx: Database, projectId: string, canonicalOrigin: string): Promise<RepoRow> {
  return (await upsertRepo(tx, projectId, canonicalOrigin)).repo;
}

export async function getRepo(db: Database, repoId: string | null): Promise<RepoRow | null> {
  if (!repoId) return null;
  const [repo] = await db.select().from(repos).where(eq(repos.id, repoId));
  return repo ?? null;
}

// ============================================================================
// Repo lifecycle
// ============================================================================

export const RepoLookupSchema = z.object({
  origin_url: repoOriginSchema,
});

export const RepoEnsureSchema = z.object({
  origin_url: repoOriginSchema,
  project_id: uuidSchema.optional(),
});

export interface RepoView {
  repo_id: string;
  project_id: string;
  canonical_origin: string;
  name: string;
  created_at: string;
}

function toRepoView(row: RepoRow): RepoView {
  return {
    repo_id: row.id,
    project_id: row.projectId,
    canonical_origin: row.canonicalOrigin,
    name: row.name,
    created_at: row.createdAt.toISOString(),
  };
}

/**
 * Which project owns a repo. Runs before a client has credentials, so it
 * answers 404 for unknown origins and 409 with the candidates when several
 * projects registered the same origin.
 */
export async function lookupRepo(db: Database, canonicalOrigin: string) {
  const rows = await db
    .select({
      repoId: repos.id,
      canonicalOrigin: repos.canonicalOrigin,
      name: repos.name,
      projectId: projects.id,
      projectSlug: projects.slug,
    })
    .from(repos)
    .innerJoin(projects, and(eq(projects.id, repos.projectId), isNull(projects.deletedAt)))
    .where(and(eq(repos.canonicalOrigin, canonicalOrigin), isNull(repos.deletedAt)))
    .orderBy(asc(projects.slug));

  const [first] = rows;
  if (!first) throw new NotFoundError(`Repo not found: ${canonicalOrigin}`, { canonical_origin: canonicalOrigin });
  if (rows.length > 1) {
    throw new ConflictError(
      `Repo ${canonicalOrigin} exists in multiple projects: ${rows.map(row => row.projectSlug).join(', ')}`,
      {
        canonical_origin: canonicalOrigin,
        candidates: rows.map(row => ({ repo_id: row.repoId, project_id: row.projectId, project_slug: row.projectSlug })),
      },
      'ambiguous_repo'
    );
  }

  return {
    repo_id: first.repoId,
    project_id: first.projectId,
    project_slug: first.projectSlug,
    canonical_origin: first.canonicalOrigin,
    name: first.name,
  };
}

export async function ensureProjectRepo(
  ctx: AppContext,
  identity: AuthIdentity,
  input: z.infer<typeof RepoEnsureSchema>
): Promise<RepoView & { created: boolean }> {
  requireWriter(identity);
  if (input.project_id !== undefined && input.project_id !== identity.projectId) {
    throw new ForbiddenError('project_id does not match authenticated project', { project_id: input.project_id });
  }

  const { repo, created } = await upsertRepo(ctx.db, identity.projectId, input.origin_url);
  log.info(`${created ? 'Created' : 'Found'} repo ${repo.canonicalOrigin} (${repo.id})`);
  return { ...toRepoView(repo), created };
}

export async function listRepos(
  ctx: AppContext,
  identity: AuthIdentity,
  page: { limit: number; cursor: Record<string, unknown> | null }
) {
  const offset = cursorOffset(page.cursor);
  const rows = await ctx.db
    .select({
      repo: repos,
      workspaceCount: sql<number>`count(${workspaces.workspaceId}) filter (where ${workspaces.deletedAt} is null)`.mapWith(Number),
    })
    .from(repos)
    .leftJoin(workspaces, eq(workspaces.repoId, repos.id))
    .where(and(eq(repos.projectId, identity.projectId), isNull(repos.deletedAt)))
    .groupBy(repos.id)
    .orderBy(asc(repos.createdAt), asc(repos.id))
    .limit(page.limit + 1)
    .offset(offset);

  const result = toPage(
    rows.map(({ repo, workspaceCount }) => ({ ...toRepoView(repo), workspace_count: workspaceCount })),
    page.limit,
    () => ({ offset: offset + page.limit })
  );
  return { repos: result.items, has_more: result.has_more, next_cursor: result.next_cursor };
}

/**
 * Soft-delete a repo together with its live workspaces and their claims.
 * Presence is cleared after the commit.
 */
export async function deleteRepo(ctx: AppContext, identity: AuthIdentity, repoId: string) {
  requireWriter(identity);
  if (!isUuid(repoId)) throw new ValidationError('Invalid repo_id', { repo_id: repoId });

  const { repo, removed, released } = await ctx.db.transaction(async (tx) => {
    const [existing] = await tx
      .select()
      .from(repos)
      .where(and(eq(repos.id, repoId), eq(repos.projectId, identity.projectId), isNull(repos.deletedAt)))
      .for('update');
    if (!existing) throw new NotFoundError(`Repo ${repoId} not found`, { repo_id: repoId });

    const now = new Date();
    const removedWorkspaces = await tx
      .update(workspaces)
      .set({ deletedAt: now, updatedAt: now })
      .where(and(eq(workspaces.repoId, existing.id), isNull(workspaces.deletedAt)))
      .returning({ workspaceId: workspaces.workspaceId, alias: workspaces.alias });
    const releasedClaims = removedWorkspaces.length === 0
      ? []
      : await tx
        .delete(claims)
        .where(inArray(claims.workspaceId, removedWorkspaces.map(w => w.workspaceId)))
        .returning({ workspaceId: claims.workspaceId, beadId: claims.beadId });
    await tx.update(repos).set({ deletedAt: now }).where(eq(repos.id, existing.id));
    return { repo: existing, removed: removedWorkspaces, released: releasedClaims };
  });

  const aliases = new Map(removed.map(w => [w.workspaceId, w.alias]));
  const events = released.map((claim): CoordinationEvent => ({
    type: 'claim.released',
    workspace_id: claim.workspaceId,
    alias: aliases.get(claim.workspaceId) ?? '',
    bead_id: claim.beadId,
  }));
  for (const workspace of removed) {
    await ctx.presence.clear(workspace.workspaceId);
    events.push({ type: 'workspace.deleted', workspace_id: workspace.workspaceId, alias: workspace.alias });
  }
  events.push({ type: 'repo.deleted', workspace_id: identity.actorId, repo_id: repo.id, canonical_origin: repo.canonicalOrigin });
  await publishEvents(ctx.cache, identity.projectId, events);
  log.info(`Deleted repo ${repo.canonicalOrigin}: ${removed.length} workspace(s), ${released.length} claim(s)`);

  return {
    id: repo.id,
    workspaces_deleted: removed.length,
    claims_deleted: released.length,
    presence_cleared: removed.length,
  };
}

// ============================================================================
// Workspace lookups
// ============================================================================

export interface WorkspaceView {
  workspace_id: string;
  project_id: string;
  repo_id: string | null;
  repo: string | null;
  alias: string;
  role: string;
  human_name: string | null;
  hostname: string | null;
  workspace_path: string | null;
  created_at: string;
  last_seen_at: string | null;
  deleted_at: string | null;
}

export function toWorkspaceView(row: WorkspaceRow, repo: string | null): WorkspaceView {
  return {
    workspace_id: row.workspaceId,
    project_id: row.projectId,
    repo_id: row.repoId,
    repo,
    alias: row.alias,
    role: row.role,
    human_name: row.humanName,
    hostname: row.hostname,
    workspace_path: row.workspacePath,
    created_at: row.createdAt.toISOString(),
    last_seen_at: row.lastSeenAt ? row.lastSeenAt.toISOString() : null,
    deleted_at: row.deletedAt ? row.deletedAt.toISOString() : null,
  };
}

export async function findWorkspace(db: Database, projectId: string, workspaceId: string): Promise<WorkspaceRow | null> {
  const [row] = await db
    .select()
    .from(workspaces)
    .where(and(eq(workspaces.workspaceId, workspaceId), eq(workspaces.projectId, projectId)));
  return row ?? null;
}

/** 404 for unknown workspaces, 410 for deleted ones. */
export async function requireLiveWorkspace(db: Database, projectId: string, workspaceId: string): Promise<WorkspaceRow> {
  const row = await findWorkspace(db, projectId, workspaceId);
  if (!row) throw new NotFoundError(`Workspace ${workspaceId} not found`, { workspace_id: workspaceId });
  if (row.deletedAt) throw new GoneError(`Workspace ${workspaceId} has been deleted`, { workspace_id: workspaceId });
  return row;
}

export async function findLiveWorkspaceByAlias(db: Database, projectId: string, alias: string): Promise<WorkspaceRow | null> {
  const [row] = await db
    .select()
    .from(workspaces)
    .where(and(eq(workspaces.projectId, projectId), eq(workspaces.alias, alias), isNull(workspaces.deletedAt)));
  return row ?? null;
}

export async function workspaceRepoOrigin(db: Database, row: WorkspaceRow): Promise<string | null> {
  return (await getRepo(db, row.repoId))?.canonicalOrigin ?? null;
}

// ============================================================================
// Register
// ============================================================================

export const RegisterWorkspaceSchema = z.object({
  workspace_id: uuidSchema,
  alias: aliasSchema,
  repo_origin: repoOriginSchema.optional(),
  role: roleSchema.optional(),
  human_name: humanNameSchema.optional(),
  hostname: hostnameSchema.optional(),
  workspace_path: workspacePathSchema.optional(),
});

export async function registerWorkspace(
  ctx: AppContext,
  identity: AuthIdentity,
  input: z.infer<typeof RegisterWorkspaceSchema>
): Promise<{ workspace: WorkspaceView; created: boolean }> {
  enforceActorBinding(identity, input.workspace_id);
  const projectId = identity.projectId;

  const result = await ctx.db.transaction(async (tx) => {
    const repo = input.repo_origin ? await ensureRepo(tx, projectId, input.repo_origin) : null;
    const [existing] = await tx
      .select()
      .from(workspaces)
      .where(eq(workspaces.workspaceId, input.workspace_id))
      .for('update');

    if (existing) {
      if (existing.projectId !== projectId) {
        throw new ConflictError('Workspace belongs to another project', { workspace_id: existing.workspaceId });
      }
      if (existing.deletedAt) {
        throw new GoneError(`Workspace ${existing.workspaceId} has been deleted`, { workspace_id: existing.workspaceId });
      }
      if (repo && existing.repoId && existing.repoId !== repo.id) {
        throw new ConflictError('Workspace is registered to a different repo', {
          workspace_id: existing.workspaceId,
          repo_id: existing.repoId,
        });
      }
      if (existing.alias !== input.alias) {
        throw new ConflictError(`Workspace is registered as '${existing.alias}'`, { alias: existing.alias });
      }
      const [updated] = await tx
        .update(workspaces)
        .set({
          repoId: existing.repoId ?? repo?.id ?? null,
          role: input.role ?? existing.role,
          humanName: input.human_name ?? existing.humanName,
          hostname: input.hostname ?? existing.hostname,
          workspacePath: input.workspace_path ?? existing.workspacePath,
          updatedAt: new Date(),
        })
        .where(eq(workspaces.workspaceId, existing.workspaceId))
        .returning();
      return { row: updated, created: false };
    }

    const [row] = await tx
      .insert(workspaces)
      .values({
        workspaceId: input.workspace_id,
        projectId,
        repoId: repo?.id ?? null,
        alias: input.alias,
        role: input.role ?? 'agent',
        humanName: input.human_name ?? null,
        hostname: input.hostname ?? null,
        workspacePath: input.workspace_path ?? null,
      })
      .returning();
    return { row, created: true };
  }).catch((error: unknown) => {
    if (pgErrorCode(error) === UNIQUE_VIOLATION) {
      throw new ConflictError(`Alias '${input.alias}' is already in use in this project`, { alias: input.alias });
    }
    throw error;
  });

  const origin = await workspaceRepoOrigin(ctx.db, result.row);
  await ctx.presence.heartbeat(result.row.workspaceId, {
    projectId,
    alias: result.row.alias,
    role: result.row.role,
    humanName: result.row.humanName,
    repo: origin,
  });
  if (result.created) {
    log.info(`Registered workspace ${result.row.alias} (${result.row.workspaceId})`);
    await publishEvent(ctx.cache, projectId, {
      type: 'workspace.registered',
      workspace_id: result.row.workspaceId,
      alias: result.row.alias,
    });
  }

  return { workspace: toWorkspaceView(result.row, origin), created: result.created };
}

// ============================================================================
// List / heartbeat / delete
// ============================================================================

export interface ListWorkspacesFilter {
  repo?: string;
  alias?: string;
  includeDeleted?: boolean;
}

export async function listWorkspaces(ctx: AppContext, identity: AuthIdentity, filter: ListWorkspacesFilter = {}) {
  const conditions = [eq(workspaces.projectId, identity.projectId)];
  if (!filter.includeDeleted) conditions.push(isNull(workspaces.deletedAt));
  if (filter.alias) conditions.push(eq(workspaces.alias, filter.alias));
  if (filter.repo) conditions.push(eq(repos.canonicalOrigin, filter.repo));

  const rows = await ctx.db
    .select({ workspace: workspaces, origin: repos.canonicalOrigin })
    .from(workspaces)
    .leftJoin(repos, eq(repos.id, workspaces.repoId))
    .where(and(...conditions))
    .orderBy(asc(workspaces.alias));

  const online = new Map(
    (await ctx.presence.lookup({ projectId: identity.projectId })).map(record => [record.workspace_id, record])
  );

  const items = rows.map(({ workspace, origin }) => {
    const presence = online.get(workspace.workspaceId);
    return {
      ...toWorkspaceView(workspace, origin),
      online: presence !== undefined,
      branch: presence?.branch ?? null,
      current_issue: presence?.current_issue ?? null,
    };
  });
  return redactForPrincipal(identity, { workspaces: items });
}

export const HeartbeatSchema = z.object({
  workspace_id: uuidSchema,
  branch: branchSchema.optional(),
  current_issue: z.string().max(100).optional(),
});

export async function heartbeatWorkspace(
  ctx: AppContext,
  identity: AuthIdentity,
  input: z.infer<typeof HeartbeatSchema>
) {
  enforceActorBinding(identity, input.workspace_id);
  const row = await requireLiveWorkspace(ctx.db, identity.projectId, input.workspace_id);
  const now = new Date();
  await ctx.db.update(workspaces).set({ lastSeenAt: now }).where(eq(workspaces.workspaceId, row.workspaceId));

  const origin = await workspaceRepoOrigin(ctx.db, row);
  await ctx.presence.heartbeat(row.workspaceId, {
    projectId: identity.projectId,
    alias: row.alias,
    role: row.role,
    humanName: row.humanName,
    repo: origin,
    branch: input.branch ?? null,
    currentIssue: input.current_issue ?? null,
  });

  return {
    ok: true,
    workspace_id: row.workspaceId,
    last_seen_at: now.toISOString(),
    ttl_seconds: ctx.settings.presenceTtlSeconds,
  };
}

export async function deleteWorkspace(ctx: AppContext, identity: AuthIdentity, workspaceId: string) {
  enforceActorBinding(identity, workspaceId);

  const { row, released } = await ctx.db.transaction(async (tx) => {
    const [existing] = await tx
      .select()
      .from(workspaces)
      .where(and(eq(workspaces.workspaceId, workspaceId), eq(workspaces.projectId, identity.projectId)))
      .for('update');
    if (!existing) throw new NotFoundError(`Workspace ${workspaceId} not found`, { workspace_id: workspaceId });
    if (existing.deletedAt) throw new GoneError(`Workspace ${workspaceId} has been deleted`, { workspace_id: workspaceId });

    const releasedClaims = await tx
      .delete(claims)
      .where(eq(claims.workspaceId, workspaceId))
      .returning({ beadId: claims.beadId });
    const [deleted] = await tx
      .update(workspaces)
      .set({ deletedAt: new Date(), updatedAt: new Date() })
      .where(eq(workspaces.workspaceId, workspaceId))
      .returning();
    return { row: deleted, released: releasedClaims };
  });

  await ctx.presence.clear(workspaceId);
  for (const claim of released) {
    await publishEvent(ctx.cache, identity.projectId, {
      type: 'claim.released',
      workspace_id: workspaceId,
      alias: row.alias,
      bead_id: claim.beadId,
    });
  }
  await publishEvent(ctx.cache, identity.projectId, {
    type: 'workspace.deleted',
    workspace_id: workspaceId,
    alias: row.alias,
  });
  log.info(`Deleted workspace ${row.alias} (${workspaceId}), released ${released.length} claim(s)`);

  return { workspace_id: workspaceId, deleted: true, claims_released: released.map(c => c.beadId) };
}
