/**
 * First-contact bootstrap (`POST /v1/init`)
 *
 * Provisions, in one transaction and in this order:
 *
 *   project -> repo -> workspace -> credential -> default policy
 *
 * Anything failing part-way rolls the whole attempt back, so a retry starts
 * from the same state as the first call. Calling init again for an existing
 * alias reuses its workspace and issues a fresh key.
 */

import crypto from 'crypto';
import { and, eq, isNull } from 'drizzle-orm';
import { z } from 'zod';
import type { AppContext } from './context.js';
import type { Database } from './db/index.js';
import { projects, repos, workspaces, type ProjectRow, type RepoRow } from './db/schema.js';
import { ConflictError, CoordinationError, TransactionError, ValidationError } from './errors.js';
import { publishEvent } from './events.js';
import { createLogger } from './logger.js';
import { ensureDefaultPolicy } from './policies.js';
import {
  aliasSchema,
  CLASSIC_NAMES,
  hostnameSchema,
  humanNameSchema,
  projectSlugSchema,
  repoOriginSchema,
  roleSchema,
  roleToAliasPrefix,
  workspacePathSchema,
} from './validation.js';
import { ensureRepo } from './workspaces.js';

const log = createLogger('init');

export const InitRequestSchema = z.object({
  project_slug: projectSlugSchema.optional(),
  project_name: z.string().min(1).max(255).optional(),
  repo_origin: repoOriginSchema.optional(),
  alias: aliasSchema.optional(),
  human_name: humanNameSchema.optional(),
  role: roleSchema.default('agent'),
  hostname: hostnameSchema.optional(),
  workspace_path: workspacePathSchema.optional(),
  visibility: z.enum(['private', 'public']).optional(),
});

export type InitRequest = z.infer<typeof InitRequestSchema>;

export interface InitResult {
  status: 'ok';
  created_at: string;
  api_key: string;
  project_id: string;
  project_slug: string;
  agent_id: string;
  workspace_id: string;
  repo_id: string | null;
  canonical_origin: string | null;
  alias: string;
  created: boolean;
  workspace_created: boolean;
  policy_version: number;
}

async function resolveProject(tx: Database, input: InitRequest): Promise<{ project: ProjectRow; created: boolean }> {
  if (input.project_slug) {
    const inserted = await tx
      .insert(projects)
      .values({
        slug: input.project_slug,
        name: input.project_name ?? input.project_slug,
        visibility: input.visibility ?? 'private',
      })
      .onConflictDoNothing()
      .returning();
    if (inserted.length > 0) return { project: inserted[0], created: true };

    const [existing] = await tx
      .select()
      .from(projects)
      .where(and(eq(projects.slug, input.project_slug), isNull(projects.tenantId), isNull(projects.deletedAt)));
    if (!existing) throw new ConflictError(`Project slug '${input.project_slug}' is unavailable`);
    return { project: existing, created: false };
  }

  if (input.repo_origin) {
    const owners = await tx
      .selectDistinct({ project: projects })
      .from(repos)
      .innerJoin(projects, eq(projects.id, repos.projectId))
      .where(and(eq(repos.canonicalOrigin, input.repo_origin), isNull(repos.deletedAt), isNull(projects.deletedAt)));
    if (owners.length === 1) return { project: owners[0].project, created: false };
  }

  throw new ValidationError(
    'project_slug is required: no existing project owns this repo',
    { repo_origin: input.repo_origin ?? null },
    'project_not_found'
  );
}

/** First classic name not already used as an alias prefix in the project. */
export function suggestAlias(taken: string[], role: string): string {
  const rolePrefix = roleToAliasPrefix(role);
  const used = (name: string) => taken.some(alias => alias === name || alias.startsWith(`${name}-`));

  for (const name of CLASSIC_NAMES) {
    if (!used(name)) return `${name}-${rolePrefix}`;
  }
  for (let n = 1; n < 100; n++) {
    for (const name of CLASSIC_NAMES) {
      const candidate = `${name}-${String(n).padStart(2, '0')}`;
      if (!used(candidate)) return `${candidate}-${rolePrefix}`;
    }
  }
  return `agent-${crypto.randomBytes(4).toString('hex')}-${rolePrefix}`;
}

async function liveAliases(tx: Database, projectId: string): Promise<string[]> {
  const rows = await tx
    .select({ alias: workspaces.alias })
    .from(workspaces)
    .where(and(eq(workspaces.projectId, projectId), isNull(workspaces.deletedAt)));
  return rows.map(row => row.alias);
}

export async function initWorkspace(ctx: AppContext, input: InitRequest): Promise<InitResult> {
  let outcome: InitResult;
  try {
    outcome = await ctx.db.transaction(async (tx) => {
      const { project, created } = await resolveProject(tx, input);
      const repo: RepoRow | null = input.repo_origin ? await ensureRepo(tx, project.id, input.repo_origin) : null;

      const alias = input.alias ?? suggestAlias(await liveAliases(tx, project.id), input.role);
      const [existing] = await tx
        .select()
        .from(workspaces)
        .where(and(eq(workspaces.projectId, project.id), eq(workspaces.alias, alias), isNull(workspaces.deletedAt)))
        .for('update');

      let workspaceId: string;
      let workspaceCreated: boolean;
      if (existing) {
        if (repo && existing.repoId && existing.repoId !== repo.id) {
          throw new ConflictError(`Alias '${alias}' is registered to a different repo`, {
            alias,
            workspace_id: existing.workspaceId,
          });
        }
        await tx
          .update(workspaces)
          .set({
            repoId: existing.repoId ?? repo?.id ?? null,
            humanName: input.human_name ?? existing.humanName,
            hostname: input.hostname ?? existing.hostname,
            workspacePath: input.workspace_path ?? existing.workspacePath,
            updatedAt: new Date(),
          })
          .where(eq(workspaces.workspaceId, existing.workspaceId));
        workspaceId = existing.workspaceId;
        workspaceCreated = false;
      } else {
        workspaceId = crypto.randomUUID();
        await tx.insert(workspaces).values({
          workspaceId,
          projectId: project.id,
          repoId: repo?.id ?? null,
          alias,
          role: input.role,
          humanName: input.human_name ?? null,
          hostname: input.hostname ?? null,
          workspacePath: input.workspace_path ?? null,
        });
        workspaceCreated = true;
      }

      const key = await ctx.identity.issueApiKey(tx, { projectId: project.id, agentId: workspaceId });
      const policy = await ensureDefaultPolicy(tx, project.id);

      return {
        status: 'ok' as const,
        created_at: key.createdAt.toISOString(),
        api_key: key.apiKey,
        project_id: project.id,
        project_slug: project.slug,
        agent_id: workspaceId,
        workspace_id: workspaceId,
        repo_id: repo?.id ?? null,
        canonical_origin: repo?.canonicalOrigin ?? null,
        alias,
        created,
        workspace_created: workspaceCreated,
        policy_version: policy.version,
      };
    });
  } catch (error) {
    if (error instanceof CoordinationError) throw error;
    log.error('Init rolled back:', error);
    throw new TransactionError('Initialization failed and was rolled back; retry the request', error);
  }

  if (outcome.workspace_created) {
    log.info(`Initialized workspace ${outcome.alias} in ${outcome.project_slug}`);
    await publishEvent(ctx.cache, outcome.project_id, {
      type: 'workspace.registered',
      workspace_id: outcome.workspace_id,
      alias: outcome.alias,
    });
  }
  return outcome;
}
