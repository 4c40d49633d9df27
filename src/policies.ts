/**
 * Policy store
 *
 * Policies are immutable, versioned bundles per project. The project row
 * carries the version counter and the active pointer; both are changed only
 * while that row is held FOR UPDATE, which serializes version allocation and
 * makes the base_policy_id check a compare-and-swap.
 */

import crypto from 'crypto';
import { and, desc, eq } from 'drizzle-orm';
import { z } from 'zod';
import type { Database } from './db/index.js';
import { policies, projects, type PolicyBundle, type PolicyRow } from './db/schema.js';
import { getDefaultBundle } from './defaults.js';
import { BadRequestError, NotFoundError, PolicyConflictError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('policies');

export const PolicyBundleSchema = z.object({
  invariants: z.array(z.object({
    id: z.string().min(1).max(200),
    title: z.string().min(1).max(500),
    body_md: z.string().max(100_000),
  })).max(200),
  roles: z.record(z.string().min(1).max(100), z.object({
    title: z.string().min(1).max(500),
    playbook_md: z.string().max(100_000),
  })),
  adapters: z.record(z.unknown()).default({}),
  claims: z.object({ allow_coordinated: z.boolean() }).optional(),
});

export interface PolicyView {
  policy_id: string;
  project_id: string;
  version: number;
  bundle: PolicyBundle;
  is_active: boolean;
  created_by_workspace_id: string | null;
  created_at: string;
}

export interface CreateOptions {
  /** Active policy id the caller last saw; omitted means no concurrency check. */
  basePolicyId?: string | null;
  activate?: boolean;
  createdByWorkspaceId?: string | null;
}

function toView(row: PolicyRow, activePolicyId: string | null): PolicyView {
  return {
    policy_id: row.id,
    project_id: row.projectId,
    version: row.version,
    bundle: row.bundle,
    is_active: row.id === activePolicyId,
    created_by_workspace_id: row.createdByWorkspaceId,
    created_at: row.createdAt.toISOString(),
  };
}

async function lockProject(tx: Database, projectId: string) {
  const [project] = await tx
    .select({
      id: projects.id,
      activePolicyId: projects.activePolicyId,
      counter: projects.policyVersionCounter,
    })
    .from(projects)
    .where(eq(projects.id, projectId))
    .for('update');
  if (!project) throw new NotFoundError(`Project ${projectId} not found`);
  return project;
}

async function activeVersion(db: Database, activePolicyId: string | null): Promise<number | null> {
  if (!activePolicyId) return null;
  const [row] = await db.select({ version: policies.version }).from(policies).where(eq(policies.id, activePolicyId));
  return row?.version ?? null;
}

async function checkBase(tx: Database, activePolicyId: string | null, basePolicyId: string | null | undefined) {
  if (basePolicyId === undefined) return;
  if (basePolicyId !== activePolicyId) {
    throw new PolicyConflictError(activePolicyId, await activeVersion(tx, activePolicyId));
  }
}

async function insertVersion(
  tx: Database,
  project: { id: string; activePolicyId: string | null; counter: number },
  bundle: PolicyBundle,
  activate: boolean,
  createdByWorkspaceId: string | null
): Promise<PolicyView> {
  const version = project.counter + 1;
  const [row] = await tx
    .insert(policies)
    .values({ projectId: project.id, version, bundle, createdByWorkspaceId })
    .returning();

  const activePolicyId = activate ? row.id : project.activePolicyId;
  await tx
    .update(projects)
    .set({ policyVersionCounter: version, activePolicyId })
    .where(eq(projects.id, project.id));

  log.info(`Project ${project.id}: created policy v${version}${activate ? ' (active)' : ''}`);
  return toView(row, activePolicyId);
}

/** Create the next version of a project's policy, activating it unless told otherwise. */
export async function createPolicyVersion(
  db: Database,
  projectId: string,
  bundle: PolicyBundle,
  options: CreateOptions = {}
): Promise<PolicyView> {
  return db.transaction(async (tx) => {
    const project = await lockProject(tx, projectId);
    await checkBase(tx, project.activePolicyId, options.basePolicyId);
    return insertVersion(tx, project, bundle, options.activate ?? true, options.createdByWorkspaceId ?? null);
  });
}

export async function activatePolicy(
  db: Database,
  projectId: string,
  policyId: string,
  options: { basePolicyId?: string | null } = {}
): Promise<PolicyView> {
  return db.transaction(async (tx) => {
    const [row] = await tx.select().from(policies).where(eq(policies.id, policyId));
    if (!row) throw new NotFoundError(`Policy ${policyId} not found`);
    if (row.projectId !== projectId) {
      throw new BadRequestError(`Policy ${policyId} does not belong to this project`);
    }

    const project = await lockProject(tx, projectId);
    await checkBase(tx, project.activePolicyId, options.basePolicyId);

    await tx.update(projects).set({ activePolicyId: row.id }).where(eq(projects.id, projectId));
    log.info(`Project ${projectId}: activated policy v${row.version}`);
    return toView(row, row.id);
  });
}

/**
 * Make sure the project has an active policy, seeding the default bundle
 * when it has none. Safe to call inside an outer transaction.
 */
export async function ensureDefaultPolicy(db: Database, projectId: string): Promise<PolicyView> {
  return db.transaction(async (tx) => {
    const project = await lockProject(tx, projectId);
    if (project.activePolicyId) {
      const [row] = await tx.select().from(policies).where(eq(policies.id, project.activePolicyId));
      if (row) return toView(row, project.activePolicyId);
    }
    return insertVersion(tx, project, getDefaultBundle(), true, null);
  });
}

export async function getActivePolicy(db: Database, projectId: string): Promise<PolicyView> {
  const [project] = await db
    .select({ activePolicyId: projects.activePolicyId })
    .from(projects)
    .where(eq(projects.id, projectId));
  if (!project) throw new NotFoundError(`Project ${projectId} not found`);

  if (project.activePolicyId) {
    const [row] = await db.select().from(policies).where(eq(policies.id, project.activePolicyId));
    if (row) return toView(row, project.activePolicyId);
  }
  return ensureDefaultPolicy(db, projectId);
}

export async function getPolicy(db: Database, projectId: string, policyId: string): Promise<PolicyView> {
  const [row] = await db
    .select()
    .from(policies)
    .where(and(eq(policies.id, policyId), eq(policies.projectId, projectId)));
  if (!row) throw new NotFoundError(`Policy ${policyId} not found`);

  const [project] = await db
    .select({ activePolicyId: projects.activePolicyId })
    .from(projects)
    .where(eq(projects.id, projectId));
  return toView(row, project?.activePolicyId ?? null);
}

export async function listPolicyHistory(db: Database, projectId: string, limit = 20): Promise<PolicyView[]> {
  const [project] = await db
    .select({ activePolicyId: projects.activePolicyId })
    .from(projects)
    .where(eq(projects.id, projectId));
  if (!project) throw new NotFoundError(`Project ${projectId} not found`);

  const rows = await db
    .select()
    .from(policies)
    .where(eq(policies.projectId, projectId))
    .orderBy(desc(policies.version))
    .limit(Math.min(Math.max(limit, 1), 100));
  return rows.map(row => toView(row, project.activePolicyId));
}

/** Create and activate a new version carrying the default bundle. */
export async function resetPolicyToDefault(
  db: Database,
  projectId: string,
  options: { basePolicyId?: string | null; createdByWorkspaceId?: string | null } = {}
): Promise<PolicyView> {
  return createPolicyVersion(db, projectId, getDefaultBundle(), { ...options, activate: true });
}

// ============================================================================
// Read views
// ============================================================================

export function policyEtag(policy: PolicyView, role: string | undefined, onlySelected: boolean): string {
  const digest = crypto
    .createHash('sha256')
    .update(`${policy.policy_id}:${policy.version}:${role ?? ''}:${onlySelected ? 1 : 0}`)
    .digest('hex')
    .slice(0, 32);
  return `"${digest}"`;
}

export function claimsPolicy(bundle: PolicyBundle): { allow_coordinated: boolean } {
  return { allow_coordinated: bundle.claims?.allow_coordinated ?? false };
}

/**
 * The active-policy document an agent reads at session start, optionally
 * focused on one role.
 */
export function renderPolicyForRole(policy: PolicyView, role: string | undefined, onlySelected: boolean) {
  if (onlySelected && !role) {
    throw new BadRequestError('only_selected requires a role parameter');
  }

  const roles = policy.bundle.roles;
  let selectedRole: { role: string; title: string; playbook_md: string } | null = null;
  if (role) {
    const found = roles[role];
    if (!found) {
      const available = Object.keys(roles).sort().join(', ');
      throw new BadRequestError(`Role '${role}' not found. Available roles: ${available}`);
    }
    selectedRole = { role, ...found };
  }

  return {
    policy_id: policy.policy_id,
    project_id: policy.project_id,
    version: policy.version,
    updated_at: policy.created_at,
    invariants: policy.bundle.invariants,
    roles: onlySelected && selectedRole ? { [selectedRole.role]: roles[selectedRole.role] } : roles,
    adapters: policy.bundle.adapters,
    claims: claimsPolicy(policy.bundle),
    selected_role: selectedRole,
  };
}
