/**
 * Drizzle schema
 *
 * Three Postgres schemas share one database:
 *   server - coordination state (projects, workspaces, claims, policies, outbox, ...)
 *   beads  - the mirror of client-owned work items
 *   aweb   - the identity partition; only src/identity.ts reads or writes it
 *
 * DDL lives in ./migrations; these definitions must stay in step with it.
 */

import {
  pgSchema,
  pgTable,
  uuid,
  text,
  integer,
  boolean,
  jsonb,
  timestamp,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';

const ts = (name: string) => timestamp(name, { withTimezone: true, mode: 'date' });

export const serverSchema = pgSchema('server');
export const beadsSchema = pgSchema('beads');
export const awebSchema = pgSchema('aweb');

// ============================================================================
// Migration bookkeeping
// ============================================================================

export const migrations = pgTable('bdh_migrations', {
  name: text('name').primaryKey(),
  appliedAt: ts('applied_at').defaultNow().notNull(),
});

// ============================================================================
// server.*
// ============================================================================

export type ProjectVisibility = 'private' | 'public';

export const projects = serverSchema.table('projects', {
  id: uuid('id').primaryKey().defaultRandom(),
  tenantId: uuid('tenant_id'),
  slug: text('slug').notNull(),
  name: text('name').notNull(),
  visibility: text('visibility').$type<ProjectVisibility>().notNull().default('private'),
  activePolicyId: uuid('active_policy_id'),
  policyVersionCounter: integer('policy_version_counter').notNull().default(0),
  createdAt: ts('created_at').defaultNow().notNull(),
  deletedAt: ts('deleted_at'),
});

export const repos = serverSchema.table('repos', {
  id: uuid('id').primaryKey().defaultRandom(),
  projectId: uuid('project_id').notNull().references(() => projects.id),
  canonicalOrigin: text('canonical_origin').notNull(),
  name: text('name').notNull(),
  createdAt: ts('created_at').defaultNow().notNull(),
  deletedAt: ts('deleted_at'),
}, (table) => ({
  originIdx: uniqueIndex('repos_project_origin_key').on(table.projectId, table.canonicalOrigin),
}));

export const workspaces = serverSchema.table('workspaces', {
  workspaceId: uuid('workspace_id').primaryKey(),
  projectId: uuid('project_id').notNull().references(() => projects.id),
  repoId: uuid('repo_id').references(() => repos.id),
  alias: text('alias').notNull(),
  role: text('role').notNull().default('agent'),
  humanName: text('human_name'),
  hostname: text('hostname'),
  workspacePath: text('workspace_path'),
  createdAt: ts('created_at').defaultNow().notNull(),
  updatedAt: ts('updated_at').defaultNow().notNull(),
  lastSeenAt: ts('last_seen_at'),
  deletedAt: ts('deleted_at'),
}, (table) => ({
  projectIdx: index('workspaces_project_idx').on(table.projectId),
}));

export const claims = serverSchema.table('claims', {
  id: uuid('id').primaryKey().defaultRandom(),
  projectId: uuid('project_id').notNull().references(() => projects.id),
  workspaceId: uuid('workspace_id').notNull().references(() => workspaces.workspaceId),
  alias: text('alias').notNull(),
  humanName: text('human_name'),
  beadId: text('bead_id').notNull(),
  apexBeadId: text('apex_bead_id'),
  coordinated: boolean('coordinated').notNull().default(false),
  claimedAt: ts('claimed_at').defaultNow().notNull(),
}, (table) => ({
  beadWorkspaceIdx: uniqueIndex('claims_project_bead_workspace_key').on(table.projectId, table.beadId, table.workspaceId),
}));

export interface PolicyInvariant {
  id: string;
  title: string;
  body_md: string;
}

export interface PolicyRole {
  title: string;
  playbook_md: string;
}

export interface PolicyBundle {
  invariants: PolicyInvariant[];
  roles: Record<string, PolicyRole>;
  adapters: Record<string, unknown>;
  claims?: { allow_coordinated: boolean };
}

export const policies = serverSchema.table('policies', {
  id: uuid('id').primaryKey().defaultRandom(),
  projectId: uuid('project_id').notNull().references(() => projects.id),
  version: integer('version').notNull(),
  bundle: jsonb('bundle').$type<PolicyBundle>().notNull(),
  createdByWorkspaceId: uuid('created_by_workspace_id'),
  createdAt: ts('created_at').defaultNow().notNull(),
}, (table) => ({
  versionIdx: uniqueIndex('policies_project_version_key').on(table.projectId, table.version),
}));

export type EscalationStatus = 'pending' | 'responded' | 'expired';

export const escalations = serverSchema.table('escalations', {
  id: uuid('id').primaryKey().defaultRandom(),
  projectId: uuid('project_id').notNull().references(() => projects.id),
  workspaceId: uuid('workspace_id').notNull().references(() => workspaces.workspaceId),
  alias: text('alias').notNull(),
  subject: text('subject').notNull(),
  situation: text('situation').notNull(),
  options: jsonb('options').$type<string[]>(),
  status: text('status').$type<EscalationStatus>().notNull().default('pending'),
  response: text('response'),
  responseNote: text('response_note'),
  createdAt: ts('created_at').defaultNow().notNull(),
  respondedAt: ts('responded_at'),
  expiresAt: ts('expires_at'),
}, (table) => ({
  projectStatusIdx: index('escalations_project_status_idx').on(table.projectId, table.status),
}));

export const subscriptions = serverSchema.table('subscriptions', {
  id: uuid('id').primaryKey().defaultRandom(),
  projectId: uuid('project_id').notNull().references(() => projects.id),
  workspaceId: uuid('workspace_id').notNull().references(() => workspaces.workspaceId),
  alias: text('alias').notNull(),
  beadId: text('bead_id').notNull(),
  repo: text('repo'),
  eventTypes: text('event_types').array().notNull(),
  createdAt: ts('created_at').defaultNow().notNull(),
});

export type OutboxStatus = 'pending' | 'delivered' | 'failed';

export const notificationOutbox = serverSchema.table('notification_outbox', {
  id: uuid('id').primaryKey().defaultRandom(),
  projectId: uuid('project_id').notNull().references(() => projects.id),
  eventType: text('event_type').notNull(),
  payload: jsonb('payload').$type<Record<string, unknown>>().notNull(),
  recipientWorkspaceId: uuid('recipient_workspace_id').notNull(),
  recipientAlias: text('recipient_alias').notNull(),
  status: text('status').$type<OutboxStatus>().notNull().default('pending'),
  attempts: integer('attempts').notNull().default(0),
  lastError: text('last_error'),
  nextAttemptAt: ts('next_attempt_at').defaultNow().notNull(),
  messageId: uuid('message_id'),
  createdAt: ts('created_at').defaultNow().notNull(),
  processedAt: ts('processed_at'),
}, (table) => ({
  dueIdx: index('notification_outbox_due_idx').on(table.status, table.nextAttemptAt),
}));

// ============================================================================
// beads.*
// ============================================================================

export interface BeadRef {
  repo: string;
  branch: string;
  bead_id: string;
}

export const issues = beadsSchema.table('issues', {
  id: uuid('id').primaryKey().defaultRandom(),
  projectId: uuid('project_id').notNull(),
  repo: text('repo').notNull(),
  branch: text('branch').notNull(),
  beadId: text('bead_id').notNull(),
  title: text('title'),
  description: text('description'),
  status: text('status'),
  priority: integer('priority'),
  issueType: text('issue_type'),
  assignee: text('assignee'),
  createdBy: text('created_by'),
  labels: text('labels').array(),
  blockedBy: jsonb('blocked_by').$type<BeadRef[]>().notNull().default([]),
  parentId: jsonb('parent_id').$type<BeadRef>(),
  createdAt: ts('created_at'),
  updatedAt: ts('updated_at'),
  syncedAt: ts('synced_at').defaultNow().notNull(),
}, (table) => ({
  naturalKey: uniqueIndex('issues_natural_key').on(table.projectId, table.repo, table.branch, table.beadId),
}));

// ============================================================================
// aweb.* (identity partition)
// ============================================================================

export const apiKeys = awebSchema.table('api_keys', {
  id: uuid('id').primaryKey().defaultRandom(),
  projectId: uuid('project_id').notNull(),
  agentId: uuid('agent_id').notNull(),
  keyHash: text('key_hash').notNull().unique(),
  keyPrefix: text('key_prefix').notNull(),
  createdAt: ts('created_at').defaultNow().notNull(),
  expiresAt: ts('expires_at'),
  revokedAt: ts('revoked_at'),
  lastUsedAt: ts('last_used_at'),
});

export const messages = awebSchema.table('messages', {
  messageId: uuid('message_id').primaryKey().defaultRandom(),
  projectId: uuid('project_id').notNull(),
  fromAgentId: uuid('from_agent_id'),
  fromAlias: text('from_alias').notNull(),
  toAgentId: uuid('to_agent_id').notNull(),
  subject: text('subject').notNull(),
  body: text('body').notNull(),
  priority: text('priority').notNull().default('normal'),
  threadId: text('thread_id'),
  createdAt: ts('created_at').defaultNow().notNull(),
  readAt: ts('read_at'),
});

export type ProjectRow = typeof projects.$inferSelect;
export type RepoRow = typeof repos.$inferSelect;
export type WorkspaceRow = typeof workspaces.$inferSelect;
export type ClaimRow = typeof claims.$inferSelect;
export type PolicyRow = typeof policies.$inferSelect;
export type EscalationRow = typeof escalations.$inferSelect;
export type SubscriptionRow = typeof subscriptions.$inferSelect;
export type OutboxRow = typeof notificationOutbox.$inferSelect;
export type IssueRow = typeof issues.$inferSelect;
