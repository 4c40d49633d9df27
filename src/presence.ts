/**
 * Presence cache
 *
 * One hash per workspace holds the liveness record. Secondary index sets
 * (project, repo, branch, alias) point back at workspace ids and live twice
 * as long as the record, so an index hit whose record has expired is stale
 * by definition: lookups drop it and prune the index.
 *
 * Everything here is best-effort. Cache failures are logged and turn into
 * "nobody online", never into request failures.
 */

import type { CacheClient, CacheOp } from './cache.js';
import { createLogger } from './logger.js';

const log = createLogger('presence');

export interface PresenceAttrs {
  projectId: string;
  alias: string;
  role?: string | null;
  humanName?: string | null;
  repo?: string | null;
  branch?: string | null;
  currentIssue?: string | null;
}

export interface PresenceRecord {
  workspace_id: string;
  project_id: string;
  alias: string;
  role: string | null;
  human_name: string | null;
  repo: string | null;
  branch: string | null;
  current_issue: string | null;
  last_seen: string;
}

export interface PresenceFilter {
  projectId: string;
  repo?: string;
  branch?: string;
  alias?: string;
}

const recordKey = (workspaceId: string) => `bdh:presence:${workspaceId}`;
const projectIndex = (projectId: string) => `bdh:presence:idx:project:${projectId}`;
const repoIndex = (projectId: string, repo: string) => `bdh:presence:idx:repo:${projectId}:${repo}`;
const branchIndex = (projectId: string, repo: string, branch: string) =>
  `bdh:presence:idx:branch:${projectId}:${repo}:${branch}`;
const aliasIndex = (projectId: string, alias: string) => `bdh:presence:idx:alias:${projectId}:${alias}`;

function indexKeys(record: Pick<PresenceRecord, 'project_id' | 'alias' | 'repo' | 'branch'>): string[] {
  const keys = [projectIndex(record.project_id), aliasIndex(record.project_id, record.alias)];
  if (record.repo) {
    keys.push(repoIndex(record.project_id, record.repo));
    if (record.branch) keys.push(branchIndex(record.project_id, record.repo, record.branch));
  }
  return keys;
}

function fromHash(hash: Record<string, string>): PresenceRecord | null {
  if (!hash.workspace_id || !hash.project_id || !hash.alias) return null;
  const optional = (field: string) => (hash[field] ? hash[field] : null);
  return {
    workspace_id: hash.workspace_id,
    project_id: hash.project_id,
    alias: hash.alias,
    role: optional('role'),
    human_name: optional('human_name'),
    repo: optional('repo'),
    branch: optional('branch'),
    current_issue: optional('current_issue'),
    last_seen: hash.last_seen ?? '',
  };
}

function matches(record: PresenceRecord, filter: PresenceFilter): boolean {
  return record.project_id === filter.projectId
    && (filter.repo === undefined || record.repo === filter.repo)
    && (filter.branch === undefined || record.branch === filter.branch)
    && (filter.alias === undefined || record.alias === filter.alias);
}

export class PresenceCache {
  constructor(
    private cache: CacheClient,
    private ttlSeconds: number,
    private now: () => Date = () => new Date()
  ) {}

  async heartbeat(workspaceId: string, attrs: PresenceAttrs): Promise<PresenceRecord | null> {
    const record: PresenceRecord = {
      workspace_id: workspaceId,
      project_id: attrs.projectId,
      alias: attrs.alias,
      role: attrs.role ?? null,
      human_name: attrs.humanName ?? null,
      repo: attrs.repo ?? null,
      branch: attrs.branch ?? null,
      current_issue: attrs.currentIssue ?? null,
      last_seen: this.now().toISOString(),
    };

    try {
      const ops: CacheOp[] = [];
      const previousHash = await this.cache.hgetall(recordKey(workspaceId));
      const previous = previousHash ? fromHash(previousHash) : null;
      const nextIndexes = indexKeys(record);

      // A moved workspace must not linger in its old repo/branch/alias indexes
      if (previous) {
        for (const key of indexKeys(previous)) {
          if (!nextIndexes.includes(key)) ops.push({ op: 'srem', key, member: workspaceId });
        }
      }

      ops.push({ op: 'del', key: recordKey(workspaceId) });
      ops.push({
        op: 'hset',
        key: recordKey(workspaceId),
        fields: {
          workspace_id: record.workspace_id,
          project_id: record.project_id,
          alias: record.alias,
          role: record.role ?? '',
          human_name: record.human_name ?? '',
          repo: record.repo ?? '',
          branch: record.branch ?? '',
          current_issue: record.current_issue ?? '',
          last_seen: record.last_seen,
        },
      });
      ops.push({ op: 'expire', key: recordKey(workspaceId), seconds: this.ttlSeconds });
      for (const key of nextIndexes) {
        ops.push({ op: 'sadd', key, member: workspaceId });
        ops.push({ op: 'expire', key, seconds: this.ttlSeconds * 2 });
      }

      await this.cache.batch(ops);
      return record;
    } catch (error) {
      log.warn(`Heartbeat for ${workspaceId} not recorded:`, error);
      return null;
    }
  }

  async get(workspaceId: string): Promise<PresenceRecord | null> {
    try {
      const hash = await this.cache.hgetall(recordKey(workspaceId));
      return hash ? fromHash(hash) : null;
    } catch (error) {
      log.warn(`Presence read for ${workspaceId} failed:`, error);
      return null;
    }
  }

  async lookup(filter: PresenceFilter): Promise<PresenceRecord[]> {
    let index: string;
    if (filter.alias !== undefined) index = aliasIndex(filter.projectId, filter.alias);
    else if (filter.repo !== undefined && filter.branch !== undefined) index = branchIndex(filter.projectId, filter.repo, filter.branch);
    else if (filter.repo !== undefined) index = repoIndex(filter.projectId, filter.repo);
    else index = projectIndex(filter.projectId);

    try {
      const members = await this.cache.smembers(index);
      const found: PresenceRecord[] = [];
      const stale: CacheOp[] = [];

      for (const workspaceId of members) {
        const hash = await this.cache.hgetall(recordKey(workspaceId));
        const record = hash ? fromHash(hash) : null;
        if (!record) {
          stale.push({ op: 'srem', key: index, member: workspaceId });
          continue;
        }
        if (matches(record, filter)) found.push(record);
      }

      if (stale.length > 0) {
        await this.cache.batch(stale);
        log.debug(`Pruned ${stale.length} stale entries from ${index}`);
      }
      return found.sort((a, b) => a.alias.localeCompare(b.alias));
    } catch (error) {
      log.warn('Presence lookup failed:', error);
      return [];
    }
  }

  async clear(workspaceId: string): Promise<void> {
    try {
      const hash = await this.cache.hgetall(recordKey(workspaceId));
      const record = hash ? fromHash(hash) : null;
      const ops: CacheOp[] = [{ op: 'del', key: recordKey(workspaceId) }];
      if (record) {
        for (const key of indexKeys(record)) ops.push({ op: 'srem', key, member: workspaceId });
      }
      await this.cache.batch(ops);
    } catch (error) {
      log.warn(`Presence clear for ${workspaceId} failed:`, error);
    }
  }
}
