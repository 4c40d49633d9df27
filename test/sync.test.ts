import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { AuthIdentity } from '../src/auth.js';
import { activeClaims, getBead, listBeads, readyBeads } from '../src/beads.js';
import { SyncRequestSchema, syncBeads } from '../src/beads-sync.js';
import { issues, notificationOutbox } from '../src/db/schema.js';
import { getDefaultBundle } from '../src/defaults.js';
import { ForbiddenError, GoneError, ValidationError } from '../src/errors.js';
import { readEventsSince } from '../src/events.js';
import { createPolicyVersion } from '../src/policies.js';
import { subscribe, SubscribeSchema } from '../src/subscriptions.js';
import { deleteWorkspace } from '../src/workspaces.js';
import { createTestEnv, initAgent, REPO, type Agent, type TestEnv } from './helpers.js';

const jsonl = (...records: Record<string, unknown>[]) => records.map(record => JSON.stringify(record)).join('\n');

describe('syncBeads', () => {
  let env: TestEnv;
  let alice: Agent;
  let bob: Agent;

  const sync = (agent: Agent, body: Record<string, unknown>, identity: AuthIdentity = agent.identity) =>
    syncBeads(env.ctx, identity, SyncRequestSchema.parse({ workspace_id: agent.workspaceId, ...body }));

  const claimsOn = async (beadId: string) =>
    (await activeClaims(env.db, alice.projectId))
      .filter(claim => claim.bead_id === beadId)
      .map(claim => claim.alias)
      .sort();

  beforeEach(async () => {
    env = await createTestEnv();
    alice = await initAgent(env.ctx, { alias: 'alice' });
    bob = await initAgent(env.ctx, { alias: 'bob' });
  });

  afterEach(async () => {
    await env.close();
  });

  describe('mirroring', () => {
    it('adds beads and skips records without a valid id', async () => {
      const result = await sync(alice, {
        issues_jsonl: jsonl(
          { id: 'bd-1', title: 'First', status: 'open', priority: 1 },
          { id: 'bd-2', title: 'Second', status: 'open', dependencies: [{ type: 'blocks', depends_on_id: 'bd-1' }] },
          { title: 'no id' }
        ),
      });

      expect(result).toMatchObject({
        status: 'completed',
        sync_mode: 'full',
        repo: REPO,
        branch: 'main',
        issues_synced: 2,
        issues_added: 2,
        issues_updated: 0,
        skipped: 1,
        conflicts: [],
        claim_changes: [],
        rejections: [],
      });

      const bead = await getBead(env.ctx, alice.identity, 'bd-2');
      expect(bead).toMatchObject({
        bead_id: 'bd-2',
        title: 'Second',
        blocked_by: [{ repo: REPO, branch: 'main', bead_id: 'bd-1' }],
        claims: [],
      });
    });

    it('accepts structured items and reports updates on the second pass', async () => {
      await sync(alice, { issues: [{ id: 'bd-1', status: 'open' }] });
      const second = await sync(alice, { issues: [{ id: 'bd-1', status: 'open', title: 'Renamed' }] });
      expect(second.issues_added).toBe(0);
      expect(second.issues_updated).toBe(1);
      await expect(getBead(env.ctx, alice.identity, 'bd-1')).resolves.toMatchObject({ title: 'Renamed' });
    });

    it('requires a payload for full syncs', async () => {
      await expect(sync(alice, {})).rejects.toThrow('Full sync requires issues_jsonl or issues');
    });

    it('rejects workspaces registered without a repo', async () => {
      const loner = await initAgent(env.ctx, { alias: 'loner', repo_origin: undefined });
      await expect(sync(loner, { issues: [] })).rejects.toBeInstanceOf(ValidationError);
    });

    it('keeps the newer copy when an update is stale', async () => {
      await sync(alice, { issues: [{ id: 'bd-1', status: 'open', updated_at: '2026-01-02T00:00:00Z' }] });
      const stale = await sync(alice, { issues: [{ id: 'bd-1', status: 'closed', updated_at: '2026-01-01T00:00:00Z' }] });

      expect(stale.conflicts).toEqual(['bd-1']);
      expect(stale.issues_synced).toBe(0);
      await expect(getBead(env.ctx, alice.identity, 'bd-1')).resolves.toMatchObject({ status: 'open' });
    });

    it('deletes beads named in an incremental sync and releases their claims', async () => {
      await sync(alice, { issues: [{ id: 'bd-1', status: 'open' }, { id: 'bd-2', status: 'in_progress' }] });
      const result = await sync(alice, { sync_mode: 'incremental', deleted_ids: ['bd-2', '../etc'] });

      expect(result.issues_deleted).toBe(1);
      expect(result.skipped).toBe(1);
      expect(result.claim_changes).toEqual([
        { bead_id: 'bd-2', action: 'released', workspace_id: alice.workspaceId, alias: 'alice' },
      ]);
      expect(await env.db.select().from(issues)).toHaveLength(1);
    });

    it('lists ready beads once their blockers close', async () => {
      await sync(alice, {
        issues_jsonl: jsonl(
          { id: 'bd-1', status: 'open' },
          { id: 'bd-2', status: 'open', dependencies: [{ type: 'blocks', depends_on_id: 'bd-1' }] }
        ),
      });
      expect(await readyBeads(env.ctx, alice.identity, {})).toMatchObject({ count: 1, issues: [{ bead_id: 'bd-1' }] });

      await sync(alice, { issues: [{ id: 'bd-1', status: 'closed' }] });
      expect(await readyBeads(env.ctx, alice.identity, {})).toMatchObject({ count: 1, issues: [{ bead_id: 'bd-2' }] });
    });

    it('pages bead listings', async () => {
      await sync(alice, { issues: [{ id: 'bd-1' }, { id: 'bd-2' }, { id: 'bd-3' }] });
      const first = await listBeads(env.ctx, alice.identity, {}, { limit: 2, cursor: null });
      expect(first).toMatchObject({ items: [{ bead_id: 'bd-1' }, { bead_id: 'bd-2' }], has_more: true });

      const second = await listBeads(env.ctx, alice.identity, {}, { limit: 2, cursor: { offset: 2 } });
      expect(second).toEqual(expect.objectContaining({ has_more: false, next_cursor: null }));
      expect(second).toMatchObject({ items: [{ bead_id: 'bd-3' }] });

      await expect(
        listBeads(env.ctx, alice.identity, {}, { limit: 2, cursor: { offset: 1.5 } })
      ).rejects.toMatchObject({ status: 400, message: 'Invalid cursor' });
    });
  });

  describe('claims', () => {
    it('claims in_progress beads and rejects a second workspace', async () => {
      const claimed = await sync(alice, { issues: [{ id: 'bd-1', status: 'in_progress', title: 'First' }] });
      expect(claimed.claim_changes).toEqual([{ bead_id: 'bd-1', action: 'acquired', coordinated: false }]);

      const rejected = await sync(bob, { issues: [{ id: 'bd-1', status: 'in_progress' }] });
      expect(rejected.rejections).toEqual([{
        bead_id: 'bd-1',
        claimed: false,
        held_by: 'alice',
        held_by_workspace_id: alice.workspaceId,
        held_since: expect.any(String),
      }]);
      expect(rejected.issues_synced).toBe(0);
      expect(await claimsOn('bd-1')).toEqual(['alice']);

      const events = await readEventsSince(env.cache, alice.projectId, 0);
      expect(events.filter(event => event.type === 'claim.acquired')).toHaveLength(1);
    });

    it('lets exactly one of two racing workspaces claim a bead', async () => {
      const [a, b] = await Promise.all([
        sync(alice, { issues: [{ id: 'bd-7', status: 'in_progress' }] }),
        sync(bob, { issues: [{ id: 'bd-7', status: 'in_progress' }] }),
      ]);
      expect(a.claim_changes.length + b.claim_changes.length).toBe(1);
      expect(a.rejections.length + b.rejections.length).toBe(1);
      expect(await claimsOn('bd-7')).toHaveLength(1);
    });

    it('does not claim twice for the same workspace', async () => {
      await sync(alice, { issues: [{ id: 'bd-1', status: 'in_progress' }] });
      const again = await sync(alice, { issues: [{ id: 'bd-1', status: 'in_progress' }] });
      expect(again.claim_changes).toEqual([]);
      expect(again.issues_updated).toBe(1);
      expect(await claimsOn('bd-1')).toEqual(['alice']);
    });

    it('leaves claims alone for beads assigned to someone else', async () => {
      const result = await sync(alice, { issues: [{ id: 'bd-1', status: 'in_progress', assignee: 'carol' }] });
      expect(result.claim_changes).toEqual([]);
      expect(await claimsOn('bd-1')).toEqual([]);
    });

    it('releases the claim when the bead leaves in_progress', async () => {
      await sync(alice, { issues: [{ id: 'bd-1', status: 'in_progress' }] });
      const released = await sync(alice, { issues: [{ id: 'bd-1', status: 'open' }] });
      expect(released.claim_changes).toEqual([
        { bead_id: 'bd-1', action: 'released', workspace_id: alice.workspaceId, alias: 'alice' },
      ]);
      expect(await claimsOn('bd-1')).toEqual([]);
    });

    it('records the top-most ancestor as the apex', async () => {
      await sync(alice, {
        issues_jsonl: jsonl(
          { id: 'bd-10', status: 'open', issue_type: 'epic' },
          { id: 'bd-11', status: 'open', dependencies: [{ type: 'parent-child', depends_on_id: 'bd-10' }] },
          { id: 'bd-12', status: 'in_progress', dependencies: [{ type: 'parent-child', depends_on_id: 'bd-11' }] }
        ),
      });
      const [claim] = await activeClaims(env.db, alice.projectId, alice.workspaceId);
      expect(claim).toMatchObject({ bead_id: 'bd-12', apex_bead_id: 'bd-10', alias: 'alice' });
    });

    it('writes nothing when the workspace is not the caller', async () => {
      await expect(sync(bob, { issues: [{ id: 'bd-1', status: 'in_progress' }] }, alice.identity))
        .rejects.toBeInstanceOf(ForbiddenError);
      expect(await env.db.select().from(issues)).toHaveLength(0);
    });

    it('answers 410 for a deleted workspace', async () => {
      await deleteWorkspace(env.ctx, alice.identity, alice.workspaceId);
      const attempt = sync(alice, { issues: [{ id: 'bd-1', status: 'open' }] });
      await expect(attempt).rejects.toBeInstanceOf(GoneError);
      await expect(attempt).rejects.toMatchObject({ status: 410 });
    });
  });

  describe('coordinated claims', () => {
    it('are refused while the policy does not allow them', async () => {
      await sync(alice, { issues: [{ id: 'bd-3', status: 'in_progress' }], coordinated: ['bd-3'] });
      const result = await sync(bob, { issues: [{ id: 'bd-3', status: 'in_progress' }], coordinated: ['bd-3'] });
      expect(result.rejections.map(rejection => rejection.bead_id)).toEqual(['bd-3']);
    });

    it('let several workspaces share a bead when every claim is coordinated', async () => {
      await createPolicyVersion(env.db, alice.projectId, { ...getDefaultBundle(), claims: { allow_coordinated: true } });

      await sync(alice, { issues: [{ id: 'bd-4', status: 'in_progress' }], coordinated: ['bd-4'] });
      const shared = await sync(bob, { issues: [{ id: 'bd-4', status: 'in_progress' }], coordinated: ['bd-4'] });
      expect(shared.claim_changes).toEqual([{ bead_id: 'bd-4', action: 'acquired', coordinated: true }]);
      expect(await claimsOn('bd-4')).toEqual(['alice', 'bob']);

      await sync(alice, { issues: [{ id: 'bd-5', status: 'in_progress' }] });
      const refused = await sync(bob, { issues: [{ id: 'bd-5', status: 'in_progress' }], coordinated: ['bd-5'] });
      expect(refused.rejections.map(rejection => rejection.held_by)).toEqual(['alice']);
    });

    it('are all released when the bead closes', async () => {
      await createPolicyVersion(env.db, alice.projectId, { ...getDefaultBundle(), claims: { allow_coordinated: true } });
      await sync(alice, { issues: [{ id: 'bd-4', status: 'in_progress' }], coordinated: ['bd-4'] });
      await sync(bob, { issues: [{ id: 'bd-4', status: 'in_progress' }], coordinated: ['bd-4'] });

      const closed = await sync(alice, { issues: [{ id: 'bd-4', status: 'closed' }] });
      expect(closed.claim_changes.map(change => change.action)).toEqual(['released', 'released']);
      expect(await claimsOn('bd-4')).toEqual([]);
    });
  });

  describe('subscriptions', () => {
    it('queue one notification per subscriber on a status change', async () => {
      await subscribe(env.ctx, bob.identity, SubscribeSchema.parse({ workspace_id: bob.workspaceId, bead_id: 'bd-*' }));
      await subscribe(env.ctx, bob.identity, SubscribeSchema.parse({ workspace_id: bob.workspaceId, bead_id: 'bd-1' }));

      const created = await sync(alice, { issues: [{ id: 'bd-1', status: 'open', title: 'First' }] });
      expect(created.notifications_queued).toBe(0);

      const changed = await sync(alice, { issues: [{ id: 'bd-1', status: 'closed', title: 'First' }] });
      expect(changed.notifications_queued).toBe(1);

      const [entry] = await env.db.select().from(notificationOutbox);
      expect(entry).toMatchObject({
        eventType: 'bead_status_change',
        status: 'pending',
        recipientWorkspaceId: bob.workspaceId,
        recipientAlias: 'bob',
        payload: { bead_id: 'bd-1', repo: REPO, branch: 'main', old_status: 'open', new_status: 'closed', title: 'First' },
      });
    });

    it('queues nothing more when the same payload is submitted again', async () => {
      await subscribe(env.ctx, bob.identity, SubscribeSchema.parse({ workspace_id: bob.workspaceId, bead_id: 'bd-*' }));
      const opened = { id: 'bd-1', status: 'open', title: 'First', updated_at: '2026-01-01T10:00:00.000Z' };
      const closed = { ...opened, status: 'closed', updated_at: '2026-01-01T11:00:00.000Z' };
      const stored = () =>
        env.db
          .select({ beadId: issues.beadId, status: issues.status, title: issues.title, updatedAt: issues.updatedAt })
          .from(issues);

      await sync(alice, { issues: [opened] });
      expect((await sync(alice, { issues: [closed] })).notifications_queued).toBe(1);
      const before = await stored();

      const full = await sync(alice, { issues: [closed] });
      const incremental = await sync(alice, { sync_mode: 'incremental', changed_items: [closed] });

      expect(full).toMatchObject({ issues_updated: 1, notifications_queued: 0, conflicts: [] });
      expect(incremental).toMatchObject({ issues_updated: 1, notifications_queued: 0, conflicts: [] });
      expect(await env.db.select().from(notificationOutbox)).toHaveLength(1);
      expect(await stored()).toEqual(before);
      expect(before).toEqual([
        { beadId: 'bd-1', status: 'closed', title: 'First', updatedAt: new Date('2026-01-01T11:00:00.000Z') },
      ]);
    });

    it('skip subscriptions narrowed to another repo', async () => {
      await subscribe(env.ctx, bob.identity, SubscribeSchema.parse({
        workspace_id: bob.workspaceId,
        bead_id: 'bd-1',
        repo: 'https://github.com/acme/gadgets.git',
      }));
      await sync(alice, { issues: [{ id: 'bd-1', status: 'open' }] });
      const changed = await sync(alice, { issues: [{ id: 'bd-1', status: 'closed' }] });
      expect(changed.notifications_queued).toBe(0);
    });
  });
});
