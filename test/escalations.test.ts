import { randomUUID } from 'crypto';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { AuthIdentity } from '../src/auth.js';
import { notificationOutbox } from '../src/db/schema.js';
import { ConflictError, ForbiddenError, NotFoundError, ValidationError } from '../src/errors.js';
import {
  CreateEscalationSchema,
  createEscalation,
  expireOverdueEscalations,
  getEscalation,
  listEscalations,
  RespondEscalationSchema,
  respondToEscalation,
} from '../src/escalations.js';
import { readEventsSince } from '../src/events.js';
import { createTestEnv, initAgent, type Agent, type TestEnv } from './helpers.js';

const HOUR = 3_600_000;

describe('escalations', () => {
  let env: TestEnv;
  let alice: Agent;
  let bob: Agent;

  const escalate = (agent: Agent, body: Record<string, unknown> = {}, now?: Date) =>
    createEscalation(env.ctx, agent.identity, CreateEscalationSchema.parse({
      workspace_id: agent.workspaceId,
      subject: 'Schema choice',
      situation: 'Two migrations disagree on the column type.',
      ...body,
    }), now);

  const respond = (agent: Agent | AuthIdentity, id: string, body: Record<string, unknown>, now?: Date) =>
    respondToEscalation(env.ctx, 'identity' in agent ? agent.identity : agent, id, RespondEscalationSchema.parse(body), now);

  beforeEach(async () => {
    env = await createTestEnv();
    alice = await initAgent(env.ctx, { alias: 'alice' });
    bob = await initAgent(env.ctx, { alias: 'bob', human_name: 'Bob' });
  });

  afterEach(async () => {
    await env.close();
  });

  it('files an escalation with an optional deadline', async () => {
    const now = new Date('2026-03-01T12:00:00.000Z');
    const created = await escalate(alice, { options: ['int', 'bigint'], expires_in_hours: 2 }, now);
    expect(created).toMatchObject({ status: 'pending', expires_at: '2026-03-01T14:00:00.000Z' });

    const view = await getEscalation(env.ctx, bob.identity, created.escalation_id);
    expect(view).toMatchObject({
      escalation_id: created.escalation_id,
      alias: 'alice',
      workspace_id: alice.workspaceId,
      subject: 'Schema choice',
      options: ['int', 'bigint'],
      status: 'pending',
      response: null,
    });

    const events = await readEventsSince(env.cache, alice.projectId, 0);
    expect(events.at(-1)).toMatchObject({ type: 'escalation.created', escalation_id: created.escalation_id, alias: 'alice' });
  });

  it('binds the escalation to the calling workspace', async () => {
    await expect(escalate(alice, { alias: 'bob' })).rejects.toBeInstanceOf(ForbiddenError);
    await expect(createEscalation(env.ctx, alice.identity, CreateEscalationSchema.parse({
      workspace_id: bob.workspaceId,
      subject: 'x',
      situation: 'y',
    }))).rejects.toThrow('workspace_id does not match authenticated actor');
  });

  it('hides unknown and foreign escalations', async () => {
    await expect(getEscalation(env.ctx, alice.identity, 'not-a-uuid')).rejects.toBeInstanceOf(NotFoundError);
    await expect(getEscalation(env.ctx, alice.identity, randomUUID())).rejects.toBeInstanceOf(NotFoundError);

    const stranger = await initAgent(env.ctx, { project_slug: 'elsewhere', repo_origin: 'https://github.com/acme/else.git' });
    const { escalation_id } = await escalate(alice);
    await expect(getEscalation(env.ctx, stranger.identity, escalation_id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('records one response and mails it back', async () => {
    const { escalation_id } = await escalate(alice);
    const answered = await respond(bob, escalation_id, { response: 'Use bigint', note: 'matches upstream' });
    expect(answered).toMatchObject({ status: 'responded', response: 'Use bigint', response_note: 'matches upstream' });

    const [entry] = await env.db.select().from(notificationOutbox);
    expect(entry).toMatchObject({
      eventType: 'escalation_response',
      recipientWorkspaceId: alice.workspaceId,
      recipientAlias: 'alice',
      payload: { escalation_id, subject: 'Schema choice', response: 'Use bigint', note: 'matches upstream' },
    });

    const again = respond(bob, escalation_id, { response: 'Actually int' });
    await expect(again).rejects.toBeInstanceOf(ConflictError);
    await expect(again).rejects.toMatchObject({ code: 'escalation_not_pending', details: { status: 'responded' } });

    const events = await readEventsSince(env.cache, alice.projectId, 0);
    expect(events.at(-1)).toMatchObject({ type: 'escalation.responded', escalation_id, response: 'Use bigint' });
  });

  it('expires an overdue escalation on response and keeps it expired', async () => {
    const now = new Date();
    const { escalation_id } = await escalate(alice, { expires_in_hours: 1 }, now);

    const late = respond(bob, escalation_id, { response: 'too late' }, new Date(now.getTime() + 2 * HOUR));
    await expect(late).rejects.toMatchObject({ status: 409, code: 'escalation_expired' });
    await expect(getEscalation(env.ctx, alice.identity, escalation_id)).resolves.toMatchObject({ status: 'expired' });
    expect(await env.db.select().from(notificationOutbox)).toHaveLength(0);
  });

  it('keeps public readers from responding', async () => {
    const { escalation_id } = await escalate(alice);
    const reader: AuthIdentity = { projectId: alice.projectId, actorId: null, principalKind: 'public', principalId: null, mode: 'proxy' };
    await expect(respond(reader, escalation_id, { response: 'no' })).rejects.toBeInstanceOf(ForbiddenError);
  });

  it('expires overdue escalations in bulk', async () => {
    const now = new Date();
    await escalate(alice, { expires_in_hours: 1 }, now);
    await escalate(alice, { expires_in_hours: 5 }, now);
    await escalate(alice);

    expect(await expireOverdueEscalations(env.db, new Date(now.getTime() + 2 * HOUR))).toBe(1);
    expect(await expireOverdueEscalations(env.db, new Date(now.getTime() + 2 * HOUR))).toBe(0);
  });

  it('lists escalations by status and alias', async () => {
    const first = await escalate(alice);
    await escalate(bob);
    await respond(bob, first.escalation_id, { response: 'done' });

    const page = { limit: 10, cursor: null };
    expect(await listEscalations(env.ctx, alice.identity, { status: 'pending' }, page))
      .toMatchObject({ items: [{ alias: 'bob', status: 'pending' }], has_more: false });
    expect(await listEscalations(env.ctx, alice.identity, { alias: 'alice' }, page))
      .toMatchObject({ items: [{ escalation_id: first.escalation_id, status: 'responded' }] });

    const limited = await listEscalations(env.ctx, alice.identity, {}, { limit: 1, cursor: null });
    expect(limited).toMatchObject({ has_more: true });

    await expect(listEscalations(env.ctx, alice.identity, { status: 'open' }, page))
      .rejects.toThrow('Invalid status: must be one of pending, responded, expired');
    await expect(listEscalations(env.ctx, alice.identity, { alias: '../x' }, page))
      .rejects.toBeInstanceOf(ValidationError);
  });
});
