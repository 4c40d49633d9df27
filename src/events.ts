/**
 * Coordination events
 *
 * Each project has a pub/sub channel plus a capped event log in the cache.
 * The log carries a monotonically increasing sequence number so the SSE
 * stream can resume from a cursor. Publication is fire-and-forget: a failed
 * publish is logged and never fails the request that caused it.
 */

import type { CacheClient } from './cache.js';
import { createLogger } from './logger.js';

const log = createLogger('events');

const EVENT_LOG_LIMIT = 200;
const EVENT_LOG_TTL_SECONDS = 24 * 60 * 60;

export const eventChannel = (projectId: string) => `bdh:events:${projectId}`;
const eventLogKey = (projectId: string) => `bdh:events:${projectId}:log`;
const eventSeqKey = (projectId: string) => `bdh:events:${projectId}:seq`;

export type CoordinationEvent =
  | { type: 'bead.status_changed'; workspace_id: string; alias: string; bead_id: string; repo: string; branch: string; old_status: string | null; new_status: string | null }
  | { type: 'claim.acquired'; workspace_id: string; alias: string; bead_id: string; coordinated: boolean }
  | { type: 'claim.released'; workspace_id: string; alias: string; bead_id: string }
  | { type: 'escalation.created'; workspace_id: string; alias: string; escalation_id: string; subject: string }
  | { type: 'escalation.responded'; workspace_id: string; escalation_id: string; response: string }
  | { type: 'workspace.registered'; workspace_id: string; alias: string }
  | { type: 'workspace.deleted'; workspace_id: string; alias: string }
  | { type: 'repo.deleted'; workspace_id: string | null; repo_id: string; canonical_origin: string }
  | { type: 'policy.activated'; workspace_id: string | null; policy_id: string; version: number }
  | { type: 'message.delivered'; workspace_id: string; message_id: string; from_workspace: string; subject: string }
  | { type: 'message.acknowledged'; workspace_id: string; message_id: string }
  | { type: 'reservation.acquired'; workspace_id: string; paths: string[]; ttl_seconds: number }
  | { type: 'reservation.released'; workspace_id: string; paths: string[] };

export type LoggedEvent = CoordinationEvent & { seq: number; project_id: string; at: string };

export async function publishEvent(cache: CacheClient, projectId: string, event: CoordinationEvent): Promise<void> {
  try {
    const seq = await cache.incr(eventSeqKey(projectId));
    const logged: LoggedEvent = { ...event, seq, project_id: projectId, at: new Date().toISOString() };
    const message = JSON.stringify(logged);
    await cache.batch([
      { op: 'lpush', key: eventLogKey(projectId), value: message },
      { op: 'ltrim', key: eventLogKey(projectId), start: 0, stop: EVENT_LOG_LIMIT - 1 },
      { op: 'expire', key: eventLogKey(projectId), seconds: EVENT_LOG_TTL_SECONDS },
      { op: 'expire', key: eventSeqKey(projectId), seconds: EVENT_LOG_TTL_SECONDS },
    ]);
    const receivers = await cache.publish(eventChannel(projectId), message);
    log.debug(`Published ${event.type} seq=${seq} to ${receivers} subscriber(s)`);
  } catch (error) {
    log.warn(`Failed to publish ${event.type} for project ${projectId}:`, error);
  }
}

export async function publishEvents(cache: CacheClient, projectId: string, events: CoordinationEvent[]): Promise<void> {
  for (const event of events) {
    await publishEvent(cache, projectId, event);
  }
}

function isLoggedEvent(value: unknown): value is LoggedEvent {
  return typeof value === 'object' && value !== null
    && 'seq' in value && typeof value.seq === 'number'
    && 'type' in value && typeof value.type === 'string';
}

/** Logged events with a sequence number above `afterSeq`, oldest first. */
export async function readEventsSince(cache: CacheClient, projectId: string, afterSeq: number): Promise<LoggedEvent[]> {
  const raw = await cache.lrange(eventLogKey(projectId), 0, EVENT_LOG_LIMIT - 1);
  const events: LoggedEvent[] = [];
  for (const entry of raw) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(entry);
    } catch {
      log.warn(`Dropping corrupt event log entry for project ${projectId}`);
      continue;
    }
    if (isLoggedEvent(parsed) && parsed.seq > afterSeq) events.push(parsed);
  }
  return events.sort((a, b) => a.seq - b.seq);
}

// ============================================================================
// Identity library mutation callbacks
// ============================================================================

export type MutationEvent =
  | { kind: 'event'; projectId: string; event: CoordinationEvent }
  | { kind: 'unrecognized'; eventType: string; payload: Record<string, unknown> };

const str = (ctx: Record<string, unknown>, key: string) => {
  const value = ctx[key];
  return typeof value === 'string' ? value : '';
};

const num = (ctx: Record<string, unknown>, key: string) => {
  const value = ctx[key];
  return typeof value === 'number' ? value : 0;
};

/**
 * Map a mutation callback from the identity library onto a coordination
 * event. Unknown event types, and known ones missing their project or
 * workspace, come back as `unrecognized` with the raw payload.
 */
export function translateMutation(eventType: string, ctx: Record<string, unknown>): MutationEvent {
  const projectId = str(ctx, 'project_id');
  const paths = str(ctx, 'resource_key') ? [str(ctx, 'resource_key')] : [];
  let event: CoordinationEvent | null = null;

  switch (eventType) {
    case 'message.sent':
      event = {
        type: 'message.delivered',
        workspace_id: str(ctx, 'to_agent_id'),
        message_id: str(ctx, 'message_id'),
        from_workspace: str(ctx, 'from_agent_id'),
        subject: str(ctx, 'subject'),
      };
      break;
    case 'message.acknowledged':
      event = { type: 'message.acknowledged', workspace_id: str(ctx, 'agent_id'), message_id: str(ctx, 'message_id') };
      break;
    case 'reservation.acquired':
      event = { type: 'reservation.acquired', workspace_id: str(ctx, 'holder_agent_id'), paths, ttl_seconds: num(ctx, 'ttl_seconds') };
      break;
    case 'reservation.released':
      event = { type: 'reservation.released', workspace_id: str(ctx, 'holder_agent_id'), paths };
      break;
  }

  if (!event || !projectId || !event.workspace_id) {
    return { kind: 'unrecognized', eventType, payload: ctx };
  }
  return { kind: 'event', projectId, event };
}

export function createMutationHandler(cache: CacheClient) {
  return async (eventType: string, ctx: Record<string, unknown>): Promise<void> => {
    const translated = translateMutation(eventType, ctx);
    if (translated.kind === 'unrecognized') {
      log.debug(`Ignoring unrecognized mutation ${eventType}`);
      return;
    }
    await publishEvent(cache, translated.projectId, translated.event);
  };
}
