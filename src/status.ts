/**
 * Project status
 *
 * `snapshot` answers GET /v1/status: who is online, what is claimed, how many
 * escalations wait on a human, and which policy version is active.
 * `streamEvents` feeds GET /v1/status/stream from the per-project event log.
 */

import { and, count, eq } from 'drizzle-orm';
import { redactForPrincipal, type AuthIdentity } from './auth.js';
import { activeClaims } from './beads.js';
import type { AppContext } from './context.js';
import { escalations, policies, projects } from './db/schema.js';
import { NotFoundError } from './errors.js';
import { readEventsSince, type LoggedEvent } from './events.js';
import { createLogger } from './logger.js';

const log = createLogger('status');

export interface StatusFilter {
  repo?: string;
  branch?: string;
  alias?: string;
}

export async function snapshot(ctx: AppContext, identity: AuthIdentity, filter: StatusFilter = {}) {
  const [project] = await ctx.db
    .select({
      id: projects.id,
      slug: projects.slug,
      name: projects.name,
      visibility: projects.visibility,
      policyVersion: policies.version,
    })
    .from(projects)
    .leftJoin(policies, eq(policies.id, projects.activePolicyId))
    .where(eq(projects.id, identity.projectId));
  if (!project) throw new NotFoundError(`Project ${identity.projectId} not found`);

  const [pending] = await ctx.db
    .select({ value: count() })
    .from(escalations)
    .where(and(eq(escalations.projectId, identity.projectId), eq(escalations.status, 'pending')));

  const workspaces = await ctx.presence.lookup({ projectId: identity.projectId, ...filter });
  const claims = await activeClaims(ctx.db, identity.projectId);

  return redactForPrincipal(identity, {
    project: { project_id: project.id, slug: project.slug, name: project.name, visibility: project.visibility },
    workspaces,
    claims,
    escalations_pending: pending?.value ?? 0,
    policy_version: project.policyVersion,
    timestamp: new Date().toISOString(),
  });
}

// ============================================================================
// SSE
// ============================================================================

export interface EventSink {
  write(chunk: string): unknown;
}

export interface StreamOptions {
  signal: AbortSignal;
  /** Resume after this sequence number (from Last-Event-ID); defaults to "now". */
  afterSeq?: number;
  pollMs?: number;
  keepaliveMs?: number;
  /** Only events whose category (the part of the type before the dot) is listed. */
  eventTypes?: ReadonlySet<string>;
}

/** Parse a comma-separated `event_types` query value such as `bead,claim`. */
export function parseEventTypes(raw: string | undefined): Set<string> | undefined {
  const categories = (raw ?? '').split(',').map(part => part.trim()).filter(Boolean);
  return categories.length > 0 ? new Set(categories) : undefined;
}

export function eventCategory(type: string): string {
  return type.split('.')[0];
}

export function formatSseFrame(seq: number, type: string, data: unknown): string {
  return `id: ${seq}\nevent: ${type}\ndata: ${JSON.stringify(data)}\n\n`;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal.aborted) return resolve();
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}

/** Write the project's events to `sink` until `signal` aborts. */
export async function streamEvents(
  ctx: AppContext,
  identity: AuthIdentity,
  sink: EventSink,
  options: StreamOptions
): Promise<void> {
  const pollMs = options.pollMs ?? 1000;
  const keepaliveMs = options.keepaliveMs ?? 15_000;

  let cursor = options.afterSeq;
  if (cursor === undefined) {
    const backlog = await readEventsSince(ctx.cache, identity.projectId, 0);
    cursor = backlog.length > 0 ? backlog[backlog.length - 1].seq : 0;
  }

  sink.write(`: connected seq=${cursor}\n\n`);
  let lastWrite = Date.now();

  while (!options.signal.aborted) {
    let events: LoggedEvent[] = [];
    try {
      events = await readEventsSince(ctx.cache, identity.projectId, cursor);
    } catch (error) {
      log.warn('Event log read failed:', error);
    }

    for (const event of events) {
      cursor = event.seq;
      if (options.eventTypes && !options.eventTypes.has(eventCategory(event.type))) continue;
      sink.write(formatSseFrame(event.seq, event.type, redactForPrincipal(identity, event)));
      lastWrite = Date.now();
    }

    if (Date.now() - lastWrite >= keepaliveMs) {
      sink.write(': keepalive\n\n');
      lastWrite = Date.now();
    }
    await sleep(pollMs, options.signal);
  }
  log.debug(`Stream for project ${identity.projectId} closed at seq=${cursor}`);
}
