/**
 * Trust boundary
 *
 * Turns an inbound request into an AuthIdentity. Two modes:
 *
 *   direct - `Authorization: Bearer <api key>`, looked up in the identity
 *            partition.
 *   proxy  - a trusted front end signs `X-BH-Auth` with the shared secret:
 *            v2:<project_id>:<u|k|p>:<principal_id>:<actor_id>:<hex hmac>
 *            and repeats the signed values in X-Project-ID, X-User-ID or
 *            X-API-Key, and X-Aweb-Actor-ID.
 *
 * Proxy mode is only considered when BDH_INTERNAL_AUTH_SECRET is set;
 * otherwise proxy headers are ignored.
 */

import crypto from 'crypto';
import type { IncomingHttpHeaders } from 'http';
import { and, eq, isNull } from 'drizzle-orm';
import type { AppContext } from './context.js';
import { projects } from './db/schema.js';
import { ForbiddenError, UnauthenticatedError } from './errors.js';

export type PrincipalKind = 'user' | 'api_key' | 'public';

export interface AuthIdentity {
  projectId: string;
  /** Workspace/agent the caller acts as; null for users without an agent and public readers. */
  actorId: string | null;
  principalKind: PrincipalKind;
  principalId: string | null;
  mode: 'direct' | 'proxy';
}

export const PII_FIELDS = new Set(['human_name', 'hostname', 'workspace_path', 'created_by', 'email']);

const PRINCIPAL_TYPES: Record<string, PrincipalKind> = { u: 'user', k: 'api_key', p: 'public' };

function header(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

export function signProxyHeader(
  secret: string,
  fields: { projectId: string; type: 'u' | 'k' | 'p'; principalId: string; actorId: string }
): string {
  const payload = `v2:${fields.projectId}:${fields.type}:${fields.principalId}:${fields.actorId}`;
  const sig = crypto.createHmac('sha256', secret).update(payload).digest('hex');
  return `${payload}:${sig}`;
}

function signatureMatches(secret: string, payload: string, signature: string): boolean {
  const expected = crypto.createHmac('sha256', secret).update(payload).digest('hex');
  if (expected.length !== signature.length) return false;
  return crypto.timingSafeEqual(Buffer.from(expected), Buffer.from(signature));
}

async function loadProject(ctx: AppContext, projectId: string) {
  const [project] = await ctx.db
    .select({ id: projects.id, visibility: projects.visibility })
    .from(projects)
    .where(and(eq(projects.id, projectId), isNull(projects.deletedAt)))
    .limit(1);
  return project ?? null;
}

async function resolveProxyIdentity(ctx: AppContext, secret: string, headers: IncomingHttpHeaders, signed: string): Promise<AuthIdentity> {
  const parts = signed.split(':');
  if (parts.length !== 6 || parts[0] !== 'v2') {
    throw new UnauthenticatedError('Malformed internal auth header');
  }
  const [, projectId, type, principalId, actorId, signature] = parts;
  const payload = parts.slice(0, 5).join(':');

  if (!signatureMatches(secret, payload, signature)) {
    throw new UnauthenticatedError('Invalid internal auth signature');
  }

  const principalKind = PRINCIPAL_TYPES[type];
  if (!principalKind) throw new UnauthenticatedError('Unknown principal type');

  if (header(headers, 'x-project-id') !== projectId) {
    throw new UnauthenticatedError('X-Project-ID does not match signed project');
  }

  const project = await loadProject(ctx, projectId);
  if (!project) throw new UnauthenticatedError('Unknown project');

  if (principalKind === 'public') {
    if (project.visibility !== 'public') {
      throw new ForbiddenError('Project is not public');
    }
    return { projectId, actorId: null, principalKind, principalId: null, mode: 'proxy' };
  }

  const principalHeader = principalKind === 'user' ? 'x-user-id' : 'x-api-key';
  if (header(headers, principalHeader) !== principalId) {
    throw new UnauthenticatedError(`${principalHeader} does not match signed principal`);
  }
  if ((header(headers, 'x-aweb-actor-id') ?? '') !== actorId) {
    throw new UnauthenticatedError('X-Aweb-Actor-ID does not match signed actor');
  }

  return { projectId, actorId: actorId || null, principalKind, principalId, mode: 'proxy' };
}

export async function resolveIdentity(ctx: AppContext, headers: IncomingHttpHeaders): Promise<AuthIdentity> {
  const secret = ctx.settings.internalAuthSecret;
  const signed = header(headers, 'x-bh-auth');
  if (secret && signed) {
    return resolveProxyIdentity(ctx, secret, headers, signed);
  }

  const authorization = header(headers, 'authorization');
  const match = authorization ? /^Bearer\s+(\S+)$/i.exec(authorization) : null;
  if (!match) throw new UnauthenticatedError();

  const verified = await ctx.identity.verifyApiKey(ctx.db, match[1]);
  if (!verified) throw new UnauthenticatedError('Invalid or expired API key');

  const project = await loadProject(ctx, verified.projectId);
  if (!project) throw new UnauthenticatedError('Unknown project');

  return {
    projectId: verified.projectId,
    actorId: verified.agentId,
    principalKind: 'api_key',
    principalId: verified.agentId,
    mode: 'direct',
  };
}

export function requireWriter(identity: AuthIdentity): void {
  if (identity.principalKind === 'public') {
    throw new ForbiddenError('Public readers cannot modify project state');
  }
}

/** Operator views such as the notification outbox are closed to public readers. */
export function requireMember(identity: AuthIdentity): void {
  if (identity.principalKind === 'public') {
    throw new ForbiddenError('Public readers cannot view operator data');
  }
}

/**
 * The caller may only act as its own workspace. Runs before any write so a
 * mismatched request leaves storage untouched.
 */
export function enforceActorBinding(identity: AuthIdentity, workspaceId: string): void {
  requireWriter(identity);
  if (!identity.actorId || identity.actorId !== workspaceId) {
    throw new ForbiddenError('workspace_id does not match authenticated actor', {
      workspace_id: workspaceId,
    });
  }
}

export function redact(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redact);
  if (value instanceof Date) return value;
  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      if (!PII_FIELDS.has(key)) result[key] = redact(inner);
    }
    return result;
  }
  return value;
}

export function redactForPrincipal(identity: AuthIdentity, value: unknown): unknown {
  return identity.principalKind === 'public' ? redact(value) : value;
}
