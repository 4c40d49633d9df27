/**
 * What every MCP tool needs: the service context, the caller's identity and
 * a uniform way to turn results and coordination errors into tool output.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { resolveIdentity, type AuthIdentity } from '../auth.js';
import type { AppContext } from '../context.js';
import { toCoordinationError, UnauthenticatedError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('mcp');

export interface ToolSession {
  ctx: AppContext;
  identity(): Promise<AuthIdentity>;
}

/** Session authenticated with an API key, resolved once on first use. */
export function apiKeySession(ctx: AppContext, apiKey: string | null): ToolSession {
  let resolved: Promise<AuthIdentity> | null = null;
  return {
    ctx,
    identity() {
      if (!apiKey) return Promise.reject(new UnauthenticatedError('BDH_API_KEY is not set'));
      resolved ??= resolveIdentity(ctx, { authorization: `Bearer ${apiKey}` });
      return resolved;
    },
  };
}

export function textResult(data: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

/** Run a tool body; coordination errors come back as tool errors rather than protocol failures. */
export async function runTool(name: string, body: () => Promise<unknown>): Promise<CallToolResult> {
  try {
    return textResult(await body());
  } catch (error) {
    const known = toCoordinationError(error);
    if (known) return { ...textResult(known.toJSON()), isError: true };
    log.error(`Tool ${name} failed:`, error);
    return { ...textResult({ error: 'internal_error', detail: 'Tool failed unexpectedly' }), isError: true };
  }
}

export function requireActor(identity: AuthIdentity): string {
  if (!identity.actorId) throw new UnauthenticatedError('This credential is not bound to a workspace');
  return identity.actorId;
}
