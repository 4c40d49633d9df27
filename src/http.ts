/**
 * Shared plumbing for the `api/` handlers: CORS, method dispatch, identity,
 * and the mapping from thrown errors to `{ error, detail, ... }` bodies.
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import type { ZodType, ZodTypeDef } from 'zod';
import { resolveIdentity, type AuthIdentity } from './auth.js';
import { getAppContext, type AppContext } from './context.js';
import { toCoordinationError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('http');

export type Method = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface Call {
  ctx: AppContext;
  req: VercelRequest;
  res: VercelResponse;
  /** Resolve the caller; throws 401/403 when it cannot. */
  identity(): Promise<AuthIdentity>;
}

export type MethodHandler = (call: Call) => Promise<unknown>;

const ALLOWED_HEADERS = [
  'Content-Type',
  'Authorization',
  'If-None-Match',
  'Last-Event-ID',
  'X-BH-Auth',
  'X-Project-ID',
  'X-User-ID',
  'X-API-Key',
  'X-Aweb-Actor-ID',
].join(', ');

function setCors(res: VercelResponse, methods: string[]): void {
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', [...methods, 'OPTIONS'].join(', '));
  res.setHeader('Access-Control-Allow-Headers', ALLOWED_HEADERS);
  res.setHeader('Access-Control-Expose-Headers', 'ETag');
}

function isMethod(value: string): value is Method {
  return value === 'GET' || value === 'POST' || value === 'PUT' || value === 'DELETE';
}

/**
 * Dispatch a request to the handler for its method. A handler's return
 * value is sent as JSON with status 200 unless it already wrote the
 * response itself (304s, SSE).
 */
export async function dispatch(
  req: VercelRequest,
  res: VercelResponse,
  handlers: Partial<Record<Method, MethodHandler>>
): Promise<void> {
  setCors(res, Object.keys(handlers));

  const method = (req.method ?? 'GET').toUpperCase();
  if (method === 'OPTIONS') {
    res.status(200).end();
    return;
  }

  const handler = isMethod(method) ? handlers[method] : undefined;
  if (!handler) {
    res.status(405).json({ error: 'method_not_allowed', detail: `Method ${method} not allowed` });
    return;
  }

  try {
    const ctx = getAppContext();
    let identity: Promise<AuthIdentity> | null = null;
    const result = await handler({
      ctx,
      req,
      res,
      identity: () => (identity ??= resolveIdentity(ctx, req.headers)),
    });
    if (!res.headersSent) res.status(200).json(result);
  } catch (error) {
    const known = toCoordinationError(error);
    if (res.headersSent) {
      log.error(`${method} ${req.url ?? ''} failed after response started:`, error);
      res.end();
      return;
    }
    if (known) {
      for (const [name, value] of Object.entries(known.headers)) res.setHeader(name, value);
      res.status(known.status).json(known.toJSON());
      return;
    }
    log.error(`${method} ${req.url ?? ''} failed:`, error);
    res.status(500).json({ error: 'internal_error', detail: 'Internal server error' });
  }
}

/** First value of a query parameter. */
export function queryParam(req: VercelRequest, name: string): string | undefined {
  const value = req.query[name];
  return Array.isArray(value) ? value[0] : value;
}

/** Required path parameter, filled from the `[name]` segment of the route. */
export function pathParam(req: VercelRequest, name: string): string {
  return queryParam(req, name) ?? '';
}

export function parseBody<T>(req: VercelRequest, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const body: unknown = req.body;
  return schema.parse(body ?? {});
}

export function headerValue(req: VercelRequest, name: string): string | undefined {
  const value = req.headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}
