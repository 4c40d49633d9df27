/**
 * HTTP server mode
 *
 * Serves the same `api/` handlers as a serverless deployment from one
 * long-running http server. Path segments written `[name]` in the
 * handler file names become `req.query.name`, as they do on Vercel.
 */

import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import type { VercelRequest, VercelResponse } from '@vercel/node';
import health from '../api/v1/health.js';
import init from '../api/v1/init.js';
import heartbeat from '../api/v1/heartbeat.js';
import claims from '../api/v1/claims.js';
import sync from '../api/v1/bdh/sync.js';
import beads from '../api/v1/beads/index.js';
import readyBeads from '../api/v1/beads/ready.js';
import beadById from '../api/v1/beads/[bead_id].js';
import registerWorkspace from '../api/v1/workspaces/register.js';
import workspaces from '../api/v1/workspaces/index.js';
import workspaceById from '../api/v1/workspaces/[id].js';
import repos from '../api/v1/repos/index.js';
import lookupRepo from '../api/v1/repos/lookup.js';
import ensureRepo from '../api/v1/repos/ensure.js';
import repoById from '../api/v1/repos/[id].js';
import createPolicy from '../api/v1/policies/index.js';
import activePolicy from '../api/v1/policies/active.js';
import policyHistory from '../api/v1/policies/history.js';
import resetPolicy from '../api/v1/policies/reset.js';
import policyById from '../api/v1/policies/[id]/index.js';
import activatePolicy from '../api/v1/policies/[id]/activate.js';
import outbox from '../api/v1/notifications/outbox.js';
import escalations from '../api/v1/escalations/index.js';
import escalationById from '../api/v1/escalations/[id]/index.js';
import respondToEscalation from '../api/v1/escalations/[id]/respond.js';
import subscriptions from '../api/v1/subscriptions/index.js';
import subscriptionById from '../api/v1/subscriptions/[id].js';
import status from '../api/v1/status/index.js';
import statusStream from '../api/v1/status/stream.js';
import { createLogger } from './logger.js';

const log = createLogger('http');

type Handler = (req: VercelRequest, res: VercelResponse) => Promise<void>;

interface Route {
  segments: string[];
  handler: Handler;
}

// Static routes first so /v1/policies/active never matches /v1/policies/:id.
const ROUTE_TABLE: Array<[string, Handler]> = [
  ['/v1/health', health],
  ['/v1/init', init],
  ['/v1/heartbeat', heartbeat],
  ['/v1/claims', claims],
  ['/v1/bdh/sync', sync],
  ['/v1/beads', beads],
  ['/v1/beads/ready', readyBeads],
  ['/v1/workspaces', workspaces],
  ['/v1/workspaces/register', registerWorkspace],
  ['/v1/repos', repos],
  ['/v1/repos/lookup', lookupRepo],
  ['/v1/repos/ensure', ensureRepo],
  ['/v1/policies', createPolicy],
  ['/v1/policies/active', activePolicy],
  ['/v1/policies/history', policyHistory],
  ['/v1/policies/reset', resetPolicy],
  ['/v1/notifications/outbox', outbox],
  ['/v1/escalations', escalations],
  ['/v1/subscriptions', subscriptions],
  ['/v1/status', status],
  ['/v1/status/stream', statusStream],
  ['/v1/beads/:bead_id', beadById],
  ['/v1/workspaces/:id', workspaceById],
  ['/v1/repos/:id', repoById],
  ['/v1/policies/:id', policyById],
  ['/v1/policies/:id/activate', activatePolicy],
  ['/v1/escalations/:id', escalationById],
  ['/v1/escalations/:id/respond', respondToEscalation],
  ['/v1/subscriptions/:id', subscriptionById],
];

const ROUTES: Route[] = ROUTE_TABLE.map(([path, handler]) => ({ segments: path.split('/').filter(Boolean), handler }));

const splitPath = (path: string) => path.split('/').filter(Boolean).map(segment => decodeURIComponent(segment));

function matchRoute(path: string): { handler: Handler; params: Record<string, string> } | null {
  const parts = splitPath(path);
  for (const route of ROUTES) {
    if (route.segments.length !== parts.length) continue;
    const params: Record<string, string> = {};
    const matched = route.segments.every((segment, i) => {
      if (segment.startsWith(':')) {
        params[segment.slice(1)] = parts[i];
        return true;
      }
      return segment === parts[i];
    });
    if (matched) return { handler: route.handler, params };
  }
  return null;
}

function parseBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', chunk => body += chunk.toString());
    req.on('end', () => {
      try {
        resolve(body ? JSON.parse(body) : undefined);
      } catch (error) {
        reject(error);
      }
    });
    req.on('error', reject);
  });
}

function parseQuery(url: string): Record<string, string | string[]> {
  const idx = url.indexOf('?');
  if (idx === -1) return {};
  const params = new URLSearchParams(url.substring(idx + 1));
  const result: Record<string, string | string[]> = {};
  params.forEach((value, key) => {
    const existing = result[key];
    if (existing === undefined) result[key] = value;
    else result[key] = Array.isArray(existing) ? [...existing, value] : [existing, value];
  });
  return result;
}

function json(res: ServerResponse, data: unknown, status = 200) {
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': '*',
  });
  res.end(JSON.stringify(data));
}

function toVercelRequest(req: IncomingMessage, query: Record<string, string | string[]>, body: unknown): VercelRequest {
  const cookies: Record<string, string> = {};
  return Object.assign(req, { query, body, cookies });
}

function toVercelResponse(res: ServerResponse): VercelResponse {
  const vres: VercelResponse = Object.assign(res, {
    status(statusCode: number) {
      res.statusCode = statusCode;
      return vres;
    },
    json(jsonBody: unknown) {
      if (!res.hasHeader('Content-Type')) res.setHeader('Content-Type', 'application/json; charset=utf-8');
      res.end(JSON.stringify(jsonBody));
      return vres;
    },
    send(body: unknown) {
      if (typeof body === 'string' || Buffer.isBuffer(body)) res.end(body);
      else return vres.json(body);
      return vres;
    },
    redirect(statusOrUrl: string | number, url?: string) {
      const location = typeof statusOrUrl === 'string' ? statusOrUrl : url ?? '/';
      res.writeHead(typeof statusOrUrl === 'number' ? statusOrUrl : 307, { Location: location });
      res.end();
      return vres;
    },
  });
  return vres;
}

export function createHttpServer(): Server {
  return createServer(async (req, res) => {
    const method = req.method || 'GET';
    const url = req.url || '/';
    const path = url.split('?')[0];

    const route = matchRoute(path);
    if (!route) {
      return json(res, { error: 'not_found', detail: `No route for ${path}` }, 404);
    }

    log.debug(`${method} ${path}`);

    let body: unknown;
    try {
      body = method === 'GET' || method === 'OPTIONS' ? undefined : await parseBody(req);
    } catch {
      return json(res, { error: 'bad_request', detail: 'Request body is not valid JSON' }, 400);
    }

    const query = { ...parseQuery(url), ...route.params };
    try {
      await route.handler(toVercelRequest(req, query, body), toVercelResponse(res));
    } catch (error) {
      log.error(`${method} ${path} escaped its handler:`, error);
      if (!res.headersSent) json(res, { error: 'internal_error', detail: 'Internal server error' }, 500);
      else res.end();
    }
  });
}
