import type { Server } from 'http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { signProxyHeader } from '../src/auth.js';
import { setAppContext } from '../src/context.js';
import { createHttpServer } from '../src/http-server.js';
import { createTestEnv, initAgent, REPO, REPO_URL, type TestEnv } from './helpers.js';

describe('HTTP API', () => {
  let env: TestEnv;
  let server: Server;
  let baseUrl: string;
  let apiKey: string;
  let workspaceId: string;

  const call = (path: string, init: RequestInit = {}, key: string | null = apiKey) =>
    fetch(`${baseUrl}${path}`, {
      ...init,
      headers: {
        'Content-Type': 'application/json',
        ...(key ? { Authorization: `Bearer ${key}` } : {}),
        ...init.headers,
      },
    });

  beforeAll(async () => {
    env = await createTestEnv({
      settings: { internalAuthSecret: 'test-secret', initRateLimit: { limit: 3, windowSeconds: 60 } },
    });
    setAppContext(env.ctx);
    server = createHttpServer();
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Server is not listening on a TCP port');
    baseUrl = `http://127.0.0.1:${address.port}`;

    const res = await call('/v1/init', {
      method: 'POST',
      body: JSON.stringify({ project_slug: 'demo', repo_origin: REPO_URL, alias: 'alice' }),
    }, null);
    const body: { api_key: string; workspace_id: string } = await res.json();
    apiKey = body.api_key;
    workspaceId = body.workspace_id;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    setAppContext(null);
    await env.close();
  });

  it('answers health checks', async () => {
    const basic = await call('/v1/health', {}, null);
    expect(basic.status).toBe(200);
    expect(await basic.json()).toMatchObject({ status: 'ok', version: '0.1.0' });

    const detailed = await call('/v1/health?detailed=true', {}, null);
    expect(await detailed.json()).toMatchObject({
      database: { status: 'connected' },
      cache: { status: 'connected', backend: 'memory' },
    });
  });

  it('requires credentials', async () => {
    const res = await call('/v1/status', {}, null);
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: 'unauthenticated', detail: 'Authentication required' });
  });

  it('serves the status snapshot', async () => {
    const res = await call('/v1/status');
    expect(res.status).toBe(200);
    expect(res.headers.get('cache-control')).toBe('no-store');
    expect(await res.json()).toMatchObject({ project: { slug: 'demo' }, policy_version: 1, escalations_pending: 0 });
  });

  it('syncs beads and reports claims', async () => {
    const sync = await call('/v1/bdh/sync', {
      method: 'POST',
      body: JSON.stringify({ workspace_id: workspaceId, issues: [{ id: 'bd-1', status: 'in_progress' }] }),
    });
    expect(sync.status).toBe(200);
    expect(await sync.json()).toMatchObject({ repo: REPO, claim_changes: [{ bead_id: 'bd-1', action: 'acquired' }] });

    const claims = await call(`/v1/claims?workspace_id=${workspaceId}`);
    expect(await claims.json()).toMatchObject({ claims: [{ bead_id: 'bd-1', alias: 'alice' }] });

    const bead = await call('/v1/beads/bd-1');
    expect(await bead.json()).toMatchObject({ bead_id: 'bd-1', status: 'in_progress', claims: [{ alias: 'alice' }] });
  });

  it('honors If-None-Match on the active policy', async () => {
    const first = await call('/v1/policies/active?role=developer&only_selected=true');
    expect(first.status).toBe(200);
    const etag = first.headers.get('etag');
    expect(etag).toMatch(/^"[0-9a-f]{32}"$/);
    expect(await first.json()).toMatchObject({ version: 1, selected_role: { role: 'developer' } });

    const second = await call('/v1/policies/active?role=developer&only_selected=true', {
      headers: { 'If-None-Match': etag ?? '' },
    });
    expect(second.status).toBe(304);
  });

  it('maps failures to status codes and error bodies', async () => {
    const missing = await call('/v1/nowhere');
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: 'not_found', detail: 'No route for /v1/nowhere' });

    const badJson = await call('/v1/init', { method: 'POST', body: '{not json' }, null);
    expect(badJson.status).toBe(400);
    expect(await badJson.json()).toEqual({ error: 'bad_request', detail: 'Request body is not valid JSON' });

    const badStatus = await call('/v1/escalations?status=open');
    expect(badStatus.status).toBe(422);
    expect(await badStatus.json()).toEqual({
      error: 'validation_error',
      detail: 'Invalid status: must be one of pending, responded, expired',
    });

    const badClaims = await call('/v1/claims?workspace_id=nope');
    expect(badClaims.status).toBe(422);

    const wrongMethod = await call('/v1/init', { method: 'DELETE' }, null);
    expect(wrongMethod.status).toBe(405);
    expect(await wrongMethod.json()).toEqual({ error: 'method_not_allowed', detail: 'Method DELETE not allowed' });

    const unknownBead = await call('/v1/beads/bd-404');
    expect(unknownBead.status).toBe(404);
    expect(await unknownBead.json()).toEqual({ error: 'not_found', detail: 'Bead bd-404 not found', bead_id: 'bd-404' });
  });

  it('rejects writes for another workspace', async () => {
    const res = await call('/v1/escalations', {
      method: 'POST',
      body: JSON.stringify({ workspace_id: '00000000-0000-4000-8000-000000000001', subject: 'x', situation: 'y' }),
    });
    expect(res.status).toBe(403);
    expect(await res.json()).toMatchObject({ error: 'forbidden', workspace_id: '00000000-0000-4000-8000-000000000001' });
  });

  it('registers and looks up repos', async () => {
    const lookup = await call('/v1/repos/lookup', { method: 'POST', body: JSON.stringify({ origin_url: REPO_URL }) }, null);
    expect(lookup.status).toBe(200);
    expect(await lookup.json()).toMatchObject({ project_slug: 'demo', canonical_origin: REPO, name: 'widgets' });

    const ensured = await call('/v1/repos/ensure', {
      method: 'POST',
      body: JSON.stringify({ origin_url: 'https://github.com/acme/gadgets.git' }),
    });
    expect(await ensured.json()).toMatchObject({ canonical_origin: 'github.com/acme/gadgets', created: true });

    const listed = await call('/v1/repos');
    expect(await listed.json()).toMatchObject({
      repos: [
        { canonical_origin: REPO, workspace_count: 1 },
        { canonical_origin: 'github.com/acme/gadgets', workspace_count: 0 },
      ],
      has_more: false,
    });

    const badId = await call('/v1/repos/nope', { method: 'DELETE' });
    expect(badId.status).toBe(422);
  });

  it('limits init calls per client address', async () => {
    env.clock.advance(61_000);
    for (let i = 0; i < 3; i++) {
      const res = await call('/v1/init', { method: 'POST', body: '{}' }, null);
      expect(res.status).toBe(422);
    }

    const limited = await call('/v1/init', { method: 'POST', body: '{}' }, null);
    expect(limited.status).toBe(429);
    expect(limited.headers.get('retry-after')).toBe('60');
    expect(await limited.json()).toEqual({
      error: 'rate_limited',
      detail: 'Rate limit exceeded. Try again in 60s.',
      retry_after: 60,
    });
  });

  it('keeps the notification outbox from public readers', async () => {
    const open = await initAgent(env.ctx, {
      project_slug: 'open-source',
      visibility: 'public',
      repo_origin: 'https://github.com/acme/open.git',
    });
    const headers = {
      'X-BH-Auth': signProxyHeader('test-secret', { projectId: open.projectId, type: 'p', principalId: '', actorId: '' }),
      'X-Project-ID': open.projectId,
    };

    const status = await call('/v1/status', { headers }, null);
    expect(status.status).toBe(200);

    const outbox = await call('/v1/notifications/outbox', { headers }, null);
    expect(outbox.status).toBe(403);
    expect(await outbox.json()).toEqual({ error: 'forbidden', detail: 'Public readers cannot view operator data' });
  });

  it('answers CORS preflight', async () => {
    const res = await call('/v1/status', { method: 'OPTIONS' }, null);
    expect(res.status).toBe(200);
    expect(res.headers.get('access-control-allow-methods')).toBe('GET, OPTIONS');
    expect(res.headers.get('access-control-expose-headers')).toBe('ETag');
  });
});
