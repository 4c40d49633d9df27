import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SyncRequestSchema, syncBeads } from '../src/beads-sync.js';
import { apiKeySession, createMcpServer, TOOL_NAMES } from '../src/tools/index.js';
import { createTestEnv, initAgent, type Agent, type TestEnv } from './helpers.js';

function parseToolText(result: { content?: unknown }): unknown {
  const content = result.content;
  if (!Array.isArray(content)) throw new Error('Tool result has no content');
  const first: unknown = content[0];
  if (typeof first !== 'object' || first === null || !('text' in first) || typeof first.text !== 'string') {
    throw new Error('Tool result is not text');
  }
  return JSON.parse(first.text);
}

describe('MCP tools', () => {
  let env: TestEnv;
  let agent: Agent;
  let client: Client;

  async function connect(apiKey: string | null): Promise<Client> {
    const server = createMcpServer(apiKeySession(env.ctx, apiKey));
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    const connected = new Client({ name: 'test-client', version: '0.0.0' });
    await connected.connect(clientTransport);
    return connected;
  }

  beforeEach(async () => {
    env = await createTestEnv();
    agent = await initAgent(env.ctx, { alias: 'alice' });
    client = await connect(agent.init.api_key);
  });

  afterEach(async () => {
    await client.close();
    await env.close();
  });

  it('lists every coordination tool', async () => {
    const { tools } = await client.listTools();
    expect(tools.map(tool => tool.name).sort()).toEqual([...TOOL_NAMES].sort());
  });

  it('reports status and ready work for the key holder', async () => {
    await syncBeads(env.ctx, agent.identity, SyncRequestSchema.parse({
      workspace_id: agent.workspaceId,
      issues: [{ id: 'bd-1', status: 'open', priority: 2 }, { id: 'bd-2', status: 'open', priority: 1 }],
    }));

    const status = await client.callTool({ name: 'status', arguments: {} });
    expect(parseToolText(status)).toMatchObject({ project: { slug: 'demo' }, policy_version: 1 });

    const ready = await client.callTool({ name: 'get_ready_issues', arguments: { limit: 1 } });
    expect(parseToolText(ready)).toMatchObject({ count: 1, issues: [{ bead_id: 'bd-2' }] });
  });

  it('escalates as the key holder and reads the escalation back', async () => {
    const created = parseToolText(await client.callTool({
      name: 'escalate',
      arguments: { subject: 'Freeze?', situation: 'Release train is blocked.' },
    }));
    expect(created).toMatchObject({ status: 'pending' });
    if (typeof created !== 'object' || created === null || !('escalation_id' in created)) throw new Error('no escalation id');

    const fetched = await client.callTool({ name: 'get_escalation', arguments: { escalation_id: created.escalation_id } });
    expect(parseToolText(fetched)).toMatchObject({ alias: 'alice', subject: 'Freeze?', status: 'pending' });
  });

  it('manages subscriptions for the key holder', async () => {
    const subscribed = parseToolText(await client.callTool({ name: 'subscribe_to_bead', arguments: { bead_id: 'api-*' } }));
    expect(subscribed).toMatchObject({ bead_id: 'api-*', alias: 'alice', created: true });

    const listed = await client.callTool({ name: 'list_subscriptions', arguments: {} });
    expect(parseToolText(listed)).toMatchObject({ subscriptions: [{ bead_id: 'api-*' }] });

    const missing = await client.callTool({ name: 'unsubscribe', arguments: { subscription_id: 'nope' } });
    expect(missing.isError).toBe(true);
    expect(parseToolText(missing)).toEqual({ error: 'not_found', detail: 'Subscription nope not found' });
  });

  it('registers the key holder as an agent', async () => {
    const updated = await client.callTool({
      name: 'register_agent',
      arguments: { alias: 'alice', role: '  Code   Reviewer ', hostname: 'devbox' },
    });
    expect(parseToolText(updated)).toMatchObject({
      created: false,
      workspace: { workspace_id: agent.workspaceId, alias: 'alice', role: 'code reviewer', hostname: 'devbox' },
    });

    const renamed = await client.callTool({ name: 'register_agent', arguments: { alias: 'alicia' } });
    expect(renamed.isError).toBe(true);
    expect(parseToolText(renamed)).toEqual({ error: 'conflict', detail: "Workspace is registered as 'alice'", alias: 'alice' });
  });

  it('returns coordination errors as tool errors', async () => {
    const result = await client.callTool({ name: 'get_issue', arguments: { bead_id: 'bd-404' } });
    expect(result.isError).toBe(true);
    expect(parseToolText(result)).toEqual({ error: 'not_found', detail: 'Bead bd-404 not found', bead_id: 'bd-404' });
  });

  it('answers unauthenticated without an API key', async () => {
    const anonymous = await connect(null);
    const result = await anonymous.callTool({ name: 'status', arguments: {} });
    expect(result.isError).toBe(true);
    expect(parseToolText(result)).toEqual({ error: 'unauthenticated', detail: 'BDH_API_KEY is not set' });
    await anonymous.close();
  });
});
