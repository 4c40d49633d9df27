/**
 * Subscription Tools - mail when beads change
 *
 * Tools: subscribe_to_bead, list_subscriptions, unsubscribe
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { NotFoundError } from '../errors.js';
import { listSubscriptions, subscribe, SubscribeSchema, unsubscribe } from '../subscriptions.js';
import { isUuid } from '../validation.js';
import { requireActor, runTool, type ToolSession } from './session.js';

export function registerSubscriptionTools(server: McpServer, session: ToolSession) {
  server.tool(
    'subscribe_to_bead',
    'Get a mail whenever a bead changes status. bead_id may be a prefix ending in * (e.g. api-*).',
    {
      bead_id: z.string().describe('Bead id or prefix pattern'),
      repo: z.string().optional().describe('Only changes in this repo'),
    },
    async ({ bead_id, repo }) => runTool('subscribe_to_bead', async () => {
      const identity = await session.identity();
      const input = SubscribeSchema.parse({ workspace_id: requireActor(identity), bead_id, repo });
      return subscribe(session.ctx, identity, input);
    })
  );

  server.tool(
    'list_subscriptions',
    'Your bead subscriptions.',
    {},
    async () => runTool('list_subscriptions', async () => {
      const identity = await session.identity();
      return { subscriptions: await listSubscriptions(session.ctx, identity, requireActor(identity)) };
    })
  );

  server.tool(
    'unsubscribe',
    'Remove one of your subscriptions.',
    {
      subscription_id: z.string().describe('Id from list_subscriptions'),
    },
    async ({ subscription_id }) => runTool('unsubscribe', async () => {
      if (!isUuid(subscription_id)) throw new NotFoundError(`Subscription ${subscription_id} not found`);
      return unsubscribe(session.ctx, await session.identity(), subscription_id);
    })
  );
}
