/**
 * Escalation Tools - ask a human
 *
 * Tools: escalate, get_escalation
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { createEscalation, CreateEscalationSchema, getEscalation } from '../escalations.js';
import { requireActor, runTool, type ToolSession } from './session.js';

export function registerEscalationTools(server: McpServer, session: ToolSession) {
  server.tool(
    'escalate',
    'Escalate a decision you cannot make to a human. The answer arrives by mail; poll with get_escalation.',
    {
      subject: z.string().describe('One-line summary'),
      situation: z.string().describe('What happened and what you need decided'),
      options: z.array(z.string()).optional().describe('Choices you see'),
      expires_in_hours: z.number().optional().describe('Expire if unanswered after this many hours'),
    },
    async (args) => runTool('escalate', async () => {
      const identity = await session.identity();
      const input = CreateEscalationSchema.parse({ ...args, workspace_id: requireActor(identity) });
      return createEscalation(session.ctx, identity, input);
    })
  );

  server.tool(
    'get_escalation',
    'Current state of an escalation, including the response once there is one.',
    {
      escalation_id: z.string().min(1).describe('Id returned by escalate'),
    },
    async ({ escalation_id }) => runTool('get_escalation', async () =>
      getEscalation(session.ctx, await session.identity(), escalation_id)
    )
  );
}
