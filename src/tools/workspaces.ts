/**
 * Workspace Tools - who is this session
 *
 * Tools: register_agent
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { registerWorkspace, RegisterWorkspaceSchema } from '../workspaces.js';
import { requireActor, runTool, type ToolSession } from './session.js';

export function registerWorkspaceTools(server: McpServer, session: ToolSession) {
  server.tool(
    'register_agent',
    'Register or update the workspace bound to your API key. Alias and repo are fixed once set; role and host details may change.',
    {
      alias: z.string().describe('Workspace alias, e.g. alice'),
      repo_origin: z.string().optional().describe('Git remote of the repo this workspace works in'),
      role: z.string().optional().describe('Short role, e.g. reviewer'),
      human_name: z.string().optional().describe('Name of the person behind the agent'),
      hostname: z.string().optional(),
      workspace_path: z.string().optional().describe('Checkout path on the host'),
    },
    async (args) => runTool('register_agent', async () => {
      const identity = await session.identity();
      const input = RegisterWorkspaceSchema.parse({ ...args, workspace_id: requireActor(identity) });
      return registerWorkspace(session.ctx, identity, input);
    })
  );
}
