/**
 * Coordination Tools - what is going on in the project
 *
 * Tools: status, list_workspaces, get_ready_issues, get_issue
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { getBead, readyBeads } from '../beads.js';
import { snapshot } from '../status.js';
import { listWorkspaces } from '../workspaces.js';
import { runTool, type ToolSession } from './session.js';

export function registerCoordinationTools(server: McpServer, session: ToolSession) {
  server.tool(
    'status',
    'Project snapshot: online workspaces, active claims, pending escalations, policy version. Call this first when starting a session.',
    {
      repo: z.string().optional().describe('Only workspaces in this canonical repo (e.g. github.com/org/repo)'),
      branch: z.string().optional().describe('Only workspaces on this branch (needs repo)'),
      alias: z.string().optional().describe('Only this workspace alias'),
    },
    async ({ repo, branch, alias }) => runTool('status', async () =>
      snapshot(session.ctx, await session.identity(), { repo, branch, alias })
    )
  );

  server.tool(
    'list_workspaces',
    'List the live workspaces of the project, with online state from presence.',
    {
      repo: z.string().optional().describe('Filter by canonical repo'),
      alias: z.string().optional().describe('Filter by alias'),
    },
    async ({ repo, alias }) => runTool('list_workspaces', async () =>
      listWorkspaces(session.ctx, await session.identity(), { repo, alias })
    )
  );

  server.tool(
    'get_ready_issues',
    'Open beads whose blockers are all closed, highest priority first.',
    {
      repo: z.string().optional(),
      branch: z.string().optional(),
      limit: z.number().int().min(1).max(200).optional().describe('Max results (default 50)'),
    },
    async ({ repo, branch, limit }) => runTool('get_ready_issues', async () =>
      readyBeads(session.ctx, await session.identity(), { repo, branch }, limit)
    )
  );

  server.tool(
    'get_issue',
    'One bead with its current claims.',
    {
      bead_id: z.string().describe('Bead id, e.g. bd-42'),
      repo: z.string().optional(),
      branch: z.string().optional(),
    },
    async ({ bead_id, repo, branch }) => runTool('get_issue', async () =>
      getBead(session.ctx, await session.identity(), bead_id, { repo, branch })
    )
  );
}
