/**
 * Tool Registration Index
 *
 * Each module registers its tools with the server.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerCoordinationTools } from './coordination.js';
import { registerEscalationTools } from './escalations.js';
import { registerSubscriptionTools } from './subscriptions.js';
import { registerWorkspaceTools } from './workspaces.js';
import type { ToolSession } from './session.js';

export { registerCoordinationTools } from './coordination.js';
export { registerEscalationTools } from './escalations.js';
export { registerSubscriptionTools } from './subscriptions.js';
export { registerWorkspaceTools } from './workspaces.js';
export { apiKeySession, type ToolSession } from './session.js';

export const TOOL_NAMES = [
  'status',
  'list_workspaces',
  'get_ready_issues',
  'get_issue',
  'subscribe_to_bead',
  'list_subscriptions',
  'unsubscribe',
  'escalate',
  'get_escalation',
  'register_agent',
] as const;

export function createMcpServer(session: ToolSession, version = '0.1.0'): McpServer {
  const server = new McpServer({ name: 'bdh-coordinator', version });
  registerCoordinationTools(server, session);   // status, list_workspaces, get_ready_issues, get_issue
  registerSubscriptionTools(server, session);   // subscribe_to_bead, list_subscriptions, unsubscribe
  registerEscalationTools(server, session);     // escalate, get_escalation
  registerWorkspaceTools(server, session);      // register_agent
  return server;
}
