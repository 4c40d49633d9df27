#!/usr/bin/env node
/**
 * Coordination MCP Server
 *
 * Exposes project status, ready work, bead subscriptions and escalations
 * to an agent over stdio. Authenticates as the workspace behind BDH_API_KEY.
 *
 * Run with: npx bdh-coordinator-mcp
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { getAppContext } from './context.js';
import { apiKeySession, createMcpServer, TOOL_NAMES } from './tools/index.js';

const ctx = getAppContext();
if (!ctx.settings.apiKey) {
  console.error('[bdh-coordinator] BDH_API_KEY is not set; every tool will answer unauthenticated');
}

const server = createMcpServer(apiKeySession(ctx, ctx.settings.apiKey));

console.error('[bdh-coordinator] Starting...');

// ============================================================================
// Start Server
// ============================================================================

const transport = new StdioServerTransport();

server.connect(transport).then(() => {
  console.error('[bdh-coordinator] Server connected and ready');
  console.error(`[bdh-coordinator] Tools: ${TOOL_NAMES.length} (${TOOL_NAMES.join(', ')})`);
}).catch((err: Error) => {
  console.error('[bdh-coordinator] Failed to connect:', err);
  process.exit(1);
});
