#!/usr/bin/env node
/**
 * docintel MCP Server
 *
 * Entry point for the MCP server using stdio transport. Exposes the query,
 * upload, sync, snapshot and field tools via JSON-RPC.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import dotenv from 'dotenv';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { createPlatformContext, type PlatformContext } from './services/platform/context.js';
import { createAllTools } from './tools/index.js';

dotenv.config();

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER INITIALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

const server = new McpServer({
  name: 'docintel-sync-mcp',
  version: '0.1.0',
});

let context: PlatformContext | null = null;

/**
 * Built on first use so the server starts (and lists its tools) before
 * credentials are configured
 */
function getContext(): PlatformContext {
  if (context === null) {
    context = createPlatformContext({ tag: 'docintel-mcp', verbose: process.env.DOCINTEL_VERBOSE === 'true' });
  }
  return context;
}

const tools = createAllTools(getContext);
for (const [name, tool] of Object.entries(tools)) {
  server.tool(name, tool.description, tool.inputSchema, tool.handler);
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STARTUP
// ═══════════════════════════════════════════════════════════════════════════════

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('docintel MCP Server running on stdio');
  console.error(`Tools registered: ${Object.keys(tools).length}`);
}

main().catch((error) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
