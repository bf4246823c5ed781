#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerLayoutTool } from './tools/layout.js';
import { registerEditTool } from './tools/edit.js';

const server = new McpServer({
  name: 'layout-mcp-server',
  version: '1.0.0',
});

registerLayoutTool(server);
registerEditTool(server);

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('Layout MCP Server running on stdio');
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
