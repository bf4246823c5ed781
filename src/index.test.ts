import { describe, it, expect } from 'vitest';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerLayoutTool } from './tools/layout.js';
import { registerEditTool } from './tools/edit.js';

describe('LayoutMCPServer', () => {
  it('should instantiate McpServer without errors', () => {
    const server = new McpServer({
      name: 'layout-mcp-server',
      version: '1.0.0',
    });

    expect(server).toBeDefined();
    expect(server).toBeInstanceOf(McpServer);
  });

  it('should register the layout and edit tools', () => {
    const server = new McpServer({
      name: 'layout-mcp-server',
      version: '1.0.0',
    });

    expect(() => {
      registerLayoutTool(server);
      registerEditTool(server);
    }).not.toThrow();
  });

  it('should refuse to register the same tool twice', () => {
    const server = new McpServer({
      name: 'layout-mcp-server',
      version: '1.0.0',
    });

    registerLayoutTool(server);
    expect(() => registerLayoutTool(server)).toThrow();
  });
});
