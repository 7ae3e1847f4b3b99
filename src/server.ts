import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerConfig } from './config';
import { FontResolver } from './services/font-resolver';
import { registerAllTools } from './tools';

export function createServer(config: ServerConfig): McpServer {
  const server = new McpServer({
    name: 'Hershey-Text',
    version: '1.0.0',
  });

  registerAllTools(server, { config, fonts: new FontResolver(config) });

  return server;
}
