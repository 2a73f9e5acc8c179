/**
 * MCP Server Factory
 *
 * Creates and configures the sopgen MCP server with all tool registrations
 * wired in.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

// Tool registrations
import { register as registerGenerateSop } from './tools/generateSop.js';
import { register as registerListModels } from './tools/listModels.js';
import { register as registerExportSop } from './tools/exportSop.js';

export const SERVER_NAME = 'sopgen';

export function createServer(version = '0.0.0-dev'): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version,
  });

  registerGenerateSop(server);
  registerListModels(server);
  registerExportSop(server);

  return server;
}
