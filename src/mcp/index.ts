#!/usr/bin/env node
/**
 * sopgen MCP Server - Entry Point
 *
 * Headless Node.js process communicating over stdio using JSON-RPC 2.0.
 * stdout is reserved for MCP protocol; all logging goes to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadDotenv } from '../main/config.js';
import { errorMessage } from '../main/errors.js';
import { createLogger } from '../main/utils/logger.js';
import { readPackageVersion } from '../shared/version.js';
import { createServer } from './server.js';

const log = createLogger('mcp');

// dotenv writes nothing to stdout unless debug is on
loadDotenv();

const VERSION = readPackageVersion();
log.info(`sopgen MCP server v${VERSION} starting...`);

process.on('uncaughtException', (error) => {
  log.error(`Uncaught exception: ${errorMessage(error)}`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  log.error(`Unhandled rejection: ${errorMessage(reason)}`);
  process.exit(1);
});

try {
  const server = createServer(VERSION);
  const transport = new StdioServerTransport();
  await server.connect(transport);
} catch (error) {
  log.error(`Failed to start MCP server: ${errorMessage(error)}`);
  process.exit(1);
}
