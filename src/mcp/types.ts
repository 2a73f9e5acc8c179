/**
 * MCP-specific helpers for the sopgen MCP server.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

/** The part of the server a tool module needs to register itself. */
export type ToolRegistrar = Pick<McpServer, 'tool'>;

export function textResult(text: string, isError = false): CallToolResult {
  return isError
    ? { content: [{ type: 'text', text }], isError: true }
    : { content: [{ type: 'text', text }] };
}

export function errorResult(message: string): CallToolResult {
  return textResult(`Error: ${message}`, true);
}
