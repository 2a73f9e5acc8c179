/**
 * Helpers for driving MCP tool handlers without a server.
 */

import { vi } from 'vitest';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

export type ToolHandler = (args: Record<string, unknown>) => Promise<CallToolResult>;

/**
 * A stand-in for McpServer that records every tool registration.
 */
export function createToolRecorder() {
  const tool = vi.fn();
  return {
    server: { tool },
    /** The callback passed with the most recent registration */
    handler(): ToolHandler {
      const call = tool.mock.calls[tool.mock.calls.length - 1];
      return call[call.length - 1];
    },
  };
}

export function resultText(result: CallToolResult): string {
  const [first] = result.content;
  return first?.type === 'text' ? first.text : '';
}
