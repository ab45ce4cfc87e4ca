/**
 * MCP Utility Functions
 *
 * Shared helpers for MCP server responses
 */

import { isGraphError, sanitizeError } from './errors.js';

export type McpToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: true;
};

/**
 * Create a successful MCP response
 */
export function createMcpResponse(data: unknown): McpToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(data, null, 2) }],
  };
}

/**
 * Create an MCP error response. Graph errors keep their code in the text.
 */
export function createMcpErrorResponse(error: unknown): McpToolResponse & { isError: true } {
  const message = sanitizeError(error);
  const prefix = isGraphError(error) ? `Error [${error.code}]` : 'Error';
  return {
    content: [{ type: 'text', text: `${prefix}: ${message}` }],
    isError: true,
  };
}

/**
 * Get current ISO timestamp
 */
export function now(): string {
  return new Date().toISOString();
}
