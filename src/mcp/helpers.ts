/**
 * MCP response helpers.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { Toolkit } from '../toolkit.js';
import type { RetryOptions } from '../retry/RetryPolicy.js';
import { withRetry } from '../retry/RetryPolicy.js';
import { isErrorResult } from '../types/results.js';

/**
 * Create a text content result.
 */
export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

/**
 * Create a JSON content result.
 */
export function jsonResult(data: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

/**
 * Create an error result.
 */
export function errorResult(message: string): CallToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

/**
 * Map a client outcome onto a tool result; error objects keep their JSON shape.
 */
export function outcomeResult(outcome: { success: boolean }): CallToolResult {
  if (isErrorResult(outcome)) {
    return errorResult(JSON.stringify(outcome, null, 2));
  }
  return jsonResult(outcome);
}

/**
 * The configured retry policy, with retries logged to stderr.
 */
export function retryOptions(toolkit: Toolkit): RetryOptions {
  return {
    ...toolkit.config.retry,
    onRetry: ({ attempt, delayMs, policy }) => {
      console.error(`[mcp] attempt ${attempt} failed (${policy.failureCode}); retrying in ${delayMs}ms`);
    },
  };
}

/**
 * Run a client operation under the configured retry policy.
 */
export async function callClient<T extends { success: boolean }>(
  toolkit: Toolkit,
  operation: () => Promise<T>
): Promise<CallToolResult> {
  return outcomeResult(await withRetry(operation, retryOptions(toolkit)));
}
