/**
 * Shared helpers for note tools
 * Opening notes, error mapping and result formatting
 */

import { HybridNoteError, UnterminatedBlockError } from '@hybridnote/core';
import { VaultError } from '../errors.js';
import { serverLog } from '../shared/serverLog.js';
import type { OpenNote, Workspace } from '../workspace.js';
import { estimateTokens } from './constants.js';
import type { MutationResult } from './types.js';

/**
 * MCP response format
 */
export type McpResponse = { content: [{ type: 'text'; text: string }] };

/**
 * Format a MutationResult as an MCP response
 */
export function formatMcpResult(result: MutationResult): McpResponse {
  if (result.tokensEstimate === undefined || result.tokensEstimate === 0) {
    result.tokensEstimate = estimateTokens(result);
  }
  return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
}

/**
 * Create an error MutationResult
 */
export function errorResult(
  notePath: string,
  message: string,
  extras?: Partial<MutationResult>
): MutationResult {
  const result: MutationResult = {
    success: false,
    message,
    path: notePath,
    tokensEstimate: 0,
    ...extras,
  };
  result.tokensEstimate = estimateTokens(result);
  return result;
}

/**
 * Create a success MutationResult carrying tool-specific fields
 */
export function successResult<T extends object>(
  notePath: string,
  message: string,
  extras: T
): MutationResult & T {
  const result: MutationResult & T = {
    success: true,
    message,
    path: notePath,
    tokensEstimate: 0,
    ...extras,
  };
  result.tokensEstimate = estimateTokens(result);
  return result;
}

/** Error code carried by a domain error, if any */
export function errorCodeOf(error: unknown): string | undefined {
  if (error instanceof HybridNoteError || error instanceof VaultError) {
    return error.code;
  }
  return undefined;
}

/**
 * Map a thrown error onto a failed result
 */
export function failureResult(notePath: string, actionDescription: string, error: unknown): MutationResult {
  const message = error instanceof Error ? error.message : String(error);
  const errorCode = errorCodeOf(error);
  const diagnostic = error instanceof UnterminatedBlockError
    ? { openedAt: error.openedAt, expected: error.expected }
    : undefined;

  return errorResult(notePath, `Failed to ${actionDescription}: ${message}`, {
    ...(errorCode ? { errorCode } : {}),
    ...(diagnostic ? { diagnostic } : {}),
  });
}

/**
 * Higher-order function for tools that act on one note
 *
 * Opens the note (parsing it on first use), runs the operation and formats
 * the result. Domain errors become `success: false` results, never thrown
 * protocol errors.
 *
 * @example
 * ```typescript
 * return withOpenNote(workspace, path, 'remove block', (open) => {
 *   const removed = open.manager.removeBlock(index);
 *   return successResult(path, `Removed block ${index}`, { syntax: syntaxKey(removed.syntax) });
 * });
 * ```
 */
export async function withOpenNote(
  workspace: Workspace,
  notePath: string,
  actionDescription: string,
  operation: (open: OpenNote) => MutationResult | Promise<MutationResult>,
  options: { reload?: boolean } = {}
): Promise<McpResponse> {
  try {
    const open = await workspace.open(notePath, options);
    const result = await operation(open);
    return formatMcpResult(result);
  } catch (error) {
    const result = failureResult(notePath, actionDescription, error);
    serverLog('tools', result.message, error instanceof HybridNoteError || error instanceof VaultError ? 'info' : 'error');
    return formatMcpResult(result);
  }
}
