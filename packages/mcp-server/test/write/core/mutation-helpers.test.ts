/**
 * Tests for tool result helpers
 */

import { describe, it, expect } from 'vitest';
import { createDefaultRegistry, IndexOutOfRangeError, UnterminatedBlockError } from '@hybridnote/core';
import { MemoryNotesRepository } from '../../../src/core/repo/memory.js';
import { Workspace } from '../../../src/core/workspace.js';
import { estimateTokens, preview } from '../../../src/core/write/constants.js';
import {
  errorResult,
  failureResult,
  formatMcpResult,
  successResult,
  withOpenNote,
} from '../../../src/core/write/mutation-helpers.js';
import type { MutationResult } from '../../../src/core/write/types.js';

function payload(response: { content: [{ type: 'text'; text: string }] }): MutationResult & Record<string, unknown> {
  return JSON.parse(response.content[0].text);
}

describe('result helpers', () => {
  it('should estimate tokens at four characters each', () => {
    expect(estimateTokens('abcde')).toBe(2);
    expect(estimateTokens({ a: 1 })).toBe(2);
  });

  it('should shorten long previews', () => {
    expect(preview('short')).toBe('short');
    expect(preview('x'.repeat(250))).toBe(`${'x'.repeat(200)}...`);
  });

  it('should build success results with tool fields', () => {
    const result = successResult('a.md', 'Done', { blockCount: 2 });

    expect(result).toMatchObject({ success: true, message: 'Done', path: 'a.md', blockCount: 2 });
    expect(result.tokensEstimate).toBeGreaterThan(0);
  });

  it('should build error results', () => {
    const result = errorResult('a.md', 'Nope', { errorCode: 'NOTE_NOT_FOUND' });

    expect(result).toMatchObject({ success: false, message: 'Nope', path: 'a.md', errorCode: 'NOTE_NOT_FOUND' });
  });

  it('should wrap results as MCP text content', () => {
    const response = formatMcpResult({ success: true, message: 'ok', path: 'a.md' });

    expect(response.content[0].type).toBe('text');
    expect(payload(response).tokensEstimate).toBeGreaterThan(0);
  });
});

describe('failureResult', () => {
  it('should carry the error code of domain errors', () => {
    const result = failureResult('a.md', 'remove block', new IndexOutOfRangeError(4, 2));

    expect(result.message).toBe('Failed to remove block: Block index 4 out of range (0..2)');
    expect(result.errorCode).toBe('INDEX_OUT_OF_RANGE');
    expect(result.diagnostic).toBeUndefined();
  });

  it('should add a diagnostic for unterminated blocks', () => {
    const result = failureResult('a.md', 'parse note', new UnterminatedBlockError(2, '$$'));

    expect(result.diagnostic).toEqual({ openedAt: 2, expected: '$$' });
    expect(result.errorCode).toBe('UNTERMINATED_BLOCK');
  });

  it('should leave foreign errors without a code', () => {
    const result = failureResult('a.md', 'save note', new TypeError('disk full'));

    expect(result.message).toBe('Failed to save note: disk full');
    expect(result.errorCode).toBeUndefined();
  });
});

describe('withOpenNote', () => {
  const workspace = new Workspace(new MemoryNotesRepository({ 'a.md': 'Hello\n' }), createDefaultRegistry());

  it('should run the operation on the opened note', async () => {
    const response = await withOpenNote(workspace, 'a.md', 'count blocks', (open) =>
      successResult('a.md', 'Counted', { blockCount: open.manager.blockCount })
    );

    expect(payload(response)).toMatchObject({ success: true, blockCount: 1 });
  });

  it('should turn thrown errors into failed results', async () => {
    const missing = await withOpenNote(workspace, 'b.md', 'read note', () => successResult('b.md', 'unreachable', {}));
    expect(payload(missing)).toMatchObject({
      success: false,
      message: 'Failed to read note: Note not found: b.md',
      errorCode: 'NOTE_NOT_FOUND',
    });

    const outOfRange = await withOpenNote(workspace, 'a.md', 'read block', (open) => {
      open.manager.block(3);
      return successResult('a.md', 'unreachable', {});
    });
    expect(payload(outOfRange)).toMatchObject({
      success: false,
      message: 'Failed to read block: Block index 3 out of range (0..1)',
      errorCode: 'INDEX_OUT_OF_RANGE',
    });
  });
});
