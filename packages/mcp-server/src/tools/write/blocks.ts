/**
 * Block editing tools
 * Tools: update_block, insert_block, remove_block, reparse_blocks,
 *        redetect_block, patch_block_metadata
 *
 * Edits change the open note only; save_note writes it back.
 */

import { z } from 'zod';
import { MARKDOWN, parseSyntaxKey, syntaxKey, type SyntaxKind } from '@hybridnote/core';
import type { McpServer, RegisteredTool } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../../core/context.js';
import { blockView, type BlockView } from '../../core/read/blockView.js';
import { preview } from '../../core/write/constants.js';
import { successResult, withOpenNote } from '../../core/write/mutation-helpers.js';

/**
 * @throws Error for a key that names no syntax
 */
function requireSyntax(key: string): SyntaxKind {
  const syntax = parseSyntaxKey(key.trim());
  if (!syntax) {
    throw new Error(`Unknown syntax: ${key} (expected markdown, org, latex, code:<language> or custom:<name>)`);
  }
  return syntax;
}

export function registerBlockTools(server: McpServer, context: ServerContext): Record<string, RegisteredTool> {
  const { workspace } = context;

  const update_block = server.registerTool(
    'update_block',
    {
      title: 'Update Block',
      description:
        'Replace the raw text of one block. Later blocks shift by the change in line count. The block is reparsed unless reparse is false; an edit that changes the block\'s syntax or splits it needs redetect_block instead.',
      inputSchema: {
        path: z.string().describe('Vault-relative note path'),
        index: z.number().int().min(0).describe('0-based block index'),
        text: z.string().describe('New raw text for the block'),
        reparse: z.boolean().optional().describe('Reparse the block now (default: true)'),
      },
    },
    async ({ path, index, text, reparse }) => {
      return withOpenNote(workspace, path, 'update block', (open) => {
        open.manager.updateBlockText(index, text);
        const block = reparse === false ? open.manager.block(index) : open.manager.reparseBlock(index);
        open.edited = true;

        return successResult(path, `Updated block ${index}`, {
          preview: preview(block.rawText),
          unsaved: true,
          block: blockView(block, index, { lineOffset: open.lineOffset }),
        });
      });
    }
  );

  const insert_block = server.registerTool(
    'insert_block',
    {
      title: 'Insert Block',
      description:
        'Insert a new block before the block at index (index = block count appends). Without syntax, the text is run through block detection; text holding several blocks is split into them.',
      inputSchema: {
        path: z.string().describe('Vault-relative note path'),
        index: z.number().int().min(0).describe('Insert position (0..block count)'),
        text: z.string().describe('Raw text of the new block'),
        syntax: z.string().optional().describe('Syntax key: markdown, org, latex, code:<language>, custom:<name>'),
      },
    },
    async ({ path, index, text, syntax }) => {
      return withOpenNote(workspace, path, 'insert block', (open) => {
        const { manager } = open;
        let inserted = 1;

        if (syntax !== undefined) {
          manager.insertBlock(index, requireSyntax(syntax), text);
        } else {
          const segments = manager.detector.scan(text);
          const detected = segments[0]?.syntax ?? MARKDOWN;
          manager.insertBlock(index, detected, text);
          if (segments.length > 1) {
            inserted = manager.redetectBlock(index);
          }
        }
        open.edited = true;

        const blocks: BlockView[] = [];
        for (let i = index; i < index + inserted; i++) {
          blocks.push(blockView(manager.block(i), i, { lineOffset: open.lineOffset }));
        }
        return successResult(path, `Inserted ${inserted} block${inserted === 1 ? '' : 's'} at ${index}`, {
          preview: preview(text),
          unsaved: true,
          blockCount: manager.blockCount,
          blocks,
        });
      });
    }
  );

  const remove_block = server.registerTool(
    'remove_block',
    {
      title: 'Remove Block',
      description: 'Remove one block; later blocks shift up by its line count.',
      inputSchema: {
        path: z.string().describe('Vault-relative note path'),
        index: z.number().int().min(0).describe('0-based block index'),
      },
    },
    async ({ path, index }) => {
      return withOpenNote(workspace, path, 'remove block', (open) => {
        const removed = open.manager.removeBlock(index);
        open.edited = true;

        return successResult(path, `Removed block ${index}`, {
          preview: preview(removed.rawText),
          unsaved: true,
          syntax: syntaxKey(removed.syntax),
          blockCount: open.manager.blockCount,
        });
      });
    }
  );

  const reparse_blocks = server.registerTool(
    'reparse_blocks',
    {
      title: 'Reparse Blocks',
      description:
        'Reparse one block, or every dirty block when index is omitted, refreshing its AST and metadata from its raw text. Parse failures are reported per block.',
      inputSchema: {
        path: z.string().describe('Vault-relative note path'),
        index: z.number().int().min(0).optional().describe('0-based block index; omit for all dirty blocks'),
      },
    },
    async ({ path, index }) => {
      return withOpenNote(workspace, path, 'reparse blocks', (open) => {
        const { manager } = open;
        const reparsed = index !== undefined ? [index] : manager.reparseDirty();
        if (index !== undefined) {
          manager.reparseBlock(index);
        }

        const failures = reparsed
          .map(i => ({ index: i, block: manager.block(i) }))
          .filter(({ block }) => block.parseError !== null)
          .map(({ index: i, block }) => ({ index: i, message: block.parseError?.message ?? '' }));

        return successResult(path, `Reparsed ${reparsed.length} blocks, ${failures.length} failed`, {
          reparsed,
          failures,
        });
      });
    }
  );

  const redetect_block = server.registerTool(
    'redetect_block',
    {
      title: 'Redetect Block',
      description:
        'Run block detection over one block\'s text and replace it with the blocks found, for edits that changed its syntax or added a fence or math delimiters.',
      inputSchema: {
        path: z.string().describe('Vault-relative note path'),
        index: z.number().int().min(0).describe('0-based block index'),
      },
    },
    async ({ path, index }) => {
      return withOpenNote(workspace, path, 'redetect block', (open) => {
        const { manager } = open;
        const count = manager.redetectBlock(index);
        open.edited = true;

        const blocks: BlockView[] = [];
        for (let i = index; i < index + count; i++) {
          blocks.push(blockView(manager.block(i), i, { lineOffset: open.lineOffset }));
        }
        return successResult(path, `Block ${index} became ${count} block${count === 1 ? '' : 's'}`, {
          unsaved: true,
          blockCount: manager.blockCount,
          blocks,
        });
      });
    }
  );

  const patch_block_metadata = server.registerTool(
    'patch_block_metadata',
    {
      title: 'Patch Block Metadata',
      description:
        'Set or clear metadata fields of a block (null clears). Metadata is derived from text, so the block becomes dirty and the next reparse recomputes it; the saved text does not change.',
      inputSchema: {
        path: z.string().describe('Vault-relative note path'),
        index: z.number().int().min(0).describe('0-based block index'),
        heading_level: z.number().int().min(1).nullable().optional(),
        id: z.string().nullable().optional(),
        todo_state: z.string().nullable().optional(),
        properties: z.record(z.string().nullable()).optional().describe('Property values; null removes a property'),
      },
    },
    async ({ path, index, heading_level, id, todo_state, properties }) => {
      return withOpenNote(workspace, path, 'patch block metadata', (open) => {
        const block = open.manager.patchMetadata(index, {
          headingLevel: heading_level,
          id,
          todoState: todo_state,
          properties,
        });

        return successResult(path, `Patched metadata of block ${index}`, {
          block: blockView(block, index, { lineOffset: open.lineOffset }),
        });
      });
    }
  );

  return { update_block, insert_block, remove_block, reparse_blocks, redetect_block, patch_block_metadata };
}
