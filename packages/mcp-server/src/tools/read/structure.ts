/**
 * Block structure tools
 * Tools: get_block, get_section_tree, get_parse_failures
 *
 * Answer: "What's inside this note?"
 */

import { z } from 'zod';
import { buildSectionTree } from '@hybridnote/core';
import type { McpServer, RegisteredTool } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../../core/context.js';
import { blockView, sectionView } from '../../core/read/blockView.js';
import { successResult, withOpenNote } from '../../core/write/mutation-helpers.js';

export function registerStructureTools(server: McpServer, context: ServerContext): Record<string, RegisteredTool> {
  const { workspace } = context;

  const get_block = server.registerTool(
    'get_block',
    {
      title: 'Get Block',
      description:
        'Get one block of a note by index, or the block covering a file line. Returns raw text, metadata and parse state; include_ast adds the parser\'s structured view.',
      inputSchema: {
        path: z.string().describe('Vault-relative note path'),
        index: z.number().int().min(0).optional().describe('0-based block index'),
        line: z.number().int().min(1).optional().describe('1-based file line; used when index is omitted'),
        include_ast: z.boolean().optional().describe('Include the parsed AST (default: false)'),
      },
    },
    async ({ path, index, line, include_ast }) => {
      return withOpenNote(workspace, path, 'get block', (open) => {
        const { manager, lineOffset } = open;
        let blockIndex = index;

        if (blockIndex === undefined) {
          if (line === undefined) {
            throw new Error('Provide index or line');
          }
          const found = manager.note.blockAtLine(line - lineOffset);
          if (!found) {
            throw new Error(`No block covers line ${line}`);
          }
          blockIndex = found.index;
        }

        const block = manager.block(blockIndex);
        return successResult(path, `Block ${blockIndex} (${block.lineRange.end - block.lineRange.start + 1} lines)`, {
          block: blockView(block, blockIndex, {
            lineOffset,
            includeText: true,
            includeAst: include_ast ?? false,
          }),
        });
      });
    }
  );

  const get_section_tree = server.registerTool(
    'get_section_tree',
    {
      title: 'Get Section Tree',
      description:
        'Get the heading hierarchy of a note: each Markdown or Org heading block with the block indices and file lines its section covers, nested by level. Blocks before the first heading are listed as the preamble.',
      inputSchema: {
        path: z.string().describe('Vault-relative note path'),
      },
    },
    async ({ path }) => {
      return withOpenNote(workspace, path, 'build section tree', (open) => {
        const tree = buildSectionTree(open.manager.note);
        return successResult(path, `${tree.sections.length} top-level sections`, {
          preamble: tree.preamble,
          sections: tree.sections.map(section => sectionView(section, open.lineOffset)),
        });
      });
    }
  );

  const get_parse_failures = server.registerTool(
    'get_parse_failures',
    {
      title: 'Get Parse Failures',
      description:
        'List the blocks whose parser rejected their content, with the parser\'s message. A failed block keeps its raw text and is written back unchanged.',
      inputSchema: {
        path: z.string().describe('Vault-relative note path'),
      },
    },
    async ({ path }) => {
      return withOpenNote(workspace, path, 'list parse failures', (open) => {
        const failures = open.manager.parseFailures().map(({ index }) =>
          blockView(open.manager.block(index), index, { lineOffset: open.lineOffset, includeText: true })
        );
        return successResult(path, `${failures.length} blocks failed to parse`, {
          count: failures.length,
          failures,
        });
      });
    }
  );

  return { get_block, get_section_tree, get_parse_failures };
}
