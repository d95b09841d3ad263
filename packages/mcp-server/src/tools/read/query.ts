/**
 * Block query tools
 * Tools: find_headings, find_todo_items, query_blocks
 *
 * Queries read current metadata without reparsing; a dirty block answers
 * with what it had when last parsed.
 */

import { z } from 'zod';
import {
  headingTitle,
  parseSyntaxKey,
  sameSyntax,
  type BlockPredicate,
  type IndexedBlock,
} from '@hybridnote/core';
import type { McpServer, RegisteredTool } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../../core/context.js';
import { blockView } from '../../core/read/blockView.js';
import { successResult, withOpenNote } from '../../core/write/mutation-helpers.js';

export interface BlockFilter {
  syntax?: string;
  heading_level?: number;
  todo_state?: string;
  block_id?: string;
  property?: string;
  property_value?: string;
  text_contains?: string;
  dirty?: boolean;
  failed?: boolean;
}

/**
 * Build a predicate from query filters; every given filter must match.
 * `syntax` takes a key (`markdown`, `code:python`) or a bare kind (`code`).
 *
 * @throws Error for an unknown syntax key
 */
export function buildBlockPredicate(filter: BlockFilter): BlockPredicate {
  const checks: BlockPredicate[] = [];

  if (filter.syntax !== undefined) {
    const raw = filter.syntax.trim();
    const key = raw.includes(':') ? raw : raw.toLowerCase();
    const exact = key.includes(':') ? parseSyntaxKey(key) : null;
    if (key.includes(':') && !exact) {
      throw new Error(`Unknown syntax: ${filter.syntax}`);
    }
    checks.push(exact ? (block) => sameSyntax(block.syntax, exact) : (block) => block.syntax.kind === key);
  }
  if (filter.heading_level !== undefined) {
    const level = filter.heading_level;
    checks.push((block) => block.metadata.headingLevel === level);
  }
  if (filter.todo_state !== undefined) {
    const state = filter.todo_state.toUpperCase();
    checks.push((block) => block.metadata.todoState === state);
  }
  if (filter.block_id !== undefined) {
    const id = filter.block_id;
    checks.push((block) => block.metadata.id === id);
  }
  if (filter.property !== undefined) {
    const name = filter.property;
    const value = filter.property_value;
    checks.push((block) =>
      block.metadata.properties.has(name) && (value === undefined || block.metadata.properties.get(name) === value)
    );
  }
  if (filter.text_contains !== undefined) {
    const needle = filter.text_contains.toLowerCase();
    checks.push((block) => block.rawText.toLowerCase().includes(needle));
  }
  if (filter.dirty !== undefined) {
    const dirty = filter.dirty;
    checks.push((block) => block.dirty === dirty);
  }
  if (filter.failed !== undefined) {
    const failed = filter.failed;
    checks.push((block) => (block.parseError !== null) === failed);
  }

  return (block, index) => checks.every(check => check(block, index));
}

export function registerQueryTools(server: McpServer, context: ServerContext): Record<string, RegisteredTool> {
  const { workspace } = context;

  const find_headings = server.registerTool(
    'find_headings',
    {
      title: 'Find Headings',
      description:
        'List heading blocks of a note (Markdown # headings and Org * headlines), optionally only one level, with title and file lines.',
      inputSchema: {
        path: z.string().describe('Vault-relative note path'),
        level: z.number().int().min(1).optional().describe('Only headings of this level'),
      },
    },
    async ({ path, level }) => {
      return withOpenNote(workspace, path, 'find headings', (open) => {
        const headings = open.manager.findHeadings(level).map(({ index, block }) => ({
          index,
          level: block.metadata.headingLevel,
          title: headingTitle(block),
          line: block.lineRange.start + open.lineOffset,
          ...(block.metadata.id !== undefined ? { id: block.metadata.id } : {}),
        }));
        return successResult(path, `Found ${headings.length} headings`, { count: headings.length, headings });
      });
    }
  );

  const find_todo_items = server.registerTool(
    'find_todo_items',
    {
      title: 'Find Todo Items',
      description:
        'List blocks carrying a task state: Markdown checkboxes (- [ ] TODO, - [x] DONE, - [-] CANCELLED) and Org headline keywords (TODO, DONE, ...). Without a state, returns open TODO items.',
      inputSchema: {
        path: z.string().describe('Vault-relative note path'),
        state: z.string().optional().describe('Task state to match (e.g., "DONE"); default TODO'),
        any_state: z.boolean().optional().describe('Return blocks in any task state (default: false)'),
      },
    },
    async ({ path, state, any_state }) => {
      return withOpenNote(workspace, path, 'find todo items', (open) => {
        const found: IndexedBlock[] = any_state
          ? open.manager.queryBlocks(block => block.metadata.todoState !== undefined)
          : open.manager.findTodoItems((state ?? 'TODO').toUpperCase());

        const items = found.map(({ index, block }) => ({
          index,
          state: block.metadata.todoState,
          line: block.lineRange.start + open.lineOffset,
          text: block.rawText.split('\n')[0].trim(),
        }));
        return successResult(path, `Found ${items.length} todo items`, { count: items.length, items });
      });
    }
  );

  const query_blocks = server.registerTool(
    'query_blocks',
    {
      title: 'Query Blocks',
      description:
        'Find blocks of a note matching every given filter: syntax ("markdown", "org", "latex", "code", or exact keys like "code:python"), heading level, task state, block id, property, text substring, dirty or failed state.',
      inputSchema: {
        path: z.string().describe('Vault-relative note path'),
        syntax: z.string().optional().describe('Syntax kind or key'),
        heading_level: z.number().int().min(1).optional(),
        todo_state: z.string().optional(),
        block_id: z.string().optional(),
        property: z.string().optional().describe('Blocks that have this metadata property'),
        property_value: z.string().optional().describe('Required value of property'),
        text_contains: z.string().optional().describe('Case-insensitive substring of the raw text'),
        dirty: z.boolean().optional(),
        failed: z.boolean().optional().describe('Blocks whose parser failed'),
        include_text: z.boolean().optional().describe('Include raw text (default: false)'),
        limit: z.number().int().positive().optional().describe('Maximum blocks to return (default: 50)'),
      },
    },
    async ({ path, include_text, limit, ...filter }) => {
      return withOpenNote(workspace, path, 'query blocks', (open) => {
        const predicate = buildBlockPredicate(filter);
        const matches = open.manager.queryBlocks(predicate);
        const blocks = matches.slice(0, limit ?? 50).map(({ index, block }) =>
          blockView(block, index, { lineOffset: open.lineOffset, includeText: include_text ?? false })
        );
        return successResult(path, `Found ${matches.length} matching blocks`, {
          total: matches.length,
          returned: blocks.length,
          blocks,
        });
      });
    }
  );

  return { find_headings, find_todo_items, query_blocks };
}
