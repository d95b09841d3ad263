/**
 * Note tools
 * Tools: list_notes, parse_note, render_note
 */

import { z } from 'zod';
import type { McpServer, RegisteredTool } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../../core/context.js';
import { blockView } from '../../core/read/blockView.js';
import {
  formatMcpResult,
  successResult,
  withOpenNote,
} from '../../core/write/mutation-helpers.js';

export function registerNoteTools(server: McpServer, context: ServerContext): Record<string, RegisteredTool> {
  const { workspace } = context;

  const list_notes = server.registerTool(
    'list_notes',
    {
      title: 'List Notes',
      description:
        'List the notes in the vault with their titles, aliases and modification times. Notes currently open for block editing are flagged.',
      inputSchema: {
        folder: z.string().optional().describe('Only notes under this folder (e.g., "projects")'),
        limit: z.number().int().positive().optional().describe('Maximum notes to return (default: 200)'),
      },
    },
    async ({ folder, limit }) => {
      const max = limit ?? 200;
      const prefix = folder ? `${folder.replace(/\/+$/, '')}/` : '';
      const records = (await workspace.repo.list()).filter(r => r.id.startsWith(prefix));

      const notes = records.slice(0, max).map(record => ({
        path: record.id,
        title: record.title,
        aliases: record.aliases,
        modified: record.modified.toISOString(),
        open: workspace.get(record.id) !== undefined,
      }));

      return formatMcpResult(successResult(folder ?? '', `Found ${records.length} notes`, {
        total: records.length,
        returned: notes.length,
        notes,
      }));
    }
  );

  const parse_note = server.registerTool(
    'parse_note',
    {
      title: 'Parse Note',
      description:
        'Open a note as a sequence of blocks (Markdown, Org, LaTeX math, fenced code) and list them with syntax, file line range and metadata. Reports unterminated blocks in the note\'s current text, closed at end of document, and blocks whose parser failed. Use reload to discard unsaved block edits and read the file again.',
      inputSchema: {
        path: z.string().describe('Vault-relative note path (e.g., "projects/plan.md")'),
        reload: z.boolean().optional().describe('Re-read the file, dropping unsaved edits (default: false)'),
        include_text: z.boolean().optional().describe('Include each block\'s raw text (default: false)'),
      },
    },
    async ({ path, reload, include_text }) => {
      return withOpenNote(workspace, path, 'parse note', (open) => {
        const blocks = open.manager.note.getBlocks().map((block, index) =>
          blockView(block, index, { lineOffset: open.lineOffset, includeText: include_text ?? false })
        );
        const notices = open.manager.recoveryNotices().map(notice => ({
          message: notice.message,
          openedAt: notice.openedAt + open.lineOffset,
          expected: notice.expected,
        }));

        return successResult(path, `Parsed ${blocks.length} blocks`, {
          title: open.title,
          frontmatterLines: open.lineOffset,
          blockCount: blocks.length,
          unsaved: open.edited,
          notices,
          blocks,
        });
      }, { reload: reload ?? false });
    }
  );

  const render_note = server.registerTool(
    'render_note',
    {
      title: 'Render Note',
      description:
        'Render an open note back to text, frontmatter included, exactly as save_note would write it. Returns the text without writing.',
      inputSchema: {
        path: z.string().describe('Vault-relative note path'),
      },
    },
    async ({ path }) => {
      return withOpenNote(workspace, path, 'render note', (open) => {
        const text = workspace.render(path);
        return successResult(path, `Rendered ${open.manager.blockCount} blocks`, {
          unsaved: open.edited,
          text,
        });
      });
    }
  );

  return { list_notes, parse_note, render_note };
}
