/**
 * Note persistence tools
 * Tools: save_note
 */

import { z } from 'zod';
import type { McpServer, RegisteredTool } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../../core/context.js';
import { indexOpenNote, upsertIndexedNote } from '../../core/read/noteIndex.js';
import { serverLog } from '../../core/shared/serverLog.js';
import { successResult, withOpenNote } from '../../core/write/mutation-helpers.js';

export function registerNoteWriteTools(server: McpServer, context: ServerContext): Record<string, RegisteredTool> {
  const { workspace } = context;

  const save_note = server.registerTool(
    'save_note',
    {
      title: 'Save Note',
      description:
        'Write an open note back to its file: frontmatter unchanged, clean parsed blocks rendered by their parser, every other block as its raw text. Updates the note\'s links and tags in the index.',
      inputSchema: {
        path: z.string().describe('Vault-relative note path'),
        reparse: z.boolean().optional().describe('Reparse dirty blocks before saving (default: true)'),
        close: z.boolean().optional().describe('Close the note after saving (default: false)'),
      },
    },
    async ({ path, reparse, close }) => {
      return withOpenNote(workspace, path, 'save note', async (open) => {
        const reparsed = reparse === false ? [] : open.manager.reparseDirty();
        const record = await workspace.save(path);

        context.setIndex(upsertIndexedNote(context.getIndex(), indexOpenNote(open, record.aliases)));
        serverLog('index', `Reindexed ${path} after save`);

        if (close) {
          workspace.close(path);
        }

        return successResult(path, `Saved ${open.manager.blockCount} blocks`, {
          reparsed,
          chars: record.text.length,
          closed: close ?? false,
        });
      });
    }
  );

  return { save_note };
}
