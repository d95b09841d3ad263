/**
 * Link and tag index tools
 * Tools: refresh_index, get_backlinks, find_by_tag
 */

import { z } from 'zod';
import type { McpServer, RegisteredTool } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from '../../core/context.js';
import {
  buildNoteIndex,
  findByTag,
  getBacklinks,
  resolveTarget,
} from '../../core/read/noteIndex.js';
import {
  failureResult,
  formatMcpResult,
  successResult,
} from '../../core/write/mutation-helpers.js';

export function registerGraphTools(server: McpServer, context: ServerContext): Record<string, RegisteredTool> {
  const { workspace } = context;

  const refresh_index = server.registerTool(
    'refresh_index',
    {
      title: 'Refresh Index',
      description:
        'Rebuild the link and tag index from the notes on disk. Links and tags inside code blocks and math are never indexed. Unsaved block edits are not included until save_note.',
      inputSchema: {},
    },
    async () => {
      try {
        const index = await buildNoteIndex(workspace.repo, workspace.registry, workspace.detection);
        context.setIndex(index);
        return formatMcpResult(successResult('', `Indexed ${index.notes.size} notes`, {
          notes: index.notes.size,
          entities: index.entities.size,
          linkTargets: index.backlinks.size,
          tags: index.tags.size,
          builtAt: index.builtAt.toISOString(),
        }));
      } catch (error) {
        return formatMcpResult(failureResult('', 'refresh index', error));
      }
    }
  );

  const get_backlinks = server.registerTool(
    'get_backlinks',
    {
      title: 'Get Backlinks',
      description:
        'List the notes that link to a note via [[wikilinks]]. The note can be given by path, title or alias. Each backlink carries the file line and block index of the link.',
      inputSchema: {
        path: z.string().describe('Note path, title or alias'),
      },
    },
    async ({ path }) => {
      const index = context.getIndex();
      const backlinks = getBacklinks(index, path);
      const resolved = resolveTarget(index, path);

      return formatMcpResult(successResult(resolved ?? path, `Found ${backlinks.length} backlinks`, {
        exists: resolved !== undefined,
        count: backlinks.length,
        backlinks,
      }));
    }
  );

  const find_by_tag = server.registerTool(
    'find_by_tag',
    {
      title: 'Find By Tag',
      description:
        'List notes carrying a tag, from inline #tags in prose blocks, Org headline tags and frontmatter tags.',
      inputSchema: {
        tag: z.string().describe('Tag with or without # (e.g., "project")'),
      },
    },
    async ({ tag }) => {
      const notes = findByTag(context.getIndex(), tag);
      return formatMcpResult(successResult('', `Found ${notes.length} notes tagged ${tag.replace(/^#/, '')}`, {
        tag: tag.replace(/^#/, ''),
        count: notes.length,
        notes,
      }));
    }
  );

  return { refresh_index, get_backlinks, find_by_tag };
}
