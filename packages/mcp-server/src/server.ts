/**
 * MCP server assembly: tool registration and category gating
 */

import { McpServer, type RegisteredTool } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolCategory } from './core/config.js';
import { TOOL_CATEGORIES } from './core/config.js';
import type { ServerContext } from './core/context.js';
import { serverLog } from './core/shared/serverLog.js';

import { registerGraphTools } from './tools/read/graph.js';
import { registerNoteTools } from './tools/read/notes.js';
import { registerQueryTools } from './tools/read/query.js';
import { registerStructureTools } from './tools/read/structure.js';
import { registerSystemTools } from './tools/read/system.js';
import { registerBlockTools } from './tools/write/blocks.js';
import { registerNoteWriteTools } from './tools/write/notes.js';

export const SERVER_NAME = 'hybridnote';
export const SERVER_VERSION = '0.1.0';

// Per-tool category mapping (tool name → category)
export const TOOL_CATEGORY: Record<string, ToolCategory> = {
  // notes
  list_notes: 'notes',
  parse_note: 'notes',
  render_note: 'notes',

  // blocks
  get_block: 'blocks',
  get_section_tree: 'blocks',
  get_parse_failures: 'blocks',

  // search
  find_headings: 'search',
  find_todo_items: 'search',
  query_blocks: 'search',

  // edit
  update_block: 'edit',
  insert_block: 'edit',
  remove_block: 'edit',
  reparse_blocks: 'edit',
  redetect_block: 'edit',
  patch_block_metadata: 'edit',
  save_note: 'edit',

  // index
  refresh_index: 'index',
  get_backlinks: 'index',
  find_by_tag: 'index',

  // system
  server_log: 'system',
};

export interface HybridNoteServer {
  server: McpServer;
  /** Tool names left enabled, sorted */
  tools: string[];
}

/**
 * Create the server with every tool registered, then remove the tools whose
 * category is not enabled
 */
export function createHybridNoteServer(
  context: ServerContext,
  categories: ReadonlySet<ToolCategory> = new Set(TOOL_CATEGORIES)
): HybridNoteServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  const registered: Record<string, RegisteredTool> = {
    ...registerNoteTools(server, context),
    ...registerStructureTools(server, context),
    ...registerQueryTools(server, context),
    ...registerBlockTools(server, context),
    ...registerNoteWriteTools(server, context),
    ...registerGraphTools(server, context),
    ...registerSystemTools(server),
  };

  const tools: string[] = [];
  for (const [name, tool] of Object.entries(registered)) {
    const category = TOOL_CATEGORY[name];
    if (category === undefined || categories.has(category)) {
      tools.push(name);
    } else {
      tool.remove();
    }
  }
  tools.sort();

  const categoryList = Array.from(categories).sort().join(', ');
  serverLog('server', `Tool categories: ${categoryList} (${tools.length} tools)`);

  return { server, tools };
}
