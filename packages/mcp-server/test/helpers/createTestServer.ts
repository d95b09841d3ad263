/**
 * Test helper: a server over a repository, connected to an in-process client
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { createDefaultRegistry, type DetectionConfig } from '@hybridnote/core';
import type { ToolCategory } from '../../src/core/config.js';
import type { ServerContext } from '../../src/core/context.js';
import { buildNoteIndex, type NoteIndex } from '../../src/core/read/noteIndex.js';
import type { NotesRepository } from '../../src/core/repo/types.js';
import { Workspace } from '../../src/core/workspace.js';
import { createHybridNoteServer } from '../../src/server.js';

export interface TestServerContext {
  server: McpServer;
  client: Client;
  context: ServerContext;
  workspace: Workspace;
  tools: string[];
  close: () => Promise<void>;
}

export async function createTestServer(
  repo: NotesRepository,
  options: { categories?: Set<ToolCategory>; detection?: Partial<DetectionConfig> } = {}
): Promise<TestServerContext> {
  const registry = createDefaultRegistry();
  const workspace = new Workspace(repo, registry, options.detection ?? {});

  let index: NoteIndex = await buildNoteIndex(repo, registry, options.detection ?? {});
  const context: ServerContext = {
    workspace,
    getIndex: () => index,
    setIndex: (next) => { index = next; },
  };

  const { server, tools } = createHybridNoteServer(context, options.categories);

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);

  const client = new Client({
    name: 'test-client',
    version: '1.0.0',
  }, {
    capabilities: {},
  });
  await client.connect(clientTransport);

  return {
    server,
    client,
    context,
    workspace,
    tools,
    close: async () => {
      await client.close();
      await server.close();
    },
  };
}

/**
 * Call a tool and parse its JSON text payload
 */
export async function callTool(client: Client, name: string, args: Record<string, unknown> = {}) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (first?.type !== 'text') {
    throw new Error(`Tool ${name} returned no text content`);
  }
  return JSON.parse(first.text);
}
