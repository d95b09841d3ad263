/**
 * HybridNote MCP server - block-level reading and editing of notes that mix
 * Markdown, Org, LaTeX math and fenced code
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createDefaultRegistry } from '@hybridnote/core';

import { loadServerConfig } from './core/config.js';
import type { ServerContext } from './core/context.js';
import { buildNoteIndex, emptyNoteIndex, indexRecord, removeIndexedNote, upsertIndexedNote, type NoteIndex } from './core/read/noteIndex.js';
import { createVaultWatcher, type EventBatch } from './core/read/watch.js';
import { FileNotesRepository } from './core/repo/file.js';
import { serverLog } from './core/shared/serverLog.js';
import { Workspace } from './core/workspace.js';
import { createHybridNoteServer } from './server.js';

async function main(): Promise<void> {
  const config = loadServerConfig();
  serverLog('server', `Starting HybridNote server...`);
  serverLog('config', `Vault: ${config.vaultPath}`);
  serverLog('config', `Extensions: ${config.extensions.join(', ')}; strict detection: ${config.detection.strict}`);

  const startTime = Date.now();
  const registry = createDefaultRegistry();
  const repo = new FileNotesRepository(config.vaultPath, config.extensions);
  const workspace = new Workspace(repo, registry, config.detection);

  let noteIndex: NoteIndex = emptyNoteIndex();
  const context: ServerContext = {
    workspace,
    getIndex: () => noteIndex,
    setIndex: (index) => { noteIndex = index; },
  };

  const { server } = createHybridNoteServer(context, config.categories);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  serverLog('server', 'MCP server connected');

  noteIndex = await buildNoteIndex(repo, registry, config.detection);
  serverLog('server', `Ready in ${Date.now() - startTime}ms`);

  if (config.watch) {
    const watcher = createVaultWatcher({
      vaultPath: config.vaultPath,
      extensions: config.extensions,
      debounceMs: config.debounceMs,
      onBatch: async (batch: EventBatch) => {
        for (const event of batch.events) {
          if (event.type === 'delete') {
            noteIndex = removeIndexedNote(noteIndex, event.path);
            workspace.close(event.path);
            continue;
          }

          const record = await repo.read(event.path);
          if (!record) continue;
          try {
            noteIndex = upsertIndexedNote(noteIndex, indexRecord(record, registry, config.detection));
          } catch (err) {
            serverLog('index', `Could not reindex ${event.path}: ${err instanceof Error ? err.message : String(err)}`, 'warn');
          }
        }
      },
    });
    watcher.start();

    process.on('SIGINT', () => {
      watcher.stop().then(
        () => process.exit(0),
        (err: unknown) => {
          serverLog('watcher', `Stop failed: ${err instanceof Error ? err.message : String(err)}`, 'error');
          process.exit(1);
        }
      );
    });
  }
}

main().catch((error: unknown) => {
  serverLog('server', `Fatal error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`, 'error');
  process.exit(1);
});
