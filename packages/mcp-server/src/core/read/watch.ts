/**
 * Vault file watcher
 *
 * Notes edited outside the server are reindexed after a quiet period.
 * Events on the same path within one debounce window coalesce into a single
 * upsert or delete.
 */

import chokidar, { type FSWatcher } from 'chokidar';
import * as path from 'path';
import { serverLog } from '../shared/serverLog.js';
import { EXCLUDED_DIRS, hasNoteExtension } from './vault.js';

export type WatchEventType = 'add' | 'change' | 'unlink';

export type CoalescedEventType = 'upsert' | 'delete';

export interface CoalescedEvent {
  type: CoalescedEventType;
  /** Vault-relative note id */
  path: string;
}

export interface EventBatch {
  events: CoalescedEvent[];
  timestamp: number;
}

/**
 * Collapse a path's event sequence into one action
 *
 * - add + change = upsert
 * - add + unlink = nothing (created then deleted)
 * - unlink = delete
 * - unlink + add = upsert (deleted then recreated)
 */
export function coalesceEvents(types: readonly WatchEventType[]): CoalescedEventType | null {
  if (types.length === 0) return null;

  const last = types[types.length - 1];
  if (last === 'unlink') {
    return types[0] === 'add' ? null : 'delete';
  }
  return 'upsert';
}

export function getRelativePath(vaultPath: string, filePath: string): string {
  return path.relative(vaultPath, filePath).replace(/\\/g, '/');
}

/**
 * Whether a vault-relative path is a note the index should follow
 */
export function shouldWatch(relativePath: string, extensions: readonly string[]): boolean {
  const segments = relativePath.split('/').filter(s => s.length > 0);
  if (segments.length === 0) return false;

  for (const segment of segments.slice(0, -1)) {
    if (EXCLUDED_DIRS.has(segment) || segment.startsWith('.')) {
      return false;
    }
  }

  const filename = segments[segments.length - 1];
  if (filename.startsWith('.') || filename.startsWith('#') || filename.endsWith('~')) {
    return false;
  }
  return hasNoteExtension(filename, extensions);
}

/**
 * Debounced event queue: every push restarts the timer, and the flush hands
 * all coalesced paths to the handler in one batch.
 */
export class EventQueue {
  private readonly pending = new Map<string, WatchEventType[]>();
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly debounceMs: number,
    private readonly onFlush: (batch: EventBatch) => void
  ) {}

  get pendingCount(): number {
    return this.pending.size;
  }

  push(type: WatchEventType, notePath: string): void {
    const events = this.pending.get(notePath) ?? [];
    events.push(type);
    this.pending.set(notePath, events);

    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => this.flush(), this.debounceMs);
  }

  flush(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.pending.size === 0) return;

    const events: CoalescedEvent[] = [];
    for (const [notePath, types] of this.pending) {
      const type = coalesceEvents(types);
      if (type) events.push({ type, path: notePath });
    }
    this.pending.clear();

    if (events.length > 0) {
      this.onFlush({ events, timestamp: Date.now() });
    }
  }

  dispose(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.pending.clear();
  }
}

export interface VaultWatcherOptions {
  vaultPath: string;
  extensions: readonly string[];
  debounceMs: number;
  onBatch: (batch: EventBatch) => Promise<void>;
}

export interface VaultWatcher {
  start(): void;
  stop(): Promise<void>;
}

export function createVaultWatcher(options: VaultWatcherOptions): VaultWatcher {
  const { vaultPath, extensions, debounceMs, onBatch } = options;
  let watcher: FSWatcher | null = null;

  const queue = new EventQueue(debounceMs, batch => {
    serverLog('watcher', `Processing ${batch.events.length} changed notes`);
    onBatch(batch).catch((err: unknown) => {
      serverLog('watcher', `Batch failed: ${err instanceof Error ? err.message : String(err)}`, 'error');
    });
  });

  const handle = (type: WatchEventType) => (filePath: string) => {
    const relative = getRelativePath(vaultPath, filePath);
    if (shouldWatch(relative, extensions)) {
      queue.push(type, relative);
    }
  };

  return {
    start() {
      if (watcher) {
        serverLog('watcher', 'Watcher already started', 'warn');
        return;
      }

      serverLog('watcher', `Starting file watcher (debounce: ${debounceMs}ms)`);
      watcher = chokidar.watch(vaultPath, {
        ignored: (filePath: string) => {
          const segments = getRelativePath(vaultPath, filePath).split('/');
          return segments.some(segment => EXCLUDED_DIRS.has(segment));
        },
        persistent: true,
        ignoreInitial: true,
        awaitWriteFinish: {
          stabilityThreshold: 300,
          pollInterval: 100,
        },
      });

      watcher.on('add', handle('add'));
      watcher.on('change', handle('change'));
      watcher.on('unlink', handle('unlink'));
      watcher.on('ready', () => serverLog('watcher', 'File watcher ready'));
      watcher.on('error', (err: unknown) => {
        serverLog('watcher', `Watcher error: ${err instanceof Error ? err.message : String(err)}`, 'error');
      });
    },

    async stop() {
      if (!watcher) return;
      queue.flush();
      await watcher.close();
      watcher = null;
      queue.dispose();
      serverLog('watcher', 'File watcher stopped');
    },
  };
}
