/**
 * Workspace - the set of notes currently held as block documents
 *
 * A note is detected and parsed once when opened; block edits then go
 * through its BlockManager and reach the repository only on save.
 */

import {
  BlockManager,
  type DetectionConfig,
  type ParseReport,
  type ParserRegistry,
} from '@hybridnote/core';
import { noteNotFound, noteNotOpen } from './errors.js';
import { splitFrontmatter } from './read/frontmatter.js';
import type { NoteRecord, NotesRepository } from './repo/types.js';
import { serverLog } from './shared/serverLog.js';

export interface OpenNote {
  id: string;
  title: string;
  manager: BlockManager;
  /** Frontmatter text written back unchanged on save */
  prefix: string;
  frontmatter: Record<string, unknown>;
  /** File line of block line 1, minus one */
  lineOffset: number;
  /** Parse result from open time; current notices come from manager.recoveryNotices() */
  report: ParseReport;
  /** Block edits made since the note was opened or last saved */
  edited: boolean;
  openedAt: Date;
}

export class Workspace {
  readonly repo: NotesRepository;
  readonly registry: ParserRegistry;
  readonly detection: Partial<DetectionConfig>;

  private readonly notes = new Map<string, OpenNote>();
  private readonly pending = new Map<string, Promise<OpenNote>>();

  constructor(repo: NotesRepository, registry: ParserRegistry, detection: Partial<DetectionConfig> = {}) {
    this.repo = repo;
    this.registry = registry;
    this.detection = detection;
  }

  /**
   * Open a note, parsing it on first use. Concurrent opens of the same id
   * share one load.
   *
   * @throws VaultError when the note does not exist
   * @throws UnterminatedBlockError in strict detection mode
   */
  async open(id: string, options: { reload?: boolean } = {}): Promise<OpenNote> {
    const existing = this.notes.get(id);
    if (existing && !options.reload) {
      return existing;
    }

    const inFlight = this.pending.get(id);
    if (inFlight) {
      return inFlight;
    }

    const load = this.load(id).finally(() => {
      this.pending.delete(id);
    });
    this.pending.set(id, load);
    return load;
  }

  get(id: string): OpenNote | undefined {
    return this.notes.get(id);
  }

  /**
   * @throws VaultError when the note is not open
   */
  require(id: string): OpenNote {
    const open = this.notes.get(id);
    if (!open) {
      throw noteNotOpen(id);
    }
    return open;
  }

  /** Full file text of an open note, frontmatter included */
  render(id: string): string {
    const open = this.require(id);
    return open.prefix + open.manager.renderDocument();
  }

  /**
   * Write an open note back to the repository
   *
   * @throws VaultError when the note is not open
   */
  async save(id: string): Promise<NoteRecord> {
    const open = this.require(id);
    const text = this.render(id);
    const record = await this.repo.write(id, text);

    open.title = record.title;
    open.edited = false;
    serverLog('workspace', `Saved ${id}: ${open.manager.blockCount} blocks`);
    return record;
  }

  close(id: string): boolean {
    const closed = this.notes.delete(id);
    if (closed) {
      serverLog('workspace', `Closed ${id}`);
    }
    return closed;
  }

  openIds(): string[] {
    return [...this.notes.keys()].sort((a, b) => a.localeCompare(b));
  }

  private async load(id: string): Promise<OpenNote> {
    const record = await this.repo.read(id);
    if (!record) {
      throw noteNotFound(id);
    }

    const { prefix, frontmatter, body, lineOffset } = splitFrontmatter(record.text, id);
    const manager = new BlockManager(this.registry, {
      id,
      title: record.title,
      detection: this.detection,
    });
    const report = manager.parseDocument(body);

    const open: OpenNote = {
      id,
      title: record.title,
      manager,
      prefix,
      frontmatter,
      lineOffset,
      report,
      edited: false,
      openedAt: new Date(),
    };
    this.notes.set(id, open);

    serverLog(
      'workspace',
      `Opened ${id}: ${report.blockCount} blocks, ${report.failures.length} parse failures, ${report.notices.length} recovered`
    );
    return open;
  }
}
