/**
 * Block manager - detection, parsing and incremental editing of one note
 *
 * Owns a HybridNote and remembers which parser resolved each block, so a
 * reparse reuses it without consulting the registry again. Edits keep the
 * note's line ranges contiguous; reparsing is always explicit (nothing is
 * reparsed on read).
 *
 * Dirty tracking:
 * - parseDocument, insertBlock, reparseBlock and redetectBlock leave the
 *   blocks they produce clean (dirty=false), including failed parses
 * - updateBlockText, patchMetadata and markDirty set dirty=true on the one
 *   block they touch; no other block's ast, metadata or dirty flag changes
 */

import { DEFAULT_DETECTION_CONFIG, type DetectionConfig } from './config.js';
import { BlockDetector } from './detector.js';
import { BlockTextError, IndexOutOfRangeError, MetadataError, ParseError } from './errors.js';
import { countLines } from './lines.js';
import { coreLog } from './logging.js';
import { HybridNote, terminate, type DetachedBlock } from './note.js';
import type { Parser, ParserRegistry } from './parser.js';
import { syntaxKey, type SyntaxKind } from './syntax.js';
import {
  emptyMetadata,
  type BlockPredicate,
  type DetectionRecoveryNotice,
  type HybridBlock,
  type IndexedBlock,
} from './types.js';

export interface BlockFailure {
  index: number;
  error: ParseError;
}

export interface ParseReport {
  blockCount: number;
  notices: DetectionRecoveryNotice[];
  failures: BlockFailure[];
}

export interface BlockManagerOptions {
  /** Adopt an existing note instead of starting empty */
  note?: HybridNote;
  detection?: Partial<DetectionConfig>;
  id?: string;
  title?: string;
}

/** `null` removes a field or property */
export interface MetadataPatch {
  headingLevel?: number | null;
  id?: string | null;
  todoState?: string | null;
  properties?: Record<string, string | null>;
}

export class BlockManager {
  readonly registry: ParserRegistry;
  readonly detector: BlockDetector;
  readonly note: HybridNote;

  private readonly parsers = new WeakMap<HybridBlock, Parser>();

  constructor(registry: ParserRegistry, options: BlockManagerOptions = {}) {
    this.registry = registry;
    this.detector = new BlockDetector({ ...DEFAULT_DETECTION_CONFIG, ...options.detection });
    this.note = options.note ?? new HybridNote(options.id ?? 'untitled', options.title ?? 'Untitled');
  }

  get blockCount(): number {
    return this.note.blockCount;
  }

  /**
   * @throws IndexOutOfRangeError
   */
  block(index: number): HybridBlock {
    return this.requireBlock(index);
  }

  // ==========================================================================
  // Parsing
  // ==========================================================================

  /**
   * Detect and parse `text`, replacing every block in one step.
   * Per-block parse failures are recorded, never thrown.
   *
   * @throws UnterminatedBlockError in strict detection mode, before any change
   */
  parseDocument(text: string): ParseReport {
    const segments = this.detector.scan(text);

    const built = segments.map(segment => {
      const { block, parser } = this.build(segment.syntax, segment.rawText, segment.lineRange.start);
      const placed: HybridBlock = { ...block, lineRange: segment.lineRange };
      return { placed, parser };
    });

    this.note.replaceBlocks(built.map(b => b.placed));
    for (const { placed, parser } of built) {
      this.parsers.set(placed, parser);
    }

    const notices: DetectionRecoveryNotice[] = [];
    for (const segment of segments) {
      if (segment.notice) notices.push(segment.notice);
    }
    const failures = this.parseFailures();

    coreLog('manager', `Parsed ${this.note.id}: ${built.length} blocks, ${failures.length} failed, ${notices.length} recovered`);
    return { blockCount: built.length, notices, failures };
  }

  /**
   * Re-run the block's parser over its current raw text
   *
   * @throws IndexOutOfRangeError
   */
  reparseBlock(index: number): HybridBlock {
    const block = this.requireBlock(index);
    const parser = this.parserFor(block);
    const parsed = this.runParser(parser, block.syntax, block.rawText, block.lineRange.start);

    block.ast = parsed.ast;
    block.metadata = parsed.metadata;
    block.parseError = parsed.parseError;
    block.dirty = false;
    return block;
  }

  /** Reparse every dirty block, returning their indices */
  reparseDirty(): number[] {
    const indices = this.dirtyIndices();
    for (const index of indices) {
      this.reparseBlock(index);
    }
    return indices;
  }

  /**
   * @throws IndexOutOfRangeError
   */
  markDirty(index: number): void {
    this.requireBlock(index).dirty = true;
  }

  dirtyIndices(): number[] {
    return this.note.queryBlocks(b => b.dirty).map(r => r.index);
  }

  // ==========================================================================
  // Editing
  // ==========================================================================

  /**
   * Replace a block's raw text. The block becomes dirty and later blocks
   * move by the change in line count.
   *
   * @throws IndexOutOfRangeError, BlockTextError
   */
  updateBlockText(index: number, rawText: string): HybridBlock {
    const block = this.requireBlock(index);
    if (rawText.length === 0) {
      throw new BlockTextError('Block text must not be empty; remove the block instead');
    }

    const text = index < this.note.blockCount - 1 ? terminate(rawText) : rawText;
    const before = block.lineRange.end - block.lineRange.start + 1;
    const after = countLines(text);

    block.rawText = text;
    block.dirty = true;
    block.lineRange = { start: block.lineRange.start, end: block.lineRange.start + after - 1 };
    this.note.shiftFrom(index + 1, after - before);
    return block;
  }

  /**
   * @throws IndexOutOfRangeError
   * @throws MetadataError when headingLevel is not a positive integer
   */
  patchMetadata(index: number, patch: MetadataPatch): HybridBlock {
    const block = this.requireBlock(index);
    const metadata = block.metadata;

    const level = patch.headingLevel;
    if (level !== undefined && level !== null && (!Number.isInteger(level) || level < 1)) {
      throw new MetadataError(`Heading level must be a positive integer, got ${level}`);
    }

    if (patch.headingLevel !== undefined) {
      if (patch.headingLevel === null) delete metadata.headingLevel;
      else metadata.headingLevel = patch.headingLevel;
    }
    if (patch.id !== undefined) {
      if (patch.id === null) delete metadata.id;
      else metadata.id = patch.id;
    }
    if (patch.todoState !== undefined) {
      if (patch.todoState === null) delete metadata.todoState;
      else metadata.todoState = patch.todoState;
    }
    for (const [key, value] of Object.entries(patch.properties ?? {})) {
      if (value === null) metadata.properties.delete(key);
      else metadata.properties.set(key, value);
    }

    block.dirty = true;
    return block;
  }

  /**
   * Insert and parse a new block at `index` (0..=blockCount). Later blocks
   * move down by its line count.
   *
   * @throws IndexOutOfRangeError, BlockTextError
   */
  insertBlock(index: number, syntax: SyntaxKind, rawText: string): HybridBlock {
    const count = this.note.blockCount;
    if (!Number.isInteger(index) || index < 0 || index > count) {
      throw new IndexOutOfRangeError(index, count, true);
    }
    if (rawText.length === 0) {
      throw new BlockTextError('Block text must not be empty');
    }

    const text = index < count ? terminate(rawText) : rawText;
    const start = index < count ? this.requireBlock(index).lineRange.start : this.note.totalLines + 1;
    const { block, parser } = this.build(syntax, text, start);

    const previous = this.note.blockAt(index - 1);
    const previousText = previous?.rawText;
    const previousWasDirty = previous?.dirty ?? false;

    const placed = this.note.insertAt(index, block);
    this.parsers.set(placed, parser);

    // Appending gave the old last block its missing terminator
    if (previous && previous.rawText !== previousText && !previousWasDirty) {
      this.reparseBlock(index - 1);
    }

    coreLog('manager', `Inserted ${syntaxKey(syntax)} block at ${index} in ${this.note.id}`);
    return placed;
  }

  /**
   * @throws IndexOutOfRangeError
   */
  removeBlock(index: number): HybridBlock {
    const removed = this.note.removeAt(index);
    coreLog('manager', `Removed block ${index} from ${this.note.id}`);
    return removed;
  }

  /**
   * Run the detector over one block's text and replace the block with what
   * it finds, for edits that change a block's syntax or split it. Returns
   * the number of blocks that replaced it.
   *
   * @throws IndexOutOfRangeError, or UnterminatedBlockError in strict mode
   */
  redetectBlock(index: number): number {
    const old = this.requireBlock(index);
    const segments = this.detector.scan(old.rawText);

    const built = segments.map(segment =>
      this.build(segment.syntax, segment.rawText, old.lineRange.start + segment.lineRange.start - 1)
    );
    const placed = this.note.replaceAt(index, built.map(b => b.block));
    placed.forEach((block, i) => this.parsers.set(block, built[i].parser));

    coreLog('manager', `Redetected block ${index} of ${this.note.id} into ${placed.length} blocks`);
    return placed.length;
  }

  // ==========================================================================
  // Rendering
  // ==========================================================================

  /**
   * Parser rendering for clean parsed blocks, raw text otherwise
   *
   * @throws IndexOutOfRangeError
   */
  renderBlock(index: number): string {
    return this.render(this.requireBlock(index));
  }

  renderDocument(): string {
    return this.note.getBlocks().map(b => this.render(b)).join('');
  }

  /**
   * Recovery notices for the note's current text, as reopening it would
   * report them. Never throws, even under strict detection.
   */
  recoveryNotices(): DetectionRecoveryNotice[] {
    const detector = new BlockDetector({ ...this.detector.config, strict: false });
    return detector.scan(this.renderDocument()).flatMap(segment => (segment.notice ? [segment.notice] : []));
  }

  // ==========================================================================
  // Queries (no reparse; dirty blocks answer with stale metadata)
  // ==========================================================================

  findHeadings(level?: number): IndexedBlock[] {
    return this.note.findHeadings(level);
  }

  findTodoItems(state?: string): IndexedBlock[] {
    return this.note.findTodoItems(state);
  }

  queryBlocks(predicate: BlockPredicate): IndexedBlock[] {
    return this.note.queryBlocks(predicate);
  }

  parseFailures(): BlockFailure[] {
    const failures: BlockFailure[] = [];
    this.note.getBlocks().forEach((block, index) => {
      if (block.parseError) {
        failures.push({ index, error: block.parseError });
      }
    });
    return failures;
  }

  /** The parser that owns a block (resolved now for adopted blocks) */
  parserFor(block: HybridBlock): Parser {
    const known = this.parsers.get(block);
    if (known) return known;

    const parser = this.registry.resolve(block.syntax, block.rawText);
    this.parsers.set(block, parser);
    return parser;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private requireBlock(index: number): HybridBlock {
    const block = Number.isInteger(index) ? this.note.blockAt(index) : undefined;
    if (!block) {
      throw new IndexOutOfRangeError(index, this.note.blockCount);
    }
    return block;
  }

  private render(block: HybridBlock): string {
    if (block.dirty || !block.ast) {
      return block.rawText;
    }
    return this.parserFor(block).render(block.ast, block.metadata);
  }

  private build(syntax: SyntaxKind, rawText: string, lineOffset: number): { block: DetachedBlock; parser: Parser } {
    const parser = this.registry.resolve(syntax, rawText);
    const parsed = this.runParser(parser, syntax, rawText, lineOffset);
    return {
      block: { syntax, rawText, ...parsed, dirty: false },
      parser,
    };
  }

  private runParser(
    parser: Parser,
    syntax: SyntaxKind,
    rawText: string,
    lineOffset: number
  ): Pick<HybridBlock, 'ast' | 'metadata' | 'parseError'> {
    try {
      const { ast, metadata } = parser.parse(rawText, lineOffset);
      return { ast, metadata, parseError: null };
    } catch (error) {
      const parseError = ParseError.from(error);
      coreLog('manager', `${syntaxKey(syntax)} block at line ${lineOffset} failed to parse: ${parseError.message}`, 'warn');
      return { ast: null, metadata: emptyMetadata(), parseError };
    }
  }
}
