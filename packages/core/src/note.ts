/**
 * HybridNote - ordered block sequence plus document identity
 *
 * Line ranges, read in sequence order, are contiguous from line 1 with no
 * gaps or overlaps. The mutators here keep that invariant; they do no
 * parsing (that is the manager's job).
 */

import { BlockTextError, IndexOutOfRangeError } from './errors.js';
import { countLines } from './lines.js';
import type { BlockPredicate, HybridBlock, IndexedBlock } from './types.js';

/** A block before it has a place in a note */
export type DetachedBlock = Omit<HybridBlock, 'lineRange'>;

/** Make sure text ends with a line terminator */
export function terminate(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

export class HybridNote {
  readonly id: string;
  title: string;
  private blocks: HybridBlock[];

  constructor(id: string, title: string, blocks: HybridBlock[] = []) {
    this.id = id;
    this.title = title;
    this.blocks = blocks;
  }

  get blockCount(): number {
    return this.blocks.length;
  }

  get totalLines(): number {
    const last = this.blocks[this.blocks.length - 1];
    return last ? last.lineRange.end : 0;
  }

  /** Blocks in order; mutate through the manager */
  getBlocks(): readonly HybridBlock[] {
    return this.blocks;
  }

  blockAt(index: number): HybridBlock | undefined {
    return this.blocks[index];
  }

  /** Block whose line range contains the 1-indexed `line` */
  blockAtLine(line: number): IndexedBlock | undefined {
    const index = this.blocks.findIndex(b => b.lineRange.start <= line && line <= b.lineRange.end);
    return index < 0 ? undefined : { index, block: this.blocks[index] };
  }

  queryBlocks(predicate: BlockPredicate): IndexedBlock[] {
    const results: IndexedBlock[] = [];
    this.blocks.forEach((block, index) => {
      if (predicate(block, index)) {
        results.push({ index, block });
      }
    });
    return results;
  }

  findHeadings(level?: number): IndexedBlock[] {
    return this.queryBlocks(b =>
      b.metadata.headingLevel !== undefined && (level === undefined || b.metadata.headingLevel === level)
    );
  }

  findTodoItems(state?: string): IndexedBlock[] {
    return this.queryBlocks(b =>
      b.metadata.todoState !== undefined && (state === undefined || b.metadata.todoState === state)
    );
  }

  /** True when ranges start at 1, are contiguous, and match each block's text */
  hasContiguousRanges(): boolean {
    let next = 1;
    for (const block of this.blocks) {
      if (block.lineRange.start !== next) return false;
      if (block.lineRange.end - block.lineRange.start + 1 !== countLines(block.rawText)) return false;
      next = block.lineRange.end + 1;
    }
    return true;
  }

  // ==========================================================================
  // Range-keeping mutators
  // ==========================================================================

  /** Swap in a whole new sequence in one step */
  replaceBlocks(blocks: HybridBlock[]): void {
    this.blocks = blocks;
  }

  /** Move every block at position >= `index` by `delta` lines */
  shiftFrom(index: number, delta: number): void {
    if (delta === 0) return;
    for (let i = index; i < this.blocks.length; i++) {
      const range = this.blocks[i].lineRange;
      this.blocks[i].lineRange = { start: range.start + delta, end: range.end + delta };
    }
  }

  /**
   * Place a block at `index` (0..=blockCount) and shift later blocks.
   * A block inserted before others is given a trailing line terminator,
   * as is a previous last block when appending after it.
   *
   * @throws IndexOutOfRangeError, BlockTextError
   */
  insertAt(index: number, block: DetachedBlock): HybridBlock {
    if (!Number.isInteger(index) || index < 0 || index > this.blocks.length) {
      throw new IndexOutOfRangeError(index, this.blocks.length, true);
    }
    if (block.rawText.length === 0) {
      throw new BlockTextError('Block text must not be empty');
    }

    const rawText = index < this.blocks.length ? terminate(block.rawText) : block.rawText;
    const previous = this.blocks[index - 1];
    if (index === this.blocks.length && previous && !previous.rawText.endsWith('\n')) {
      previous.rawText = terminate(previous.rawText);
      previous.dirty = true;
    }

    const start = index < this.blocks.length ? this.blocks[index].lineRange.start : this.totalLines + 1;
    const lines = countLines(rawText);
    const placed: HybridBlock = { ...block, rawText, lineRange: { start, end: start + lines - 1 } };

    this.shiftFrom(index, lines);
    this.blocks.splice(index, 0, placed);
    return placed;
  }

  addBlock(block: DetachedBlock): HybridBlock {
    return this.insertAt(this.blocks.length, block);
  }

  /**
   * @throws IndexOutOfRangeError
   */
  removeAt(index: number): HybridBlock {
    const block = this.blocks[index];
    if (!Number.isInteger(index) || !block) {
      throw new IndexOutOfRangeError(index, this.blocks.length);
    }
    this.blocks.splice(index, 1);
    this.shiftFrom(index, -(block.lineRange.end - block.lineRange.start + 1));
    return block;
  }

  /**
   * Replace the block at `index` with `replacements`, which are laid out
   * from the old block's first line; later blocks shift by the difference.
   *
   * @throws IndexOutOfRangeError
   */
  replaceAt(index: number, replacements: DetachedBlock[]): HybridBlock[] {
    const old = this.blocks[index];
    if (!Number.isInteger(index) || !old) {
      throw new IndexOutOfRangeError(index, this.blocks.length);
    }

    let next = old.lineRange.start;
    const placed = replacements.map(block => {
      const lines = countLines(block.rawText);
      const range = { start: next, end: next + lines - 1 };
      next += lines;
      return { ...block, lineRange: range };
    });

    this.blocks.splice(index, 1, ...placed);
    this.shiftFrom(index + placed.length, next - 1 - old.lineRange.end);
    return placed;
  }
}
