/**
 * Tests for the block manager: parsing, dirty tracking and line-range shifts
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { isSyntax } from '../src/block.js';
import { BlockTextError, IndexOutOfRangeError, MetadataError, UnterminatedBlockError } from '../src/errors.js';
import { BlockManager } from '../src/manager.js';
import { ParserRegistry } from '../src/parser.js';
import { createDefaultRegistry } from '../src/parsers/index.js';
import { LATEX, MARKDOWN, ORG, code, custom } from '../src/syntax.js';

const THREE_BLOCKS = '# A\none\ntwo\nthree\nfour\n' + '```js\nx\n```\n' + '$$\na\nb\n$$\n';

const MIXED = '# Notes\nSome prose.\n\n```js\nlet x = 1;\n```\n$$\na+b\n$$\n#+BEGIN_QUOTE\nquoted\n#+END_QUOTE\nTail\n';

describe('BlockManager', () => {
  let manager: BlockManager;

  beforeEach(() => {
    manager = new BlockManager(createDefaultRegistry(), { id: 'test-note', title: 'Test Note' });
  });

  describe('parseDocument', () => {
    it('should build clean blocks with contiguous ranges', () => {
      const report = manager.parseDocument(THREE_BLOCKS);

      expect(report).toEqual({ blockCount: 3, notices: [], failures: [] });
      expect(manager.note.getBlocks().map(b => b.lineRange)).toEqual([
        { start: 1, end: 5 },
        { start: 6, end: 8 },
        { start: 9, end: 12 },
      ]);
      expect(manager.dirtyIndices()).toEqual([]);
      expect(manager.note.hasContiguousRanges()).toBe(true);
    });

    it('should round-trip a mixed document byte for byte', () => {
      manager.parseDocument(MIXED);

      expect(manager.blockCount).toBe(5);
      expect(manager.renderDocument()).toBe(MIXED);
    });

    it('should round-trip CRLF text and a missing final newline', () => {
      const text = '# T\r\n```\r\nx\r\n```\r\nend';
      manager.parseDocument(text);

      expect(manager.renderDocument()).toBe(text);
    });

    it('should record parse failures without failing the document', () => {
      const report = manager.parseDocument('#+BEGIN_SRC\nx=1\n');
      const block = manager.block(0);

      expect(report.blockCount).toBe(1);
      expect(report.notices).toHaveLength(1);
      expect(report.failures).toHaveLength(1);
      expect(report.failures[0].index).toBe(0);
      expect(block.ast).toBeNull();
      expect(block.dirty).toBe(false);
      expect(block.parseError?.message).toBe('Syntax error at line 1: #+BEGIN_SRC without matching #+END_SRC');
      expect(manager.renderDocument()).toBe('#+BEGIN_SRC\nx=1\n');
    });

    it('should parse blocks the detector closed with a long fence or a trailing Org end', () => {
      const report = manager.parseDocument('````\nx\n````\n#+BEGIN_SRC python\nx=1\n#+END_SRC extra\ntext\n');

      expect(report.notices).toEqual([]);
      expect(report.failures).toEqual([]);
      expect(manager.note.getBlocks().map(b => b.ast?.kind)).toEqual(['code', 'org', 'markdown']);
      expect(manager.block(0).metadata.properties.has('unterminated')).toBe(false);
    });

    it('should take the math delimiter the detector opened on', () => {
      const report = manager.parseDocument('see \\[ and $$\nx\n$$\n');
      const block = manager.block(0);

      expect(report.failures).toEqual([]);
      expect(manager.blockCount).toBe(1);
      expect(block.ast?.kind === 'math' && [block.ast.delimiter, block.ast.content]).toEqual(['$$', 'x']);
    });

    it('should parse any text with an empty registry through the identity parser', () => {
      const bare = new BlockManager(new ParserRegistry());
      bare.parseDocument('just text\n$$x$$\n');

      expect(bare.note.getBlocks().map(b => b.ast?.kind)).toEqual(['verbatim', 'verbatim']);
      expect(bare.renderDocument()).toBe('just text\n$$x$$\n');
    });

    it('should leave the note unchanged when strict detection fails', () => {
      const strict = new BlockManager(createDefaultRegistry(), { detection: { strict: true } });
      strict.parseDocument('Intro\n');

      expect(() => strict.parseDocument('#+BEGIN_SRC\nx=1\n')).toThrow(UnterminatedBlockError);
      expect(strict.blockCount).toBe(1);
      expect(strict.renderDocument()).toBe('Intro\n');
    });
  });

  describe('removeBlock', () => {
    it('should shift later blocks back by the removed line count', () => {
      manager.parseDocument(THREE_BLOCKS);
      const removed = manager.removeBlock(1);

      expect(removed.syntax).toEqual(code('js'));
      expect(manager.blockCount).toBe(2);
      expect(manager.block(1).lineRange).toEqual({ start: 6, end: 9 });
      expect(manager.dirtyIndices()).toEqual([]);
      expect(manager.renderDocument()).toBe('# A\none\ntwo\nthree\nfour\n$$\na\nb\n$$\n');
    });

    it('should reject an invalid index without changes', () => {
      manager.parseDocument(THREE_BLOCKS);

      expect(() => manager.removeBlock(3)).toThrow(IndexOutOfRangeError);
      expect(() => manager.removeBlock(-1)).toThrow('Block index -1 out of range (0..3)');
      expect(manager.blockCount).toBe(3);
    });
  });

  describe('insertBlock', () => {
    it('should parse the new block and shift later blocks by its line count', () => {
      manager.parseDocument(THREE_BLOCKS);
      const before = manager.note.getBlocks().map(b => b.ast);

      const inserted = manager.insertBlock(1, ORG, '#+BEGIN_QUOTE\nq\n#+END_QUOTE');

      expect(inserted.rawText).toBe('#+BEGIN_QUOTE\nq\n#+END_QUOTE\n');
      expect(inserted.lineRange).toEqual({ start: 6, end: 8 });
      expect(inserted.dirty).toBe(false);
      expect(inserted.ast?.kind).toBe('org');
      expect(manager.note.getBlocks().map(b => b.lineRange)).toEqual([
        { start: 1, end: 5 },
        { start: 6, end: 8 },
        { start: 9, end: 11 },
        { start: 12, end: 15 },
      ]);
      expect(manager.block(0).ast).toBe(before[0]);
      expect(manager.block(2).ast).toBe(before[1]);
      expect(manager.block(3).ast).toBe(before[2]);
      expect(manager.dirtyIndices()).toEqual([]);
    });

    it('should append at index equal to the block count', () => {
      manager.parseDocument(THREE_BLOCKS);
      const appended = manager.insertBlock(3, MARKDOWN, 'The end\n');

      expect(appended.lineRange).toEqual({ start: 13, end: 13 });
      expect(manager.renderDocument()).toBe(`${THREE_BLOCKS}The end\n`);
    });

    it('should terminate an unterminated last block when appending after it', () => {
      manager.parseDocument('Hello');
      manager.insertBlock(1, LATEX, '$$y$$');

      expect(manager.block(0).rawText).toBe('Hello\n');
      expect(manager.block(0).dirty).toBe(false);
      expect(manager.block(1).lineRange).toEqual({ start: 2, end: 2 });
      expect(manager.renderDocument()).toBe('Hello\n$$y$$');
    });

    it('should reject an out-of-range index or empty text', () => {
      manager.parseDocument(THREE_BLOCKS);

      expect(() => manager.insertBlock(5, MARKDOWN, 'x')).toThrow('Block index 5 out of range (0..=3)');
      expect(() => manager.insertBlock(0, MARKDOWN, '')).toThrow(BlockTextError);
      expect(manager.blockCount).toBe(3);
    });

    it('should resolve unknown syntax through canHandle', () => {
      manager.parseDocument(THREE_BLOCKS);
      const block = manager.insertBlock(0, custom('mermaid'), 'graph TD\n');

      expect(isSyntax(block, custom('mermaid'))).toBe(true);
      expect(block.ast?.kind).toBe('markdown');
      expect(manager.renderBlock(0)).toBe('graph TD\n');
    });
  });

  describe('updateBlockText', () => {
    it('should mark only the edited block dirty and shift later blocks', () => {
      manager.parseDocument(THREE_BLOCKS);
      const before = manager.note.getBlocks().map(b => b.ast);

      const block = manager.updateBlockText(0, '# A\nshort\n');

      expect(block.dirty).toBe(true);
      expect(block.lineRange).toEqual({ start: 1, end: 2 });
      expect(block.ast).toBe(before[0]);
      expect(block.metadata.headingLevel).toBe(1);
      expect(manager.dirtyIndices()).toEqual([0]);
      expect(manager.block(1).lineRange).toEqual({ start: 3, end: 5 });
      expect(manager.block(2).lineRange).toEqual({ start: 6, end: 9 });
      expect(manager.block(1).ast).toBe(before[1]);
      expect(manager.renderDocument()).toBe('# A\nshort\n```js\nx\n```\n$$\na\nb\n$$\n');
    });

    it('should add a line terminator to a block that is not last', () => {
      manager.parseDocument(THREE_BLOCKS);
      manager.updateBlockText(1, '```js\ny\n```');

      expect(manager.block(1).rawText).toBe('```js\ny\n```\n');
      expect(manager.block(2).lineRange).toEqual({ start: 9, end: 12 });
    });

    it('should reject empty text', () => {
      manager.parseDocument(THREE_BLOCKS);

      expect(() => manager.updateBlockText(0, '')).toThrow(BlockTextError);
      expect(manager.dirtyIndices()).toEqual([]);
    });
  });

  describe('reparse', () => {
    it('should resynchronize dirty blocks', () => {
      manager.parseDocument(THREE_BLOCKS);
      manager.updateBlockText(0, '## B\n');

      expect(manager.reparseDirty()).toEqual([0]);
      expect(manager.block(0).dirty).toBe(false);
      expect(manager.block(0).metadata.headingLevel).toBe(2);
      expect(manager.dirtyIndices()).toEqual([]);
    });

    it('should record a failure and keep text and range', () => {
      manager.parseDocument(THREE_BLOCKS);
      manager.updateBlockText(2, '$$\nunclosed\n');
      const block = manager.reparseBlock(2);

      expect(block.ast).toBeNull();
      expect(block.dirty).toBe(false);
      expect(block.lineRange).toEqual({ start: 9, end: 10 });
      expect(block.parseError?.message).toBe('Syntax error at line 9: Math opened with $$ is never closed with $$');
      expect(manager.parseFailures().map(f => f.index)).toEqual([2]);
    });

    it('should not change syntax on reparse', () => {
      manager.parseDocument(THREE_BLOCKS);
      manager.updateBlockText(0, '```py\nx\n```\n');
      manager.reparseBlock(0);

      expect(manager.block(0).syntax).toEqual(MARKDOWN);
      expect(manager.block(0).ast?.kind).toBe('markdown');
    });

    it('should reject an out-of-range index', () => {
      manager.parseDocument(THREE_BLOCKS);

      expect(() => manager.reparseBlock(3)).toThrow('Block index 3 out of range (0..3)');
    });
  });

  describe('redetectBlock', () => {
    it('should split a block whose edit introduced a new syntax', () => {
      manager.parseDocument('Intro text\n$$x$$\n');
      manager.updateBlockText(0, 'Intro text\n```python\nprint(1)\n```\n');

      expect(manager.block(1).lineRange).toEqual({ start: 5, end: 5 });
      expect(manager.redetectBlock(0)).toBe(2);

      const blocks = manager.note.getBlocks();
      expect(blocks.map(b => b.syntax)).toEqual([MARKDOWN, code('python'), LATEX]);
      expect(blocks.map(b => b.lineRange)).toEqual([
        { start: 1, end: 1 },
        { start: 2, end: 4 },
        { start: 5, end: 5 },
      ]);
      expect(blocks.every(b => !b.dirty)).toBe(true);
      expect(manager.note.hasContiguousRanges()).toBe(true);
      expect(manager.renderDocument()).toBe('Intro text\n```python\nprint(1)\n```\n$$x$$\n');
    });
  });

  describe('recoveryNotices', () => {
    it('should follow edits instead of the text the note was parsed from', () => {
      const report = manager.parseDocument('Intro\n$$\nx\n');
      expect(report.notices).toHaveLength(1);

      manager.updateBlockText(1, '$$\nx\n$$\n');
      expect(manager.recoveryNotices()).toEqual([]);

      manager.insertBlock(2, LATEX, '\\[\ny\n');
      expect(manager.recoveryNotices().map(n => [n.openedAt, n.expected])).toEqual([[5, '\\]']]);
    });

    it('should not throw under strict detection', () => {
      const strict = new BlockManager(createDefaultRegistry(), { detection: { strict: true } });
      strict.parseDocument('Text\n');
      strict.insertBlock(1, ORG, '#+BEGIN_SRC\nx\n');

      expect(strict.recoveryNotices()).toEqual([
        {
          kind: 'unterminated-block',
          syntax: ORG,
          openedAt: 2,
          expected: '#+END_SRC',
          message: 'Unterminated Org-mode block opened at line 2 (expected #+END_SRC); extended to end of document',
        },
      ]);
    });
  });

  describe('metadata', () => {
    it('should patch metadata and mark the block dirty', () => {
      manager.parseDocument(THREE_BLOCKS);
      const block = manager.patchMetadata(0, { todoState: 'DONE', properties: { owner: 'sam' } });

      expect(block.dirty).toBe(true);
      expect(block.metadata.properties.get('owner')).toBe('sam');
      expect(manager.findTodoItems('DONE').map(r => r.index)).toEqual([0]);

      manager.patchMetadata(0, { todoState: null, properties: { owner: null } });
      expect(block.metadata.todoState).toBeUndefined();
      expect(block.metadata.properties.has('owner')).toBe(false);
    });

    it('should reject a heading level that is not a positive integer', () => {
      manager.parseDocument(THREE_BLOCKS);
      const before = { ...manager.block(0).metadata };

      expect(() => manager.patchMetadata(0, { headingLevel: 0 })).toThrow(MetadataError);
      expect(() => manager.patchMetadata(0, { headingLevel: -2, id: 'x' })).toThrow(
        'Heading level must be a positive integer, got -2'
      );
      expect(() => manager.patchMetadata(0, { headingLevel: 1.5 })).toThrow(MetadataError);
      expect(manager.block(0).metadata).toEqual(before);
      expect(manager.block(0).dirty).toBe(false);

      expect(manager.patchMetadata(0, { headingLevel: 3 }).metadata.headingLevel).toBe(3);
    });

    it('should find headings by level', () => {
      const split = new BlockManager(createDefaultRegistry(), { detection: { paragraphBreaks: true } });
      split.parseDocument('# One\n\n## Two\n\nText\n');

      expect(split.findHeadings().map(r => r.index)).toEqual([0, 1]);
      expect(split.findHeadings(2).map(r => r.index)).toEqual([1]);
      expect(split.queryBlocks(b => b.metadata.headingLevel === undefined).map(r => r.index)).toEqual([2]);
    });
  });
});
