/**
 * JSON views of blocks for tool responses
 *
 * Line numbers in views are file lines: block lines shifted past any
 * frontmatter.
 */

import {
  syntaxKey,
  type BlockAst,
  type HybridBlock,
  type LineRange,
  type Section,
} from '@hybridnote/core';

export interface BlockView {
  index: number;
  syntax: string;
  lineRange: LineRange;
  metadata: {
    headingLevel?: number;
    id?: string;
    todoState?: string;
    properties: Record<string, string>;
  };
  dirty: boolean;
  parsed: boolean;
  parseError: { message: string; line?: number } | null;
  rawText?: string;
  ast?: BlockAst | null;
}

export interface BlockViewOptions {
  lineOffset?: number;
  includeText?: boolean;
  includeAst?: boolean;
}

export function shiftRange(range: LineRange, lineOffset: number): LineRange {
  return { start: range.start + lineOffset, end: range.end + lineOffset };
}

export function blockView(block: HybridBlock, index: number, options: BlockViewOptions = {}): BlockView {
  const { lineOffset = 0, includeText = false, includeAst = false } = options;
  const { headingLevel, id, todoState, properties } = block.metadata;

  const view: BlockView = {
    index,
    syntax: syntaxKey(block.syntax),
    lineRange: shiftRange(block.lineRange, lineOffset),
    metadata: {
      ...(headingLevel !== undefined ? { headingLevel } : {}),
      ...(id !== undefined ? { id } : {}),
      ...(todoState !== undefined ? { todoState } : {}),
      properties: Object.fromEntries(properties),
    },
    dirty: block.dirty,
    parsed: block.ast !== null,
    parseError: block.parseError
      ? {
          message: block.parseError.message,
          ...(block.parseError.line !== undefined ? { line: block.parseError.line + lineOffset } : {}),
        }
      : null,
  };

  if (includeText) view.rawText = block.rawText;
  if (includeAst) view.ast = block.ast;
  return view;
}

export interface SectionView {
  index: number;
  level: number;
  title: string;
  endIndex: number;
  lineStart: number;
  lineEnd: number;
  subsections: SectionView[];
}

export function sectionView(section: Section, lineOffset = 0): SectionView {
  return {
    index: section.index,
    level: section.level,
    title: section.title,
    endIndex: section.endIndex,
    lineStart: section.lineStart + lineOffset,
    lineEnd: section.lineEnd + lineOffset,
    subsections: section.subsections.map(s => sectionView(s, lineOffset)),
  };
}
