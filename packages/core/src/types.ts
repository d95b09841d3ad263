/**
 * Core types for hybrid notes
 */

import type { ParseError } from './errors.js';
import type { SyntaxKind } from './syntax.js';

/** 1-indexed, inclusive line span */
export interface LineRange {
  start: number;
  end: number;
}

/** Non-fatal: an unterminated special block was closed at end of document */
export interface DetectionRecoveryNotice {
  kind: 'unterminated-block';
  syntax: SyntaxKind;
  openedAt: number;       // 1-indexed line of the opener
  expected: string;       // closing marker that never appeared
  message: string;
}

/** Detector output, consumed within one detection pass */
export interface RawSegment {
  syntax: SyntaxKind;
  lineRange: LineRange;
  rawText: string;
  notice?: DetectionRecoveryNotice;
}

export interface BlockMetadata {
  headingLevel?: number;
  id?: string;
  todoState?: string;
  /** Insertion-ordered */
  properties: Map<string, string>;
}

// ============================================================================
// Per-syntax ASTs
// ============================================================================
// Node `line` fields are 0-based and relative to the block, so a block's AST
// never changes when the block moves within the document.

export type MarkdownNode =
  | { type: 'heading'; line: number; source: string; level: number; text: string }
  | { type: 'task'; line: number; source: string; indent: number; status: string; text: string }
  | { type: 'list-item'; line: number; source: string; indent: number; ordered: boolean; text: string }
  | { type: 'rule'; line: number; source: string }
  | { type: 'blank'; line: number; source: string }
  | { type: 'paragraph'; line: number; source: string; text: string };

export interface MarkdownAst {
  kind: 'markdown';
  nodes: MarkdownNode[];
  /** Whether the block text ended with a line terminator */
  terminated: boolean;
}

export type OrgNode =
  | { type: 'headline'; line: number; source: string; level: number; todo: string | null; title: string; tags: string[] }
  | { type: 'keyword'; line: number; source: string; key: string; value: string }
  | { type: 'drawer'; line: number; sources: string[]; name: string; entries: Array<[string, string]> }
  | { type: 'block'; line: number; sources: string[]; name: string; parameters: string; body: string }
  | { type: 'text'; line: number; source: string };

export interface OrgAst {
  kind: 'org';
  nodes: OrgNode[];
  terminated: boolean;
}

export interface MathAst {
  kind: 'math';
  delimiter: '$$' | '\\[';
  /** Source lines, opener and closer included */
  sources: string[];
  /** Math between the delimiters, trimmed */
  content: string;
  terminated: boolean;
}

export interface CodeAst {
  kind: 'code';
  language: string;
  /** Fence info after the language word */
  info: string;
  opener: string;
  body: string[];
  closer: string | null;
  terminated: boolean;
}

export interface VerbatimAst {
  kind: 'verbatim';
  text: string;
}

/** Structure owned by a plug-in parser */
export interface CustomAst {
  kind: 'custom';
  name: string;
  data: unknown;
}

export type BlockAst = MarkdownAst | OrgAst | MathAst | CodeAst | VerbatimAst | CustomAst;

// ============================================================================
// Blocks
// ============================================================================

export interface HybridBlock {
  syntax: SyntaxKind;
  /** Authoritative source, line terminators included */
  rawText: string;
  /** null when the resolved parser rejected the text */
  ast: BlockAst | null;
  metadata: BlockMetadata;
  lineRange: LineRange;
  /** ast/metadata may not reflect rawText */
  dirty: boolean;
  parseError: ParseError | null;
}

export interface IndexedBlock {
  index: number;
  block: HybridBlock;
}

export type BlockPredicate = (block: HybridBlock, index: number) => boolean;

export function emptyMetadata(): BlockMetadata {
  return { properties: new Map() };
}
