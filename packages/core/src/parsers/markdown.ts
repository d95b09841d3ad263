/**
 * Markdown parser - line-oriented outline extraction
 *
 * Classifies each line as heading, task, list item, rule, blank or paragraph
 * line, keeping its source so render reproduces the block exactly (no
 * normalization). Never rejects input.
 *
 * Metadata:
 * - headingLevel: level of the block's leading heading
 * - todoState: TODO / DONE / CANCELLED of the block's leading task item
 * - id: `{#id}` heading suffix, else the first `^block-id`
 * - properties: `key:: value` inline fields, in order
 */

import { matchOpener } from '../detector.js';
import { isBlankLine, splitLines } from '../lines.js';
import type { ParsedBlock, Parser } from '../parser.js';
import { MARKDOWN, type SyntaxKind } from '../syntax.js';
import { emptyMetadata, type BlockAst, type BlockMetadata, type MarkdownNode } from '../types.js';
import {
  BLOCK_ID_REGEX,
  HEADING_ID_REGEX,
  HEADING_REGEX,
  INLINE_FIELD_REGEX,
  LIST_ITEM_REGEX,
  RULE_REGEX,
  TASK_CHECKBOX_REGEX,
  content,
} from './patterns.js';
import { renderSource } from './source.js';

const TASK_STATES: Record<string, string> = {
  ' ': 'TODO',
  x: 'DONE',
  X: 'DONE',
  '-': 'CANCELLED',
};

function indentWidth(indent: string): number {
  return indent.replace(/\t/g, '  ').length;
}

export function classifyMarkdownLine(source: string, line: number): MarkdownNode {
  const text = content(source);

  if (isBlankLine(text)) {
    return { type: 'blank', line, source };
  }

  const heading = text.match(HEADING_REGEX);
  if (heading) {
    return { type: 'heading', line, source, level: heading[1].length, text: heading[2].trim() };
  }

  if (RULE_REGEX.test(text)) {
    return { type: 'rule', line, source };
  }

  const task = text.match(TASK_CHECKBOX_REGEX);
  if (task) {
    return { type: 'task', line, source, indent: indentWidth(task[1]), status: task[2], text: task[3].trim() };
  }

  const item = text.match(LIST_ITEM_REGEX);
  if (item) {
    return { type: 'list-item', line, source, indent: indentWidth(item[1]), ordered: /\d/.test(item[2]), text: item[3].trim() };
  }

  return { type: 'paragraph', line, source, text: text.trim() };
}

function extractMetadata(nodes: MarkdownNode[]): BlockMetadata {
  const metadata = emptyMetadata();

  const lead = nodes.find(n => n.type !== 'blank');
  if (lead?.type === 'heading') {
    metadata.headingLevel = lead.level;
    const headingId = lead.text.match(HEADING_ID_REGEX);
    if (headingId) {
      metadata.id = headingId[1];
    }
  } else if (lead?.type === 'task') {
    metadata.todoState = TASK_STATES[lead.status];
  }

  for (const node of nodes) {
    const text = content(node.source);

    if (metadata.id === undefined) {
      const blockId = text.match(BLOCK_ID_REGEX);
      if (blockId) {
        metadata.id = blockId[1];
      }
    }

    if (node.type === 'paragraph') {
      const field = text.match(INLINE_FIELD_REGEX);
      if (field) {
        metadata.properties.set(field[1], field[2]);
      }
    }
  }

  return metadata;
}

export class MarkdownParser implements Parser {
  syntaxKind(): SyntaxKind {
    return MARKDOWN;
  }

  canHandle(text: string): boolean {
    const { lines } = splitLines(text);
    const first = lines.find(l => !isBlankLine(l));
    return first !== undefined && matchOpener(first) === null;
  }

  parse(rawText: string, _lineOffset?: number): ParsedBlock {
    const { lines, terminated } = splitLines(rawText);
    const nodes = lines.map((source, i) => classifyMarkdownLine(source, i));
    return {
      ast: { kind: 'markdown', nodes, terminated },
      metadata: extractMetadata(nodes),
    };
  }

  render(ast: BlockAst): string {
    return renderSource(ast);
  }
}
