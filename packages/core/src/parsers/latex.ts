/**
 * LaTeX display-math parser
 *
 * Accepts `$$ ... $$` and `\[ ... \]`, on one line or across several.
 * Text without a complete delimiter pair is rejected.
 */

import { ParseError } from '../errors.js';
import { splitLines } from '../lines.js';
import type { ParsedBlock, Parser } from '../parser.js';
import { LATEX, type SyntaxKind } from '../syntax.js';
import { emptyMetadata, type BlockAst, type MathAst } from '../types.js';
import { renderSource } from './source.js';

const LABEL_REGEX = /\\label\{([^}]+)\}/;

const DELIMITERS = {
  '$$': '$$',
  '\\[': '\\]',
} as const;

type Delimiter = keyof typeof DELIMITERS;

/**
 * Math opens on the first line carrying a delimiter. On that line `$$`
 * wins over `\[`, the same precedence the detector applies.
 */
function firstDelimiter(text: string): { delimiter: Delimiter; at: number } | null {
  let offset = 0;
  for (const line of text.split('\n')) {
    const dollars = line.indexOf('$$');
    if (dollars >= 0) {
      return { delimiter: '$$', at: offset + dollars };
    }
    const bracket = line.indexOf('\\[');
    if (bracket >= 0) {
      return { delimiter: '\\[', at: offset + bracket };
    }
    offset += line.length + 1;
  }
  return null;
}

function lineOf(text: string, at: number): number {
  return text.slice(0, at).split('\n').length - 1;
}

export function extractMath(rawText: string, lineOffset: number): Pick<MathAst, 'delimiter' | 'content'> {
  const open = firstDelimiter(rawText);
  if (!open) {
    throw new ParseError('No display math delimiters ($$ or \\[) found', lineOffset);
  }

  const closer = DELIMITERS[open.delimiter];
  const from = open.at + open.delimiter.length;
  const close = rawText.indexOf(closer, from);
  if (close < 0) {
    throw new ParseError(`Math opened with ${open.delimiter} is never closed with ${closer}`, lineOffset + lineOf(rawText, open.at));
  }

  return { delimiter: open.delimiter, content: rawText.slice(from, close).trim() };
}

export class LatexParser implements Parser {
  syntaxKind(): SyntaxKind {
    return LATEX;
  }

  canHandle(text: string): boolean {
    const trimmed = text.trimStart();
    return trimmed.startsWith('$$') || trimmed.startsWith('\\[');
  }

  parse(rawText: string, lineOffset: number): ParsedBlock {
    const { delimiter, content } = extractMath(rawText, lineOffset);
    const { lines, terminated } = splitLines(rawText);

    const metadata = emptyMetadata();
    const label = content.match(LABEL_REGEX);
    if (label) {
      metadata.id = label[1];
    }

    return {
      ast: { kind: 'math', delimiter, sources: lines, content, terminated },
      metadata,
    };
  }

  render(ast: BlockAst): string {
    return renderSource(ast);
  }
}
