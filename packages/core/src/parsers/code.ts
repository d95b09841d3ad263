/**
 * Fenced code parser
 *
 * One instance per language, or a generic instance (language '') that
 * claims any fenced block through canHandle. A fence without a closer
 * (recovered by the detector at end of document) is accepted with
 * `closer: null`.
 */

import { CODE_FENCE, closesFence, fenceOf } from '../detector.js';
import { ParseError } from '../errors.js';
import { isBlankLine, splitLines } from '../lines.js';
import type { ParsedBlock, Parser } from '../parser.js';
import { code, type SyntaxKind } from '../syntax.js';
import { emptyMetadata, type BlockAst } from '../types.js';
import { content } from './patterns.js';
import { renderSource } from './source.js';

export function parseFenceInfo(opener: string): { language: string; info: string } {
  const line = content(opener).trim();
  const rest = line.slice(fenceOf(line)?.length ?? 0).trim();
  const space = rest.search(/\s/);
  if (space < 0) {
    return { language: rest, info: '' };
  }
  return { language: rest.slice(0, space), info: rest.slice(space).trim() };
}

export class CodeParser implements Parser {
  readonly language: string;

  constructor(language = '') {
    this.language = language;
  }

  syntaxKind(): SyntaxKind {
    return code(this.language);
  }

  canHandle(text: string): boolean {
    const { lines } = splitLines(text);
    const first = lines.find(l => !isBlankLine(l));
    if (first === undefined || fenceOf(first) === null) {
      return false;
    }
    return this.language === '' || parseFenceInfo(first).language === this.language;
  }

  parse(rawText: string, lineOffset: number): ParsedBlock {
    const { lines, terminated } = splitLines(rawText);
    const fence = lines.length > 0 ? fenceOf(lines[0]) : null;
    if (fence === null) {
      throw new ParseError(`Code block must open with ${CODE_FENCE}`, lineOffset);
    }

    const opener = lines[0];
    const last = lines[lines.length - 1];
    const closed = lines.length > 1 && closesFence(last, fence);
    const body = lines.slice(1, closed ? -1 : undefined);
    const { language, info } = parseFenceInfo(opener);

    const metadata = emptyMetadata();
    if (language) {
      metadata.properties.set('language', language);
    }
    if (!closed) {
      metadata.properties.set('unterminated', 'true');
    }

    return {
      ast: { kind: 'code', language, info, opener, body, closer: closed ? last : null, terminated },
      metadata,
    };
  }

  render(ast: BlockAst): string {
    return renderSource(ast);
  }
}
