/**
 * Parser contract and registry
 *
 * A parser is implemented once per syntax. The registry decides which
 * parser owns a segment: exact syntax kind first, then the first registered
 * parser whose `canHandle` accepts the text, then the built-in
 * identity parser. Resolution therefore never fails; unknown syntax is not
 * an error.
 */

import { ParserRegistrationError } from './errors.js';
import { coreLog } from './logging.js';
import { custom, syntaxKey, type SyntaxKind } from './syntax.js';
import { emptyMetadata, type BlockAst, type BlockMetadata } from './types.js';

export interface ParsedBlock {
  ast: BlockAst;
  metadata: BlockMetadata;
}

export interface Parser {
  /** Declared identity, unique within a registry */
  syntaxKind(): SyntaxKind;

  /** Cheap structural check, used only for fallback resolution */
  canHandle(text: string): boolean;

  /**
   * Parse a block's raw text. `lineOffset` is the 1-indexed document line
   * of the block's first line, for error reporting.
   *
   * @throws ParseError when the content is malformed for this syntax
   */
  parse(rawText: string, lineOffset: number): ParsedBlock;

  /** Inverse of parse, up to the parser's documented normalization */
  render(ast: BlockAst, metadata: BlockMetadata): string;
}

/**
 * Parser of last resort: keeps text verbatim, extracts nothing
 */
export class IdentityParser implements Parser {
  syntaxKind(): SyntaxKind {
    return custom('identity');
  }

  canHandle(): boolean {
    return true;
  }

  parse(rawText: string): ParsedBlock {
    return { ast: { kind: 'verbatim', text: rawText }, metadata: emptyMetadata() };
  }

  render(ast: BlockAst): string {
    return ast.kind === 'verbatim' ? ast.text : '';
  }
}

export const IDENTITY_PARSER = new IdentityParser();

export class ParserRegistry {
  private readonly byKey = new Map<string, Parser>();
  private readonly ordered: Parser[] = [];

  /**
   * @throws ParserRegistrationError when the syntax kind is already claimed
   */
  register(parser: Parser): this {
    const key = syntaxKey(parser.syntaxKind());
    if (this.byKey.has(key)) {
      throw new ParserRegistrationError(key);
    }
    this.byKey.set(key, parser);
    this.ordered.push(parser);
    coreLog('registry', `Registered parser for ${key}`);
    return this;
  }

  get(syntax: SyntaxKind): Parser | undefined {
    return this.byKey.get(syntaxKey(syntax));
  }

  /**
   * Pick the parser that owns a block of `syntax` with text `rawText`
   */
  resolve(syntax: SyntaxKind, rawText: string): Parser {
    const exact = this.byKey.get(syntaxKey(syntax));
    if (exact) return exact;

    for (const parser of this.ordered) {
      if (parser.canHandle(rawText)) {
        return parser;
      }
    }

    return IDENTITY_PARSER;
  }

  /** Registered kinds in registration order */
  kinds(): SyntaxKind[] {
    return this.ordered.map(p => p.syntaxKind());
  }

  get size(): number {
    return this.ordered.length;
  }
}
