/**
 * Error types for hybrid note parsing and editing
 */

export type HybridNoteErrorCode =
  | 'PARSE_ERROR'
  | 'PARSER_REGISTRATION'
  | 'INDEX_OUT_OF_RANGE'
  | 'BLOCK_TEXT'
  | 'INVALID_METADATA'
  | 'UNTERMINATED_BLOCK';

export class HybridNoteError extends Error {
  readonly code: HybridNoteErrorCode;

  constructor(code: HybridNoteErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A parser rejected a block's content. `line` is the absolute
 * 1-indexed document line when the parser knows it.
 */
export class ParseError extends HybridNoteError {
  readonly line?: number;

  constructor(message: string, line?: number, options?: { cause?: unknown }) {
    super('PARSE_ERROR', line !== undefined ? `Syntax error at line ${line}: ${message}` : message, options);
    this.line = line;
  }

  /** Wrap whatever a parser threw so it can be recorded against a block */
  static from(error: unknown): ParseError {
    if (error instanceof ParseError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new ParseError(`Parser failed: ${message}`, undefined, { cause: error });
  }
}

export class ParserRegistrationError extends HybridNoteError {
  readonly syntax: string;

  constructor(syntax: string) {
    super('PARSER_REGISTRATION', `A parser is already registered for syntax "${syntax}"`);
    this.syntax = syntax;
  }
}

export class IndexOutOfRangeError extends HybridNoteError {
  readonly index: number;
  readonly length: number;

  constructor(index: number, length: number, inclusiveEnd = false) {
    const bound = inclusiveEnd ? `0..=${length}` : `0..${length}`;
    super('INDEX_OUT_OF_RANGE', `Block index ${index} out of range (${bound})`);
    this.index = index;
    this.length = length;
  }
}

export class BlockTextError extends HybridNoteError {
  constructor(message: string) {
    super('BLOCK_TEXT', message);
  }
}

export class MetadataError extends HybridNoteError {
  constructor(message: string) {
    super('INVALID_METADATA', message);
  }
}

/** Raised by the detector in strict mode only */
export class UnterminatedBlockError extends HybridNoteError {
  readonly openedAt: number;
  readonly expected: string;

  constructor(openedAt: number, expected: string) {
    super('UNTERMINATED_BLOCK', `Block opened at line ${openedAt} is never closed (expected ${expected})`);
    this.openedAt = openedAt;
    this.expected = expected;
  }
}
