/**
 * Block accessors
 */

import { countLines } from './lines.js';
import { sameSyntax, type SyntaxKind } from './syntax.js';
import type { HybridBlock } from './types.js';

export function isHeading(block: HybridBlock): boolean {
  return block.metadata.headingLevel !== undefined;
}

export function headingLevel(block: HybridBlock): number | undefined {
  return block.metadata.headingLevel;
}

export function todoState(block: HybridBlock): string | undefined {
  return block.metadata.todoState;
}

/** Open task: TODO state */
export function isTodo(block: HybridBlock): boolean {
  return block.metadata.todoState === 'TODO';
}

export function isDone(block: HybridBlock): boolean {
  return block.metadata.todoState === 'DONE';
}

export function blockId(block: HybridBlock): string | undefined {
  return block.metadata.id;
}

export function getProperty(block: HybridBlock, key: string): string | undefined {
  return block.metadata.properties.get(key);
}

export function lineCount(block: HybridBlock): number {
  return block.lineRange.end - block.lineRange.start + 1;
}

export function isSyntax(block: HybridBlock, syntax: SyntaxKind): boolean {
  return sameSyntax(block.syntax, syntax);
}

/** Lines the raw text actually spans; equals lineCount while ranges are current */
export function textLineCount(block: HybridBlock): number {
  return countLines(block.rawText);
}
