/**
 * Line arithmetic shared by the detector, parsers and manager.
 *
 * Lines are separated by `\n`. A trailing `\n` terminates the last line
 * rather than opening an empty one; `\r` stays part of the line text so
 * CRLF documents reassemble byte for byte.
 */

export interface SplitText {
  lines: string[];
  /** Whether the text ended with `\n` */
  terminated: boolean;
}

export function splitLines(text: string): SplitText {
  if (text.length === 0) {
    return { lines: [], terminated: false };
  }
  const lines = text.split('\n');
  const terminated = text.endsWith('\n');
  if (terminated) {
    lines.pop();
  }
  return { lines, terminated };
}

export function joinLines(lines: readonly string[], terminated: boolean): string {
  if (lines.length === 0) return '';
  return lines.join('\n') + (terminated ? '\n' : '');
}

export function countLines(text: string): number {
  return splitLines(text).lines.length;
}

export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}
