/**
 * Block detector - partitions raw document text into typed segments
 *
 * One left-to-right pass over lines with a small state machine:
 *
 * - default: prose. Runs of lines become Markdown segments.
 * - org:     inside `#+BEGIN_<name>` until the matching `#+END_<name>`
 * - fence:   inside a backtick fence until a bare run of at least as many backticks
 * - latex:   inside `$$` or `\[` until the next `$$` / `\]`
 *
 * A line with two `$$` opens and closes on the same line. Markers met inside
 * a special block are literal content of that block. Reaching the end of the
 * document inside a special block flushes it to EOF with a recovery notice
 * (or throws in strict mode), so every line lands in exactly one segment.
 */

import { DEFAULT_DETECTION_CONFIG, type DetectionConfig } from './config.js';
import { UnterminatedBlockError } from './errors.js';
import { isBlankLine, joinLines, splitLines } from './lines.js';
import { coreLog } from './logging.js';
import { LATEX, MARKDOWN, ORG, code, syntaxName, type SyntaxKind } from './syntax.js';
import type { DetectionRecoveryNotice, RawSegment } from './types.js';

export const CODE_FENCE = '```';

const FENCE_REGEX = /^(`{3,})(.*)$/;
const FENCE_CLOSER_REGEX = /^`{3,}$/;
const ORG_BEGIN_REGEX = /^#\+BEGIN_(\S+)/i;
const ORG_END_REGEX = /^#\+END_(\S+)/i;

type DetectorState =
  | { mode: 'default' }
  | { mode: 'org'; name: string; start: number }
  | { mode: 'fence'; fence: string; language: string; start: number }
  | { mode: 'latex'; closer: '$$' | '\\]'; start: number };

type Opener =
  | { type: 'org'; name: string }
  | { type: 'fence'; fence: string; language: string }
  | { type: 'latex'; closer: '$$' | '\\]' }
  | { type: 'latex-line' };

type OpenState = Exclude<DetectorState, { mode: 'default' }>;

function describeOpenState(state: OpenState): { syntax: SyntaxKind; expected: string } {
  switch (state.mode) {
    case 'org':
      return { syntax: ORG, expected: `#+END_${state.name}` };
    case 'fence':
      return { syntax: code(state.language), expected: state.fence };
    case 'latex':
      return { syntax: LATEX, expected: state.closer };
  }
}

function countDollarPairs(line: string): number {
  return line.split('$$').length - 1;
}

/** The opening backtick run of a fence line, or null */
export function fenceOf(line: string): string | null {
  const match = line.trim().match(FENCE_REGEX);
  return match ? match[1] : null;
}

/** A bare backtick run at least as long as the one that opened the fence */
export function closesFence(line: string, fence: string): boolean {
  const trimmed = line.trim();
  return FENCE_CLOSER_REGEX.test(trimmed) && trimmed.length >= fence.length;
}

/** `#+END_<name>` for the named block; anything after the name is ignored */
export function closesOrg(line: string, name: string): boolean {
  const match = line.trimStart().match(ORG_END_REGEX);
  return match !== null && match[1].toUpperCase() === name.toUpperCase();
}

/**
 * Classify a default-state line as a special-block opener
 */
export function matchOpener(line: string): Opener | null {
  const org = line.trimStart().match(ORG_BEGIN_REGEX);
  if (org) {
    return { type: 'org', name: org[1] };
  }

  const trimmed = line.trim();
  const fence = trimmed.match(FENCE_REGEX);
  if (fence) {
    const language = fence[2].trim().split(/\s+/)[0] ?? '';
    return { type: 'fence', fence: fence[1], language };
  }

  const pairs = countDollarPairs(line);
  if (pairs >= 2) {
    return { type: 'latex-line' };
  }
  if (pairs === 1) {
    return { type: 'latex', closer: '$$' };
  }
  if (trimmed === '\\[') {
    return { type: 'latex', closer: '\\]' };
  }

  return null;
}

function closesLatex(line: string, closer: '$$' | '\\]'): boolean {
  return closer === '$$' ? line.includes('$$') : line.trim() === '\\]';
}

export class BlockDetector {
  readonly config: DetectionConfig;

  constructor(config: Partial<DetectionConfig> = {}) {
    this.config = { ...DEFAULT_DETECTION_CONFIG, ...config };
  }

  /**
   * Partition `text` into ordered, gap-free segments
   *
   * @throws UnterminatedBlockError in strict mode only
   */
  scan(text: string): RawSegment[] {
    const { lines, terminated } = splitLines(text);
    const segments: RawSegment[] = [];
    const lastIndex = lines.length - 1;

    let state: DetectorState = { mode: 'default' };

    // Current Markdown run (0-based start, -1 when none)
    let runStart = -1;
    let runHasText = false;
    let runHasBlankTail = false;

    const emit = (syntax: SyntaxKind, from: number, to: number, notice?: DetectionRecoveryNotice): void => {
      const segment: RawSegment = {
        syntax,
        lineRange: { start: from + 1, end: to + 1 },
        rawText: joinLines(lines.slice(from, to + 1), to === lastIndex ? terminated : true),
      };
      if (notice) {
        segment.notice = notice;
      }
      segments.push(segment);
    };

    const flushRun = (to: number): void => {
      if (runStart >= 0 && to >= runStart) {
        emit(MARKDOWN, runStart, to);
      }
      runStart = -1;
      runHasText = false;
      runHasBlankTail = false;
    };

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];

      switch (state.mode) {
        case 'default': {
          const opener = matchOpener(line);
          if (opener) {
            flushRun(i - 1);
            if (opener.type === 'org') {
              state = { mode: 'org', name: opener.name, start: i };
            } else if (opener.type === 'fence') {
              state = { mode: 'fence', fence: opener.fence, language: opener.language, start: i };
            } else if (opener.type === 'latex') {
              state = { mode: 'latex', closer: opener.closer, start: i };
            } else {
              emit(LATEX, i, i);
            }
            break;
          }

          if (isBlankLine(line)) {
            if (runStart < 0) {
              runStart = i;
            } else if (runHasText) {
              runHasBlankTail = true;
            }
            break;
          }

          if (this.config.paragraphBreaks && runHasText && runHasBlankTail) {
            flushRun(i - 1);
          }
          if (runStart < 0) {
            runStart = i;
          }
          runHasText = true;
          break;
        }

        case 'org':
          if (closesOrg(line, state.name)) {
            emit(ORG, state.start, i);
            state = { mode: 'default' };
          }
          break;

        case 'fence':
          if (closesFence(line, state.fence)) {
            emit(code(state.language), state.start, i);
            state = { mode: 'default' };
          }
          break;

        case 'latex':
          if (closesLatex(line, state.closer)) {
            emit(LATEX, state.start, i);
            state = { mode: 'default' };
          }
          break;
      }
    }

    if (state.mode === 'default') {
      flushRun(lastIndex);
      return segments;
    }

    const notice = this.unterminated(state);
    emit(notice.syntax, state.start, lastIndex, notice);
    return segments;
  }

  private unterminated(state: OpenState): DetectionRecoveryNotice {
    const { syntax, expected } = describeOpenState(state);
    const openedAt = state.start + 1;
    if (this.config.strict) {
      throw new UnterminatedBlockError(openedAt, expected);
    }

    const message = `Unterminated ${syntaxName(syntax)} block opened at line ${openedAt} (expected ${expected}); extended to end of document`;
    coreLog('detector', message, 'warn');
    return { kind: 'unterminated-block', syntax, openedAt, expected, message };
  }
}
