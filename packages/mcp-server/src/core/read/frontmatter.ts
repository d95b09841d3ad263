/**
 * YAML frontmatter handling
 *
 * Frontmatter is kept out of the block document: the note body handed to the
 * detector starts after the closing `---`, and the original prefix is written
 * back unchanged on save.
 */

import matter from 'gray-matter';
import { countLines } from '@hybridnote/core';
import { serverLog } from '../shared/serverLog.js';

export interface SplitNote {
  /** Frontmatter text exactly as in the file, delimiters included ('' if none) */
  prefix: string;
  frontmatter: Record<string, unknown>;
  body: string;
  /** Lines taken by the prefix; add to block lines for file lines */
  lineOffset: number;
}

const CLOSING_DELIMITER = /\r?\n(?:---|\.\.\.)[ \t]*(?:\r?\n)?$/;

export function splitFrontmatter(text: string, source = 'note'): SplitNote {
  if (!text.startsWith('---')) {
    return { prefix: '', frontmatter: {}, body: text, lineOffset: 0 };
  }

  try {
    const parsed = matter(text);
    const data: Record<string, unknown> = parsed.data;
    const body = parsed.content;
    const prefix = text.endsWith(body) ? text.slice(0, text.length - body.length) : '';
    if (prefix === '' || !CLOSING_DELIMITER.test(prefix)) {
      return { prefix: '', frontmatter: {}, body: text, lineOffset: 0 };
    }
    return { prefix, frontmatter: data, body, lineOffset: countLines(prefix) };
  } catch (err) {
    // Malformed frontmatter - treat entire file as content
    serverLog('vault', `Malformed frontmatter in ${source}: ${err instanceof Error ? err.message : String(err)}`, 'warn');
    return { prefix: '', frontmatter: {}, body: text, lineOffset: 0 };
  }
}

export function extractAliases(frontmatter: Record<string, unknown>): string[] {
  const aliases = frontmatter.aliases;
  if (Array.isArray(aliases)) {
    return aliases.filter((a): a is string => typeof a === 'string');
  }
  if (typeof aliases === 'string') {
    return [aliases];
  }
  return [];
}

export function extractTitle(frontmatter: Record<string, unknown>, notePath: string): string {
  if (typeof frontmatter.title === 'string' && frontmatter.title.trim() !== '') {
    return frontmatter.title.trim();
  }
  const fileName = notePath.split('/').pop() || notePath;
  return fileName.replace(/\.[^.]+$/, '');
}
