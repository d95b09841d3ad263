/**
 * Wikilink and tag extraction from block documents
 *
 * Only prose blocks (Markdown and Org) are scanned, so a `[[link]]` or
 * `#tag` inside fenced code or display math never reaches the index.
 */

import type { HybridBlock, HybridNote } from '@hybridnote/core';

/** Matches [[target]], [[target|alias]], [[target#heading]] */
const WIKILINK_REGEX = /\[\[([^\]|#]+)(?:#([^\]|]*))?(?:\|([^\]]+))?\]\]/g;

/** Matches #tag (but not in URLs or hex colors) */
const TAG_REGEX = /(?:^|\s)#([a-zA-Z][a-zA-Z0-9_/-]*)/g;

const INLINE_CODE_REGEX = /`[^`\n]+`/g;

/** Org blocks whose content is not prose */
const ORG_LITERAL_BLOCKS = new Set(['SRC', 'EXAMPLE']);

/** A wikilink extracted from a note */
export interface OutLink {
  target: string;
  heading?: string;
  alias?: string;
  /** 1-indexed file line */
  line: number;
  blockIndex: number;
}

export interface NoteLinks {
  outlinks: OutLink[];
  tags: string[];
}

function isProse(block: HybridBlock): boolean {
  return block.syntax.kind === 'markdown' || block.syntax.kind === 'org';
}

/** Block-relative line numbers (0-based) that hold literal Org content */
function literalLines(block: HybridBlock): Set<number> {
  const lines = new Set<number>();
  if (block.ast?.kind !== 'org') return lines;

  for (const node of block.ast.nodes) {
    if (node.type === 'block' && ORG_LITERAL_BLOCKS.has(node.name.toUpperCase())) {
      for (let i = 0; i < node.sources.length; i++) {
        lines.add(node.line + i);
      }
    }
  }
  return lines;
}

function tagsFromFrontmatter(frontmatter: Record<string, unknown>): string[] {
  const fmTags = frontmatter.tags;
  if (Array.isArray(fmTags)) {
    return fmTags
      .filter((tag): tag is string => typeof tag === 'string')
      .map(tag => tag.replace(/^#/, ''));
  }
  if (typeof fmTags === 'string') {
    return [fmTags.replace(/^#/, '')];
  }
  return [];
}

/**
 * Extract outlinks and tags from a parsed note
 *
 * @param lineOffset - lines before block line 1 in the file (frontmatter)
 */
export function extractNoteLinks(
  note: HybridNote,
  lineOffset = 0,
  frontmatter: Record<string, unknown> = {}
): NoteLinks {
  const outlinks: OutLink[] = [];
  const tags = new Set<string>(tagsFromFrontmatter(frontmatter));

  note.getBlocks().forEach((block, blockIndex) => {
    if (!isProse(block)) return;

    const skip = literalLines(block);
    const lines = block.rawText.split('\n');

    lines.forEach((raw, i) => {
      if (skip.has(i)) return;

      // Blank out inline code, keeping columns
      const line = raw.replace(INLINE_CODE_REGEX, match => ' '.repeat(match.length));
      const fileLine = lineOffset + block.lineRange.start + i;

      WIKILINK_REGEX.lastIndex = 0;
      let match: RegExpExecArray | null;
      while ((match = WIKILINK_REGEX.exec(line)) !== null) {
        const target = match[1].trim();
        if (!target) continue;

        const heading = match[2]?.trim();
        const alias = match[3]?.trim();
        outlinks.push({
          target,
          ...(heading ? { heading } : {}),
          ...(alias ? { alias } : {}),
          line: fileLine,
          blockIndex,
        });
      }

      TAG_REGEX.lastIndex = 0;
      while ((match = TAG_REGEX.exec(line)) !== null) {
        tags.add(match[1]);
      }
    });

    // Org headline tags (:work:urgent:)
    if (block.ast?.kind === 'org') {
      for (const node of block.ast.nodes) {
        if (node.type === 'headline') {
          for (const tag of node.tags) tags.add(tag);
        }
      }
    }
  });

  return { outlinks, tags: Array.from(tags) };
}
