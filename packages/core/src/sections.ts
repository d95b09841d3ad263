/**
 * Section tree - heading blocks and the blocks under them, nested by level
 */

import type { HybridNote } from './note.js';
import type { HybridBlock } from './types.js';

export interface Section {
  /** Index of the heading block */
  index: number;
  level: number;
  title: string;
  /** Last block index covered by this section, subsections included */
  endIndex: number;
  lineStart: number;
  lineEnd: number;
  subsections: Section[];
}

export interface SectionTree {
  /** Block indices before the first heading */
  preamble: number[];
  sections: Section[];
}

/**
 * Display title of a heading block, from its AST when parsed
 */
export function headingTitle(block: HybridBlock): string {
  const ast = block.ast;
  if (ast?.kind === 'markdown') {
    const heading = ast.nodes.find(n => n.type === 'heading');
    if (heading?.type === 'heading') return heading.text;
  }
  if (ast?.kind === 'org') {
    const headline = ast.nodes.find(n => n.type === 'headline');
    if (headline?.type === 'headline') return headline.title;
  }
  const firstLine = block.rawText.split('\n')[0] ?? '';
  return firstLine.trim();
}

export function buildSectionTree(note: HybridNote): SectionTree {
  const blocks = note.getBlocks();
  const preamble: number[] = [];
  const sections: Section[] = [];
  const stack: Section[] = [];

  blocks.forEach((block, index) => {
    const level = block.metadata.headingLevel;

    if (level === undefined) {
      if (stack.length === 0) {
        preamble.push(index);
      }
      for (const open of stack) {
        open.endIndex = index;
        open.lineEnd = block.lineRange.end;
      }
      return;
    }

    // Lower level number = higher in hierarchy
    while (stack.length > 0 && stack[stack.length - 1].level >= level) {
      stack.pop();
    }

    const section: Section = {
      index,
      level,
      title: headingTitle(block),
      endIndex: index,
      lineStart: block.lineRange.start,
      lineEnd: block.lineRange.end,
      subsections: [],
    };

    for (const open of stack) {
      open.endIndex = index;
      open.lineEnd = block.lineRange.end;
    }

    if (stack.length === 0) {
      sections.push(section);
    } else {
      stack[stack.length - 1].subsections.push(section);
    }

    stack.push(section);
  });

  return { preamble, sections };
}
