import { extractAliases, extractTitle, splitFrontmatter } from '../read/frontmatter.js';
import type { NoteRecord } from './types.js';

export function toNoteRecord(id: string, text: string, modified: Date): NoteRecord {
  const { frontmatter } = splitFrontmatter(text, id);
  return {
    id,
    title: extractTitle(frontmatter, id),
    aliases: extractAliases(frontmatter),
    text,
    modified,
  };
}
