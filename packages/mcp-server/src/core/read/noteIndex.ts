/**
 * Note index - outlinks, backlinks, tags and link-target resolution
 *
 * Built from block documents, so link and tag positions are file lines and
 * non-prose blocks are never indexed.
 */

import { BlockManager, type DetectionConfig, type ParserRegistry } from '@hybridnote/core';
import { splitFrontmatter } from './frontmatter.js';
import { extractNoteLinks, type OutLink } from './links.js';
import type { NoteRecord, NotesRepository } from '../repo/types.js';
import type { OpenNote } from '../workspace.js';
import { serverLog } from '../shared/serverLog.js';

export interface IndexedNote {
  id: string;
  title: string;
  aliases: string[];
  outlinks: OutLink[];
  tags: string[];
  modified: Date;
}

/** A note that links to another note */
export interface Backlink {
  source: string;
  line: number;
  blockIndex: number;
  heading?: string;
}

export interface NoteIndex {
  notes: Map<string, IndexedNote>;           // id -> note
  backlinks: Map<string, Backlink[]>;        // normalized target -> backlinks
  entities: Map<string, string>;             // lowercase title/alias/path -> id
  tags: Map<string, Set<string>>;            // tag -> note ids
  builtAt: Date;
}

const NOTE_EXTENSION_REGEX = /\.(md|org|tex|txt)$/;

/**
 * Normalize a link target or note id to a matchable key
 * - Lowercase
 * - Remove note extension
 */
export function normalizeTarget(target: string): string {
  return target.trim().toLowerCase().replace(NOTE_EXTENSION_REGEX, '');
}

export function emptyNoteIndex(): NoteIndex {
  return {
    notes: new Map(),
    backlinks: new Map(),
    entities: new Map(),
    tags: new Map(),
    builtAt: new Date(),
  };
}

/**
 * Parse a stored note and extract its links
 *
 * @throws UnterminatedBlockError in strict detection mode
 */
export function indexRecord(
  record: NoteRecord,
  registry: ParserRegistry,
  detection: Partial<DetectionConfig> = {}
): IndexedNote {
  const { frontmatter, body, lineOffset } = splitFrontmatter(record.text, record.id);
  const manager = new BlockManager(registry, { id: record.id, title: record.title, detection });
  manager.parseDocument(body);

  const { outlinks, tags } = extractNoteLinks(manager.note, lineOffset, frontmatter);
  return {
    id: record.id,
    title: record.title,
    aliases: record.aliases,
    outlinks,
    tags,
    modified: record.modified,
  };
}

/** Index an open note from its current, possibly unsaved, blocks */
export function indexOpenNote(open: OpenNote, aliases: string[] = []): IndexedNote {
  const { outlinks, tags } = extractNoteLinks(open.manager.note, open.lineOffset, open.frontmatter);
  return {
    id: open.id,
    title: open.title,
    aliases,
    outlinks,
    tags,
    modified: new Date(),
  };
}

/**
 * Derive entities, backlinks and tags from a set of indexed notes
 */
export function assembleIndex(notes: Iterable<IndexedNote>): NoteIndex {
  const index = emptyNoteIndex();
  for (const note of notes) {
    index.notes.set(note.id, note);
  }

  // Titles and aliases never shadow an earlier claim; paths always win
  for (const note of index.notes.values()) {
    const title = normalizeTarget(note.title);
    if (!index.entities.has(title)) {
      index.entities.set(title, note.id);
    }

    index.entities.set(normalizeTarget(note.id), note.id);

    for (const alias of note.aliases) {
      const normalizedAlias = normalizeTarget(alias);
      if (!index.entities.has(normalizedAlias)) {
        index.entities.set(normalizedAlias, note.id);
      }
    }
  }

  for (const note of index.notes.values()) {
    for (const link of note.outlinks) {
      const normalized = normalizeTarget(link.target);
      const targetId = index.entities.get(normalized);
      const key = targetId ? normalizeTarget(targetId) : normalized;

      const list = index.backlinks.get(key) ?? [];
      list.push({
        source: note.id,
        line: link.line,
        blockIndex: link.blockIndex,
        ...(link.heading ? { heading: link.heading } : {}),
      });
      index.backlinks.set(key, list);
    }

    for (const tag of note.tags) {
      const ids = index.tags.get(tag) ?? new Set<string>();
      ids.add(note.id);
      index.tags.set(tag, ids);
    }
  }

  return index;
}

/**
 * Build the index over every note in the repository. A note that fails to
 * parse is logged and indexed without links.
 */
export async function buildNoteIndex(
  repo: NotesRepository,
  registry: ParserRegistry,
  detection: Partial<DetectionConfig> = {}
): Promise<NoteIndex> {
  const startTime = Date.now();
  const records = await repo.list();
  const notes: IndexedNote[] = [];

  for (const record of records) {
    try {
      notes.push(indexRecord(record, registry, detection));
    } catch (err) {
      serverLog('index', `Could not index ${record.id}: ${err instanceof Error ? err.message : String(err)}`, 'warn');
      notes.push({
        id: record.id,
        title: record.title,
        aliases: record.aliases,
        outlinks: [],
        tags: [],
        modified: record.modified,
      });
    }
  }

  const index = assembleIndex(notes);
  serverLog(
    'index',
    `Index built in ${Date.now() - startTime}ms: ${index.notes.size} notes, ${index.entities.size} entities, ${index.backlinks.size} link targets, ${index.tags.size} tags`
  );
  return index;
}

/** Replace one note's entry and re-derive the index */
export function upsertIndexedNote(index: NoteIndex, note: IndexedNote): NoteIndex {
  const notes = new Map(index.notes);
  notes.set(note.id, note);
  return assembleIndex(notes.values());
}

export function removeIndexedNote(index: NoteIndex, id: string): NoteIndex {
  if (!index.notes.has(id)) return index;
  const notes = new Map(index.notes);
  notes.delete(id);
  return assembleIndex(notes.values());
}

/**
 * Resolve a link target to a note id
 * Returns undefined if the target doesn't match any note
 */
export function resolveTarget(index: NoteIndex, target: string): string | undefined {
  return index.entities.get(normalizeTarget(target));
}

/**
 * Backlinks for a note id, title or alias
 */
export function getBacklinks(index: NoteIndex, note: string): Backlink[] {
  const id = resolveTarget(index, note);
  const key = normalizeTarget(id ?? note);
  return index.backlinks.get(key) ?? [];
}

export function findByTag(index: NoteIndex, tag: string): string[] {
  const ids = index.tags.get(tag.replace(/^#/, ''));
  return ids ? Array.from(ids).sort((a, b) => a.localeCompare(b)) : [];
}
