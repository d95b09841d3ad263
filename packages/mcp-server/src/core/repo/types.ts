/**
 * Note repository contract
 *
 * Note ids are vault-relative paths with forward slashes, extension
 * included (`projects/plan.org`).
 */

export interface NoteRecord {
  id: string;
  title: string;
  aliases: string[];
  /** Full file text, frontmatter included */
  text: string;
  modified: Date;
}

export interface NotesRepository {
  /** All notes, ordered by id */
  list(): Promise<NoteRecord[]>;

  /** null when the note does not exist */
  read(id: string): Promise<NoteRecord | null>;

  /** Create or replace a note */
  write(id: string, text: string): Promise<NoteRecord>;

  /** false when there was nothing to delete */
  delete(id: string): Promise<boolean>;
}
