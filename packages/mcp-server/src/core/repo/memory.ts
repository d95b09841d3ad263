/**
 * In-process repository, used by tests and by hosts that embed the server
 */

import { VaultError } from '../errors.js';
import { toNoteRecord } from './record.js';
import type { NoteRecord, NotesRepository } from './types.js';

export class MemoryNotesRepository implements NotesRepository {
  private readonly notes = new Map<string, { text: string; modified: Date }>();

  constructor(initial: Record<string, string> = {}) {
    for (const [id, text] of Object.entries(initial)) {
      this.notes.set(this.check(id), { text, modified: new Date() });
    }
  }

  async list(): Promise<NoteRecord[]> {
    return [...this.notes.keys()]
      .sort((a, b) => a.localeCompare(b))
      .map(id => this.record(id))
      .filter((r): r is NoteRecord => r !== null);
  }

  async read(id: string): Promise<NoteRecord | null> {
    return this.record(id);
  }

  async write(id: string, text: string): Promise<NoteRecord> {
    const modified = new Date();
    this.notes.set(this.check(id), { text, modified });
    return toNoteRecord(id, text, modified);
  }

  async delete(id: string): Promise<boolean> {
    return this.notes.delete(id);
  }

  private record(id: string): NoteRecord | null {
    const entry = this.notes.get(id);
    return entry ? toNoteRecord(id, entry.text, entry.modified) : null;
  }

  private check(id: string): string {
    if (id.length === 0 || id.startsWith('/') || id.split('/').includes('..')) {
      throw new VaultError('INVALID_PATH', id, `Invalid path: ${id}`);
    }
    return id;
  }
}
