/**
 * Notes stored as files under the vault root
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { VaultError } from '../errors.js';
import { DEFAULT_NOTE_EXTENSIONS, hasNoteExtension, scanVault } from '../read/vault.js';
import { serverLog } from '../shared/serverLog.js';
import { validateNotePath } from '../write/paths.js';
import { toNoteRecord } from './record.js';
import type { NoteRecord, NotesRepository } from './types.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FileNotesRepository implements NotesRepository {
  readonly vaultPath: string;
  readonly extensions: readonly string[];

  constructor(vaultPath: string, extensions: readonly string[] = DEFAULT_NOTE_EXTENSIONS) {
    this.vaultPath = vaultPath;
    this.extensions = extensions;
  }

  async list(): Promise<NoteRecord[]> {
    const files = await scanVault(this.vaultPath, this.extensions);
    const records: NoteRecord[] = [];

    for (const file of files) {
      try {
        const text = await fs.readFile(file.absolutePath, 'utf-8');
        records.push(toNoteRecord(file.path, text, file.modified));
      } catch (err) {
        // Deleted between scan and read
        serverLog('vault', `Could not read ${file.path}: ${err instanceof Error ? err.message : String(err)}`, 'warn');
      }
    }

    return records;
  }

  async read(id: string): Promise<NoteRecord | null> {
    const fullPath = this.resolve(id);
    try {
      const [text, stats] = await Promise.all([
        fs.readFile(fullPath, 'utf-8'),
        fs.stat(fullPath),
      ]);
      return toNoteRecord(id, text, stats.mtime);
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  async write(id: string, text: string): Promise<NoteRecord> {
    const fullPath = this.resolve(id);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, text, 'utf-8');
    const stats = await fs.stat(fullPath);
    serverLog('vault', `Wrote ${id} (${text.length} chars)`);
    return toNoteRecord(id, text, stats.mtime);
  }

  async delete(id: string): Promise<boolean> {
    const fullPath = this.resolve(id);
    try {
      await fs.unlink(fullPath);
      serverLog('vault', `Deleted ${id}`);
      return true;
    } catch (err) {
      if (isMissingFile(err)) return false;
      throw err;
    }
  }

  /**
   * @throws VaultError for paths outside the vault, sensitive files and
   * unsupported extensions
   */
  private resolve(id: string): string {
    const validation = validateNotePath(this.vaultPath, id);
    if (!validation.valid) {
      throw new VaultError('INVALID_PATH', id, `Invalid path: ${id} (${validation.reason ?? 'rejected'})`);
    }
    if (!hasNoteExtension(id, this.extensions)) {
      throw new VaultError(
        'UNSUPPORTED_EXTENSION',
        id,
        `Unsupported note extension: ${id} (expected one of ${this.extensions.join(', ')})`
      );
    }
    return path.join(this.vaultPath, id);
  }
}
