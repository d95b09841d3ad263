/**
 * Vault scanner - finds all note files under the vault root
 */

import * as fs from 'fs';
import * as path from 'path';
import { serverLog } from '../shared/serverLog.js';

/** Directories to exclude from scanning */
export const EXCLUDED_DIRS = new Set([
  '.hybridnote',
  '.obsidian',
  '.trash',
  '.git',
  'node_modules',
]);

export const DEFAULT_NOTE_EXTENSIONS = ['.md', '.org', '.tex', '.txt'];

/** File info returned by the scanner */
export interface VaultFile {
  path: string;        // Relative path from vault root, forward slashes
  absolutePath: string;
  modified: Date;
}

export function hasNoteExtension(fileName: string, extensions: readonly string[]): boolean {
  const ext = path.extname(fileName).toLowerCase();
  return ext !== '' && extensions.includes(ext);
}

/**
 * Recursively scan a vault directory for note files
 */
export async function scanVault(
  vaultPath: string,
  extensions: readonly string[] = DEFAULT_NOTE_EXTENSIONS
): Promise<VaultFile[]> {
  const files: VaultFile[] = [];

  async function scan(dir: string, relativePath: string = ''): Promise<void> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (err) {
      // Skip directories we can't read (permissions, invalid paths, etc.)
      serverLog('vault', `Could not read directory ${dir}: ${err instanceof Error ? err.message : String(err)}`, 'warn');
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      const relPath = relativePath ? `${relativePath}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        if (EXCLUDED_DIRS.has(entry.name)) {
          continue;
        }
        await scan(fullPath, relPath);
      } else if (entry.isFile() && hasNoteExtension(entry.name, extensions)) {
        try {
          const stats = await fs.promises.stat(fullPath);
          files.push({
            path: relPath,
            absolutePath: fullPath,
            modified: stats.mtime,
          });
        } catch (err) {
          serverLog('vault', `Could not stat ${relPath}: ${err instanceof Error ? err.message : String(err)}`, 'warn');
        }
      }
    }
  }

  await scan(vaultPath);
  files.sort((a, b) => a.path.localeCompare(b.path));
  return files;
}
