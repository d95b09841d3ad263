/**
 * Test utilities for temporary vaults
 */

import { mkdtemp, writeFile, readFile, rm, mkdir } from 'fs/promises';
import path from 'path';
import os from 'os';

/**
 * Create a temporary vault directory for testing
 * Returns the absolute path to the temp vault
 */
export async function createTempVault(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'hybridnote-test-'));
}

/**
 * Create a test note within the vault
 * @param notePath - Relative path within the vault (e.g., "projects/plan.org")
 */
export async function createTestNote(vaultPath: string, notePath: string, content: string): Promise<void> {
  const fullPath = path.join(vaultPath, notePath);
  await mkdir(path.dirname(fullPath), { recursive: true });
  await writeFile(fullPath, content, 'utf-8');
}

export async function readTestNote(vaultPath: string, notePath: string): Promise<string> {
  return readFile(path.join(vaultPath, notePath), 'utf-8');
}

/**
 * Remove a temporary vault and everything in it
 */
export async function cleanupTempVault(vaultPath: string): Promise<void> {
  await rm(vaultPath, { recursive: true, force: true });
}
