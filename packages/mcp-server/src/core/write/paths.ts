/**
 * Path validation for note reads and writes
 */

import * as path from 'path';

/**
 * Sensitive file patterns that should never be read or written through a tool
 */
const SENSITIVE_PATH_PATTERNS: RegExp[] = [
  // Environment files (including backups and variations)
  /\.env($|\..*|~|\.swp|\.swo|:)/i,

  // Git internals
  /(^|\/)\.git\//i,

  // Certificates and private keys
  /\.pem($|\.bak|\.backup|\.old|\.orig|~)$/i,
  /\.key($|\.bak|\.backup|\.old|\.orig|~)$/i,
  /\.p12($|\.bak|\.backup|\.old|\.orig|~)$/i,
  /\.pfx($|\.bak|\.backup|\.old|\.orig|~)$/i,

  // SSH keys
  /id_rsa/i,
  /id_ed25519/i,
  /id_ecdsa/i,
  /\.ssh\//i,

  // Generic credentials/secrets files
  /credentials\.json($|\.bak|\.backup|\.old|\.orig|~)$/i,
  /secrets\.json($|\.bak|\.backup|\.old|\.orig|~)$/i,
  /secrets\.ya?ml($|\.bak|\.backup|\.old|\.orig|~)$/i,
];

export function isSensitivePath(filePath: string): boolean {
  const normalizedPath = filePath.replace(/\\/g, '/');
  return SENSITIVE_PATH_PATTERNS.some(pattern => pattern.test(normalizedPath));
}

export interface PathValidationResult {
  valid: boolean;
  reason?: string;
}

/**
 * Validate a vault-relative note path
 */
export function validateNotePath(vaultPath: string, notePath: string): PathValidationResult {
  if (notePath.length === 0) {
    return { valid: false, reason: 'Empty path' };
  }

  // Unix absolute paths, UNC paths and Windows-style absolute paths
  if (notePath.startsWith('/') || notePath.startsWith('\\')) {
    return { valid: false, reason: 'Absolute paths not allowed' };
  }
  // Windows drive letters - only absolute on Windows
  if (process.platform === 'win32' && /^[a-zA-Z]:/.test(notePath)) {
    return { valid: false, reason: 'Absolute paths not allowed' };
  }

  const resolvedVault = path.resolve(vaultPath);
  const resolvedNote = path.resolve(vaultPath, notePath);
  if (resolvedNote !== resolvedVault && !resolvedNote.startsWith(resolvedVault + path.sep)) {
    return { valid: false, reason: 'Path traversal not allowed' };
  }

  if (isSensitivePath(notePath)) {
    return { valid: false, reason: 'Cannot access sensitive file (credentials, keys, secrets)' };
  }

  return { valid: true };
}
