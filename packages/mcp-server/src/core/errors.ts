/**
 * Vault-level errors raised by the repository and workspace
 */

export type VaultErrorCode = 'NOTE_NOT_FOUND' | 'NOTE_NOT_OPEN' | 'INVALID_PATH' | 'UNSUPPORTED_EXTENSION';

export class VaultError extends Error {
  readonly code: VaultErrorCode;
  readonly notePath: string;

  constructor(code: VaultErrorCode, notePath: string, message: string) {
    super(message);
    this.name = 'VaultError';
    this.code = code;
    this.notePath = notePath;
  }
}

export function noteNotFound(notePath: string): VaultError {
  return new VaultError('NOTE_NOT_FOUND', notePath, `Note not found: ${notePath}`);
}

export function noteNotOpen(notePath: string): VaultError {
  return new VaultError('NOTE_NOT_OPEN', notePath, `Note is not open: ${notePath}`);
}
