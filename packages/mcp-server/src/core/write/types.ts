/**
 * Tool result types
 */

export interface MutationResult {
  success: boolean;
  message: string;
  path: string;
  preview?: string;
  /** Machine-readable failure reason (HybridNoteError / VaultError code) */
  errorCode?: string;
  /** True while the note has block edits not yet written by save_note */
  unsaved?: boolean;
  /** Estimated token count for this response */
  tokensEstimate?: number;
  /** Structured diagnostic information for debugging failed operations */
  diagnostic?: Record<string, unknown>;
}
