/**
 * Shared constants for tool responses
 */

/** Characters of raw text shown in previews */
export const PREVIEW_CHARS = 200;

/**
 * Rough token estimate for a response payload (~4 chars per token)
 */
export function estimateTokens(content: string | object): number {
  const str = typeof content === 'string' ? content : JSON.stringify(content);
  return Math.ceil(str.length / 4);
}

export function preview(text: string): string {
  return text.length > PREVIEW_CHARS ? `${text.slice(0, PREVIEW_CHARS)}...` : text;
}
