/**
 * Syntax kinds - the tag every segment and block carries
 *
 * Code and Custom kinds carry a payload and compare by it, so
 * `code:python` and `code:rust` are different kinds.
 */

export type SyntaxKind =
  | { kind: 'markdown' }
  | { kind: 'org' }
  | { kind: 'latex' }
  | { kind: 'code'; language: string }
  | { kind: 'custom'; name: string };

export const MARKDOWN: SyntaxKind = { kind: 'markdown' };
export const ORG: SyntaxKind = { kind: 'org' };
export const LATEX: SyntaxKind = { kind: 'latex' };

export function code(language: string): SyntaxKind {
  return { kind: 'code', language };
}

export function custom(name: string): SyntaxKind {
  return { kind: 'custom', name };
}

/**
 * Stable string key for a syntax kind: `markdown`, `org`, `latex`,
 * `code:<language>`, `custom:<name>`
 */
export function syntaxKey(syntax: SyntaxKind): string {
  switch (syntax.kind) {
    case 'markdown':
    case 'org':
    case 'latex':
      return syntax.kind;
    case 'code':
      return `code:${syntax.language}`;
    case 'custom':
      return `custom:${syntax.name}`;
  }
}

/**
 * Inverse of syntaxKey. Returns null for keys that name no kind.
 */
export function parseSyntaxKey(key: string): SyntaxKind | null {
  if (key === 'markdown') return MARKDOWN;
  if (key === 'org') return ORG;
  if (key === 'latex') return LATEX;
  if (key.startsWith('code:')) return code(key.slice('code:'.length));
  if (key.startsWith('custom:')) return custom(key.slice('custom:'.length));
  return null;
}

export function sameSyntax(a: SyntaxKind, b: SyntaxKind): boolean {
  return syntaxKey(a) === syntaxKey(b);
}

/** Human-readable label */
export function syntaxName(syntax: SyntaxKind): string {
  switch (syntax.kind) {
    case 'markdown':
      return 'Markdown';
    case 'org':
      return 'Org-mode';
    case 'latex':
      return 'LaTeX';
    case 'code':
      return syntax.language ? `Code (${syntax.language})` : 'Code';
    case 'custom':
      return `Custom (${syntax.name})`;
  }
}
