/**
 * Source reconstruction for the built-in ASTs
 *
 * Every built-in parser keeps each line's source text, so rendering is
 * exact. Plug-in (`custom`) ASTs carry no source and render as ''.
 */

import { joinLines } from '../lines.js';
import type { BlockAst, OrgNode } from '../types.js';

function orgNodeSources(node: OrgNode): string[] {
  return node.type === 'drawer' || node.type === 'block' ? node.sources : [node.source];
}

export function renderSource(ast: BlockAst): string {
  switch (ast.kind) {
    case 'markdown':
      return joinLines(ast.nodes.map(n => n.source), ast.terminated);
    case 'org':
      return joinLines(ast.nodes.flatMap(orgNodeSources), ast.terminated);
    case 'math':
      return joinLines(ast.sources, ast.terminated);
    case 'code': {
      const lines = [ast.opener, ...ast.body];
      if (ast.closer !== null) lines.push(ast.closer);
      return joinLines(lines, ast.terminated);
    }
    case 'verbatim':
      return ast.text;
    case 'custom':
      return '';
  }
}
