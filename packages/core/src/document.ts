/**
 * Document - either a single-syntax note or a hybrid block sequence
 *
 * Conversion between the two is explicit and may lose information:
 * a standard note has no per-block syntax, line ranges or dirty state.
 */

import type { DetectionConfig } from './config.js';
import { coreLog } from './logging.js';
import { BlockManager } from './manager.js';
import { HybridNote, terminate, type DetachedBlock } from './note.js';
import { IDENTITY_PARSER, type Parser, type ParserRegistry } from './parser.js';
import { renderSource } from './parsers/source.js';
import { LATEX, MARKDOWN, ORG, code, custom, type SyntaxKind } from './syntax.js';
import { emptyMetadata, type BlockAst, type HybridBlock } from './types.js';

export interface StandardNote {
  id: string;
  title: string;
  syntax: SyntaxKind;
  blocks: BlockAst[];
}

export type Document =
  | { type: 'standard'; note: StandardNote }
  | { type: 'hybrid'; note: HybridNote };

export function standardDocument(id: string, title: string, syntax: SyntaxKind = MARKDOWN): Document {
  return { type: 'standard', note: { id, title, syntax, blocks: [] } };
}

export function hybridDocument(id: string, title: string): Document {
  return { type: 'hybrid', note: new HybridNote(id, title) };
}

export function documentId(document: Document): string {
  return document.note.id;
}

export function documentTitle(document: Document): string {
  return document.note.title;
}

export function asHybrid(document: Document): HybridNote | undefined {
  return document.type === 'hybrid' ? document.note : undefined;
}

export function asStandard(document: Document): StandardNote | undefined {
  return document.type === 'standard' ? document.note : undefined;
}

/**
 * Append a block to a hybrid document. Standard documents take no
 * hybrid blocks; undefined is returned and nothing changes.
 */
export function addBlock(document: Document, block: DetachedBlock): HybridBlock | undefined {
  switch (document.type) {
    case 'hybrid':
      return document.note.addBlock(block);
    case 'standard':
      return undefined;
  }
}

/**
 * Flatten a hybrid note into one AST list. Blocks without a current AST
 * (unparsed or dirty) become verbatim ASTs of their raw text.
 */
export function toStandard(note: HybridNote, syntax: SyntaxKind = MARKDOWN): StandardNote {
  const blocks = note.getBlocks().map((block): BlockAst =>
    block.ast && !block.dirty ? block.ast : { kind: 'verbatim', text: block.rawText }
  );
  coreLog('document', `Converted ${note.id} to standard (${blocks.length} blocks)`);
  return { id: note.id, title: note.title, syntax, blocks };
}

function parserForAst(ast: BlockAst, registry: ParserRegistry): Parser | undefined {
  switch (ast.kind) {
    case 'markdown':
      return registry.get(MARKDOWN);
    case 'org':
      return registry.get(ORG);
    case 'math':
      return registry.get(LATEX);
    case 'code':
      return registry.get(code(ast.language)) ?? registry.get(code(''));
    case 'verbatim':
      return IDENTITY_PARSER;
    case 'custom':
      return registry.get(custom(ast.name));
  }
}

/** Source text of a standard note, one rendered AST after another */
export function renderStandard(note: StandardNote, registry: ParserRegistry): string {
  return note.blocks
    .map((ast, i) => {
      const parser = parserForAst(ast, registry);
      const text = parser ? parser.render(ast, emptyMetadata()) : renderSource(ast);
      return i < note.blocks.length - 1 && text.length > 0 ? terminate(text) : text;
    })
    .join('');
}

/**
 * Render a standard note and detect it afresh as a hybrid note
 */
export function toHybrid(
  note: StandardNote,
  registry: ParserRegistry,
  detection?: Partial<DetectionConfig>
): BlockManager {
  const manager = new BlockManager(registry, { id: note.id, title: note.title, detection });
  manager.parseDocument(renderStandard(note, registry));
  coreLog('document', `Converted ${note.id} to hybrid (${manager.blockCount} blocks)`);
  return manager;
}
