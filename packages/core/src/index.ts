/**
 * @hybridnote/core
 *
 * Detection, parsing and incremental editing of documents that mix
 * Markdown, Org, LaTeX math and fenced code.
 */

// Types
export type {
  BlockAst,
  BlockMetadata,
  BlockPredicate,
  CodeAst,
  CustomAst,
  DetectionRecoveryNotice,
  HybridBlock,
  IndexedBlock,
  LineRange,
  MarkdownAst,
  MarkdownNode,
  MathAst,
  OrgAst,
  OrgNode,
  RawSegment,
  VerbatimAst,
} from './types.js';
export { emptyMetadata } from './types.js';

// Syntax kinds
export type { SyntaxKind } from './syntax.js';
export { LATEX, MARKDOWN, ORG, code, custom, parseSyntaxKey, sameSyntax, syntaxKey, syntaxName } from './syntax.js';

// Errors
export type { HybridNoteErrorCode } from './errors.js';
export {
  BlockTextError,
  HybridNoteError,
  IndexOutOfRangeError,
  MetadataError,
  ParseError,
  ParserRegistrationError,
  UnterminatedBlockError,
} from './errors.js';

// Configuration and logging
export type { DetectionConfig } from './config.js';
export { DEFAULT_DETECTION_CONFIG, parseDetectionConfig } from './config.js';
export type { CoreLogComponent, CoreLogEntry, LogEntry, LogLevel, LogQuery } from './logging.js';
export { LogBuffer, clearCoreLog, coreLog, getCoreLog, shouldMirror } from './logging.js';

// Lines
export type { SplitText } from './lines.js';
export { countLines, isBlankLine, joinLines, splitLines } from './lines.js';

// Detection
export { BlockDetector, CODE_FENCE, closesFence, closesOrg, fenceOf, matchOpener } from './detector.js';

// Parsers
export type { ParsedBlock, Parser } from './parser.js';
export { IDENTITY_PARSER, IdentityParser, ParserRegistry } from './parser.js';
export {
  CodeParser,
  LatexParser,
  MarkdownParser,
  OrgParser,
  classifyMarkdownLine,
  createDefaultRegistry,
  extractMath,
  parseFenceInfo,
  parseOrgNodes,
  renderSource,
} from './parsers/index.js';

// Blocks and notes
export {
  blockId,
  getProperty,
  headingLevel,
  isDone,
  isHeading,
  isSyntax,
  isTodo,
  lineCount,
  textLineCount,
  todoState,
} from './block.js';
export type { DetachedBlock } from './note.js';
export { HybridNote, terminate } from './note.js';
export type { BlockFailure, BlockManagerOptions, MetadataPatch, ParseReport } from './manager.js';
export { BlockManager } from './manager.js';
export type { Section, SectionTree } from './sections.js';
export { buildSectionTree, headingTitle } from './sections.js';

// Documents
export type { Document, StandardNote } from './document.js';
export {
  addBlock,
  asHybrid,
  asStandard,
  documentId,
  documentTitle,
  hybridDocument,
  renderStandard,
  standardDocument,
  toHybrid,
  toStandard,
} from './document.js';
