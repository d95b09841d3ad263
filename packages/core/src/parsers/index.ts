import { ParserRegistry } from '../parser.js';
import { CodeParser } from './code.js';
import { LatexParser } from './latex.js';
import { MarkdownParser } from './markdown.js';
import { OrgParser } from './org.js';

export { CodeParser, parseFenceInfo } from './code.js';
export { LatexParser, extractMath } from './latex.js';
export { MarkdownParser, classifyMarkdownLine } from './markdown.js';
export { OrgParser, parseOrgNodes } from './org.js';
export { renderSource } from './source.js';

/**
 * Registry with the built-in parsers: Markdown, Org, LaTeX and a generic
 * fenced-code parser that claims every language through canHandle
 */
export function createDefaultRegistry(): ParserRegistry {
  return new ParserRegistry()
    .register(new MarkdownParser())
    .register(new OrgParser())
    .register(new LatexParser())
    .register(new CodeParser());
}
