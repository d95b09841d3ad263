/**
 * Org-mode parser
 *
 * Recognizes headlines (with TODO/DONE keyword and :tags:), `#+KEY: value`
 * keywords, `:NAME:` ... `:END:` drawers and `#+BEGIN_<name>` ... `#+END_<name>`
 * blocks. Everything else is text. Unclosed blocks and drawers are rejected.
 */

import { closesOrg } from '../detector.js';
import { ParseError } from '../errors.js';
import { isBlankLine, splitLines } from '../lines.js';
import type { ParsedBlock, Parser } from '../parser.js';
import { ORG, type SyntaxKind } from '../syntax.js';
import { emptyMetadata, type BlockAst, type BlockMetadata, type OrgNode } from '../types.js';
import {
  ORG_DRAWER_END_REGEX,
  ORG_DRAWER_START_REGEX,
  ORG_HEADLINE_REGEX,
  ORG_KEYWORD_REGEX,
  ORG_PROPERTY_REGEX,
  content,
} from './patterns.js';
import { renderSource } from './source.js';

const BLOCK_BEGIN_REGEX = /^\s*#\+BEGIN_(\S+)\s*(.*?)\s*$/i;

function findBlockEnd(lines: string[], from: number, name: string): number {
  for (let i = from; i < lines.length; i++) {
    if (closesOrg(content(lines[i]), name)) {
      return i;
    }
  }
  return -1;
}

function findDrawerEnd(lines: string[], from: number): number {
  for (let i = from; i < lines.length; i++) {
    if (ORG_DRAWER_END_REGEX.test(content(lines[i]))) {
      return i;
    }
  }
  return -1;
}

function parseTags(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw.split(':').filter(t => t.length > 0);
}

export function parseOrgNodes(lines: string[], lineOffset: number): OrgNode[] {
  const nodes: OrgNode[] = [];

  let i = 0;
  while (i < lines.length) {
    const source = lines[i];
    const text = content(source);

    const begin = text.match(BLOCK_BEGIN_REGEX);
    if (begin) {
      const end = findBlockEnd(lines, i + 1, begin[1]);
      if (end < 0) {
        throw new ParseError(`#+BEGIN_${begin[1]} without matching #+END_${begin[1]}`, lineOffset + i);
      }
      const sources = lines.slice(i, end + 1);
      nodes.push({
        type: 'block',
        line: i,
        sources,
        name: begin[1].toUpperCase(),
        parameters: begin[2],
        body: sources.slice(1, -1).map(content).join('\n'),
      });
      i = end + 1;
      continue;
    }

    if (text.startsWith('*')) {
      const headline = text.match(ORG_HEADLINE_REGEX);
      if (headline) {
        nodes.push({
          type: 'headline',
          line: i,
          source,
          level: headline[1].length,
          todo: headline[2] ?? null,
          title: headline[3],
          tags: parseTags(headline[4]),
        });
        i++;
        continue;
      }
    }

    const keyword = text.match(ORG_KEYWORD_REGEX);
    if (keyword) {
      nodes.push({ type: 'keyword', line: i, source, key: keyword[1].toUpperCase(), value: keyword[2].trim() });
      i++;
      continue;
    }

    const drawer = text.match(ORG_DRAWER_START_REGEX);
    if (drawer && !ORG_DRAWER_END_REGEX.test(text)) {
      const end = findDrawerEnd(lines, i + 1);
      if (end < 0) {
        throw new ParseError(`Drawer :${drawer[1]}: is never closed with :END:`, lineOffset + i);
      }
      const sources = lines.slice(i, end + 1);
      const entries: Array<[string, string]> = [];
      for (const entry of sources.slice(1, -1)) {
        const property = content(entry).match(ORG_PROPERTY_REGEX);
        if (property) {
          entries.push([property[1], property[2]]);
        }
      }
      nodes.push({ type: 'drawer', line: i, sources, name: drawer[1].toUpperCase(), entries });
      i = end + 1;
      continue;
    }

    nodes.push({ type: 'text', line: i, source });
    i++;
  }

  return nodes;
}

function extractMetadata(nodes: OrgNode[]): BlockMetadata {
  const metadata = emptyMetadata();

  const headline = nodes.find(n => n.type === 'headline');
  if (headline?.type === 'headline') {
    metadata.headingLevel = headline.level;
    if (headline.todo) {
      metadata.todoState = headline.todo;
    }
  }

  const lead = nodes.find(n => n.type !== 'text' || !isBlankLine(n.source));
  if (lead?.type === 'block' && lead.name === 'SRC') {
    const language = lead.parameters.split(/\s+/)[0];
    if (language) {
      metadata.properties.set('language', language);
    }
  }

  for (const node of nodes) {
    if (node.type === 'keyword') {
      metadata.properties.set(node.key, node.value);
    } else if (node.type === 'drawer' && node.name === 'PROPERTIES') {
      for (const [key, value] of node.entries) {
        metadata.properties.set(key, value);
        if (key.toUpperCase() === 'ID' && metadata.id === undefined) {
          metadata.id = value;
        }
      }
    }
  }

  return metadata;
}

export class OrgParser implements Parser {
  syntaxKind(): SyntaxKind {
    return ORG;
  }

  canHandle(text: string): boolean {
    const { lines } = splitLines(text);
    const first = lines.find(l => !isBlankLine(l));
    return first !== undefined && first.trimStart().startsWith('#+');
  }

  parse(rawText: string, lineOffset: number): ParsedBlock {
    const { lines, terminated } = splitLines(rawText);
    const nodes = parseOrgNodes(lines, lineOffset);
    return {
      ast: { kind: 'org', nodes, terminated },
      metadata: extractMetadata(nodes),
    };
  }

  render(ast: BlockAst): string {
    return renderSource(ast);
  }
}
