/**
 * Tests for wikilink and tag extraction from block documents
 */

import { describe, it, expect } from 'vitest';
import { BlockManager, ORG, createDefaultRegistry } from '@hybridnote/core';
import { extractNoteLinks } from '../../../src/core/read/links.js';
import { splitFrontmatter } from '../../../src/core/read/frontmatter.js';
import { PLAN_NOTE, TASKS_NOTE } from '../../helpers/fixtures.js';

function parse(text: string): BlockManager {
  const manager = new BlockManager(createDefaultRegistry());
  manager.parseDocument(text);
  return manager;
}

describe('extractNoteLinks', () => {
  it('should skip code blocks and report file lines', () => {
    const { body, frontmatter, lineOffset } = splitFrontmatter(PLAN_NOTE);
    const links = extractNoteLinks(parse(body).note, lineOffset, frontmatter);

    expect(links.outlinks).toEqual([{ target: 'Ideas', line: 7, blockIndex: 0 }]);
    expect(links.tags).toEqual(['work', 'roadmap']);
  });

  it('should capture headings and aliases and ignore inline code', () => {
    const links = extractNoteLinks(parse('Use `[[Fake]]` and [[Real#Setup|setup]]\n').note);

    expect(links.outlinks).toEqual([
      { target: 'Real', heading: 'Setup', alias: 'setup', line: 1, blockIndex: 0 },
    ]);
  });

  it('should skip Org source blocks', () => {
    const links = extractNoteLinks(parse(TASKS_NOTE).note);

    expect(links.outlinks).toEqual([{ target: 'Ideas', line: 3, blockIndex: 0 }]);
    expect(links.tags).toEqual([]);
  });

  it('should take tags from Org headlines', () => {
    const manager = parse('Intro #start\n');
    manager.insertBlock(1, ORG, '* TODO Ship it :work:urgent:\n');

    expect(extractNoteLinks(manager.note).tags).toEqual(['start', 'work', 'urgent']);
  });

  it('should never index math blocks', () => {
    const links = extractNoteLinks(parse('$$\n[[Nope]] #nope\n$$\n').note);

    expect(links).toEqual({ outlinks: [], tags: [] });
  });
});
