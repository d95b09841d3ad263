/**
 * Tests for the workspace of open notes
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createDefaultRegistry } from '@hybridnote/core';
import { MemoryNotesRepository } from '../../../src/core/repo/memory.js';
import { Workspace } from '../../../src/core/workspace.js';
import { BROKEN_MATH_NOTE, PLAN_FRONTMATTER, PLAN_NOTE, sampleVault } from '../../helpers/fixtures.js';

describe('Workspace', () => {
  let repo: MemoryNotesRepository;
  let workspace: Workspace;

  beforeEach(() => {
    repo = new MemoryNotesRepository({ ...sampleVault(), 'bad.tex': BROKEN_MATH_NOTE });
    workspace = new Workspace(repo, createDefaultRegistry());
  });

  it('should split frontmatter from the block document', async () => {
    const open = await workspace.open('plan.md');

    expect(open.title).toBe('Project Plan');
    expect(open.prefix).toBe(PLAN_FRONTMATTER);
    expect(open.lineOffset).toBe(5);
    expect(open.frontmatter).toEqual({ title: 'Project Plan', aliases: ['plan'], tags: ['work'] });
    expect(open.manager.blockCount).toBe(3);
    expect(open.edited).toBe(false);
    expect(workspace.render('plan.md')).toBe(PLAN_NOTE);
  });

  it('should share one load between concurrent opens', async () => {
    const [first, second] = await Promise.all([workspace.open('ideas.md'), workspace.open('ideas.md')]);

    expect(first).toBe(second);
    expect(await workspace.open('ideas.md')).toBe(first);
    expect(await workspace.open('ideas.md', { reload: true })).not.toBe(first);
  });

  it('should report missing and unopened notes', async () => {
    await expect(workspace.open('missing.md')).rejects.toMatchObject({
      code: 'NOTE_NOT_FOUND',
      message: 'Note not found: missing.md',
    });
    expect(() => workspace.require('ideas.md')).toThrow('Note is not open: ideas.md');
  });

  it('should record recovered blocks in the parse report', async () => {
    const open = await workspace.open('bad.tex');

    expect(open.report.notices.map(n => n.message)).toEqual([
      'Unterminated LaTeX block opened at line 2 (expected $$); extended to end of document',
    ]);
    expect(workspace.render('bad.tex')).toBe(BROKEN_MATH_NOTE);
  });

  it('should refuse unterminated blocks in strict mode', async () => {
    const strict = new Workspace(repo, createDefaultRegistry(), { strict: true });

    await expect(strict.open('bad.tex')).rejects.toMatchObject({
      code: 'UNTERMINATED_BLOCK',
      openedAt: 2,
      expected: '$$',
    });
    expect(strict.openIds()).toEqual([]);
  });

  it('should write edits back with the frontmatter on save', async () => {
    const open = await workspace.open('plan.md');
    open.manager.updateBlockText(0, '# Plan\nDone.\n\n');
    open.edited = true;

    const record = await workspace.save('plan.md');

    expect(record.text).toBe(PLAN_NOTE.replace('See [[Ideas]] and #roadmap.', 'Done.'));
    expect((await repo.read('plan.md'))?.text).toBe(record.text);
    expect(open.edited).toBe(false);
  });

  it('should close notes', async () => {
    await workspace.open('tasks.org');
    await workspace.open('ideas.md');

    expect(workspace.openIds()).toEqual(['ideas.md', 'tasks.org']);
    expect(workspace.close('ideas.md')).toBe(true);
    expect(workspace.close('ideas.md')).toBe(false);
    expect(workspace.get('ideas.md')).toBeUndefined();
  });
});
