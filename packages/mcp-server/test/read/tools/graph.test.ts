/**
 * Tests for index, system tools and tool category gating
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { ToolCategory } from '../../../src/core/config.js';
import { MemoryNotesRepository } from '../../../src/core/repo/memory.js';
import { callTool, createTestServer, type TestServerContext } from '../../helpers/createTestServer.js';
import { sampleVault } from '../../helpers/fixtures.js';

describe('index tools', () => {
  let repo: MemoryNotesRepository;
  let ctx: TestServerContext;

  beforeAll(async () => {
    repo = new MemoryNotesRepository(sampleVault());
    ctx = await createTestServer(repo);
  });

  afterAll(async () => {
    await ctx.close();
  });

  describe('get_backlinks', () => {
    it('should resolve a title and list links with their lines', async () => {
      const result = await callTool(ctx.client, 'get_backlinks', { path: 'Ideas' });

      expect(result.path).toBe('ideas.md');
      expect(result.exists).toBe(true);
      expect(result.backlinks).toEqual([
        { source: 'plan.md', line: 7, blockIndex: 0 },
        { source: 'tasks.org', line: 3, blockIndex: 0 },
      ]);
    });

    it('should resolve aliases', async () => {
      const result = await callTool(ctx.client, 'get_backlinks', { path: 'plan' });

      expect(result.path).toBe('plan.md');
      expect(result.backlinks).toEqual([{ source: 'ideas.md', line: 2, blockIndex: 0 }]);
    });

    it('should not index links inside code', async () => {
      const inFence = await callTool(ctx.client, 'get_backlinks', { path: 'NotALink' });
      expect(inFence).toMatchObject({ path: 'NotALink', exists: false, count: 0 });

      const inSrcBlock = await callTool(ctx.client, 'get_backlinks', { path: 'Hidden' });
      expect(inSrcBlock.count).toBe(0);
    });
  });

  describe('find_by_tag', () => {
    it('should combine frontmatter and inline tags', async () => {
      expect((await callTool(ctx.client, 'find_by_tag', { tag: '#work' })).notes).toEqual(['plan.md']);
      expect((await callTool(ctx.client, 'find_by_tag', { tag: 'roadmap' })).notes).toEqual(['plan.md']);
      expect((await callTool(ctx.client, 'find_by_tag', { tag: 'nottag' })).count).toBe(0);
    });
  });

  describe('refresh_index', () => {
    it('should pick up notes written outside the server', async () => {
      await repo.write('new.md', 'Link to [[Ideas]] #roadmap\n');

      const result = await callTool(ctx.client, 'refresh_index');

      expect(result.message).toBe('Indexed 4 notes');
      expect(result.notes).toBe(4);
      expect((await callTool(ctx.client, 'find_by_tag', { tag: 'roadmap' })).notes).toEqual(['new.md', 'plan.md']);
      expect((await callTool(ctx.client, 'get_backlinks', { path: 'ideas.md' })).count).toBe(3);
    });
  });

  describe('server_log', () => {
    it('should return server entries and the core log on request', async () => {
      const result = await callTool(ctx.client, 'server_log', { component: 'server', include_core: true });

      expect(result.entries.map((e: { message: string }) => e.message)).toContain(
        'Tool categories: blocks, edit, index, notes, search, system (20 tools)'
      );
      expect(Array.isArray(result.core)).toBe(true);
      expect(result.server_uptime_ms).toBeGreaterThanOrEqual(0);
    });
  });
});

describe('tool category gating', () => {
  let ctx: TestServerContext;

  beforeAll(async () => {
    ctx = await createTestServer(new MemoryNotesRepository(sampleVault()), {
      categories: new Set<ToolCategory>(['notes', 'system']),
    });
  });

  afterAll(async () => {
    await ctx.close();
  });

  it('should expose only the enabled categories', async () => {
    const { tools } = await ctx.client.listTools();
    const names = tools.map(t => t.name).sort();

    expect(names).toEqual(['list_notes', 'parse_note', 'render_note', 'server_log']);
    expect(ctx.tools).toEqual(names);
  });
});
