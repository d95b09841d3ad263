/**
 * Shared note fixtures
 */

/** Frontmatter (5 lines), a heading run, a fenced block and a task */
export const PLAN_NOTE = [
  '---',
  'title: Project Plan',
  'aliases: [plan]',
  'tags: [work]',
  '---',
  '# Plan',
  'See [[Ideas]] and #roadmap.',
  '',
  '```js',
  '// [[NotALink]] #nottag',
  '```',
  '- [ ] Write draft',
  '',
].join('\n');

export const PLAN_FRONTMATTER = '---\ntitle: Project Plan\naliases: [plan]\ntags: [work]\n---\n';

export const IDEAS_NOTE = '# Ideas\nBack to [[Project Plan|the plan]].\n';

/** Org literal block holding a link that must not be indexed */
export const TASKS_NOTE = [
  '#+TITLE: Tasks',
  '* TODO Ship it :work:',
  'Link [[Ideas]] here.',
  '#+BEGIN_SRC sh',
  'echo [[Hidden]]',
  '#+END_SRC',
  '',
].join('\n');

/** Display math that is never closed */
export const BROKEN_MATH_NOTE = 'Intro\n$$\nx + y\n';

export function sampleVault(): Record<string, string> {
  return {
    'plan.md': PLAN_NOTE,
    'ideas.md': IDEAS_NOTE,
    'tasks.org': TASKS_NOTE,
  };
}
