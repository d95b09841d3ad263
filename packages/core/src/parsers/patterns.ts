/**
 * Line patterns shared by the example parsers
 */

/** ATX heading: `## Title` */
export const HEADING_REGEX = /^(#{1,6})\s+(.+)$/;

/** Task checkbox: `- [ ] text`, `* [x] text`, `- [-] text` */
export const TASK_CHECKBOX_REGEX = /^(\s*)[-*+]\s+\[([ xX-])\]\s+(.*)$/;

/** Bullet or ordered list item */
export const LIST_ITEM_REGEX = /^(\s*)([-*+]|\d+[.)])\s+(.*)$/;

/** Thematic break: three or more of the same marker */
export const RULE_REGEX = /^ {0,3}([-*_])(?:[ \t]*\1){2,}[ \t]*$/;

/** Heading id suffix: `# Title {#intro}` */
export const HEADING_ID_REGEX = /\s*\{#([\w-]+)\}\s*$/;

/** Block reference id at end of line: `text ^abc-123` */
export const BLOCK_ID_REGEX = /\s\^([A-Za-z0-9-]+)\s*$/;

/** Inline field: `status:: active` */
export const INLINE_FIELD_REGEX = /^\s*([A-Za-z][\w-]*)::\s*(.*?)\s*$/;

/** Org headline: stars, optional keyword, title, optional :tags: */
export const ORG_HEADLINE_REGEX = /^(\*+)\s+(?:(TODO|DONE)\s+)?(.*?)(?:\s+(:[\w@#%:]+:))?\s*$/;

/** Org keyword line: `#+TITLE: value` */
export const ORG_KEYWORD_REGEX = /^\s*#\+([A-Za-z_]+):\s*(.*)$/;

/** Org drawer boundaries and entries */
export const ORG_DRAWER_START_REGEX = /^\s*:([A-Za-z_-]+):\s*$/;
export const ORG_DRAWER_END_REGEX = /^\s*:END:\s*$/i;
export const ORG_PROPERTY_REGEX = /^\s*:([^:\s]+):\s*(.*?)\s*$/;

/** Strip a CR left by CRLF line endings before pattern matching */
export function content(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
