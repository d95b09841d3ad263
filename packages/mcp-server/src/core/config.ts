/**
 * Server configuration, read from environment variables and validated
 * with zod
 */

import { z } from 'zod';
import { parseDetectionConfig, type DetectionConfig } from '@hybridnote/core';
import { DEFAULT_NOTE_EXTENSIONS } from './read/vault.js';
import { findVaultRoot } from './read/vaultRoot.js';
import { serverLog } from './shared/serverLog.js';

// ============================================================================
// Tool categories
// ============================================================================

export const TOOL_CATEGORIES = ['notes', 'blocks', 'search', 'edit', 'index', 'system'] as const;

export type ToolCategory = typeof TOOL_CATEGORIES[number];

export const PRESETS = {
  // Read-only block access
  minimal: ['notes', 'blocks', 'search'],

  full: [...TOOL_CATEGORIES],
} satisfies Record<string, ToolCategory[]>;

export type PresetName = keyof typeof PRESETS;

const DEFAULT_PRESET: PresetName = 'full';

export function isToolCategory(value: string): value is ToolCategory {
  return TOOL_CATEGORIES.some(category => category === value);
}

function isPresetName(value: string): value is PresetName {
  return value === 'minimal' || value === 'full';
}

/**
 * Parse HYBRIDNOTE_TOOLS: a preset name or a comma-separated list of
 * categories and presets. Unknown names are ignored; an empty result falls
 * back to the default preset.
 */
export function parseEnabledCategories(envValue?: string): Set<ToolCategory> {
  const value = envValue?.trim().toLowerCase();
  if (!value) {
    return new Set<ToolCategory>(PRESETS[DEFAULT_PRESET]);
  }

  const categories = new Set<ToolCategory>();
  const unknown: string[] = [];
  for (const raw of value.split(',')) {
    const item = raw.trim();
    if (isToolCategory(item)) {
      categories.add(item);
    } else if (isPresetName(item)) {
      for (const c of PRESETS[item]) categories.add(c);
    } else if (item) {
      unknown.push(item);
    }
  }

  if (unknown.length > 0) {
    serverLog('config', `Unknown tool categories ignored: ${unknown.join(', ')}`, 'warn');
  }

  if (categories.size === 0) {
    return new Set<ToolCategory>(PRESETS[DEFAULT_PRESET]);
  }
  return categories;
}

// ============================================================================
// Environment
// ============================================================================

/**
 * Parse a comma-separated extension list into lowercase `.ext` entries
 */
export function parseExtensions(value?: string): string[] {
  if (!value?.trim()) return [...DEFAULT_NOTE_EXTENSIONS];

  const extensions = value
    .split(',')
    .map(item => item.trim().toLowerCase())
    .filter(item => item.length > 0)
    .map(item => (item.startsWith('.') ? item : `.${item}`));

  return extensions.length > 0 ? Array.from(new Set(extensions)) : [...DEFAULT_NOTE_EXTENSIONS];
}

const DetectionFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']));

const EnvSchema = z.object({
  HYBRIDNOTE_VAULT: z.string().trim().min(1).optional(),
  PROJECT_PATH: z.string().trim().min(1).optional(),
  HYBRIDNOTE_TOOLS: z.string().optional(),
  HYBRIDNOTE_EXTENSIONS: z.string().optional(),
  HYBRIDNOTE_WATCH: z.enum(['true', 'false']).optional(),
  HYBRIDNOTE_DEBOUNCE_MS: z.coerce.number().int().positive().optional(),
  HYBRIDNOTE_STRICT_DETECTION: DetectionFlag.optional(),
  HYBRIDNOTE_PARAGRAPH_BREAKS: DetectionFlag.optional(),
});

export interface ServerConfig {
  vaultPath: string;
  categories: Set<ToolCategory>;
  extensions: string[];
  detection: DetectionConfig;
  /** Reindex notes changed outside the server */
  watch: boolean;
  debounceMs: number;
}

export const DEFAULT_DEBOUNCE_MS = 200;

/**
 * @throws Error listing every invalid variable
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    vaultPath: vars.HYBRIDNOTE_VAULT ?? vars.PROJECT_PATH ?? findVaultRoot(),
    categories: parseEnabledCategories(vars.HYBRIDNOTE_TOOLS),
    extensions: parseExtensions(vars.HYBRIDNOTE_EXTENSIONS),
    detection: parseDetectionConfig(env),
    watch: vars.HYBRIDNOTE_WATCH !== 'false',
    debounceMs: vars.HYBRIDNOTE_DEBOUNCE_MS ?? DEFAULT_DEBOUNCE_MS,
  };
}
