/**
 * Configuration schema and validation
 */

import type { IndentMode } from '../settings/types.js';

export interface RepoTreeConfig {
  settingsFile?: string;
  tabWidth?: number;
  indentMode?: IndentMode;
}

export type ResolvedConfig = Required<RepoTreeConfig>;

export const CONFIG_FILE_NAME = '.repotree.json';

export const DEFAULT_CONFIG: ResolvedConfig = {
  settingsFile: 'settings.txt',
  tabWidth: 4,
  indentMode: 'lenient',
};

const INDENT_MODES: readonly IndentMode[] = ['lenient', 'strict'];

function isIndentMode(value: unknown): value is IndentMode {
  return INDENT_MODES.some((mode) => mode === value);
}

/**
 * Validate configuration object
 */
export function validateConfig(config: unknown): config is RepoTreeConfig {
  if (!config || typeof config !== 'object' || Array.isArray(config)) {
    return false;
  }

  const c: Record<string, unknown> = { ...config };

  if (c.settingsFile !== undefined) {
    if (typeof c.settingsFile !== 'string' || c.settingsFile.length === 0) return false;
  }

  if (c.tabWidth !== undefined) {
    if (typeof c.tabWidth !== 'number' || !Number.isInteger(c.tabWidth) || c.tabWidth < 1) {
      return false;
    }
  }

  if (c.indentMode !== undefined && !isIndentMode(c.indentMode)) {
    return false;
  }

  return true;
}

/**
 * Merge two configurations (right takes precedence where it sets a value)
 */
export function mergeConfigs(base: ResolvedConfig, override: RepoTreeConfig): ResolvedConfig {
  return {
    settingsFile: override.settingsFile ?? base.settingsFile,
    tabWidth: override.tabWidth ?? base.tabWidth,
    indentMode: override.indentMode ?? base.indentMode,
  };
}
