/**
 * Type definitions for the settings tree
 */

export type IndentMode = 'lenient' | 'strict';

/**
 * One level of the indent stack: an ancestor segment and the column it starts at
 */
export interface IndentEntry {
  readonly width: number;
  readonly segment: string;
}

export type IndentStack = readonly IndentEntry[];

/**
 * A git remote found in the settings file, with the directory it is cloned into
 */
export interface RepositoryDescriptor {
  readonly parentPath: string;
  readonly gitUrl: string;
}

/**
 * A parsed, non-blank settings line
 */
export interface SettingsEntry {
  readonly lineNumber: number;
  readonly depth: number;
  readonly segment: string;
  readonly kind: 'directory' | 'repository';
  /** Directory path, or the parent directory for a repository */
  readonly path: string;
}

export interface ParsedSettings {
  readonly directories: ReadonlySet<string>;
  readonly repositories: readonly RepositoryDescriptor[];
  readonly entries: readonly SettingsEntry[];
}

export interface ParseOptions {
  tabWidth?: number;
  indentMode?: IndentMode;
}
