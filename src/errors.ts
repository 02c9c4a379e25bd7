/**
 * Error types using neverthrow for Rust-style error handling
 */

import { err, ok, Err, Result } from 'neverthrow';

/**
 * All possible error codes for settings parsing and repository sync
 */
export type RepoTreeErrorCode =
  | 'SETTINGS_NOT_FOUND'
  | 'SETTINGS_UNREADABLE'
  | 'INCONSISTENT_INDENT'
  | 'GIT_NOT_FOUND'
  | 'CLONE_FAILED'
  | 'PULL_FAILED'
  | 'REMOTE_CHECK_FAILED'
  | 'STASH_FAILED'
  | 'INVALID_REPOSITORY_NAME'
  | 'REMOVE_FAILED'
  | 'DIRECTORY_FAILED';

/**
 * Structured error carrying a code, details and an optional hint for the user
 */
export class RepoTreeError extends Error {
  constructor(
    public readonly code: RepoTreeErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'RepoTreeError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    let output = this.message;
    const excerpt = this.sourceExcerpt();
    if (excerpt) {
      output += `\n\n${excerpt}`;
    }
    if (this.suggestion) {
      output += `\n\nSuggestion: ${this.suggestion}`;
    }
    return output;
  }

  /**
   * The offending settings line, gutter-numbered, when the error points at one
   */
  private sourceExcerpt(): string | undefined {
    const lineNumber = this.details?.lineNumber;
    const text = this.details?.text;
    if (typeof lineNumber !== 'number' || typeof text !== 'string') {
      return undefined;
    }
    return `  ${lineNumber} | ${text}`;
  }
}

export type RepoTreeResult<T> = Result<T, RepoTreeError>;

export const treeOk = <T>(value: T): RepoTreeResult<T> => ok(value);

export const treeErr = <T = never>(
  code: RepoTreeErrorCode,
  message: string,
  details?: Record<string, unknown>,
  suggestion?: string
): Err<T, RepoTreeError> => err(new RepoTreeError(code, message, details, suggestion));

/**
 * Common error constructors for consistent error messages
 */
export const RepoTreeErrors = {
  settingsNotFound: (path: string) =>
    treeErr(
      'SETTINGS_NOT_FOUND',
      `Settings file ${path} not found`,
      { path },
      'Pass the settings file path as the first argument'
    ),

  settingsUnreadable: (path: string, message: string) =>
    treeErr('SETTINGS_UNREADABLE', `Failed to read settings file ${path}: ${message}`, {
      path,
    }),

  inconsistentIndent: (lineNumber: number, width: number, text: string) =>
    treeErr(
      'INCONSISTENT_INDENT',
      `Line ${lineNumber}: indentation of ${width} does not match any enclosing level`,
      { lineNumber, width, text },
      'Align the line with one of its ancestors, or drop --strict'
    ),

  gitNotFound: (message: string) =>
    treeErr(
      'GIT_NOT_FOUND',
      `git is not available: ${message}`,
      undefined,
      'Install git and make sure it is on your PATH'
    ),

  cloneFailed: (name: string, message: string) =>
    treeErr('CLONE_FAILED', `Error cloning repository ${name}: ${message}`, { name }),

  pullFailed: (name: string, message: string) =>
    treeErr('PULL_FAILED', `Error pulling repository ${name}: ${message}`, { name }),

  remoteCheckFailed: (name: string, message: string) =>
    treeErr(
      'REMOTE_CHECK_FAILED',
      `Error checking remote URL for repository ${name}: ${message}`,
      { name }
    ),

  stashFailed: (name: string, message: string) =>
    treeErr('STASH_FAILED', `Error discarding local changes in ${name}: ${message}`, { name }),

  invalidRepositoryName: (url: string, name: string) =>
    treeErr(
      'INVALID_REPOSITORY_NAME',
      `Cannot derive a directory name from ${url} (got "${name}")`,
      { url, name },
      'Check that the URL ends in <name>.git'
    ),

  removeFailed: (path: string, message: string) =>
    treeErr('REMOVE_FAILED', `Error removing ${path}: ${message}`, { path }),

  directoryFailed: (path: string, message: string) =>
    treeErr('DIRECTORY_FAILED', `Error creating directory ${path}: ${message}`, { path }),
};

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
