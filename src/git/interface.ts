/**
 * Git operations interface for dependency injection
 *
 * This interface allows mocking git operations in tests.
 */

import type { GitResult } from './operations.js';
import { GitOperations } from './operations.js';

export type { GitResult };

export interface IGitOperations {
  isAvailable(): Promise<GitResult<string>>;
  clone(url: string, parentDir: string): Promise<GitResult<void>>;
  getRemoteUrl(repoPath: string): Promise<GitResult<string>>;
  pull(repoPath: string): Promise<GitResult<void>>;
  stash(repoPath: string): Promise<GitResult<boolean>>;
  dropStash(repoPath: string): Promise<GitResult<void>>;
}

/**
 * Default implementation using the real GitOperations
 */
export const defaultGitOps: IGitOperations = {
  isAvailable: () => GitOperations.getVersion(),
  clone: (url, parentDir) => GitOperations.clone(url, parentDir),
  getRemoteUrl: (repoPath) => GitOperations.getRemoteUrl(repoPath),
  pull: (repoPath) => GitOperations.pull(repoPath),
  stash: (repoPath) => GitOperations.stash(repoPath),
  dropStash: (repoPath) => GitOperations.dropStash(repoPath),
};
