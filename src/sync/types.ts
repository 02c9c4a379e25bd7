/**
 * Type definitions for repository sync
 */

import type { RepoTreeError } from '../errors.js';

/**
 * A repository descriptor resolved to the directory git clone will create
 */
export interface RepositoryTarget {
  readonly parentPath: string;
  readonly gitUrl: string;
  readonly name: string;
  readonly localPath: string;
}

export type SyncStatus = 'cloned' | 'replaced' | 'present' | 'pulled' | 'skipped' | 'failed';

export type SyncOperation = 'clone' | 'pull';

/**
 * Result of one clone or pull, success or not
 */
export interface SyncOutcome {
  target: RepositoryTarget;
  operation: SyncOperation;
  status: SyncStatus;
  message: string;
  error?: RepoTreeError;
}

export interface CloneOptions {
  /** Remove a directory that is not a clone of the configured URL and clone again */
  overwrite?: boolean;
}

export interface PullOptions {
  /** Stash and drop local changes before pulling */
  discardChanges?: boolean;
}
