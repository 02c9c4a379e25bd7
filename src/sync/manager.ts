/**
 * Repository sync - clone and pull the repositories of a parsed settings tree
 *
 * Every git failure is captured in the returned outcome, so a caller can walk
 * the whole list without one repository stopping the rest.
 */

import { RepoTreeErrors, type RepoTreeError } from '../errors.js';
import { type IGitOperations, defaultGitOps } from '../git/interface.js';
import { GitUrlParser } from '../git/parser.js';
import { type IFileSystem, defaultFs } from '../fs/interface.js';
import { type PathUtils, nodePathUtils } from '../settings/paths.js';
import type { RepositoryDescriptor } from '../settings/types.js';
import type {
  CloneOptions,
  PullOptions,
  RepositoryTarget,
  SyncOperation,
  SyncOutcome,
  SyncStatus,
} from './types.js';

interface RepositoryState {
  isDirectory: boolean;
  isGitRepository: boolean;
}

export class RepositorySync {
  private readonly git: IGitOperations;
  private readonly fs: IFileSystem;
  private readonly paths: PathUtils;

  constructor(gitOps?: IGitOperations, fileSystem?: IFileSystem, paths?: PathUtils) {
    this.git = gitOps || defaultGitOps;
    this.fs = fileSystem || defaultFs;
    this.paths = paths || nodePathUtils;
  }

  /**
   * Resolve a descriptor to its repository name and local path
   */
  resolveTarget(descriptor: RepositoryDescriptor): RepositoryTarget {
    const name = GitUrlParser.repositoryName(descriptor.gitUrl);
    return {
      parentPath: descriptor.parentPath,
      gitUrl: descriptor.gitUrl,
      name,
      localPath: this.paths.join(descriptor.parentPath, name),
    };
  }

  /**
   * Clone a repository unless a directory already occupies its path
   */
  async clone(target: RepositoryTarget, options: CloneOptions = {}): Promise<SyncOutcome> {
    if (!GitUrlParser.isUsableName(target.name)) {
      return invalidName(target, 'clone');
    }

    const state = await this.inspect(target);

    if (!state.isDirectory) {
      return this.runClone(target, 'cloned', `Cloned repository ${target.name} into ${target.parentPath}`);
    }

    if (!state.isGitRepository) {
      if (options.overwrite) {
        return this.replace(target);
      }
      return outcome(
        target,
        'clone',
        'skipped',
        `Directory ${target.localPath} exists but is not a git repository, skipping`
      );
    }

    const remote = await this.git.getRemoteUrl(target.localPath);
    if (remote.isErr()) {
      return failure(
        target,
        'clone',
        RepoTreeErrors.remoteCheckFailed(target.name, remote.error.message).error
      );
    }

    if (remote.value === target.gitUrl) {
      return outcome(
        target,
        'clone',
        'present',
        `Repository ${target.name} already exists and has the same remote, skipping`
      );
    }

    if (options.overwrite) {
      return this.replace(target);
    }
    return outcome(
      target,
      'clone',
      'skipped',
      `Repository ${target.name} already exists but has a different remote URL (${remote.value})`
    );
  }

  /**
   * Pull the latest changes into an existing clone
   */
  async pull(target: RepositoryTarget, options: PullOptions = {}): Promise<SyncOutcome> {
    if (!GitUrlParser.isUsableName(target.name)) {
      return invalidName(target, 'pull');
    }

    const state = await this.inspect(target);

    if (!state.isDirectory) {
      return outcome(
        target,
        'pull',
        'skipped',
        `Repository directory ${target.localPath} does not exist, skipping pull`
      );
    }

    if (!state.isGitRepository) {
      return outcome(
        target,
        'pull',
        'skipped',
        `Directory ${target.localPath} exists but is not a git repository, skipping`
      );
    }

    if (options.discardChanges) {
      const stashed = await this.git.stash(target.localPath);
      if (stashed.isErr()) {
        return failure(
          target,
          'pull',
          RepoTreeErrors.stashFailed(target.name, stashed.error.message).error
        );
      }

      if (stashed.value) {
        const dropped = await this.git.dropStash(target.localPath);
        if (dropped.isErr()) {
          return failure(
            target,
            'pull',
            RepoTreeErrors.stashFailed(target.name, dropped.error.message).error
          );
        }
      }
    }

    const pulled = await this.git.pull(target.localPath);
    if (pulled.isErr()) {
      return failure(target, 'pull', RepoTreeErrors.pullFailed(target.name, pulled.error.message).error);
    }

    return outcome(target, 'pull', 'pulled', `Pulled latest changes for repository ${target.name}`);
  }

  private async inspect(target: RepositoryTarget): Promise<RepositoryState> {
    const isDirectory = await this.fs.isDirectory(target.localPath);
    const isGitRepository =
      isDirectory && (await this.fs.isDirectory(this.paths.join(target.localPath, '.git')));
    return { isDirectory, isGitRepository };
  }

  private async replace(target: RepositoryTarget): Promise<SyncOutcome> {
    const removed = await this.fs.removeDirectory(target.localPath);
    if (removed.isErr()) {
      return failure(
        target,
        'clone',
        RepoTreeErrors.removeFailed(target.localPath, removed.error.message).error
      );
    }
    return this.runClone(
      target,
      'replaced',
      `Replaced ${target.localPath} with a fresh clone of ${target.gitUrl}`
    );
  }

  private async runClone(
    target: RepositoryTarget,
    status: SyncStatus,
    message: string
  ): Promise<SyncOutcome> {
    const cloned = await this.git.clone(target.gitUrl, target.parentPath);
    if (cloned.isErr()) {
      return failure(target, 'clone', RepoTreeErrors.cloneFailed(target.name, cloned.error.message).error);
    }
    return outcome(target, 'clone', status, message);
  }
}

function outcome(
  target: RepositoryTarget,
  operation: SyncOperation,
  status: SyncStatus,
  message: string
): SyncOutcome {
  return { target, operation, status, message };
}

function failure(
  target: RepositoryTarget,
  operation: SyncOperation,
  error: RepoTreeError
): SyncOutcome {
  return { target, operation, status: 'failed', message: error.message, error };
}

// The local path of such a target is its parent, which must never be removed or pulled
function invalidName(target: RepositoryTarget, operation: SyncOperation): SyncOutcome {
  return failure(
    target,
    operation,
    RepoTreeErrors.invalidRepositoryName(target.gitUrl, target.name).error
  );
}

/**
 * Count outcomes per status for the closing summary
 */
export function summarizeOutcomes(outcomes: readonly SyncOutcome[]): Record<SyncStatus, number> {
  const counts: Record<SyncStatus, number> = {
    cloned: 0,
    replaced: 0,
    present: 0,
    pulled: 0,
    skipped: 0,
    failed: 0,
  };
  for (const item of outcomes) {
    counts[item.status]++;
  }
  return counts;
}
