/**
 * Low-level git command wrappers using neverthrow Result types
 */

import { spawn } from 'node:child_process';
import { Result, ResultAsync, ok, err } from 'neverthrow';
import { GitError, type GitExecResult } from './types.js';

export type GitResult<T> = Result<T, GitError>;

export class GitOperations {
  /**
   * Execute a git command and capture its output.
   * Rejects when the git binary cannot be spawned at all.
   */
  static exec(args: string[], cwd?: string): Promise<GitExecResult> {
    return new Promise((resolve, reject) => {
      const proc = spawn('git', args, {
        cwd: cwd || process.cwd(),
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      proc.stdout.setEncoding('utf8');
      proc.stderr.setEncoding('utf8');
      proc.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      proc.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      proc.on('error', reject);
      proc.on('close', (code) => {
        resolve({ stdout, stderr, exitCode: code ?? 1 });
      });
    });
  }

  /**
   * Execute a git command and return Result
   */
  static async execResult(args: string[], cwd?: string): Promise<GitResult<string>> {
    const command = `git ${args.join(' ')}`;
    const spawned = await ResultAsync.fromPromise(
      this.exec(args, cwd),
      (e) => new GitError(e instanceof Error ? e.message : String(e), command, -1)
    );
    if (spawned.isErr()) {
      return err(spawned.error);
    }

    const result = spawned.value;
    if (result.exitCode !== 0) {
      return err(
        new GitError(result.stderr.trim() || 'Git command failed', command, result.exitCode)
      );
    }
    return ok(result.stdout.trim());
  }

  /**
   * Check that a git binary can be run
   */
  static async getVersion(): Promise<GitResult<string>> {
    return this.execResult(['--version']);
  }

  /**
   * Clone a remote into a new directory under parentDir
   */
  static async clone(url: string, parentDir: string): Promise<GitResult<void>> {
    const result = await this.execResult(['clone', url], parentDir);
    return result.map(() => undefined);
  }

  /**
   * Get the URL of the origin remote
   */
  static async getRemoteUrl(repoPath: string): Promise<GitResult<string>> {
    return this.execResult(['config', '--get', 'remote.origin.url'], repoPath);
  }

  /**
   * Pull the current branch
   */
  static async pull(repoPath: string): Promise<GitResult<void>> {
    const result = await this.execResult(['pull'], repoPath);
    return result.map(() => undefined);
  }

  /**
   * Commit id of the newest stash entry, or null when the stash is empty
   */
  static async getStashHead(repoPath: string): Promise<GitResult<string | null>> {
    const args = ['rev-parse', '-q', '--verify', 'refs/stash'];
    const command = `git ${args.join(' ')}`;
    const spawned = await ResultAsync.fromPromise(
      this.exec(args, repoPath),
      (e) => new GitError(e instanceof Error ? e.message : String(e), command, -1)
    );
    if (spawned.isErr()) {
      return err(spawned.error);
    }

    const { stdout, stderr, exitCode } = spawned.value;
    if (exitCode === 0) {
      return ok(stdout.trim());
    }
    // --verify -q exits 1 silently when the ref does not exist
    if (exitCode === 1 && !stderr.trim()) {
      return ok(null);
    }
    return err(new GitError(stderr.trim() || 'Git command failed', command, exitCode));
  }

  /**
   * Stash local changes. Resolves to false when there was nothing to stash,
   * judged by whether refs/stash moved rather than by git's (localized) output.
   */
  static async stash(repoPath: string): Promise<GitResult<boolean>> {
    const before = await this.getStashHead(repoPath);
    if (before.isErr()) {
      return err(before.error);
    }

    const stashed = await this.execResult(['stash'], repoPath);
    if (stashed.isErr()) {
      return err(stashed.error);
    }

    const after = await this.getStashHead(repoPath);
    return after.map((head) => head !== null && head !== before.value);
  }

  /**
   * Drop the most recent stash entry
   */
  static async dropStash(repoPath: string): Promise<GitResult<void>> {
    const result = await this.execResult(['stash', 'drop'], repoPath);
    return result.map(() => undefined);
  }
}
