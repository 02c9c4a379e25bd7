/**
 * Filesystem wrappers using neverthrow Result types
 */

import { mkdir, rm, stat } from 'node:fs/promises';
import { Result, ResultAsync, ok } from 'neverthrow';

export type FsResult<T> = Result<T, Error>;

export type MakeDirectoryStatus = 'created' | 'exists';

export class FileSystemOperations {
  /**
   * Check whether a path exists and is a directory
   */
  static async isDirectory(path: string): Promise<boolean> {
    const result = await ResultAsync.fromPromise(stat(path), toError);
    return result.isOk() && result.value.isDirectory();
  }

  /**
   * Create a directory and any missing parents
   */
  static async makeDirectory(path: string): Promise<FsResult<MakeDirectoryStatus>> {
    if (await this.isDirectory(path)) {
      return ok('exists');
    }
    const result = await ResultAsync.fromPromise(mkdir(path, { recursive: true }), toError);
    return result.map((): MakeDirectoryStatus => 'created');
  }

  /**
   * Remove a directory tree
   */
  static async removeDirectory(path: string): Promise<FsResult<void>> {
    return ResultAsync.fromPromise(rm(path, { recursive: true, force: true }), toError);
  }
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
