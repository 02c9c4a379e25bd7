/**
 * Directory materialization for the parsed settings tree
 */

import { RepoTreeErrors, type RepoTreeError } from '../errors.js';
import { type IFileSystem, defaultFs } from './interface.js';

export interface DirectoryReport {
  path: string;
  status: 'created' | 'exists' | 'failed';
  error?: RepoTreeError;
}

/**
 * Create every directory in sorted order, one at a time.
 * A failed path is reported and the remaining ones are still attempted.
 */
export async function createDirectories(
  directories: Iterable<string>,
  fs: IFileSystem = defaultFs
): Promise<DirectoryReport[]> {
  const reports: DirectoryReport[] = [];

  for (const path of [...directories].sort()) {
    const result = await fs.makeDirectory(path);
    if (result.isErr()) {
      reports.push({
        path,
        status: 'failed',
        error: RepoTreeErrors.directoryFailed(path, result.error.message).error,
      });
      continue;
    }
    reports.push({ path, status: result.value });
  }

  return reports;
}
