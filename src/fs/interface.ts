/**
 * Filesystem interface for dependency injection
 */

import { FileSystemOperations, type FsResult, type MakeDirectoryStatus } from './operations.js';

export type { FsResult, MakeDirectoryStatus };

export interface IFileSystem {
  isDirectory(path: string): Promise<boolean>;
  makeDirectory(path: string): Promise<FsResult<MakeDirectoryStatus>>;
  removeDirectory(path: string): Promise<FsResult<void>>;
}

export const defaultFs: IFileSystem = {
  isDirectory: (path) => FileSystemOperations.isDirectory(path),
  makeDirectory: (path) => FileSystemOperations.makeDirectory(path),
  removeDirectory: (path) => FileSystemOperations.removeDirectory(path),
};
