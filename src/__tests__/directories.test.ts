/**
 * Tests for directory materialization
 */

import { describe, expect, test } from 'vitest';
import { ok, err } from 'neverthrow';
import { createDirectories } from '../fs/directories.js';
import type { IFileSystem, FsResult, MakeDirectoryStatus } from '../fs/interface.js';

function createRecordingFs(existing: string[], failing: string[] = []): IFileSystem & { made: string[] } {
  const made: string[] = [];
  return {
    made,
    async isDirectory(path: string): Promise<boolean> {
      return existing.includes(path);
    },
    async makeDirectory(path: string): Promise<FsResult<MakeDirectoryStatus>> {
      made.push(path);
      if (failing.includes(path)) return err(new Error('EACCES: permission denied'));
      return ok(existing.includes(path) ? 'exists' : 'created');
    },
    async removeDirectory(): Promise<FsResult<void>> {
      return ok(undefined);
    },
  };
}

describe('createDirectories', () => {
  test('creates directories in sorted order and reports existing ones', async () => {
    const fs = createRecordingFs(['work']);

    const reports = await createDirectories(new Set(['work/tools', 'docs', 'work']), fs);

    expect(fs.made).toEqual(['docs', 'work', 'work/tools']);
    expect(reports).toEqual([
      { path: 'docs', status: 'created' },
      { path: 'work', status: 'exists' },
      { path: 'work/tools', status: 'created' },
    ]);
  });

  test('continues after a failure', async () => {
    const fs = createRecordingFs([], ['a']);

    const reports = await createDirectories(['b', 'a'], fs);

    expect(reports.map((r) => [r.path, r.status])).toEqual([
      ['a', 'failed'],
      ['b', 'created'],
    ]);
    expect(reports[0].error?.code).toBe('DIRECTORY_FAILED');
    expect(reports[0].error?.message).toBe('Error creating directory a: EACCES: permission denied');
  });
});
