/**
 * Read a settings file from disk and parse it
 */

import { readFile } from 'node:fs/promises';
import { ResultAsync } from 'neverthrow';
import { RepoTreeErrors, errorMessage, type RepoTreeResult } from '../errors.js';
import { parseSettings, splitLines } from './parser.js';
import { type PathUtils, nodePathUtils } from './paths.js';
import type { ParseOptions, ParsedSettings } from './types.js';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function loadSettings(
  settingsFile: string,
  options: ParseOptions = {},
  paths: PathUtils = nodePathUtils
): Promise<RepoTreeResult<ParsedSettings>> {
  const content = await ResultAsync.fromPromise(readFile(settingsFile, 'utf8'), (e) => e);

  if (content.isErr()) {
    if (isMissingFile(content.error)) {
      return RepoTreeErrors.settingsNotFound(settingsFile);
    }
    return RepoTreeErrors.settingsUnreadable(settingsFile, errorMessage(content.error));
  }

  return parseSettings(splitLines(content.value), options, paths);
}
