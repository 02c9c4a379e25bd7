/**
 * Settings parser - turns an indented list of directories and git remotes
 * into the directories to create and the repositories to clone
 *
 * Example settings file:
 *
 *   ~/work
 *       tools
 *           git@github.com:acme/build-scripts.git
 *       https://git.example.com/acme/website.git
 *
 * Nesting is purely relative: a line indented further than the previous one
 * opens a new level, a line indented less closes every level at or beyond
 * its width. No fixed indent unit is required.
 */

import { err } from 'neverthrow';
import { RepoTreeErrors, treeOk, type RepoTreeResult } from '../errors.js';
import { GitUrlParser } from '../git/parser.js';
import { type PathUtils, nodePathUtils } from './paths.js';
import type {
  IndentStack,
  ParseOptions,
  ParsedSettings,
  RepositoryDescriptor,
  SettingsEntry,
} from './types.js';

export const DEFAULT_TAB_WIDTH = 4;

// Parent of a repository listed at the top level
const CURRENT_DIRECTORY = '.';

/**
 * Count the columns of leading whitespace, expanding each tab to tabWidth
 */
export function measureIndent(line: string, tabWidth = DEFAULT_TAB_WIDTH): number {
  let width = 0;
  for (const char of line) {
    if (char === '\t') {
      width += tabWidth;
    } else if (/\s/.test(char)) {
      width += 1;
    } else {
      break;
    }
  }
  return width;
}

/**
 * Place a segment on the stack. Returns a new stack; the input is untouched.
 *
 * `realigned` is set when the width matched no existing level, i.e. a dedent
 * to a column no ancestor started at. The segment still becomes a new level.
 */
export function pushSegment(
  stack: IndentStack,
  width: number,
  segment: string
): { stack: IndentStack; realigned: boolean } {
  const top = stack[stack.length - 1];
  if (!top || width > top.width) {
    return { stack: [...stack, { width, segment }], realigned: false };
  }

  const kept = stack.filter((entry) => entry.width < width);
  const realigned = !stack.some((entry) => entry.width === width);
  return { stack: [...kept, { width, segment }], realigned };
}

interface LineResult {
  stack: IndentStack;
  entry: SettingsEntry;
}

function parseLine(
  stack: IndentStack,
  line: string,
  lineNumber: number,
  options: Required<ParseOptions>,
  paths: PathUtils
): RepoTreeResult<LineResult> {
  const width = measureIndent(line, options.tabWidth);
  const segment = line.trim();

  const next = pushSegment(stack, width, segment);
  if (next.realigned && options.indentMode === 'strict') {
    return RepoTreeErrors.inconsistentIndent(lineNumber, width, line);
  }

  const segments = next.stack.map((entry) => entry.segment);
  const depth = segments.length - 1;

  if (GitUrlParser.isRemoteUrl(segment)) {
    const ancestors = segments.slice(0, -1);
    const parentPath =
      ancestors.length > 0 ? paths.expandHome(paths.join(...ancestors)) : CURRENT_DIRECTORY;
    return treeOk({
      stack: next.stack,
      entry: { lineNumber, depth, segment, kind: 'repository', path: parentPath },
    });
  }

  return treeOk({
    stack: next.stack,
    entry: {
      lineNumber,
      depth,
      segment,
      kind: 'directory',
      path: paths.expandHome(paths.join(...segments)),
    },
  });
}

/**
 * Parse settings lines into the directory set and repository descriptors
 */
export function parseSettings(
  lines: readonly string[],
  options: ParseOptions = {},
  paths: PathUtils = nodePathUtils
): RepoTreeResult<ParsedSettings> {
  const resolved: Required<ParseOptions> = {
    tabWidth: options.tabWidth ?? DEFAULT_TAB_WIDTH,
    indentMode: options.indentMode ?? 'lenient',
  };

  let stack: IndentStack = [];
  const entries: SettingsEntry[] = [];

  for (const [index, line] of lines.entries()) {
    if (!line.trim()) continue;

    const result = parseLine(stack, line, index + 1, resolved, paths);
    if (result.isErr()) {
      return err(result.error);
    }
    stack = result.value.stack;
    entries.push(result.value.entry);
  }

  const directories = new Set<string>();
  const repositories: RepositoryDescriptor[] = [];

  for (const entry of entries) {
    if (entry.kind === 'directory') {
      directories.add(entry.path);
      continue;
    }
    if (entry.path !== CURRENT_DIRECTORY) {
      directories.add(entry.path);
    }
    repositories.push({ parentPath: entry.path, gitUrl: entry.segment });
  }

  return treeOk({ directories, repositories, entries });
}

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Split file contents into lines, accepting both LF and CRLF endings.
 * A leading byte order mark is dropped so it does not count as indentation.
 */
export function splitLines(content: string): string[] {
  const text = content.startsWith(BYTE_ORDER_MARK) ? content.slice(1) : content;
  return text.split(/\r?\n/);
}
