/**
 * Tests for error types and error constructors
 */

import { describe, expect, test } from 'vitest';
import { RepoTreeError, RepoTreeErrors, treeOk, treeErr, errorMessage } from '../errors.js';

describe('RepoTreeError', () => {
  test('creates error with all properties', () => {
    const error = new RepoTreeError(
      'SETTINGS_NOT_FOUND',
      'Settings file missing.txt not found',
      { path: 'missing.txt' },
      'Pass the settings file path'
    );

    expect(error.code).toBe('SETTINGS_NOT_FOUND');
    expect(error.message).toBe('Settings file missing.txt not found');
    expect(error.details).toEqual({ path: 'missing.txt' });
    expect(error.suggestion).toBe('Pass the settings file path');
    expect(error.name).toBe('RepoTreeError');
  });

  test('format() appends the suggestion', () => {
    const error = new RepoTreeError('GIT_NOT_FOUND', 'git is not available', undefined, 'Install git');

    expect(error.format()).toBe('git is not available\n\nSuggestion: Install git');
  });

  test('format() works without suggestion', () => {
    const error = new RepoTreeError('PULL_FAILED', 'Error pulling repository api');

    expect(error.format()).toBe('Error pulling repository api');
  });
});

describe('treeOk / treeErr', () => {
  test('treeOk creates successful result', () => {
    const result = treeOk({ value: 42 });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ value: 42 });
    }
  });

  test('treeErr exposes the error directly', () => {
    const result = treeErr('CLONE_FAILED', 'clone failed', { name: 'api' }, 'retry');

    expect(result.isErr()).toBe(true);
    expect(result.error.code).toBe('CLONE_FAILED');
    expect(result.error.details).toEqual({ name: 'api' });
    expect(result.error.suggestion).toBe('retry');
  });
});

describe('RepoTreeErrors factory', () => {
  test('settingsNotFound includes path and a suggestion', () => {
    const { error } = RepoTreeErrors.settingsNotFound('settings.txt');

    expect(error.code).toBe('SETTINGS_NOT_FOUND');
    expect(error.message).toBe('Settings file settings.txt not found');
    expect(error.suggestion).toBeDefined();
  });

  test('inconsistentIndent names line and width', () => {
    const { error } = RepoTreeErrors.inconsistentIndent(7, 2, '  docs');

    expect(error.code).toBe('INCONSISTENT_INDENT');
    expect(error.message).toBe('Line 7: indentation of 2 does not match any enclosing level');
    expect(error.details).toEqual({ lineNumber: 7, width: 2, text: '  docs' });
  });

  test('inconsistentIndent format() quotes the offending line', () => {
    const { error } = RepoTreeErrors.inconsistentIndent(7, 2, '  docs');

    expect(error.format()).toBe(
      'Line 7: indentation of 2 does not match any enclosing level\n\n' +
        '  7 |   docs\n\n' +
        'Suggestion: Align the line with one of its ancestors, or drop --strict'
    );
  });

  test('invalidRepositoryName names the url and the derived name', () => {
    const { error } = RepoTreeErrors.invalidRepositoryName('https://host/...git', '..');

    expect(error.code).toBe('INVALID_REPOSITORY_NAME');
    expect(error.message).toBe('Cannot derive a directory name from https://host/...git (got "..")');
    expect(error.details).toEqual({ url: 'https://host/...git', name: '..' });
  });

  test('cloneFailed includes repository name and git message', () => {
    const { error } = RepoTreeErrors.cloneFailed('api', 'repository not found');

    expect(error.code).toBe('CLONE_FAILED');
    expect(error.message).toBe('Error cloning repository api: repository not found');
  });

  test('remoteCheckFailed includes repository name', () => {
    const { error } = RepoTreeErrors.remoteCheckFailed('web', 'exit 1');

    expect(error.code).toBe('REMOTE_CHECK_FAILED');
    expect(error.message).toBe('Error checking remote URL for repository web: exit 1');
  });

  test('directoryFailed includes path', () => {
    const { error } = RepoTreeErrors.directoryFailed('work/tools', 'EACCES');

    expect(error.code).toBe('DIRECTORY_FAILED');
    expect(error.details).toEqual({ path: 'work/tools' });
  });
});

describe('errorMessage', () => {
  test('uses the message of an Error', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
  });

  test('stringifies anything else', () => {
    expect(errorMessage(42)).toBe('42');
  });
});
