/**
 * Parse git remote URLs into local repository names
 */

const GIT_SUFFIX = '.git';

// Names that would resolve to the parent directory itself or above it
const RESERVED_NAMES = new Set(['', '.', '..']);

// user@host: (scp-like ssh syntax, e.g. git@github.com:) or https://
const REMOTE_PREFIX = /^(?:[\w.-]+@[\w.-]+:|https:\/\/)/;

export class GitUrlParser {
  /**
   * Whether a settings line names a git remote rather than a directory.
   * Both the remote prefix and the .git suffix are required, so a directory
   * called "notes.git" stays a directory.
   */
  static isRemoteUrl(text: string): boolean {
    return text.endsWith(GIT_SUFFIX) && REMOTE_PREFIX.test(text);
  }

  /**
   * Derive the directory name git clone creates for a remote URL
   *
   * @example
   * GitUrlParser.repositoryName('git@github.com:user/Example.git'); // 'Example'
   * GitUrlParser.repositoryName('git@addr:example3.git'); // 'example3'
   */
  static repositoryName(url: string): string {
    const trimmed = url.endsWith(GIT_SUFFIX) ? url.slice(0, -GIT_SUFFIX.length) : url;
    const lastSegment = trimmed.split('/').pop() ?? trimmed;
    if (lastSegment.includes(':')) {
      return lastSegment.split(':').pop() ?? lastSegment;
    }
    return lastSegment;
  }

  /**
   * Whether a derived name can be used as a single directory below its parent
   */
  static isUsableName(name: string): boolean {
    return !RESERVED_NAMES.has(name) && !/[\\/]/.test(name);
  }
}
