/**
 * Path joining and home-directory expansion, kept behind an interface so the
 * parser never touches the platform directly
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

export interface PathUtils {
  join(...segments: string[]): string;
  expandHome(path: string): string;
}

export const nodePathUtils: PathUtils = {
  join: (...segments) => join(...segments),
  expandHome: (path) => {
    if (path === '~') {
      return homedir();
    }
    if (path.startsWith('~/')) {
      return join(homedir(), path.slice(2));
    }
    return path;
  },
};

