/**
 * Render the parsed settings tree for dry runs
 */

import pc from 'picocolors';
import { GitUrlParser } from '../git/parser.js';
import type { SettingsEntry } from './types.js';

export type Colors = ReturnType<typeof pc.createColors>;

export interface VisualizationOptions {
  showUrls?: boolean;
}

export class SettingsTreeVisualizer {
  private readonly colors: Colors;

  constructor(colors?: Colors) {
    this.colors = colors || pc;
  }

  /**
   * Draw entries as a box-drawing tree, one line per entry.
   * Depth grows by exactly one level per nesting step, so each entry's
   * prefix is decided by whether its ancestors were the last of their siblings.
   */
  visualize(entries: readonly SettingsEntry[], options: VisualizationOptions = {}): string[] {
    const showUrls = options.showUrls ?? true;
    const lines: string[] = [];
    const lastAtDepth: boolean[] = [];

    entries.forEach((entry, index) => {
      const isLast = this.isLastSibling(entries, index);
      lastAtDepth[entry.depth] = isLast;

      let prefix = '';
      for (let depth = 1; depth < entry.depth; depth++) {
        prefix += lastAtDepth[depth] ? '    ' : '│   ';
      }
      const connector = entry.depth === 0 ? '' : this.colors.dim(isLast ? '└── ' : '├── ');

      lines.push(prefix + connector + this.label(entry, showUrls));
    });

    return lines;
  }

  private label(entry: SettingsEntry, showUrls: boolean): string {
    if (entry.kind === 'directory') {
      return this.colors.bold(entry.segment) + '/';
    }
    const name = this.colors.cyan(GitUrlParser.repositoryName(entry.segment));
    return showUrls ? `${name} ${this.colors.dim(entry.segment)}` : name;
  }

  private isLastSibling(entries: readonly SettingsEntry[], index: number): boolean {
    const depth = entries[index].depth;
    for (let i = index + 1; i < entries.length; i++) {
      if (entries[i].depth < depth) return true;
      if (entries[i].depth === depth) return false;
    }
    return true;
  }
}
