/**
 * File Selection
 *
 * Include/exclude glob lists over repository-relative paths. Exclusion wins:
 * a file matching any exclude pattern is dropped even when it is included.
 */

import { Minimatch } from 'minimatch';

export interface SelectionResult {
  selected: boolean;
  matchedPattern?: string;
  reason: string;
}

export class FileSelector {
  private readonly include: Minimatch[];
  private readonly exclude: Minimatch[];

  constructor(includePatterns: readonly string[], excludePatterns: readonly string[] = []) {
    const options = { dot: true, matchBase: true };
    this.include = includePatterns.map(p => new Minimatch(p, options));
    this.exclude = excludePatterns.map(p => new Minimatch(p, options));
  }

  /**
   * Check a path and say which pattern decided it
   */
  check(filePath: string): SelectionResult {
    const normalized = toPosix(filePath);

    for (const matcher of this.exclude) {
      if (matcher.match(normalized)) {
        return { selected: false, matchedPattern: matcher.pattern, reason: `Excluded by "${matcher.pattern}"` };
      }
    }

    for (const matcher of this.include) {
      if (matcher.match(normalized)) {
        return { selected: true, matchedPattern: matcher.pattern, reason: `Included by "${matcher.pattern}"` };
      }
    }

    return { selected: false, reason: 'No include pattern matched' };
  }

  isSelected(filePath: string): boolean {
    return this.check(filePath).selected;
  }
}

/**
 * Repository-relative path with forward slashes and no leading ./
 */
export function toPosix(filePath: string): string {
  return filePath.replace(/\\/g, '/').replace(/^\.\//, '');
}
