/**
 * In-memory stand-ins for git and the working tree
 */

import { ContentUnavailableError } from '../../src/lib/errors/DetectorErrors.js';
import type { FileReader, RevisionContentProvider } from '../../src/models/RevisionContentProvider.js';

export const BASE = 'base';
export const HEAD = 'head';

/**
 * Two snapshots of a repository keyed by path; a missing key means the
 * file does not exist at that revision
 */
export class InMemoryContentProvider implements RevisionContentProvider {
  readonly baseRevision = BASE;
  readonly headRevision = HEAD;
  readonly reads: string[] = [];

  constructor(
    private readonly base: Record<string, string>,
    private readonly head: Record<string, string>,
    private readonly unavailable: ReadonlySet<string> = new Set()
  ) {}

  async changedFiles(): Promise<string[]> {
    const paths = new Set([...Object.keys(this.base), ...Object.keys(this.head)]);
    return [...paths].filter(p => this.base[p] !== this.head[p]).sort();
  }

  async contentAt(filePath: string, revision: string): Promise<string> {
    this.reads.push(`${revision}:${filePath}`);
    if (this.unavailable.has(filePath)) {
      throw new ContentUnavailableError(filePath, revision);
    }
    const snapshot = revision === BASE ? this.base : this.head;
    return snapshot[filePath] ?? '';
  }
}

/**
 * Reader over a path-to-text record that counts reads per path
 */
export function inMemoryReader(files: Record<string, string>): { readFile: FileReader; readCounts: Map<string, number> } {
  const readCounts = new Map<string, number>();
  const readFile: FileReader = async filePath => {
    readCounts.set(filePath, (readCounts.get(filePath) ?? 0) + 1);
    const content = files[filePath];
    if (content === undefined) {
      throw new Error(`ENOENT: ${filePath}`);
    }
    return content;
  };
  return { readFile, readCounts };
}

/**
 * Join lines so test sources read like Python files
 */
export const py = (...lines: string[]): string => lines.join('\n') + '\n';
