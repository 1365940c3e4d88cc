/**
 * Candidate File Collection
 *
 * Lists the Python files of the working tree that usages are searched in.
 */

import { promises as fs, type Dirent } from 'fs';
import * as path from 'path';
import type { Logger } from '../../lib/logger.js';
import { FileSelector, toPosix } from './FileSelector.js';

const SKIPPED_DIRECTORIES = new Set(['__pycache__', 'node_modules']);

export interface CollectOptions {
  selector: FileSelector;
  /** Results beyond this count are dropped with a warning */
  maxFiles: number;
  logger: Logger;
}

/**
 * Walk `repositoryPath` and return selected `.py` files as sorted
 * repository-relative POSIX paths
 */
export async function collectCandidateFiles(repositoryPath: string, options: CollectOptions): Promise<string[]> {
  const root = path.resolve(repositoryPath);
  const found: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      options.logger.debug('Cannot list directory', { dir, error: String(error) });
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (entry.name.startsWith('.') || SKIPPED_DIRECTORIES.has(entry.name)) continue;
        await walk(fullPath);
      } else if (entry.isFile() && entry.name.endsWith('.py')) {
        const relative = toPosix(path.relative(root, fullPath));
        if (options.selector.isSelected(relative)) {
          found.push(relative);
        }
      }
    }
  };

  await walk(root);
  found.sort();

  if (found.length > options.maxFiles) {
    options.logger.warn('Candidate file limit reached, searching a subset', {
      found: found.length,
      limit: options.maxFiles,
    });
    return found.slice(0, options.maxFiles);
  }
  return found;
}
