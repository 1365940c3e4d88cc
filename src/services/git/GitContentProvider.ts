/**
 * GitContentProvider.ts
 * Changed Python files between two revisions and their text at each revision
 */

import { simpleGit } from 'simple-git';
import { Result, ok, err, errorMessage } from '../../lib/result-types.js';
import { ContentUnavailableError, GitReferenceError } from '../../lib/errors/DetectorErrors.js';
import type { Logger } from '../../lib/logger.js';
import type { RevisionContentProvider } from '../../models/RevisionContentProvider.js';
import type { FileSelector } from '../files/FileSelector.js';

/**
 * The git commands this provider runs; satisfied by a SimpleGit instance
 */
export interface GitCommandRunner {
  diff(args: string[]): Promise<string>;
  show(args: string[]): Promise<string>;
  revparse(args: string[]): Promise<string>;
}

export interface ChangedPath {
  path: string;
  /** Path at the base revision when the file was renamed */
  oldPath?: string;
  status: 'A' | 'M' | 'R';
}

const REF_PATTERN = /^[A-Za-z0-9._/@~^-]+$/;

const MISSING_AT_REVISION = ['does not exist', 'exists on disk, but not in'];

/**
 * Reject refs that are empty, option-like or carry characters outside the
 * allowed set
 */
export function validateRef(ref: string): Result<string, GitReferenceError> {
  const trimmed = ref.trim();
  if (trimmed === '') {
    return err(new GitReferenceError(ref, 'reference is empty'));
  }
  if (trimmed.startsWith('-')) {
    return err(new GitReferenceError(ref, 'reference cannot start with "-"'));
  }
  if (!REF_PATTERN.test(trimmed) || trimmed.includes('..')) {
    return err(new GitReferenceError(ref, 'reference contains characters outside [A-Za-z0-9._/@~^-]'));
  }
  return ok(trimmed);
}

/**
 * Parse `git diff --name-status` output
 * Format: STATUS\tPATH or R<score>\tOLD_PATH\tNEW_PATH
 */
export function parseNameStatus(output: string): ChangedPath[] {
  const changed: ChangedPath[] = [];

  for (const line of output.split('\n')) {
    if (!line.trim()) continue;
    const parts = line.split('\t');
    const status = parts[0]?.charAt(0);

    if (status === 'R' && parts.length >= 3) {
      const oldPath = parts[1];
      const newPath = parts[2];
      if (oldPath && newPath) changed.push({ path: newPath, oldPath, status: 'R' });
    } else if ((status === 'A' || status === 'M') && parts[1]) {
      changed.push({ path: parts[1], status });
    }
  }

  return changed;
}

export class GitContentProvider implements RevisionContentProvider {
  private readonly renamedFrom = new Map<string, string>();

  private constructor(
    private readonly git: GitCommandRunner,
    readonly baseRevision: string,
    readonly headRevision: string,
    private readonly selector: FileSelector,
    private readonly logger: Logger
  ) {}

  /**
   * Validate both refs and build a provider for a working tree
   *
   * @param git - Command runner; defaults to simple-git on `repositoryPath`
   */
  static create(
    repositoryPath: string,
    baseRef: string,
    headRef: string,
    selector: FileSelector,
    logger: Logger,
    git: GitCommandRunner = simpleGit(repositoryPath)
  ): Result<GitContentProvider, GitReferenceError> {
    const base = validateRef(baseRef);
    if (base.isErr()) return err(base.error);
    const head = validateRef(headRef);
    if (head.isErr()) return err(head.error);

    return ok(new GitContentProvider(git, base.value, head.value, selector, logger));
  }

  /**
   * Check both revisions resolve to commits
   */
  async verifyRevisions(): Promise<Result<void, GitReferenceError>> {
    for (const ref of [this.baseRevision, this.headRevision]) {
      try {
        await this.git.revparse(['--verify', `${ref}^{commit}`]);
      } catch (error) {
        return err(new GitReferenceError(ref, errorMessage(error).trim()));
      }
    }
    return ok(undefined);
  }

  async changedFiles(): Promise<string[]> {
    const output = await this.git.diff([
      '--name-status',
      '--diff-filter=AMR',
      this.baseRevision,
      this.headRevision,
    ]);

    const paths: string[] = [];
    for (const entry of parseNameStatus(output)) {
      if (!/\.pyi?$/.test(entry.path) || !this.selector.isSelected(entry.path)) continue;
      if (entry.oldPath) this.renamedFrom.set(entry.path, entry.oldPath);
      paths.push(entry.path);
    }

    paths.sort();
    this.logger.info('Changed Python files', { count: paths.length, base: this.baseRevision, head: this.headRevision });
    return paths;
  }

  async contentAt(filePath: string, revision: string): Promise<string> {
    const pathAtRevision = revision === this.baseRevision ? this.renamedFrom.get(filePath) ?? filePath : filePath;

    try {
      return await this.git.show([`${revision}:${pathAtRevision}`]);
    } catch (error) {
      const message = errorMessage(error);
      if (MISSING_AT_REVISION.some(fragment => message.includes(fragment))) {
        return '';
      }
      throw new ContentUnavailableError(filePath, revision, error instanceof Error ? error : new Error(message));
    }
  }
}
