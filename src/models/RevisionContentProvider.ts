/**
 * RevisionContentProvider.ts
 * Source of changed file paths and file text at named revisions
 */

export interface RevisionContentProvider {
  readonly baseRevision: string;
  readonly headRevision: string;

  /**
   * Paths that differ between the two revisions
   */
  changedFiles(): Promise<string[]>;

  /**
   * File text at a revision; empty string when the file does not exist there
   *
   * @throws ContentUnavailableError when the revision cannot be read
   */
  contentAt(filePath: string, revision: string): Promise<string>;
}

/**
 * Reads the current text of a repository-relative file
 */
export type FileReader = (filePath: string) => Promise<string>;
