/**
 * Unit Tests: Candidate File Collection
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { collectCandidateFiles } from '../../../../src/services/files/CandidateFileCollector.js';
import { FileSelector } from '../../../../src/services/files/FileSelector.js';
import { silentLogger } from '../../../../src/lib/logger.js';

describe('collectCandidateFiles', () => {
  let root: string;

  beforeAll(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'candidates-'));
    const files = [
      'a.py',
      'pkg/b.py',
      'pkg/notes.txt',
      'pkg/test_b.py',
      '.hidden/c.py',
      '__pycache__/d.py',
      'node_modules/e.py',
    ];
    for (const file of files) {
      const full = path.join(root, file);
      await fs.mkdir(path.dirname(full), { recursive: true });
      await fs.writeFile(full, 'x = 1\n');
    }
  });

  afterAll(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  const selector = new FileSelector(['**/*.py'], ['**/test_*.py']);

  it('returns selected Python files as sorted relative paths', async () => {
    const files = await collectCandidateFiles(root, { selector, maxFiles: 100, logger: silentLogger });
    expect(files).toEqual(['a.py', 'pkg/b.py']);
  });

  it('truncates to the file limit', async () => {
    const files = await collectCandidateFiles(root, { selector, maxFiles: 1, logger: silentLogger });
    expect(files).toEqual(['a.py']);
  });

  it('returns nothing for a missing directory', async () => {
    const files = await collectCandidateFiles(path.join(root, 'absent'), { selector, maxFiles: 100, logger: silentLogger });
    expect(files).toEqual([]);
  });
});
