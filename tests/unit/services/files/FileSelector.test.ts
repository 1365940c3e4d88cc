/**
 * Unit Tests: File Selection
 */

import { describe, it, expect } from 'vitest';
import { FileSelector, toPosix } from '../../../../src/services/files/FileSelector.js';
import { DEFAULT_EXCLUDE_PATTERNS } from '../../../../src/models/DetectorConfig.js';

describe('FileSelector', () => {
  const selector = new FileSelector(['**/*.py'], DEFAULT_EXCLUDE_PATTERNS);

  it('includes Python files', () => {
    expect(selector.check('pkg/mod.py')).toEqual({
      selected: true,
      matchedPattern: '**/*.py',
      reason: 'Included by "**/*.py"',
    });
  });

  it('lets exclusion win over inclusion', () => {
    expect(selector.check('pkg/test_api.py')).toEqual({
      selected: false,
      matchedPattern: '**/test_*.py',
      reason: 'Excluded by "**/test_*.py"',
    });
    expect(selector.check('tests/unit/helpers.py').matchedPattern).toBe('**/tests/**/*.py');
    expect(selector.isSelected('pkg/__pycache__/mod.py')).toBe(false);
    expect(selector.isSelected('.venv/lib/site.py')).toBe(false);
  });

  it('rejects paths no include pattern matches', () => {
    expect(selector.check('README.md')).toEqual({ selected: false, reason: 'No include pattern matched' });
  });

  it('normalizes separators before matching', () => {
    expect(selector.isSelected('pkg\\mod.py')).toBe(true);
    expect(selector.isSelected('./pkg/mod.py')).toBe(true);
  });

  it('matches slash-free patterns against the base name', () => {
    const only = new FileSelector(['api.py']);
    expect(only.isSelected('pkg/api.py')).toBe(true);
    expect(only.isSelected('pkg/other.py')).toBe(false);
  });
});

describe('toPosix', () => {
  it('converts backslashes and strips a leading ./', () => {
    expect(toPosix('.\\a\\b.py')).toBe('a/b.py');
    expect(toPosix('./a/b.py')).toBe('a/b.py');
  });
});
