/**
 * Unit Tests: Usage Scanner
 */

import { describe, it, expect } from 'vitest';
import { UsageScanner } from '../../../../src/services/usage/UsageScanner.js';
import { generatePatterns } from '../../../../src/services/usage/UsagePatternGenerator.js';
import { inMemoryReader, py } from '../../../helpers/in-memory-repo.js';

const files = {
  'pkg/api.py': py('def connect(host):', '    pass', 'connect("self")'),
  'app/main.py': py('from pkg.api import connect', '', 'connect("h")'),
  'app/bad.py': py('x = connect('),
};

describe('UsageScanner', () => {
  const patterns = generatePatterns('connect', 'pkg/api.py');
  const candidates = ['./pkg/api.py', 'app/main.py', 'missing.py', 'app/bad.py'];

  it('combines both passes sorted by file and line', async () => {
    const { readFile, readCounts } = inMemoryReader(files);

    const locations = await new UsageScanner({ readFile, concurrency: 2 }).scan(patterns, candidates, 'pkg/api.py');

    expect(locations.map(l => [l.filePath, l.line, l.usageKind])).toEqual([
      ['app/bad.py', 1, 'function_call'],
      ['app/main.py', 1, 'direct_import'],
      ['app/main.py', 3, 'function_call'],
      ['app/main.py', 3, 'function_call'],
      ['app/main.py', 3, 'name_reference'],
    ]);
    expect(locations[1]?.context).toBe('from pkg.api import connect\n\nconnect("h")');
    expect(readCounts.has('./pkg/api.py')).toBe(false);
    expect(readCounts.get('missing.py')).toBe(1);
  });

  it('runs only the structural pass when regex analysis is off', async () => {
    const { readFile } = inMemoryReader(files);

    const locations = await new UsageScanner({ readFile, enableRegexAnalysis: false }).scan(
      patterns,
      candidates,
      'pkg/api.py'
    );

    expect(locations.map(l => [l.filePath, l.line, l.usageKind])).toEqual([
      ['app/main.py', 3, 'function_call'],
      ['app/main.py', 3, 'name_reference'],
    ]);
  });

  it('skips patterns that do not compile', async () => {
    const { readFile } = inMemoryReader({ 'a.py': py('x = 1') });

    const locations = await new UsageScanner({ readFile, enableAstAnalysis: false }).scan(
      [
        { source: '(', elementName: 'x', usageKind: 'function_call' },
        { source: '\\bx\\b', elementName: 'x', usageKind: 'name_reference' },
      ],
      ['a.py'],
      'decl.py'
    );

    expect(locations.map(l => [l.filePath, l.line, l.usageKind])).toEqual([['a.py', 1, 'name_reference']]);
  });

  it('reads nothing once the signal is aborted', async () => {
    const { readFile, readCounts } = inMemoryReader(files);
    const controller = new AbortController();
    controller.abort();

    const locations = await new UsageScanner({ readFile, signal: controller.signal }).scan(
      patterns,
      candidates,
      'pkg/api.py'
    );

    expect(locations).toEqual([]);
    expect(readCounts.size).toBe(0);
  });
});
