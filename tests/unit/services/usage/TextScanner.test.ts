/**
 * Unit Tests: Text Usage Scanner
 */

import { describe, it, expect } from 'vitest';
import { compilePattern, contextWindow, scanText, type CompiledPattern } from '../../../../src/services/usage/TextScanner.js';
import { PatternCompileError } from '../../../../src/lib/errors/DetectorErrors.js';
import type { UsagePattern } from '../../../../src/models/UsageLocation.js';

function compiled(pattern: UsagePattern): CompiledPattern {
  const result = compilePattern(pattern);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

describe('contextWindow', () => {
  const lines = ['a', 'b', 'c', 'd', 'e', 'f'];

  it('takes two lines either side', () => {
    expect(contextWindow(lines, 3)).toBe('a\nb\nc\nd\ne');
  });

  it('clips at the start and end of the file', () => {
    expect(contextWindow(lines, 1)).toBe('a\nb\nc');
    expect(contextWindow(lines, 6)).toBe('d\ne\nf');
  });
});

describe('compilePattern', () => {
  it('rejects an invalid regular expression', () => {
    const result = compilePattern({ source: '(', elementName: 'x', usageKind: 'function_call' });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(PatternCompileError);
      expect(result.error.message.startsWith('Invalid usage pattern (:')).toBe(true);
    }
  });
});

describe('scanText', () => {
  it('reports every match, pattern by pattern', () => {
    const patterns = [
      compiled({ source: '\\bconnect\\s*\\(', elementName: 'connect', usageKind: 'function_call' }),
      compiled({ source: '\\.connect\\b', elementName: 'connect', usageKind: 'attribute_access' }),
    ];
    const lines = ['x = connect(1) + connect(2)', 'c.connect()'];

    const locations = scanText('app.py', lines, patterns);

    expect(locations.map(l => [l.line, l.usageKind])).toEqual([
      [1, 'function_call'],
      [1, 'function_call'],
      [2, 'function_call'],
      [2, 'attribute_access'],
    ]);
    expect(locations[0]).toEqual({
      filePath: 'app.py',
      line: 1,
      context: 'x = connect(1) + connect(2)\nc.connect()',
      usageKind: 'function_call',
    });
  });

  it('can be run repeatedly with the same compiled pattern', () => {
    const patterns = [compiled({ source: '\\bf\\(', elementName: 'f', usageKind: 'function_call' })];

    expect(scanText('a.py', ['f()'], patterns)).toHaveLength(1);
    expect(scanText('b.py', ['f()'], patterns)).toHaveLength(1);
  });
});
