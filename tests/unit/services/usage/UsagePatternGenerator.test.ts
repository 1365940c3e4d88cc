/**
 * Unit Tests: Usage Pattern Generation
 */

import { describe, it, expect } from 'vitest';
import {
  escapeRegExp,
  generatePatterns,
  moduleDottedPath,
} from '../../../../src/services/usage/UsagePatternGenerator.js';

describe('moduleDottedPath', () => {
  it.each([
    ['src/pkg/util.py', 'pkg.util'],
    ['pkg/__init__.py', 'pkg'],
    ['./pkg/a.pyi', 'pkg.a'],
    ['pkg\\sub\\mod.py', 'pkg.sub.mod'],
    ['pkg/my-mod.py', 'pkg'],
    ['src.py', 'src'],
  ])('maps %s to %s', (filePath, expected) => {
    expect(moduleDottedPath(filePath)).toBe(expected);
  });

  it('returns undefined when the first segment is not an identifier', () => {
    expect(moduleDottedPath('my-scripts/run.py')).toBeUndefined();
  });

  it('strips configured root prefixes only', () => {
    expect(moduleDottedPath('lib/x/y.py', ['lib'])).toBe('x.y');
    expect(moduleDottedPath('src/x.py', ['lib'])).toBe('src.x');
  });
});

describe('escapeRegExp', () => {
  it('escapes regular expression syntax', () => {
    expect(escapeRegExp('a.b(c)*')).toBe('a\\.b\\(c\\)\\*');
  });
});

describe('generatePatterns', () => {
  it('emits module-based and bare patterns for a function', () => {
    const patterns = generatePatterns('connect', 'src/net/client.py');

    expect(patterns.map(p => [p.usageKind, p.source])).toEqual([
      ['direct_import', 'from\\s+net\\.client\\s+import\\s+.*\\bconnect\\b'],
      ['module_import', 'import\\s+net\\.client\\b'],
      ['qualified_usage', '\\bnet\\.client\\.connect\\b'],
      ['function_call', '\\bconnect\\s*\\('],
      ['attribute_access', '\\.connect\\b'],
      ['star_import', 'from\\s+net\\.client\\s+import\\s+\\*'],
    ]);
    expect(patterns.every(p => p.elementName === 'connect')).toBe(true);
  });

  it('uses class_instantiation for capitalised names', () => {
    const kinds = generatePatterns('Client', 'net/client.py').map(p => p.usageKind);
    expect(kinds).toContain('class_instantiation');
    expect(kinds).not.toContain('function_call');
  });

  it('adds a method call pattern for Class.method names', () => {
    const patterns = generatePatterns('Client.send', 'net/client.py');
    const methodCall = patterns.find(p => p.usageKind === 'method_call');

    expect(patterns.map(p => p.usageKind)).toEqual([
      'direct_import',
      'module_import',
      'qualified_usage',
      'function_call',
      'attribute_access',
      'method_call',
      'star_import',
    ]);
    expect(methodCall?.source).toBe('\\bClient\\s*\\([^)]*\\)\\.send\\s*\\(');
    expect(new RegExp(methodCall?.source ?? '').test('Client("h", 1).send(data)')).toBe(true);
  });

  it('emits only bare patterns without a module path', () => {
    const kinds = generatePatterns('run', 'my-scripts/run.py').map(p => p.usageKind);
    expect(kinds).toEqual(['function_call', 'attribute_access']);
  });

  it('produces patterns that match typical usages', () => {
    const byKind = new Map(generatePatterns('connect', 'src/net/client.py').map(p => [p.usageKind, new RegExp(p.source)]));

    expect(byKind.get('direct_import')?.test('from net.client import connect, close')).toBe(true);
    expect(byKind.get('direct_import')?.test('from net.client import connection')).toBe(false);
    expect(byKind.get('qualified_usage')?.test('net.client.connect("h")')).toBe(true);
    expect(byKind.get('function_call')?.test('conn = connect ("h")')).toBe(true);
    expect(byKind.get('function_call')?.test('reconnect("h")')).toBe(false);
    expect(byKind.get('star_import')?.test('from net.client import *')).toBe(true);
  });
});
