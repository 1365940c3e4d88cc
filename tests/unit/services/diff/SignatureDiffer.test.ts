/**
 * Unit Tests: Signature Differ
 */

import { describe, it, expect } from 'vitest';
import { diffModels } from '../../../../src/services/diff/SignatureDiffer.js';
import { formatClassSignature, formatFunctionSignature } from '../../../../src/services/diff/SignatureFormatter.js';
import { StructuralExtractor } from '../../../../src/services/parser/StructuralExtractor.js';
import { ChangeKind, REMOVED_SIGNATURE } from '../../../../src/models/ChangeRecord.js';
import { createEmptyModel, type StructuralModel } from '../../../../src/models/StructuralModel.js';
import { py } from '../../../helpers/in-memory-repo.js';

const extractor = new StructuralExtractor();

function model(source: string): StructuralModel {
  const result = extractor.extract(source, 'pkg/api.py');
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

function diff(oldSource: string, newSource: string) {
  return diffModels(model(oldSource), model(newSource), 'pkg/api.py');
}

describe('SignatureDiffer', () => {
  it('reports nothing when a model is compared to itself', () => {
    const source = py(
      'import os',
      'from .util import helper as h',
      'LIMIT = 10',
      '',
      '@decorator',
      'async def fetch(url: str, retries: int = 3, *args, **kwargs) -> bytes:',
      '    return b""',
      '',
      'class Client(Base):',
      '    def get(self, path, timeout=None) -> dict:',
      '        return {}'
    );
    expect(diffModels(model(source), model(source), 'pkg/api.py')).toEqual([]);
  });

  describe('removals', () => {
    it('reports a removed function', () => {
      const records = diffModels(model(py('def f(a, b):', '    pass')), createEmptyModel(), 'pkg/api.py');

      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({
        kind: ChangeKind.FUNCTION_REMOVED,
        filePath: 'pkg/api.py',
        line: 1,
        elementName: 'f',
        oldSignatureText: 'f(a, b)',
        newSignatureText: REMOVED_SIGNATURE,
        description: "Function 'f' was removed",
        severity: 'high',
        confidence: 1.0,
      });
      expect(records[0]?.affectedFiles.size).toBe(0);
    });

    it('reports a removed class with its bases', () => {
      const records = diff(py('class A(B, C):', '    pass'), py('X = 1'));

      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({
        kind: ChangeKind.CLASS_REMOVED,
        elementName: 'A',
        oldSignatureText: 'class A(B, C)',
        newSignatureText: REMOVED_SIGNATURE,
        severity: 'high',
      });
    });

    it('reports a removed method using the old line', () => {
      const records = diff(
        py('class Conn:', '    def open(self):', '        pass', '', '    def close(self):', '        pass'),
        py('class Conn:', '    def open(self):', '        pass')
      );

      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({
        kind: ChangeKind.METHOD_REMOVED,
        elementName: 'Conn.close',
        line: 5,
        oldSignatureText: 'close(self)',
        description: "Method 'close' was removed from class 'Conn'",
      });
    });

    it('does not confuse a free function with a same-named method', () => {
      const records = diff(
        py('def close():', '    pass', '', 'class Conn:', '    def close(self):', '        pass'),
        py('class Conn:', '    def close(self):', '        pass')
      );

      expect(records.map(r => [r.kind, r.elementName])).toEqual([[ChangeKind.FUNCTION_REMOVED, 'close']]);
    });
  });

  describe('parameters', () => {
    it('reports a reorder without parameter removals', () => {
      const records = diff(py('def f(a, b, c):', '    pass'), py('def f(b, a, c):', '    pass'));

      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({
        kind: ChangeKind.SIGNATURE_REORDERED,
        severity: 'high',
        oldSignatureText: 'f(a, b, c)',
        newSignatureText: 'f(b, a, c)',
      });
    });

    it('reports each removed parameter in declaration order', () => {
      const records = diff(py('def f(a, b, c, d):', '    pass'), py('def f(a, d):', '    pass'));

      expect(records.map(r => r.description)).toEqual([
        "Parameter 'b' was removed",
        "Parameter 'c' was removed",
      ]);
    });

    it('does not report an added parameter on its own', () => {
      expect(diff(py('def f(a):', '    pass'), py('def f(a, b):', '    pass'))).toEqual([]);
    });

    it('reports a removed default as high and an added default as low', () => {
      const required = diff(py('def f(a, b=1):', '    pass'), py('def f(a, b):', '    pass'));
      const optional = diff(py('def f(a, b):', '    pass'), py('def f(a, b=1):', '    pass'));

      expect(required.map(r => [r.kind, r.severity])).toEqual([[ChangeKind.PARAMETER_BECAME_REQUIRED, 'high']]);
      expect(optional.map(r => [r.kind, r.severity])).toEqual([[ChangeKind.PARAMETER_BECAME_OPTIONAL, 'low']]);
    });

    it('compares defaults as text', () => {
      const records = diff(py('def f(a=0):', '    pass'), py('def f(a=0.0):', '    pass'));

      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({
        kind: ChangeKind.DEFAULT_VALUE_CHANGED,
        severity: 'medium',
        description: "Default value for parameter 'a' changed from '0' to '0.0'",
      });
    });
  });

  describe('annotations', () => {
    it('distinguishes removed, added and changed return types', () => {
      const removed = diff(py('def f() -> int:', '    pass'), py('def f():', '    pass'));
      const added = diff(py('def f():', '    pass'), py('def f() -> int:', '    pass'));
      const changed = diff(py('def f() -> int:', '    pass'), py('def f() -> str:', '    pass'));

      expect(removed.map(r => [r.kind, r.severity])).toEqual([[ChangeKind.RETURN_TYPE_REMOVED, 'low']]);
      expect(added.map(r => [r.kind, r.severity])).toEqual([[ChangeKind.RETURN_TYPE_ADDED, 'low']]);
      expect(changed.map(r => [r.kind, r.severity])).toEqual([[ChangeKind.RETURN_TYPE_CHANGED, 'medium']]);
      expect(changed[0]?.description).toBe("Return type annotation changed from 'int' to 'str'");
    });

    it('compares parameter annotations', () => {
      const records = diff(
        py('def f(a: int, b, c: str):', '    pass'),
        py('def f(a: float, b: int, c):', '    pass')
      );

      expect(records.map(r => [r.kind, r.description])).toEqual([
        [ChangeKind.PARAM_ANNOTATION_CHANGED, "Type annotation for parameter 'a' changed from 'int' to 'float'"],
        [ChangeKind.PARAM_ANNOTATION_ADDED, "Type annotation for parameter 'b' added: 'int'"],
        [ChangeKind.PARAM_ANNOTATION_REMOVED, "Type annotation for parameter 'c' removed"],
      ]);
    });

    it('compares annotations of shared *args and **kwargs', () => {
      const records = diff(
        py('def f(*args: int, **kw: str):', '    pass'),
        py('def f(*args: str, **kw):', '    pass')
      );

      expect(records.map(r => r.kind)).toEqual([
        ChangeKind.PARAM_ANNOTATION_CHANGED,
        ChangeKind.PARAM_ANNOTATION_REMOVED,
      ]);
    });
  });

  it('emits signature records in a fixed order', () => {
    const records = diff(
      py('def f(a, b: int = 1, *args: int) -> int:', '    pass'),
      py('def f(b: str = 2, *args: str) -> str:', '    pass')
    );

    expect(records.map(r => r.kind)).toEqual([
      ChangeKind.PARAMETER_REMOVED,
      ChangeKind.DEFAULT_VALUE_CHANGED,
      ChangeKind.RETURN_TYPE_CHANGED,
      ChangeKind.PARAM_ANNOTATION_CHANGED,
      ChangeKind.PARAM_ANNOTATION_CHANGED,
    ]);
  });

  it('runs the checks in a fixed order across elements', () => {
    const records = diff(
      py(
        'def gone():',
        '    pass',
        'def kept(a):',
        '    pass',
        'class Old:',
        '    pass',
        'class Kept:',
        '    def m(self):',
        '        pass'
      ),
      py('def kept(b):', '    pass', 'class Kept:', '    pass')
    );

    expect(records.map(r => [r.kind, r.elementName])).toEqual([
      [ChangeKind.FUNCTION_REMOVED, 'gone'],
      [ChangeKind.PARAMETER_REMOVED, 'kept'],
      [ChangeKind.CLASS_REMOVED, 'Old'],
      [ChangeKind.METHOD_REMOVED, 'Kept.m'],
    ]);
  });

  it('prefixes method signature changes with the method and class', () => {
    const records = diff(
      py('class C:', '    def m(self, a, b=1):', '        pass'),
      py('class C:', '', '    def m(self, a):', '        pass')
    );

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      kind: ChangeKind.PARAMETER_REMOVED,
      elementName: 'C.m',
      line: 3,
      description: "Method 'm' in class 'C': Parameter 'b' was removed",
      oldSignatureText: 'm(self, a, b = 1)',
      newSignatureText: 'm(self, a)',
    });
  });

  it('reports a default that became required while ignoring a new optional parameter', () => {
    const records = diff(
      py('def connect(host, port=22):', '    pass'),
      py('def connect(host, port, timeout=30):', '    pass')
    );

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      kind: ChangeKind.PARAMETER_BECAME_REQUIRED,
      elementName: 'connect',
      severity: 'high',
      description: "Parameter 'port' became required (default value removed)",
      oldSignatureText: 'connect(host, port = 22)',
      newSignatureText: 'connect(host, port, timeout = 30)',
    });
  });
});

describe('SignatureFormatter', () => {
  it('renders annotations, defaults, *args, **kwargs and return type', () => {
    const g = model(py('def g(x: int, y: str = "a", *rest: int, **opts) -> None:', '    pass')).functions.get('g');
    expect(g && formatFunctionSignature(g)).toBe('g(x: int, y: str = "a", *rest, **opts) -> None');
  });

  it('renders a class without bases', () => {
    const k = model(py('class K:', '    pass')).classes.get('K');
    expect(k && formatClassSignature(k)).toBe('class K');
  });
});
