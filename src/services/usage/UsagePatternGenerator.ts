/**
 * Usage Pattern Generation
 *
 * Derives the line-level regular expressions that suggest a changed element
 * is referenced from another file. Module paths are inferred from the file
 * path only; there is no import-system resolution.
 */

import type { UsagePattern } from '../../models/UsageLocation.js';

export interface PatternOptions {
  /** Leading directories that are not part of the importable module path */
  moduleRootPrefixes?: readonly string[];
}

const DEFAULT_ROOT_PREFIXES = ['src'];

const IDENTIFIER = /^[\p{L}\p{Nl}_][\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}]*$/u;

/**
 * Escape a string for literal use inside a regular expression
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function isPythonIdentifier(segment: string): boolean {
  return IDENTIFIER.test(segment);
}

/**
 * Dotted module path of a repository-relative file, or undefined when no
 * segment is usable
 *
 * @example
 * moduleDottedPath('src/pkg/util.py')      // 'pkg.util'
 * moduleDottedPath('pkg/__init__.py')      // 'pkg'
 * moduleDottedPath('my-scripts/run.py')    // undefined
 */
export function moduleDottedPath(filePath: string, rootPrefixes: readonly string[] = DEFAULT_ROOT_PREFIXES): string | undefined {
  const withoutExtension = filePath.replace(/\.pyi?$/, '');
  const parts: string[] = [];

  for (const segment of withoutExtension.split(/[\\/]/)) {
    if (segment === '' || segment === '.' || segment === '..') continue;
    if (!isPythonIdentifier(segment)) break;
    parts.push(segment);
  }

  // pkg/__init__.py is imported as `pkg`, never as `pkg.__init__`
  if (parts.length > 1 && parts[parts.length - 1] === '__init__') {
    parts.pop();
  }
  if (parts.length > 1 && rootPrefixes.includes(parts[0] ?? '')) {
    parts.shift();
  }

  return parts.length > 0 ? parts.join('.') : undefined;
}

/**
 * Patterns for one changed element declared in `originatingFilePath`
 */
export function generatePatterns(
  elementName: string,
  originatingFilePath: string,
  options: PatternOptions = {}
): UsagePattern[] {
  const modulePath = moduleDottedPath(originatingFilePath, options.moduleRootPrefixes ?? DEFAULT_ROOT_PREFIXES);
  const element = escapeRegExp(elementName);
  const patterns: UsagePattern[] = [];

  const add = (source: string, usageKind: UsagePattern['usageKind']): void => {
    patterns.push({ source, elementName, usageKind });
  };

  if (modulePath) {
    const module = escapeRegExp(modulePath);
    add(`from\\s+${module}\\s+import\\s+.*\\b${element}\\b`, 'direct_import');
    add(`import\\s+${module}\\b`, 'module_import');
    add(`\\b${module}\\.${element}\\b`, 'qualified_usage');
  }

  const lastSegment = elementName.split('.').pop() ?? elementName;
  const callKind = /^[A-Z]/.test(lastSegment) ? 'class_instantiation' : 'function_call';
  add(`\\b${element}\\s*\\(`, callKind);
  add(`\\.${element}\\b`, 'attribute_access');

  const dot = elementName.lastIndexOf('.');
  if (dot > 0) {
    const className = escapeRegExp(elementName.slice(0, dot));
    const methodName = escapeRegExp(elementName.slice(dot + 1));
    add(`\\b${className}\\s*\\([^)]*\\)\\.${methodName}\\s*\\(`, 'method_call');
  }

  if (modulePath) {
    add(`from\\s+${escapeRegExp(modulePath)}\\s+import\\s+\\*`, 'star_import');
  }

  return patterns;
}
