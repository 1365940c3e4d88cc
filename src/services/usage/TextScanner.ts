/**
 * Text Usage Scanner
 *
 * Line-by-line regular expression pass over one candidate file.
 */

import { Result, ok, err, errorMessage } from '../../lib/result-types.js';
import { PatternCompileError } from '../../lib/errors/DetectorErrors.js';
import type { UsageLocation, UsagePattern } from '../../models/UsageLocation.js';

export const CONTEXT_LINES_BEFORE = 2;
export const CONTEXT_LINES_AFTER = 2;

export interface CompiledPattern {
  pattern: UsagePattern;
  regex: RegExp;
}

export function compilePattern(pattern: UsagePattern): Result<CompiledPattern, PatternCompileError> {
  try {
    return ok({ pattern, regex: new RegExp(pattern.source, 'g') });
  } catch (error) {
    return err(new PatternCompileError(pattern.source, errorMessage(error)));
  }
}

/**
 * Lines around a 1-based line number, clipped to the file
 */
export function contextWindow(
  lines: readonly string[],
  line: number,
  before: number = CONTEXT_LINES_BEFORE,
  after: number = CONTEXT_LINES_AFTER
): string {
  const start = Math.max(0, line - 1 - before);
  const end = Math.min(lines.length, line + after);
  return lines.slice(start, end).join('\n');
}

/**
 * Every match of every pattern, pattern by pattern then line by line
 */
export function scanText(filePath: string, lines: readonly string[], patterns: readonly CompiledPattern[]): UsageLocation[] {
  const locations: UsageLocation[] = [];

  for (const { pattern, regex } of patterns) {
    lines.forEach((text, index) => {
      for (const _match of text.matchAll(regex)) {
        locations.push({
          filePath,
          line: index + 1,
          context: contextWindow(lines, index + 1),
          usageKind: pattern.usageKind,
        });
      }
    });
  }

  return locations;
}
