/**
 * Report sinks and the summaries they share
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { SEVERITY_ORDER, impactKey, type ChangeRecord, type Severity } from '../../models/ChangeRecord.js';
import type { AnalysisResult } from '../../models/AnalysisResult.js';

export interface ReportSink {
  emit(result: AnalysisResult): Promise<void>;
}

export const SEVERITY_ICONS: Record<Severity, string> = {
  critical: '🔴',
  high: '🟠',
  medium: '🟡',
  low: '🟢',
};

/**
 * Changes per severity, most severe first; empty groups are left out
 */
export function groupBySeverity(changes: readonly ChangeRecord[]): Array<[Severity, ChangeRecord[]]> {
  const groups: Array<[Severity, ChangeRecord[]]> = [];
  for (const severity of SEVERITY_ORDER) {
    const members = changes.filter(c => c.severity === severity);
    if (members.length > 0) groups.push([severity, members]);
  }
  return groups;
}

export function countBy<T>(items: readonly T[], keyOf: (item: T) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const item of items) {
    const key = keyOf(item);
    counts[key] = (counts[key] ?? 0) + 1;
  }
  return counts;
}

/**
 * Affected file to its usage count, sorted by path
 */
export function usageCountsByFile(result: AnalysisResult): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const locations of result.usageLocations.values()) {
    for (const location of locations) {
      counts.set(location.filePath, (counts.get(location.filePath) ?? 0) + 1);
    }
  }
  return [...counts.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

export interface Recommendations {
  safe: boolean;
  hasCriticalOrHigh: boolean;
  hasUsage: boolean;
}

export function recommendationsFor(result: AnalysisResult): Recommendations {
  return {
    safe: result.changes.length === 0,
    hasCriticalOrHigh: result.changes.some(c => c.severity === 'critical' || c.severity === 'high'),
    hasUsage: result.changes.some(c => result.usageLocations.has(impactKey(c))),
  };
}

export const RECOMMENDATION_TEXT = {
  criticalOrHigh: [
    'Review all changes carefully before merging',
    'Consider implementing deprecation warnings first',
    'Update documentation and migration guides',
  ],
  withUsage: [
    'Update affected code in the same change',
    'Run comprehensive tests',
    'Consider backward compatibility options',
  ],
  withoutUsage: [
    'Changes might be safe if truly unused',
    'Verify with additional testing',
    'Consider if detection missed any usage patterns',
  ],
  general: [
    'Bump major version if this is a public API',
    'Add entries to CHANGELOG.md',
    'Consider using semantic versioning',
  ],
} as const;

/**
 * Write a report file, creating parent directories
 */
export async function writeReportFile(outputPath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
  await fs.writeFile(outputPath, content, 'utf8');
}
