/**
 * AnalysisResult.ts
 * Output of one detector run, handed to report sinks
 */

import type { ChangeRecord } from './ChangeRecord.js';
import type { UsageLocation } from './UsageLocation.js';

/**
 * `<filePath>:<elementName>` to the usages found for that element
 */
export type ImpactMap = Map<string, UsageLocation[]>;

export enum ExitCode {
  CLEAN = 0,
  BREAKING = 1,
  FAILURE = 2,
  INTERRUPTED = 130
}

export interface AnalysisResult {
  changes: ChangeRecord[];
  usageLocations: ImpactMap;
  totalFilesAnalyzed: number;
  totalChangesDetected: number;
  exitCode: ExitCode;
  baseRef: string;
  headRef: string;
  repositoryPath: string;
  /** True when an abort signal cut the run short */
  aborted: boolean;
}

/**
 * Distinct files across every usage location, sorted
 */
export function affectedFilesOf(usageLocations: ImpactMap): string[] {
  const files = new Set<string>();
  for (const locations of usageLocations.values()) {
    for (const location of locations) {
      files.add(location.filePath);
    }
  }
  return [...files].sort();
}

export function totalUsageCount(usageLocations: ImpactMap): number {
  let total = 0;
  for (const locations of usageLocations.values()) {
    total += locations.length;
  }
  return total;
}
