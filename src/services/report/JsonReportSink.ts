/**
 * JSON Report
 */

import type { ChangeRecord } from '../../models/ChangeRecord.js';
import { affectedFilesOf, totalUsageCount, type AnalysisResult } from '../../models/AnalysisResult.js';
import type { UsageLocation } from '../../models/UsageLocation.js';
import type { Logger } from '../../lib/logger.js';
import { countBy, writeReportFile, type ReportSink } from './ReportSink.js';

export const REPORT_VERSION = '1.0.0';

export interface JsonReport {
  metadata: {
    timestamp: string;
    analysisVersion: string;
    repositoryPath: string;
    baseRef: string;
    headRef: string;
    totalFilesAnalyzed: number;
    totalChangesDetected: number;
    exitCode: number;
  };
  changes: Array<Omit<ChangeRecord, 'affectedFiles'> & { affectedFiles: string[] }>;
  usageLocations: Record<string, UsageLocation[]>;
  summary: {
    bySeverity: Record<string, number>;
    byKind: Record<string, number>;
    filesWithChanges: string[];
    affectedFiles: string[];
    totalUsageLocations: number;
  };
}

export function buildJsonReport(result: AnalysisResult, timestamp: Date = new Date()): JsonReport {
  return {
    metadata: {
      timestamp: timestamp.toISOString(),
      analysisVersion: REPORT_VERSION,
      repositoryPath: result.repositoryPath,
      baseRef: result.baseRef,
      headRef: result.headRef,
      totalFilesAnalyzed: result.totalFilesAnalyzed,
      totalChangesDetected: result.totalChangesDetected,
      exitCode: result.exitCode,
    },
    changes: result.changes.map(change => ({ ...change, affectedFiles: [...change.affectedFiles].sort() })),
    usageLocations: Object.fromEntries(result.usageLocations),
    summary: {
      bySeverity: countBy(result.changes, c => c.severity),
      byKind: countBy(result.changes, c => c.kind),
      filesWithChanges: [...new Set(result.changes.map(c => c.filePath))].sort(),
      affectedFiles: affectedFilesOf(result.usageLocations),
      totalUsageLocations: totalUsageCount(result.usageLocations),
    },
  };
}

export class JsonReportSink implements ReportSink {
  constructor(
    private readonly outputPath: string,
    private readonly logger: Logger
  ) {}

  async emit(result: AnalysisResult): Promise<void> {
    this.logger.info('Writing JSON report', { path: this.outputPath });
    await writeReportFile(this.outputPath, JSON.stringify(buildJsonReport(result), null, 2) + '\n');
  }
}
