/**
 * Breaking Changes Detector
 *
 * Runs one analysis: changed files from the content provider, change records
 * from the aggregator, usages from the impact coordinator, then the exit code
 * policy. Reports are written separately by generateReports().
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { DetectorConfig } from '../models/DetectorConfig.js';
import { impactKey, type ChangeRecord } from '../models/ChangeRecord.js';
import { ExitCode, type AnalysisResult, type ImpactMap } from '../models/AnalysisResult.js';
import type { FileReader, RevisionContentProvider } from '../models/RevisionContentProvider.js';
import { Logger } from '../lib/logger.js';
import { Result, ok, err, errorMessage } from '../lib/result-types.js';
import { FileAccessError, GitReferenceError } from '../lib/errors/DetectorErrors.js';
import { ChangeAggregator } from './diff/ChangeAggregator.js';
import { computeImpact } from './usage/ImpactCoordinator.js';
import { FileSelector } from './files/FileSelector.js';
import { collectCandidateFiles } from './files/CandidateFileCollector.js';
import { GitContentProvider } from './git/GitContentProvider.js';
import { ConsoleReportSink } from './report/ConsoleReportSink.js';
import { JsonReportSink } from './report/JsonReportSink.js';
import { MarkdownReportSink } from './report/MarkdownReportSink.js';
import type { ReportSink } from './report/ReportSink.js';

/**
 * Collaborators that replace the git and file system defaults
 */
export interface DetectorDependencies {
  logger?: Logger;
  signal?: AbortSignal;
  provider?: RevisionContentProvider;
  listCandidateFiles?: () => Promise<string[]>;
  readFile?: FileReader;
  reportSinks?: ReportSink[];
}

/**
 * Exit code for a finished analysis
 *
 * Any change with usage plus any critical or high change fails the run;
 * otherwise changes fail it unless unused ones are ignored.
 */
export function determineExitCode(
  changes: readonly ChangeRecord[],
  usageLocations: ImpactMap,
  ignoreUnused: boolean
): ExitCode {
  if (changes.length === 0) {
    return ExitCode.CLEAN;
  }

  const hasUsedChange = changes.some(c => usageLocations.has(impactKey(c)));
  const hasSevereChange = changes.some(c => c.severity === 'critical' || c.severity === 'high');

  if (hasUsedChange && hasSevereChange) {
    return ExitCode.BREAKING;
  }
  return ignoreUnused ? ExitCode.CLEAN : ExitCode.BREAKING;
}

/**
 * Process exit status for a result; `failOnBreaking: false` only downgrades
 * breaking findings, not failures
 */
export function processExitCode(result: AnalysisResult, failOnBreaking: boolean): number {
  if (!failOnBreaking && result.exitCode === ExitCode.BREAKING) {
    return ExitCode.CLEAN;
  }
  return result.exitCode;
}

export class BreakingChangesDetector {
  private readonly logger: Logger;
  private readonly selector: FileSelector;

  constructor(
    private readonly config: DetectorConfig,
    private readonly deps: DetectorDependencies = {}
  ) {
    this.logger = deps.logger ?? new Logger({ level: config.logLevel, logFile: config.logFile });
    this.selector = new FileSelector(config.includePatterns, config.excludePatterns);
  }

  async analyze(): Promise<AnalysisResult> {
    this.logger.info('Starting breaking changes analysis', {
      base: this.config.baseRef,
      head: this.config.headRef,
      repository: this.config.repositoryPath,
    });

    try {
      const provider = await this.resolveProvider();
      if (provider.isErr()) {
        this.logger.error('Invalid git reference', { error: provider.error.message });
        return this.result([], new Map(), 0, ExitCode.FAILURE);
      }

      const changedFiles = await provider.value.changedFiles();
      if (changedFiles.length === 0) {
        this.logger.info('No Python files changed, no analysis needed');
        return this.result([], new Map(), 0, ExitCode.CLEAN);
      }

      const aggregator = new ChangeAggregator({
        concurrency: this.config.concurrency,
        signal: this.deps.signal,
        logger: this.logger.child({ stage: 'diff' }),
      });
      const changes = await aggregator.aggregate(changedFiles, provider.value);
      this.logger.info('Detected potential breaking changes', { count: changes.length });

      let impact: ImpactMap = new Map();
      if (changes.length > 0) {
        const candidates = await this.listCandidateFiles();
        impact = await computeImpact(changes, candidates, {
          readFile: this.deps.readFile ?? this.repositoryReader(),
          enableRegexAnalysis: this.config.enableRegexAnalysis,
          enableAstAnalysis: this.config.enableAstAnalysis,
          concurrency: this.config.concurrency,
          moduleRootPrefixes: this.config.moduleRootPrefixes,
          signal: this.deps.signal,
          logger: this.logger.child({ stage: 'usage' }),
        });
      }

      if (this.deps.signal?.aborted) {
        this.logger.warn('Analysis interrupted');
        return this.result(changes, impact, changedFiles.length, ExitCode.INTERRUPTED, true);
      }

      const exitCode = determineExitCode(changes, impact, this.config.ignoreUnused);
      this.logger.info('Analysis completed', { changes: changes.length, exitCode });
      return this.result(changes, impact, changedFiles.length, exitCode);
    } catch (error) {
      this.logger.error('Critical error during analysis', { error: errorMessage(error) });
      return this.result([], new Map(), 0, ExitCode.FAILURE);
    }
  }

  /**
   * Emit every report the configuration asks for; a failing sink is logged
   */
  async generateReports(result: AnalysisResult): Promise<void> {
    const sinks = this.deps.reportSinks ?? this.defaultSinks();
    for (const sink of sinks) {
      try {
        await sink.emit(result);
      } catch (error) {
        this.logger.error('Error generating report', { error: errorMessage(error) });
      }
    }
  }

  private defaultSinks(): ReportSink[] {
    const sinks: ReportSink[] = [new ConsoleReportSink()];
    if (this.config.jsonOutput) sinks.push(new JsonReportSink(this.config.jsonOutput, this.logger));
    if (this.config.markdownOutput) sinks.push(new MarkdownReportSink(this.config.markdownOutput, this.logger));
    return sinks;
  }

  private async resolveProvider(): Promise<Result<RevisionContentProvider, GitReferenceError>> {
    if (this.deps.provider) {
      return ok(this.deps.provider);
    }

    const created = GitContentProvider.create(
      this.config.repositoryPath,
      this.config.baseRef,
      this.config.headRef,
      this.selector,
      this.logger.child({ stage: 'git' })
    );
    if (created.isErr()) {
      return err(created.error);
    }

    const verified = await created.value.verifyRevisions();
    if (verified.isErr()) {
      return err(verified.error);
    }
    return ok(created.value);
  }

  private listCandidateFiles(): Promise<string[]> {
    if (this.deps.listCandidateFiles) {
      return this.deps.listCandidateFiles();
    }
    return collectCandidateFiles(this.config.repositoryPath, {
      selector: this.selector,
      maxFiles: this.config.maxUsageSearchFiles,
      logger: this.logger,
    });
  }

  private repositoryReader(): FileReader {
    const root = path.resolve(this.config.repositoryPath);
    return async filePath => {
      try {
        return await fs.readFile(path.join(root, filePath), 'utf8');
      } catch (error) {
        throw new FileAccessError(filePath, error instanceof Error ? error : undefined);
      }
    };
  }

  private result(
    changes: ChangeRecord[],
    usageLocations: ImpactMap,
    totalFilesAnalyzed: number,
    exitCode: ExitCode,
    aborted = false
  ): AnalysisResult {
    return {
      changes,
      usageLocations,
      totalFilesAnalyzed,
      totalChangesDetected: changes.length,
      exitCode,
      baseRef: this.config.baseRef,
      headRef: this.config.headRef,
      repositoryPath: this.config.repositoryPath,
      aborted,
    };
  }
}
