/**
 * Analyze Command
 *
 * Compares two git revisions and reports breaking changes to the Python
 * public surface along with their detected usages.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { ConfigurationManager, normalizeLogLevel } from '../../lib/env-config.js';
import { Logger } from '../../lib/logger.js';
import type { DetectorConfig } from '../../models/DetectorConfig.js';
import { ExitCode } from '../../models/AnalysisResult.js';
import { BreakingChangesDetector, processExitCode } from '../../services/BreakingChangesDetector.js';

export interface AnalyzeCommandOptions {
  baseRef?: string;
  headRef?: string;
  repositoryPath?: string;
  ignoreUnused?: boolean;
  includePatterns?: string[];
  excludePatterns?: string[];
  jsonOutput?: string;
  markdownOutput?: string;
  logLevel?: string;
  logFile?: string;
  failOnBreaking?: boolean;
  concurrency?: number;
  envFile?: string;
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseLogLevel(value: string): string {
  if (!normalizeLogLevel(value)) {
    throw new InvalidArgumentError('Expected one of debug, info, warn, error.');
  }
  return value;
}

/**
 * Configuration overrides for the options that were actually given
 */
export function buildOverrides(options: AnalyzeCommandOptions): Partial<DetectorConfig> {
  const overrides: Partial<DetectorConfig> = {};

  if (options.baseRef) overrides.baseRef = options.baseRef;
  if (options.headRef) overrides.headRef = options.headRef;
  if (options.repositoryPath) overrides.repositoryPath = options.repositoryPath;
  if (options.ignoreUnused) overrides.ignoreUnused = true;
  if (options.includePatterns && options.includePatterns.length > 0) overrides.includePatterns = options.includePatterns;
  if (options.excludePatterns) overrides.excludePatterns = options.excludePatterns;
  if (options.jsonOutput) overrides.jsonOutput = options.jsonOutput;
  if (options.markdownOutput) overrides.markdownOutput = options.markdownOutput;
  if (options.logFile) overrides.logFile = options.logFile;
  if (options.failOnBreaking === false) overrides.failOnBreaking = false;
  if (options.concurrency !== undefined) overrides.concurrency = options.concurrency;

  const level = options.logLevel ? normalizeLogLevel(options.logLevel) : undefined;
  if (level) overrides.logLevel = level;

  return overrides;
}

export function createAnalyzeCommand(): Command {
  return new Command('analyze')
    .description('Detect breaking changes between two git revisions')
    .option('--base-ref <ref>', 'Base git reference for comparison (default: origin/main)')
    .option('--head-ref <ref>', 'Head git reference for comparison (default: HEAD)')
    .option('--repository-path <path>', 'Path to git repository (default: current directory)')
    .option('--ignore-unused', 'Do not fail on breaking changes that have no detected usage')
    .option('--include-patterns <patterns...>', 'File patterns to include in analysis (default: **/*.py)')
    .option('--exclude-patterns <patterns...>', 'File patterns to exclude from analysis')
    .option('--json-output <path>', 'Path to JSON report file')
    .option('--markdown-output <path>', 'Path to Markdown report file')
    .option('--log-level <level>', 'Logging level (debug, info, warn, error)', parseLogLevel)
    .option('--log-file <path>', 'Append JSON Lines log entries to this file')
    .option('--no-fail-on-breaking', 'Exit 0 even when breaking changes are detected')
    .option('--concurrency <n>', 'Files processed in parallel', parsePositiveInteger)
    .option('--env-file <path>', 'Load BREAKING_CHANGES_* variables from this file (default: .env)')
    .action(async (options: AnalyzeCommandOptions) => {
      const manager = new ConfigurationManager(process.env, options.envFile);
      const envLoaded = manager.loadEnvFile();
      if (envLoaded.isErr()) {
        console.error(chalk.red(`✗ ${envLoaded.error.message}`));
        process.exitCode = ExitCode.FAILURE;
        return;
      }

      const loaded = manager.load(buildOverrides(options));
      if (loaded.isErr()) {
        console.error(chalk.red(`✗ ${loaded.error.message}`));
        process.exitCode = ExitCode.FAILURE;
        return;
      }
      const config = loaded.value;

      const controller = new AbortController();
      const onInterrupt = (): void => {
        console.error(chalk.yellow('\nInterrupted, finishing files in progress...'));
        controller.abort();
      };
      process.once('SIGINT', onInterrupt);

      try {
        const logger = new Logger({ level: config.logLevel, logFile: config.logFile });
        const detector = new BreakingChangesDetector(config, { logger, signal: controller.signal });

        const result = await detector.analyze();
        await detector.generateReports(result);

        process.exitCode = processExitCode(result, config.failOnBreaking);
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }
    });
}
