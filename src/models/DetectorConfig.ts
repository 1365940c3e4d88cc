/**
 * DetectorConfig.ts
 * Settings for one breaking-change analysis run
 */

import { availableParallelism } from 'os';
import type { LogLevel } from '../lib/logger.js';

export interface DetectorConfig {
  /** Revision the comparison starts from */
  baseRef: string;
  /** Revision the comparison ends at */
  headRef: string;
  /** Root of the git working tree */
  repositoryPath: string;

  /** Report success even when changes have no detected usage */
  ignoreUnused: boolean;
  /** Glob patterns a file must match to be analyzed or searched */
  includePatterns: string[];
  /** Glob patterns that drop a file even when it is included */
  excludePatterns: string[];
  /** Leading path segments that are not part of the importable module path */
  moduleRootPrefixes: string[];

  jsonOutput?: string;
  markdownOutput?: string;
  logLevel: LogLevel;
  logFile?: string;

  /** Exit non-zero when breaking changes are reported */
  failOnBreaking: boolean;

  /** Upper bound on candidate files searched for usages */
  maxUsageSearchFiles: number;
  /** Line-level regular expression pass */
  enableRegexAnalysis: boolean;
  /** Syntax tree walk with import tracking */
  enableAstAnalysis: boolean;
  /** Worker pool size for per-file work */
  concurrency: number;
}

export const DEFAULT_EXCLUDE_PATTERNS: readonly string[] = [
  '**/test_*.py',
  '**/tests/**/*.py',
  '**/__pycache__/**',
  '**/.*/**',
  '**/venv/**',
  '**/env/**',
  '**/.venv/**',
  '**/site-packages/**',
  '**/node_modules/**',
];

/**
 * Factory for a config populated with defaults
 */
export function createDefaultConfig(): DetectorConfig {
  return {
    baseRef: 'origin/main',
    headRef: 'HEAD',
    repositoryPath: '.',
    ignoreUnused: false,
    includePatterns: ['**/*.py'],
    excludePatterns: [...DEFAULT_EXCLUDE_PATTERNS],
    moduleRootPrefixes: ['src'],
    logLevel: 'info',
    failOnBreaking: true,
    maxUsageSearchFiles: 10000,
    enableRegexAnalysis: true,
    enableAstAnalysis: true,
    concurrency: Math.max(1, availableParallelism()),
  };
}
