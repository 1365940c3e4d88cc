/**
 * Usage Scanner
 *
 * Runs the text and structural passes over candidate files and returns the
 * locations sorted by file and line. Results from the two passes overlap;
 * they are kept as-is.
 */

import pLimit from 'p-limit';
import { availableParallelism } from 'os';
import type { FileReader } from '../../models/RevisionContentProvider.js';
import { compareUsageLocations, type UsageLocation, type UsagePattern } from '../../models/UsageLocation.js';
import { Logger, silentLogger } from '../../lib/logger.js';
import { errorMessage } from '../../lib/result-types.js';
import { TreeSitterParser } from '../parser/TreeSitterParser.js';
import { toPosix } from '../files/FileSelector.js';
import { compilePattern, scanText, type CompiledPattern } from './TextScanner.js';
import { scanTree } from './StructuralScanner.js';

export interface ScanOptions {
  readFile: FileReader;
  enableRegexAnalysis?: boolean;
  enableAstAnalysis?: boolean;
  concurrency?: number;
  signal?: AbortSignal;
  logger?: Logger;
  parser?: TreeSitterParser;
}

export class UsageScanner {
  private readonly readFile: FileReader;
  private readonly regexEnabled: boolean;
  private readonly astEnabled: boolean;
  private readonly concurrency: number;
  private readonly signal?: AbortSignal;
  private readonly logger: Logger;
  private readonly parser: TreeSitterParser;

  constructor(options: ScanOptions) {
    this.readFile = options.readFile;
    this.regexEnabled = options.enableRegexAnalysis ?? true;
    this.astEnabled = options.enableAstAnalysis ?? true;
    this.concurrency = Math.max(1, options.concurrency ?? availableParallelism());
    this.signal = options.signal;
    this.logger = options.logger ?? silentLogger;
    this.parser = options.parser ?? new TreeSitterParser();
  }

  /**
   * Search candidate files for the given patterns
   *
   * @param excludeFilePath - File that declares the element; never scanned
   */
  async scan(
    patterns: readonly UsagePattern[],
    candidateFiles: readonly string[],
    excludeFilePath: string
  ): Promise<UsageLocation[]> {
    const compiled = this.regexEnabled ? this.compile(patterns) : [];
    const elementNames = [...new Set(patterns.map(p => p.elementName))];
    const excluded = toPosix(excludeFilePath);
    const files = candidateFiles.filter(f => toPosix(f) !== excluded);
    const limit = pLimit(this.concurrency);

    const perFile = await Promise.all(
      files.map(filePath =>
        limit(async (): Promise<UsageLocation[]> => {
          if (this.signal?.aborted) {
            return [];
          }
          return this.scanFile(filePath, compiled, elementNames);
        })
      )
    );

    // Array.prototype.sort is stable, so each file keeps its pass order
    return perFile.flat().sort(compareUsageLocations);
  }

  private compile(patterns: readonly UsagePattern[]): CompiledPattern[] {
    const compiled: CompiledPattern[] = [];
    for (const pattern of patterns) {
      const result = compilePattern(pattern);
      if (result.isErr()) {
        this.logger.warn('Skipping usage pattern', { pattern: pattern.source, error: result.error.message });
        continue;
      }
      compiled.push(result.value);
    }
    return compiled;
  }

  private async scanFile(
    filePath: string,
    compiled: readonly CompiledPattern[],
    elementNames: readonly string[]
  ): Promise<UsageLocation[]> {
    let content: string;
    try {
      content = await this.readFile(filePath);
    } catch (error) {
      this.logger.debug('Cannot read candidate file', { filePath, error: errorMessage(error) });
      return [];
    }

    const lines = content.split('\n');
    const locations = scanText(filePath, lines, compiled);

    if (this.astEnabled && elementNames.length > 0) {
      const parsed = this.parser.parse(content, filePath);
      if (parsed.isOk()) {
        locations.push(...scanTree(filePath, parsed.value.rootNode, lines, elementNames));
      }
    }

    return locations;
  }
}
