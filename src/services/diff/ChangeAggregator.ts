/**
 * Change Aggregator
 *
 * Runs extraction and diffing over every changed file of a revision pair and
 * merges the records in file path order. A file that cannot be read or
 * analysed is logged and skipped.
 */

import pLimit from 'p-limit';
import { availableParallelism } from 'os';
import type { ChangeRecord } from '../../models/ChangeRecord.js';
import type { RevisionContentProvider } from '../../models/RevisionContentProvider.js';
import { createEmptyModel, type StructuralModel } from '../../models/StructuralModel.js';
import { Logger, silentLogger } from '../../lib/logger.js';
import { errorMessage } from '../../lib/result-types.js';
import { StructuralExtractor } from '../parser/StructuralExtractor.js';
import { diffModels } from './SignatureDiffer.js';

export interface AggregateOptions {
  /** Files analysed at once (default: available parallelism) */
  concurrency?: number;
  /** Stops new files from starting; running files finish */
  signal?: AbortSignal;
  logger?: Logger;
  extractor?: StructuralExtractor;
}

export class ChangeAggregator {
  private readonly logger: Logger;
  private readonly extractor: StructuralExtractor;
  private readonly concurrency: number;
  private readonly signal?: AbortSignal;

  constructor(options: AggregateOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.extractor = options.extractor ?? new StructuralExtractor();
    this.concurrency = Math.max(1, options.concurrency ?? availableParallelism());
    this.signal = options.signal;
  }

  /**
   * Collect the change records of every changed file
   *
   * @param changedFilePaths - Repository-relative paths; order and duplicates do not matter
   */
  async aggregate(changedFilePaths: readonly string[], provider: RevisionContentProvider): Promise<ChangeRecord[]> {
    const paths = [...new Set(changedFilePaths)].sort();
    const limit = pLimit(this.concurrency);

    const perFile = await Promise.all(
      paths.map(filePath =>
        limit(async (): Promise<ChangeRecord[]> => {
          if (this.signal?.aborted) {
            return [];
          }
          try {
            return await this.analyzeFile(filePath, provider);
          } catch (error) {
            this.logger.error('Skipping file after analysis failure', { filePath, error: errorMessage(error) });
            return [];
          }
        })
      )
    );

    const records = perFile.flat();
    this.logger.info('Change aggregation complete', { files: paths.length, changes: records.length });
    return records;
  }

  /**
   * Diff one file between the provider's two revisions
   */
  async analyzeFile(filePath: string, provider: RevisionContentProvider): Promise<ChangeRecord[]> {
    const oldText = await provider.contentAt(filePath, provider.baseRevision);
    const newText = await provider.contentAt(filePath, provider.headRevision);

    if (oldText === '' && newText === '') {
      this.logger.debug('File absent at both revisions', { filePath });
      return [];
    }

    const oldModel = this.modelOf(oldText, filePath, provider.baseRevision);
    const newModel = this.modelOf(newText, filePath, provider.headRevision);
    const records = diffModels(oldModel, newModel, filePath);

    if (records.length > 0) {
      this.logger.debug('Changes detected', { filePath, changes: records.length });
    }
    return records;
  }

  private modelOf(source: string, filePath: string, revision: string): StructuralModel {
    if (source === '') {
      return createEmptyModel();
    }
    const extracted = this.extractor.extract(source, filePath);
    if (extracted.isErr()) {
      this.logger.warn('Could not parse file, treating it as empty', {
        filePath,
        revision,
        error: extracted.error.message,
      });
      return createEmptyModel();
    }
    return extracted.value;
  }
}
