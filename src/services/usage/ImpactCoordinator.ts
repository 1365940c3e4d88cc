/**
 * Impact Coordinator
 *
 * Searches usages for every change record and attaches the result. Records
 * sharing a `<filePath>:<elementName>` key are scanned once. Changes without
 * usages are left in place with an empty `affectedFiles`.
 */

import { impactKey, type ChangeRecord } from '../../models/ChangeRecord.js';
import type { ImpactMap } from '../../models/AnalysisResult.js';
import type { FileReader } from '../../models/RevisionContentProvider.js';
import type { UsageLocation } from '../../models/UsageLocation.js';
import { Logger, silentLogger } from '../../lib/logger.js';
import { generatePatterns } from './UsagePatternGenerator.js';
import { UsageScanner, type ScanOptions } from './UsageScanner.js';

export interface ImpactOptions extends ScanOptions {
  moduleRootPrefixes?: readonly string[];
}

/**
 * Memoize a reader so each file is read at most once per run
 */
export function cachingReader(readFile: FileReader): FileReader {
  const cache = new Map<string, Promise<string>>();
  return filePath => {
    let pending = cache.get(filePath);
    if (!pending) {
      pending = readFile(filePath);
      cache.set(filePath, pending);
    }
    return pending;
  };
}

export async function computeImpact(
  changes: readonly ChangeRecord[],
  candidateFiles: readonly string[],
  options: ImpactOptions
): Promise<ImpactMap> {
  const logger: Logger = options.logger ?? silentLogger;
  const scanner = new UsageScanner({ ...options, readFile: cachingReader(options.readFile) });
  const impact: ImpactMap = new Map();
  const scanned = new Map<string, UsageLocation[]>();

  for (const change of changes) {
    if (options.signal?.aborted) break;

    const key = impactKey(change);
    let locations = scanned.get(key);
    if (!locations) {
      const patterns = generatePatterns(change.elementName, change.filePath, {
        moduleRootPrefixes: options.moduleRootPrefixes,
      });
      locations = await scanner.scan(patterns, candidateFiles, change.filePath);
      scanned.set(key, locations);
      logger.debug('Usage scan complete', { element: key, usages: locations.length });
    }

    if (locations.length === 0) continue;

    impact.set(key, locations);
    for (const location of locations) {
      change.affectedFiles.add(location.filePath);
    }
  }

  return impact;
}
