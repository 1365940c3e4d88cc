/**
 * breakwatch
 *
 * Library entry point. The CLI lives in cli/index.ts.
 */

export { StructuralExtractor, extractStructure } from './services/parser/StructuralExtractor.js';
export { TreeSitterParser } from './services/parser/TreeSitterParser.js';
export { diffModels, compareSignatures } from './services/diff/SignatureDiffer.js';
export { formatFunctionSignature, formatClassSignature } from './services/diff/SignatureFormatter.js';
export { ChangeAggregator, type AggregateOptions } from './services/diff/ChangeAggregator.js';
export { generatePatterns, moduleDottedPath } from './services/usage/UsagePatternGenerator.js';
export { UsageScanner, type ScanOptions } from './services/usage/UsageScanner.js';
export { computeImpact, cachingReader, type ImpactOptions } from './services/usage/ImpactCoordinator.js';
export { FileSelector } from './services/files/FileSelector.js';
export { collectCandidateFiles } from './services/files/CandidateFileCollector.js';
export { GitContentProvider, validateRef } from './services/git/GitContentProvider.js';
export { BreakingChangesDetector, determineExitCode, processExitCode } from './services/BreakingChangesDetector.js';
export { ConsoleReportSink } from './services/report/ConsoleReportSink.js';
export { JsonReportSink, buildJsonReport } from './services/report/JsonReportSink.js';
export { MarkdownReportSink, renderMarkdownReport } from './services/report/MarkdownReportSink.js';
export type { ReportSink } from './services/report/ReportSink.js';
export { ConfigurationManager } from './lib/env-config.js';
export { Logger, type LoggerConfig, type LogLevel } from './lib/logger.js';
export * from './lib/errors/DetectorErrors.js';
export * from './models/StructuralModel.js';
export * from './models/ChangeRecord.js';
export * from './models/UsageLocation.js';
export * from './models/AnalysisResult.js';
export * from './models/DetectorConfig.js';
export type { RevisionContentProvider, FileReader } from './models/RevisionContentProvider.js';
