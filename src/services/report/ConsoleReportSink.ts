/**
 * Console Report
 *
 * Human-readable report on stdout, colored with chalk.
 */

import chalk from 'chalk';
import { impactKey, type ChangeRecord, type Severity } from '../../models/ChangeRecord.js';
import { totalUsageCount, type AnalysisResult } from '../../models/AnalysisResult.js';
import {
  RECOMMENDATION_TEXT,
  SEVERITY_ICONS,
  groupBySeverity,
  recommendationsFor,
  usageCountsByFile,
  type ReportSink,
} from './ReportSink.js';

const RULE = '='.repeat(80);
const LOCATIONS_SHOWN = 3;
const FILES_SHOWN = 10;

const SEVERITY_COLORS: Record<Severity, (text: string) => string> = {
  critical: chalk.red.bold,
  high: chalk.red,
  medium: chalk.yellow,
  low: chalk.green,
};

export class ConsoleReportSink implements ReportSink {
  constructor(private readonly write: (line: string) => void = line => console.log(line)) {}

  async emit(result: AnalysisResult): Promise<void> {
    for (const line of renderConsoleReport(result)) {
      this.write(line);
    }
  }
}

export function renderConsoleReport(result: AnalysisResult): string[] {
  const out: string[] = ['', RULE, chalk.bold('🔍 BREAKING CHANGES ANALYSIS REPORT'), RULE];

  out.push('📊 Analysis Summary:');
  out.push(`   • Files analyzed: ${result.totalFilesAnalyzed}`);
  out.push(`   • Breaking changes detected: ${result.totalChangesDetected}`);
  out.push(`   • Exit code: ${result.exitCode}`);

  const groups = groupBySeverity(result.changes);
  if (groups.length > 0) {
    const breakdown = groups.map(([severity, changes]) => `${SEVERITY_ICONS[severity]} ${changes.length} ${severity}`);
    out.push(`   • Severity breakdown: ${breakdown.join(', ')}`);

    out.push('', chalk.bold('📋 DETECTED BREAKING CHANGES:'), '-'.repeat(50));
    for (const [severity, changes] of groups) {
      out.push(...renderSeverityGroup(severity, changes, result));
    }
  } else {
    out.push('', chalk.green('✅ No breaking changes detected!'));
  }

  if (result.usageLocations.size > 0) {
    const files = usageCountsByFile(result);
    out.push('', chalk.bold('🎯 USAGE IMPACT:'));
    out.push(`   • Total usage locations: ${totalUsageCount(result.usageLocations)}`);
    out.push(`   • Affected files: ${files.length}`);
    out.push('   • Files that may need updates:');
    for (const [file, count] of files.slice(0, FILES_SHOWN)) {
      out.push(`     - ${file} (${count} usage(s))`);
    }
    if (files.length > FILES_SHOWN) {
      out.push(`     ... and ${files.length - FILES_SHOWN} more files`);
    }
  }

  out.push(...renderRecommendations(result), '', RULE);
  return out;
}

function renderSeverityGroup(severity: Severity, changes: ChangeRecord[], result: AnalysisResult): string[] {
  const color = SEVERITY_COLORS[severity];
  const out = ['', color(`${SEVERITY_ICONS[severity]} ${severity.toUpperCase()} SEVERITY (${changes.length} changes):`)];

  changes.forEach((change, index) => {
    out.push('', `  ${index + 1}. ${change.description}`);
    out.push(`     📁 File: ${change.filePath}:${change.line}`);
    out.push(`     🔧 Type: ${change.kind}`);
    out.push(`     📝 Element: ${change.elementName}`);

    if (change.oldSignatureText !== change.newSignatureText) {
      out.push(chalk.red(`     ❌ Old: ${change.oldSignatureText}`));
      out.push(chalk.green(`     ✅ New: ${change.newSignatureText}`));
    }

    const locations = result.usageLocations.get(impactKey(change));
    if (locations) {
      out.push(`     🎯 Usage found in ${locations.length} location(s):`);
      for (const location of locations.slice(0, LOCATIONS_SHOWN)) {
        out.push(chalk.gray(`        • ${location.filePath}:${location.line} (${location.usageKind})`));
      }
      if (locations.length > LOCATIONS_SHOWN) {
        out.push(chalk.gray(`        ... and ${locations.length - LOCATIONS_SHOWN} more`));
      }
    } else {
      out.push('     ℹ️  No usage detected');
    }
  });

  return out;
}

function renderRecommendations(result: AnalysisResult): string[] {
  const out = ['', chalk.bold('💡 RECOMMENDATIONS:')];
  const advice = recommendationsFor(result);

  if (advice.safe) {
    out.push('   ✅ No breaking changes detected. Safe to proceed!');
    return out;
  }

  const bullets = (items: readonly string[]): string[] => items.map(item => `      - ${item}`);

  if (advice.hasCriticalOrHigh) {
    out.push(chalk.red('   🚨 Critical/High severity changes detected:'), ...bullets(RECOMMENDATION_TEXT.criticalOrHigh));
  }
  if (advice.hasUsage) {
    out.push('   📋 Breaking changes have detected usage:', ...bullets(RECOMMENDATION_TEXT.withUsage));
  } else {
    out.push('   ℹ️  No usage detected for breaking changes:', ...bullets(RECOMMENDATION_TEXT.withoutUsage));
  }
  out.push('   📚 General recommendations:', ...bullets(RECOMMENDATION_TEXT.general));
  return out;
}
