/**
 * Markdown Report
 */

import { impactKey } from '../../models/ChangeRecord.js';
import { totalUsageCount, type AnalysisResult } from '../../models/AnalysisResult.js';
import type { Logger } from '../../lib/logger.js';
import {
  RECOMMENDATION_TEXT,
  SEVERITY_ICONS,
  groupBySeverity,
  recommendationsFor,
  usageCountsByFile,
  writeReportFile,
  type ReportSink,
} from './ReportSink.js';

const LOCATIONS_SHOWN = 5;

const titleCase = (word: string): string => word.charAt(0).toUpperCase() + word.slice(1);

export function renderMarkdownReport(result: AnalysisResult, generatedAt: Date = new Date()): string {
  const md: string[] = [
    '# Breaking Changes Analysis Report',
    '',
    `**Generated:** ${generatedAt.toISOString()}`,
    `**Repository:** ${result.repositoryPath}`,
    `**Comparison:** ${result.baseRef}..${result.headRef}`,
    '',
    '## 📊 Summary',
    '',
    `- **Files analyzed:** ${result.totalFilesAnalyzed}`,
    `- **Breaking changes detected:** ${result.totalChangesDetected}`,
    `- **Exit code:** ${result.exitCode}`,
    '',
  ];

  const groups = groupBySeverity(result.changes);
  if (groups.length > 0) {
    md.push('### Severity Breakdown', '');
    for (const [severity, changes] of groups) {
      md.push(`- ${SEVERITY_ICONS[severity]} **${titleCase(severity)}:** ${changes.length}`);
    }
    md.push('', '## 📋 Breaking Changes', '');

    for (const [severity, changes] of groups) {
      md.push(`### ${SEVERITY_ICONS[severity]} ${titleCase(severity)} Severity`, '');
      changes.forEach((change, index) => {
        md.push(`#### ${index + 1}. ${change.description}`, '');
        md.push(`- **File:** \`${change.filePath}:${change.line}\``);
        md.push(`- **Type:** \`${change.kind}\``);
        md.push(`- **Element:** \`${change.elementName}\``);
        if (change.oldSignatureText !== change.newSignatureText) {
          md.push(`- **Old signature:** \`${change.oldSignatureText}\``);
          md.push(`- **New signature:** \`${change.newSignatureText}\``);
        }

        const locations = result.usageLocations.get(impactKey(change));
        if (locations && locations.length > 0) {
          md.push(`- **Usage found:** ${locations.length} location(s)`, '  - Affected files:');
          for (const location of locations.slice(0, LOCATIONS_SHOWN)) {
            md.push(`    - \`${location.filePath}:${location.line}\` (${location.usageKind})`);
          }
          if (locations.length > LOCATIONS_SHOWN) {
            md.push(`    - ... and ${locations.length - LOCATIONS_SHOWN} more`);
          }
        } else {
          md.push('- **Usage found:** None detected');
        }
        md.push('');
      });
    }
  } else {
    md.push('## ✅ No Breaking Changes', '', 'No breaking changes were detected in this analysis.', '');
  }

  if (result.usageLocations.size > 0) {
    const files = usageCountsByFile(result);
    md.push('## 🎯 Usage Impact', '');
    md.push(`- **Total usage locations:** ${totalUsageCount(result.usageLocations)}`);
    md.push(`- **Affected files:** ${files.length}`, '');
    md.push('### Files That May Need Updates', '');
    for (const [file, count] of files) {
      md.push(`- \`${file}\` (${count} usage(s))`);
    }
    md.push('');
  }

  md.push('## 💡 Recommendations', '');
  const advice = recommendationsFor(result);
  if (advice.safe) {
    md.push('✅ No breaking changes detected. Safe to proceed!');
  } else {
    const bullets = (items: readonly string[]): string[] => items.map(item => `- ${item}`);
    if (advice.hasCriticalOrHigh) {
      md.push('🚨 **Critical/High severity changes detected:**', ...bullets(RECOMMENDATION_TEXT.criticalOrHigh), '');
    }
    if (advice.hasUsage) {
      md.push('📋 **Breaking changes have detected usage:**', ...bullets(RECOMMENDATION_TEXT.withUsage), '');
    } else {
      md.push('ℹ️ **No usage detected for breaking changes:**', ...bullets(RECOMMENDATION_TEXT.withoutUsage), '');
    }
    md.push('📚 **General recommendations:**', ...bullets(RECOMMENDATION_TEXT.general));
  }

  md.push('', '---', '*Report generated by breakwatch*');
  return md.join('\n');
}

export class MarkdownReportSink implements ReportSink {
  constructor(
    private readonly outputPath: string,
    private readonly logger: Logger
  ) {}

  async emit(result: AnalysisResult): Promise<void> {
    this.logger.info('Writing Markdown report', { path: this.outputPath });
    await writeReportFile(this.outputPath, renderMarkdownReport(result));
  }
}
