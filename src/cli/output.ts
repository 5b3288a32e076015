/**
 * Console rendering and exit codes for the CLI.
 */

import type { CaseResult, RunSummary, TestCase, WrittenReport } from '@/lib/core/types';
import { FAILURE_OUTCOMES } from '@/lib/core/types';
import { formatError } from '@/lib/utils/errors';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURES = 1;
export const EXIT_FATAL = 2;

export function exitCodeForSummary(summary: RunSummary): number {
  return summary.status === 'success' ? EXIT_SUCCESS : EXIT_FAILURES;
}

const percent = (rate: number) => `${(rate * 100).toFixed(1)}%`;

export function formatResultLine(result: CaseResult): string {
  const mark = result.outcome === 'Pass' ? '✓' : '✗';
  const details: string[] = [];
  if (result.observedRank !== null) details.push(`rank ${result.observedRank}/${result.maxAllowedRank}`);
  if (result.observedScore !== null) details.push(`score ${result.observedScore.toFixed(3)}`);
  if (result.errorDetail !== null) details.push(result.errorDetail);

  const suffix = details.length > 0 ? ` (${details.join(', ')})` : '';
  return `${mark} ${result.testCaseId}: ${result.outcome}${suffix}`;
}

export function formatSummary(summary: RunSummary, reports: readonly WrittenReport[] = []): string {
  const lines = [
    '',
    `Run ${summary.runId}: ${summary.status.toUpperCase()}${summary.timedOut ? ' (run timeout reached)' : ''}`,
    `  Passed: ${summary.passCount}/${summary.totalCases} (${percent(summary.passRate)})`,
  ];

  for (const outcome of FAILURE_OUTCOMES) {
    if (summary.failCounts[outcome] > 0) {
      lines.push(`  ${outcome}: ${summary.failCounts[outcome]}`);
    }
  }

  const categories = Object.entries(summary.perCategoryStats);
  if (categories.length > 0) {
    lines.push('', 'By category:');
    for (const [category, stats] of categories) {
      lines.push(`  ${category}: ${stats.passed}/${stats.total} (${percent(stats.passRate)})`);
    }
  }

  lines.push(`  Duration: ${(summary.durationMs / 1000).toFixed(1)}s`);

  if (reports.length > 0) {
    lines.push('', 'Reports:');
    for (const report of reports) {
      lines.push(`  ${report.format}: ${report.path}`);
    }
  }

  return lines.join('\n');
}

export function formatTestCase(testCase: TestCase): string {
  const tags = [
    testCase.category ? `[${testCase.category}]` : null,
    testCase.maxAllowedRank !== undefined ? `rank≤${testCase.maxAllowedRank}` : null,
    testCase.minScoreThreshold !== undefined ? `score≥${testCase.minScoreThreshold}` : null,
    testCase.searchMode ?? null,
    testCase.collection ? `@${testCase.collection}` : null,
  ].filter((t): t is string => t !== null);

  const expected = [testCase.expectedDocumentId, ...(testCase.alternativeDocumentIds ?? [])].join(' | ');
  return `  ${testCase.id} ${tags.join(' ')}\n    "${testCase.queryText}" → ${expected}`;
}

/**
 * Print an error that ended the command. Fatal run errors and unexpected
 * failures share the same exit code.
 */
export function reportError(error: unknown): number {
  console.error(formatError(error));
  return EXIT_FATAL;
}
