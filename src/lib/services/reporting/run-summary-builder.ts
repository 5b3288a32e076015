import type { CaseResult, CategoryStats, FailureOutcome, RunSummary, TestCase } from '@/lib/core/types';
import { AppError } from '@/lib/utils/errors';

/** Group key for cases without a category */
export const UNCATEGORIZED = '(none)';

export interface SealOptions {
  timedOut?: boolean;
}

/**
 * Single aggregation point for a run.
 *
 * `record` is synchronous, so concurrent completions are serialized by the
 * event loop. Counts are derived from the recorded set when sealing, which
 * makes the summary independent of arrival order.
 */
export class RunSummaryBuilder {
  private order: Map<string, number>;
  private results: Map<string, CaseResult> = new Map();
  private sealed: RunSummary | null = null;

  constructor(
    private runId: string,
    private testCases: readonly TestCase[],
    private startedAt: Date
  ) {
    this.order = new Map(testCases.map((c, i) => [c.id, i]));
  }

  record(result: CaseResult): void {
    if (this.sealed) {
      throw new AppError(`Run ${this.runId} is sealed; cannot record ${result.testCaseId}`, 'RUN_SEALED');
    }
    if (!this.order.has(result.testCaseId)) {
      throw new AppError(`Result for unknown test case: ${result.testCaseId}`, 'UNKNOWN_TEST_CASE');
    }
    if (this.results.has(result.testCaseId)) {
      throw new AppError(`Result already recorded for test case: ${result.testCaseId}`, 'DUPLICATE_RESULT');
    }
    this.results.set(result.testCaseId, result);
  }

  /** Cases with no result yet, in input order */
  pending(): TestCase[] {
    return this.testCases.filter((c) => !this.results.has(c.id));
  }

  /**
   * Freeze the summary. Every loaded case must have a result.
   */
  seal(finishedAt: Date, options: SealOptions = {}): RunSummary {
    if (this.sealed) return this.sealed;

    const missing = this.pending();
    if (missing.length > 0) {
      throw new AppError(
        `Cannot seal run ${this.runId}: ${missing.length} case(s) without a result`,
        'RUN_INCOMPLETE'
      );
    }

    const results = [...this.results.values()].sort(
      (a, b) => (this.order.get(a.testCaseId) ?? 0) - (this.order.get(b.testCaseId) ?? 0)
    );

    const failCounts: Record<FailureOutcome, number> = {
      FailNotFound: 0,
      FailRankExceeded: 0,
      FailScoreBelowThreshold: 0,
      Error: 0,
    };
    const perCategory: Record<string, CategoryStats> = {};
    let passCount = 0;

    for (const result of results) {
      const key = result.category ?? UNCATEGORIZED;
      const stats = perCategory[key] ?? { total: 0, passed: 0, passRate: 0 };
      stats.total += 1;

      if (result.outcome === 'Pass') {
        passCount += 1;
        stats.passed += 1;
      } else {
        failCounts[result.outcome] += 1;
      }
      perCategory[key] = stats;
    }

    for (const stats of Object.values(perCategory)) {
      stats.passRate = rate(stats.passed, stats.total);
    }

    const totalCases = results.length;
    const summary: RunSummary = {
      runId: this.runId,
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - this.startedAt.getTime(),
      status: passCount === totalCases ? 'success' : 'failure',
      timedOut: options.timedOut ?? false,
      totalCases,
      passCount,
      passRate: rate(passCount, totalCases),
      failCounts: Object.freeze(failCounts),
      perCategoryStats: Object.freeze(sortKeys(perCategory)),
      results: Object.freeze(results),
    };

    this.sealed = Object.freeze(summary);
    return this.sealed;
  }
}

function rate(passed: number, total: number): number {
  return total === 0 ? 0 : passed / total;
}

function sortKeys(stats: Record<string, CategoryStats>): Record<string, CategoryStats> {
  return Object.fromEntries(
    Object.keys(stats)
      .sort()
      .map((key) => [key, Object.freeze(stats[key])])
  );
}
