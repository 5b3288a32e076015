/**
 * Run Logger
 *
 * Structured logging for validation runs.
 * Every run reads like a story with chapters, not a stack trace.
 *
 * STAGES (canonical order):
 *   LOAD → PREFLIGHT → CASE (×n, RETRY as needed) → REPORT → RETENTION → SUMMARY
 *
 * LOG LEVELS:
 *   INFO  = Stage results and the summary line
 *   DEBUG = Per-candidate details (gated by DEBUG_VALIDATOR)
 *   WARN  = Retry, failed case, retention problem
 *   ERROR = Abort
 */

import type { CaseResult, CollectionInfo, RunSummary, WrittenReport } from '@/lib/core/types';

export type RunStage = 'LOAD' | 'PREFLIGHT' | 'CASE' | 'RETRY' | 'REPORT' | 'RETENTION' | 'SUMMARY';

export type LogLevel = 'INFO' | 'DEBUG' | 'WARN' | 'ERROR';

interface StageData {
  // What came in
  input?: number | string;
  // What went out
  output?: number | string;
  // Why this path was taken
  decision?: string;
  [key: string]: unknown;
}

export interface RunLoggerOptions {
  debug?: boolean;
  /** Drop every line; for tests */
  silent?: boolean;
}

const ORDERED_KEYS = ['input', 'output', 'decision'];

class RunLogger {
  private runId: string = '-';
  private debugEnabled: boolean;
  private silent: boolean;

  constructor(options: RunLoggerOptions = {}) {
    this.debugEnabled = options.debug ?? false;
    this.silent = options.silent ?? false;
  }

  /**
   * Tag every following line with the run id.
   */
  startRun(runId: string): void {
    this.runId = runId;
  }

  info(stage: RunStage, data?: StageData): void {
    this.log('INFO', stage, data);
  }

  /**
   * Log at DEBUG level (gated by DEBUG_VALIDATOR)
   */
  debug(stage: RunStage, data?: StageData): void {
    if (this.debugEnabled) {
      this.log('DEBUG', stage, data);
    }
  }

  warn(stage: RunStage, data?: StageData): void {
    this.log('WARN', stage, data);
  }

  error(stage: RunStage, data?: StageData): void {
    this.log('ERROR', stage, data);
  }

  private log(level: LogLevel, stage: RunStage, data?: StageData): void {
    if (this.silent) return;

    const prefix = `[RUN:${this.runId}][${stage}]`;
    const message = data ? formatStageData(data) : '';
    const line = message ? `${prefix} ${message}` : prefix;

    if (level === 'WARN') {
      console.warn(line);
    } else if (level === 'ERROR') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  // ============================================
  // STAGE-SPECIFIC HELPERS
  // ============================================

  load(source: string, loaded: number, selected: number): void {
    this.info('LOAD', { source, input: loaded, output: selected });
  }

  preflight(backend: string, info: CollectionInfo): void {
    this.info('PREFLIGHT', {
      backend,
      vectorSize: info.vectorSize ?? 'unknown',
      distance: info.distanceMetric ?? 'unknown',
      points: info.pointCount,
      ...(info.vectorName !== null && { vector: info.vectorName }),
    });
  }

  caseResult(result: CaseResult): void {
    const data: StageData = {
      id: result.testCaseId,
      outcome: result.outcome,
      ...(result.observedRank !== null && { rank: result.observedRank }),
      ...(result.observedScore !== null && { score: result.observedScore.toFixed(3) }),
      ...(result.errorKind !== null && { kind: result.errorKind }),
      ...(result.errorDetail !== null && { decision: result.errorDetail }),
      ms: result.durationMs,
    };

    if (result.outcome === 'Pass') {
      this.info('CASE', data);
    } else {
      this.warn('CASE', data);
    }

    if (this.debugEnabled) {
      for (const c of result.topCandidates) {
        this.debug('CASE', { id: result.testCaseId, rank: c.rank, doc: c.documentId, score: c.score.toFixed(3) });
      }
    }
  }

  retry(testCaseId: string, operation: string, attempt: number, maxAttempts: number, waitMs: number, reason: string): void {
    this.warn('RETRY', {
      id: testCaseId,
      op: operation,
      attempt: `${attempt}/${maxAttempts}`,
      wait: `${waitMs}ms`,
      decision: reason,
    });
  }

  reports(written: readonly WrittenReport[]): void {
    for (const report of written) {
      this.info('REPORT', { format: report.format, path: report.path });
    }
  }

  retention(deleted: readonly string[], retentionDays: number): void {
    this.info('RETENTION', {
      days: retentionDays,
      removed: deleted.length,
      ...(deleted.length === 0 && { decision: 'nothing to remove' }),
    });
  }

  /**
   * One summary line at the end of the run.
   */
  summary(summary: RunSummary): void {
    const parts = [
      `total=${summary.totalCases}`,
      `pass=${summary.passCount}`,
      ...Object.entries(summary.failCounts)
        .filter(([, count]) => count > 0)
        .map(([outcome, count]) => `${outcome}=${count}`),
      `rate=${(summary.passRate * 100).toFixed(1)}%`,
      `latency=${summary.durationMs}ms`,
    ];
    if (summary.timedOut) parts.push('timedOut');

    const line = `${parts.join(' | ')} → ${summary.status}`;
    if (!this.silent) {
      console.log(`[RUN:${this.runId}][SUMMARY] ${line}`);
    }
  }
}

function formatStageData(data: StageData): string {
  const parts: string[] = [];

  if (data.input !== undefined) parts.push(`in=${data.input}`);
  if (data.output !== undefined) parts.push(`out=${data.output}`);

  for (const [key, value] of Object.entries(data)) {
    if (ORDERED_KEYS.includes(key)) continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      parts.push(`${key}=${value}`);
    }
  }

  if (data.decision !== undefined) parts.push(`→ ${data.decision}`);
  return parts.join(' ');
}

export { RunLogger };
