import type { SearchCandidate, SearchMode } from './search.types';

export type CaseOutcome =
  | 'Pass'
  | 'FailNotFound'
  | 'FailRankExceeded'
  | 'FailScoreBelowThreshold'
  | 'Error';

export type FailureOutcome = Exclude<CaseOutcome, 'Pass'>;

export const FAILURE_OUTCOMES: readonly FailureOutcome[] = [
  'FailNotFound',
  'FailRankExceeded',
  'FailScoreBelowThreshold',
  'Error',
];

/** Why an Error outcome happened; drives retries and failure escalation */
export type ErrorKind = 'timeout' | 'connection' | 'auth' | 'transient' | 'permanent' | 'internal';

export interface CaseResult {
  readonly testCaseId: string;
  readonly outcome: CaseOutcome;
  /** Positive and at most the number of candidates returned */
  readonly observedRank: number | null;
  readonly observedScore: number | null;
  readonly matchedDocumentId: string | null;
  readonly errorDetail: string | null;
  readonly errorKind: ErrorKind | null;
  readonly durationMs: number;
  readonly category: string | null;
  readonly maxAllowedRank: number;
  readonly minScoreThreshold: number;
  readonly topK: number;
  /** Mode actually searched; sparse and hybrid fall back to dense without a sparse vector */
  readonly searchMode: SearchMode;
  readonly collectionName: string;
  readonly topCandidates: readonly SearchCandidate[];
}

export interface CategoryStats {
  total: number;
  passed: number;
  /** passed / total, 0 when total is 0 */
  passRate: number;
}

export type RunStatus = 'success' | 'failure';

export interface RunSummary {
  readonly runId: string;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
  readonly status: RunStatus;
  readonly timedOut: boolean;
  readonly totalCases: number;
  readonly passCount: number;
  readonly passRate: number;
  readonly failCounts: Readonly<Record<FailureOutcome, number>>;
  readonly perCategoryStats: Readonly<Record<string, CategoryStats>>;
  /** Ordered as the test cases were loaded, regardless of completion order */
  readonly results: readonly CaseResult[];
}

export type ReportFormat = 'json' | 'csv' | 'xlsx';

export interface WrittenReport {
  format: ReportFormat;
  path: string;
}
