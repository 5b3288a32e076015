import type { CaseOutcome, ResolvedTolerances, SearchCandidate, TestCase } from '@/lib/core/types';

export interface RunTolerances {
  maxAllowedRank: number;
  minScoreThreshold: number;
  topK: number;
}

export interface Evaluation {
  outcome: Exclude<CaseOutcome, 'Error'>;
  observedRank: number | null;
  observedScore: number | null;
  matchedDocumentId: string | null;
}

/**
 * Per-case overrides win over run defaults. The search always asks for at
 * least `maxAllowedRank` candidates.
 */
export function resolveTolerances(testCase: TestCase, defaults: RunTolerances): ResolvedTolerances {
  const maxAllowedRank = testCase.maxAllowedRank ?? defaults.maxAllowedRank;
  return {
    maxAllowedRank,
    minScoreThreshold: testCase.minScoreThreshold ?? defaults.minScoreThreshold,
    topK: Math.max(defaults.topK, maxAllowedRank),
  };
}

export function acceptedDocumentIds(testCase: TestCase): Set<string> {
  return new Set([testCase.expectedDocumentId, ...(testCase.alternativeDocumentIds ?? [])]);
}

/**
 * Decide the outcome for one case from the ranked candidates.
 * Rank is checked before score: a hit outside the rank budget is
 * FailRankExceeded however high its score.
 */
export function evaluateCandidates(
  testCase: TestCase,
  candidates: readonly SearchCandidate[],
  tolerances: ResolvedTolerances
): Evaluation {
  const accepted = acceptedDocumentIds(testCase);
  const match = candidates.find((c) => accepted.has(c.documentId));

  if (!match) {
    return { outcome: 'FailNotFound', observedRank: null, observedScore: null, matchedDocumentId: null };
  }

  const observed = {
    observedRank: match.rank,
    observedScore: match.score,
    matchedDocumentId: match.documentId,
  };

  if (match.rank > tolerances.maxAllowedRank) {
    return { outcome: 'FailRankExceeded', ...observed };
  }
  if (match.score < tolerances.minScoreThreshold) {
    return { outcome: 'FailScoreBelowThreshold', ...observed };
  }
  return { outcome: 'Pass', ...observed };
}
