import { describe, it, expect } from 'vitest';
import type { CaseResult } from '@/lib/core/types';
import { RunSummaryBuilder } from '@/lib/services/reporting/run-summary-builder';
import { testCase } from '@/lib/services/testing/fakes';
import { EXIT_FAILURES, EXIT_SUCCESS, exitCodeForSummary, formatResultLine, formatSummary, formatTestCase } from './output';

const base = {
  matchedDocumentId: null,
  errorDetail: null,
  errorKind: null,
  maxAllowedRank: 3,
  minScoreThreshold: 0.3,
  topK: 10,
  searchMode: 'dense',
  collectionName: 'recipes',
  topCandidates: [],
  durationMs: 10,
} as const;

const pass: CaseResult = {
  ...base,
  testCaseId: 'q1',
  outcome: 'Pass',
  observedRank: 2,
  observedScore: 0.55,
  matchedDocumentId: 'doc-42',
  category: 'recipes',
};

const error: CaseResult = {
  ...base,
  testCaseId: 'q2',
  outcome: 'Error',
  observedRank: null,
  observedScore: null,
  errorDetail: 'search: Case timeout of 5s exceeded',
  errorKind: 'timeout',
  category: null,
};

const cases = [testCase('q1', { category: 'recipes' }), testCase('q2')];

function sealed(results: CaseResult[]) {
  const builder = new RunSummaryBuilder('20260301_100000_abc123', cases, new Date('2026-03-01T10:00:00.000Z'));
  for (const r of results) builder.record(r);
  return builder.seal(new Date('2026-03-01T10:00:01.000Z'));
}

describe('formatResultLine', () => {
  it('shows rank and score for a match', () => {
    expect(formatResultLine(pass)).toBe('✓ q1: Pass (rank 2/3, score 0.550)');
  });

  it('shows the error detail for an Error', () => {
    expect(formatResultLine(error)).toBe('✗ q2: Error (search: Case timeout of 5s exceeded)');
  });

  it('omits the details when there are none', () => {
    expect(formatResultLine({ ...error, outcome: 'FailNotFound', errorDetail: null, errorKind: null })).toBe(
      '✗ q2: FailNotFound'
    );
  });
});

describe('formatSummary', () => {
  it('renders totals, non-zero failures, categories and reports', () => {
    const text = formatSummary(sealed([pass, error]), [{ format: 'json', path: '/reports/r.json' }]);

    expect(text.split('\n')).toEqual([
      '',
      'Run 20260301_100000_abc123: FAILURE',
      '  Passed: 1/2 (50.0%)',
      '  Error: 1',
      '',
      'By category:',
      '  (none): 0/1 (0.0%)',
      '  recipes: 1/1 (100.0%)',
      '  Duration: 1.0s',
      '',
      'Reports:',
      '  json: /reports/r.json',
    ]);
  });
});

describe('exitCodeForSummary', () => {
  it('is non-zero unless every case passed', () => {
    expect(exitCodeForSummary(sealed([pass, error]))).toBe(EXIT_FAILURES);
    expect(exitCodeForSummary(sealed([pass, { ...pass, testCaseId: 'q2', category: null }]))).toBe(EXIT_SUCCESS);
  });
});

describe('formatTestCase', () => {
  it('lists tags and accepted document ids', () => {
    const tc = testCase('q1', {
      queryText: 'chocolate cake',
      expectedDocumentId: 'doc-42',
      alternativeDocumentIds: ['doc-42-v2'],
      category: 'recipes',
      maxAllowedRank: 3,
    });

    expect(formatTestCase(tc)).toBe('  q1 [recipes] rank≤3\n    "chocolate cake" → doc-42 | doc-42-v2');
  });

  it('shows a case search mode and collection', () => {
    const tc = testCase('q2', {
      queryText: 'opening hours',
      expectedDocumentId: 'doc-7',
      searchMode: 'hybrid',
      collection: 'faq',
    });

    expect(formatTestCase(tc)).toBe('  q2 hybrid @faq\n    "opening hours" → doc-7');
  });
});
