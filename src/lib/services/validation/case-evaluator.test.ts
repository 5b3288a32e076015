import { describe, it, expect } from 'vitest';
import { evaluateCandidates, resolveTolerances } from './case-evaluator';
import { ranked, testCase } from '../testing/fakes';

const defaults = { maxAllowedRank: 3, minScoreThreshold: 0.3, topK: 10 };

describe('evaluateCandidates', () => {
  const q1 = testCase('q1', {
    queryText: 'chocolate cake',
    expectedDocumentId: 'doc-42',
    maxAllowedRank: 3,
    minScoreThreshold: 0.3,
  });
  const tolerances = resolveTolerances(q1, defaults);

  it('passes when the expected document is within rank and above the score floor', () => {
    const result = evaluateCandidates(q1, ranked(['doc-7', 0.81], ['doc-42', 0.55], ['doc-9', 0.4]), tolerances);

    expect(result).toEqual({
      outcome: 'Pass',
      observedRank: 2,
      observedScore: 0.55,
      matchedDocumentId: 'doc-42',
    });
  });

  it('reports FailRankExceeded when the document sits below the allowed rank', () => {
    const candidates = ranked(['a', 0.9], ['b', 0.88], ['c', 0.87], ['d', 0.86], ['doc-42', 0.85]);

    const result = evaluateCandidates(q1, candidates, tolerances);

    expect(result.outcome).toBe('FailRankExceeded');
    expect(result.observedRank).toBe(5);
  });

  it('checks rank before score', () => {
    const candidates = ranked(['a', 0.9], ['b', 0.8], ['c', 0.7], ['d', 0.6], ['doc-42', 0.1]);

    expect(evaluateCandidates(q1, candidates, tolerances).outcome).toBe('FailRankExceeded');
  });

  it('reports FailScoreBelowThreshold for a top hit with a low score', () => {
    const result = evaluateCandidates(q1, ranked(['doc-42', 0.2], ['doc-1', 0.1]), tolerances);

    expect(result).toEqual({
      outcome: 'FailScoreBelowThreshold',
      observedRank: 1,
      observedScore: 0.2,
      matchedDocumentId: 'doc-42',
    });
  });

  it('accepts a score equal to the threshold', () => {
    expect(evaluateCandidates(q1, ranked(['doc-42', 0.3]), tolerances).outcome).toBe('Pass');
  });

  it('reports FailNotFound when the document is absent', () => {
    const result = evaluateCandidates(q1, ranked(['doc-1', 0.9], ['doc-2', 0.8], ['doc-3', 0.7]), tolerances);

    expect(result).toEqual({
      outcome: 'FailNotFound',
      observedRank: null,
      observedScore: null,
      matchedDocumentId: null,
    });
  });

  it('reports FailNotFound for an empty result list', () => {
    expect(evaluateCandidates(q1, [], tolerances).outcome).toBe('FailNotFound');
  });

  it('matches the first accepted alternative id', () => {
    const withAlternatives = testCase('q2', {
      expectedDocumentId: 'doc-42',
      alternativeDocumentIds: ['doc-42-v2'],
    });

    const result = evaluateCandidates(
      withAlternatives,
      ranked(['doc-1', 0.9], ['doc-42-v2', 0.7], ['doc-42', 0.65]),
      resolveTolerances(withAlternatives, defaults)
    );

    expect(result.outcome).toBe('Pass');
    expect(result.matchedDocumentId).toBe('doc-42-v2');
    expect(result.observedRank).toBe(2);
  });
});

describe('resolveTolerances', () => {
  it('uses run defaults when the case has no overrides', () => {
    expect(resolveTolerances(testCase('a'), defaults)).toEqual({ maxAllowedRank: 3, minScoreThreshold: 0.3, topK: 10 });
  });

  it('prefers case overrides', () => {
    const overridden = testCase('a', { maxAllowedRank: 1, minScoreThreshold: 0.75 });

    expect(resolveTolerances(overridden, defaults)).toEqual({ maxAllowedRank: 1, minScoreThreshold: 0.75, topK: 10 });
  });

  it('widens topK to cover the allowed rank', () => {
    const deep = testCase('a', { maxAllowedRank: 25 });

    expect(resolveTolerances(deep, defaults).topK).toBe(25);
  });
});
