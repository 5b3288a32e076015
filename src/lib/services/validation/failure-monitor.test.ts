import { describe, it, expect } from 'vitest';
import type { CaseResult, ErrorKind } from '@/lib/core/types';
import { BackendUnavailableError } from '@/lib/utils/errors';
import { BackendFailureMonitor } from './failure-monitor';

function result(outcome: CaseResult['outcome'], errorKind: ErrorKind | null = null): CaseResult {
  return {
    testCaseId: 'q',
    outcome,
    observedRank: null,
    observedScore: null,
    matchedDocumentId: null,
    errorDetail: errorKind ? `failed with ${errorKind}` : null,
    errorKind,
    durationMs: 1,
    category: null,
    maxAllowedRank: 3,
    minScoreThreshold: 0.3,
    topK: 10,
    searchMode: 'dense',
    collectionName: 'recipes',
    topCandidates: [],
  };
}

describe('BackendFailureMonitor', () => {
  it('trips after the threshold of consecutive infrastructure failures', () => {
    const monitor = new BackendFailureMonitor({ threshold: 3, windowMs: 10_000 }, () => 1000);

    expect(monitor.record(result('Error', 'timeout'))).toBeNull();
    expect(monitor.record(result('Error', 'connection'))).toBeNull();

    const tripped = monitor.record(result('Error', 'transient'));
    expect(tripped).toBeInstanceOf(BackendUnavailableError);
    expect(tripped?.message).toBe(
      '3 consecutive cases failed on infrastructure errors within 10s (last: failed with transient)'
    );
  });

  it('resets the streak on any other result', () => {
    const monitor = new BackendFailureMonitor({ threshold: 2, windowMs: 10_000 }, () => 0);

    monitor.record(result('Error', 'timeout'));
    monitor.record(result('FailNotFound'));
    expect(monitor.consecutiveFailures).toBe(0);

    monitor.record(result('Error', 'timeout'));
    monitor.record(result('Error', 'permanent'));
    expect(monitor.record(result('Error', 'timeout'))).toBeNull();
  });

  it('ignores failures older than the window', () => {
    let now = 0;
    const monitor = new BackendFailureMonitor({ threshold: 2, windowMs: 1000 }, () => now);

    monitor.record(result('Error', 'timeout'));
    now = 5000;

    expect(monitor.record(result('Error', 'timeout'))).toBeNull();
    expect(monitor.consecutiveFailures).toBe(1);
  });
});
