import type { Embedder, SearchBackend } from '@/lib/core/interfaces';
import type {
  CaseResult,
  EmbeddingResult,
  ResolvedTolerances,
  SearchCandidate,
  SearchMode,
  SearchQuery,
  TestCase,
} from '@/lib/core/types';
import {
  BackendUnavailableError,
  DimensionMismatchError,
  ExternalServiceError,
  classifyErrorKind,
  errorMessage,
  isFatalError,
} from '@/lib/utils/errors';
import { createDeadline, raceWithSignal } from '@/lib/utils/deadline';
import type { RetryHandler } from '../retry-handler';
import type { RunLogger } from '../run-logger';
import { evaluateCandidates, resolveTolerances, type Evaluation, type RunTolerances } from './case-evaluator';

/** Leading candidates kept on each result for reports */
export const TOP_CANDIDATES_KEPT = 5;

type Step = 'embed' | 'search';

/** Where and how a case searches once its defaults are applied */
interface CaseTarget {
  searchMode: SearchMode;
  collectionName: string;
}

export interface ValidationEngineOptions {
  embedder: Embedder;
  backend: SearchBackend;
  tolerances: RunTolerances;
  /** Mode for cases that do not set one */
  searchMode: SearchMode;
  /** Collection for cases that do not set one */
  collectionName: string;
  testTimeoutSeconds: number;
  /** Vector size the collection holds */
  expectedVectorSize: number;
  retry: RetryHandler;
  logger: RunLogger;
  now?: () => number;
}

/**
 * Validation Engine
 *
 * Runs one test case through embed → search → evaluate under its own
 * deadline. Case-scoped failures come back as Error results; fatal errors
 * (BackendUnavailable, DimensionMismatch) are thrown to the orchestrator.
 */
export class ValidationEngine {
  private now: () => number;

  constructor(private options: ValidationEngineOptions) {
    this.now = options.now ?? Date.now;
  }

  async evaluate(testCase: TestCase, runSignal?: AbortSignal): Promise<CaseResult> {
    const startedAt = this.now();
    const tolerances = resolveTolerances(testCase, this.options.tolerances);
    let target = this.resolveTarget(testCase);
    const deadline = createDeadline(runSignal, this.options.testTimeoutSeconds * 1000, 'case');
    let step: Step = 'embed';

    try {
      const embedded = await this.embed(testCase, deadline.signal);
      const query = this.buildQuery(testCase, target.searchMode, embedded);
      target = { ...target, searchMode: query.mode };

      step = 'search';
      const candidates = await this.search(testCase, query, target, tolerances.topK, deadline.signal);

      const evaluation = evaluateCandidates(testCase, candidates, tolerances);
      return this.buildResult(testCase, tolerances, target, startedAt, evaluation, candidates);
    } catch (error) {
      if (isFatalError(error)) throw error;

      return this.errorResult(testCase, tolerances, target, startedAt, `${step}: ${errorMessage(error)}`, error);
    } finally {
      deadline.dispose();
    }
  }

  /**
   * Result for a case that never started because the run was cancelled.
   */
  abortedResult(testCase: TestCase, reason: Error): CaseResult {
    const tolerances = resolveTolerances(testCase, this.options.tolerances);
    return this.errorResult(
      testCase,
      tolerances,
      this.resolveTarget(testCase),
      this.now(),
      `not started: ${reason.message}`,
      reason
    );
  }

  private resolveTarget(testCase: TestCase): CaseTarget {
    return {
      searchMode: testCase.searchMode ?? this.options.searchMode,
      collectionName: testCase.collection ?? this.options.collectionName,
    };
  }

  /**
   * Sparse and hybrid searches need lexical weights; an embedder that
   * returns none gets a dense search instead.
   */
  private buildQuery(testCase: TestCase, mode: SearchMode, embedded: EmbeddingResult): SearchQuery {
    const query: SearchQuery = { mode, dense: embedded.embedding, sparse: embedded.sparse, text: testCase.queryText };
    if (mode === 'dense' || embedded.sparse) return query;

    this.options.logger.debug('CASE', {
      id: testCase.id,
      decision: `${mode} needs a sparse vector; ${this.options.embedder.getName()} returned none, searching dense`,
    });
    return { ...query, mode: 'dense' };
  }

  private async embed(testCase: TestCase, signal: AbortSignal): Promise<EmbeddingResult> {
    const { embedder, expectedVectorSize } = this.options;

    const result = await this.options.retry.execute(
      () => raceWithSignal(embedder.embed(testCase.queryText, { signal }), signal),
      { signal, onRetry: (a) => this.logRetry(testCase, 'embed', a) }
    );

    if (result.embedding.length !== expectedVectorSize) {
      throw new DimensionMismatchError(expectedVectorSize, result.embedding.length, embedder.getName());
    }
    return result;
  }

  private async search(
    testCase: TestCase,
    query: SearchQuery,
    target: CaseTarget,
    topK: number,
    signal: AbortSignal
  ): Promise<SearchCandidate[]> {
    const { backend } = this.options;

    try {
      return await this.options.retry.execute(
        () => raceWithSignal(backend.search(query, topK, { signal, collectionName: target.collectionName }), signal),
        { signal, onRetry: (a) => this.logRetry(testCase, 'search', a) }
      );
    } catch (error) {
      // Still unreachable or still rejecting credentials after every retry
      if (
        !signal.aborted &&
        error instanceof ExternalServiceError &&
        (error.kind === 'connection' || error.kind === 'auth')
      ) {
        throw new BackendUnavailableError(`${backend.getName()} unavailable: ${error.message}`, error);
      }
      throw error;
    }
  }

  private logRetry(
    testCase: TestCase,
    step: Step,
    attempt: { attempt: number; maxAttempts: number; waitMs: number; error: unknown }
  ): void {
    this.options.logger.retry(
      testCase.id,
      step,
      attempt.attempt,
      attempt.maxAttempts,
      attempt.waitMs,
      errorMessage(attempt.error)
    );
  }

  private buildResult(
    testCase: TestCase,
    tolerances: ResolvedTolerances,
    target: CaseTarget,
    startedAt: number,
    evaluation: Evaluation,
    candidates: readonly SearchCandidate[]
  ): CaseResult {
    const result: CaseResult = {
      testCaseId: testCase.id,
      ...evaluation,
      errorDetail: null,
      errorKind: null,
      durationMs: this.now() - startedAt,
      category: testCase.category ?? null,
      ...tolerances,
      ...target,
      topCandidates: candidates
        .slice(0, TOP_CANDIDATES_KEPT)
        .map(({ documentId, score, rank }) => ({ documentId, score, rank })),
    };
    return Object.freeze(result);
  }

  private errorResult(
    testCase: TestCase,
    tolerances: ResolvedTolerances,
    target: CaseTarget,
    startedAt: number,
    detail: string,
    error: unknown
  ): CaseResult {
    const result: CaseResult = {
      testCaseId: testCase.id,
      outcome: 'Error',
      observedRank: null,
      observedScore: null,
      matchedDocumentId: null,
      errorDetail: detail,
      errorKind: classifyErrorKind(error),
      durationMs: this.now() - startedAt,
      category: testCase.category ?? null,
      ...tolerances,
      ...target,
      topCandidates: [],
    };
    return Object.freeze(result);
  }
}
