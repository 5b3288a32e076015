import crypto from 'crypto';
import type { Embedder, SearchBackend } from '@/lib/core/interfaces';
import type {
  CaseResult,
  CollectionHandle,
  CollectionInfo,
  RunSummary,
  SearchMode,
  TestCase,
} from '@/lib/core/types';
import {
  BackendUnavailableError,
  ConfigurationError,
  DeadlineExceededError,
  DimensionMismatchError,
  ExternalServiceError,
  errorMessage,
} from '@/lib/utils/errors';
import { abortReason, raceWithSignal, timerDelay } from '@/lib/utils/deadline';
import { debug } from '@/lib/utils/debug';
import type { FailureMonitorConfig } from '../config';
import type { RunLogger } from '../run-logger';
import { RunSummaryBuilder } from '../reporting/run-summary-builder';
import { BackendFailureMonitor } from '../validation/failure-monitor';
import type { ValidationEngine } from '../validation/validation-engine';

export interface RunOrchestratorOptions {
  engine: ValidationEngine;
  embedder: Embedder;
  backend: SearchBackend;
  handle: CollectionHandle;
  /** Run-wide search mode; sparse and hybrid need the sparse vector at pre-flight */
  searchMode: SearchMode;
  failureMonitor: FailureMonitorConfig;
  logger: RunLogger;
  now?: () => Date;
}

export interface RunOptions {
  concurrency: number;
  runTimeoutSeconds: number;
  runId?: string;
  /** Called once per case as its result is recorded */
  onResult?: (result: CaseResult) => void;
}

/**
 * Run id of the form `YYYYMMDD_HHmmss_<suffix>`, local time.
 */
export function generateRunId(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}_${crypto.randomUUID().slice(0, 6)}`;
}

/**
 * Run Orchestrator
 *
 * Checks the backend before anything runs, then drives the cases through a
 * bounded worker pool under the run deadline and seals the summary.
 */
export class RunOrchestrator {
  private now: () => Date;

  constructor(private options: RunOrchestratorOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Health check, then compare the collection with the configuration.
   * A backend that does not answer before `signal` aborts counts as unavailable.
   * @throws BackendUnavailableError, DimensionMismatchError or ConfigurationError
   */
  async preflight(signal?: AbortSignal): Promise<CollectionInfo> {
    const { backend, embedder, handle } = this.options;
    const name = backend.getName();

    const healthy = await this.withinPreflight(backend.healthCheck({ signal }), signal);
    if (!healthy) {
      throw new BackendUnavailableError(`${name} failed its health check`);
    }

    let info: CollectionInfo;
    try {
      info = await this.withinPreflight(backend.getCollectionInfo({ signal }), signal);
    } catch (error) {
      if (error instanceof ExternalServiceError) {
        throw new BackendUnavailableError(`${name} collection info unavailable: ${error.message}`, error);
      }
      throw error;
    }

    const expected = handle.expectedVectorSize;
    if (embedder.getDimensions() !== expected) {
      throw new DimensionMismatchError(expected, embedder.getDimensions(), embedder.getName());
    }
    if (info.vectorSize !== null && info.vectorSize !== expected) {
      throw new DimensionMismatchError(expected, info.vectorSize, `collection ${handle.collectionName}`);
    }
    if (info.distanceMetric !== null && info.distanceMetric !== handle.distanceMetric) {
      throw new ConfigurationError(
        `Distance metric mismatch: collection ${handle.collectionName} uses ${info.distanceMetric}, ` +
          `configured ${handle.distanceMetric}`
      );
    }
    const { searchMode } = this.options;
    if (
      searchMode !== 'dense' &&
      info.sparseVectorNames !== null &&
      !info.sparseVectorNames.includes(handle.sparseVectorName)
    ) {
      throw new ConfigurationError(
        `Search mode ${searchMode} needs sparse vector "${handle.sparseVectorName}", ` +
          `collection ${handle.collectionName} has ${info.sparseVectorNames.join(', ') || 'none'}`
      );
    }

    this.options.logger.preflight(name, info);
    return info;
  }

  private async withinPreflight<T>(call: Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!signal) return call;
    try {
      return await raceWithSignal(call, signal);
    } catch (error) {
      if (error instanceof DeadlineExceededError) {
        throw new BackendUnavailableError(`${this.options.backend.getName()} pre-flight: ${error.message}`, error);
      }
      throw error;
    }
  }

  /**
   * Execute every case and seal the summary. Cases still in flight at the
   * run deadline finish as timeout errors; cases never started are recorded
   * the same way. A fatal error cancels all cases and is rethrown.
   */
  async run(testCases: readonly TestCase[], options: RunOptions): Promise<RunSummary> {
    const { engine, logger } = this.options;
    const runId = options.runId ?? generateRunId(this.now());
    const builder = new RunSummaryBuilder(runId, testCases, this.now());
    const monitor = new BackendFailureMonitor(this.options.failureMonitor);
    const controller = new AbortController();
    const state: { fatal: Error | null; timedOut: boolean } = { fatal: null, timedOut: false };

    logger.startRun(runId);

    const runTimeoutMs = options.runTimeoutSeconds * 1000;
    const timer = setTimeout(() => {
      state.timedOut = true;
      controller.abort(new DeadlineExceededError('run', runTimeoutMs));
    }, timerDelay(runTimeoutMs));

    const fail = (error: unknown) => {
      if (state.fatal) return;
      state.fatal = error instanceof Error ? error : new Error(String(error));
      controller.abort(state.fatal);
    };

    const record = (result: CaseResult) => {
      builder.record(result);
      logger.caseResult(result);
      options.onResult?.(result);

      // Timeouts caused by the run ending say nothing about backend health
      if (!controller.signal.aborted) {
        const tripped = monitor.record(result);
        if (tripped) fail(tripped);
      }
    };

    let cursor = 0;
    const worker = async (workerId: number) => {
      while (!controller.signal.aborted && cursor < testCases.length) {
        const testCase = testCases[cursor++];
        debug.pool.log(`worker ${workerId} → ${testCase.id}`);

        try {
          record(await engine.evaluate(testCase, controller.signal));
        } catch (error) {
          fail(error);
          return;
        }
      }
    };

    const workerCount = Math.max(1, Math.min(options.concurrency, testCases.length));
    try {
      await Promise.all(Array.from({ length: workerCount }, (_, i) => worker(i + 1)));
    } finally {
      clearTimeout(timer);
    }

    if (state.fatal) {
      logger.error('SUMMARY', { decision: `aborted: ${errorMessage(state.fatal)}` });
      throw state.fatal;
    }

    if (controller.signal.aborted) {
      const reason = abortReason(controller.signal);
      for (const testCase of builder.pending()) {
        record(engine.abortedResult(testCase, reason));
      }
    }

    const summary = builder.seal(this.now(), { timedOut: state.timedOut });
    logger.summary(summary);
    return summary;
  }
}
