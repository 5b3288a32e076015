import type { Embedder, SearchBackend } from '@/lib/core/interfaces';
import type {
  CaseResult,
  CollectionInfo,
  RunSummary,
  TestCase,
  TestCaseSelection,
  WrittenReport,
} from '@/lib/core/types';
import { DeadlineExceededError, errorMessage } from '@/lib/utils/errors';
import { configureDebug } from '@/lib/utils/debug';
import { createDeadline, raceWithSignal, type Deadline } from '@/lib/utils/deadline';
import { configService, type AppConfig, type RunConfig } from './config';
import { embedderFactory } from './embedders/embedder-factory';
import { backendFactory } from './search/backend-factory';
import { TestCaseRegistry } from './registry/test-case-registry';
import { RetryHandler } from './retry-handler';
import { RunLogger } from './run-logger';
import { ValidationEngine } from './validation/validation-engine';
import { RunOrchestrator } from './orchestrator/run-orchestrator';
import { ReportWriter } from './reporting/report-writer';
import { applyRetention } from './reporting/retention';

export interface SearchValidatorDeps {
  embedder?: Embedder;
  backend?: SearchBackend;
  logger?: RunLogger;
}

export interface ValidateOptions {
  /** Defaults to the configured tests file */
  testsFile?: string;
  /** Use these cases instead of loading a file */
  testCases?: readonly unknown[];
  selection?: TestCaseSelection;
  overrides?: Partial<RunConfig>;
  onResult?: (result: CaseResult) => void;
}

export interface ValidationOutcome {
  summary: RunSummary;
  reports: WrittenReport[];
  collection: CollectionInfo;
  testCases: TestCase[];
}

export interface BackendCheck {
  healthy: boolean;
  backend: string;
  embedder: string;
  collection: CollectionInfo | null;
}

/**
 * Entry point used by the CLI: configuration → embedder → backend →
 * pre-flight → run → reports → retention.
 */
export class SearchValidator {
  readonly embedder: Embedder;
  readonly backend: SearchBackend;
  readonly logger: RunLogger;

  constructor(private config: AppConfig, deps: SearchValidatorDeps = {}) {
    if (config.logging.debug) configureDebug({ enabled: true });

    this.logger = deps.logger ?? new RunLogger({ debug: config.logging.debug });
    this.embedder = deps.embedder ?? embedderFactory.create(config.embedding);
    this.backend =
      deps.backend ??
      backendFactory.create(config.backend, { timeoutMs: config.run.testTimeoutSeconds * 1000 });
  }

  static fromEnv(env: Record<string, string | undefined>, deps?: SearchValidatorDeps): SearchValidator {
    return new SearchValidator(configService.fromEnv(env), deps);
  }

  /**
   * Load (and optionally filter) the cases for a run.
   */
  async loadTestCases(options: Pick<ValidateOptions, 'testsFile' | 'testCases' | 'selection'> = {}): Promise<TestCase[]> {
    const source = options.testCases ? 'inline' : options.testsFile ?? this.config.testsFile;
    const registry = options.testCases
      ? TestCaseRegistry.fromArray(options.testCases)
      : await TestCaseRegistry.fromFile(options.testsFile ?? this.config.testsFile);

    const selected = registry.select(options.selection);
    this.logger.load(source, registry.size, selected.length);
    return selected;
  }

  /**
   * Health and collection details, without running any case. Both calls
   * share one per-case timeout; a health check that outlives it is unhealthy.
   */
  async check(): Promise<BackendCheck> {
    const base = { backend: this.backend.getName(), embedder: this.embedder.getName() };
    const deadline = this.preflightDeadline(this.config);

    try {
      const healthy = await this.checkHealth(deadline.signal);
      if (!healthy) {
        return { ...base, healthy, collection: null };
      }
      const { signal } = deadline;
      const collection = await raceWithSignal(this.backend.getCollectionInfo({ signal }), signal);
      return { ...base, healthy, collection };
    } finally {
      deadline.dispose();
    }
  }

  async validate(options: ValidateOptions = {}): Promise<ValidationOutcome> {
    const config = options.overrides
      ? configService.withRunOverrides(this.config, options.overrides)
      : this.config;

    // Test data problems surface before any network call
    const testCases = await this.loadTestCases(options);

    const engine = new ValidationEngine({
      embedder: this.embedder,
      backend: this.backend,
      tolerances: config.run,
      searchMode: config.run.searchMode,
      collectionName: config.backend.handle.collectionName,
      testTimeoutSeconds: config.run.testTimeoutSeconds,
      expectedVectorSize: config.backend.handle.expectedVectorSize,
      retry: new RetryHandler(config.retry),
      logger: this.logger,
    });

    const orchestrator = new RunOrchestrator({
      engine,
      embedder: this.embedder,
      backend: this.backend,
      handle: config.backend.handle,
      searchMode: config.run.searchMode,
      failureMonitor: config.failureMonitor,
      logger: this.logger,
    });

    const deadline = this.preflightDeadline(config);
    let collection: CollectionInfo;
    try {
      collection = await orchestrator.preflight(deadline.signal);
    } finally {
      deadline.dispose();
    }

    const summary = await orchestrator.run(testCases, {
      concurrency: config.run.concurrency,
      runTimeoutSeconds: config.run.runTimeoutSeconds,
      onResult: options.onResult,
    });

    const reports = await new ReportWriter(config.run.reportDir).write(summary, testCases, config.run.reportFormats);
    this.logger.reports(reports);

    await this.applyRetention(config);

    return { summary, reports, collection, testCases };
  }

  private preflightDeadline(config: AppConfig): Deadline {
    return createDeadline(undefined, config.run.testTimeoutSeconds * 1000, 'preflight');
  }

  private async checkHealth(signal: AbortSignal): Promise<boolean> {
    try {
      return await raceWithSignal(this.backend.healthCheck({ signal }), signal);
    } catch (error) {
      if (!(error instanceof DeadlineExceededError)) throw error;
      this.logger.warn('PREFLIGHT', { backend: this.backend.getName(), decision: error.message });
      return false;
    }
  }

  private async applyRetention(config: AppConfig): Promise<void> {
    const { reportDir, reportRetentionDays } = config.run;
    try {
      const result = await applyRetention(reportDir, reportRetentionDays);
      for (const failure of result.failed) {
        this.logger.warn('RETENTION', { file: failure.file, decision: errorMessage(failure.error) });
      }
      this.logger.retention(result.deleted, reportRetentionDays);
    } catch (error) {
      this.logger.warn('RETENTION', { decision: `skipped: ${errorMessage(error)}` });
    }
  }
}
