/**
 * Centralized configuration service.
 * Builds one explicit, validated AppConfig from an environment map.
 * Components receive their slice through constructors and never read process.env.
 */

import { z } from 'zod';
import type {
  CollectionHandle,
  EmbeddingProvider,
  ReportFormat,
  SearchBackendProvider,
  SearchMode,
} from '@/lib/core/types';
import { SEARCH_MODES } from '@/lib/core/types';
import { PROVIDER_DEFAULTS, resolveDimensions } from '@/config/models';
import { ConfigurationError } from '@/lib/utils/errors';
import { MAX_TIMER_MS } from '@/lib/utils/deadline';
import type { RetryConfig } from './retry-handler';

export interface EmbeddingConfig {
  provider: EmbeddingProvider;
  apiUrl: string;
  apiKey: string;
  model: string;
  dimensions: number;
  timeoutMs: number;
}

export interface BackendConfig {
  provider: SearchBackendProvider;
  handle: CollectionHandle;
}

export interface RunConfig {
  maxAllowedRank: number;
  minScoreThreshold: number;
  topK: number;
  /** Used by cases that do not set their own */
  searchMode: SearchMode;
  testTimeoutSeconds: number;
  runTimeoutSeconds: number;
  concurrency: number;
  reportFormats: ReportFormat[];
  reportDir: string;
  /** 0 disables retention */
  reportRetentionDays: number;
}

export interface FailureMonitorConfig {
  /** Consecutive infrastructure failures that trip the monitor */
  threshold: number;
  windowMs: number;
}

export interface AppConfig {
  backend: BackendConfig;
  embedding: EmbeddingConfig;
  run: RunConfig;
  retry: RetryConfig;
  failureMonitor: FailureMonitorConfig;
  testsFile: string;
  logging: {
    debug: boolean;
  };
}

const REPORT_FORMATS = ['json', 'csv', 'xlsx'] as const;
const DEFAULT_TESTS_FILE = './tests.json';

/** Longest case or run timeout a timer can hold (about 24.8 days) */
export const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMER_MS / 1000);

const boolFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const intFromEnv = (min: number) => z.coerce.number().int().min(min);

const envSchema = z.object({
  VECTOR_DB_PROVIDER: z.enum(['qdrant', 'weaviate']).default('qdrant'),
  VECTOR_DB_URL: z.string().url().optional(),
  VECTOR_DB_HOST: z.string().min(1).default('localhost'),
  VECTOR_DB_PORT: intFromEnv(1).max(65535).default(6333),
  VECTOR_DB_HTTPS: boolFromEnv.default('false'),
  VECTOR_DB_API_KEY: z.string().optional(),
  COLLECTION_NAME: z.string().min(1, 'COLLECTION_NAME is required'),
  VECTOR_NAME: z.string().min(1).optional(),
  SPARSE_VECTOR_NAME: z.string().min(1).default('sparse'),
  VECTOR_SIZE: intFromEnv(1).optional(),
  DISTANCE_METRIC: z.enum(['cosine', 'dot', 'euclid', 'manhattan', 'hamming']).default('cosine'),
  DOCUMENT_ID_FIELD: z.string().min(1).default('id'),

  EMBEDDING_PROVIDER: z.enum(['openai', 'bge-m3']).default('bge-m3'),
  EMBEDDING_API_URL: z.string().url().optional(),
  EMBEDDING_API_KEY: z.string().optional(),
  EMBEDDING_MODEL: z.string().min(1).optional(),
  EMBEDDING_DIMENSIONS: intFromEnv(1).optional(),
  EMBEDDING_TIMEOUT_MS: intFromEnv(1).default(60000),

  MAX_ALLOWED_RANK: intFromEnv(1).default(3),
  MIN_SCORE_THRESHOLD: z.coerce.number().finite().default(0.3),
  SEARCH_TOP_K: intFromEnv(1).default(10),
  SEARCH_MODE: z.enum(SEARCH_MODES).default('dense'),
  TEST_TIMEOUT_SECONDS: z.coerce.number().positive().max(MAX_TIMEOUT_SECONDS).default(30),
  RUN_TIMEOUT_SECONDS: z.coerce.number().positive().max(MAX_TIMEOUT_SECONDS).default(600),
  CONCURRENCY: intFromEnv(1).default(4),
  REPORT_FORMATS: z.string().default('json,csv'),
  REPORT_DIR: z.string().min(1).default('./reports'),
  REPORT_RETENTION_DAYS: intFromEnv(0).default(30),

  MAX_RETRIES: intFromEnv(0).default(3),
  RETRY_BASE_DELAY_MS: intFromEnv(0).default(500),
  RETRY_MAX_DELAY_MS: intFromEnv(0).default(8000),
  FAILURE_THRESHOLD: intFromEnv(1).default(5),
  FAILURE_WINDOW_SECONDS: z.coerce.number().positive().default(30),

  TESTS_FILE: z.string().min(1).default(DEFAULT_TESTS_FILE),
  DEBUG_VALIDATOR: boolFromEnv.default('false'),
});

/**
 * Parse a comma-separated list of report formats.
 */
export function parseReportFormats(value: string): ReportFormat[] {
  const formats = value
    .split(',')
    .map((f) => f.trim().toLowerCase())
    .filter((f) => f.length > 0);

  const invalid = formats.filter((f) => !REPORT_FORMATS.some((known) => known === f));
  if (invalid.length > 0 || formats.length === 0) {
    throw new ConfigurationError('Invalid report formats', [
      `REPORT_FORMATS: expected a subset of ${REPORT_FORMATS.join(', ')}, got "${value}"`,
    ]);
  }

  return REPORT_FORMATS.filter((known) => formats.includes(known));
}

class ConfigService {
  /**
   * Build and validate configuration from an environment map.
   * @throws ConfigurationError listing every invalid variable
   */
  fromEnv(env: Record<string, string | undefined>): AppConfig {
    // Empty strings count as unset, like a blank line in .env
    const cleaned = Object.fromEntries(
      Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
    );

    const parsed = envSchema.safeParse(cleaned);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`);
      throw new ConfigurationError('Configuration validation failed', issues);
    }

    const e = parsed.data;
    const embeddingDefaults = PROVIDER_DEFAULTS[e.EMBEDDING_PROVIDER];
    const embeddingModel = e.EMBEDDING_MODEL ?? embeddingDefaults.model;
    const embeddingDimensions = resolveDimensions(e.EMBEDDING_PROVIDER, embeddingModel, e.EMBEDDING_DIMENSIONS);

    if (e.EMBEDDING_PROVIDER === 'openai' && !e.EMBEDDING_API_KEY) {
      throw new ConfigurationError('Configuration validation failed', [
        'EMBEDDING_API_KEY: required when EMBEDDING_PROVIDER=openai',
      ]);
    }

    if (e.RETRY_MAX_DELAY_MS < e.RETRY_BASE_DELAY_MS) {
      throw new ConfigurationError('Configuration validation failed', [
        'RETRY_MAX_DELAY_MS: must be greater than or equal to RETRY_BASE_DELAY_MS',
      ]);
    }

    const config: AppConfig = {
      backend: {
        provider: e.VECTOR_DB_PROVIDER,
        handle: {
          connection: e.VECTOR_DB_URL
            ? { kind: 'remote', url: e.VECTOR_DB_URL, apiKey: e.VECTOR_DB_API_KEY }
            : { kind: 'local', host: e.VECTOR_DB_HOST, port: e.VECTOR_DB_PORT, https: e.VECTOR_DB_HTTPS },
          collectionName: e.COLLECTION_NAME,
          // The collection must hold vectors of the embedder's size unless told otherwise
          expectedVectorSize: e.VECTOR_SIZE ?? embeddingDimensions,
          distanceMetric: e.DISTANCE_METRIC,
          vectorName: e.VECTOR_NAME ?? null,
          sparseVectorName: e.SPARSE_VECTOR_NAME,
          documentIdField: e.DOCUMENT_ID_FIELD,
        },
      },
      embedding: {
        provider: e.EMBEDDING_PROVIDER,
        apiUrl: e.EMBEDDING_API_URL ?? embeddingDefaults.apiUrl,
        apiKey: e.EMBEDDING_API_KEY ?? '',
        model: embeddingModel,
        dimensions: embeddingDimensions,
        timeoutMs: e.EMBEDDING_TIMEOUT_MS,
      },
      run: {
        maxAllowedRank: e.MAX_ALLOWED_RANK,
        minScoreThreshold: e.MIN_SCORE_THRESHOLD,
        topK: e.SEARCH_TOP_K,
        searchMode: e.SEARCH_MODE,
        testTimeoutSeconds: e.TEST_TIMEOUT_SECONDS,
        runTimeoutSeconds: e.RUN_TIMEOUT_SECONDS,
        concurrency: e.CONCURRENCY,
        reportFormats: parseReportFormats(e.REPORT_FORMATS),
        reportDir: e.REPORT_DIR,
        reportRetentionDays: e.REPORT_RETENTION_DAYS,
      },
      retry: {
        maxRetries: e.MAX_RETRIES,
        baseDelayMs: e.RETRY_BASE_DELAY_MS,
        maxDelayMs: e.RETRY_MAX_DELAY_MS,
      },
      failureMonitor: {
        threshold: e.FAILURE_THRESHOLD,
        windowMs: e.FAILURE_WINDOW_SECONDS * 1000,
      },
      testsFile: e.TESTS_FILE,
      logging: {
        debug: e.DEBUG_VALIDATOR,
      },
    };

    return deepFreeze(config);
  }

  /**
   * Tests file location alone, for commands that never reach a backend.
   */
  testsFileFromEnv(env: Record<string, string | undefined>): string {
    const value = env.TESTS_FILE?.trim();
    return value ? value : DEFAULT_TESTS_FILE;
  }

  /**
   * Apply CLI overrides to the run section, re-checking the same bounds.
   */
  withRunOverrides(config: AppConfig, overrides: Partial<RunConfig>): AppConfig {
    const run: RunConfig = { ...config.run };
    for (const [key, value] of Object.entries(overrides)) {
      if (value !== undefined) Object.assign(run, { [key]: value });
    }

    const issues: string[] = [];
    if (!Number.isInteger(run.concurrency) || run.concurrency < 1) issues.push('concurrency: must be a positive integer');
    for (const key of ['testTimeoutSeconds', 'runTimeoutSeconds'] as const) {
      if (!(run[key] > 0 && run[key] <= MAX_TIMEOUT_SECONDS)) {
        issues.push(`${key}: must be positive and at most ${MAX_TIMEOUT_SECONDS}`);
      }
    }
    if (run.reportFormats.length === 0) issues.push('reportFormats: at least one format is required');
    if (issues.length > 0) {
      throw new ConfigurationError('Invalid run options', issues);
    }

    return deepFreeze({ ...config, run });
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

// Export singleton instance
export const configService = new ConfigService();

// Also export the class for testing purposes
export { ConfigService };
