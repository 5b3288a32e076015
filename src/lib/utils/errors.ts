import type { ErrorKind } from '@/lib/core/types';

/**
 * Base application error class.
 * Extends Error with an error code and a retryable flag.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: { cause?: unknown; retryable?: boolean }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'AppError';
    this.code = code;
    this.retryable = options?.retryable ?? false;
  }
}

/**
 * Configuration error.
 * Bad or missing connection settings or test case data. Raised before a run starts.
 */
export class ConfigurationError extends AppError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], code: string = 'CONFIGURATION_ERROR') {
    super(issues.length > 0 ? `${message}:\n${issues.map((i) => `  - ${i}`).join('\n')}` : message, code);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Two test cases share an id.
 */
export class DuplicateTestCaseError extends ConfigurationError {
  constructor(public readonly testCaseId: string) {
    super(`Duplicate test case id: ${testCaseId}`, [], 'DUPLICATE_TEST_CASE');
    this.name = 'DuplicateTestCaseError';
  }
}

/**
 * Search backend unreachable or rejecting credentials after retries,
 * or failing across many cases in a short window. Aborts the run.
 */
export class BackendUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'BACKEND_UNAVAILABLE', { cause });
    this.name = 'BackendUnavailableError';
  }
}

/**
 * Embedding size disagrees with the collection's vector size.
 */
export class DimensionMismatchError extends AppError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    source: string
  ) {
    super(`Vector size mismatch: ${source} has ${actual} dimensions, expected ${expected}`, 'DIMENSION_MISMATCH');
    this.name = 'DimensionMismatchError';
  }
}

export type ServiceErrorKind = Extract<ErrorKind, 'connection' | 'auth' | 'transient' | 'permanent'>;

/**
 * External service error.
 * Use when the embedding provider or the search backend call fails.
 */
export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly kind: ServiceErrorKind;
  public readonly status?: number;

  constructor(
    service: string,
    message: string,
    options: { kind: ServiceErrorKind; status?: number; cause?: unknown }
  ) {
    super(`${service}: ${message}`, 'EXTERNAL_SERVICE_ERROR', {
      cause: options.cause,
      retryable: options.kind !== 'permanent',
    });
    this.name = 'ExternalServiceError';
    this.service = service;
    this.kind = options.kind;
    this.status = options.status;
  }
}

export type DeadlineScope = 'case' | 'run' | 'preflight';

const DEADLINE_MESSAGES: Record<DeadlineScope, (seconds: number) => string> = {
  case: (s) => `Case timeout of ${s}s exceeded`,
  run: (s) => `Run timeout of ${s}s elapsed`,
  preflight: (s) => `Pre-flight timeout of ${s}s exceeded`,
};

/**
 * A case, run or pre-flight deadline elapsed while work was still in flight.
 */
export class DeadlineExceededError extends AppError {
  constructor(
    public readonly scope: DeadlineScope,
    public readonly timeoutMs: number
  ) {
    super(DEADLINE_MESSAGES[scope](timeoutMs / 1000), 'DEADLINE_EXCEEDED');
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Errors that abort the whole run instead of a single case.
 */
export function isFatalError(error: unknown): boolean {
  return (
    error instanceof ConfigurationError ||
    error instanceof BackendUnavailableError ||
    error instanceof DimensionMismatchError
  );
}

/**
 * Map an error to the kind recorded on an Error case result.
 */
export function classifyErrorKind(error: unknown): ErrorKind {
  if (error instanceof DeadlineExceededError) return 'timeout';
  if (error instanceof ExternalServiceError) return error.kind;
  return 'internal';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Render an error for terminal output, including the cause chain.
 */
export function formatError(error: unknown): string {
  if (!(error instanceof Error)) {
    return `Unexpected error: ${String(error)}`;
  }

  const label = error instanceof AppError ? `${error.name} [${error.code}]` : error.name;
  const lines = [`${label}: ${error.message}`];

  let cause: unknown = error.cause;
  while (cause instanceof Error) {
    lines.push(`  caused by ${cause.name}: ${cause.message}`);
    cause = cause.cause;
  }

  return lines.join('\n');
}
