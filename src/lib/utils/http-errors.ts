import axios from 'axios';
import { ExternalServiceError, type ServiceErrorKind } from './errors';
import { abortReason } from './deadline';

const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH', 'ENETUNREACH', 'ECONNRESET']);
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Classify an HTTP status into the kind recorded on the error.
 */
export function kindForStatus(status: number): ServiceErrorKind {
  if (status === 401 || status === 403) return 'auth';
  if (status === 408 || status === 429 || status >= 500) return 'transient';
  return 'permanent';
}

/**
 * Convert an axios (or other) failure into an ExternalServiceError.
 * Aborts caused by a deadline signal pass through untouched so the
 * engine can report them as timeouts.
 */
export function toServiceError(service: string, error: unknown, signal?: AbortSignal): Error {
  if (signal?.aborted) {
    return abortReason(signal);
  }

  if (error instanceof ExternalServiceError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;

    if (status !== undefined) {
      return new ExternalServiceError(service, `HTTP ${status} ${error.response?.statusText ?? ''}`.trim(), {
        kind: kindForStatus(status),
        status,
        cause: error,
      });
    }

    const code = error.code ?? '';
    if (TIMEOUT_CODES.has(code)) {
      return new ExternalServiceError(service, `request timed out (${code})`, { kind: 'transient', cause: error });
    }

    const kind: ServiceErrorKind = CONNECTION_CODES.has(code) || error.request !== undefined ? 'connection' : 'permanent';
    return new ExternalServiceError(service, error.message || code || 'request failed', { kind, cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ExternalServiceError(service, message, { kind: 'permanent', cause: error });
}
