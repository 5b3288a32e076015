import type { CaseResult, ErrorKind } from '@/lib/core/types';
import { BackendUnavailableError } from '@/lib/utils/errors';
import type { FailureMonitorConfig } from '../config';

const INFRASTRUCTURE_KINDS: ReadonlySet<ErrorKind> = new Set(['timeout', 'connection', 'transient']);

/**
 * Escalates a sustained string of infrastructure failures across cases to
 * BackendUnavailable. Any other result breaks the streak.
 */
export class BackendFailureMonitor {
  private streak: number[] = [];

  constructor(
    private config: FailureMonitorConfig,
    private now: () => number = Date.now
  ) {}

  /**
   * @returns the error to abort the run with, or null to keep going
   */
  record(result: CaseResult): BackendUnavailableError | null {
    if (result.outcome !== 'Error' || result.errorKind === null || !INFRASTRUCTURE_KINDS.has(result.errorKind)) {
      this.streak = [];
      return null;
    }

    const at = this.now();
    this.streak = [...this.streak.filter((t) => at - t <= this.config.windowMs), at];

    if (this.streak.length >= this.config.threshold) {
      return new BackendUnavailableError(
        `${this.streak.length} consecutive cases failed on infrastructure errors within ` +
          `${this.config.windowMs / 1000}s (last: ${result.errorDetail ?? result.errorKind})`
      );
    }
    return null;
  }

  get consecutiveFailures(): number {
    return this.streak.length;
  }
}
