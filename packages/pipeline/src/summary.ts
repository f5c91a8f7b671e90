import { getFailureClass, type ErrorCode, type FailureClass } from '@trawl/shared';
import type { Clock } from './clock';
import type { FetchOutcome, StopReason } from './types';

export interface RunSummary {
  attempts: number;
  successes: number;
  softFailures: number;
  hardFailures: number;
  /** Pages fetched and handed to an extractor */
  pages: number;
  /** Pages whose retries gave up */
  pagesFailed: number;
  /** Failed pages the cursor moved past */
  pagesSkipped: number;
  /** Records yielded to the caller */
  records: number;
  recordsExtracted: number;
  recordsDeduplicated: number;
  recordsRejected: number;
  /** Dropped because the record cap was reached mid-page */
  recordsTruncated: number;
  /** Fetched pages that yielded no recognizable records */
  driftPages: number;
  /** Field values that needed a fallback strategy */
  fieldFallbacks: number;
  poolExhaustions: number;
  /** Failed attempts, pool exhaustions, drift pages and cancelled targets by failure class */
  failures: Record<FailureClass, number>;
  stopReasons: Record<string, StopReason>;
  startedAt: number;
  finishedAt: number | null;
}

type Counter = Exclude<keyof RunSummary, 'failures' | 'stopReasons' | 'startedAt' | 'finishedAt'>;

/**
 * Incrementally updated run statistics. Counters only grow.
 */
export class RunSummaryRecorder {
  private readonly state: RunSummary;

  constructor(private readonly clock: Clock) {
    this.state = {
      attempts: 0,
      successes: 0,
      softFailures: 0,
      hardFailures: 0,
      pages: 0,
      pagesFailed: 0,
      pagesSkipped: 0,
      records: 0,
      recordsExtracted: 0,
      recordsDeduplicated: 0,
      recordsRejected: 0,
      recordsTruncated: 0,
      driftPages: 0,
      fieldFallbacks: 0,
      poolExhaustions: 0,
      failures: {
        transient_blocked: 0,
        transient_unavailable: 0,
        permanent: 0,
        extraction_drift: 0,
        cancelled: 0,
      },
      stopReasons: {},
      startedAt: clock.now(),
      finishedAt: null,
    };
  }

  increment(counter: Counter, by = 1): void {
    if (by > 0) {
      this.state[counter] += by;
    }
  }

  recordAttempt(outcome: FetchOutcome): void {
    this.state.attempts++;
    switch (outcome.kind) {
      case 'success':
        this.state.successes++;
        break;
      case 'soft_failure':
        this.state.softFailures++;
        this.recordFailure(outcome.errorCode);
        break;
      case 'hard_failure':
        this.state.hardFailures++;
        this.recordFailure(outcome.errorCode);
        break;
    }
  }

  recordFailure(errorCode: ErrorCode): void {
    this.state.failures[getFailureClass(errorCode)]++;
  }

  /** First stop reason per target wins */
  stop(targetId: string, reason: StopReason): void {
    if (this.state.stopReasons[targetId] !== undefined) {
      return;
    }
    this.state.stopReasons[targetId] = reason;
    if (reason === 'cancelled') {
      this.recordFailure('RUN_CANCELLED');
    }
  }

  finish(): RunSummary {
    if (this.state.finishedAt === null) {
      this.state.finishedAt = this.clock.now();
    }
    return this.snapshot();
  }

  snapshot(): RunSummary {
    return Object.freeze({
      ...this.state,
      failures: Object.freeze({ ...this.state.failures }),
      stopReasons: Object.freeze({ ...this.state.stopReasons }),
    });
  }
}
