import type { FetchFailure, RetryDecision } from './types';

export interface RetryPolicyConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Uniform [0, 1) source for jitter */
  random?: () => number;
}

/**
 * Exponential component of the backoff before attempt `attempt + 1`.
 */
export function backoffBase(attempt: number, config: RetryPolicyConfig): number {
  return Math.min(config.maxDelayMs, config.baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Decide what to do after a failed attempt (1-based).
 *
 * Hard failures and the attempt ceiling give up. Soft failures back off by
 * E + jitter with E = min(max, base * 2^(attempt - 1)) and jitter in [0, E/2),
 * raised by a Retry-After hint up to the cap.
 */
export function decide(
  outcome: FetchFailure,
  attempt: number,
  maxAttempts: number,
  config: RetryPolicyConfig,
): RetryDecision {
  if (outcome.kind === 'hard_failure') {
    return {
      kind: 'give_up',
      reason: `${outcome.reason}${outcome.status === null ? '' : ` (HTTP ${outcome.status})`}`,
      errorCode: outcome.errorCode,
    };
  }

  if (attempt >= maxAttempts) {
    return {
      kind: 'give_up',
      reason: `retries exhausted after ${attempt} attempts, last: ${outcome.errorCode}`,
      errorCode: 'RETRY_EXHAUSTED',
    };
  }

  const random = config.random ?? Math.random;
  const exponential = backoffBase(attempt, config);
  let delayMs = exponential + random() * (exponential / 2);

  if (outcome.retryAfterMs !== undefined) {
    delayMs = Math.max(delayMs, Math.min(config.maxDelayMs, outcome.retryAfterMs));
  }

  return {
    kind: 'retry',
    delayMs,
    withNewProxy: outcome.blocking || outcome.reason === 'transport_error',
  };
}
