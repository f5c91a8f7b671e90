import { backoffBase, decide, type RetryPolicyConfig } from './retry-policy';
import type { FetchHardFailure, FetchSoftFailure } from './types';

function softFailure(overrides: Partial<FetchSoftFailure> = {}): FetchSoftFailure {
  return {
    kind: 'soft_failure',
    status: 429,
    reason: 'throttled',
    errorCode: 'BLOCK_RATE_LIMIT_429',
    blocking: true,
    elapsedMs: 40,
    ...overrides,
  };
}

function hardFailure(overrides: Partial<FetchHardFailure> = {}): FetchHardFailure {
  return {
    kind: 'hard_failure',
    status: 404,
    reason: 'client_error',
    errorCode: 'FETCH_HTTP_4XX',
    elapsedMs: 40,
    ...overrides,
  };
}

describe('backoffBase', () => {
  const config: RetryPolicyConfig = { baseDelayMs: 1_000, maxDelayMs: 5_000 };

  it('should double per attempt up to the cap', () => {
    expect([1, 2, 3, 4, 5].map(attempt => backoffBase(attempt, config))).toEqual([1_000, 2_000, 4_000, 5_000, 5_000]);
  });
});

describe('decide', () => {
  const config = (random: number): RetryPolicyConfig => ({
    baseDelayMs: 1_000,
    maxDelayMs: 60_000,
    random: () => random,
  });

  it('should retry a soft failure after the exponential delay', () => {
    expect(decide(softFailure(), 1, 3, config(0))).toEqual({ kind: 'retry', delayMs: 1_000, withNewProxy: true });
  });

  it('should add up to half the exponential delay as jitter', () => {
    expect(decide(softFailure(), 2, 5, config(0.5))).toEqual({ kind: 'retry', delayMs: 2_500, withNewProxy: true });
  });

  it('should keep every delay within [E, 1.5E)', () => {
    const cfg: RetryPolicyConfig = { baseDelayMs: 500, maxDelayMs: 8_000 };

    for (let attempt = 1; attempt < 8; attempt++) {
      for (const random of [0, 0.3, 0.999]) {
        const decision = decide(softFailure(), attempt, 10, { ...cfg, random: () => random });
        const exponential = Math.min(8_000, 500 * 2 ** (attempt - 1));

        expect(decision.kind).toBe('retry');
        if (decision.kind === 'retry') {
          expect(decision.delayMs).toBeGreaterThanOrEqual(exponential);
          expect(decision.delayMs).toBeLessThan(exponential * 1.5);
        }
      }
    }
  });

  it('should give up once the attempt ceiling is reached', () => {
    expect(decide(softFailure(), 3, 3, config(0))).toEqual({
      kind: 'give_up',
      reason: 'retries exhausted after 3 attempts, last: BLOCK_RATE_LIMIT_429',
      errorCode: 'RETRY_EXHAUSTED',
    });
  });

  it('should give up at once on hard failures', () => {
    expect(decide(hardFailure(), 1, 3, config(0))).toEqual({
      kind: 'give_up',
      reason: 'client_error (HTTP 404)',
      errorCode: 'FETCH_HTTP_4XX',
    });
    expect(decide(hardFailure({ status: null, reason: 'transport_error', errorCode: 'FETCH_DNS' }), 1, 3, config(0))).toEqual({
      kind: 'give_up',
      reason: 'transport_error',
      errorCode: 'FETCH_DNS',
    });
  });

  it('should wait at least as long as Retry-After, up to the cap', () => {
    const longer = decide(softFailure({ retryAfterMs: 10_000 }), 1, 3, config(0));
    const capped = decide(softFailure({ retryAfterMs: 120_000 }), 1, 3, config(0));
    const shorter = decide(softFailure({ retryAfterMs: 100 }), 1, 3, config(0));

    expect(longer).toEqual({ kind: 'retry', delayMs: 10_000, withNewProxy: true });
    expect(capped).toEqual({ kind: 'retry', delayMs: 60_000, withNewProxy: true });
    expect(shorter).toEqual({ kind: 'retry', delayMs: 1_000, withNewProxy: true });
  });

  it('should rotate the proxy after blocks and transport errors only', () => {
    const unavailable = softFailure({ status: 503, reason: 'unavailable', errorCode: 'FETCH_HTTP_5XX', blocking: false });
    const transport = softFailure({ status: null, reason: 'transport_error', errorCode: 'FETCH_TIMEOUT', blocking: false });

    expect(decide(unavailable, 1, 3, config(0))).toEqual({ kind: 'retry', delayMs: 1_000, withNewProxy: false });
    expect(decide(transport, 1, 3, config(0))).toEqual({ kind: 'retry', delayMs: 1_000, withNewProxy: true });
  });
});
