import type { Clock } from './clock';
import { PipelineConfigError } from './errors';

export interface RateGovernorOptions {
  minDelayMs: number;
  maxDelayMs: number;
  clock: Clock;
  random?: () => number;
}

/**
 * Spaces requests per scope ("global", "proxy:<key>") by a uniformly
 * random delay in [minDelayMs, maxDelayMs].
 *
 * Each turn reserves the scope's next slot before waiting, so concurrent
 * callers are handed distinct, serialized slots.
 */
export class RateGovernor {
  private readonly nextAllowedAt = new Map<string, number>();
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly clock: Clock;
  private readonly random: () => number;

  constructor(options: RateGovernorOptions) {
    const issues: string[] = [];
    if (options.minDelayMs < 0) {
      issues.push('minDelayMs: must not be negative');
    }
    if (options.maxDelayMs < options.minDelayMs) {
      issues.push('minDelayMs: must not exceed maxDelayMs');
    }
    if (issues.length > 0) {
      throw new PipelineConfigError(issues);
    }

    this.minDelayMs = options.minDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.clock = options.clock;
    this.random = options.random ?? Math.random;
  }

  /**
   * Wait until a request against `scope` is allowed.
   * Resolves early when `signal` aborts; never rejects.
   */
  async awaitTurn(scope: string, signal?: AbortSignal): Promise<void> {
    const waitMs = this.reserve(scope);
    if (waitMs > 0) {
      await this.clock.sleep(waitMs, signal);
    }
  }

  /**
   * Milliseconds until the scope's next free slot, without reserving it.
   */
  pendingDelay(scope: string): number {
    const next = this.nextAllowedAt.get(scope);
    return next === undefined ? 0 : Math.max(0, next - this.clock.now());
  }

  private reserve(scope: string): number {
    const now = this.clock.now();
    const slot = Math.max(now, this.nextAllowedAt.get(scope) ?? now);
    this.nextAllowedAt.set(scope, slot + this.nextDelay());
    return slot - now;
  }

  private nextDelay(): number {
    return this.minDelayMs + this.random() * (this.maxDelayMs - this.minDelayMs);
  }
}
