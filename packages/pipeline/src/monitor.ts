import { createLogger, type PipelineLogger } from '@trawl/extractor';

const WINDOW_SIZE = 100;
const MIN_SAMPLES = 10;
const SUCCESS_RATE_THRESHOLD = 0.8;
const SLOW_RESPONSE_MS = 5000;

export interface FetchHealth {
  samples: number;
  successRate: number;
  averageElapsedMs: number;
  maxElapsedMs: number;
  degraded: boolean;
}

interface Sample {
  elapsedMs: number;
  ok: boolean;
}

/**
 * Sliding window over recent attempts. Logs when the window crosses into
 * or out of a degraded state (low success rate or slow responses).
 * Observational only: nothing here feeds back into classification.
 */
export class FetchMonitor {
  private readonly samples: Sample[] = [];
  private degraded = false;

  constructor(private readonly logger: PipelineLogger = createLogger('[Monitor]')) {}

  record(elapsedMs: number, ok: boolean): void {
    this.samples.push({ elapsedMs, ok });
    if (this.samples.length > WINDOW_SIZE) {
      this.samples.shift();
    }
    this.checkThresholds();
  }

  health(): FetchHealth {
    const count = this.samples.length;
    if (count === 0) {
      return { samples: 0, successRate: 1, averageElapsedMs: 0, maxElapsedMs: 0, degraded: false };
    }

    const successes = this.samples.filter(sample => sample.ok).length;
    const totalElapsed = this.samples.reduce((sum, sample) => sum + sample.elapsedMs, 0);

    return {
      samples: count,
      successRate: successes / count,
      averageElapsedMs: totalElapsed / count,
      maxElapsedMs: Math.max(...this.samples.map(sample => sample.elapsedMs)),
      degraded: this.degraded,
    };
  }

  private checkThresholds(): void {
    if (this.samples.length < MIN_SAMPLES) {
      return;
    }

    const { successRate, averageElapsedMs } = this.health();
    const degraded = successRate < SUCCESS_RATE_THRESHOLD || averageElapsedMs > SLOW_RESPONSE_MS;

    if (degraded && !this.degraded) {
      this.logger.warn('Fetch health degraded', {
        successRate: Number(successRate.toFixed(2)),
        averageElapsedMs: Math.round(averageElapsedMs),
      });
    } else if (!degraded && this.degraded) {
      this.logger.info('Fetch health recovered', { successRate: Number(successRate.toFixed(2)) });
    }
    this.degraded = degraded;
  }
}
