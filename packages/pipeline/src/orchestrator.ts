import { getErrorMessage, type ErrorCode, type PageCursor, type ProxyEndpoint, type ValidatedRecord } from '@trawl/shared';
import { createLogger, type PageExtraction, type PipelineLogger, type Transport } from '@trawl/extractor';
import { systemClock, type Clock } from './clock';
import { validatePipelineConfig, type PipelineConfig, type PipelineConfigInput } from './config';
import { PipelineConfigError } from './errors';
import { FetchExecutor } from './fetch-executor';
import { mergeBounded } from './merge';
import { FetchMonitor, type FetchHealth } from './monitor';
import { fetchPage, type PageFetchContext } from './page-fetcher';
import { PaginationController } from './pagination';
import { ProxyPool, parseProxyString, type ProxyPoolStats } from './proxy-pool';
import { RateGovernor } from './rate-governor';
import { RunSummaryRecorder, type RunSummary } from './summary';
import type { FetchSuccess, ScrapeTarget } from './types';
import { RecordValidator, RunDeduplicator } from './validator';

export interface PipelineDependencies {
  transport: Transport;
  clock?: Clock;
  /** Uniform [0, 1) source for delays, jitter and user-agent rotation */
  random?: () => number;
  logger?: PipelineLogger;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface RunHealth {
  fetch: FetchHealth;
  proxies: ProxyPoolStats;
}

export interface RunResult {
  records: ValidatedRecord[];
  summary: RunSummary;
}

const NO_RECORDS: PageExtraction = {
  records: [],
  hasNextPage: false,
  endOfResults: false,
  nextToken: null,
  parseFailed: true,
};

export class Pipeline {
  readonly config: PipelineConfig;
  private readonly proxies: ProxyEndpoint[];

  constructor(
    config: PipelineConfigInput,
    private readonly deps: PipelineDependencies,
  ) {
    this.config = validatePipelineConfig(config);
    this.proxies = this.config.proxyList.flatMap(entry => {
      const endpoint = parseProxyString(entry);
      return endpoint ? [endpoint] : [];
    });
  }

  /**
   * Prepare a run over `targets`. Nothing is fetched until the run is iterated.
   */
  run(targets: ScrapeTarget[], options: RunOptions = {}): PipelineRun {
    const seen = new Set<string>();
    const issues: string[] = [];
    for (const target of targets) {
      if (seen.has(target.id)) {
        issues.push(`targets: duplicate id "${target.id}"`);
      }
      seen.add(target.id);
    }
    if (issues.length > 0) {
      throw new PipelineConfigError(issues);
    }

    return new PipelineRun(targets, this.config, this.proxies, this.deps, options.signal);
  }
}

/**
 * One execution of the pipeline: a lazy, single-use stream of validated records
 * plus the run's summary and health.
 */
export class PipelineRun implements AsyncIterable<ValidatedRecord> {
  private readonly clock: Clock;
  private readonly logger: PipelineLogger;
  private readonly recorder: RunSummaryRecorder;
  private readonly monitor: FetchMonitor;
  private readonly pool: ProxyPool;
  private readonly governor: RateGovernor;
  private readonly executor: FetchExecutor;
  private readonly dedupe = new RunDeduplicator();
  private readonly validators: Map<string, RecordValidator>;
  private started = false;
  private finalSummary: RunSummary | null = null;

  constructor(
    private readonly targets: ScrapeTarget[],
    private readonly config: PipelineConfig,
    proxies: ProxyEndpoint[],
    private readonly deps: PipelineDependencies,
    private readonly signal?: AbortSignal,
  ) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('[Pipeline]');
    this.recorder = new RunSummaryRecorder(this.clock);
    this.monitor = new FetchMonitor();
    this.pool = new ProxyPool(proxies, {
      cooldownBaseMs: config.cooldownBaseMs,
      cooldownCapMs: config.cooldownCapMs,
      clock: this.clock,
    });
    this.governor = new RateGovernor({
      minDelayMs: config.minDelayMs,
      maxDelayMs: config.maxDelayMs,
      clock: this.clock,
      random: deps.random,
    });
    this.executor = new FetchExecutor({
      transport: deps.transport,
      clock: this.clock,
      hardFailureThreshold: config.hardFailureThreshold,
      monitor: this.monitor,
    });
    this.validators = new Map(targets.map(target => [target.id, new RecordValidator(target.schema)]));
  }

  /** Final summary; null until the run has ended */
  get summary(): RunSummary | null {
    return this.finalSummary;
  }

  /** Partial summary at any point of the run */
  snapshot(): RunSummary {
    return this.finalSummary ?? this.recorder.snapshot();
  }

  health(): RunHealth {
    return { fetch: this.monitor.health(), proxies: this.pool.stats() };
  }

  async collect(): Promise<RunResult> {
    const records: ValidatedRecord[] = [];
    for await (const record of this) {
      records.push(record);
    }
    return { records, summary: this.finalSummary ?? this.recorder.finish() };
  }

  [Symbol.asyncIterator](): AsyncIterator<ValidatedRecord> {
    if (this.started) {
      throw new Error('A pipeline run can only be iterated once');
    }
    this.started = true;
    return this.execute();
  }

  private async *execute(): AsyncGenerator<ValidatedRecord, void, undefined> {
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    if (this.signal?.aborted) {
      controller.abort();
    } else {
      this.signal?.addEventListener('abort', forwardAbort, { once: true });
    }
    const signal = controller.signal;

    this.logger.info('Run started', {
      targets: this.targets.length,
      concurrency: this.config.concurrency,
      proxies: this.pool.size,
    });

    const context: PageFetchContext = {
      pool: this.pool,
      governor: this.governor,
      executor: this.executor,
      summary: this.recorder,
      clock: this.clock,
      random: this.deps.random ?? Math.random,
      logger: this.logger,
      config: this.config,
    };

    const merged = mergeBounded(
      this.targets.map(target => () => this.crawlTarget(target, context, signal)),
      this.config.concurrency,
    );

    try {
      for (;;) {
        const next = await merged.next();
        if (next.done || signal.aborted) {
          break;
        }
        this.recorder.increment('records');
        yield next.value;
      }
    } finally {
      controller.abort();
      this.signal?.removeEventListener('abort', forwardAbort);
      await merged.return(undefined);

      const stopped = this.recorder.snapshot().stopReasons;
      for (const target of this.targets) {
        if (stopped[target.id] === undefined) {
          this.recorder.stop(target.id, 'cancelled');
        }
      }

      this.finalSummary = this.recorder.finish();
      if (this.finalSummary.failures.cancelled > 0) {
        this.logger.info(getErrorMessage('RUN_CANCELLED'), { targets: this.finalSummary.failures.cancelled });
      }
      this.logger.info('Run finished', { ...this.finalSummary });
    }
  }

  private async *crawlTarget(
    target: ScrapeTarget,
    context: PageFetchContext,
    signal: AbortSignal,
  ): AsyncGenerator<ValidatedRecord, void, undefined> {
    const pagination = new PaginationController({
      maxPages: this.config.maxPages,
      maxRecords: this.config.maxRecords,
      maxConsecutivePageFailures: this.config.maxConsecutivePageFailures,
    });
    const validator = this.validators.get(target.id) ?? new RecordValidator(target.schema);
    pagination.start(target.startPosition);

    try {
      while (!pagination.done) {
        if (signal.aborted) {
          pagination.cancel();
          break;
        }

        const cursor = pagination.cursor;
        const url = target.buildUrl(cursor.position);
        const result = await fetchPage(
          {
            targetId: target.id,
            url,
            method: target.method ?? 'GET',
            headers: target.headers,
            body: target.body,
            expectedShape: target.expectedShape ?? 'html',
          },
          context,
          signal,
        );

        if (result.kind === 'cancelled') {
          pagination.cancel();
          break;
        }

        if (result.kind === 'failed') {
          this.recorder.increment('pagesFailed');
          const state = pagination.failPage({ skippable: result.exhaustedPool });
          if (state.kind === 'fetching_page') {
            this.recorder.increment('pagesSkipped');
            this.logger.warn(`Skipping page ${cursor.position.page} of ${target.id}`, { errorCode: result.errorCode });
          } else {
            this.logger.warn(`Stopping ${target.id} at page ${cursor.position.page}`, {
              errorCode: result.errorCode,
              reason: result.reason,
            });
          }
          continue;
        }

        this.recorder.increment('pages');
        const extraction = this.extractPage(target, url, result.response, cursor);
        const extracted = extraction.records.length;
        this.recorder.increment('recordsExtracted', extracted);

        if (extracted === 0 && !extraction.endOfResults) {
          const errorCode: ErrorCode = extraction.parseFailed ? 'EXTRACT_PARSE_ERROR' : 'EXTRACT_NO_RECORDS';
          this.recorder.increment('driftPages');
          this.recorder.recordFailure(errorCode);
          this.logger.warn(`No records on ${url}`, { targetId: target.id, errorCode });
        }

        const remaining = pagination.remainingRecords();
        let emitted = 0;

        for (const raw of extraction.records) {
          this.recorder.increment('fieldFallbacks', raw.fallbacks.length);

          const validation = validator.validate(raw);
          if (!validation.ok) {
            this.recorder.increment('recordsRejected');
            this.logger.debug(`Rejected record: ${validation.reason}`, { targetId: target.id, errorCode: validation.errorCode });
            continue;
          }
          if (emitted >= remaining) {
            this.recorder.increment('recordsTruncated');
            continue;
          }
          if (!this.dedupe.admit(validation.record)) {
            this.recorder.increment('recordsDeduplicated');
            continue;
          }
          if (signal.aborted) {
            break;
          }

          emitted++;
          yield validation.record;
        }

        if (signal.aborted) {
          pagination.cancel();
          break;
        }

        const state = pagination.completePage({
          extracted,
          emitted,
          hasNextPage: extraction.hasNextPage,
          endOfResults: extraction.endOfResults,
          nextToken: extraction.nextToken,
        });
        if (state.kind === 'has_more') {
          pagination.advance();
        }
      }
    } finally {
      pagination.cancel();
      const state = pagination.state;
      this.recorder.stop(target.id, state.kind === 'stopped' ? state.reason : 'exhausted');
    }
  }

  private extractPage(target: ScrapeTarget, url: string, response: FetchSuccess, cursor: PageCursor): PageExtraction {
    try {
      return target.extractor.extract(
        { url: response.finalUrl || url, body: response.body, contentType: response.contentType },
        { targetId: target.id, cursor },
      );
    } catch (error) {
      this.logger.error(`Extractor failed on ${url}`, error, { targetId: target.id, errorCode: 'EXTRACT_FAILED' });
      return NO_RECORDS;
    }
  }
}
