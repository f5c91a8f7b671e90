import { getErrorInfo, type ContentShape, type ErrorCode, type HttpMethod } from '@trawl/shared';
import { USER_AGENTS, buildBrowserHeaders, getRandomUserAgent, type PipelineLogger } from '@trawl/extractor';
import type { Clock } from './clock';
import type { PipelineConfig } from './config';
import type { FetchExecutor } from './fetch-executor';
import type { ProxyPool } from './proxy-pool';
import type { RateGovernor } from './rate-governor';
import { decide } from './retry-policy';
import type { RunSummaryRecorder } from './summary';
import type { FetchRequest, FetchSuccess } from './types';

export interface PageFetchContext {
  pool: ProxyPool;
  governor: RateGovernor;
  executor: FetchExecutor;
  summary: RunSummaryRecorder;
  clock: Clock;
  random: () => number;
  logger: PipelineLogger;
  config: Pick<
    PipelineConfig,
    'maxAttempts' | 'retryBaseDelayMs' | 'retryMaxDelayMs' | 'requestTimeoutMs' | 'rotateUserAgent'
  >;
}

export interface PageRequest {
  targetId: string;
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: string;
  expectedShape: ContentShape;
}

export type PageFetchResult =
  | { kind: 'fetched'; response: FetchSuccess; attempts: number }
  | { kind: 'failed'; errorCode: ErrorCode; reason: string; attempts: number; exhaustedPool: boolean }
  | { kind: 'cancelled'; attempts: number };

/**
 * Fetch one page, retrying per the retry policy.
 *
 * Each attempt: proxy → rate governor turns (global, then the proxy's own)
 * → one executor call → pool report → retry decision → backoff.
 * A proxy that entered cooldown during the turns is swapped before the call.
 * Cancellation is checked before and after every wait.
 */
export async function fetchPage(
  page: PageRequest,
  context: PageFetchContext,
  signal?: AbortSignal,
): Promise<PageFetchResult> {
  const { pool, governor, executor, summary, clock, config, logger } = context;
  let attempt = 0;
  let avoidKey: string | null = null;

  for (;;) {
    if (signal?.aborted) {
      return { kind: 'cancelled', attempts: attempt };
    }

    const acquisition = pool.acquire(avoidKey);
    if (acquisition.kind === 'exhausted') {
      summary.increment('poolExhaustions');
      summary.recordFailure('PROXY_POOL_EXHAUSTED');
      return {
        kind: 'failed',
        errorCode: 'PROXY_POOL_EXHAUSTED',
        reason: `every proxy is cooling down (next in ${acquisition.retryAfterMs}ms)`,
        attempts: attempt,
        exhaustedPool: true,
      };
    }
    const identity = acquisition.kind === 'proxy' ? acquisition.identity : null;

    await governor.awaitTurn('global', signal);
    if (identity) {
      await governor.awaitTurn(`proxy:${identity.key}`, signal);
    }
    if (signal?.aborted) {
      return { kind: 'cancelled', attempts: attempt };
    }
    // another request may have cooled the proxy down while this one waited its turn
    if (identity && pool.isCoolingDown(identity.key)) {
      logger.debug(`Proxy ${identity.key} cooled down before its turn, reacquiring`, { targetId: page.targetId });
      avoidKey = identity.key;
      continue;
    }

    attempt++;
    const userAgent = config.rotateUserAgent ? getRandomUserAgent(context.random) : USER_AGENTS[0];
    const request: FetchRequest = Object.freeze({
      url: page.url,
      method: page.method,
      headers: Object.freeze({ ...buildBrowserHeaders(userAgent), ...page.headers }),
      body: page.body,
      proxy: identity ? identity.endpoint : null,
      proxyKey: identity ? identity.key : null,
      attempt,
      timeoutMs: config.requestTimeoutMs,
      expectedShape: page.expectedShape,
    });

    const outcome = await executor.execute(request, signal);
    if (identity) {
      pool.report(identity.key, outcome);
    }
    summary.recordAttempt(outcome);

    if (outcome.kind === 'success') {
      return { kind: 'fetched', response: outcome, attempts: attempt };
    }
    if (signal?.aborted) {
      return { kind: 'cancelled', attempts: attempt };
    }

    const decision = decide(outcome, attempt, config.maxAttempts, {
      baseDelayMs: config.retryBaseDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
      random: context.random,
    });

    if (decision.kind === 'give_up') {
      logger.warn(`Giving up on ${page.url}: ${decision.reason}`, {
        targetId: page.targetId,
        errorCode: decision.errorCode,
        attempts: attempt,
        recommendation: getErrorInfo(decision.errorCode)?.recommendation,
      });
      return { kind: 'failed', errorCode: decision.errorCode, reason: decision.reason, attempts: attempt, exhaustedPool: false };
    }

    logger.debug(`Retrying ${page.url} in ${Math.round(decision.delayMs)}ms`, {
      targetId: page.targetId,
      errorCode: outcome.errorCode,
      attempt,
      withNewProxy: decision.withNewProxy,
    });
    avoidKey = decision.withNewProxy && identity ? identity.key : null;
    await clock.sleep(decision.delayMs, signal);
  }
}
