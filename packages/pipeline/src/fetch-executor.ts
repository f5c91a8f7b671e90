import type { ContentShape } from '@trawl/shared';
import {
  TransportError,
  assessBody,
  blockTypeToErrorCode,
  detectBlock,
  hasCloudflareHeaders,
  type Transport,
  type TransportResponse,
} from '@trawl/extractor';
import type { Clock } from './clock';
import type { FetchMonitor } from './monitor';
import type { FetchOutcome, FetchRequest } from './types';

export interface FetchExecutorOptions {
  transport: Transport;
  clock: Clock;
  /** Consecutive transport errors on one identity before they count as hard failures */
  hardFailureThreshold: number;
  monitor?: FetchMonitor;
}

const DIRECT_IDENTITY = 'direct';

function headerValue(headers: Record<string, string>, name: string): string | undefined {
  const match = Object.keys(headers).find(key => key.toLowerCase() === name);
  return match === undefined ? undefined : headers[match];
}

/**
 * Retry-After as delta-seconds or an HTTP date, in milliseconds from `now`.
 */
export function parseRetryAfter(value: string | undefined, now: number): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();

  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const date = Date.parse(trimmed);
  return Number.isFinite(date) ? Math.max(0, date - now) : undefined;
}

/**
 * Classify an HTTP response. Pure: the same response always yields the same outcome.
 */
export function classifyResponse(response: TransportResponse, shape: ContentShape, now: number): FetchOutcome {
  const { status, body, headers, elapsedMs } = response;

  if (status >= 200 && status < 300) {
    const assessment = assessBody(body, shape);
    if (assessment === 'empty') {
      return { kind: 'soft_failure', status, reason: 'empty_body', errorCode: 'FETCH_EMPTY_BODY', blocking: false, elapsedMs };
    }
    if (assessment === 'implausible') {
      return {
        kind: 'soft_failure',
        status,
        reason: 'implausible_body',
        errorCode: 'FETCH_IMPLAUSIBLE_BODY',
        blocking: false,
        elapsedMs,
      };
    }

    const block = detectBlock(status, body, headers, shape);
    if (block.blocked && block.blockType) {
      return {
        kind: 'soft_failure',
        status,
        reason: 'blocked',
        errorCode: blockTypeToErrorCode(block.blockType),
        blocking: true,
        elapsedMs,
      };
    }

    return {
      kind: 'success',
      status,
      body,
      headers,
      contentType: response.contentType,
      finalUrl: response.finalUrl,
      elapsedMs,
    };
  }

  const retryAfterMs = parseRetryAfter(headerValue(headers, 'retry-after'), now);

  if (status === 429) {
    return { kind: 'soft_failure', status, reason: 'throttled', errorCode: 'BLOCK_RATE_LIMIT_429', blocking: true, elapsedMs, retryAfterMs };
  }

  if (status === 403) {
    return { kind: 'soft_failure', status, reason: 'blocked', errorCode: 'BLOCK_FORBIDDEN_403', blocking: true, elapsedMs, retryAfterMs };
  }

  if (status === 503 && hasCloudflareHeaders(headers)) {
    return {
      kind: 'soft_failure',
      status,
      reason: 'blocked',
      errorCode: 'BLOCK_CLOUDFLARE_SUSPECTED',
      blocking: true,
      elapsedMs,
      retryAfterMs,
    };
  }

  if (status >= 500 && status < 600) {
    return { kind: 'soft_failure', status, reason: 'unavailable', errorCode: 'FETCH_HTTP_5XX', blocking: false, elapsedMs, retryAfterMs };
  }

  if (status >= 400 && status < 500) {
    return { kind: 'hard_failure', status, reason: 'client_error', errorCode: 'FETCH_HTTP_4XX', elapsedMs };
  }

  return { kind: 'hard_failure', status, reason: 'unexpected_status', errorCode: 'FETCH_UNEXPECTED_STATUS', elapsedMs };
}

/**
 * Performs exactly one transport call per request and classifies the result.
 * Never retries and never throws for network conditions. A call that outlives
 * `request.timeoutMs` is abandoned and classified as FETCH_TIMEOUT.
 */
export class FetchExecutor {
  /** Consecutive transport errors per identity (proxy key or "direct") */
  private readonly transportErrors = new Map<string, number>();

  constructor(private readonly options: FetchExecutorOptions) {}

  async execute(request: FetchRequest, signal?: AbortSignal): Promise<FetchOutcome> {
    const identity = request.proxyKey ?? DIRECT_IDENTITY;
    const startedAt = this.options.clock.now();

    let response: TransportResponse;
    try {
      response = await this.withDeadline(request, signal);
    } catch (error) {
      return this.observe(this.classifyError(error, identity, this.options.clock.now() - startedAt));
    }

    this.transportErrors.delete(identity);
    return this.observe(classifyResponse(response, request.expectedShape, this.options.clock.now()));
  }

  /**
   * Run the transport call under its own deadline. The transport's signal
   * aborts on the deadline or on `signal`; the call is abandoned either way,
   * whether or not the transport honours it.
   */
  private async withDeadline(request: FetchRequest, signal?: AbortSignal): Promise<TransportResponse> {
    if (signal?.aborted) {
      throw new TransportError('FETCH_CONNECTION', 'Request aborted', 0);
    }

    const attempt = new AbortController();
    let interrupt: (error: TransportError) => void = () => undefined;
    const interrupted = new Promise<never>((_, reject) => {
      interrupt = reject;
    });

    const timer = setTimeout(() => {
      attempt.abort();
      interrupt(new TransportError('FETCH_TIMEOUT', `No response within ${request.timeoutMs}ms`, request.timeoutMs));
    }, request.timeoutMs);
    const onAbort = (): void => {
      attempt.abort();
      interrupt(new TransportError('FETCH_CONNECTION', 'Request aborted', 0));
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await Promise.race([
        this.options.transport.fetch({
          url: request.url,
          method: request.method,
          headers: { ...request.headers },
          body: request.body,
          proxy: request.proxy,
          timeoutMs: request.timeoutMs,
          signal: attempt.signal,
        }),
        interrupted,
      ]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private observe(outcome: FetchOutcome): FetchOutcome {
    this.options.monitor?.record(outcome.elapsedMs, outcome.kind === 'success');
    return outcome;
  }

  private classifyError(error: unknown, identity: string, measuredMs: number): FetchOutcome {
    const errorCode = error instanceof TransportError ? error.code : 'FETCH_CONNECTION';
    const elapsedMs = error instanceof TransportError ? error.elapsedMs : measuredMs;

    const consecutive = (this.transportErrors.get(identity) ?? 0) + 1;
    this.transportErrors.set(identity, consecutive);

    if (consecutive >= this.options.hardFailureThreshold) {
      return { kind: 'hard_failure', status: null, reason: 'transport_error', errorCode, elapsedMs };
    }
    return { kind: 'soft_failure', status: null, reason: 'transport_error', errorCode, blocking: false, elapsedMs };
  }
}
