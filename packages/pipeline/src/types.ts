import type {
  ContentShape,
  CursorPosition,
  ErrorCode,
  HttpMethod,
  ProxyEndpoint,
  RecordSchema,
} from '@trawl/shared';
import type { SiteExtractor } from '@trawl/extractor';

/**
 * One attempt against a target URL. Frozen once issued.
 */
export interface FetchRequest {
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string;
  readonly proxy: ProxyEndpoint | null;
  /** Pool key of the assigned proxy; null for direct connections */
  readonly proxyKey: string | null;
  /** 1-based */
  readonly attempt: number;
  readonly timeoutMs: number;
  readonly expectedShape: ContentShape;
}

export type SoftFailureReason =
  | 'blocked'
  | 'throttled'
  | 'unavailable'
  | 'empty_body'
  | 'implausible_body'
  | 'transport_error';

export type HardFailureReason = 'client_error' | 'unexpected_status' | 'transport_error';

export interface FetchSuccess {
  kind: 'success';
  status: number;
  body: string;
  headers: Record<string, string>;
  contentType: string | null;
  finalUrl: string;
  elapsedMs: number;
}

export interface FetchSoftFailure {
  kind: 'soft_failure';
  status: number | null;
  reason: SoftFailureReason;
  errorCode: ErrorCode;
  /** The source refused this identity (403, 429, challenge page) */
  blocking: boolean;
  retryAfterMs?: number;
  elapsedMs: number;
}

export interface FetchHardFailure {
  kind: 'hard_failure';
  status: number | null;
  reason: HardFailureReason;
  errorCode: ErrorCode;
  elapsedMs: number;
}

export type FetchOutcome = FetchSuccess | FetchSoftFailure | FetchHardFailure;
export type FetchFailure = FetchSoftFailure | FetchHardFailure;

export type RetryDecision =
  | { kind: 'retry'; delayMs: number; withNewProxy: boolean }
  | { kind: 'give_up'; reason: string; errorCode: ErrorCode };

export type StopReason = 'exhausted' | 'cap_reached' | 'aborted' | 'cancelled';

/**
 * A top-level scrape: a paginated listing and how to read it.
 */
export interface ScrapeTarget {
  id: string;
  /** URL of the page at `position` (page numbers, offsets or a continuation token) */
  buildUrl(position: Readonly<CursorPosition>): string;
  extractor: SiteExtractor;
  /** Coercion, placeholder and identity rules for the target's records */
  schema: RecordSchema;
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: string;
  expectedShape?: ContentShape;
  startPosition?: Partial<CursorPosition>;
}
