// Domain types for Trawl - resilient extraction pipeline

export type ContentShape = "html" | "json";
export type HttpMethod = "GET" | "POST";

export type ErrorCode =
  // Fetch errors
  | "FETCH_TIMEOUT" | "FETCH_DNS" | "FETCH_CONNECTION" | "FETCH_TLS" | "FETCH_HTTP_4XX" | "FETCH_HTTP_5XX"
  | "FETCH_UNEXPECTED_STATUS" | "FETCH_EMPTY_BODY" | "FETCH_IMPLAUSIBLE_BODY"
  // Block detection
  | "BLOCK_CAPTCHA_SUSPECTED" | "BLOCK_CLOUDFLARE_SUSPECTED" | "BLOCK_FORBIDDEN_403" | "BLOCK_RATE_LIMIT_429"
  | "BLOCK_BOT_DETECTION" | "BLOCK_GEO"
  // Proxy / retry
  | "PROXY_POOL_EXHAUSTED" | "RETRY_EXHAUSTED"
  // Extraction errors
  | "EXTRACT_NO_RECORDS" | "EXTRACT_PARSE_ERROR" | "EXTRACT_FAILED"
  // Record validation
  | "RECORD_MISSING_REQUIRED" | "RECORD_INVALID_NUMBER" | "RECORD_MISSING_IDENTITY" | "RECORD_PLACEHOLDER"
  // Run lifecycle
  | "RUN_CANCELLED"
  // Unknown
  | "UNKNOWN";

/**
 * How a failure is handled by the pipeline:
 * - transient_blocked: the source is refusing this identity; back off and rotate
 * - transient_unavailable: the source or network is temporarily failing; back off
 * - permanent: not worth retrying with the same strategy
 * - extraction_drift: page fetched but its structure yielded nothing
 * - cancelled: caller asked to stop
 */
export type FailureClass =
  | "transient_blocked"
  | "transient_unavailable"
  | "permanent"
  | "extraction_drift"
  | "cancelled";

export interface ProxyEndpoint {
  protocol: "http" | "https";
  host: string;
  port: number;
  username?: string;
  password?: string;
}

// Extraction
export type AttributeTarget = "text" | "html" | "value" | `attr:${string}`;

export type PostprocessOp =
  | { op: "trim" }
  | { op: "lowercase" }
  | { op: "uppercase" }
  | { op: "collapse_whitespace" }
  | { op: "replace"; from: string; to: string }
  | { op: "regex_extract"; pattern: string; group: number }
  | { op: "absolute_url"; base?: string };

export type StrategyMethod = "css" | "xpath" | "regex" | "json_path";

export interface FieldStrategy {
  method: StrategyMethod;
  selector: string;
  attribute?: AttributeTarget;
}

export interface FieldSpec {
  name: string;
  /** Tried in order; the first non-empty value wins */
  strategies: FieldStrategy[];
  postprocess?: PostprocessOp[];
}

export type FieldValue = string | number;

// Pagination
export interface CursorPosition {
  page: number;
  offset: number;
  token: string | null;
}

export interface PageCursor {
  readonly position: Readonly<CursorPosition>;
  readonly pagesFetched: number;
  readonly recordsEmitted: number;
}

export interface RecordProvenance {
  targetId: string;
  url: string;
  position: Readonly<CursorPosition>;
}

export interface RawRecord {
  fields: Record<string, FieldValue>;
  /** Fields for which no strategy produced a value */
  absent: string[];
  /** Fields that needed a fallback strategy */
  fallbacks: string[];
  source: RecordProvenance;
}

// Validation
export type FieldKind = "string" | "number" | "integer" | "url";

export interface NumberNormalization {
  locale?: string;
  decimalSeparator?: "," | ".";
  thousandSeparators?: string[];
  stripTokens?: string[];
  scale?: number;
}

export interface RecordFieldRule {
  name: string;
  kind: FieldKind;
  required?: boolean;
  normalization?: NumberNormalization;
}

export interface RejectRule {
  field: string;
  pattern: string;
}

export interface RecordSchema {
  fields: RecordFieldRule[];
  /** Fields forming the source identifier (e.g. listing id); all must be present */
  identityFields: string[];
  /** Content fields hashed with the source host when the identifier is missing */
  fallbackFields?: string[];
  rejectWhen?: RejectRule[];
}

export interface ValidatedRecord {
  data: Record<string, FieldValue>;
  fingerprint: string;
  identity: "identifier" | "content";
  source: RecordProvenance;
}
