import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { FieldStrategy, FieldValue, PageCursor, RawRecord } from '@trawl/shared';

/**
 * What a strategy runs against: an HTML element (or the document root)
 * or a parsed JSON value.
 */
export type ExtractionScope =
  | { kind: 'html'; $: CheerioAPI; root: Cheerio<AnyNode> }
  | { kind: 'json'; value: unknown };

/**
 * Result of extracting one field
 */
export interface FieldExtractionResult {
  name: string;
  value: FieldValue | null;
  strategyUsed: FieldStrategy | null;
  fallbackUsed: boolean;
}

export interface PageContent {
  url: string;
  body: string;
  contentType: string | null;
}

export interface ExtractionContext {
  targetId: string;
  cursor: PageCursor;
}

export interface PageExtraction {
  records: RawRecord[];
  /** The page advertises a following page (next link, has-more flag, token) */
  hasNextPage: boolean;
  /** The page explicitly says there are no more results */
  endOfResults: boolean;
  /** Continuation token for sources whose next page cannot be computed */
  nextToken: string | null;
  /** The body could not be parsed as the expected structure */
  parseFailed: boolean;
}

/**
 * Parses records and pagination signals out of one fetched page.
 * Must not throw for malformed content; report parseFailed instead.
 */
export interface SiteExtractor {
  extract(page: PageContent, context: ExtractionContext): PageExtraction;
}
