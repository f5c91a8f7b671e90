import * as cheerio from 'cheerio';
import type { FieldSpec, FieldStrategy, FieldValue, RawRecord } from '@trawl/shared';
import type { ExtractionContext, ExtractionScope, PageContent, PageExtraction, SiteExtractor } from './types';
import { extractField, extractWithStrategy } from './extract';
import { resolvePath } from './json-path';
import { extractionLogger } from '../utils/logger';

export interface HtmlListingConfig {
  /** Record container selectors, tried in order; the first that matches anything wins */
  itemSelectors: string[];
  fields: FieldSpec[];
  /** Any match means another page exists; without it, any record does */
  nextPage?: FieldStrategy[];
  /** Use the next-page value (e.g. a "load more" href) as the continuation token */
  nextPageIsToken?: boolean;
  /** Any match means the listing ended ("no results", last page badge) */
  endMarker?: FieldStrategy[];
}

export interface JsonListingConfig {
  /** CSS selector of a <script> holding the JSON (e.g. "script#__NEXT_DATA__"); the body is JSON when omitted */
  embeddedScript?: string;
  /** Paths to the record array, tried in order */
  itemsPaths: string[];
  fields: FieldSpec[];
  /** Truthy value means another page exists; an explicit false ends the listing */
  hasMorePath?: string;
  /** Non-empty value is the continuation token for the next page */
  nextTokenPath?: string;
  /** Total page count; the listing ends once the current page reaches it */
  totalPagesPath?: string;
}

const EMPTY_PAGE: PageExtraction = {
  records: [],
  hasNextPage: false,
  endOfResults: false,
  nextToken: null,
  parseFailed: false,
};

function buildRecord(
  scope: ExtractionScope,
  fields: FieldSpec[],
  page: PageContent,
  context: ExtractionContext
): RawRecord {
  const values: Record<string, FieldValue> = {};
  const absent: string[] = [];
  const fallbacks: string[] = [];

  for (const field of fields) {
    const result = extractField(scope, field, { baseUrl: page.url });
    if (result.value === null) {
      absent.push(field.name);
      continue;
    }
    values[field.name] = result.value;
    if (result.fallbackUsed) {
      fallbacks.push(field.name);
    }
  }

  return {
    fields: values,
    absent,
    fallbacks,
    source: { targetId: context.targetId, url: page.url, position: context.cursor.position },
  };
}

function firstMatch(scope: ExtractionScope, strategies: FieldStrategy[] | undefined): FieldValue | null {
  for (const strategy of strategies ?? []) {
    const value = extractWithStrategy(scope, strategy);
    if (value !== null) {
      return value;
    }
  }
  return null;
}

function resolveToken(value: FieldValue, baseUrl: string): string {
  const token = String(value).trim();
  try {
    return new URL(token, baseUrl).toString();
  } catch {
    return token;
  }
}

/**
 * Listing pages rendered as HTML: one record per container element.
 */
export class HtmlListingExtractor implements SiteExtractor {
  constructor(private readonly config: HtmlListingConfig) {}

  extract(page: PageContent, context: ExtractionContext): PageExtraction {
    const $ = cheerio.load(page.body);
    const document: ExtractionScope = { kind: 'html', $, root: $.root() };

    const records: RawRecord[] = [];
    for (const selector of this.config.itemSelectors) {
      const items = $(selector);
      if (items.length === 0) {
        continue;
      }
      items.each((_, element) => {
        records.push(buildRecord({ kind: 'html', $, root: $(element) }, this.config.fields, page, context));
      });
      break;
    }

    const next = firstMatch(document, this.config.nextPage);
    const end = firstMatch(document, this.config.endMarker);

    return {
      records,
      hasNextPage: this.config.nextPage ? next !== null : records.length > 0,
      endOfResults: end !== null,
      nextToken: next !== null && this.config.nextPageIsToken ? resolveToken(next, page.url) : null,
      parseFailed: false,
    };
  }
}

/**
 * JSON payloads, either the whole body or embedded in an HTML script tag.
 * With no next-page path configured, a page with records implies another page.
 */
export class JsonListingExtractor implements SiteExtractor {
  constructor(private readonly config: JsonListingConfig) {}

  extract(page: PageContent, context: ExtractionContext): PageExtraction {
    const payload = this.parse(page);
    if (payload === undefined) {
      return { ...EMPTY_PAGE, parseFailed: true };
    }

    const items = this.findItems(payload);
    const records = items.map(item => buildRecord({ kind: 'json', value: item }, this.config.fields, page, context));

    let hasNextPage = false;
    let endOfResults = false;
    let nextToken: string | null = null;

    if (this.config.nextTokenPath) {
      const token = resolvePath(payload, this.config.nextTokenPath);
      if ((typeof token === 'string' && token.trim() !== '') || typeof token === 'number') {
        nextToken = String(token);
        hasNextPage = true;
      }
    }

    if (this.config.hasMorePath) {
      const hasMore = resolvePath(payload, this.config.hasMorePath);
      if (hasMore === false) {
        endOfResults = true;
      } else if (hasMore) {
        hasNextPage = true;
      }
    }

    if (this.config.totalPagesPath) {
      const total = Number(resolvePath(payload, this.config.totalPagesPath));
      if (Number.isFinite(total)) {
        if (context.cursor.position.page < total) {
          hasNextPage = true;
        } else {
          endOfResults = true;
        }
      }
    }

    const { nextTokenPath, hasMorePath, totalPagesPath } = this.config;
    if (!nextTokenPath && !hasMorePath && !totalPagesPath) {
      hasNextPage = records.length > 0;
    }

    return { records, hasNextPage, endOfResults, nextToken, parseFailed: false };
  }

  private parse(page: PageContent): unknown {
    let text = page.body;
    if (this.config.embeddedScript) {
      const $ = cheerio.load(page.body);
      const script = $(this.config.embeddedScript).first();
      if (script.length === 0) {
        extractionLogger.debug(`Embedded script ${this.config.embeddedScript} not found`, { url: page.url });
        return undefined;
      }
      text = script.text();
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      extractionLogger.debug('Payload is not valid JSON', {
        url: page.url,
        reason: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  private findItems(payload: unknown): unknown[] {
    for (const path of this.config.itemsPaths) {
      const items = resolvePath(payload, path);
      if (Array.isArray(items)) {
        return items;
      }
    }
    return [];
  }
}
