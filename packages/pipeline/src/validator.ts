import { createHash } from 'crypto';
import type {
  ErrorCode,
  FieldValue,
  RawRecord,
  RecordFieldRule,
  RecordSchema,
  ValidatedRecord,
} from '@trawl/shared';
import { normalizeNumber } from '@trawl/extractor';
import { PipelineConfigError } from './errors';

export type ValidationResult =
  | { ok: true; record: ValidatedRecord }
  | { ok: false; errorCode: ErrorCode; reason: string };

type Coerced = { ok: true; value: FieldValue } | { ok: false; errorCode: ErrorCode };

const DEFAULT_FALLBACK_FIELDS = ['title'];

/**
 * Stable text form used for content fingerprints
 */
export function normalizeForFingerprint(value: FieldValue): string {
  return String(value).normalize('NFKC').toLowerCase().replace(/\s+/g, ' ').trim();
}

function sha256(parts: string[]): string {
  return createHash('sha256').update(JSON.stringify(parts)).digest('hex');
}

function sourceHost(url: string): string {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return url;
  }
}

function coerce(raw: FieldValue, rule: RecordFieldRule, pageUrl: string): Coerced {
  switch (rule.kind) {
    case 'string': {
      const text = String(raw).trim();
      return text === '' ? { ok: false, errorCode: 'RECORD_MISSING_REQUIRED' } : { ok: true, value: text };
    }

    case 'number':
    case 'integer': {
      const value = normalizeNumber(raw, rule.normalization);
      if (value === null || (rule.kind === 'integer' && !Number.isInteger(value))) {
        return { ok: false, errorCode: 'RECORD_INVALID_NUMBER' };
      }
      return { ok: true, value };
    }

    case 'url': {
      try {
        return { ok: true, value: new URL(String(raw).trim(), pageUrl).toString() };
      } catch {
        return { ok: false, errorCode: 'RECORD_MISSING_REQUIRED' };
      }
    }
  }
}

/**
 * Coerces raw records to a schema and fingerprints them.
 * Fields outside the schema pass through unchanged.
 */
export class RecordValidator {
  private readonly rejectPatterns: Array<{ field: string; pattern: RegExp }>;

  constructor(private readonly schema: RecordSchema) {
    this.rejectPatterns = (schema.rejectWhen ?? []).map(rule => {
      try {
        return { field: rule.field, pattern: new RegExp(rule.pattern, 'i') };
      } catch (error) {
        throw new PipelineConfigError([
          `rejectWhen.${rule.field}: ${error instanceof Error ? error.message : String(error)}`,
        ]);
      }
    });
  }

  validate(raw: RawRecord): ValidationResult {
    const data: Record<string, FieldValue> = { ...raw.fields };

    for (const rule of this.schema.fields) {
      const value = raw.fields[rule.name];

      if (value === undefined) {
        if (rule.required) {
          return { ok: false, errorCode: 'RECORD_MISSING_REQUIRED', reason: `missing required field "${rule.name}"` };
        }
        continue;
      }

      const coerced = coerce(value, rule, raw.source.url);
      if (coerced.ok) {
        data[rule.name] = coerced.value;
        continue;
      }

      if (rule.required) {
        return { ok: false, errorCode: coerced.errorCode, reason: `invalid ${rule.kind} in field "${rule.name}"` };
      }
      delete data[rule.name];
    }

    for (const { field, pattern } of this.rejectPatterns) {
      const value = data[field];
      if (value !== undefined && pattern.test(String(value))) {
        return { ok: false, errorCode: 'RECORD_PLACEHOLDER', reason: `field "${field}" matches placeholder pattern` };
      }
    }

    const identity = this.fingerprint(data, raw.source.url);
    if (identity === null) {
      return { ok: false, errorCode: 'RECORD_MISSING_IDENTITY', reason: 'no identifier or fallback content to fingerprint' };
    }

    return {
      ok: true,
      record: Object.freeze({ data, fingerprint: identity.fingerprint, identity: identity.kind, source: raw.source }),
    };
  }

  private fingerprint(
    data: Record<string, FieldValue>,
    url: string,
  ): { fingerprint: string; kind: ValidatedRecord['identity'] } | null {
    // both kinds are scoped to the source host: sites reuse each other's ids
    const host = sourceHost(url);
    const { identityFields } = this.schema;
    const identifiers = identityFields.map(name => data[name]);
    if (identityFields.length > 0 && identifiers.every(value => value !== undefined && String(value).trim() !== '')) {
      return { fingerprint: sha256(['id', host, ...identifiers.map(value => String(value).trim())]), kind: 'identifier' };
    }

    const fallbackFields = this.schema.fallbackFields ?? DEFAULT_FALLBACK_FIELDS;
    const content = fallbackFields.map(name => data[name]);
    if (fallbackFields.length > 0 && content.every(value => value !== undefined && normalizeForFingerprint(value) !== '')) {
      const normalized = content.map(value => (value === undefined ? '' : normalizeForFingerprint(value)));
      return { fingerprint: sha256(['content', host, ...normalized]), kind: 'content' };
    }

    return null;
  }
}

/**
 * Fingerprints seen in one run
 */
export class RunDeduplicator {
  private readonly seen = new Set<string>();

  /** False when the fingerprint was already admitted */
  admit(record: ValidatedRecord): boolean {
    if (this.seen.has(record.fingerprint)) {
      return false;
    }
    this.seen.add(record.fingerprint);
    return true;
  }

  get size(): number {
    return this.seen.size;
  }
}
