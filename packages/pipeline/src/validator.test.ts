import type { FieldValue, RawRecord, RecordSchema } from '@trawl/shared';
import { PipelineConfigError } from './errors';
import { RecordValidator, RunDeduplicator, normalizeForFingerprint } from './validator';

const SCHEMA: RecordSchema = {
  fields: [
    { name: 'id', kind: 'string', required: true },
    { name: 'price', kind: 'number', required: true, normalization: { locale: 'sk' } },
    { name: 'reviews', kind: 'integer' },
    { name: 'link', kind: 'url' },
  ],
  identityFields: ['id'],
};

function raw(fields: Record<string, FieldValue>, url = 'https://shop.test/list?page=1'): RawRecord {
  return {
    fields,
    absent: [],
    fallbacks: [],
    source: { targetId: 'shop', url, position: { page: 1, offset: 0, token: null } },
  };
}

describe('normalizeForFingerprint', () => {
  it('should fold width, case and whitespace', () => {
    expect(normalizeForFingerprint('  Ｒｅｄ   Shoe\n')).toBe('red shoe');
    expect(normalizeForFingerprint(42)).toBe('42');
  });
});

describe('RecordValidator', () => {
  const validator = new RecordValidator(SCHEMA);

  it('should coerce fields to their declared kinds', () => {
    const result = validator.validate(
      raw({ id: ' A-7 ', price: '1 299,00 €', reviews: '12', link: '/item/7', badge: 'new' }),
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.record.data).toEqual({
        id: 'A-7',
        price: 1299,
        reviews: 12,
        link: 'https://shop.test/item/7',
        badge: 'new',
      });
      expect(result.record.identity).toBe('identifier');
      expect(result.record.fingerprint).toBe('177a0c28030d7ff0c50300eba21b7eee55d48a1f2cbf61a1d0648babad50d7f8');
      expect(result.record.source.url).toBe('https://shop.test/list?page=1');
    }
  });

  it('should reject a missing required field', () => {
    expect(validator.validate(raw({ price: '10' }))).toEqual({
      ok: false,
      errorCode: 'RECORD_MISSING_REQUIRED',
      reason: 'missing required field "id"',
    });
  });

  it('should reject a blank required string', () => {
    expect(validator.validate(raw({ id: '   ', price: '10' }))).toEqual({
      ok: false,
      errorCode: 'RECORD_MISSING_REQUIRED',
      reason: 'invalid string in field "id"',
    });
  });

  it('should reject an unreadable required number', () => {
    expect(validator.validate(raw({ id: 'A-7', price: 'call for price' }))).toEqual({
      ok: false,
      errorCode: 'RECORD_INVALID_NUMBER',
      reason: 'invalid number in field "price"',
    });
  });

  it('should drop an invalid optional field and keep the record', () => {
    const result = validator.validate(raw({ id: 'A-7', price: '5,50', reviews: '4.5' }));

    expect(result.ok && result.record.data).toEqual({ id: 'A-7', price: 5.5 });
  });

  it('should reject records matching a placeholder pattern', () => {
    const placeholders = new RecordValidator({
      fields: [{ name: 'title', kind: 'string', required: true }],
      identityFields: [],
      rejectWhen: [{ field: 'title', pattern: '^(n/a|tbd)$' }],
    });

    expect(placeholders.validate(raw({ title: 'N/A' }))).toEqual({
      ok: false,
      errorCode: 'RECORD_PLACEHOLDER',
      reason: 'field "title" matches placeholder pattern',
    });
    expect(placeholders.validate(raw({ title: 'Trail runner' })).ok).toBe(true);
  });

  it('should refuse an invalid placeholder pattern at construction', () => {
    expect(
      () =>
        new RecordValidator({
          fields: [],
          identityFields: [],
          rejectWhen: [{ field: 'title', pattern: '(' }],
        }),
    ).toThrow(PipelineConfigError);
  });

  it('should fingerprint by identifier regardless of other fields', () => {
    const first = validator.validate(raw({ id: 'A-7', price: '10' }));
    const second = validator.validate(raw({ id: 'A-7', price: '12', link: '/elsewhere' }, 'https://shop.test/sale?page=3'));

    expect(first.ok && second.ok && first.record.fingerprint === second.record.fingerprint).toBe(true);
  });

  it('should keep equal identifiers from different hosts apart', () => {
    const here = validator.validate(raw({ id: '1001' }, 'https://shop.test/'));
    const there = validator.validate(raw({ id: '1001' }, 'https://outlet.test/'));

    expect(here.ok && there.ok && here.record.fingerprint !== there.record.fingerprint).toBe(true);
  });

  describe('content fallback', () => {
    const fallback = new RecordValidator({
      fields: [
        { name: 'sku', kind: 'string' },
        { name: 'title', kind: 'string' },
      ],
      identityFields: ['sku'],
    });

    it('should hash normalized content with the source host', () => {
      const result = fallback.validate(raw({ title: '  Red   SHOE ' }, 'https://Shop.test/list?page=4'));

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.record.identity).toBe('content');
        expect(result.record.fingerprint).toBe('5285ec22a541caef636a4de84c04aff634583e9e785f2e348deabb9f9b804a39');
      }
    });

    it('should tell the same content on different hosts apart', () => {
      const here = fallback.validate(raw({ title: 'Red shoe' }, 'https://shop.test/'));
      const there = fallback.validate(raw({ title: 'Red shoe' }, 'https://other.test/'));

      expect(here.ok && there.ok && here.record.fingerprint !== there.record.fingerprint).toBe(true);
    });

    it('should reject records with neither identifier nor content', () => {
      expect(fallback.validate(raw({}))).toEqual({
        ok: false,
        errorCode: 'RECORD_MISSING_IDENTITY',
        reason: 'no identifier or fallback content to fingerprint',
      });
    });
  });

  it('should return frozen records', () => {
    const result = validator.validate(raw({ id: 'A-7', price: '10' }));

    expect(result.ok && Object.isFrozen(result.record)).toBe(true);
  });
});

describe('RunDeduplicator', () => {
  it('should admit each fingerprint once', () => {
    const validator = new RecordValidator(SCHEMA);
    const dedupe = new RunDeduplicator();
    const records = [
      validator.validate(raw({ id: 'A-7', price: '10' })),
      validator.validate(raw({ id: 'A-8', price: '10' })),
      validator.validate(raw({ id: 'A-7', price: '11' })),
    ];

    const admitted = records.map(result => result.ok && dedupe.admit(result.record));

    expect(admitted).toEqual([true, true, false]);
    expect(dedupe.size).toBe(2);
  });
});
