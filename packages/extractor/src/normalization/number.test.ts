import { normalizeNumber, getLocaleDefaults } from './number';

describe('normalizeNumber', () => {
  describe('Slovak format (sk-SK)', () => {
    const sk = { locale: 'sk-SK' };

    it('should normalize "1 299,00 €"', () => {
      expect(normalizeNumber('1 299,00 €', sk)).toBe(1299);
    });

    it('should normalize NBSP separated "1\\u00A0299,99\\u00A0€"', () => {
      expect(normalizeNumber('1\u00A0299,99\u00A0€', sk)).toBe(1299.99);
    });

    it('should normalize "0,99 €"', () => {
      expect(normalizeNumber('0,99 €', sk)).toBe(0.99);
    });

    it('should strip koruna suffix', () => {
      expect(normalizeNumber('12 990 Kč', { locale: 'cs-CZ' })).toBe(12990);
    });
  });

  describe('US format (en-US)', () => {
    it('should normalize "$1,299.99"', () => {
      expect(normalizeNumber('$1,299.99', { locale: 'en-US' })).toBe(1299.99);
    });

    it('should default to US format without a locale', () => {
      expect(normalizeNumber('2,450')).toBe(2450);
    });

    it('should read the first number out of surrounding text', () => {
      expect(normalizeNumber('4.5 out of 5 stars')).toBe(4.5);
    });

    it('should keep the sign', () => {
      expect(normalizeNumber('-3.50')).toBe(-3.5);
    });
  });

  describe('German format (de-DE)', () => {
    it('should normalize "1.299,00 EUR"', () => {
      expect(normalizeNumber('1.299,00 EUR', { locale: 'de-DE' })).toBe(1299);
    });
  });

  describe('explicit configuration', () => {
    it('should use explicit separators over locale defaults', () => {
      expect(normalizeNumber('2.500,5', { decimalSeparator: ',', thousandSeparators: ['.'] })).toBe(2500.5);
    });

    it('should use custom strip tokens', () => {
      expect(normalizeNumber('120 pcs', { stripTokens: ['pcs'] })).toBe(120);
    });

    it('should round to the configured scale', () => {
      expect(normalizeNumber('1,234.6', { scale: 0 })).toBe(1235);
    });
  });

  describe('numeric input', () => {
    it('should round numbers to scale', () => {
      expect(normalizeNumber(12.3456)).toBe(12.35);
    });

    it('should reject non-finite numbers', () => {
      expect(normalizeNumber(Number.NaN)).toBeNull();
    });
  });

  describe('unparseable input', () => {
    it('should return null for empty string', () => {
      expect(normalizeNumber('   ')).toBeNull();
    });

    it('should return null for text without digits', () => {
      expect(normalizeNumber('Call for price')).toBeNull();
    });
  });
});

describe('getLocaleDefaults', () => {
  it('should use comma decimals for continental locales', () => {
    expect(getLocaleDefaults('fr-FR').decimalSeparator).toBe(',');
  });

  it('should fall back to dot decimals for unknown locales', () => {
    expect(getLocaleDefaults('ja-JP')).toEqual({
      decimalSeparator: '.',
      thousandSeparators: [',', ' ', '\u00A0'],
    });
  });
});
