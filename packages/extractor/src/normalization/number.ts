import type { FieldValue, NumberNormalization } from '@trawl/shared';

const DEFAULT_STRIP_TOKENS = ['€', 'EUR', '$', 'USD', '£', 'GBP', 'Kč', 'CZK'];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Normalizes a raw numeric string (price, count, rating) into a number.
 *
 * Handles multiple locale formats:
 * - Slovak: "1 299,00 €" → 1299
 * - US: "$1,299.99" → 1299.99
 * - German: "1.299,00 EUR" → 1299
 *
 * Numbers pass through, rounded to the configured scale.
 * Returns null when no number can be read.
 */
export function normalizeNumber(raw: FieldValue, config: NumberNormalization = {}): number | null {
  const scale = config.scale ?? 2;

  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? round(raw, scale) : null;
  }

  let processed = raw.trim();
  if (processed === '') {
    return null;
  }

  // Step 1: Strip currency and unit tokens
  for (const token of config.stripTokens ?? DEFAULT_STRIP_TOKENS) {
    processed = processed.replace(new RegExp(escapeRegExp(token), 'gi'), '');
  }

  // Step 2: Collapse whitespace including NBSP (\u00A0)
  processed = processed.replace(/\s+/g, ' ').trim();

  // Step 3: Separators, explicit or by locale
  const localeDefaults = getLocaleDefaults(config.locale ?? 'en');
  const decimalSeparator = config.decimalSeparator ?? localeDefaults.decimalSeparator;
  const thousandSeparators = config.thousandSeparators ?? localeDefaults.thousandSeparators;

  // Step 4: Remove thousand separators
  for (const separator of thousandSeparators) {
    processed = processed.replace(new RegExp(escapeRegExp(separator), 'g'), '');
  }

  // Step 5: Only the last comma is a decimal point
  if (decimalSeparator === ',') {
    const lastCommaIndex = processed.lastIndexOf(',');
    if (lastCommaIndex !== -1) {
      processed = processed.substring(0, lastCommaIndex) + '.' + processed.substring(lastCommaIndex + 1);
    }
  }

  // Step 6: First number in what is left
  const match = processed.match(/-?\d+(?:\.\d+)?/);
  if (!match) {
    return null;
  }

  const value = Number(match[0]);
  return Number.isFinite(value) ? round(value, scale) : null;
}

function round(value: number, scale: number): number {
  const multiplier = Math.pow(10, scale);
  return Math.round(value * multiplier) / multiplier;
}

/**
 * Returns default decimal and thousand separators for common locales.
 * Falls back to en-US format if locale is unknown.
 */
export function getLocaleDefaults(locale: string): {
  decimalSeparator: ',' | '.';
  thousandSeparators: string[];
} {
  const normalizedLocale = locale.toLowerCase();

  // Slovak, Czech, German and other continental formats
  if (['sk', 'cs', 'de', 'fr', 'es', 'it'].some(prefix => normalizedLocale.startsWith(prefix))) {
    return {
      decimalSeparator: ',',
      thousandSeparators: [' ', '\u00A0', '.'],
    };
  }

  return {
    decimalSeparator: '.',
    thousandSeparators: [',', ' ', '\u00A0'],
  };
}
