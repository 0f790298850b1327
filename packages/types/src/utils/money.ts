import { ValidationError } from '../errors.js';
import type { DecimalSeparator } from './constants.js';

const NUMERIC_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)$/;

/**
 * Strip whitespace and grouping separators, leaving a period as the decimal mark.
 *
 * "1.000.030,99" with "," becomes "1000030.99"; "1,000,000.32" with "." becomes "1000000.32".
 */
function canonicalAmountText(text: string, decimal: DecimalSeparator): string {
  const compact = text.replace(/\s/g, '');
  if (decimal === ',') {
    return compact.replace(/\./g, '').replace(/,/g, '.');
  }
  return compact.replace(/,/g, '');
}

/**
 * Parse a locale-formatted amount. Returns NaN when the text is not numeric.
 */
export function parseAmount(text: string, decimal: DecimalSeparator): number {
  const canonical = canonicalAmountText(text, decimal);
  if (!NUMERIC_PATTERN.test(canonical)) {
    return NaN;
  }
  return parseFloat(canonical);
}

export function parseAmountStrict(text: string, decimal: DecimalSeparator, field = 'amount'): number {
  const value = parseAmount(text, decimal);
  if (isNaN(value)) {
    throw new ValidationError(`Unable to parse ${field}: "${text}"`, field, text);
  }
  return value;
}

/**
 * Lenient numeric value of an amount: absent or unparsable text counts as zero.
 */
export function toRealAmount(text: string | null | undefined, decimal: DecimalSeparator): number {
  if (text === null || text === undefined) {
    return 0;
  }
  const value = parseAmount(text, decimal);
  return isNaN(value) ? 0 : value;
}

/**
 * Amount text with a period decimal mark and no grouping, keeping the original digits.
 * Interchange documents require this form; unparsable text becomes "0".
 */
export function normalizeAmountText(text: string | null | undefined, decimal: DecimalSeparator): string {
  if (text === null || text === undefined) {
    return '0';
  }
  const canonical = canonicalAmountText(text, decimal);
  if (!NUMERIC_PATTERN.test(canonical)) {
    return '0';
  }
  return canonical.replace(/^\+/, '');
}
