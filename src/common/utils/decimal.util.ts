import Decimal from 'decimal.js';

// Configure Decimal.js globally for financial precision
Decimal.set({
  precision: 20,           // 20 significant digits
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

const CURRENCY_TOKENS = /EUR|USD|€|\$|"/g;
const PLAIN_DECIMAL = /^[-+]?\d+(?:\.\d+)?$/;

/**
 * Converts Decimal back to JavaScript number for spreadsheet cells and logs.
 * Rounds to 8 decimal places.
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

/**
 * Safe division with zero check.
 */
export function divide(a: Decimal, b: Decimal): Decimal {
  if (b.isZero()) {
    throw new Error('Division by zero');
  }
  return a.dividedBy(b);
}

/**
 * Rewrites locale-ambiguous number text into plain `123.45` form.
 *
 * When both separators occur, the one appearing first is the thousands
 * separator: `1.234,56` and `1,234.56` both become `1234.56`. A lone comma
 * is always the decimal point.
 */
export function normalizeNumericText(text: string): string {
  let cleaned = text.replace(CURRENCY_TOKENS, '').replace(/\s+/g, '');

  const dot = cleaned.indexOf('.');
  const comma = cleaned.indexOf(',');
  if (dot !== -1 && comma !== -1) {
    cleaned = dot < comma
      ? cleaned.replace(/\./g, '').replace(/,/g, '.')
      : cleaned.replace(/,/g, '');
  } else if (comma !== -1) {
    cleaned = cleaned.replace(/,/g, '.');
  }
  return cleaned;
}

/** Strict variant: null when the text is not a number in either convention. */
export function tryParseDecimal(text: string | null | undefined): Decimal | null {
  if (!text) {
    return null;
  }
  const normalized = normalizeNumericText(text);
  return PLAIN_DECIMAL.test(normalized) ? new Decimal(normalized) : null;
}

/**
 * Lenient variant used for optional amounts (fees, taxes).
 * Unparseable text counts as zero.
 */
export function parseDecimal(text: string | null | undefined): Decimal {
  return tryParseDecimal(text) ?? new Decimal(0);
}
