import Decimal from 'decimal.js';
import { FieldExtractionError } from '../../common/errors/trade-import.errors';
import { tryParseDecimal } from '../../common/utils/decimal.util';
import { ParsedTrade, SourceFormat } from '../entities/trade-record.entity';

export type FormatParser = (text: string) => ParsedTrade;

// Layout words that show up near instrument names but never are one:
// venue, bank and custody lines, tax rows, reference numbers.
export const BOILERPLATE_DENYLIST = [
  'Execution Venue', 'Market Value', 'Amount', 'Order', 'Account',
  'Baader', 'Client', 'Portfolio', 'WKN', 'ISIN', 'UniCredit',
  'Bank', 'Sitz', 'Munich', 'München', 'Tax', 'Reference',
].map((word) => word.toLowerCase());

export function isBoilerplate(line: string): boolean {
  const lower = line.toLowerCase();
  return BOILERPLATE_DENYLIST.some((word) => lower.includes(word));
}

export function toLines(text: string): string[] {
  return normalizeLineEndings(text).split('\n');
}

export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

/** Returns the first capture group of `pattern`, or null. */
export function capture(text: string, pattern: RegExp): string | null {
  const match = pattern.exec(text);
  return match?.[1] ?? null;
}

/** Parses a required, strictly positive quantity or fails the document. */
export function requireQuantity(format: SourceFormat, raw: string | null): Decimal {
  const value = tryParseDecimal(raw);
  if (!value || !value.greaterThan(0)) {
    throw new FieldExtractionError(format, 'quantity');
  }
  return value;
}

/** Parses a required, non-negative price or fails the document. */
export function requirePrice(format: SourceFormat, raw: string | null): Decimal {
  const value = tryParseDecimal(raw);
  if (!value || value.isNegative()) {
    throw new FieldExtractionError(format, 'pricePerUnit');
  }
  return value;
}
