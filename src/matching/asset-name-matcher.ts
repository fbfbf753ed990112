import Decimal from 'decimal.js';
import '../common/utils/decimal.util';

const DATE_FRAGMENTS = /\d{2}\.\d{2}\.\d{2,4}|\d{4}-\d{2}-\d{2}/g;
const CURRENCY_SYMBOLS = /[$€"]/g;
const NOISE_WORDS = new Set(['eur', 'usd', 'pc.', 'stk.']);
const NUMERIC_TOKEN = /^\d+(?:\.\d*)?$/;

export interface NameComparison {
  matched: boolean;
  score: number;      // shared / min(token counts), 1 for identical names
  shared: string[];
}

/**
 * Splits an instrument name into comparable tokens.
 * Dates and currency markers are dropped and numbers take their minimal form,
 * so `200,00 $` and `200` yield the same token.
 */
export function tokenizeAssetName(name: string): Set<string> {
  const text = name
    .toLowerCase()
    .replace(DATE_FRAGMENTS, ' ')
    .replace(CURRENCY_SYMBOLS, ' ')
    .replace(/,/g, '.');

  const tokens = new Set<string>();
  for (const raw of text.split(/\s+/)) {
    if (!raw || NOISE_WORDS.has(raw)) {
      continue;
    }
    const token = NUMERIC_TOKEN.test(raw)
      ? new Decimal(raw).toDecimalPlaces(4).toString()
      : raw;
    if (token.length > 1 || /^\d+$/.test(token)) {
      tokens.add(token);
    }
  }
  return tokens;
}

// Short names must be fully contained in the other; from three tokens up
// one stray word (an "Order", a venue, a locale word) is tolerated.
function thresholdFor(minTokens: number): number {
  return minTokens < 3 ? minTokens : minTokens - 1;
}

export function compareAssetNames(nameA: string, nameB: string): NameComparison {
  const a = nameA.toLowerCase();
  const b = nameB.toLowerCase();
  if (a === b) {
    return { matched: true, score: 1, shared: [...tokenizeAssetName(a)] };
  }

  const tokensA = tokenizeAssetName(a);
  const tokensB = tokenizeAssetName(b);
  const shared = [...tokensA].filter((token) => tokensB.has(token));
  const minTokens = Math.min(tokensA.size, tokensB.size);
  if (minTokens === 0) {
    return { matched: false, score: 0, shared };
  }

  return {
    matched: shared.length >= thresholdFor(minTokens),
    score: shared.length / minTokens,
    shared,
  };
}

export function similarity(nameA: string, nameB: string): boolean {
  return compareAssetNames(nameA, nameB).matched;
}

export function score(nameA: string, nameB: string): number {
  return compareAssetNames(nameA, nameB).score;
}
