import Decimal from 'decimal.js';
import { FieldExtractionError } from '../../common/errors/trade-import.errors';
import { parseDecimal } from '../../common/utils/decimal.util';
import { parseIsoDate } from '../../common/utils/date.util';
import { ParsedTrade, SourceFormat, TradeType, UNKNOWN_ASSET } from '../entities/trade-record.entity';
import { capture, isBoilerplate, normalizeLineEndings, requirePrice, requireQuantity, toLines } from './parser.util';

const FORMAT = SourceFormat.STATEMENT;
const NAME_WINDOW = 14;
const QUANTITY_SNIPPET = 400;
const TAX_KEYWORDS = ['German flat rate tax', 'Solidarity surcharge', 'Church tax', 'Kapitalertragsteuer', 'Soli'];

function isPriceLine(line: string): boolean {
  return line.includes('Price') && line.includes('EUR');
}

function findNameAnchor(lines: string[]): number {
  const priceLine = lines.findIndex(isPriceLine);
  return priceLine !== -1 ? priceLine : lines.findIndex((line) => line.includes('ISIN:'));
}

// Nearest line after the price (or ISIN) anchor that is not layout noise.
function nameNearAnchor(lines: string[]): string | null {
  const anchor = findNameAnchor(lines);
  if (anchor === -1) {
    return null;
  }
  for (const raw of lines.slice(anchor + 1, anchor + 1 + NAME_WINDOW)) {
    const line = raw.trim();
    if (!line || isBoilerplate(line) || /^[\d.,\s:-]+$/.test(line)) continue;
    if (/\d{4}-\d{2}-\d{2}/.test(line) || isPriceLine(line)) continue;
    return line;
  }
  return null;
}

function nameInQuantityBlock(text: string): string | null {
  const start = text.indexOf('Quantity');
  if (start === -1) {
    return null;
  }
  for (const raw of text.slice(start, start + QUANTITY_SNIPPET).split('\n')) {
    const line = raw.trim();
    if (line.length <= 3 || line.includes('Execution Venue')) continue;
    if (['Quantity', 'Units', 'Price', 'Date'].some((word) => line.includes(word))) continue;
    if (/\d{4}-/.test(line)) continue;
    return line;
  }
  return null;
}

function sumTaxes(lines: string[]): Decimal {
  let taxes = new Decimal(0);
  for (const raw of lines) {
    const line = raw.trim();
    // "Solidarity surcharge" also contains "Soli": one amount per line
    if (!TAX_KEYWORDS.some((keyword) => line.includes(keyword))) continue;
    const amount = capture(line, /([\d.,]+)\s*-?$/) ?? capture(line, /EUR\s+([\d.,]+)/);
    if (amount) {
      taxes = taxes.plus(parseDecimal(amount));
    }
  }
  return taxes;
}

/**
 * Transaction statements: ISO dates, "Units" for the quantity and itemized
 * tax lines that are summed into one amount.
 */
export function parseStatement(rawText: string): ParsedTrade {
  const text = normalizeLineEndings(rawText);
  const lines = toLines(text);

  let tradeType: TradeType;
  if (/Transaction Statement:\s*Sale/i.test(text)) {
    tradeType = TradeType.SELL;
  } else if (/Transaction Statement:\s*(Purchase|Buy)/i.test(text)) {
    tradeType = TradeType.BUY;
  } else {
    throw new FieldExtractionError(FORMAT, 'tradeType');
  }

  const rawDate = capture(text, /(\d{4}-\d{2}-\d{2})/);
  const date = rawDate ? parseIsoDate(rawDate) : null;
  if (!date) {
    throw new FieldExtractionError(FORMAT, 'date');
  }

  const quantity = requireQuantity(FORMAT, capture(text, /Units\s+([\d.,]+)/));
  const pricePerUnit = requirePrice(FORMAT, capture(text, /Price\s+EUR\s+([\d.,]+)/));

  return {
    sourceFormat: FORMAT,
    tradeType,
    date,
    assetName: nameNearAnchor(lines) ?? nameInQuantityBlock(text) ?? UNKNOWN_ASSET,
    quantity,
    pricePerUnit,
    fee: new Decimal(0),
    taxes: sumTaxes(lines),
  };
}
