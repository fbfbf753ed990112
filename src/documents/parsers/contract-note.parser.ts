import { FieldExtractionError } from '../../common/errors/trade-import.errors';
import { parseDecimal } from '../../common/utils/decimal.util';
import { parseGermanDate } from '../../common/utils/date.util';
import { ParsedTrade, SourceFormat, TradeType } from '../entities/trade-record.entity';
import { capture, normalizeLineEndings, requirePrice, requireQuantity } from './parser.util';

const FORMAT = SourceFormat.CONTRACT_NOTE;

// "Sell 72.00 pc. Microsoft Corp." - side, optional quantity, then the name
const HEADER = /^(Buy|Sell)\s+(?:[\d.,]+(?:\s*(?:pc\.|Stk\.))?\s+)?(.+)$/m;
const LEADING_QUANTITY = /^[\d.,]+\s*(?:pc\.|Stk\.)\s+(.+)/;
const QUANTITY_AND_PRICE = /([\d.,]+)\s*(?:pc\.|Stk\.)\s+([\d.,]+)\s*EUR/;

export function parseContractNote(rawText: string): ParsedTrade {
  const text = normalizeLineEndings(rawText);

  const header = HEADER.exec(text);
  if (!header) {
    throw new FieldExtractionError(FORMAT, 'tradeType');
  }
  const tradeType = header[1] === 'Buy' ? TradeType.BUY : TradeType.SELL;
  const rawName = header[2].trim();
  const assetName = (LEADING_QUANTITY.exec(rawName)?.[1] ?? rawName).trim();

  const rawDate = capture(text, /(?:Execution|Date)\s+(\d{2}\.\d{2}\.\d{4})/);
  const date = rawDate ? parseGermanDate(rawDate) : null;
  if (!date) {
    throw new FieldExtractionError(FORMAT, 'date');
  }

  const block = QUANTITY_AND_PRICE.exec(text);
  const quantity = requireQuantity(FORMAT, block?.[1] ?? null);
  const pricePerUnit = requirePrice(FORMAT, block?.[2] ?? null);

  // Broker prints charges as negative amounts; the ledger stores magnitudes.
  const fee = parseDecimal(capture(text, /Order fees\s*([-\d.,]+)\s*EUR/)).abs();
  const taxes = parseDecimal(capture(text, /Taxes\s*([-\d.,]+)\s*EUR/)).abs();

  return { sourceFormat: FORMAT, tradeType, date, assetName, quantity, pricePerUnit, fee, taxes };
}
