import Decimal from 'decimal.js';
import { FieldExtractionError } from '../../common/errors/trade-import.errors';
import { divide, parseDecimal, tryParseDecimal } from '../../common/utils/decimal.util';
import { parseGermanDate } from '../../common/utils/date.util';
import { ParsedTrade, SourceFormat, TradeType, UNKNOWN_ASSET } from '../entities/trade-record.entity';
import { capture, isBoilerplate, normalizeLineEndings, requireQuantity } from './parser.util';

const FORMAT = SourceFormat.COST_INFO;

/**
 * Ex-ante cost information, sent before execution. Carries the cleanest
 * instrument description but only an estimated order amount, so the unit
 * price is derived as amount / quantity. Separators between labels and values
 * may be newlines, quotes or commas depending on the extraction.
 */
export function parseCostInfo(rawText: string): ParsedTrade {
  const text = normalizeLineEndings(rawText);

  const side = capture(text, /Order["\s,]*(Buy|Sell)/i);
  if (!side) {
    throw new FieldExtractionError(FORMAT, 'tradeType');
  }
  const tradeType = side.toLowerCase() === 'buy' ? TradeType.BUY : TradeType.SELL;

  // A layout line right after the caption means the name was not extracted.
  const caption = capture(text, /Ex-Ante cost information\s+([^\n]+)/)?.trim().replace(/^"(.*)"$/, '$1').trim();
  const assetName = caption && !isBoilerplate(caption) ? caption : UNKNOWN_ASSET;

  const rawDate = capture(text, /Date["\s,]*(\d{2}\.\d{2}\.\d{4})/);
  const date = rawDate ? parseGermanDate(rawDate) : null;
  if (!date) {
    throw new FieldExtractionError(FORMAT, 'date');
  }

  const quantity = requireQuantity(FORMAT, capture(text, /Quantity["\s,]*([\d.,]+)/));

  const amount = tryParseDecimal(capture(text, /Est\. order amount["\s,]*([\d.,]+)/));
  if (!amount) {
    throw new FieldExtractionError(FORMAT, 'pricePerUnit');
  }

  return {
    sourceFormat: FORMAT,
    tradeType,
    date,
    assetName,
    quantity,
    pricePerUnit: divide(amount, quantity),
    fee: parseDecimal(capture(text, /Service charges["\s,]*([\d.,]+)/)),
    taxes: new Decimal(0),
  };
}
