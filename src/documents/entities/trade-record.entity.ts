import Decimal from 'decimal.js';
import { IsoDate } from '../../common/utils/date.util';

export enum SourceFormat {
  STATEMENT = 'statement',
  CONTRACT_NOTE = 'contract_note',
  COST_INFO = 'cost_info',
}

export enum TradeType {
  BUY = 'buy',
  SELL = 'sell',
}

// Placeholder name for documents whose layout hid the instrument description.
export const UNKNOWN_ASSET = 'Unknown Asset';

// What a format parser reads out of one document's text.
export interface ParsedTrade {
  sourceFormat: SourceFormat;
  tradeType: TradeType;
  date: IsoDate;
  assetName: string;          // free text, differs per format
  quantity: Decimal;          // positive
  pricePerUnit: Decimal;
  fee: Decimal;
  taxes: Decimal;
}

// Parsed trade with identity and provenance.
// After merging, documentIds lists every document describing the same event.
export interface TradeRecord extends ParsedTrade {
  id: string;                 // internal UUID
  documentIds: string[];
}

/** Identity proxy for "same economic event": date, side and quantity. */
export function mergeKeyOf(trade: ParsedTrade): string {
  return `${trade.date}|${trade.tradeType}|${trade.quantity.toString()}`;
}
