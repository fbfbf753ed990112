import { TradeRecord, TradeType } from '../documents/entities/trade-record.entity';

const TYPE_ORDER: Record<TradeType, number> = {
  [TradeType.BUY]: 0,
  [TradeType.SELL]: 1,
};

// ISO dates order lexically.
function compareDates(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Ledger application order: date ascending, buys before sells on the same
 * day so a same-day sale can close that day's purchase.
 * Stable, so remaining ties keep their input order. Does not mutate the input.
 */
export function sequenceTrades(trades: readonly TradeRecord[]): TradeRecord[] {
  return [...trades].sort(
    (a, b) => compareDates(a.date, b.date) || TYPE_ORDER[a.tradeType] - TYPE_ORDER[b.tradeType],
  );
}
