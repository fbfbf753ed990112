import Decimal from 'decimal.js';
import { SourceFormat, TradeRecord, TradeType } from '../src/documents/entities/trade-record.entity';

let sequence = 1;

export function buildTrade(overrides: Partial<TradeRecord> = {}): TradeRecord {
  const id = `record-${sequence++}`;
  return {
    id,
    documentIds: [`${id}.pdf`],
    sourceFormat: SourceFormat.CONTRACT_NOTE,
    tradeType: TradeType.BUY,
    date: '2025-11-03',
    assetName: 'NVIDIA Put 200 HVB',
    quantity: new Decimal(500),
    pricePerUnit: new Decimal('0.45'),
    fee: new Decimal(0),
    taxes: new Decimal(0),
    ...overrides,
  };
}
