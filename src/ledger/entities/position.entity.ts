import Decimal from 'decimal.js';
import { IsoDate } from '../../common/utils/date.util';

export enum PositionStatus {
  OPEN = 'open',
  CLOSED = 'closed',    // terminal, sell date present
}

// Purchase side of a ledger row, written once by a Buy.
export interface PositionOpening {
  assetName: string;
  buyDate: IsoDate;
  quantity: Decimal;
  buyPrice: Decimal;
}

// Sale side, written in place by the matching Sell.
export interface PositionSale {
  sellDate: IsoDate;
  sellQuantity: Decimal;
  sellPrice: Decimal;
  fee: Decimal;
  taxes: Decimal;
}

// One ledger row. Rows that were typed in by hand may lack readable dates or
// sale details, so everything beyond the name is read leniently.
export interface Position {
  row: number;                    // row in the ledger store, creation order
  status: PositionStatus;
  assetName: string;
  buyDate: IsoDate | null;
  quantity: Decimal;
  buyPrice: Decimal;
  sale?: Partial<PositionSale>;
}

export function isOpen(position: Position): boolean {
  return position.status === PositionStatus.OPEN;
}
