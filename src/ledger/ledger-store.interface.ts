import { Position, PositionOpening, PositionSale } from './entities/position.entity';

/**
 * Row-oriented ledger persistence. Rows are addressed by position only;
 * there is no stable key. Writes are buffered until `commit`.
 * Every method may throw LedgerUnavailableError.
 */
export interface LedgerStore {
  readonly location: string;

  /** All rows in ledger order (earliest created first). */
  readPositions(): Position[];

  appendPosition(opening: PositionOpening): Position;

  /** Writes the sale columns of an existing row, closing it. */
  recordSale(row: number, sale: PositionSale): Position;

  commit(): void;
}

export const LEDGER_STORE = Symbol('LEDGER_STORE');
