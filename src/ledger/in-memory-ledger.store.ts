import { LedgerUnavailableError } from '../common/errors/trade-import.errors';
import { Position, PositionOpening, PositionSale, PositionStatus } from './entities/position.entity';
import { LedgerStore } from './ledger-store.interface';

// Process-local ledger. Rows start at 1, leaving 0 for the header as in a sheet.
export class InMemoryLedgerStore implements LedgerStore {
  readonly location = 'memory';
  private positions: Position[] = [];
  private commitCount = 0;

  constructor(openings: PositionOpening[] = []) {
    openings.forEach((opening) => this.appendPosition(opening));
  }

  /** Returns copies to prevent external mutation */
  readPositions(): Position[] {
    return this.positions.map((position) => ({ ...position, sale: position.sale && { ...position.sale } }));
  }

  appendPosition(opening: PositionOpening): Position {
    const position: Position = {
      row: this.positions.length + 1,
      status: PositionStatus.OPEN,
      ...opening,
    };
    this.positions.push(position);
    return { ...position };
  }

  recordSale(row: number, sale: PositionSale): Position {
    const position = this.positions.find((candidate) => candidate.row === row);
    if (!position) {
      throw new LedgerUnavailableError(this.location, `row ${row} does not exist`);
    }
    position.status = PositionStatus.CLOSED;
    position.sale = { ...sale };
    return { ...position, sale: { ...sale } };
  }

  commit(): void {
    this.commitCount++;
  }

  /** Number of commits so far - test harness only */
  getCommitCount(): number {
    return this.commitCount;
  }
}
