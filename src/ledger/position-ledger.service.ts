import { Inject, Injectable, Logger } from '@nestjs/common';
import { NoMatchingPositionError } from '../common/errors/trade-import.errors';
import { TradeRecord, TradeType } from '../documents/entities/trade-record.entity';
import { compareAssetNames } from '../matching/asset-name-matcher';
import { isOpen, Position } from './entities/position.entity';
import { LEDGER_STORE, LedgerStore } from './ledger-store.interface';

// Applies trades to the ledger: buys open rows, sells close the first
// similar open row. Each application is committed on its own.
@Injectable()
export class PositionLedgerService {
  private readonly logger = new Logger(PositionLedgerService.name);

  constructor(@Inject(LEDGER_STORE) private readonly store: LedgerStore) {}

  apply(trade: TradeRecord): Position {
    return trade.tradeType === TradeType.BUY ? this.applyBuy(trade) : this.applySell(trade);
  }

  /**
   * Always opens a new row; buys are never matched against the ledger,
   * so the same purchase applied twice yields two positions.
   */
  applyBuy(trade: TradeRecord): Position {
    const position = this.store.appendPosition({
      assetName: trade.assetName,
      buyDate: trade.date,
      quantity: trade.quantity,
      buyPrice: trade.pricePerUnit,
    });
    this.store.commit();
    this.logger.log(`BUY '${trade.assetName}' opened at row ${position.row}`);
    return position;
  }

  /**
   * Closes the earliest open position whose name is similar to the sale's.
   * First match wins; there is no search for a better one further down.
   *
   * @throws NoMatchingPositionError when no open position matches; nothing is written
   */
  applySell(trade: TradeRecord): Position {
    const match = this.findOpenMatch(trade.assetName);
    if (!match) {
      throw new NoMatchingPositionError(trade.assetName, trade.date);
    }

    if (!match.quantity.equals(trade.quantity)) {
      this.logger.warn(
        `Sale of ${trade.quantity.toString()} '${trade.assetName}' closes row ${match.row} holding ${match.quantity.toString()}`,
      );
    }

    const closed = this.store.recordSale(match.row, {
      sellDate: trade.date,
      sellQuantity: trade.quantity,
      sellPrice: trade.pricePerUnit,
      fee: trade.fee,
      taxes: trade.taxes,
    });
    this.store.commit();
    this.logger.log(`SELL '${trade.assetName}' closed row ${match.row} ('${match.assetName}')`);
    return closed;
  }

  /** Open positions in ledger order */
  getOpenPositions(): Position[] {
    return this.store.readPositions().filter(isOpen);
  }

  private findOpenMatch(assetName: string): Position | undefined {
    for (const position of this.getOpenPositions()) {
      const comparison = compareAssetNames(position.assetName, assetName);
      this.logger.debug(
        `row ${position.row} '${position.assetName}' vs '${assetName}': score ${comparison.score.toFixed(2)} [${comparison.shared.join(' ')}]`,
      );
      if (comparison.matched) {
        return position;
      }
    }
    return undefined;
  }
}
