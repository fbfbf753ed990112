import { Injectable, Logger } from '@nestjs/common';
import { mergeKeyOf, SourceFormat, TradeRecord, UNKNOWN_ASSET } from '../documents/entities/trade-record.entity';

// Contract notes carry executed prices and final fees; statements come next;
// cost information only estimates the order.
const SOURCE_PRIORITY: Record<SourceFormat, number> = {
  [SourceFormat.CONTRACT_NOTE]: 3,
  [SourceFormat.STATEMENT]: 2,
  [SourceFormat.COST_INFO]: 1,
};

// Collapses documents describing the same event (equal merge key) into one record.
@Injectable()
export class TradeMergerService {
  private readonly logger = new Logger(TradeMergerService.name);

  /**
   * Returns one record per merge key, in first-seen order.
   * Input order is processing order: later records win priority ties.
   */
  merge(records: TradeRecord[]): TradeRecord[] {
    const groups = new Map<string, TradeRecord[]>();
    for (const record of records) {
      const key = mergeKeyOf(record);
      const group = groups.get(key);
      if (group) {
        group.push(record);
      } else {
        groups.set(key, [record]);
      }
    }

    return Array.from(groups.entries()).map(([key, group]) =>
      group.length === 1 ? group[0] : this.resolve(key, group),
    );
  }

  // Highest source priority wins the numbers. Cost information, when it lost,
  // still donates its instrument description.
  private resolve(key: string, group: TradeRecord[]): TradeRecord {
    const winner = group.reduce((best, candidate) =>
      SOURCE_PRIORITY[candidate.sourceFormat] >= SOURCE_PRIORITY[best.sourceFormat] ? candidate : best,
    );

    const nameDonor = winner.sourceFormat === SourceFormat.COST_INFO
      ? undefined
      : [...group].reverse().find(
          (record) => record.sourceFormat === SourceFormat.COST_INFO && record.assetName !== UNKNOWN_ASSET,
        );

    this.logger.debug(
      `Duplicate ${key}: ${group.map((r) => `${r.sourceFormat}('${r.assetName}')`).join(', ')} -> ${winner.sourceFormat}` +
        (nameDonor ? ` named '${nameDonor.assetName}'` : ''),
    );

    return {
      ...winner,
      assetName: nameDonor ? nameDonor.assetName : winner.assetName,
      documentIds: group.flatMap((record) => record.documentIds),
    };
  }
}
