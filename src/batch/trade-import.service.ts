import { Inject, Injectable, Logger } from '@nestjs/common';
import { NoMatchingPositionError, TradeImportError } from '../common/errors/trade-import.errors';
import { DocumentParserService } from '../documents/document-parser.service';
import { TradeRecord, TradeType } from '../documents/entities/trade-record.entity';
import { PendingDocument, TEXT_EXTRACTOR, TextExtractor } from '../documents/text-extractor.interface';
import { PositionLedgerService } from '../ledger/position-ledger.service';
import { sequenceTrades } from '../reconciliation/sequencer';
import { TradeMergerService } from '../reconciliation/trade-merger.service';
import { BATCH_DRIVER, BatchDriver } from './batch-driver.interface';

export interface ImportSummary {
  documents: number;
  consumed: number;
  retained: number;
  buys: number;
  sells: number;
  unmatchedSells: number;
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One pass over the pending documents: extract, parse, merge duplicates,
 * sequence, apply to the ledger.
 * Document-level problems skip that document and unmatched sales keep their
 * documents; a LedgerUnavailableError aborts the run and is rethrown, leaving
 * every not yet consumed document in place.
 */
@Injectable()
export class TradeImportService {
  private readonly logger = new Logger(TradeImportService.name);

  constructor(
    @Inject(TEXT_EXTRACTOR) private readonly textExtractor: TextExtractor,
    @Inject(BATCH_DRIVER) private readonly batchDriver: BatchDriver,
    private readonly documentParser: DocumentParserService,
    private readonly merger: TradeMergerService,
    private readonly ledger: PositionLedgerService,
  ) {}

  async run(): Promise<ImportSummary> {
    const documents = await this.batchDriver.pendingDocuments();
    const summary: ImportSummary = { documents: documents.length, consumed: 0, retained: 0, buys: 0, sells: 0, unmatchedSells: 0 };
    if (documents.length === 0) {
      this.logger.log('No pending documents');
      return summary;
    }

    this.logger.log(`Reading ${documents.length} document(s)`);
    const byId = new Map(documents.map((document) => [document.id, document]));
    const records: TradeRecord[] = [];
    for (const document of documents) {
      const record = await this.read(document);
      if (record) {
        records.push(record);
      } else {
        summary.retained++;
      }
    }

    const trades = sequenceTrades(this.merger.merge(records));
    this.logger.log(`Applying ${trades.length} trade(s) from ${records.length} parsed document(s)`);

    for (const trade of trades) {
      const sources = trade.documentIds.flatMap((id) => byId.get(id) ?? []);
      try {
        this.ledger.apply(trade);
      } catch (error) {
        if (!(error instanceof NoMatchingPositionError)) {
          throw error;
        }
        this.logger.warn(error.message);
        summary.unmatchedSells++;
        summary.retained += sources.length;
        for (const document of sources) {
          await this.batchDriver.retained(document, error.message);
        }
        continue;
      }

      if (trade.tradeType === TradeType.BUY) summary.buys++;
      else summary.sells++;
      for (const document of sources) {
        await this.release(document);
        summary.consumed++;
      }
    }

    this.logger.log(
      `Done: ${summary.buys} buy(s), ${summary.sells} sell(s), ${summary.unmatchedSells} unmatched, ` +
        `${summary.consumed} consumed, ${summary.retained} retained`,
    );
    return summary;
  }

  // The trade is already committed; a file that cannot be removed is only reported.
  private async release(document: PendingDocument): Promise<void> {
    try {
      await this.batchDriver.consumed(document);
    } catch (error) {
      this.logger.error(`Trade of ${document.id} is in the ledger but the file could not be removed: ${reasonOf(error)}`);
    }
  }

  // Extraction and parse failures are reported and the document is kept.
  private async read(document: PendingDocument): Promise<TradeRecord | null> {
    try {
      const text = await this.textExtractor.extract(document);
      return this.documentParser.parse(document.id, text);
    } catch (error) {
      const reason = reasonOf(error);
      if (error instanceof TradeImportError) {
        this.logger.warn(reason);
      } else {
        this.logger.error(`Could not read ${document.id}: ${reason}`);
      }
      await this.batchDriver.retained(document, reason);
      return null;
    }
  }
}
