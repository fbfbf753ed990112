import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { DocumentUnrecognizedError } from '../common/errors/trade-import.errors';
import { classifyDocument } from './document-classifier';
import { TradeRecord } from './entities/trade-record.entity';
import { FORMAT_PARSERS } from './parsers';

// Classifies raw document text and routes it to the matching format parser.
@Injectable()
export class DocumentParserService {
  private readonly logger = new Logger(DocumentParserService.name);

  /**
   * @throws DocumentUnrecognizedError when no format marker is present
   * @throws FieldExtractionError when a required field is missing
   */
  parse(documentId: string, text: string): TradeRecord {
    const format = classifyDocument(text);
    if (!format) {
      throw new DocumentUnrecognizedError(documentId);
    }

    const parsed = FORMAT_PARSERS[format](text);
    const record: TradeRecord = { ...parsed, id: uuidv4(), documentIds: [documentId] };

    this.logger.debug(
      `${documentId} (${format}): ${record.tradeType} ${record.quantity.toString()} x '${record.assetName}' on ${record.date}`,
    );
    return record;
  }
}
