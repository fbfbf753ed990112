#!/usr/bin/env node
import 'reflect-metadata';
import { Logger, Module } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { basename } from 'path';
import { logLevelsFor } from './config/pipeline.config';
import { formatGermanDate } from './common/utils/date.util';
import { classifyDocument } from './documents/document-classifier';
import { DocumentParserService } from './documents/document-parser.service';
import { DocumentsModule } from './documents/documents.module';
import { TEXT_EXTRACTOR, TextExtractor } from './documents/text-extractor.interface';

@Module({ imports: [DocumentsModule] })
class InspectModule {}

// Diagnostic dump for one document: extracted text, detected format and the
// parse result. Nothing is written to the ledger or the inbox.
async function inspect(path: string): Promise<void> {
  const app = await NestFactory.createApplicationContext(InspectModule, {
    logger: logLevelsFor({ debug: true }),
  });

  try {
    const document = { id: basename(path), path };
    const text = await app.get<TextExtractor>(TEXT_EXTRACTOR).extract(document);

    process.stdout.write(`===== ${document.id}: extracted text =====\n${text}\n`);
    process.stdout.write(`===== format: ${classifyDocument(text) ?? 'unrecognized'} =====\n`);

    const record = app.get(DocumentParserService).parse(document.id, text);
    process.stdout.write(
      [
        `type:     ${record.tradeType}`,
        `date:     ${formatGermanDate(record.date)}`,
        `asset:    ${record.assetName}`,
        `quantity: ${record.quantity.toString()}`,
        `price:    ${record.pricePerUnit.toString()}`,
        `fee:      ${record.fee.toString()}`,
        `taxes:    ${record.taxes.toString()}`,
      ].join('\n') + '\n',
    );
  } finally {
    await app.close();
  }
}

const [path] = process.argv.slice(2);
if (!path) {
  process.stderr.write('usage: trade-ledger-inspect <document.pdf>\n');
  process.exitCode = 2;
} else {
  inspect(path).catch((error: unknown) => {
    new Logger('Inspect').error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
