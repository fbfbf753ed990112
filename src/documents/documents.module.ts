import { Module } from '@nestjs/common';
import { DocumentParserService } from './document-parser.service';
import { PdfTextExtractor } from './pdf-text-extractor.service';
import { TEXT_EXTRACTOR } from './text-extractor.interface';

@Module({
  providers: [
    DocumentParserService,
    { provide: TEXT_EXTRACTOR, useClass: PdfTextExtractor },
  ],
  exports: [DocumentParserService, TEXT_EXTRACTOR],
})
export class DocumentsModule {}
