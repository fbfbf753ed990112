import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { PendingDocument, TextExtractor } from './text-extractor.interface';

// pdf-parse is loaded on first use; its index module runs a self-test when
// required without a parent module.
@Injectable()
export class PdfTextExtractor implements TextExtractor {
  private readonly logger = new Logger(PdfTextExtractor.name);

  async extract(document: PendingDocument): Promise<string> {
    const buffer = await readFile(document.path);
    const { default: pdfParse } = await import('pdf-parse');
    const result = await pdfParse(buffer);
    this.logger.debug(`${document.id}: ${result.numpages} page(s), ${result.text.length} chars`);
    return result.text;
  }
}
