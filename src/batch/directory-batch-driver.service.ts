import { Injectable, Logger } from '@nestjs/common';
import { mkdir, readdir, rename, unlink } from 'fs/promises';
import { join } from 'path';
import { PipelineConfig } from '../config/pipeline.config';
import { PendingDocument } from '../documents/text-extractor.interface';
import { BatchDriver } from './batch-driver.interface';

// Inbox directory of PDFs. Consumed files are deleted, or moved to the archive
// directory when one is configured.
@Injectable()
export class DirectoryBatchDriver implements BatchDriver {
  private readonly logger = new Logger(DirectoryBatchDriver.name);

  constructor(private readonly config: PipelineConfig) {}

  async pendingDocuments(): Promise<PendingDocument[]> {
    await mkdir(this.config.documentsDir, { recursive: true });
    const entries = await readdir(this.config.documentsDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.pdf'))
      .map((entry) => entry.name)
      .sort()
      .map((name) => ({ id: name, path: join(this.config.documentsDir, name) }));
  }

  async consumed(document: PendingDocument): Promise<void> {
    if (this.config.archiveDir) {
      await mkdir(this.config.archiveDir, { recursive: true });
      await rename(document.path, join(this.config.archiveDir, document.id));
      this.logger.debug(`Archived ${document.id}`);
    } else {
      await unlink(document.path);
      this.logger.debug(`Deleted ${document.id}`);
    }
  }

  async retained(document: PendingDocument, reason: string): Promise<void> {
    this.logger.warn(`Keeping ${document.id}: ${reason}`);
  }
}
