import { PendingDocument } from '../documents/text-extractor.interface';

export interface BatchDriver {
  /** Documents waiting to be imported, in processing order. */
  pendingDocuments(): Promise<PendingDocument[]>;

  /** The document's trade is in the ledger; it may be deleted or archived. */
  consumed(document: PendingDocument): Promise<void>;

  /** The document stays in place for another run or manual inspection. */
  retained(document: PendingDocument, reason: string): Promise<void>;
}

export const BATCH_DRIVER = Symbol('BATCH_DRIVER');
