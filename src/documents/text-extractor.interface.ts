// A document waiting in the inbox. `id` is what logs and the batch driver use.
export interface PendingDocument {
  id: string;
  path: string;
}

export interface TextExtractor {
  /** Flattens the document to plain text. Rejects when the file cannot be read. */
  extract(document: PendingDocument): Promise<string>;
}

export const TEXT_EXTRACTOR = Symbol('TEXT_EXTRACTOR');
