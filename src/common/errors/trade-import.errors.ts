import { IsoDate } from '../utils/date.util';

// Base for every failure the import pipeline reports.
// Only fatal errors stop the batch; the rest skip one document or trade.
export abstract class TradeImportError extends Error {
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No format marker found in the document text. */
export class DocumentUnrecognizedError extends TradeImportError {
  readonly fatal = false;

  constructor(readonly documentId: string) {
    super(`Unknown document format: ${documentId}`);
  }
}

/** A required field could not be resolved inside a recognized format. */
export class FieldExtractionError extends TradeImportError {
  readonly fatal = false;

  constructor(
    readonly format: string,
    readonly field: string,
  ) {
    super(`${format}: could not extract ${field}`);
  }
}

/** A sale found no open position with a similar asset name. */
export class NoMatchingPositionError extends TradeImportError {
  readonly fatal = false;

  constructor(
    readonly assetName: string,
    readonly date: IsoDate,
  ) {
    super(`No open position matches sale of '${assetName}' on ${date}`);
  }
}

/** The ledger store cannot be read or written (usually locked by another process). */
export class LedgerUnavailableError extends TradeImportError {
  readonly fatal = true;

  constructor(
    readonly location: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Ledger ${location} unavailable: ${reason}`, options);
  }
}
