import { SourceFormat } from './entities/trade-record.entity';

// Checked in order; the first format with a marker present wins.
const FORMAT_MARKERS: ReadonlyArray<[SourceFormat, readonly string[]]> = [
  [SourceFormat.STATEMENT, ['Transaction Statement']],
  [SourceFormat.CONTRACT_NOTE, ['Contract note', 'Abrechnung']],
  [SourceFormat.COST_INFO, ['Ex-Ante cost information', 'Kostentransparenz']],
];

/** Picks the document format from marker phrases, or null if none is present. */
export function classifyDocument(text: string): SourceFormat | null {
  for (const [format, markers] of FORMAT_MARKERS) {
    if (markers.some((marker) => text.includes(marker))) {
      return format;
    }
  }
  return null;
}
