// Calendar dates travel through the pipeline as ISO `YYYY-MM-DD` strings.
export type IsoDate = string;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const GERMAN_DATE = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;
const MS_PER_DAY = 86_400_000;
// 1899-12-30, day zero of the 1900 spreadsheet date system
const EXCEL_EPOCH = Date.UTC(1899, 11, 30);

function build(year: number, month: number, day: number): IsoDate | null {
  const ts = Date.UTC(year, month - 1, day);
  const check = new Date(ts);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/** `2025-12-17` → `2025-12-17`, or null for impossible dates. */
export function parseIsoDate(text: string): IsoDate | null {
  const match = ISO_DATE.exec(text.trim());
  return match ? build(Number(match[1]), Number(match[2]), Number(match[3])) : null;
}

/** `17.12.2025` → `2025-12-17`, or null for impossible dates. */
export function parseGermanDate(text: string): IsoDate | null {
  const match = GERMAN_DATE.exec(text.trim());
  return match ? build(Number(match[3]), Number(match[2]), Number(match[1])) : null;
}

export function isoDateToExcelSerial(date: IsoDate): number {
  const match = ISO_DATE.exec(date);
  if (!match) {
    throw new Error(`Not an ISO date: ${date}`);
  }
  const ts = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  return Math.round((ts - EXCEL_EPOCH) / MS_PER_DAY);
}

export function excelSerialToIsoDate(serial: number): IsoDate {
  const day = new Date(EXCEL_EPOCH + Math.floor(serial) * MS_PER_DAY);
  return day.toISOString().slice(0, 10);
}

/** Displays an ISO date the way the source documents print it. */
export function formatGermanDate(date: IsoDate): string {
  const [year, month, day] = date.split('-');
  return `${day}.${month}.${year}`;
}
