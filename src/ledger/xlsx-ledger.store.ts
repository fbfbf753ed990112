import { Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { existsSync } from 'fs';
import * as XLSX from 'xlsx';
import { LedgerUnavailableError } from '../common/errors/trade-import.errors';
import { toNumber, tryParseDecimal } from '../common/utils/decimal.util';
import {
  excelSerialToIsoDate,
  isoDateToExcelSerial,
  IsoDate,
  parseGermanDate,
  parseIsoDate,
} from '../common/utils/date.util';
import { Position, PositionOpening, PositionSale, PositionStatus } from './entities/position.entity';
import { LedgerStore } from './ledger-store.interface';

// Header captions identifying each column; column order is up to the sheet.
export const LEDGER_COLUMNS = {
  assetName: 'Asset',
  buyDate: 'Buy Date',
  quantity: 'Quantity',
  buyPrice: 'Buy Price',
  sellDate: 'Sell Date',
  sellQuantity: 'Sell Quantity',
  sellPrice: 'Sell Price',
  fee: 'Trading Fee',
  taxes: 'Taxes',
} as const;

type LedgerField = keyof typeof LEDGER_COLUMNS;
type OptionalField = 'fee' | 'taxes';
type RequiredField = Exclude<LedgerField, OptionalField>;
type LedgerColumns = Record<RequiredField, number> & Partial<Record<OptionalField, number>>;

interface OpenLedger {
  workbook: XLSX.WorkBook;
  sheet: XLSX.WorkSheet;
  columns: LedgerColumns;
}

const DATE_FORMAT = 'dd.mm.yyyy';
const HEADER_ROW = 0;
// Error codes raised while another program (usually the spreadsheet app) holds the file
const LOCKED_CODES = new Set(['EBUSY', 'EPERM', 'EACCES']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function describeFailure(error: unknown): string {
  const code = errorCode(error);
  if (code && LOCKED_CODES.has(code)) {
    return `file is locked (${code})`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Ledger kept in the first sheet of a spreadsheet workbook. Columns are found
 * by header caption, so extra columns (formulas, notes) are left untouched.
 * A missing workbook is created with just the header row on first commit.
 */
export class XlsxLedgerStore implements LedgerStore {
  private readonly logger = new Logger(XlsxLedgerStore.name);
  private ledger?: OpenLedger;

  constructor(readonly location: string) {}

  readPositions(): Position[] {
    const { sheet } = this.open();
    const positions: Position[] = [];
    for (let row = HEADER_ROW + 1; row <= this.lastRow(sheet); row++) {
      const position = this.readRow(row);
      if (position) {
        positions.push(position);
      }
    }
    return positions;
  }

  appendPosition(opening: PositionOpening): Position {
    const { sheet, columns } = this.open();
    const row = this.lastAssetRow() + 1;

    this.setCell(sheet, row, columns.assetName, { t: 's', v: opening.assetName });
    this.setDate(sheet, row, columns.buyDate, opening.buyDate);
    this.setNumber(sheet, row, columns.quantity, opening.quantity);
    this.setNumber(sheet, row, columns.buyPrice, opening.buyPrice);

    return { row, status: PositionStatus.OPEN, ...opening };
  }

  recordSale(row: number, sale: PositionSale): Position {
    const { sheet, columns } = this.open();
    if (!this.readRow(row)) {
      throw new LedgerUnavailableError(this.location, `row ${row + 1} holds no position`);
    }

    this.setDate(sheet, row, columns.sellDate, sale.sellDate);
    this.setNumber(sheet, row, columns.sellQuantity, sale.sellQuantity);
    this.setNumber(sheet, row, columns.sellPrice, sale.sellPrice);
    if (columns.fee !== undefined) {
      this.setNumber(sheet, row, columns.fee, sale.fee);
    }
    if (columns.taxes !== undefined) {
      this.setNumber(sheet, row, columns.taxes, sale.taxes);
    }

    const position = this.readRow(row);
    if (!position) {
      throw new LedgerUnavailableError(this.location, `row ${row + 1} vanished while writing`);
    }
    return position;
  }

  commit(): void {
    const { workbook } = this.open();
    try {
      XLSX.writeFile(workbook, this.location);
    } catch (error) {
      throw new LedgerUnavailableError(this.location, describeFailure(error), { cause: error });
    }
  }

  private open(): OpenLedger {
    if (this.ledger) {
      return this.ledger;
    }

    let workbook: XLSX.WorkBook;
    if (existsSync(this.location)) {
      try {
        workbook = XLSX.readFile(this.location);
      } catch (error) {
        throw new LedgerUnavailableError(this.location, describeFailure(error), { cause: error });
      }
    } else {
      this.logger.warn(`Ledger ${this.location} not found, starting a new one`);
      workbook = XLSX.utils.book_new();
      const header = Object.values(LEDGER_COLUMNS);
      XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([header]), 'Trades');
    }

    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
    if (!sheet) {
      throw new LedgerUnavailableError(this.location, 'workbook has no sheets');
    }

    this.ledger = { workbook, sheet, columns: this.readHeader(sheet) };
    return this.ledger;
  }

  private readHeader(sheet: XLSX.WorkSheet): LedgerColumns {
    const captions = new Map<string, number>();
    const lastColumn = sheet['!ref'] ? XLSX.utils.decode_range(sheet['!ref']).e.c : -1;
    for (let column = 0; column <= lastColumn; column++) {
      const caption = this.text(sheet, HEADER_ROW, column);
      if (caption && !captions.has(caption)) {
        captions.set(caption, column);
      }
    }

    const required = (field: RequiredField): number => {
      const column = captions.get(LEDGER_COLUMNS[field]);
      if (column === undefined) {
        throw new LedgerUnavailableError(this.location, `missing column '${LEDGER_COLUMNS[field]}'`);
      }
      return column;
    };
    const optional = (field: OptionalField): number | undefined => {
      const column = captions.get(LEDGER_COLUMNS[field]);
      if (column === undefined) {
        this.logger.warn(`Column '${LEDGER_COLUMNS[field]}' not found, ${field} will not be recorded`);
      }
      return column;
    };

    return {
      assetName: required('assetName'),
      buyDate: required('buyDate'),
      quantity: required('quantity'),
      buyPrice: required('buyPrice'),
      sellDate: required('sellDate'),
      sellQuantity: required('sellQuantity'),
      sellPrice: required('sellPrice'),
      fee: optional('fee'),
      taxes: optional('taxes'),
    };
  }

  private readRow(row: number): Position | null {
    const { sheet, columns } = this.open();
    const assetName = this.text(sheet, row, columns.assetName);
    if (!assetName) {
      return null;
    }

    // Any content in the sell date cell closes the row, readable or not.
    const closed = this.text(sheet, row, columns.sellDate) !== '';
    const position: Position = {
      row,
      status: closed ? PositionStatus.CLOSED : PositionStatus.OPEN,
      assetName,
      buyDate: this.date(sheet, row, columns.buyDate),
      quantity: this.decimal(sheet, row, columns.quantity) ?? new Decimal(0),
      buyPrice: this.decimal(sheet, row, columns.buyPrice) ?? new Decimal(0),
    };
    if (closed) {
      position.sale = {
        sellDate: this.date(sheet, row, columns.sellDate) ?? undefined,
        sellQuantity: this.decimal(sheet, row, columns.sellQuantity) ?? undefined,
        sellPrice: this.decimal(sheet, row, columns.sellPrice) ?? undefined,
        fee: columns.fee === undefined ? undefined : this.decimal(sheet, row, columns.fee) ?? undefined,
        taxes: columns.taxes === undefined ? undefined : this.decimal(sheet, row, columns.taxes) ?? undefined,
      };
    }
    return position;
  }

  private lastRow(sheet: XLSX.WorkSheet): number {
    return sheet['!ref'] ? XLSX.utils.decode_range(sheet['!ref']).e.r : HEADER_ROW;
  }

  // Trailing rows with formulas but no asset do not count as used.
  private lastAssetRow(): number {
    const { sheet, columns } = this.open();
    for (let row = this.lastRow(sheet); row > HEADER_ROW; row--) {
      if (this.text(sheet, row, columns.assetName)) {
        return row;
      }
    }
    return HEADER_ROW;
  }

  private cell(sheet: XLSX.WorkSheet, row: number, column: number): XLSX.CellObject | undefined {
    return sheet[XLSX.utils.encode_cell({ r: row, c: column })];
  }

  private text(sheet: XLSX.WorkSheet, row: number, column: number): string {
    const value = this.cell(sheet, row, column)?.v;
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number') return String(value);
    if (value instanceof Date) return value.toISOString();
    return '';
  }

  private date(sheet: XLSX.WorkSheet, row: number, column: number): IsoDate | null {
    const value = this.cell(sheet, row, column)?.v;
    if (typeof value === 'number') return excelSerialToIsoDate(value);
    if (value instanceof Date) return value.toISOString().slice(0, 10);
    if (typeof value === 'string') return parseGermanDate(value) ?? parseIsoDate(value);
    return null;
  }

  private decimal(sheet: XLSX.WorkSheet, row: number, column: number): Decimal | null {
    const value = this.cell(sheet, row, column)?.v;
    if (typeof value === 'number' && Number.isFinite(value)) return new Decimal(value);
    if (typeof value === 'string') return tryParseDecimal(value);
    return null;
  }

  private setDate(sheet: XLSX.WorkSheet, row: number, column: number, date: IsoDate): void {
    this.setCell(sheet, row, column, { t: 'n', v: isoDateToExcelSerial(date), z: DATE_FORMAT });
  }

  private setNumber(sheet: XLSX.WorkSheet, row: number, column: number, value: Decimal): void {
    this.setCell(sheet, row, column, { t: 'n', v: toNumber(value) });
  }

  private setCell(sheet: XLSX.WorkSheet, row: number, column: number, cell: XLSX.CellObject): void {
    sheet[XLSX.utils.encode_cell({ r: row, c: column })] = cell;
    const range = XLSX.utils.decode_range(sheet['!ref'] ?? 'A1');
    range.e.r = Math.max(range.e.r, row);
    range.e.c = Math.max(range.e.c, column);
    sheet['!ref'] = XLSX.utils.encode_range(range);
  }
}
