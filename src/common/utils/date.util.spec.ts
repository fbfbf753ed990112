import {
  excelSerialToIsoDate,
  formatGermanDate,
  isoDateToExcelSerial,
  parseGermanDate,
  parseIsoDate,
} from './date.util';

describe('date.util', () => {
  it('should convert German dates to ISO', () => {
    expect(parseGermanDate('17.12.2025')).toBe('2025-12-17');
    expect(parseGermanDate('3.1.2025')).toBe('2025-01-03');
  });

  it('should reject impossible calendar dates', () => {
    expect(parseGermanDate('31.02.2025')).toBeNull();
    expect(parseIsoDate('2025-13-01')).toBeNull();
    expect(parseIsoDate('17.12.2025')).toBeNull();
  });

  it('should accept valid ISO dates', () => {
    expect(parseIsoDate('2024-02-29')).toBe('2024-02-29');
  });

  it('should map ISO dates to spreadsheet serial numbers and back', () => {
    expect(isoDateToExcelSerial('1900-01-01')).toBe(2);
    expect(isoDateToExcelSerial('2025-01-01')).toBe(45658);
    expect(excelSerialToIsoDate(45658)).toBe('2025-01-01');
    expect(excelSerialToIsoDate(45658.75)).toBe('2025-01-01');
  });

  it('should format ISO dates for display', () => {
    expect(formatGermanDate('2025-12-17')).toBe('17.12.2025');
  });
});
