import { classifyDocument } from './document-classifier';
import { SourceFormat } from './entities/trade-record.entity';
import { loadFixture } from '../../test/fixture.util';

describe('classifyDocument', () => {
  it.each([
    ['statement-sale.txt', SourceFormat.STATEMENT],
    ['statement-purchase.txt', SourceFormat.STATEMENT],
    ['contract-note-sell.txt', SourceFormat.CONTRACT_NOTE],
    ['contract-note-buy.txt', SourceFormat.CONTRACT_NOTE],
    ['cost-info-buy.txt', SourceFormat.COST_INFO],
    ['cost-info-quoted.txt', SourceFormat.COST_INFO],
  ])('should classify %s', (fixture, format) => {
    expect(classifyDocument(loadFixture(fixture))).toBe(format);
  });

  it('should return null without any marker', () => {
    expect(classifyDocument(loadFixture('unrecognized.txt'))).toBeNull();
    expect(classifyDocument('')).toBeNull();
  });

  it('should prefer the statement when several markers are present', () => {
    expect(classifyDocument('Contract note\nTransaction Statement: Sale')).toBe(SourceFormat.STATEMENT);
  });

  it('should prefer the contract note over cost information', () => {
    expect(classifyDocument('Ex-Ante cost information\nAbrechnung')).toBe(SourceFormat.CONTRACT_NOTE);
  });

  it('should match markers case-sensitively', () => {
    expect(classifyDocument('contract note')).toBeNull();
  });
});
