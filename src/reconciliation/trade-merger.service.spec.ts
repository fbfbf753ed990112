import { Test, TestingModule } from '@nestjs/testing';
import Decimal from 'decimal.js';
import { SourceFormat, TradeType, UNKNOWN_ASSET } from '../documents/entities/trade-record.entity';
import { buildTrade } from '../../test/trade-record.factory';
import { TradeMergerService } from './trade-merger.service';

describe('TradeMergerService', () => {
  let service: TradeMergerService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [TradeMergerService],
    }).compile();

    service = module.get<TradeMergerService>(TradeMergerService);
  });

  it('should return unrelated records unchanged and in order', () => {
    const buy = buildTrade();
    const sell = buildTrade({ tradeType: TradeType.SELL });
    const other = buildTrade({ quantity: new Decimal(10) });

    expect(service.merge([buy, sell, other])).toEqual([buy, sell, other]);
  });

  it('should take numbers from the contract note and the name from cost information', () => {
    const costInfo = buildTrade({
      sourceFormat: SourceFormat.COST_INFO,
      assetName: 'HVB Put 17.12.25 NVIDIA 200',
      pricePerUnit: new Decimal('0.46'),
      fee: new Decimal('0.99'),
    });
    const contractNote = buildTrade({ assetName: 'NVIDIA Put 200,00 $ HVB' });

    const [merged, ...rest] = service.merge([costInfo, contractNote]);

    expect(rest).toHaveLength(0);
    expect(merged.id).toBe(contractNote.id);
    expect(merged.sourceFormat).toBe(SourceFormat.CONTRACT_NOTE);
    expect(merged.assetName).toBe('HVB Put 17.12.25 NVIDIA 200');
    expect(merged.pricePerUnit.toNumber()).toBe(0.45);
    expect(merged.fee.toNumber()).toBe(0);
    expect(merged.documentIds).toEqual([...costInfo.documentIds, ...contractNote.documentIds]);
  });

  it('should prefer a statement over cost information', () => {
    const statement = buildTrade({ sourceFormat: SourceFormat.STATEMENT, assetName: 'Apple Inc.', taxes: new Decimal('21.1') });
    const costInfo = buildTrade({ sourceFormat: SourceFormat.COST_INFO, assetName: 'Apple Inc. Registered Shares' });

    const [merged] = service.merge([statement, costInfo]);

    expect(merged.sourceFormat).toBe(SourceFormat.STATEMENT);
    expect(merged.taxes.toNumber()).toBe(21.1);
    expect(merged.assetName).toBe('Apple Inc. Registered Shares');
  });

  it('should let the later record win a priority tie', () => {
    const first = buildTrade({ pricePerUnit: new Decimal('0.40') });
    const second = buildTrade({ pricePerUnit: new Decimal('0.45') });

    const [merged] = service.merge([first, second]);

    expect(merged.id).toBe(second.id);
    expect(merged.pricePerUnit.toNumber()).toBe(0.45);
  });

  it('should not donate the placeholder name', () => {
    const costInfo = buildTrade({ sourceFormat: SourceFormat.COST_INFO, assetName: UNKNOWN_ASSET });
    const contractNote = buildTrade({ assetName: 'NVIDIA Put 200,00 $ HVB' });

    expect(service.merge([contractNote, costInfo])[0].assetName).toBe('NVIDIA Put 200,00 $ HVB');
  });

  it('should keep a cost information record that has no better source', () => {
    const first = buildTrade({ sourceFormat: SourceFormat.COST_INFO, assetName: 'Older estimate' });
    const second = buildTrade({ sourceFormat: SourceFormat.COST_INFO, assetName: 'Newer estimate' });

    const [merged] = service.merge([first, second]);

    expect(merged.assetName).toBe('Newer estimate');
    expect(merged.documentIds).toHaveLength(2);
  });

  it('should collapse all three formats into one record', () => {
    const statement = buildTrade({ sourceFormat: SourceFormat.STATEMENT });
    const contractNote = buildTrade();
    const costInfo = buildTrade({ sourceFormat: SourceFormat.COST_INFO, assetName: 'Cost info name' });

    const merged = service.merge([statement, contractNote, costInfo]);

    expect(merged).toHaveLength(1);
    expect(merged[0].id).toBe(contractNote.id);
    expect(merged[0].assetName).toBe('Cost info name');
    expect(merged[0].documentIds).toEqual([
      ...statement.documentIds,
      ...contractNote.documentIds,
      ...costInfo.documentIds,
    ]);
  });

  it('should treat equal quantities with different scale as the same trade', () => {
    const records = [buildTrade({ quantity: new Decimal('72.00') }), buildTrade({ quantity: new Decimal(72) })];
    expect(service.merge(records)).toHaveLength(1);
  });
});
