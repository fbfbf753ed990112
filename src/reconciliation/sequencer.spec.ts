import { TradeType } from '../documents/entities/trade-record.entity';
import { buildTrade } from '../../test/trade-record.factory';
import { sequenceTrades } from './sequencer';

describe('sequenceTrades', () => {
  it('should order by date ascending', () => {
    const late = buildTrade({ date: '2025-12-01' });
    const early = buildTrade({ date: '2025-01-15' });
    const middle = buildTrade({ date: '2025-06-30' });

    expect(sequenceTrades([late, early, middle]).map((trade) => trade.id)).toEqual([early.id, middle.id, late.id]);
  });

  it('should put buys before sells on the same day', () => {
    const sell = buildTrade({ date: '2025-03-14', tradeType: TradeType.SELL });
    const buy = buildTrade({ date: '2025-03-14', tradeType: TradeType.BUY });

    expect(sequenceTrades([sell, buy]).map((trade) => trade.id)).toEqual([buy.id, sell.id]);
  });

  it('should keep input order for identical date and side', () => {
    const first = buildTrade({ assetName: 'First' });
    const second = buildTrade({ assetName: 'Second' });

    expect(sequenceTrades([first, second]).map((trade) => trade.assetName)).toEqual(['First', 'Second']);
  });

  it('should not mutate its input', () => {
    const input = [buildTrade({ date: '2025-02-02' }), buildTrade({ date: '2025-01-01' })];
    const ids = input.map((trade) => trade.id);

    sequenceTrades(input);

    expect(input.map((trade) => trade.id)).toEqual(ids);
  });
});
