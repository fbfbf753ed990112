import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import Decimal from 'decimal.js';
import { NoMatchingPositionError } from '../common/errors/trade-import.errors';
import { TradeType } from '../documents/entities/trade-record.entity';
import { buildTrade } from '../../test/trade-record.factory';
import { PositionStatus } from './entities/position.entity';
import { InMemoryLedgerStore } from './in-memory-ledger.store';
import { LEDGER_STORE } from './ledger-store.interface';
import { PositionLedgerService } from './position-ledger.service';

describe('PositionLedgerService', () => {
  let service: PositionLedgerService;
  let store: InMemoryLedgerStore;

  const opening = (assetName: string, quantity = 500) => ({
    assetName,
    buyDate: '2025-11-03',
    quantity: new Decimal(quantity),
    buyPrice: new Decimal('0.45'),
  });

  const createService = async (ledger: InMemoryLedgerStore): Promise<void> => {
    store = ledger;
    const module: TestingModule = await Test.createTestingModule({
      providers: [PositionLedgerService, { provide: LEDGER_STORE, useValue: store }],
    }).compile();

    service = module.get<PositionLedgerService>(PositionLedgerService);
  };

  describe('buys', () => {
    beforeEach(() => createService(new InMemoryLedgerStore()));

    it('should open a new position and commit', () => {
      const position = service.apply(buildTrade({ assetName: 'Apple Inc.', date: '2025-03-14' }));

      expect(position.row).toBe(1);
      expect(position.status).toBe(PositionStatus.OPEN);
      expect(position.assetName).toBe('Apple Inc.');
      expect(position.buyDate).toBe('2025-03-14');
      expect(position.buyPrice.toNumber()).toBe(0.45);
      expect(store.getCommitCount()).toBe(1);
    });

    it('should open a second position for a repeated buy', () => {
      service.apply(buildTrade({ assetName: 'Apple Inc.' }));
      service.apply(buildTrade({ assetName: 'Apple Inc.' }));

      expect(service.getOpenPositions().map((position) => position.row)).toEqual([1, 2]);
      expect(store.getCommitCount()).toBe(2);
    });
  });

  describe('sells', () => {
    const sell = (assetName: string, quantity = 500) =>
      buildTrade({
        tradeType: TradeType.SELL,
        date: '2025-12-10',
        assetName,
        quantity: new Decimal(quantity),
        pricePerUnit: new Decimal('0.9'),
        fee: new Decimal('0.99'),
        taxes: new Decimal('4.5'),
      });

    beforeEach(() =>
      createService(
        new InMemoryLedgerStore([
          opening('Apple Inc.', 50),
          opening('NVIDIA Put 200,00 $ HVB'),
          opening('HVB Put 17.12.25 NVIDIA 200'),
        ]),
      ),
    );

    it('should close the first similar open position', () => {
      const closed = service.apply(sell('NVIDIA Put 200 HVB'));

      expect(closed.row).toBe(2);
      expect(closed.status).toBe(PositionStatus.CLOSED);
      expect(closed.sale?.sellDate).toBe('2025-12-10');
      expect(closed.sale?.sellPrice?.toNumber()).toBe(0.9);
      expect(closed.sale?.fee?.toNumber()).toBe(0.99);
      expect(closed.sale?.taxes?.toNumber()).toBe(4.5);
      expect(service.getOpenPositions().map((position) => position.row)).toEqual([1, 3]);
      expect(store.getCommitCount()).toBe(1);
    });

    it('should skip positions that are already closed', () => {
      service.apply(sell('NVIDIA Put 200 HVB'));
      const second = service.apply(sell('NVIDIA Put 200 HVB'));

      expect(second.row).toBe(3);
      expect(service.getOpenPositions().map((position) => position.row)).toEqual([1]);
    });

    it('should leave the ledger untouched when nothing matches', () => {
      expect(() => service.apply(sell('Microsoft Corp.'))).toThrow(NoMatchingPositionError);
      expect(() => service.apply(sell('Microsoft Corp.'))).toThrow(
        "No open position matches sale of 'Microsoft Corp.' on 2025-12-10",
      );

      expect(service.getOpenPositions()).toHaveLength(3);
      expect(store.getCommitCount()).toBe(0);
    });

    it('should close a position even when the quantities differ', () => {
      const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

      const closed = service.apply(sell('Apple Inc.', 20));

      expect(closed.row).toBe(1);
      expect(closed.sale?.sellQuantity?.toNumber()).toBe(20);
      expect(warn).toHaveBeenCalledWith("Sale of 20 'Apple Inc.' closes row 1 holding 50");
      warn.mockRestore();
    });
  });
});
