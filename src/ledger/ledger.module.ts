import { Module } from '@nestjs/common';
import { PipelineConfig } from '../config/pipeline.config';
import { LEDGER_STORE } from './ledger-store.interface';
import { PositionLedgerService } from './position-ledger.service';
import { XlsxLedgerStore } from './xlsx-ledger.store';

@Module({
  providers: [
    {
      provide: LEDGER_STORE,
      useFactory: (config: PipelineConfig) => new XlsxLedgerStore(config.ledgerFile),
      inject: [PipelineConfig],
    },
    PositionLedgerService,
  ],
  exports: [PositionLedgerService],
})
export class LedgerModule {}
