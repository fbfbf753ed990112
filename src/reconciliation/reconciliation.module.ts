import { Module } from '@nestjs/common';
import { TradeMergerService } from './trade-merger.service';

@Module({
  providers: [TradeMergerService],
  exports: [TradeMergerService],
})
export class ReconciliationModule {}
