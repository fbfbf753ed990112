import { Module } from '@nestjs/common';
import { DocumentsModule } from '../documents/documents.module';
import { LedgerModule } from '../ledger/ledger.module';
import { ReconciliationModule } from '../reconciliation/reconciliation.module';
import { BATCH_DRIVER } from './batch-driver.interface';
import { DirectoryBatchDriver } from './directory-batch-driver.service';
import { TradeImportService } from './trade-import.service';

@Module({
  imports: [DocumentsModule, ReconciliationModule, LedgerModule],
  providers: [
    { provide: BATCH_DRIVER, useClass: DirectoryBatchDriver },
    TradeImportService,
  ],
  exports: [TradeImportService],
})
export class BatchModule {}
