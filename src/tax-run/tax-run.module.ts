import { Module } from '@nestjs/common';
import { TaxRunController } from './tax-run.controller';
import { TaxRunQueryService } from './tax-run-query.service';
import { TaxRunStorageService } from './tax-run-storage.service';
import { TaxRunService } from './tax-run.service';
import { LedgerModule } from '../ledger/ledger.module';
import { ReportModule } from '../report/report.module';

@Module({
  imports: [LedgerModule, ReportModule],
  controllers: [TaxRunController],
  providers: [
    TaxRunStorageService,
    TaxRunService,       // Mutations: createRun, importBrokerHistory, clearAll
    TaxRunQueryService,  // Queries: runs, reports, anomalies, positions
  ],
  exports: [TaxRunStorageService],
})
export class TaxRunModule {}
