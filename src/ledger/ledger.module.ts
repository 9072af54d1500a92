import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AnnualAggregatorService } from './annual-aggregator.service';
import { AnomalyFlaggerService } from './anomaly-flagger.service';
import { BrokerNormalizerService } from './broker-normalizer.service';
import { DisposalResolverService } from './disposal-resolver.service';
import { TaxLotEngineService } from './tax-lot-engine.service';
import { ledgerConfig } from '../config/configuration';

@Module({
  imports: [ConfigModule.forFeature(ledgerConfig)],
  providers: [
    AnomalyFlaggerService,
    DisposalResolverService,
    AnnualAggregatorService,
    TaxLotEngineService,      // one LotLedger per run
    BrokerNormalizerService,  // raw broker rows -> ledger records
  ],
  exports: [TaxLotEngineService, BrokerNormalizerService],
})
export class LedgerModule {}
