import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { AnnualAggregatorService } from './annual-aggregator.service';
import { AnomalyFlaggerService } from './anomaly-flagger.service';
import { DisposalResolverService } from './disposal-resolver.service';
import { AnomalyRecord } from './entities/anomaly-record.entity';
import { AnnualSummaryRow, CashFlowSummaryRow } from './entities/annual-summary-row.entity';
import { LedgerRow } from './entities/ledger-row.entity';
import { LotState } from './entities/lot-state.entity';
import {
  CashFlowRecord,
  ExpirationRecord,
  InstrumentType,
  TransactionAction,
  TransactionRecord,
} from './entities/transaction-record.entity';
import { DataOrderingError } from './errors/data-ordering.error';
import { MalformedRecordError } from './errors/malformed-record.error';
import { LedgerEvent, LotLedger } from './lot-ledger';
import { parseOptionCode } from './utils/option-code.util';
import { ledgerConfig } from '../config/configuration';
import { ZERO } from '../common/utils/decimal.util';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RunOptions {
  asOf?: Date;                      // valuation date for lapsed option contracts
  synthesizeExpirations?: boolean;  // defaults to the ledger config
}

export interface RunResult {
  recordCount: number;
  ledgerRows: LedgerRow[];
  anomalies: AnomalyRecord[];
  annualSummaries: AnnualSummaryRow[];
  cashFlows: CashFlowRecord[];
  cashFlowSummaries: CashFlowSummaryRow[];
  positions: LotState[];
}

// Runs one deterministic pass over a fully materialized batch.
// A fresh LotLedger per run: nothing carries over between runs.
@Injectable()
export class TaxLotEngineService {
  private readonly logger = new Logger(TaxLotEngineService.name);

  constructor(
    private readonly resolver: DisposalResolverService,
    private readonly anomalyFlagger: AnomalyFlaggerService,
    private readonly aggregator: AnnualAggregatorService,
    @Inject(ledgerConfig.KEY)
    private readonly config: ConfigType<typeof ledgerConfig>,
  ) {}

  /**
   * Applies records in input order; ties keep their input order.
   * Anomalies never stop the run.
   * @throws MalformedRecordError before accounting starts
   * @throws DataOrderingError when a key's records are out of time order
   */
  run(records: TransactionRecord[], options: RunOptions = {}): RunResult {
    this.validate(records);

    const ledger = new LotLedger(this.resolver, this.anomalyFlagger);
    const ledgerRows: LedgerRow[] = [];
    const anomalies: AnomalyRecord[] = [];
    const cashFlows: CashFlowRecord[] = [];

    const collect = (event: LedgerEvent): void => {
      switch (event.kind) {
        case 'disposed':
          ledgerRows.push(event.row);
          break;
        case 'flagged':
          anomalies.push(event.anomaly);
          this.logger.warn(`${event.anomaly.reason}: ${event.anomaly.message} (${event.anomaly.transaction.id})`);
          break;
        case 'cash-flow':
          cashFlows.push(event.record);
          break;
        case 'acquired':
        case 'split':
          break;
      }
    };

    try {
      records.forEach((record) => collect(ledger.apply(record)));

      const synthesize = options.synthesizeExpirations ?? this.config.synthesizeOptionExpirations;
      if (options.asOf && synthesize) {
        this.expireLapsedContracts(ledger, options.asOf).forEach((record) => collect(ledger.apply(record)));
      }
    } catch (error) {
      if (error instanceof DataOrderingError) {
        this.logger.error(error.message);
      }
      throw error;
    }

    const result: RunResult = {
      recordCount: records.length,
      ledgerRows,
      anomalies,
      annualSummaries: this.aggregator.aggregate(ledgerRows),
      cashFlows,
      cashFlowSummaries: this.aggregator.summarizeCashFlows(cashFlows),
      positions: ledger.getPositions(),
    };

    this.logger.log(
      `Processed ${records.length} records: ${ledgerRows.length} disposals, ` +
        `${anomalies.length} anomalies, ${cashFlows.length} cash flows`,
    );
    return result;
  }

  // Option positions still open after their expiry date lapse worthless.
  private expireLapsedContracts(ledger: LotLedger, asOf: Date): ExpirationRecord[] {
    const asOfDay = Date.UTC(asOf.getUTCFullYear(), asOf.getUTCMonth(), asOf.getUTCDate());

    return ledger
      .getPositions()
      .filter((lot) => lot.instrumentType === InstrumentType.OPTION && lot.openQuantity.greaterThan(0))
      .flatMap((lot) => {
        const contract = parseOptionCode(lot.instrumentId);
        if (!contract) {
          this.logger.warn(`Cannot read expiry from ${lot.instrumentId}; position left open`);
          return [];
        }
        if (contract.expiry.getTime() >= asOfDay) {
          return [];
        }
        // last second of the expiry day, after any trade that day
        const expiredAt = new Date(contract.expiry.getTime() + DAY_MS - 1000);
        const lastActivity = ledger.getLastActivity(lot.accountId, lot.instrumentId);
        if (lastActivity && lastActivity.getTime() > expiredAt.getTime()) {
          this.logger.warn(
            `Not expiring ${lot.instrumentId} for ${lot.accountId}: activity on ` +
              `${lastActivity.toISOString()} follows expiry; position left open`,
          );
          return [];
        }
        const expiration: ExpirationRecord = {
          id: `expire:${lot.accountId}:${lot.instrumentId}`,
          action: TransactionAction.OPTION_EXPIRE,
          accountId: lot.accountId,
          instrumentId: lot.instrumentId,
          instrumentType: lot.instrumentType,
          currency: lot.currency,
          timestamp: expiredAt,
          feeTotal: ZERO,
          synthetic: true,
          note: 'Expired worthless',
        };
        return [expiration];
      });
  }

  private validate(records: TransactionRecord[]): void {
    const seen = new Set<string>();

    for (const record of records) {
      if (!record.id) {
        throw new MalformedRecordError('missing id');
      }
      if (seen.has(record.id)) {
        throw new MalformedRecordError('duplicate id', record.id);
      }
      seen.add(record.id);

      if (!record.accountId || !record.instrumentId || !record.currency) {
        throw new MalformedRecordError('account, instrument and currency are required', record.id);
      }
      if (Number.isNaN(record.timestamp.getTime())) {
        throw new MalformedRecordError('invalid timestamp', record.id);
      }

      switch (record.action) {
        case TransactionAction.BUY:
        case TransactionAction.SELL:
        case TransactionAction.OPTION_ASSIGN:
          if (record.quantity.isZero()) {
            throw new MalformedRecordError(`${record.action} quantity must not be 0`, record.id);
          }
          if (record.unitPrice.isNegative() || record.feeTotal.isNegative()) {
            throw new MalformedRecordError('price and fee must not be negative', record.id);
          }
          break;
        case TransactionAction.OPTION_EXPIRE:
          if (record.feeTotal.isNegative()) {
            throw new MalformedRecordError('fee must not be negative', record.id);
          }
          break;
        case TransactionAction.SPLIT:
          if (!record.ratio.greaterThan(0)) {
            throw new MalformedRecordError('split ratio must be positive', record.id);
          }
          break;
        case TransactionAction.DIVIDEND:
        case TransactionAction.TAX_WITHHOLDING:
          break;
        default: {
          const unhandled: never = record;
          throw new MalformedRecordError(`unknown action in ${JSON.stringify(unhandled)}`);
        }
      }
    }
  }
}
