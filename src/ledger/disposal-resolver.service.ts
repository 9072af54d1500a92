import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { AnomalyFlaggerService } from './anomaly-flagger.service';
import { AnomalyRecord } from './entities/anomaly-record.entity';
import { LedgerRow } from './entities/ledger-row.entity';
import { LotState } from './entities/lot-state.entity';
import { DisposalRecord, TransactionAction } from './entities/transaction-record.entity';
import { ZERO } from '../common/utils/decimal.util';

export type DisposalResolution =
  | { kind: 'resolved'; row: LedgerRow }
  | { kind: 'flagged'; anomaly: AnomalyRecord };

// Turns a disposal plus the current lot into a ledger row, or an anomaly
// when the lot cannot cover it. Reads the lot, never mutates it.
@Injectable()
export class DisposalResolverService {
  constructor(private readonly anomalyFlagger: AnomalyFlaggerService) {}

  /**
   * Realized gain = quantity × (unitPrice − average cost) − fee.
   * Expirations dispose the whole open quantity at a unit price of 0.
   */
  resolve(record: DisposalRecord, lot: LotState | undefined): DisposalResolution {
    const openQuantity = lot?.openQuantity ?? ZERO;
    const requested = this.requestedQuantity(record, openQuantity);

    if (!lot || openQuantity.isZero()) {
      return { kind: 'flagged', anomaly: this.anomalyFlagger.noOpeningPosition(record, requested) };
    }
    if (lot.currency !== record.currency) {
      return {
        kind: 'flagged',
        anomaly: this.anomalyFlagger.currencyMismatch(record, lot.currency, openQuantity),
      };
    }
    if (requested.greaterThan(openQuantity)) {
      return {
        kind: 'flagged',
        anomaly: this.anomalyFlagger.oversell(record, requested, openQuantity),
      };
    }

    const unitPrice = record.action === TransactionAction.OPTION_EXPIRE ? ZERO : record.unitPrice;
    const matchedUnitCost = lot.averageUnitCost;
    const proceeds = requested.times(unitPrice);
    const costBasis = requested.times(matchedUnitCost);
    const realizedGainLoss = proceeds.minus(costBasis).minus(record.feeTotal);

    const row: LedgerRow = Object.freeze({
      id: uuidv4(),
      transaction: record,
      accountId: record.accountId,
      instrumentId: record.instrumentId,
      instrumentType: record.instrumentType,
      action: record.action,
      quantity: requested,
      unitPrice,
      matchedUnitCost,
      proceeds,
      costBasis,
      feeTotal: record.feeTotal,
      realizedGainLoss,
      currency: record.currency,
      timestamp: record.timestamp,
      taxYear: record.timestamp.getUTCFullYear(),
      openQuantityAfter: openQuantity.minus(requested),
      synthetic: record.action === TransactionAction.OPTION_EXPIRE && record.synthetic === true,
    });

    return { kind: 'resolved', row };
  }

  private requestedQuantity(record: DisposalRecord, openQuantity: Decimal): Decimal {
    switch (record.action) {
      case TransactionAction.SELL:
        return record.quantity.abs();
      case TransactionAction.OPTION_ASSIGN:
        return record.quantity.abs();
      case TransactionAction.OPTION_EXPIRE:
        return openQuantity;
      default: {
        const unhandled: never = record;
        throw new Error(`Not a disposal: ${JSON.stringify(unhandled)}`);
      }
    }
  }
}
