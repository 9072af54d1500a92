import { AnomalyFlaggerService } from './anomaly-flagger.service';
import { DisposalResolverService } from './disposal-resolver.service';
import { AnomalyRecord } from './entities/anomaly-record.entity';
import { LedgerRow } from './entities/ledger-row.entity';
import { LotState } from './entities/lot-state.entity';
import {
  AssignmentRecord,
  BuyRecord,
  CashFlowRecord,
  describeLot,
  DisposalRecord,
  isCashFlow,
  lotKey,
  SplitRecord,
  TransactionAction,
  TransactionRecord,
} from './entities/transaction-record.entity';
import { DataOrderingError } from './errors/data-ordering.error';
import { divide, ZERO } from '../common/utils/decimal.util';

export type LedgerEvent =
  | { kind: 'acquired'; lot: LotState }
  | { kind: 'disposed'; row: LedgerRow }
  | { kind: 'split'; lot: LotState | undefined }
  | { kind: 'cash-flow'; record: CashFlowRecord }
  | { kind: 'flagged'; anomaly: AnomalyRecord };

// Moving weighted-average position state for one run.
// Keyed by (account, instrument); one instance exclusively owns all lots.
export class LotLedger {
  private lots: Map<string, LotState> = new Map();
  private lastSeen: Map<string, Date> = new Map();

  constructor(
    private readonly resolver: DisposalResolverService,
    private readonly anomalyFlagger: AnomalyFlaggerService,
  ) {}

  /**
   * Applies one record to its lot.
   * @throws DataOrderingError when a lot-affecting record is older than the last one seen for its key
   */
  apply(record: TransactionRecord): LedgerEvent {
    if (isCashFlow(record)) {
      const unsupported = this.anomalyFlagger.checkInstrumentSupport(record, ZERO);
      return unsupported ? { kind: 'flagged', anomaly: unsupported } : { kind: 'cash-flow', record };
    }

    this.assertOrdered(record);

    const key = lotKey(record);
    const unsupported = this.anomalyFlagger.checkInstrumentSupport(
      record,
      this.lots.get(key)?.openQuantity ?? ZERO,
    );
    if (unsupported) {
      return { kind: 'flagged', anomaly: unsupported };
    }

    switch (record.action) {
      case TransactionAction.BUY:
        return this.acquire(record);
      case TransactionAction.OPTION_ASSIGN:
        return record.quantity.greaterThan(0) ? this.acquire(record) : this.dispose(record);
      case TransactionAction.SELL:
      case TransactionAction.OPTION_EXPIRE:
        return this.dispose(record);
      case TransactionAction.SPLIT:
        return this.split(record);
      default: {
        const unhandled: never = record;
        throw new Error(`Unhandled transaction ${JSON.stringify(unhandled)}`);
      }
    }
  }

  /** Time of the last lot-affecting record applied for the key, flagged ones included */
  getLastActivity(accountId: string, instrumentId: string): Date | undefined {
    return this.lastSeen.get(lotKey({ accountId, instrumentId }));
  }

  getLot(accountId: string, instrumentId: string): LotState | undefined {
    const lot = this.lots.get(lotKey({ accountId, instrumentId }));
    return lot ? { ...lot } : undefined;
  }

  /** Returns copies so callers cannot move the running state */
  getPositions(): LotState[] {
    return Array.from(this.lots.values()).map((lot) => ({ ...lot }));
  }

  // new average = (open × average + q × price + fee) / (open + q)
  private acquire(record: BuyRecord | AssignmentRecord): LedgerEvent {
    const key = lotKey(record);
    const existing = this.lots.get(key);

    if (existing && existing.openQuantity.greaterThan(0) && existing.currency !== record.currency) {
      return {
        kind: 'flagged',
        anomaly: this.anomalyFlagger.currencyMismatch(record, existing.currency, existing.openQuantity),
      };
    }

    const lot: LotState = existing ?? {
      accountId: record.accountId,
      instrumentId: record.instrumentId,
      instrumentType: record.instrumentType,
      currency: record.currency,
      openQuantity: ZERO,
      averageUnitCost: ZERO,
    };

    if (lot.openQuantity.isZero()) {
      // reopened lot settles in the currency of its new acquisition
      lot.currency = record.currency;
    }

    const quantity = record.quantity.abs();
    const heldCost = lot.openQuantity.times(lot.averageUnitCost);
    const acquiredCost = quantity.times(record.unitPrice).plus(record.feeTotal);
    const newQuantity = lot.openQuantity.plus(quantity);

    lot.averageUnitCost = divide(heldCost.plus(acquiredCost), newQuantity);
    lot.openQuantity = newQuantity;
    this.lots.set(key, lot);

    return { kind: 'acquired', lot: { ...lot } };
  }

  // Average cost is untouched by a disposal; only the open quantity moves.
  private dispose(record: DisposalRecord): LedgerEvent {
    const lot = this.lots.get(lotKey(record));
    const resolution = this.resolver.resolve(record, lot);

    if (resolution.kind === 'flagged') {
      return { kind: 'flagged', anomaly: resolution.anomaly };
    }
    if (lot) {
      lot.openQuantity = resolution.row.openQuantityAfter;
    }
    return { kind: 'disposed', row: resolution.row };
  }

  // Total basis is preserved: quantity scales up by the ratio, unit cost down.
  private split(record: SplitRecord): LedgerEvent {
    const lot = this.lots.get(lotKey(record));
    if (!lot || lot.openQuantity.isZero()) {
      return { kind: 'split', lot: undefined };
    }

    lot.openQuantity = lot.openQuantity.times(record.ratio);
    lot.averageUnitCost = divide(lot.averageUnitCost, record.ratio);
    return { kind: 'split', lot: { ...lot } };
  }

  private assertOrdered(record: TransactionRecord): void {
    const key = lotKey(record);
    const previous = this.lastSeen.get(key);

    if (previous && record.timestamp.getTime() < previous.getTime()) {
      throw new DataOrderingError(describeLot(record), record.id, previous, record.timestamp);
    }
    this.lastSeen.set(key, record.timestamp);
  }
}

