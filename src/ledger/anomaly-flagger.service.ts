import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { AnomalyReason, AnomalyRecord } from './entities/anomaly-record.entity';
import {
  InstrumentType,
  TransactionAction,
  TransactionRecord,
} from './entities/transaction-record.entity';
import { toAmountString } from '../common/utils/decimal.util';

// Builds anomaly records for transactions that need manual review.
// Never throws: flagged records are reported, the run carries on.
@Injectable()
export class AnomalyFlaggerService {
  /**
   * Rejects action/instrument combinations the ledger does not model.
   * Returns the anomaly, or undefined when the combination is supported.
   */
  checkInstrumentSupport(record: TransactionRecord, openQuantity: Decimal): AnomalyRecord | undefined {
    if (this.isSupported(record)) {
      return undefined;
    }
    return this.flag(
      AnomalyReason.UNRECOGNIZED_INSTRUMENT_TYPE,
      record,
      openQuantity,
      `${record.action} is not supported for ${record.instrumentType} instrument ${record.instrumentId}`,
    );
  }

  oversell(record: TransactionRecord, requested: Decimal, openQuantity: Decimal): AnomalyRecord {
    return this.flag(
      AnomalyReason.OVERSELL,
      record,
      openQuantity,
      `Disposal of ${toAmountString(requested)} ${record.instrumentId} exceeds open position of ${toAmountString(openQuantity)}`,
    );
  }

  noOpeningPosition(record: TransactionRecord, requested: Decimal): AnomalyRecord {
    return this.flag(
      AnomalyReason.NO_OPENING_POSITION,
      record,
      new Decimal(0),
      `Disposal of ${toAmountString(requested)} ${record.instrumentId} with no open position`,
    );
  }

  currencyMismatch(record: TransactionRecord, lotCurrency: string, openQuantity: Decimal): AnomalyRecord {
    return this.flag(
      AnomalyReason.CURRENCY_MISMATCH,
      record,
      openQuantity,
      `Disposal settled in ${record.currency} against a lot held in ${lotCurrency}`,
    );
  }

  private flag(
    reason: AnomalyReason,
    transaction: TransactionRecord,
    openQuantity: Decimal,
    message: string,
  ): AnomalyRecord {
    return Object.freeze({
      id: uuidv4(),
      reason,
      transaction,
      openQuantity,
      message,
    });
  }

  private isSupported(record: TransactionRecord): boolean {
    const { instrumentType } = record;

    switch (record.action) {
      case TransactionAction.BUY:
      case TransactionAction.SELL:
      case TransactionAction.OPTION_ASSIGN:
        return instrumentType !== InstrumentType.OTHER;
      case TransactionAction.OPTION_EXPIRE:
        return instrumentType === InstrumentType.OPTION;
      case TransactionAction.SPLIT:
      case TransactionAction.DIVIDEND:
      case TransactionAction.TAX_WITHHOLDING:
        return instrumentType === InstrumentType.STOCK;
      default: {
        const unhandled: never = record;
        throw new Error(`Unhandled transaction ${JSON.stringify(unhandled)}`);
      }
    }
  }
}
