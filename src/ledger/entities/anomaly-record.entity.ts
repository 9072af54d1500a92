import Decimal from 'decimal.js';
import { TransactionRecord } from './transaction-record.entity';

export enum AnomalyReason {
  OVERSELL = 'OVERSELL',
  NO_OPENING_POSITION = 'NO_OPENING_POSITION',
  UNRECOGNIZED_INSTRUMENT_TYPE = 'UNRECOGNIZED_INSTRUMENT_TYPE',
  CURRENCY_MISMATCH = 'CURRENCY_MISMATCH',
}

// Transaction the ledger could not resolve; surfaced for manual review.
export interface AnomalyRecord {
  id: string;
  reason: AnomalyReason;
  transaction: TransactionRecord;
  openQuantity: Decimal;        // lot quantity when the record was seen
  message: string;
}
