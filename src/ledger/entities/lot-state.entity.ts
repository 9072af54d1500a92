import Decimal from 'decimal.js';
import { InstrumentType } from './transaction-record.entity';

// Running moving-average position per (account, instrument).
// Owned by a single LotLedger for the duration of one run.
export interface LotState {
  accountId: string;
  instrumentId: string;
  instrumentType: InstrumentType;
  currency: string;             // currency of the first acquisition
  openQuantity: Decimal;        // never negative
  averageUnitCost: Decimal;     // includes capitalised acquisition fees
}
