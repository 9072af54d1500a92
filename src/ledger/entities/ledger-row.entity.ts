import Decimal from 'decimal.js';
import { DisposalRecord, InstrumentType } from './transaction-record.entity';

// One resolved disposal. Frozen once emitted.
export interface LedgerRow {
  id: string;
  transaction: DisposalRecord;
  accountId: string;
  instrumentId: string;
  instrumentType: InstrumentType;
  action: DisposalRecord['action'];
  quantity: Decimal;            // disposed magnitude
  unitPrice: Decimal;           // 0 for expirations
  matchedUnitCost: Decimal;     // lot average at the time of disposal
  proceeds: Decimal;            // quantity × unitPrice
  costBasis: Decimal;           // quantity × matchedUnitCost
  feeTotal: Decimal;
  realizedGainLoss: Decimal;    // proceeds − costBasis − feeTotal
  currency: string;
  timestamp: Date;
  taxYear: number;
  openQuantityAfter: Decimal;
  synthetic: boolean;           // engine-generated expiration
}

