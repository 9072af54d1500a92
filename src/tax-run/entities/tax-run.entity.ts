import { RunResult } from '../../ledger/tax-lot-engine.service';

export enum TaxRunSource {
  RECORDS = 'records',   // normalized records posted directly
  BROKER = 'broker',     // raw broker rows normalized server-side
}

// Stored engine run. Results are immutable once saved.
export interface TaxRun {
  id: string;            // internal UUID
  label?: string;
  source: TaxRunSource;
  asOf?: Date;
  createdAt: Date;
  result: RunResult;
}
