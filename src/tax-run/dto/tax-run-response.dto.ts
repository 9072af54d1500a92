import {
  AnnualSummaryDto,
  CashFlowSummaryDto,
  LedgerExportRowDto,
} from '../../report/dto/annual-report.dto';

// Listing entry for a stored run
export interface TaxRunSummaryDto {
  id: string;
  label?: string;
  source: string;
  createdAt: string;
  asOf?: string;
  recordCount: number;
  disposalCount: number;
  anomalyCount: number;
  reportYears: number[];
}

// Transaction held back for manual review
export interface AnomalyDto {
  id: string;
  reason: string;
  message: string;
  transactionId: string;
  accountId: string;
  instrumentCode: string;
  action: string;
  timestamp: string;
  openQuantity: number;
}

// Final lot state per (account, instrument)
export interface PositionDto {
  accountId: string;
  instrumentCode: string;
  instrumentType: string;
  currency: string;
  openQuantity: number;
  averageUnitCost: number;
  costBasis: number;               // openQuantity × averageUnitCost
}

export interface TaxRunResponseDto extends TaxRunSummaryDto {
  ledger: LedgerExportRowDto[];
  annualSummaries: AnnualSummaryDto[];
  cashFlowSummaries: CashFlowSummaryDto[];
  anomalies: AnomalyDto[];
  positions: PositionDto[];
}
