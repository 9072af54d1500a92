// One disposal in the flat ledger export
export interface LedgerExportRowDto {
  instrumentCode: string;
  quantity: number;
  executionPrice: number;          // per unit; 0 for expirations
  direction: 'sell' | 'assign' | 'expire';
  settlementCurrency: string;
  totalFees: number;
  executionTime: string;           // ISO timestamp
  matchedUnitCost: number;         // moving average at disposal
  realizedGainLoss: number;
  note: string;
}

export interface AnnualSummaryDto {
  accountId: string;
  taxYear: number;
  currency: string;
  realizedGainLoss: number;
  stockGainLoss: number;
  optionGainLoss: number;
  proceeds: number;
  costBasis: number;
  fees: number;
  disposalCount: number;
}

export interface CashFlowSummaryDto {
  accountId: string;
  taxYear: number;
  currency: string;
  dividends: number;
  taxWithheld: number;
  net: number;
  entryCount: number;
}

// Report artifact for a single tax year
export interface AnnualReportDto {
  taxYear: number;
  ledger: LedgerExportRowDto[];
  summaries: AnnualSummaryDto[];
  cashFlows: CashFlowSummaryDto[];
}
