import Decimal from 'decimal.js';

// Realized P&L per account, tax year and settlement currency.
// Fully derived from ledger rows.
export interface AnnualSummaryRow {
  accountId: string;
  taxYear: number;
  currency: string;
  realizedGainLoss: Decimal;
  stockGainLoss: Decimal;
  optionGainLoss: Decimal;
  proceeds: Decimal;
  costBasis: Decimal;
  fees: Decimal;
  disposalCount: number;
}

// Dividend and withholding totals, kept apart from realized gains.
export interface CashFlowSummaryRow {
  accountId: string;
  taxYear: number;
  currency: string;
  dividends: Decimal;
  taxWithheld: Decimal;
  net: Decimal;
  entryCount: number;
}
