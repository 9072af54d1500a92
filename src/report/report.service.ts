import { Injectable } from '@nestjs/common';
import { AnnualSummaryRow, CashFlowSummaryRow } from '../ledger/entities/annual-summary-row.entity';
import { LedgerRow } from '../ledger/entities/ledger-row.entity';
import { TransactionAction } from '../ledger/entities/transaction-record.entity';
import { RunResult } from '../ledger/tax-lot-engine.service';
import { toNumber } from '../common/utils/decimal.util';
import {
  AnnualReportDto,
  AnnualSummaryDto,
  CashFlowSummaryDto,
  LedgerExportRowDto,
} from './dto/annual-report.dto';

const DIRECTIONS: Record<LedgerRow['action'], LedgerExportRowDto['direction']> = {
  [TransactionAction.SELL]: 'sell',
  [TransactionAction.OPTION_ASSIGN]: 'assign',
  [TransactionAction.OPTION_EXPIRE]: 'expire',
};

// Shapes run results into the ledger export and per-year report artifacts.
@Injectable()
export class ReportService {
  /** Years with at least one disposal or cash flow, ascending */
  reportYears(result: RunResult): number[] {
    const years = new Set<number>([
      ...result.ledgerRows.map((row) => row.taxYear),
      ...result.cashFlowSummaries.map((summary) => summary.taxYear),
    ]);
    return Array.from(years).sort((a, b) => a - b);
  }

  buildAnnualReport(result: RunResult, taxYear: number): AnnualReportDto {
    return {
      taxYear,
      ledger: result.ledgerRows
        .filter((row) => row.taxYear === taxYear)
        .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
        .map((row) => this.toExportRow(row)),
      summaries: result.annualSummaries
        .filter((summary) => summary.taxYear === taxYear)
        .map((summary) => this.toSummaryDto(summary)),
      cashFlows: result.cashFlowSummaries
        .filter((summary) => summary.taxYear === taxYear)
        .map((summary) => this.toCashFlowDto(summary)),
    };
  }

  toExportRow(row: LedgerRow): LedgerExportRowDto {
    return {
      instrumentCode: row.instrumentId,
      quantity: toNumber(row.quantity),
      executionPrice: toNumber(row.unitPrice),
      direction: DIRECTIONS[row.action],
      settlementCurrency: row.currency,
      totalFees: toNumber(row.feeTotal),
      executionTime: row.timestamp.toISOString(),
      matchedUnitCost: toNumber(row.matchedUnitCost),
      realizedGainLoss: toNumber(row.realizedGainLoss),
      note: row.transaction.note ?? '',
    };
  }

  toSummaryDto(summary: AnnualSummaryRow): AnnualSummaryDto {
    return {
      accountId: summary.accountId,
      taxYear: summary.taxYear,
      currency: summary.currency,
      realizedGainLoss: toNumber(summary.realizedGainLoss),
      stockGainLoss: toNumber(summary.stockGainLoss),
      optionGainLoss: toNumber(summary.optionGainLoss),
      proceeds: toNumber(summary.proceeds),
      costBasis: toNumber(summary.costBasis),
      fees: toNumber(summary.fees),
      disposalCount: summary.disposalCount,
    };
  }

  toCashFlowDto(summary: CashFlowSummaryRow): CashFlowSummaryDto {
    return {
      accountId: summary.accountId,
      taxYear: summary.taxYear,
      currency: summary.currency,
      dividends: toNumber(summary.dividends),
      taxWithheld: toNumber(summary.taxWithheld),
      net: toNumber(summary.net),
      entryCount: summary.entryCount,
    };
  }
}
