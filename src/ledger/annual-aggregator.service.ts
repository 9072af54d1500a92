import { Injectable } from '@nestjs/common';
import { AnnualSummaryRow, CashFlowSummaryRow } from './entities/annual-summary-row.entity';
import { LedgerRow } from './entities/ledger-row.entity';
import {
  CashFlowRecord,
  InstrumentType,
  TransactionAction,
} from './entities/transaction-record.entity';
import { ZERO } from '../common/utils/decimal.util';

type SummaryKey = Pick<AnnualSummaryRow, 'accountId' | 'taxYear' | 'currency'>;

function keyOf({ accountId, taxYear, currency }: SummaryKey): string {
  return JSON.stringify([accountId, taxYear, currency]);
}

function byYearAccountCurrency(a: SummaryKey, b: SummaryKey): number {
  return (
    a.taxYear - b.taxYear ||
    a.accountId.localeCompare(b.accountId) ||
    a.currency.localeCompare(b.currency)
  );
}

function emptySummary(key: SummaryKey): AnnualSummaryRow {
  return {
    ...key,
    realizedGainLoss: ZERO,
    stockGainLoss: ZERO,
    optionGainLoss: ZERO,
    proceeds: ZERO,
    costBasis: ZERO,
    fees: ZERO,
    disposalCount: 0,
  };
}

// Groups resolved disposals by (account, UTC tax year, currency).
// Pure: the same rows always give the same summaries, in any order.
@Injectable()
export class AnnualAggregatorService {
  aggregate(rows: LedgerRow[]): AnnualSummaryRow[] {
    const summaries = new Map<string, AnnualSummaryRow>();

    for (const row of rows) {
      const key = { accountId: row.accountId, taxYear: row.taxYear, currency: row.currency };
      const current = summaries.get(keyOf(key)) ?? emptySummary(key);
      const isOption = row.instrumentType === InstrumentType.OPTION;

      summaries.set(keyOf(key), {
        ...current,
        realizedGainLoss: current.realizedGainLoss.plus(row.realizedGainLoss),
        stockGainLoss: isOption ? current.stockGainLoss : current.stockGainLoss.plus(row.realizedGainLoss),
        optionGainLoss: isOption ? current.optionGainLoss.plus(row.realizedGainLoss) : current.optionGainLoss,
        proceeds: current.proceeds.plus(row.proceeds),
        costBasis: current.costBasis.plus(row.costBasis),
        fees: current.fees.plus(row.feeTotal),
        disposalCount: current.disposalCount + 1,
      });
    }

    return Array.from(summaries.values()).sort(byYearAccountCurrency);
  }

  /** Combines summaries computed over disjoint partitions of the same run */
  merge(...partials: AnnualSummaryRow[][]): AnnualSummaryRow[] {
    const merged = new Map<string, AnnualSummaryRow>();

    for (const summary of partials.flat()) {
      const current = merged.get(keyOf(summary)) ?? emptySummary(summary);
      merged.set(keyOf(summary), {
        ...current,
        realizedGainLoss: current.realizedGainLoss.plus(summary.realizedGainLoss),
        stockGainLoss: current.stockGainLoss.plus(summary.stockGainLoss),
        optionGainLoss: current.optionGainLoss.plus(summary.optionGainLoss),
        proceeds: current.proceeds.plus(summary.proceeds),
        costBasis: current.costBasis.plus(summary.costBasis),
        fees: current.fees.plus(summary.fees),
        disposalCount: current.disposalCount + summary.disposalCount,
      });
    }

    return Array.from(merged.values()).sort(byYearAccountCurrency);
  }

  summarizeCashFlows(records: CashFlowRecord[]): CashFlowSummaryRow[] {
    const summaries = new Map<string, CashFlowSummaryRow>();

    for (const record of records) {
      const key = {
        accountId: record.accountId,
        taxYear: record.timestamp.getUTCFullYear(),
        currency: record.currency,
      };
      const current = summaries.get(keyOf(key)) ?? {
        ...key,
        dividends: ZERO,
        taxWithheld: ZERO,
        net: ZERO,
        entryCount: 0,
      };
      const isDividend = record.action === TransactionAction.DIVIDEND;

      summaries.set(keyOf(key), {
        ...current,
        dividends: isDividend ? current.dividends.plus(record.amount) : current.dividends,
        taxWithheld: isDividend ? current.taxWithheld : current.taxWithheld.plus(record.amount),
        net: current.net.plus(record.amount),
        entryCount: current.entryCount + 1,
      });
    }

    return Array.from(summaries.values()).sort(byYearAccountCurrency);
  }
}
