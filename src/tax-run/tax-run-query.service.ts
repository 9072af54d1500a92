import { Injectable, NotFoundException } from '@nestjs/common';
import { AnomalyDto, PositionDto, TaxRunResponseDto, TaxRunSummaryDto } from './dto/tax-run-response.dto';
import { TaxRun } from './entities/tax-run.entity';
import { TaxRunStorageService } from './tax-run-storage.service';
import { AnomalyRecord } from '../ledger/entities/anomaly-record.entity';
import { LotState } from '../ledger/entities/lot-state.entity';
import { AnnualReportDto } from '../report/dto/annual-report.dto';
import { ReportService } from '../report/report.service';
import { toNumber } from '../common/utils/decimal.util';

// Read-only views over stored runs.
// CQRS pattern - queries separated from mutations.
@Injectable()
export class TaxRunQueryService {
  constructor(
    private readonly storage: TaxRunStorageService,
    private readonly reportService: ReportService,
  ) {}

  listRuns(): TaxRunSummaryDto[] {
    return this.storage.getAllRuns().map((run) => this.toSummary(run));
  }

  /** Full run: ledger export, summaries, anomalies and final positions */
  getRun(id: string): TaxRunResponseDto {
    const run = this.requireRun(id);
    const { result } = run;

    return {
      ...this.toSummary(run),
      ledger: result.ledgerRows.map((row) => this.reportService.toExportRow(row)),
      annualSummaries: result.annualSummaries.map((summary) => this.reportService.toSummaryDto(summary)),
      cashFlowSummaries: result.cashFlowSummaries.map((summary) => this.reportService.toCashFlowDto(summary)),
      anomalies: result.anomalies.map((anomaly) => this.toAnomalyDto(anomaly)),
      positions: result.positions.map((lot) => this.toPositionDto(lot)),
    };
  }

  getReportYears(id: string): number[] {
    return this.reportService.reportYears(this.requireRun(id).result);
  }

  /**
   * Report artifact for one tax year.
   * @throws NotFoundException when the run has no activity in that year
   */
  getAnnualReport(id: string, taxYear: number): AnnualReportDto {
    const { result } = this.requireRun(id);
    if (!this.reportService.reportYears(result).includes(taxYear)) {
      throw new NotFoundException(`Run ${id} has no activity in ${taxYear}`);
    }
    return this.reportService.buildAnnualReport(result, taxYear);
  }

  getAnomalies(id: string, reason?: string): AnomalyDto[] {
    const anomalies = this.requireRun(id).result.anomalies;
    const filtered = reason ? anomalies.filter((anomaly) => anomaly.reason === reason) : anomalies;
    return filtered.map((anomaly) => this.toAnomalyDto(anomaly));
  }

  /** Final lot states; closed lots are included with zero quantity */
  getPositions(id: string, accountId?: string): PositionDto[] {
    const positions = this.requireRun(id).result.positions;
    const filtered = accountId ? positions.filter((lot) => lot.accountId === accountId) : positions;
    return filtered.map((lot) => this.toPositionDto(lot));
  }

  private requireRun(id: string): TaxRun {
    const run = this.storage.findRun(id);
    if (!run) {
      throw new NotFoundException(`Tax run ${id} not found`);
    }
    return run;
  }

  private toSummary(run: TaxRun): TaxRunSummaryDto {
    return {
      id: run.id,
      label: run.label,
      source: run.source,
      createdAt: run.createdAt.toISOString(),
      asOf: run.asOf?.toISOString(),
      recordCount: run.result.recordCount,
      disposalCount: run.result.ledgerRows.length,
      anomalyCount: run.result.anomalies.length,
      reportYears: this.reportService.reportYears(run.result),
    };
  }

  private toAnomalyDto(anomaly: AnomalyRecord): AnomalyDto {
    const { transaction } = anomaly;
    return {
      id: anomaly.id,
      reason: anomaly.reason,
      message: anomaly.message,
      transactionId: transaction.id,
      accountId: transaction.accountId,
      instrumentCode: transaction.instrumentId,
      action: transaction.action,
      timestamp: transaction.timestamp.toISOString(),
      openQuantity: toNumber(anomaly.openQuantity),
    };
  }

  private toPositionDto(lot: LotState): PositionDto {
    return {
      accountId: lot.accountId,
      instrumentCode: lot.instrumentId,
      instrumentType: lot.instrumentType,
      currency: lot.currency,
      openQuantity: toNumber(lot.openQuantity),
      averageUnitCost: toNumber(lot.averageUnitCost),
      costBasis: toNumber(lot.openQuantity.times(lot.averageUnitCost)),
    };
  }
}
