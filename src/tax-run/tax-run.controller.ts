import { Body, Controller, Get, HttpCode, HttpStatus, Param, ParseIntPipe, ParseUUIDPipe, Post, Query } from '@nestjs/common';
import { BrokerImportDto } from './dto/broker-import.dto';
import { CreateTaxRunDto } from './dto/create-tax-run.dto';
import { AnomalyDto, PositionDto, TaxRunResponseDto, TaxRunSummaryDto } from './dto/tax-run-response.dto';
import { TaxRunQueryService } from './tax-run-query.service';
import { TaxRunService } from './tax-run.service';
import { AnnualReportDto } from '../report/dto/annual-report.dto';

@Controller('tax/runs')
export class TaxRunController {
  constructor(
    private readonly taxRunService: TaxRunService,
    private readonly queryService: TaxRunQueryService,
  ) {}

  /**
   * Runs the ledger over normalized, pre-sorted records.
   *
   * POST /tax/runs
   * @returns 201 with the full run; 400 on malformed records, 422 on out-of-order input
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  createRun(@Body() createTaxRunDto: CreateTaxRunDto): TaxRunResponseDto {
    const run = this.taxRunService.createRun(createTaxRunDto);
    return this.queryService.getRun(run.id);
  }

  /**
   * Normalizes raw broker rows for one account, then runs.
   *
   * POST /tax/runs/broker
   */
  @Post('broker')
  @HttpCode(HttpStatus.CREATED)
  importBrokerHistory(@Body() brokerImportDto: BrokerImportDto): TaxRunResponseDto {
    const run = this.taxRunService.importBrokerHistory(brokerImportDto);
    return this.queryService.getRun(run.id);
  }

  /**
   * Clears stored runs - test harness only.
   *
   * POST /tax/runs/reset
   */
  @Post('reset')
  @HttpCode(HttpStatus.OK)
  reset() {
    this.taxRunService.clearAll();
    return { message: 'Tax runs cleared' };
  }

  /** GET /tax/runs */
  @Get()
  listRuns(): TaxRunSummaryDto[] {
    return this.queryService.listRuns();
  }

  /** GET /tax/runs/:id */
  @Get(':id')
  getRun(@Param('id', ParseUUIDPipe) id: string): TaxRunResponseDto {
    return this.queryService.getRun(id);
  }

  /**
   * Tax years with disposals or cash flows.
   *
   * GET /tax/runs/:id/reports
   */
  @Get(':id/reports')
  getReportYears(@Param('id', ParseUUIDPipe) id: string): { reportYears: number[] } {
    return { reportYears: this.queryService.getReportYears(id) };
  }

  /**
   * Annual report artifact: ledger export, summaries and cash flows of one year.
   *
   * GET /tax/runs/:id/reports/2024
   */
  @Get(':id/reports/:year')
  getAnnualReport(
    @Param('id', ParseUUIDPipe) id: string,
    @Param('year', ParseIntPipe) year: number,
  ): AnnualReportDto {
    return this.queryService.getAnnualReport(id, year);
  }

  /**
   * Transactions held back for manual review.
   *
   * GET /tax/runs/:id/anomalies?reason=OVERSELL
   */
  @Get(':id/anomalies')
  getAnomalies(@Param('id', ParseUUIDPipe) id: string, @Query('reason') reason?: string): AnomalyDto[] {
    return this.queryService.getAnomalies(id, reason);
  }

  /**
   * Final lot states.
   *
   * GET /tax/runs/:id/positions?accountId=ACC-1
   */
  @Get(':id/positions')
  getPositions(
    @Param('id', ParseUUIDPipe) id: string,
    @Query('accountId') accountId?: string,
  ): PositionDto[] {
    return this.queryService.getPositions(id, accountId);
  }
}
