import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { TaxRunStorageService } from './tax-run/tax-run-storage.service';

@Controller()
export class AppController {
  constructor(private readonly storage: TaxRunStorageService) {}

  /**
   * Health check for load balancers and monitoring.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'tax-lot-ledger',
      storedRuns: this.storage.getRunCount(),
    };
  }

  /**
   * API root - returns service info and available endpoints.
   *
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Tax-Lot Ledger API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        runs: '/tax/runs',
        brokerImport: '/tax/runs/broker',
        reports: '/tax/runs/:id/reports/:year',
        anomalies: '/tax/runs/:id/anomalies',
        positions: '/tax/runs/:id/positions',
      },
    };
  }
}
