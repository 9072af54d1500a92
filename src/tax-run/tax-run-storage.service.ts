import { Injectable } from '@nestjs/common';
import { TaxRun } from './entities/tax-run.entity';

// In-memory run store with O(1) lookups by run id.
@Injectable()
export class TaxRunStorageService {
  private runs: Map<string, TaxRun> = new Map();

  saveRun(run: TaxRun): TaxRun {
    this.runs.set(run.id, run);
    return run;
  }

  findRun(id: string): TaxRun | undefined {
    return this.runs.get(id);
  }

  /** Oldest first */
  getAllRuns(): TaxRun[] {
    return Array.from(this.runs.values());
  }

  getRunCount(): number {
    return this.runs.size;
  }

  /** Drops every stored run - test harness only */
  clearAllData(): void {
    this.runs.clear();
  }
}
