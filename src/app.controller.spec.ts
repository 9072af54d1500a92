import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from './app.controller';
import { TaxRunStorageService } from './tax-run/tax-run-storage.service';

describe('AppController', () => {
  let controller: AppController;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [TaxRunStorageService],
    }).compile();

    controller = module.get<AppController>(AppController);
  });

  it('should report health with the stored run count', () => {
    const health = controller.getHealth();

    expect(health.status).toBe('ok');
    expect(health.service).toBe('tax-lot-ledger');
    expect(health.storedRuns).toBe(0);
  });

  it('should list the API endpoints', () => {
    expect(controller.getRoot().endpoints.runs).toBe('/tax/runs');
  });
});
