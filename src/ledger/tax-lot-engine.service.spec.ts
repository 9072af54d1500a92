import { Test, TestingModule } from '@nestjs/testing';
import { AnnualAggregatorService } from './annual-aggregator.service';
import { AnomalyFlaggerService } from './anomaly-flagger.service';
import { DisposalResolverService } from './disposal-resolver.service';
import { AnomalyReason } from './entities/anomaly-record.entity';
import { InstrumentType, TransactionRecord } from './entities/transaction-record.entity';
import { DataOrderingError } from './errors/data-ordering.error';
import { MalformedRecordError } from './errors/malformed-record.error';
import { TaxLotEngineService } from './tax-lot-engine.service';
import { buy, dividend, resetRecordSequence, sell, withholding } from './testing/record-factory';
import { ledgerConfig } from '../config/configuration';

const OPTION = { instrumentId: 'US.AAPL240119C200000', instrumentType: InstrumentType.OPTION };

describe('TaxLotEngineService', () => {
  let engine: TaxLotEngineService;

  // Stock round trip across two years plus one option trade and a dividend.
  const createHistory = (): TransactionRecord[] => [
    buy(100, 10, { at: '2023-06-01T14:00:00Z' }),
    sell(40, 15, { fee: 1, at: '2023-09-01T14:00:00Z' }),
    buy(2, 300, { ...OPTION, at: '2023-10-02T14:00:00Z' }),
    sell(1, 500, { ...OPTION, at: '2023-11-01T14:00:00Z' }),
    dividend(25, { at: '2023-12-01T00:00:00Z' }),
    withholding(-7.5, { at: '2023-12-01T00:00:00Z' }),
    sell(60, 8, { at: '2024-02-01T14:00:00Z' }),
  ];

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AnomalyFlaggerService,
        DisposalResolverService,
        AnnualAggregatorService,
        TaxLotEngineService,
        {
          provide: ledgerConfig.KEY,
          useValue: { optionContractMultiplier: 100, synthesizeOptionExpirations: true },
        },
      ],
    }).compile();

    engine = module.get<TaxLotEngineService>(TaxLotEngineService);
    resetRecordSequence();
  });

  describe('run', () => {
    it('should produce one ledger row per disposal in input order', () => {
      const result = engine.run(createHistory());

      expect(result.recordCount).toBe(7);
      expect(result.anomalies).toHaveLength(0);
      expect(result.ledgerRows.map((row) => row.realizedGainLoss.toNumber())).toEqual([199, 200, -120]);
      expect(result.ledgerRows.map((row) => row.taxYear)).toEqual([2023, 2023, 2024]);
    });

    it('should summarize each tax year with stock and option subtotals', () => {
      const [summary2023, summary2024] = engine.run(createHistory()).annualSummaries;

      expect(summary2023.taxYear).toBe(2023);
      expect(summary2023.currency).toBe('USD');
      expect(summary2023.realizedGainLoss.toNumber()).toBe(399);
      expect(summary2023.stockGainLoss.toNumber()).toBe(199);
      expect(summary2023.optionGainLoss.toNumber()).toBe(200);
      expect(summary2023.proceeds.toNumber()).toBe(1100);
      expect(summary2023.costBasis.toNumber()).toBe(700);
      expect(summary2023.fees.toNumber()).toBe(1);
      expect(summary2023.disposalCount).toBe(2);

      expect(summary2024.taxYear).toBe(2024);
      expect(summary2024.realizedGainLoss.toNumber()).toBe(-120);
      expect(summary2024.disposalCount).toBe(1);
    });

    it('should keep cash flows out of the lots and summarize them per year', () => {
      const result = engine.run(createHistory());

      expect(result.cashFlows).toHaveLength(2);
      expect(result.cashFlowSummaries).toHaveLength(1);
      const [cashFlow] = result.cashFlowSummaries;
      expect(cashFlow.dividends.toNumber()).toBe(25);
      expect(cashFlow.taxWithheld.toNumber()).toBe(-7.5);
      expect(cashFlow.net.toNumber()).toBe(17.5);
      expect(cashFlow.entryCount).toBe(2);
    });

    it('should report final positions including closed lots', () => {
      const positions = engine.run(createHistory()).positions;
      const stock = positions.find((lot) => lot.instrumentId === 'US.AAPL');
      const option = positions.find((lot) => lot.instrumentId === OPTION.instrumentId);

      expect(stock?.openQuantity.toNumber()).toBe(0);
      expect(option?.openQuantity.toNumber()).toBe(1);
      expect(option?.averageUnitCost.toNumber()).toBe(300);
    });

    it('should give identical results on repeated runs', () => {
      const first = engine.run(createHistory());
      const second = engine.run(createHistory());

      expect(second.annualSummaries.map((summary) => summary.realizedGainLoss.toNumber())).toEqual(
        first.annualSummaries.map((summary) => summary.realizedGainLoss.toNumber()),
      );
      expect(second.positions.map((lot) => lot.openQuantity.toNumber())).toEqual(
        first.positions.map((lot) => lot.openQuantity.toNumber()),
      );
    });

    it('should keep going after an anomaly', () => {
      const result = engine.run([
        sell(5, 10, { id: 'early-sell', at: '2024-01-01T10:00:00Z' }),
        buy(10, 10, { at: '2024-01-02T10:00:00Z' }),
        sell(20, 12, { id: 'oversell', at: '2024-01-03T10:00:00Z' }),
        sell(10, 12, { at: '2024-01-04T10:00:00Z' }),
      ]);

      expect(result.anomalies.map((anomaly) => [anomaly.transaction.id, anomaly.reason])).toEqual([
        ['early-sell', AnomalyReason.NO_OPENING_POSITION],
        ['oversell', AnomalyReason.OVERSELL],
      ]);
      expect(result.ledgerRows).toHaveLength(1);
      expect(result.ledgerRows[0].realizedGainLoss.toNumber()).toBe(20);
    });

    it('should not leak lots between runs', () => {
      engine.run([buy(10, 10)]);
      const result = engine.run([sell(10, 12)]);

      expect(result.anomalies[0].reason).toBe(AnomalyReason.NO_OPENING_POSITION);
    });
  });

  describe('option expirations', () => {
    it('should expire contracts whose expiry passed before the as-of date', () => {
      const result = engine.run(createHistory(), { asOf: new Date('2024-03-01T00:00:00Z') });
      const expiration = result.ledgerRows[result.ledgerRows.length - 1];

      expect(result.ledgerRows).toHaveLength(4);
      expect(expiration.transaction.id).toBe('expire:ACC-1:US.AAPL240119C200000');
      expect(expiration.synthetic).toBe(true);
      expect(expiration.timestamp.toISOString()).toBe('2024-01-19T23:59:59.000Z');
      expect(expiration.taxYear).toBe(2024);
      expect(expiration.realizedGainLoss.toNumber()).toBe(-300);
      expect(result.annualSummaries[1].optionGainLoss.toNumber()).toBe(-300);
    });

    it('should leave a contract open on its expiry date', () => {
      const result = engine.run(createHistory(), { asOf: new Date('2024-01-19T21:00:00Z') });

      expect(result.ledgerRows).toHaveLength(3);
    });

    it('should not synthesize expirations without an as-of date', () => {
      const result = engine.run(createHistory());

      expect(result.ledgerRows.some((row) => row.synthetic)).toBe(false);
    });

    it('should leave a contract open when the lot has activity after its expiry', () => {
      const result = engine.run(
        [
          buy(2, 300, { ...OPTION, at: '2024-01-10T14:00:00Z' }),
          sell(3, 400, { ...OPTION, id: 'late-oversell', at: '2024-01-22T14:00:00Z' }),
        ],
        { asOf: new Date('2024-03-01T00:00:00Z') },
      );

      expect(result.ledgerRows).toHaveLength(0);
      expect(result.anomalies.map((anomaly) => [anomaly.transaction.id, anomaly.reason])).toEqual([
        ['late-oversell', AnomalyReason.OVERSELL],
      ]);
      expect(result.positions[0].openQuantity.toNumber()).toBe(2);
    });

    it('should let the run options switch synthesis off', () => {
      const result = engine.run(createHistory(), {
        asOf: new Date('2024-03-01T00:00:00Z'),
        synthesizeExpirations: false,
      });

      expect(result.ledgerRows).toHaveLength(3);
    });
  });

  describe('input errors', () => {
    it('should throw DataOrderingError for an out-of-order lot', () => {
      const records = [
        buy(10, 10, { at: '2024-02-01T10:00:00Z' }),
        sell(5, 12, { id: 'late', at: '2024-01-15T10:00:00Z' }),
      ];

      expect(() => engine.run(records)).toThrow(DataOrderingError);
      expect(() => engine.run(records)).toThrow(
        'Out-of-order record late for ACC-1::US.AAPL: 2024-01-15T10:00:00.000Z precedes 2024-02-01T10:00:00.000Z',
      );
    });

    it('should reject duplicate record ids before accounting', () => {
      const records = [buy(10, 10, { id: 'dup' }), sell(5, 12, { id: 'dup' })];

      expect(() => engine.run(records)).toThrow(MalformedRecordError);
      expect(() => engine.run(records)).toThrow('Malformed record dup: duplicate id');
    });

    it('should reject zero quantities and negative prices', () => {
      expect(() => engine.run([buy(0, 10, { id: 'zero' })])).toThrow(
        'Malformed record zero: BUY quantity must not be 0',
      );
      expect(() => engine.run([sell(1, -1, { id: 'negative' })])).toThrow(
        'Malformed record negative: price and fee must not be negative',
      );
    });

    it('should reject invalid timestamps', () => {
      expect(() => engine.run([buy(1, 10, { id: 'bad-time', at: 'not a date' })])).toThrow(
        'Malformed record bad-time: invalid timestamp',
      );
    });
  });
});
