import { Test, TestingModule } from '@nestjs/testing';
import { BrokerNormalizerService, parseBrokerTime, sortForLedger } from './broker-normalizer.service';
import { BrokerTradeRow } from './entities/broker-row.entity';
import { InstrumentType, TransactionAction } from './entities/transaction-record.entity';
import { MalformedRecordError } from './errors/malformed-record.error';
import { buy, resetRecordSequence, sell } from './testing/record-factory';
import { ledgerConfig } from '../config/configuration';

describe('BrokerNormalizerService', () => {
  let normalizer: BrokerNormalizerService;
  let dealIdCounter = 1;

  const createTradeRow = (overrides: Partial<BrokerTradeRow>): BrokerTradeRow => ({
    dealId: `deal-${dealIdCounter++}`,
    code: 'US.AAPL',
    side: 'BUY',
    qty: 10,
    price: 150,
    fees: 1.5,
    createTime: '2024-03-05 09:31:02',
    ...overrides,
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        BrokerNormalizerService,
        {
          provide: ledgerConfig.KEY,
          useValue: { optionContractMultiplier: 100, synthesizeOptionExpirations: true },
        },
      ],
    }).compile();

    normalizer = module.get<BrokerNormalizerService>(BrokerNormalizerService);
    dealIdCounter = 1;
    resetRecordSequence();
  });

  describe('parseBrokerTime', () => {
    it('should read broker wall-clock time as UTC without milliseconds', () => {
      expect(parseBrokerTime('2024-03-05 09:31:02.123')?.toISOString()).toBe('2024-03-05T09:31:02.000Z');
      expect(parseBrokerTime('2024-03-05T09:31')?.toISOString()).toBe('2024-03-05T09:31:00.000Z');
      expect(parseBrokerTime('2024-03-05')?.toISOString()).toBe('2024-03-05T00:00:00.000Z');
    });

    it('should reject unreadable and impossible dates', () => {
      expect(parseBrokerTime('05/03/2024')).toBeUndefined();
      expect(parseBrokerTime('2024-02-30 10:00:00')).toBeUndefined();
    });

    it('should reject out-of-range fields instead of rolling them over', () => {
      expect(parseBrokerTime('2024-13-05 10:00:00')).toBeUndefined();
      expect(parseBrokerTime('2024-00-05 10:00:00')).toBeUndefined();
      expect(parseBrokerTime('2024-03-05 24:00:00')).toBeUndefined();
      expect(parseBrokerTime('2024-03-05 10:99:00')).toBeUndefined();
      expect(parseBrokerTime('2024-03-05 10:00:60')).toBeUndefined();
      expect(parseBrokerTime('2024-12-31 23:59:59')?.toISOString()).toBe('2024-12-31T23:59:59.000Z');
    });
  });

  describe('sortForLedger', () => {
    it('should order by account, instrument and time, keeping ties in input order', () => {
      const records = [
        sell(1, 10, { id: 'b-late', instrumentId: 'US.MSFT', at: '2024-01-03T00:00:00Z' }),
        buy(1, 10, { id: 'a-tie-1', at: '2024-01-02T00:00:00Z' }),
        buy(1, 10, { id: 'other-account', accountId: 'ACC-0', at: '2024-06-01T00:00:00Z' }),
        buy(1, 10, { id: 'a-tie-2', at: '2024-01-02T00:00:00Z' }),
        buy(1, 10, { id: 'b-early', instrumentId: 'US.MSFT', at: '2024-01-01T00:00:00Z' }),
      ];

      expect(sortForLedger(records).map((record) => record.id)).toEqual([
        'other-account',
        'a-tie-1',
        'a-tie-2',
        'b-early',
        'b-late',
      ]);
    });
  });

  describe('normalizeTrades', () => {
    it('should map broker sides onto buys and sells', () => {
      const records = normalizer.normalizeTrades('ACC-1', [
        createTradeRow({ side: 'OrderSide.BUY' }),
        createTradeRow({ side: '卖出' }),
        createTradeRow({ side: 'SELL_SHORT' }),
        createTradeRow({ side: 'buy_back' }),
      ]);

      expect(records.map((record) => record.action)).toEqual([
        TransactionAction.BUY,
        TransactionAction.SELL,
        TransactionAction.SELL,
        TransactionAction.BUY,
      ]);
    });

    it('should derive the currency from the market prefix', () => {
      const [record] = normalizer.normalizeTrades('ACC-1', [createTradeRow({ code: 'HK.00700' })]);

      expect(record.currency).toBe('HKD');
      expect(record.instrumentType).toBe(InstrumentType.STOCK);
      expect(record.timestamp.toISOString()).toBe('2024-03-05T09:31:02.000Z');
    });

    it('should price option contracts with the contract multiplier', () => {
      const [record] = normalizer.normalizeTrades('ACC-1', [
        createTradeRow({ code: 'US.AAPL240419C200000', qty: 2, price: '1.25' }),
      ]);

      expect(record.instrumentType).toBe(InstrumentType.OPTION);
      expect(record.quantity.toNumber()).toBe(2);
      expect(record.unitPrice.toNumber()).toBe(125);
    });

    it('should map unknown security types to unrecognized instruments', () => {
      const [record] = normalizer.normalizeTrades('ACC-1', [createTradeRow({ securityType: 'WARRANT' })]);

      expect(record.instrumentType).toBe(InstrumentType.OTHER);
    });

    it('should drop repeated deal ids', () => {
      const records = normalizer.normalizeTrades('ACC-1', [
        createTradeRow({ dealId: 'deal-x' }),
        createTradeRow({ dealId: 'deal-x', qty: 99 }),
      ]);

      expect(records).toHaveLength(1);
      expect(records[0].quantity.toNumber()).toBe(10);
    });

    it('should reject unknown sides', () => {
      expect(() => normalizer.normalizeTrades('ACC-1', [createTradeRow({ dealId: 'd1', side: 'HOLD' })])).toThrow(
        'Malformed record d1: unknown side "HOLD"',
      );
    });

    it('should reject fees charged in another currency', () => {
      expect(() =>
        normalizer.normalizeTrades('ACC-1', [createTradeRow({ dealId: 'd2', feeCurrency: 'HKD' })]),
      ).toThrow('Malformed record d2: fee currency HKD differs from USD');
    });

    it('should reject zero or unreadable quantities', () => {
      expect(() => normalizer.normalizeTrades('ACC-1', [createTradeRow({ qty: '0' })])).toThrow(
        MalformedRecordError,
      );
      expect(() => normalizer.normalizeTrades('ACC-1', [createTradeRow({ qty: 'ten' })])).toThrow(
        MalformedRecordError,
      );
    });

    it('should reject trades with an out-of-range time', () => {
      expect(() =>
        normalizer.normalizeTrades('ACC-1', [createTradeRow({ dealId: 'd4', createTime: '2024-13-05 10:00:00' })]),
      ).toThrow('Malformed record d4: unreadable time "2024-13-05 10:00:00"');
    });

    it('should reject codes from unknown markets without a currency', () => {
      expect(() =>
        normalizer.normalizeTrades('ACC-1', [createTradeRow({ dealId: 'd3', code: 'XX.ABC' })]),
      ).toThrow('Malformed record d3: no currency given and unknown market in "XX.ABC"');
    });
  });

  describe('normalizeCashFlows', () => {
    it('should classify withholding before dividends and ignore other entries', () => {
      const records = normalizer.normalizeCashFlows('ACC-1', [
        { cashflowId: 'cf-1', code: 'US.AAPL', currency: 'USD', amount: '24.00', description: 'Cash Dividend', dealTime: '2024-05-16' },
        { cashflowId: 'cf-2', code: 'US.AAPL', currency: 'USD', amount: -2.4, description: 'Dividend Tax Withholding', dealTime: '2024-05-16' },
        { cashflowId: 'cf-3', currency: 'USD', amount: 1000, description: 'Deposit', dealTime: '2024-05-17' },
      ]);

      expect(records.map((record) => [record.id, record.action, record.amount.toNumber()])).toEqual([
        ['cf-1', TransactionAction.DIVIDEND, 24],
        ['cf-2', TransactionAction.TAX_WITHHOLDING, -2.4],
      ]);
      expect(records[0].note).toBe('Cash Dividend');
    });

    it('should book cash flows without a code against the currency', () => {
      const [record] = normalizer.normalizeCashFlows('ACC-1', [
        { currency: 'HKD', amount: 50, description: '股息', dealTime: '2024-06-01 08:00:00' },
      ]);

      expect(record.instrumentId).toBe('CASH.HKD');
      expect(record.currency).toBe('HKD');
    });
  });

  describe('normalizeSplits', () => {
    it('should turn "a:b" into a units-per-unit ratio', () => {
      const [forward, reverse] = normalizer.normalizeSplits('ACC-1', [
        { date: '2024-06-10', code: 'US.NVDA', ratio: '10:1' },
        { date: '2024-07-01', code: 'HK.09999', ratio: '1:2' },
      ]);

      expect(forward.id).toBe('split:US.NVDA:2024-06-10');
      expect(forward.ratio.toNumber()).toBe(10);
      expect(forward.currency).toBe('USD');
      expect(reverse.ratio.toNumber()).toBe(0.5);
      expect(reverse.currency).toBe('HKD');
    });

    it('should reject unreadable ratios', () => {
      expect(() => normalizer.normalizeSplits('ACC-1', [{ date: '2024-06-10', code: 'US.NVDA', ratio: '2:0' }])).toThrow(
        'Malformed record split:US.NVDA:2024-06-10: unreadable split ratio "2:0"',
      );
    });
  });

  describe('normalize', () => {
    it('should put a split ahead of trades at the same time', () => {
      const records = normalizer.normalize({
        accountId: 'ACC-1',
        trades: [
          createTradeRow({ dealId: 'after', code: 'US.NVDA', createTime: '2024-06-10 00:00:00' }),
          createTradeRow({ dealId: 'before', code: 'US.NVDA', createTime: '2024-06-07 15:59:00' }),
        ],
        splits: [{ date: '2024-06-10', code: 'US.NVDA', ratio: '10:1' }],
      });

      expect(records.map((record) => record.id)).toEqual(['before', 'split:US.NVDA:2024-06-10', 'after']);
      expect(records.every((record) => record.accountId === 'ACC-1')).toBe(true);
    });
  });
});
