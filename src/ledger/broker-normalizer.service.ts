import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import {
  BrokerCashFlowRow,
  BrokerHistory,
  BrokerTradeRow,
  StockSplitRow,
} from './entities/broker-row.entity';
import {
  CashFlowRecord,
  InstrumentType,
  SplitRecord,
  TradeRecord,
  TransactionAction,
  TransactionRecord,
} from './entities/transaction-record.entity';
import { MalformedRecordError } from './errors/malformed-record.error';
import { classifyInstrument } from './utils/option-code.util';
import { ledgerConfig } from '../config/configuration';
import { toDecimal } from '../common/utils/decimal.util';

const SIDE_MAPPING: Record<string, TransactionAction.BUY | TransactionAction.SELL> = {
  'buy': TransactionAction.BUY,
  'orderside.buy': TransactionAction.BUY,
  '买入': TransactionAction.BUY,
  'buy_back': TransactionAction.BUY,
  'sell': TransactionAction.SELL,
  'orderside.sell': TransactionAction.SELL,
  '卖出': TransactionAction.SELL,
  'sell_short': TransactionAction.SELL,
};

const MARKET_CURRENCIES: Record<string, string> = {
  HK: 'HKD',
  US: 'USD',
  SH: 'CNH',
  SZ: 'CNH',
  SG: 'SGD',
  JP: 'JPY',
};

const SECURITY_TYPES: Record<string, InstrumentType> = {
  STOCK: InstrumentType.STOCK,
  ETF: InstrumentType.STOCK,
  OPTION: InstrumentType.OPTION,
  DRVT: InstrumentType.OPTION,
};

// Withholding is checked first: "dividend tax" entries are withholding.
const WITHHOLDING_KEYWORDS = ['withholding', 'tax', '预扣', '税'];
const DIVIDEND_KEYWORDS = ['dividend', '股息', '派息', '红利'];

const BROKER_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?)?$/;

/**
 * Reads broker wall-clock time as UTC, dropping milliseconds.
 * Keeps the calendar year of the broker's own clock.
 */
export function parseBrokerTime(value: string): Date | undefined {
  const match = BROKER_TIME_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const [year, month, day, hour, minute, second] = match
    .slice(1, 7)
    .map((part) => Number(part ?? '0'));
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC rolls out-of-range fields into the next unit
  const roundTrips =
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    date.getUTCHours() === hour &&
    date.getUTCMinutes() === minute &&
    date.getUTCSeconds() === second;
  return roundTrips ? date : undefined;
}

/** Stable sort by (account, instrument, time); ties keep input order */
export function sortForLedger(records: TransactionRecord[]): TransactionRecord[] {
  return [...records].sort(
    (a, b) =>
      a.accountId.localeCompare(b.accountId) ||
      a.instrumentId.localeCompare(b.instrumentId) ||
      a.timestamp.getTime() - b.timestamp.getTime(),
  );
}

// Converts raw broker exports into ledger records.
// Rejects rows it cannot read; the ledger assumes well-formed input.
@Injectable()
export class BrokerNormalizerService {
  private readonly logger = new Logger(BrokerNormalizerService.name);

  constructor(
    @Inject(ledgerConfig.KEY)
    private readonly config: ConfigType<typeof ledgerConfig>,
  ) {}

  /**
   * Normalizes trades, cash flows and splits for one account.
   * @throws MalformedRecordError on the first unreadable row
   */
  normalize(history: BrokerHistory): TransactionRecord[] {
    const trades = this.normalizeTrades(history.accountId, history.trades);
    const cashFlows = this.normalizeCashFlows(history.accountId, history.cashFlows ?? []);
    const splits = this.normalizeSplits(history.accountId, history.splits ?? []);

    // splits sort ahead of same-timestamp trades
    return sortForLedger([...splits, ...trades, ...cashFlows]);
  }

  normalizeTrades(accountId: string, rows: BrokerTradeRow[]): TradeRecord[] {
    const seenDealIds = new Set<string>();
    const records: TradeRecord[] = [];

    for (const row of rows) {
      if (row.dealId !== undefined) {
        if (seenDealIds.has(row.dealId)) {
          this.logger.warn(`Dropping duplicate deal ${row.dealId} for ${row.code}`);
          continue;
        }
        seenDealIds.add(row.dealId);
      }
      records.push(this.normalizeTrade(accountId, row));
    }
    return records;
  }

  normalizeCashFlows(accountId: string, rows: BrokerCashFlowRow[]): CashFlowRecord[] {
    const records: CashFlowRecord[] = [];

    for (const row of rows) {
      const action = this.classifyCashFlow(row.description);
      if (!action) {
        this.logger.debug(`Ignoring cash flow "${row.description}"`);
        continue;
      }
      const id = row.cashflowId ?? uuidv4();
      const code = row.code ?? `CASH.${row.currency}`;

      records.push({
        id,
        action,
        accountId,
        instrumentId: code,
        instrumentType: classifyInstrument(code),
        currency: row.currency,
        timestamp: this.requireTime(row.dealTime, id),
        amount: this.parseAmount(row.amount, 'amount', id),
        note: row.description,
      });
    }
    return records;
  }

  normalizeSplits(accountId: string, rows: StockSplitRow[]): SplitRecord[] {
    return rows.map((row) => {
      const id = `split:${row.code}:${row.date}`;
      return {
        id,
        action: TransactionAction.SPLIT,
        accountId,
        instrumentId: row.code,
        instrumentType: classifyInstrument(row.code),
        currency: this.currencyOf(row.code, undefined, id),
        timestamp: this.requireTime(row.date, id),
        ratio: this.parseRatio(row.ratio, id),
        note: `Split ${row.ratio}`,
      };
    });
  }

  private normalizeTrade(accountId: string, row: BrokerTradeRow): TradeRecord {
    const id = row.dealId ?? uuidv4();
    const action = SIDE_MAPPING[row.side.trim().toLowerCase()];
    if (!action) {
      throw new MalformedRecordError(`unknown side "${row.side}"`, id);
    }

    const currency = this.currencyOf(row.code, row.currency, id);
    if (row.feeCurrency && row.feeCurrency !== currency) {
      throw new MalformedRecordError(`fee currency ${row.feeCurrency} differs from ${currency}`, id);
    }

    const quantity = this.parseAmount(row.qty, 'qty', id);
    const price = this.parseAmount(row.price, 'price', id);
    const feeTotal = row.fees === undefined ? new Decimal(0) : this.parseAmount(row.fees, 'fees', id);
    if (!quantity.greaterThan(0) || price.isNegative() || feeTotal.isNegative()) {
      throw new MalformedRecordError('qty must be positive, price and fees not negative', id);
    }

    const instrumentType = this.instrumentTypeOf(row);
    // option quotes are per share; the ledger prices whole contracts
    const unitPrice =
      instrumentType === InstrumentType.OPTION ? price.times(this.config.optionContractMultiplier) : price;

    return {
      id,
      action,
      accountId,
      instrumentId: row.code,
      instrumentType,
      currency,
      timestamp: this.requireTime(row.createTime, id),
      quantity,
      unitPrice,
      feeTotal,
    };
  }

  private instrumentTypeOf(row: BrokerTradeRow): InstrumentType {
    if (!row.securityType) {
      return classifyInstrument(row.code);
    }
    return SECURITY_TYPES[row.securityType.toUpperCase()] ?? InstrumentType.OTHER;
  }

  private classifyCashFlow(
    description: string,
  ): TransactionAction.DIVIDEND | TransactionAction.TAX_WITHHOLDING | undefined {
    const text = description.toLowerCase();
    if (WITHHOLDING_KEYWORDS.some((keyword) => text.includes(keyword))) {
      return TransactionAction.TAX_WITHHOLDING;
    }
    if (DIVIDEND_KEYWORDS.some((keyword) => text.includes(keyword))) {
      return TransactionAction.DIVIDEND;
    }
    return undefined;
  }

  private currencyOf(code: string, explicit: string | undefined, id: string): string {
    if (explicit) {
      return explicit;
    }
    const market = code.split('.')[0];
    const currency = MARKET_CURRENCIES[market];
    if (!currency) {
      throw new MalformedRecordError(`no currency given and unknown market in "${code}"`, id);
    }
    return currency;
  }

  private requireTime(value: string, id: string): Date {
    const time = parseBrokerTime(value);
    if (!time) {
      throw new MalformedRecordError(`unreadable time "${value}"`, id);
    }
    return time;
  }

  private parseAmount(value: number | string, field: string, id: string): Decimal {
    let amount: Decimal;
    try {
      amount = toDecimal(typeof value === 'string' ? value.trim() : value);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MalformedRecordError(`${field} "${value}" is not a number (${reason})`, id);
    }
    if (!amount.isFinite()) {
      throw new MalformedRecordError(`${field} "${value}" is not a number`, id);
    }
    return amount;
  }

  // "a:b" -> a new units for every b old units
  private parseRatio(value: string, id: string): Decimal {
    const match = /^\s*(\d+(?:\.\d+)?)\s*:\s*(\d+(?:\.\d+)?)\s*$/.exec(value);
    if (!match || Number(match[2]) === 0) {
      throw new MalformedRecordError(`unreadable split ratio "${value}"`, id);
    }
    return toDecimal(match[1]).dividedBy(toDecimal(match[2]));
  }
}
