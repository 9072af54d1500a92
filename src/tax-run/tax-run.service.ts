import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { BrokerImportDto } from './dto/broker-import.dto';
import { CreateTaxRunDto } from './dto/create-tax-run.dto';
import { TransactionRecordDto } from './dto/transaction-record.dto';
import { TaxRun, TaxRunSource } from './entities/tax-run.entity';
import { TaxRunStorageService } from './tax-run-storage.service';
import { BrokerNormalizerService, parseBrokerTime } from '../ledger/broker-normalizer.service';
import { TransactionAction, TransactionRecord } from '../ledger/entities/transaction-record.entity';
import { MalformedRecordError } from '../ledger/errors/malformed-record.error';
import { TaxLotEngineService } from '../ledger/tax-lot-engine.service';
import { toDecimal } from '../common/utils/decimal.util';

function requireNumber(value: number | undefined, field: string, dto: TransactionRecordDto): number {
  if (value === undefined) {
    throw new MalformedRecordError(`${field} is required for ${dto.action}`, dto.id);
  }
  return value;
}

// A clock time followed by Z or a numeric offset
const EXPLICIT_OFFSET_PATTERN = /\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Reads a record timestamp; times without an offset are UTC, as broker times are.
 * @throws MalformedRecordError for ISO forms other than calendar date and time
 */
export function parseRecordTime(dto: TransactionRecordDto): Date {
  if (EXPLICIT_OFFSET_PATTERN.test(dto.timestamp)) {
    return new Date(dto.timestamp);
  }
  const time = parseBrokerTime(dto.timestamp);
  if (!time) {
    throw new MalformedRecordError(`unreadable timestamp "${dto.timestamp}"`, dto.id);
  }
  return time;
}

/**
 * Maps a validated request record onto the ledger's tagged union.
 * @throws MalformedRecordError when an action's amount field is missing
 */
export function toTransactionRecord(dto: TransactionRecordDto): TransactionRecord {
  const base = {
    id: dto.id,
    accountId: dto.accountId,
    instrumentId: dto.instrumentId,
    instrumentType: dto.instrumentType,
    currency: dto.currency,
    timestamp: parseRecordTime(dto),
    note: dto.note,
  };
  const feeTotal = toDecimal(dto.feeTotal ?? 0);

  switch (dto.action) {
    case TransactionAction.BUY:
    case TransactionAction.SELL:
    case TransactionAction.OPTION_ASSIGN:
      return {
        ...base,
        action: dto.action,
        quantity: toDecimal(requireNumber(dto.quantity, 'quantity', dto)),
        unitPrice: toDecimal(requireNumber(dto.unitPrice, 'unitPrice', dto)),
        feeTotal,
      };
    case TransactionAction.OPTION_EXPIRE:
      return { ...base, action: dto.action, feeTotal };
    case TransactionAction.DIVIDEND:
    case TransactionAction.TAX_WITHHOLDING:
      return { ...base, action: dto.action, amount: toDecimal(requireNumber(dto.amount, 'amount', dto)) };
    case TransactionAction.SPLIT:
      return { ...base, action: dto.action, ratio: toDecimal(requireNumber(dto.ratio, 'ratio', dto)) };
    default: {
      const unhandled: never = dto.action;
      throw new MalformedRecordError(`unknown action ${String(unhandled)}`, dto.id);
    }
  }
}

// Runs the engine and stores results.
// Queries over stored runs live in TaxRunQueryService.
@Injectable()
export class TaxRunService {
  private readonly logger = new Logger(TaxRunService.name);

  constructor(
    private readonly storage: TaxRunStorageService,
    private readonly engine: TaxLotEngineService,
    private readonly normalizer: BrokerNormalizerService,
  ) {}

  /** Runs over records the caller already normalized and sorted */
  createRun(dto: CreateTaxRunDto): TaxRun {
    const records = dto.transactions.map(toTransactionRecord);
    return this.execute(records, TaxRunSource.RECORDS, dto);
  }

  /** Normalizes raw broker rows for one account, then runs */
  importBrokerHistory(dto: BrokerImportDto): TaxRun {
    const records = this.normalizer.normalize(dto);
    return this.execute(records, TaxRunSource.BROKER, dto);
  }

  /** Clears all runs - test harness only */
  clearAll(): void {
    this.storage.clearAllData();
  }

  private execute(
    records: TransactionRecord[],
    source: TaxRunSource,
    options: { label?: string; asOf?: string; synthesizeExpirations?: boolean },
  ): TaxRun {
    const asOf = options.asOf ? new Date(options.asOf) : undefined;
    const result = this.engine.run(records, {
      asOf,
      synthesizeExpirations: options.synthesizeExpirations,
    });

    const run = this.storage.saveRun({
      id: uuidv4(),
      label: options.label,
      source,
      asOf,
      createdAt: new Date(),
      result,
    });
    this.logger.log(`Stored run ${run.id} (${source}, ${records.length} records)`);
    return run;
  }
}
