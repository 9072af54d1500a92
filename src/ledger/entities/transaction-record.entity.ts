import Decimal from 'decimal.js';

export enum TransactionAction {
  BUY = 'BUY',
  SELL = 'SELL',
  OPTION_ASSIGN = 'OPTION_ASSIGN',
  OPTION_EXPIRE = 'OPTION_EXPIRE',
  DIVIDEND = 'DIVIDEND',
  TAX_WITHHOLDING = 'TAX_WITHHOLDING',
  SPLIT = 'SPLIT',
}

export enum InstrumentType {
  STOCK = 'stock',
  OPTION = 'option',
  OTHER = 'other',   // warrants, futures and anything else not modeled
}

// Fields shared by every normalized record.
interface BaseTransactionRecord {
  id: string;                 // broker deal id or generated UUID
  accountId: string;
  instrumentId: string;       // broker-native code, e.g. US.AAPL or US.AAPL240419C200000
  instrumentType: InstrumentType;
  currency: string;           // settlement currency; fees and prices share it
  timestamp: Date;
  note?: string;
}

interface TradeFields {
  quantity: Decimal;
  unitPrice: Decimal;
  feeTotal: Decimal;          // in `currency`
}

// BUY/SELL: quantity is the traded magnitude, direction comes from the action.
export interface BuyRecord extends BaseTransactionRecord, TradeFields {
  action: TransactionAction.BUY;
}

export interface SellRecord extends BaseTransactionRecord, TradeFields {
  action: TransactionAction.SELL;
}

export type TradeRecord = BuyRecord | SellRecord;

// Assignment: positive quantity receives units, negative delivers them.
export interface AssignmentRecord extends BaseTransactionRecord, TradeFields {
  action: TransactionAction.OPTION_ASSIGN;
}

// Expiration closes whatever is still open for the contract.
export interface ExpirationRecord extends BaseTransactionRecord {
  action: TransactionAction.OPTION_EXPIRE;
  feeTotal: Decimal;
  synthetic?: boolean;
}

export interface CashFlowRecord extends BaseTransactionRecord {
  action: TransactionAction.DIVIDEND | TransactionAction.TAX_WITHHOLDING;
  amount: Decimal;            // signed; withholding is usually negative
}

// ratio = new units per old unit (2:1 forward split -> 2, 1:2 reverse -> 0.5)
export interface SplitRecord extends BaseTransactionRecord {
  action: TransactionAction.SPLIT;
  ratio: Decimal;
}

export type TransactionRecord =
  | TradeRecord
  | AssignmentRecord
  | ExpirationRecord
  | CashFlowRecord
  | SplitRecord;

// Records that reduce an open lot.
export type DisposalRecord = SellRecord | AssignmentRecord | ExpirationRecord;

export function isCashFlow(record: TransactionRecord): record is CashFlowRecord {
  return record.action === TransactionAction.DIVIDEND || record.action === TransactionAction.TAX_WITHHOLDING;
}

// Ids may contain any character, so the pair is encoded rather than joined.
export function lotKey(record: Pick<BaseTransactionRecord, 'accountId' | 'instrumentId'>): string {
  return JSON.stringify([record.accountId, record.instrumentId]);
}

export function describeLot(record: Pick<BaseTransactionRecord, 'accountId' | 'instrumentId'>): string {
  return `${record.accountId}::${record.instrumentId}`;
}
