import {
  IsDateString,
  IsEnum,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Min,
  NotEquals,
  ValidateIf,
} from 'class-validator';
import { InstrumentType, TransactionAction } from '../../ledger/entities/transaction-record.entity';

const PRICED_ACTIONS: string[] = [
  TransactionAction.BUY,
  TransactionAction.SELL,
  TransactionAction.OPTION_ASSIGN,
];
const CASH_ACTIONS: string[] = [TransactionAction.DIVIDEND, TransactionAction.TAX_WITHHOLDING];

// One normalized record. Which amount fields are required depends on the action.
export class TransactionRecordDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  accountId!: string;

  @IsString()
  @IsNotEmpty()
  instrumentId!: string;

  @IsEnum(InstrumentType)
  instrumentType!: InstrumentType;

  @IsEnum(TransactionAction)
  action!: TransactionAction;

  @IsString()
  @IsNotEmpty()
  currency!: string;

  @IsDateString()
  timestamp!: string;

  // BUY/SELL magnitude; signed for OPTION_ASSIGN (negative delivers)
  @ValidateIf((dto: TransactionRecordDto) => PRICED_ACTIONS.includes(dto.action))
  @IsNumber()
  @NotEquals(0)
  quantity?: number;

  @ValidateIf((dto: TransactionRecordDto) => PRICED_ACTIONS.includes(dto.action))
  @IsNumber()
  @Min(0)
  unitPrice?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  feeTotal?: number;

  @ValidateIf((dto: TransactionRecordDto) => CASH_ACTIONS.includes(dto.action))
  @IsNumber()
  amount?: number;

  @ValidateIf((dto: TransactionRecordDto) => dto.action === TransactionAction.SPLIT)
  @IsNumber()
  @IsPositive()
  ratio?: number;

  @IsOptional()
  @IsString()
  note?: string;
}
