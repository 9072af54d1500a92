import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsDateString,
  IsDefined,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import {
  BrokerCashFlowRow,
  BrokerHistory,
  BrokerTradeRow,
  StockSplitRow,
} from '../../ledger/entities/broker-row.entity';

// Numeric fields stay loose here; the normalizer parses them.
export class BrokerTradeRowDto implements BrokerTradeRow {
  @IsOptional()
  @IsString()
  dealId?: string;

  @IsString()
  @IsNotEmpty()
  code!: string;

  @IsString()
  @IsNotEmpty()
  side!: string;

  @IsDefined()
  qty!: number | string;

  @IsDefined()
  price!: number | string;

  @IsOptional()
  fees?: number | string;

  @IsOptional()
  @IsString()
  currency?: string;

  @IsOptional()
  @IsString()
  feeCurrency?: string;

  @IsOptional()
  @IsString()
  securityType?: string;

  @IsString()
  @IsNotEmpty()
  createTime!: string;
}

export class BrokerCashFlowRowDto implements BrokerCashFlowRow {
  @IsOptional()
  @IsString()
  cashflowId?: string;

  @IsOptional()
  @IsString()
  code?: string;

  @IsString()
  @IsNotEmpty()
  currency!: string;

  @IsDefined()
  amount!: number | string;

  @IsString()
  description!: string;

  @IsString()
  @IsNotEmpty()
  dealTime!: string;
}

export class StockSplitDto implements StockSplitRow {
  @IsString()
  @IsNotEmpty()
  date!: string;

  @IsString()
  @IsNotEmpty()
  code!: string;

  @IsString()
  @IsNotEmpty()
  ratio!: string;
}

// Raw broker export for one account.
export class BrokerImportDto implements BrokerHistory {
  @IsOptional()
  @IsString()
  label?: string;

  @IsString()
  @IsNotEmpty()
  accountId!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => BrokerTradeRowDto)
  trades!: BrokerTradeRowDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => BrokerCashFlowRowDto)
  cashFlows?: BrokerCashFlowRowDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => StockSplitDto)
  splits?: StockSplitDto[];

  @IsOptional()
  @IsDateString()
  asOf?: string;

  @IsOptional()
  @IsBoolean()
  synthesizeExpirations?: boolean;
}
