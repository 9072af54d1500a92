import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsDateString,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { TransactionRecordDto } from './transaction-record.dto';

// Run over records already normalized and sorted upstream.
export class CreateTaxRunDto {
  @IsOptional()
  @IsString()
  label?: string;

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => TransactionRecordDto)
  transactions!: TransactionRecordDto[];

  // lapsed option contracts are expired as of this date
  @IsOptional()
  @IsDateString()
  asOf?: string;

  @IsOptional()
  @IsBoolean()
  synthesizeExpirations?: boolean;
}
