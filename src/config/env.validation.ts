import { plainToInstance } from 'class-transformer';
import { IsIn, IsInt, IsOptional, Max, Min, validateSync } from 'class-validator';
import { LOG_LEVELS } from './configuration';

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsIn(LOG_LEVELS)
  LOG_LEVEL?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  OPTION_CONTRACT_MULTIPLIER?: number;

  // kept as text; ledgerConfig reads anything but 'false' as on
  @IsOptional()
  @IsIn(['true', 'false'])
  SYNTHESIZE_OPTION_EXPIRATIONS?: string;
}

/**
 * Fails startup on invalid environment variables.
 * Passed to ConfigModule.forRoot({ validate }).
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(`Invalid environment: ${errors.map((error) => error.toString()).join('; ')}`);
  }
  return validated;
}
