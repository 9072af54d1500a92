import { registerAs } from '@nestjs/config';
import { LogLevel } from '@nestjs/common';

// Ordered from least to most verbose; LOG_LEVEL picks the cut-off.
export const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

export function logLevelsUpTo(level: LogLevel): LogLevel[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}

// Unknown values fall back to 'log'; env validation rejects them at startup.
export function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? 'log';
}

export const appConfig = registerAs('app', () => ({
  port: parseInt(process.env.PORT ?? '3000', 10),
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
}));

export const ledgerConfig = registerAs('ledger', () => ({
  // Shares per option contract; quoted option prices are per share.
  optionContractMultiplier: parseInt(process.env.OPTION_CONTRACT_MULTIPLIER ?? '100', 10),
  // Close lapsed option positions when a run is given an as-of date.
  synthesizeOptionExpirations: process.env.SYNTHESIZE_OPTION_EXPIRATIONS !== 'false',
}));
