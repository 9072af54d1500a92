import { InstrumentType } from '../entities/transaction-record.entity';

// Broker-native option code: market prefix, underlying, YYMMDD expiry, call/put, strike.
// e.g. US.AAPL240419C200000, HK.TCH251030C550000
const OPTION_CODE_PATTERN = /^(US|HK)\.([A-Z0-9]+)(\d{6})([CP])(\d+)$/;

export interface OptionContract {
  market: string;
  underlying: string;
  expiry: Date;               // UTC midnight of the expiration date
  right: 'call' | 'put';
  strike: string;             // broker-scaled strike, kept verbatim
}

export function isOptionCode(code: string): boolean {
  return OPTION_CODE_PATTERN.test(code);
}

export function classifyInstrument(code: string): InstrumentType {
  return isOptionCode(code) ? InstrumentType.OPTION : InstrumentType.STOCK;
}

/** Returns undefined when the code is not an option or the date part is not a real date. */
export function parseOptionCode(code: string): OptionContract | undefined {
  const match = OPTION_CODE_PATTERN.exec(code);
  if (!match) {
    return undefined;
  }
  const [, market, underlying, yymmdd, right, strike] = match;
  const expiry = parseExpiry(yymmdd);
  if (!expiry) {
    return undefined;
  }
  return {
    market,
    underlying,
    expiry,
    right: right === 'C' ? 'call' : 'put',
    strike,
  };
}

function parseExpiry(yymmdd: string): Date | undefined {
  const year = 2000 + Number(yymmdd.slice(0, 2));
  const month = Number(yymmdd.slice(2, 4));
  const day = Number(yymmdd.slice(4, 6));
  const date = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC rolls 2024-02-30 over into March
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
}
