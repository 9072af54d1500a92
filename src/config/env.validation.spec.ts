import { logLevelsUpTo, parseLogLevel } from './configuration';
import { validateEnvironment } from './env.validation';

describe('validateEnvironment', () => {
  it('should accept an empty environment', () => {
    expect(() => validateEnvironment({})).not.toThrow();
  });

  it('should convert numeric variables', () => {
    const env = validateEnvironment({
      PORT: '8080',
      LOG_LEVEL: 'debug',
      OPTION_CONTRACT_MULTIPLIER: '10',
      SYNTHESIZE_OPTION_EXPIRATIONS: 'false',
    });

    expect(env.PORT).toBe(8080);
    expect(env.LOG_LEVEL).toBe('debug');
    expect(env.OPTION_CONTRACT_MULTIPLIER).toBe(10);
    expect(env.SYNTHESIZE_OPTION_EXPIRATIONS).toBe('false');
  });

  it('should reject out-of-range ports and unknown log levels', () => {
    expect(() => validateEnvironment({ PORT: '0' })).toThrow(/^Invalid environment/);
    expect(() => validateEnvironment({ LOG_LEVEL: 'loud' })).toThrow(/^Invalid environment/);
    expect(() => validateEnvironment({ OPTION_CONTRACT_MULTIPLIER: 'abc' })).toThrow(/^Invalid environment/);
    expect(() => validateEnvironment({ SYNTHESIZE_OPTION_EXPIRATIONS: 'no' })).toThrow(/^Invalid environment/);
  });
});

describe('log levels', () => {
  it('should enable every level up to the configured one', () => {
    expect(logLevelsUpTo('warn')).toEqual(['fatal', 'error', 'warn']);
    expect(logLevelsUpTo('verbose')).toHaveLength(6);
  });

  it('should fall back to log for unknown values', () => {
    expect(parseLogLevel('debug')).toBe('debug');
    expect(parseLogLevel('loud')).toBe('log');
    expect(parseLogLevel(undefined)).toBe('log');
  });
});
