import { MAX_TIMER_DELAY_MS, secondsToMs, validateEnv } from './env.validation';

describe('validateEnv', () => {
  it('should apply defaults for an empty environment', () => {
    const env = validateEnv({});

    expect(env).toEqual({
      NODE_ENV: 'development',
      PORT: '9101',
      HOST: '0.0.0.0',
      LOG_LEVEL: 'log',
      INTERFACE: 'eth0',
      PREFIX_LENGTH: '64',
      POLLING_INTERVAL: '10',
      SCHEDULER_ENABLED: 'true',
      STATE_FILE: 'interface.state',
      METRICS_DEFAULT_COLLECTORS: 'true',
    });
  });

  it('should keep provided values', () => {
    const env = validateEnv({
      INTERFACE: 'wan0',
      PREFIX_LENGTH: '56',
      POLLING_INTERVAL: '2.5',
      STATE_FILE: '',
    });

    expect(env.INTERFACE).toBe('wan0');
    expect(env.PREFIX_LENGTH).toBe('56');
    expect(env.POLLING_INTERVAL).toBe('2.5');
    expect(env.STATE_FILE).toBe('');
  });

  it('should accept the prefix length bounds', () => {
    expect(validateEnv({ PREFIX_LENGTH: '0' }).PREFIX_LENGTH).toBe('0');
    expect(validateEnv({ PREFIX_LENGTH: '128' }).PREFIX_LENGTH).toBe('128');
  });

  it('should reject a prefix length above 128', () => {
    expect(() => validateEnv({ PREFIX_LENGTH: '129' })).toThrow(
      'Invalid configuration:\n  PREFIX_LENGTH: PREFIX_LENGTH must be an integer between 0 and 128',
    );
  });

  it('should reject a non-numeric prefix length', () => {
    expect(() => validateEnv({ PREFIX_LENGTH: '/64' })).toThrow('PREFIX_LENGTH');
  });

  it('should reject a zero polling interval', () => {
    expect(() => validateEnv({ POLLING_INTERVAL: '0' })).toThrow(
      'POLLING_INTERVAL: POLLING_INTERVAL must be a number of seconds between 0.001 and 2147483.647',
    );
  });

  it('should reject a polling interval that rounds to 0ms', () => {
    expect(() => validateEnv({ POLLING_INTERVAL: '0.0001' })).toThrow('POLLING_INTERVAL');
  });

  it('should reject a polling interval beyond the timer limit', () => {
    expect(secondsToMs('3000000')).toBeGreaterThan(MAX_TIMER_DELAY_MS);
    expect(() => validateEnv({ POLLING_INTERVAL: '3000000' })).toThrow('POLLING_INTERVAL');
    expect(() => validateEnv({ POLLING_INTERVAL: '2147484' })).toThrow('POLLING_INTERVAL');
  });

  it('should accept the polling interval bounds', () => {
    expect(validateEnv({ POLLING_INTERVAL: '0.001' }).POLLING_INTERVAL).toBe('0.001');
    expect(validateEnv({ POLLING_INTERVAL: '2147483' }).POLLING_INTERVAL).toBe('2147483');
  });

  it('should reject an unknown log level', () => {
    expect(() => validateEnv({ LOG_LEVEL: 'trace' })).toThrow('LOG_LEVEL');
  });

  it('should list every failing variable', () => {
    expect(() => validateEnv({ PORT: 'http', POLLING_INTERVAL: '-1' })).toThrow(
      'Invalid configuration:\n  PORT: PORT must be an integer\n  POLLING_INTERVAL: POLLING_INTERVAL must be a number of seconds between 0.001 and 2147483.647',
    );
  });
});
