import { z } from 'zod';

const integerString = /^\d+$/;
const decimalString = /^\d+(\.\d+)?$/;

export const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;

/** Largest delay setTimeout honours; anything above fires after 1ms */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export function secondsToMs(seconds: string): number {
  return Math.round(parseFloat(seconds) * 1000);
}

export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().regex(integerString, 'PORT must be an integer').default('9101'),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('log'),

  // Watched interface
  INTERFACE: z.string().min(1, 'INTERFACE is required').default('eth0'),
  PREFIX_LENGTH: z
    .string()
    .default('64')
    .refine(
      (value) => integerString.test(value) && parseInt(value, 10) <= 128,
      'PREFIX_LENGTH must be an integer between 0 and 128',
    ),

  // Refresh loop
  POLLING_INTERVAL: z
    .string()
    .default('10')
    .refine((value) => {
      if (!decimalString.test(value)) return false;
      const ms = secondsToMs(value);
      return ms >= 1 && ms <= MAX_TIMER_DELAY_MS;
    }, 'POLLING_INTERVAL must be a number of seconds between 0.001 and 2147483.647'),
  SCHEDULER_ENABLED: z.string().default('true'),

  // Persistence (empty string disables it)
  STATE_FILE: z.string().default('interface.state'),

  // Metrics
  METRICS_DEFAULT_COLLECTORS: z.string().default('true'),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validate the merged environment, applying defaults.
 * Every failing variable is reported in one error.
 */
export function validateEnv(env: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(env);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`);
  throw new Error(['Invalid configuration:', ...issues].join('\n'));
}
