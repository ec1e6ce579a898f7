import { z } from 'zod';
import { ConfigurationError } from '../backtest/errors.js';

export const YAHOO_INTERVALS = [
  '1m',
  '2m',
  '5m',
  '15m',
  '30m',
  '60m',
  '90m',
  '1h',
  '1d',
  '5d',
  '1wk',
  '1mo',
  '3mo',
] as const;

export type BarInterval = (typeof YAHOO_INTERVALS)[number];

export const periodSchema = z
  .string()
  .regex(/^(\d+(d|wk|mo|y)|ytd|max)$/, 'must look like 60d, 6mo, 1y, ytd or max');

export const intervalSchema = z.enum(YAHOO_INTERVALS);

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  STRATEGY_STORE: z.enum(['json', 'sqlite']).default('json'),
  STRATEGIES_PATH: z.string().min(1).default('./strategies.json'),
  DB_PATH: z.string().min(1).default('./data/backtester.db'),
  BACKTEST_PERIOD: periodSchema.default('1y'),
  BACKTEST_INTERVAL: intervalSchema.default('1d'),
  YAHOO_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(120_000).default(15_000),
});

export interface Settings {
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  strategyStore: 'json' | 'sqlite';
  strategiesPath: string;
  dbPath: string;
  defaultPeriod: string;
  defaultInterval: BarInterval;
  yahooTimeoutMs: number;
}

/**
 * Read runtime settings from the environment. Unset variables take their
 * defaults; a variable that is set but invalid raises a ConfigurationError
 * naming it.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(issue.path.join('.'), issue.message);
  }

  const parsed = result.data;
  return {
    logLevel: parsed.LOG_LEVEL,
    strategyStore: parsed.STRATEGY_STORE,
    strategiesPath: parsed.STRATEGIES_PATH,
    dbPath: parsed.DB_PATH,
    defaultPeriod: parsed.BACKTEST_PERIOD,
    defaultInterval: parsed.BACKTEST_INTERVAL,
    yahooTimeoutMs: parsed.YAHOO_TIMEOUT_MS,
  };
}
