#!/usr/bin/env node
import 'dotenv/config';

import { serializeError, StrategyNotFoundError } from './backtest/errors.js';
import { generateSummary, generateTradeLog } from './backtest/reporter.js';
import { BacktestRunner } from './backtest/runner.js';
import { intervalSchema, loadSettings, periodSchema, type Settings } from './config/settings.js';
import { toStrategyDocument } from './config/strategy-schema.js';
import { seedBuiltinTemplates } from './config/strategy-templates.js';
import { YahooIndicatorProvider } from './data/indicator-provider.js';
import { initDatabase } from './db/index.js';
import { DbStrategyStore } from './strategies/db-store.js';
import { JsonFileStrategyStore } from './strategies/json-store.js';
import type { StrategyStore } from './strategies/store.js';
import { createLogger, logger } from './utils/logger.js';

const log = createLogger('cli');

const USAGE = [
  'Usage:',
  '  strategy-backtester backtest <strategy> <symbol> [interval] [period]',
  '  strategy-backtester strategies list',
  '  strategy-backtester strategies show <name>',
  '  strategy-backtester strategies seed',
  '',
  'Example: strategy-backtester backtest rsi_reversal AAPL 1d 1y',
].join('\n');

function print(text: string): void {
  process.stdout.write(`${text}\n`);
}

function createStore(settings: Settings): StrategyStore {
  if (settings.strategyStore === 'sqlite') {
    initDatabase(settings.dbPath);
    return new DbStrategyStore();
  }
  return new JsonFileStrategyStore(settings.strategiesPath);
}

async function backtestCommand(settings: Settings, args: string[]): Promise<number> {
  const [strategyName, symbol, intervalArg, periodArg] = args;
  if (!strategyName || !symbol) {
    print(USAGE);
    return 1;
  }

  const interval = intervalSchema.safeParse(intervalArg ?? settings.defaultInterval);
  const period = periodSchema.safeParse(periodArg ?? settings.defaultPeriod);
  if (!interval.success || !period.success) {
    print(`Invalid interval or period: ${intervalArg ?? ''} ${periodArg ?? ''}`.trim());
    return 1;
  }

  const runner = new BacktestRunner({
    store: createStore(settings),
    provider: new YahooIndicatorProvider({ timeoutMs: settings.yahooTimeoutMs }),
  });

  const report = await runner.run({
    strategyName,
    symbol: symbol.toUpperCase(),
    interval: interval.data,
    period: period.data,
  });

  print(generateSummary(report));
  if (report.result.trades.length > 0) {
    print('');
    print(generateTradeLog(report.result.trades));
  }
  return 0;
}

async function strategiesCommand(settings: Settings, args: string[]): Promise<number> {
  const [action, name] = args;
  const store = createStore(settings);

  switch (action) {
    case 'list': {
      const names = await store.list();
      print(names.length > 0 ? names.join('\n') : 'No saved strategies. Run "strategies seed".');
      return 0;
    }
    case 'show': {
      if (!name) {
        print(USAGE);
        return 1;
      }
      print(JSON.stringify(toStrategyDocument(await store.load(name)), null, 2));
      return 0;
    }
    case 'seed': {
      const created = await seedBuiltinTemplates(store);
      print(created.length > 0 ? `Seeded: ${created.join(', ')}` : 'All templates already present.');
      return 0;
    }
    default:
      print(USAGE);
      return 1;
  }
}

async function main(argv: string[]): Promise<number> {
  const settings = loadSettings();
  logger.level = settings.logLevel;

  const [command, ...rest] = argv;
  switch (command) {
    case 'backtest':
      return backtestCommand(settings, rest);
    case 'strategies':
      return strategiesCommand(settings, rest);
    default:
      print(USAGE);
      return command ? 1 : 0;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof StrategyNotFoundError) {
      print(`Strategy '${err.strategyName}' not found. Create or seed strategies first.`);
    } else {
      log.error({ err: serializeError(err) }, 'Command failed');
    }
    process.exitCode = 1;
  });
