import type { IndicatorProvider } from '../data/indicator-provider.js';
import type { StrategyStore } from '../strategies/store.js';
import { createLogger } from '../utils/logger.js';
import { BacktestEngine } from './engine.js';
import type { Bar, BacktestResult, StrategyConfig } from './types.js';

const log = createLogger('backtest-runner');

export interface BacktestRequest {
  strategyName: string;
  symbol: string;
  period?: string;
  interval?: string;
}

export interface BacktestReport {
  strategyName: string;
  symbol: string;
  period: string;
  interval: string;
  config: StrategyConfig;
  bars: Bar[];
  result: BacktestResult;
}

export interface BacktestRunnerOptions {
  store: StrategyStore;
  provider: IndicatorProvider;
  defaultPeriod?: string;
  defaultInterval?: string;
}

/**
 * Loads a saved strategy, fetches annotated bars once, and runs the engine.
 * All I/O happens before the simulation starts.
 */
export class BacktestRunner {
  private readonly store: StrategyStore;
  private readonly provider: IndicatorProvider;
  private readonly defaultPeriod: string;
  private readonly defaultInterval: string;

  constructor(options: BacktestRunnerOptions) {
    this.store = options.store;
    this.provider = options.provider;
    this.defaultPeriod = options.defaultPeriod ?? '1y';
    this.defaultInterval = options.defaultInterval ?? '1d';
  }

  async run(request: BacktestRequest): Promise<BacktestReport> {
    const period = request.period ?? this.defaultPeriod;
    const interval = request.interval ?? this.defaultInterval;

    const config = await this.store.load(request.strategyName);
    const engine = new BacktestEngine({ config });

    const fetched = await this.provider.fetch(request.symbol, period, interval);
    const bars = fetched ?? [];
    if (bars.length === 0) {
      log.warn(
        { symbol: request.symbol, period, interval, failed: fetched === null },
        'No bars available for backtest',
      );
    }

    const result = engine.run(bars);

    log.info(
      {
        strategy: request.strategyName,
        symbol: request.symbol,
        trades: result.metrics.totalTrades,
        totalReturn: result.metrics.totalReturn,
      },
      'Backtest finished',
    );

    return {
      strategyName: request.strategyName,
      symbol: request.symbol,
      period,
      interval,
      config,
      bars,
      result,
    };
  }
}
