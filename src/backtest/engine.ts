import { createLogger } from '../utils/logger.js';
import { fillPrice, PositionTracker } from './position-tracker.js';
import { evaluateSignal, usable } from './signals.js';
import { computeStatistics } from './statistics.js';
import type {
  Bar,
  BacktestResult,
  ClosedTrade,
  DataIssue,
  ExitReason,
  StrategyConfig,
  TradeSignal,
} from './types.js';

const log = createLogger('backtest-engine');

export interface BacktestEngineOptions {
  config: StrategyConfig;
}

/**
 * Bar-by-bar simulation of one strategy over one symbol.
 *
 * The loop reads bar i to decide and fills at bar i+1's open, so every
 * entry and exit lags its signal by one bar. Only one position is ever
 * open. The equity curve is seeded with the initial capital and then
 * advances exactly once per bar, moving only when a trade closes.
 *
 * `run` is synchronous and resets all state first, so the same engine
 * gives identical results for identical input.
 */
export class BacktestEngine {
  private readonly config: StrategyConfig;
  private readonly tracker: PositionTracker;
  private trades: ClosedTrade[] = [];
  private equityCurve: number[] = [];
  private equity: number;
  // Exit already triggered but waiting for a bar with a usable open to fill.
  private pendingExit: ExitReason | null = null;

  constructor(options: BacktestEngineOptions) {
    this.config = options.config;
    // Validates the exit configuration; a bad config fails here, before any bar is read.
    this.tracker = new PositionTracker(options.config);
    this.equity = options.config.portfolio.initialCapital;
  }

  run(bars: readonly Bar[] | null | undefined): BacktestResult {
    this.reset();
    const series = bars ?? [];

    if (series.length < 2) {
      const dataIssue: DataIssue = {
        kind: 'data_unavailable',
        reason: series.length === 0 ? 'no_data' : 'insufficient_bars',
        barCount: series.length,
      };
      log.warn({ ...dataIssue, strategy: this.config.name }, 'Not enough bars to backtest');
      return this.buildResult(dataIssue);
    }

    log.info(
      {
        strategy: this.config.name,
        signalType: this.config.signalType,
        bars: series.length,
        from: series[0].timestamp,
        to: series[series.length - 1].timestamp,
        initialCapital: this.config.portfolio.initialCapital,
      },
      'Starting backtest',
    );

    const lastIndex = series.length - 1;
    for (let i = 0; i < lastIndex; i++) {
      this.step(series[i], series[i + 1], i, lastIndex);
    }

    this.closeAtEnd(series);

    log.info(
      { trades: this.trades.length, finalEquity: this.equity },
      'Backtest complete',
    );

    return this.buildResult(null);
  }

  private reset(): void {
    this.tracker.reset();
    this.pendingExit = null;
    this.trades = [];
    this.equity = this.config.portfolio.initialCapital;
    this.equityCurve = [this.equity];
  }

  private step(bar: Bar, nextBar: Bar, index: number, lastIndex: number): void {
    const signal = evaluateSignal(bar, this.config.signalType);

    if (!this.tracker.isOpen()) {
      // A fill on the final bar could only be closed on that same bar.
      if (signal !== 'hold' && index + 1 < lastIndex) {
        this.enter(signal, nextBar, index + 1);
      }
    } else {
      const reason = this.pendingExit ?? this.tracker.checkExit(bar, nextBar, signal);
      if (reason) {
        this.exit(nextBar, reason);
      }
    }

    this.equityCurve.push(this.equity);
  }

  private enter(signal: TradeSignal, executionBar: Bar, index: number): void {
    const position = this.tracker.open(signal, executionBar, index);
    if (!position) {
      log.debug(
        { signal, time: executionBar.timestamp, open: executionBar.open },
        'Entry skipped: unusable fill price or size below one share',
      );
      return;
    }

    log.debug(
      {
        side: position.side,
        time: position.entryTime,
        entryPrice: position.entryPrice,
        shares: position.shares,
        stopLoss: position.stopLossPrice,
      },
      'Entry executed',
    );
  }

  private exit(executionBar: Bar, reason: ExitReason): void {
    const price = fillPrice(executionBar.open);
    if (price === null) {
      this.pendingExit = reason;
      log.warn(
        { reason, time: executionBar.timestamp },
        'Exit deferred: execution bar has no usable open',
      );
      return;
    }
    this.pendingExit = null;
    this.record(this.tracker.close(price, executionBar.timestamp, reason));
  }

  private closeAtEnd(series: readonly Bar[]): void {
    const position = this.tracker.current;
    const finalBar = series[series.length - 1];

    if (position) {
      let price = position.entryPrice;
      for (let i = series.length - 1; i >= position.entryIndex; i--) {
        const close = series[i].close;
        if (usable(close) && close > 0) {
          price = close;
          break;
        }
      }
      this.pendingExit = null;
      this.record(this.tracker.close(price, finalBar.timestamp, 'end_of_period'));
    }

    this.equityCurve.push(this.equity);
  }

  private record(trade: ClosedTrade | null): void {
    if (!trade) return;

    this.trades.push(trade);
    this.equity += trade.pnl;

    log.debug(
      {
        side: trade.side,
        exitTime: trade.exitTime,
        exitPrice: trade.exitPrice,
        pnl: trade.pnl,
        pnlPct: trade.pnlPct,
        reason: trade.exitReason,
      },
      'Exit executed',
    );
  }

  private buildResult(dataIssue: DataIssue | null): BacktestResult {
    const trades = [...this.trades];
    const equityCurve = [...this.equityCurve];
    return {
      trades,
      equityCurve,
      metrics: computeStatistics(trades, equityCurve),
      dataIssue,
    };
  }
}

/** Run one backtest with a fresh engine. */
export function runBacktest(bars: readonly Bar[] | null | undefined, config: StrategyConfig) {
  return new BacktestEngine({ config }).run(bars);
}
