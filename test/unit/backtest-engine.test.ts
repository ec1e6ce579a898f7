import { describe, expect, it, vi } from 'vitest';
import type { Bar, SignalType, StrategyConfig, TakeProfitRule } from '../../src/backtest/types.js';

// Mock the logger
vi.mock('../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { BacktestEngine, runBacktest } from '../../src/backtest/engine.js';
import { ConfigurationError } from '../../src/backtest/errors.js';

// ── Helpers ──────────────────────────────────────────────────────────────

function day(i: number): string {
  return new Date(Date.UTC(2024, 0, 1 + i)).toISOString().slice(0, 10);
}

/** Flat bars at 100 with per-index overrides. */
function makeBars(count: number, overrides: Record<number, Partial<Bar>> = {}): Bar[] {
  return Array.from({ length: count }, (_, i) => ({
    timestamp: day(i),
    open: 100,
    high: 101,
    low: 99,
    close: 100,
    volume: 1_000,
    ...overrides[i],
  }));
}

function makeConfig(
  signalType: SignalType,
  takeProfit: TakeProfitRule = { type: 'levels', valuesPct: [50, 100] },
  initialCapital = 10_000,
): StrategyConfig {
  return {
    name: 'engine-test',
    signalType,
    portfolio: { initialCapital },
    positionSizing: { maxRiskPerTradePct: 2 },
    trade: { stopLoss: { valuePct: 5 }, takeProfit },
  };
}

/** Deterministic pseudo-random bars for property checks. */
function randomBars(count: number, seed: number): Bar[] {
  let state = seed;
  const next = (): number => {
    state = (state * 1_664_525 + 1_013_904_223) % 4_294_967_296;
    return state / 4_294_967_296;
  };

  const bars: Bar[] = [];
  let price = 100;
  for (let i = 0; i < count; i++) {
    const open = price;
    const close = open * (1 + (next() - 0.5) * 0.06);
    const high = Math.max(open, close) * (1 + next() * 0.02);
    const low = Math.min(open, close) * (1 - next() * 0.02);
    const band = close * (0.01 + next() * 0.03);
    bars.push({
      timestamp: day(i),
      open,
      high,
      low,
      close,
      volume: 1_000,
      rsi: next() * 100,
      macd: next() - 0.5,
      macdSignal: next() - 0.5,
      bbUpper: close + band * (next() - 0.3),
      bbLower: close - band * (next() - 0.3),
    });
    price = close;
  }
  return bars;
}

// ── Tests ────────────────────────────────────────────────────────────────

describe('BacktestEngine', () => {
  describe('insufficient data', () => {
    it('returns the seeded curve and a no_data issue for an empty series', () => {
      const result = runBacktest([], makeConfig('rsi_reversal'));

      expect(result.trades).toEqual([]);
      expect(result.equityCurve).toEqual([10_000]);
      expect(result.dataIssue).toEqual({ kind: 'data_unavailable', reason: 'no_data', barCount: 0 });
      expect(result.metrics).toEqual({
        totalTrades: 0,
        winningTrades: 0,
        losingTrades: 0,
        winRate: 0,
        avgWin: 0,
        avgLoss: 0,
        largestWin: 0,
        largestLoss: 0,
        profitFactor: 0,
        maxDrawdown: 0,
        totalReturn: 0,
        sharpeRatio: 0,
      });
    });

    it('treats null input like an empty series', () => {
      const result = runBacktest(null, makeConfig('rsi_reversal'));
      expect(result.equityCurve).toEqual([10_000]);
      expect(result.dataIssue?.reason).toBe('no_data');
    });

    it('flags a single bar as insufficient', () => {
      const result = runBacktest(makeBars(1, { 0: { rsi: 10 } }), makeConfig('rsi_reversal'));
      expect(result.trades).toEqual([]);
      expect(result.equityCurve).toEqual([10_000]);
      expect(result.dataIssue).toEqual({
        kind: 'data_unavailable',
        reason: 'insufficient_bars',
        barCount: 1,
      });
    });

    it('reports no data issue once two bars are present', () => {
      const result = runBacktest(makeBars(2), makeConfig('rsi_reversal'));
      expect(result.dataIssue).toBeNull();
      expect(result.equityCurve).toEqual([10_000, 10_000, 10_000]);
    });
  });

  describe('configuration', () => {
    it('fails at construction on an invalid stop-loss', () => {
      const config: StrategyConfig = {
        ...makeConfig('rsi_reversal'),
        trade: { stopLoss: { valuePct: 0 }, takeProfit: { type: 'fixed', valuePct: 10 } },
      };
      expect(() => new BacktestEngine({ config })).toThrow(ConfigurationError);
    });
  });

  describe('long trade held to the end of the period', () => {
    // MACD buys from bar 3 onwards; prices rise one point per bar.
    const bars = Array.from({ length: 10 }, (_, i): Bar => ({
      timestamp: day(i),
      open: 100 + i,
      high: 101 + i,
      low: 99.5 + i,
      close: 100.5 + i,
      volume: 1_000,
      macd: i >= 3 ? 1 : null,
      macdSignal: i >= 3 ? 0.5 : null,
    }));

    it('enters at the bar after the signal and closes at the final close', () => {
      const result = runBacktest(bars, makeConfig('macd_momentum'));

      expect(result.trades).toEqual([
        {
          entryTime: '2024-01-05',
          exitTime: '2024-01-10',
          side: 'long',
          entryPrice: 104,
          exitPrice: 109.5,
          shares: 38,
          pnl: 209,
          pnlPct: expect.closeTo(5.288461538, 6),
          exitReason: 'end_of_period',
        },
      ]);
    });

    it('keeps equity flat until the trade closes', () => {
      const result = runBacktest(bars, makeConfig('macd_momentum'));
      expect(result.equityCurve).toHaveLength(11);
      expect(result.equityCurve.slice(0, 10).every((v) => v === 10_000)).toBe(true);
      expect(result.equityCurve[10]).toBe(10_209);
    });

    it('summarises a single winner', () => {
      const { metrics } = runBacktest(bars, makeConfig('macd_momentum'));
      expect(metrics.totalTrades).toBe(1);
      expect(metrics.winRate).toBe(100);
      expect(metrics.profitFactor).toBe(Number.POSITIVE_INFINITY);
      expect(metrics.totalReturn).toBeCloseTo(2.09, 10);
      expect(metrics.maxDrawdown).toBe(0);
      expect(metrics.sharpeRatio).toBeGreaterThan(0);
    });
  });

  describe('stop-loss exit', () => {
    const bars = makeBars(5, {
      0: { rsi: 25 },
      1: { open: 100, low: 98, close: 99 },
      2: { open: 97, low: 90, high: 98, close: 92 },
      3: { open: 93, low: 92, close: 94 },
      4: { open: 94, close: 95 },
    });

    it('fills the stop at the next bar open', () => {
      const result = runBacktest(bars, makeConfig('rsi_reversal'));

      expect(result.trades).toHaveLength(1);
      expect(result.trades[0]).toMatchObject({
        entryTime: '2024-01-02',
        exitTime: '2024-01-04',
        side: 'long',
        entryPrice: 100,
        exitPrice: 93,
        shares: 40,
        pnl: -280,
        exitReason: 'stop_loss',
      });
      expect(result.trades[0].pnlPct).toBeCloseTo(-7, 10);
      expect(result.equityCurve).toEqual([10_000, 10_000, 10_000, 9_720, 9_720, 9_720]);
    });

    it('summarises a single loser', () => {
      const { metrics } = runBacktest(bars, makeConfig('rsi_reversal'));
      expect(metrics.winningTrades).toBe(0);
      expect(metrics.losingTrades).toBe(1);
      expect(metrics.winRate).toBe(0);
      expect(metrics.profitFactor).toBe(0);
      expect(metrics.avgLoss).toBe(-280);
      expect(metrics.largestLoss).toBe(-280);
      expect(metrics.totalReturn).toBeCloseTo(-2.8, 10);
      expect(metrics.maxDrawdown).toBeCloseTo(2.8, 10);
    });

    it('stops out a short when the high reaches the stop', () => {
      const shortBars = makeBars(5, {
        0: { rsi: 80 },
        2: { high: 106 },
        3: { open: 104 },
      });
      const [trade] = runBacktest(shortBars, makeConfig('rsi_reversal')).trades;
      expect(trade).toMatchObject({
        side: 'short',
        entryPrice: 100,
        exitPrice: 104,
        pnl: -160,
        exitReason: 'stop_loss',
      });
    });
  });

  describe('take-profit levels', () => {
    it('exits at the first level the next open reaches', () => {
      const bars = makeBars(5, {
        0: { macd: 1, macdSignal: 0.5 },
        1: { macd: 1, macdSignal: 0.5, open: 100 },
        2: { macd: 1, macdSignal: 0.5, open: 103, low: 102, high: 104 },
        3: { macd: 1, macdSignal: 0.5, open: 109, low: 108, high: 110 },
        4: { macd: 1, macdSignal: 0.5, open: 110, low: 109, high: 111 },
      });
      const result = runBacktest(
        bars,
        makeConfig('macd_momentum', { type: 'levels', valuesPct: [8, 12] }),
      );

      expect(result.trades).toHaveLength(1);
      expect(result.trades[0]).toMatchObject({
        exitTime: '2024-01-04',
        exitPrice: 109,
        pnl: 360,
        pnlPct: 9,
        exitReason: 'take_profit_8%',
      });
      expect(result.equityCurve).toEqual([10_000, 10_000, 10_000, 10_360, 10_360, 10_360]);
    });

    it('labels a fixed target as take_profit', () => {
      const bars = makeBars(5, { 0: { rsi: 20 }, 2: { open: 112 } });
      const [trade] = runBacktest(
        bars,
        makeConfig('rsi_reversal', { type: 'fixed', valuePct: 10 }),
      ).trades;
      expect(trade.exitReason).toBe('take_profit');
      expect(trade.exitPrice).toBe(112);
    });
  });

  describe('signal reversal', () => {
    const bars = makeBars(6, {
      0: { macd: 1, macdSignal: 0.5 },
      3: { macd: -1, macdSignal: -0.5 },
      4: { open: 102 },
    });

    it('closes on the opposite signal without reversing into a new position', () => {
      const result = runBacktest(bars, makeConfig('macd_momentum'));

      expect(result.trades).toHaveLength(1);
      expect(result.trades[0]).toMatchObject({
        side: 'long',
        entryTime: '2024-01-02',
        exitTime: '2024-01-05',
        exitPrice: 102,
        pnl: 80,
        exitReason: 'signal_reversal',
      });
    });
  });

  describe('execution edge cases', () => {
    it('defers an exit while the execution bar has no usable open', () => {
      const bars = makeBars(6, {
        0: { rsi: 25 },
        2: { low: 90 },
        3: { open: Number.NaN, low: 90 },
        4: { open: 92 },
      });
      const result = runBacktest(bars, makeConfig('rsi_reversal'));

      expect(result.trades).toHaveLength(1);
      expect(result.trades[0]).toMatchObject({
        exitTime: '2024-01-05',
        exitPrice: 92,
        pnl: -320,
        exitReason: 'stop_loss',
      });
    });

    it('keeps a triggered stop pending after the price recovers', () => {
      const bars = makeBars(6, {
        0: { rsi: 25 },
        2: { low: 90 },
        3: { open: Number.NaN },
        4: { open: 92 },
      });
      const result = runBacktest(bars, makeConfig('rsi_reversal'));

      expect(result.trades).toHaveLength(1);
      expect(result.trades[0]).toMatchObject({
        exitTime: '2024-01-05',
        exitPrice: 92,
        pnl: -320,
        exitReason: 'stop_loss',
      });
    });

    it('fills a pending exit at the first usable open after several gaps', () => {
      const bars = makeBars(7, {
        0: { rsi: 25 },
        2: { low: 90 },
        3: { open: Number.NaN },
        4: { open: Number.NaN },
        5: { open: 94 },
      });
      const result = runBacktest(bars, makeConfig('rsi_reversal'));

      expect(result.trades).toHaveLength(1);
      expect(result.trades[0]).toMatchObject({
        exitTime: '2024-01-06',
        exitPrice: 94,
        pnl: -240,
        exitReason: 'stop_loss',
      });
      expect(result.equityCurve).toEqual([
        10_000, 10_000, 10_000, 10_000, 10_000, 9_760, 9_760, 9_760,
      ]);
    });

    it('force-closes a pending exit that never finds a usable open', () => {
      const bars = makeBars(5, {
        0: { rsi: 25 },
        2: { low: 90 },
        3: { open: Number.NaN },
        4: { open: Number.NaN },
      });
      const result = runBacktest(bars, makeConfig('rsi_reversal'));

      expect(result.trades).toHaveLength(1);
      expect(result.trades[0]).toMatchObject({
        exitTime: '2024-01-05',
        exitPrice: 100,
        pnl: 0,
        exitReason: 'end_of_period',
      });
    });

    it('does not enter when the fill would land on the final bar', () => {
      const bars = makeBars(4, { 2: { rsi: 25 } });
      const result = runBacktest(bars, makeConfig('rsi_reversal'));
      expect(result.trades).toEqual([]);
      expect(result.equityCurve).toEqual([10_000, 10_000, 10_000, 10_000, 10_000]);
    });

    it('closes at the last usable close when the final close is missing', () => {
      const bars = makeBars(4, {
        0: { rsi: 25 },
        2: { close: 103 },
        3: { close: Number.NaN },
      });
      const [trade] = runBacktest(bars, makeConfig('rsi_reversal')).trades;
      expect(trade).toMatchObject({
        entryTime: '2024-01-02',
        exitTime: '2024-01-04',
        exitPrice: 103,
        pnl: 120,
        exitReason: 'end_of_period',
      });
    });

    it('skips entries the budget cannot buy one share of', () => {
      const bars = makeBars(5, { 0: { rsi: 25 } });
      const result = runBacktest(bars, makeConfig('rsi_reversal', undefined, 100));
      expect(result.trades).toEqual([]);
      expect(result.equityCurve.every((v) => v === 100)).toBe(true);
    });

    it('treats a bar without indicators as a hold', () => {
      const result = runBacktest(makeBars(10), makeConfig('breakout'));
      expect(result.trades).toEqual([]);
      expect(result.metrics.sharpeRatio).toBe(0);
    });
  });

  describe('determinism', () => {
    it('gives identical results when the same engine runs twice', () => {
      const bars = randomBars(120, 7);
      const engine = new BacktestEngine({ config: makeConfig('rsi_reversal') });
      const first = engine.run(bars);
      const second = engine.run(bars);
      expect(second).toEqual(first);
    });

    it('does not mutate the input bars', () => {
      const bars = randomBars(60, 11);
      const copy = bars.map((b) => ({ ...b }));
      runBacktest(bars, makeConfig('macd_momentum'));
      expect(bars).toEqual(copy);
    });
  });

  describe.each<SignalType>(['macd_momentum', 'rsi_reversal', 'breakout'])(
    'invariants over a random walk (%s)',
    (signalType) => {
      const bars = randomBars(300, 42);
      const config: StrategyConfig = {
        name: 'walk',
        signalType,
        portfolio: { initialCapital: 100_000 },
        positionSizing: { maxRiskPerTradePct: 1 },
        trade: {
          stopLoss: { valuePct: 2 },
          takeProfit: { type: 'levels', valuesPct: [3, 6] },
        },
      };
      const result = runBacktest(bars, config);

      it('records one equity point per bar plus the seed', () => {
        expect(result.equityCurve).toHaveLength(bars.length + 1);
        expect(result.equityCurve[0]).toBe(100_000);
      });

      it('ends at the initial capital plus realised pnl', () => {
        const realised = result.trades.reduce((acc, t) => acc + t.pnl, 0);
        expect(result.equityCurve[result.equityCurve.length - 1]).toBeCloseTo(
          100_000 + realised,
          6,
        );
      });

      it('only trades whole shares and exits after entering', () => {
        for (const trade of result.trades) {
          expect(Number.isInteger(trade.shares)).toBe(true);
          expect(trade.shares).toBeGreaterThanOrEqual(1);
          expect(trade.exitTime > trade.entryTime).toBe(true);
        }
      });

      it('never holds overlapping positions', () => {
        for (let k = 1; k < result.trades.length; k++) {
          expect(result.trades[k].entryTime > result.trades[k - 1].exitTime).toBe(true);
        }
      });

      it('uses only known exit reasons', () => {
        for (const trade of result.trades) {
          expect(trade.exitReason).toMatch(
            /^(stop_loss|take_profit_(3|6)%|signal_reversal|end_of_period)$/,
          );
        }
      });

      it('counts every trade in the metrics', () => {
        expect(result.metrics.totalTrades).toBe(result.trades.length);
        expect(result.metrics.winningTrades + result.metrics.losingTrades).toBeLessThanOrEqual(
          result.trades.length,
        );
      });
    },
  );
});
