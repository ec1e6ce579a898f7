import type { BacktestMetrics, ClosedTrade } from './types.js';

export const TRADING_DAYS_PER_YEAR = 252;
export const RISK_FREE_RATE_ANNUAL = 0.02;

// Below this the returns are treated as constant (rounding noise on a steady curve).
const MIN_RETURN_STD = 1e-12;

function sum(values: number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

function mean(values: number[]): number {
  return values.length > 0 ? sum(values) / values.length : 0;
}

// ── Exported pure computation functions ──────────────────────────────────

/**
 * Bar-over-bar fractional returns of an equity curve. A step from a
 * non-positive value has no defined return and is left out.
 */
export function computePeriodReturns(equityCurve: number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < equityCurve.length; i++) {
    const prev = equityCurve[i - 1];
    if (prev > 0) {
      returns.push((equityCurve[i] - prev) / prev);
    }
  }
  return returns;
}

/**
 * Largest peak-to-trough decline of the curve, as a positive percentage of
 * the running peak.
 */
export function calculateMaxDrawdown(equityCurve: number[]): number {
  let peak = Number.NEGATIVE_INFINITY;
  let maxDrawdown = 0;

  for (const value of equityCurve) {
    if (value > peak) peak = value;
    if (peak <= 0) continue;

    const drawdown = ((peak - value) / peak) * 100;
    if (drawdown > maxDrawdown) maxDrawdown = drawdown;
  }

  return maxDrawdown;
}

/**
 * Annualised Sharpe ratio of the curve's per-bar returns against a 2%
 * yearly risk-free rate. Uses the sample standard deviation; 0 when there
 * are fewer than two returns or the returns do not vary.
 */
export function computeSharpe(
  equityCurve: number[],
  riskFreeAnnual = RISK_FREE_RATE_ANNUAL,
): number {
  const returns = computePeriodReturns(equityCurve);
  if (returns.length < 2) return 0;

  const avg = mean(returns);
  const variance = returns.reduce((acc, r) => acc + (r - avg) ** 2, 0) / (returns.length - 1);
  const stdDev = Math.sqrt(variance);
  if (!(stdDev > MIN_RETURN_STD)) return 0;

  const meanExcess = avg - riskFreeAnnual / TRADING_DAYS_PER_YEAR;
  const sharpe = (meanExcess / stdDev) * Math.sqrt(TRADING_DAYS_PER_YEAR);
  return Number.isFinite(sharpe) ? sharpe : 0;
}

/**
 * Profit Factor: |sum(winning pnl) / sum(losing pnl)|.
 * Positive infinity when no trade lost money; 0 for an empty list.
 */
export function computeProfitFactor(trades: Array<{ pnl: number }>): number {
  if (trades.length === 0) return 0;

  const grossProfit = sum(trades.filter((t) => t.pnl > 0).map((t) => t.pnl));
  const grossLoss = sum(trades.filter((t) => t.pnl < 0).map((t) => t.pnl));

  if (grossLoss === 0) return Number.POSITIVE_INFINITY;
  return Math.abs(grossProfit / grossLoss);
}

export function computeTotalReturn(equityCurve: number[]): number {
  if (equityCurve.length === 0) return 0;
  const first = equityCurve[0];
  const last = equityCurve[equityCurve.length - 1];
  if (!(first > 0)) return 0;
  return ((last - first) / first) * 100;
}

/**
 * Reduce a run's closed trades and equity curve into summary metrics.
 * Trades with zero pnl count toward the total only.
 */
export function computeStatistics(trades: ClosedTrade[], equityCurve: number[]): BacktestMetrics {
  const totalReturn = computeTotalReturn(equityCurve);

  if (trades.length === 0) {
    return {
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
      totalReturn,
      sharpeRatio: 0,
    };
  }

  const pnls = trades.map((t) => t.pnl);
  const wins = pnls.filter((p) => p > 0);
  const losses = pnls.filter((p) => p < 0);

  return {
    totalTrades: trades.length,
    winningTrades: wins.length,
    losingTrades: losses.length,
    winRate: (wins.length / trades.length) * 100,
    avgWin: mean(wins),
    avgLoss: mean(losses),
    largestWin: Math.max(...pnls),
    largestLoss: Math.min(...pnls),
    profitFactor: computeProfitFactor(trades),
    maxDrawdown: calculateMaxDrawdown(equityCurve),
    totalReturn,
    sharpeRatio: computeSharpe(equityCurve),
  };
}
