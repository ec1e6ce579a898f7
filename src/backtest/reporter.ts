import { formatCurrency, formatPercent, formatRatio, round } from '../utils/helpers.js';
import type { BacktestReport } from './runner.js';
import type { ClosedTrade, PositionSide } from './types.js';

/**
 * Generate a text summary suitable for console output.
 */
export function generateSummary(report: BacktestReport): string {
  const { config, result, bars } = report;
  const { metrics } = result;
  const lines: string[] = [];

  lines.push('=== Backtest Results ===');
  lines.push(`Strategy: ${report.strategyName} (${config.signalType})`);
  lines.push(`Symbol: ${report.symbol} (${report.interval} bars, ${report.period})`);
  if (bars.length > 0) {
    lines.push(`Period: ${bars[0].timestamp} to ${bars[bars.length - 1].timestamp} (${bars.length} bars)`);
  }
  lines.push(`Initial Capital: ${formatCurrency(config.portfolio.initialCapital)}`);

  if (result.dataIssue) {
    const { reason, barCount } = result.dataIssue;
    lines.push('');
    lines.push(
      reason === 'no_data'
        ? 'No price data was available for this symbol.'
        : `Only ${barCount} bar(s) available; at least 2 are needed to simulate.`,
    );
  }
  lines.push('');

  lines.push('--- Performance ---');
  const finalEquity = result.equityCurve[result.equityCurve.length - 1];
  lines.push(`Final Equity: ${formatCurrency(finalEquity)}`);
  lines.push(`Total Return: ${formatPercent(metrics.totalReturn)}`);
  lines.push(`Max Drawdown: ${formatPercent(metrics.maxDrawdown)}`);
  lines.push(`Sharpe Ratio: ${formatRatio(metrics.sharpeRatio)}`);
  lines.push('');

  lines.push('--- Trade Statistics ---');
  lines.push(`Total Trades: ${metrics.totalTrades}`);

  if (metrics.totalTrades === 0) {
    lines.push('No trades executed with current strategy settings.');
    lines.push('Consider adjusting the entry/exit rules, the indicator settings or the timeframe.');
    return lines.join('\n');
  }

  lines.push(`Win Rate: ${formatPercent(metrics.winRate)}`);
  lines.push(`Wins: ${metrics.winningTrades} | Losses: ${metrics.losingTrades}`);
  lines.push(`Profit Factor: ${formatRatio(metrics.profitFactor)}`);
  lines.push(`Avg Win: ${formatCurrency(metrics.avgWin)}`);
  lines.push(`Avg Loss: ${formatCurrency(metrics.avgLoss)}`);
  lines.push(`Largest Win: ${formatCurrency(metrics.largestWin)}`);
  lines.push(`Largest Loss: ${formatCurrency(metrics.largestLoss)}`);

  return lines.join('\n');
}

/**
 * One line per closed trade, in exit order.
 */
export function generateTradeLog(trades: ClosedTrade[]): string {
  if (trades.length === 0) return 'No trades to list.';

  return trades
    .map(
      (t, i) =>
        `#${i + 1} ${t.side.toUpperCase()} ${t.shares} @ ${formatCurrency(t.entryPrice)} ` +
        `(${t.entryTime}) -> ${formatCurrency(t.exitPrice)} (${t.exitTime}) ` +
        `P&L ${formatCurrency(t.pnl)} (${formatPercent(t.pnlPct)}) [${t.exitReason}]`,
    )
    .join('\n');
}

/**
 * Percent below the running peak at each point of the curve (0 or negative).
 */
export function computeDrawdownSeries(equityCurve: number[]): number[] {
  let peak = Number.NEGATIVE_INFINITY;
  return equityCurve.map((value) => {
    if (value > peak) peak = value;
    return peak > 0 ? ((value - peak) / peak) * 100 : 0;
  });
}

/**
 * Format the equity curve for charting. The seed point carries no
 * timestamp; each later point is labelled with the bar that produced it.
 */
export function formatEquityCurve(report: BacktestReport): {
  points: { timestamp: string | null; equity: number }[];
  initialCapital: number;
} {
  const { equityCurve } = report.result;
  return {
    points: equityCurve.map((equity, i) => ({
      timestamp: i === 0 ? null : (report.bars[i - 1]?.timestamp ?? null),
      equity: round(equity, 2),
    })),
    initialCapital: report.config.portfolio.initialCapital,
  };
}

export interface TradeMarker {
  timestamp: string;
  price: number;
  kind: 'entry' | 'exit';
  side: PositionSide;
}

/**
 * Everything a price/equity chart needs: closes, trade markers, equity and
 * drawdown series.
 */
export function buildChartData(report: BacktestReport): {
  prices: { timestamp: string; close: number }[];
  markers: TradeMarker[];
  equity: number[];
  drawdown: number[];
} {
  const markers = report.result.trades.flatMap((t): TradeMarker[] => [
    { timestamp: t.entryTime, price: t.entryPrice, kind: 'entry', side: t.side },
    { timestamp: t.exitTime, price: t.exitPrice, kind: 'exit', side: t.side },
  ]);

  return {
    prices: report.bars.map((b) => ({ timestamp: b.timestamp, close: b.close })),
    markers,
    equity: report.result.equityCurve,
    drawdown: computeDrawdownSeries(report.result.equityCurve),
  };
}
