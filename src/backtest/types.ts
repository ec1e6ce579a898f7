export const SIGNAL_TYPES = ['macd_momentum', 'rsi_reversal', 'breakout'] as const;

export type SignalType = (typeof SIGNAL_TYPES)[number];

export type TradeSignal = 'buy' | 'sell' | 'hold';

export type PositionSide = 'long' | 'short';

/**
 * One OHLCV observation, optionally annotated with indicators by the
 * indicator provider. Indicator fields are null while their warm-up
 * window has not filled.
 */
export interface Bar {
  timestamp: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  rsi?: number | null;
  macd?: number | null;
  macdSignal?: number | null;
  macdHist?: number | null;
  sma20?: number | null;
  sma50?: number | null;
  sma200?: number | null;
  ema12?: number | null;
  ema26?: number | null;
  bbUpper?: number | null;
  bbMiddle?: number | null;
  bbLower?: number | null;
  atr?: number | null;
  volumeSma?: number | null;
  stochK?: number | null;
  stochD?: number | null;
  obv?: number | null;
}

export type TakeProfitRule =
  | { type: 'fixed'; valuePct: number }
  | { type: 'levels'; valuesPct: number[] };

export interface StrategyConfig {
  name?: string;
  signalType: SignalType;
  portfolio: {
    initialCapital: number;
  };
  positionSizing: {
    maxRiskPerTradePct: number;
    /** Optional cap on position value, as a percent of initial capital. */
    maxPositionSizePct?: number;
  };
  trade: {
    stopLoss: { valuePct: number };
    takeProfit: TakeProfitRule;
  };
}

export type TakeProfitLevelReason = `take_profit_${number}%`;

export type ExitReason =
  | 'stop_loss'
  | 'take_profit'
  | TakeProfitLevelReason
  | 'signal_reversal'
  | 'end_of_period';

export interface Position {
  side: PositionSide;
  entryPrice: number;
  entryTime: string;
  /** Index of the bar whose open filled the entry. */
  entryIndex: number;
  shares: number;
  stopLossPrice: number;
  takeProfitLevels: readonly number[];
}

export interface ClosedTrade {
  entryTime: string;
  exitTime: string;
  side: PositionSide;
  entryPrice: number;
  exitPrice: number;
  shares: number;
  pnl: number;
  pnlPct: number;
  exitReason: ExitReason;
}

export interface BacktestMetrics {
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRate: number;
  avgWin: number;
  avgLoss: number;
  largestWin: number;
  largestLoss: number;
  /** Positive infinity when there are no losing trades. */
  profitFactor: number;
  maxDrawdown: number;
  totalReturn: number;
  sharpeRatio: number;
}

export interface DataIssue {
  kind: 'data_unavailable';
  reason: 'no_data' | 'insufficient_bars';
  barCount: number;
}

export interface BacktestResult {
  trades: ClosedTrade[];
  equityCurve: number[];
  metrics: BacktestMetrics;
  dataIssue: DataIssue | null;
}
