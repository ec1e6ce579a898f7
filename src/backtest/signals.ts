import type { Bar, SignalType, TradeSignal } from './types.js';

/** Indicator values that are absent, null or non-finite count as missing. */
export function usable(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

// ─── MACD momentum ───────────────────────────────────────

function macdMomentumSignal(bar: Bar): TradeSignal {
  const { macd, macdSignal } = bar;
  if (!usable(macd) || !usable(macdSignal)) return 'hold';

  const histogram = macd - macdSignal;
  if (histogram > 0 && macd > 0) return 'buy';
  if (histogram < 0 && macd < 0) return 'sell';
  return 'hold';
}

// ─── RSI reversal ────────────────────────────────────────

const RSI_OVERSOLD = 30;
const RSI_OVERBOUGHT = 70;

function rsiReversalSignal(bar: Bar): TradeSignal {
  if (!usable(bar.rsi)) return 'hold';
  if (bar.rsi < RSI_OVERSOLD) return 'buy';
  if (bar.rsi > RSI_OVERBOUGHT) return 'sell';
  return 'hold';
}

// ─── Bollinger breakout ──────────────────────────────────

function breakoutSignal(bar: Bar): TradeSignal {
  const { close, bbUpper, bbLower } = bar;
  if (!usable(close) || !usable(bbUpper) || !usable(bbLower)) return 'hold';
  if (close > bbUpper) return 'buy';
  if (close < bbLower) return 'sell';
  return 'hold';
}

const evaluators: Record<SignalType, (bar: Bar) => TradeSignal> = {
  macd_momentum: macdMomentumSignal,
  rsi_reversal: rsiReversalSignal,
  breakout: breakoutSignal,
};

/**
 * Map one annotated bar to a trade signal. Pure and total: a bar missing the
 * fields its rule reads, or a signal type this module does not know, is a hold.
 */
export function evaluateSignal(bar: Bar, signalType: SignalType): TradeSignal {
  const evaluate = Object.hasOwn(evaluators, signalType) ? evaluators[signalType] : undefined;
  return evaluate ? evaluate(bar) : 'hold';
}

export function isOpposite(signal: TradeSignal, side: 'long' | 'short'): boolean {
  return (side === 'long' && signal === 'sell') || (side === 'short' && signal === 'buy');
}
