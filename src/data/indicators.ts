import {
  ATR,
  BollingerBands,
  EMA,
  MACD,
  OBV,
  RSI,
  SMA,
  Stochastic,
} from 'technicalindicators';
import type { Bar } from '../backtest/types.js';

export interface Candle {
  timestamp: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** Indicators are only computed once a series is longer than this. */
export const MIN_BARS_FOR_INDICATORS = 50;

/**
 * Right-align an indicator series with its input: the indicator libraries
 * drop the warm-up window from the front of their output.
 */
export function alignSeries<T>(length: number, values: T[]): Array<T | null> {
  const offset = length - values.length;
  return Array.from({ length }, (_, i) => (i >= offset ? values[i - offset] : null));
}

function finiteOrNull(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

// ─── Series calculators ──────────────────────────────────

function smaSeries(values: number[], period: number): Array<number | null> {
  if (values.length < period) return alignSeries(values.length, []);
  return alignSeries(values.length, SMA.calculate({ values, period }));
}

function emaSeries(values: number[], period: number): Array<number | null> {
  if (values.length < period) return alignSeries(values.length, []);
  return alignSeries(values.length, EMA.calculate({ values, period }));
}

/**
 * Annotate candles with the indicator set the signal rules read (plus the
 * context indicators reporting uses). Series of MIN_BARS_FOR_INDICATORS or
 * fewer candles are returned unannotated.
 */
export function annotateBars(candles: Candle[]): Bar[] {
  if (candles.length <= MIN_BARS_FOR_INDICATORS) {
    return candles.map((c) => ({ ...c }));
  }

  const n = candles.length;
  const closes = candles.map((c) => c.close);
  const highs = candles.map((c) => c.high);
  const lows = candles.map((c) => c.low);
  const volumes = candles.map((c) => c.volume);

  const sma20 = smaSeries(closes, 20);
  const sma50 = smaSeries(closes, 50);
  const sma200 = smaSeries(closes, 200);
  const ema12 = emaSeries(closes, 12);
  const ema26 = emaSeries(closes, 26);
  const volumeSma = smaSeries(volumes, 20);

  const macd = alignSeries(
    n,
    MACD.calculate({
      values: closes,
      fastPeriod: 12,
      slowPeriod: 26,
      signalPeriod: 9,
      SimpleMAOscillator: false,
      SimpleMASignal: false,
    }),
  );
  const rsi = alignSeries(n, RSI.calculate({ values: closes, period: 14 }));
  const stochastic = alignSeries(
    n,
    Stochastic.calculate({ high: highs, low: lows, close: closes, period: 14, signalPeriod: 3 }),
  );
  const bollinger = alignSeries(
    n,
    BollingerBands.calculate({ values: closes, period: 20, stdDev: 2 }),
  );
  const atr = alignSeries(n, ATR.calculate({ high: highs, low: lows, close: closes, period: 14 }));
  const obv = alignSeries(n, OBV.calculate({ close: closes, volume: volumes }));

  return candles.map((candle, i) => ({
    ...candle,
    sma20: sma20[i],
    sma50: sma50[i],
    sma200: sma200[i],
    ema12: ema12[i],
    ema26: ema26[i],
    macd: finiteOrNull(macd[i]?.MACD),
    macdSignal: finiteOrNull(macd[i]?.signal),
    macdHist: finiteOrNull(macd[i]?.histogram),
    rsi: finiteOrNull(rsi[i]),
    stochK: finiteOrNull(stochastic[i]?.k),
    stochD: finiteOrNull(stochastic[i]?.d),
    bbUpper: finiteOrNull(bollinger[i]?.upper),
    bbMiddle: finiteOrNull(bollinger[i]?.middle),
    bbLower: finiteOrNull(bollinger[i]?.lower),
    atr: finiteOrNull(atr[i]),
    volumeSma: volumeSma[i],
    obv: finiteOrNull(obv[i]),
  }));
}
