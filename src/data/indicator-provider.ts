import axios from 'axios';
import { z } from 'zod';
import type { Bar } from '../backtest/types.js';
import { createLogger } from '../utils/logger.js';
import { annotateBars, type Candle } from './indicators.js';

const log = createLogger('indicator-provider');

const YAHOO_CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

// Common headers for Yahoo Finance REST calls
const YF_HEADERS = {
  'User-Agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7)',
};

const SYMBOL_PATTERN = /^[A-Za-z0-9^][A-Za-z0-9.^=-]{0,14}$/;

const INTRADAY_INTERVALS = new Set(['1m', '2m', '5m', '15m', '30m', '60m', '90m', '1h']);

/**
 * Supplies bars already annotated with indicators. Returns null or an
 * empty list when nothing could be fetched.
 */
export interface IndicatorProvider {
  fetch(symbol: string, period: string, interval: string): Promise<Bar[] | null>;
}

const nullableSeries = z.array(z.number().nullable()).optional();

const chartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(
              z.object({
                open: nullableSeries,
                high: nullableSeries,
                low: nullableSeries,
                close: nullableSeries,
                volume: nullableSeries,
              }),
            ),
          }),
        }),
      )
      .nullable(),
  }),
});

export type ChartResponse = z.infer<typeof chartResponseSchema>;

function formatTimestamp(epochSeconds: number, interval: string): string {
  const iso = new Date(epochSeconds * 1000).toISOString();
  return INTRADAY_INTERVALS.has(interval) ? iso : iso.split('T')[0];
}

/**
 * Convert a chart payload to candles: rows without an open or close are
 * dropped, missing high/low fall back to the open, and the result is
 * ascending with unique timestamps.
 */
export function parseChartCandles(payload: ChartResponse, interval: string): Candle[] {
  const result = payload.chart.result?.[0];
  const quote = result?.indicators.quote[0];
  if (!result?.timestamp || !quote) return [];

  const byTimestamp = new Map<string, Candle>();
  result.timestamp.forEach((ts, i) => {
    const o = quote.open?.[i];
    const c = quote.close?.[i];
    if (o == null || c == null || o <= 0 || c <= 0) return;

    const timestamp = formatTimestamp(ts, interval);
    byTimestamp.set(timestamp, {
      timestamp,
      open: o,
      high: quote.high?.[i] ?? o,
      low: quote.low?.[i] ?? o,
      close: c,
      volume: quote.volume?.[i] ?? 0,
    });
  });

  return [...byTimestamp.values()].sort((a, b) =>
    a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0,
  );
}

export interface YahooIndicatorProviderOptions {
  timeoutMs?: number;
}

export class YahooIndicatorProvider implements IndicatorProvider {
  private readonly timeoutMs: number;

  constructor(options: YahooIndicatorProviderOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  async fetch(symbol: string, period = '1y', interval = '1d'): Promise<Bar[] | null> {
    if (!SYMBOL_PATTERN.test(symbol)) {
      log.warn({ symbol }, 'Rejected invalid symbol');
      return null;
    }

    try {
      const { data } = await axios.get<unknown>(
        `${YAHOO_CHART_URL}/${encodeURIComponent(symbol)}`,
        {
          params: { range: period, interval, includePrePost: false },
          headers: YF_HEADERS,
          timeout: this.timeoutMs,
        },
      );

      const payload = chartResponseSchema.safeParse(data);
      if (!payload.success) {
        log.warn({ symbol, issues: payload.error.issues.length }, 'Unexpected chart payload');
        return null;
      }

      const candles = parseChartCandles(payload.data, interval);
      if (candles.length === 0) {
        log.warn({ symbol, period, interval }, 'No historical data returned');
        return [];
      }

      log.info(
        {
          symbol,
          interval,
          candles: candles.length,
          from: candles[0].timestamp,
          to: candles[candles.length - 1].timestamp,
        },
        'Fetched historical data',
      );
      return annotateBars(candles);
    } catch (err) {
      log.error({ symbol, period, interval, err }, 'Failed to fetch historical data');
      return null;
    }
  }
}
