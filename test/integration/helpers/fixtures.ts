import type { StrategyConfig } from '../../../src/backtest/types.js';
import { parseStrategyConfig, type StrategyDocument } from '../../../src/config/strategy-schema.js';
import { upsertStrategy } from '../../../src/db/repositories/strategies.js';

export function strategyDocument(overrides: Partial<StrategyDocument> = {}): StrategyDocument {
  return {
    signal_type: 'macd_momentum',
    portfolio: { size: 50_000 },
    position_sizing: { max_risk_per_trade: 1.5, max_position_size: 15 },
    trade: {
      stop_loss: { value: 5 },
      take_profit: { type: 'levels', values: [8, 12] },
    },
    ...overrides,
  };
}

export function strategyConfig(
  name: string,
  overrides: Partial<StrategyDocument> = {},
): StrategyConfig {
  return parseStrategyConfig(strategyDocument(overrides), name);
}

export function insertStrategy(name: string, overrides: Partial<StrategyDocument> = {}): void {
  upsertStrategy(name, { ...strategyDocument(overrides), name });
}
