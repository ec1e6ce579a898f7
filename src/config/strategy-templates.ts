import type { StrategyStore } from '../strategies/store.js';
import { createLogger } from '../utils/logger.js';
import { parseStrategyConfig, type StrategyDocument } from './strategy-schema.js';

const log = createLogger('strategy-templates');

export interface PortfolioTier {
  size: number;
  maxPositionPct: number;
  riskPerTradePct: number;
}

export const PORTFOLIO_TIERS = {
  micro: { size: 10_000, maxPositionPct: 20, riskPerTradePct: 1 },
  small: { size: 50_000, maxPositionPct: 15, riskPerTradePct: 1.5 },
  medium: { size: 100_000, maxPositionPct: 10, riskPerTradePct: 2 },
  large: { size: 500_000, maxPositionPct: 5, riskPerTradePct: 2 },
  institutional: { size: 1_000_000, maxPositionPct: 3, riskPerTradePct: 2.5 },
} as const satisfies Record<string, PortfolioTier>;

export type PortfolioTierName = keyof typeof PORTFOLIO_TIERS;

// Built-in templates
const TEMPLATE_MACD_MOMENTUM: StrategyDocument = {
  name: 'MACD Momentum Strategy',
  signal_type: 'macd_momentum',
  portfolio: { size: PORTFOLIO_TIERS.small.size },
  position_sizing: { max_risk_per_trade: 1.5, max_position_size: 15 },
  trade: {
    take_profit: { type: 'levels', values: [8, 12] },
    stop_loss: { value: 5 },
  },
};

const TEMPLATE_RSI_REVERSAL: StrategyDocument = {
  name: 'RSI Reversal Strategy',
  signal_type: 'rsi_reversal',
  portfolio: { size: PORTFOLIO_TIERS.medium.size },
  position_sizing: { max_risk_per_trade: 2, max_position_size: 10 },
  trade: {
    take_profit: { type: 'fixed', value: 10 },
    stop_loss: { value: 2 },
  },
};

const TEMPLATE_BREAKOUT: StrategyDocument = {
  name: 'Bollinger Breakout Strategy',
  signal_type: 'breakout',
  portfolio: { size: PORTFOLIO_TIERS.medium.size },
  position_sizing: { max_risk_per_trade: 1, max_position_size: 20 },
  trade: {
    take_profit: { type: 'levels', values: [5, 10] },
    stop_loss: { value: 3 },
  },
};

export const BUILTIN_TEMPLATES: Readonly<Record<string, StrategyDocument>> = {
  macd_momentum: TEMPLATE_MACD_MOMENTUM,
  rsi_reversal: TEMPLATE_RSI_REVERSAL,
  breakout: TEMPLATE_BREAKOUT,
};

/**
 * Build a template document sized for a portfolio tier: the tier's capital,
 * risk per trade and position cap replace the template's own.
 */
export function templateForTier(templateName: string, tier: PortfolioTierName): StrategyDocument {
  const template = BUILTIN_TEMPLATES[templateName];
  if (!template) {
    throw new Error(`Unknown strategy template: ${templateName}`);
  }
  const sizing = PORTFOLIO_TIERS[tier];
  return {
    ...template,
    portfolio: { size: sizing.size },
    position_sizing: {
      max_risk_per_trade: sizing.riskPerTradePct,
      max_position_size: sizing.maxPositionPct,
    },
  };
}

/** Store every built-in template that the store does not hold yet. */
export async function seedBuiltinTemplates(store: StrategyStore): Promise<string[]> {
  const created: string[] = [];

  for (const [name, document] of Object.entries(BUILTIN_TEMPLATES)) {
    if (await store.has(name)) continue;
    await store.save(name, parseStrategyConfig(document, name));
    created.push(name);
    log.info({ name }, 'Built-in template stored');
  }

  log.info({ created: created.length }, 'Built-in templates seeded');
  return created;
}
