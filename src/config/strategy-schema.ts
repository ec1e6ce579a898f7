import { z } from 'zod';
import { ConfigurationError } from '../backtest/errors.js';
import { SIGNAL_TYPES, type StrategyConfig } from '../backtest/types.js';

// ── Stored document layout ───────────────────────────────────────────────
// Strategy documents keep the snake_case layout of strategies.json. Keys the
// backtest does not read (template names, timeframes, stop-loss "type") are
// accepted and dropped.

// Numbers, or strings that read as one ("5", "1.5"). Booleans and arrays are rejected.
const numberLike = z.union([
  z.number(),
  z
    .string()
    .trim()
    .regex(/^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/, 'must be a number')
    .transform(Number),
]);

const positiveNumber = z.number().finite().positive();

const positive = numberLike.pipe(positiveNumber);
const percent = numberLike.pipe(positiveNumber.max(100));
const stopLossPercent = numberLike.pipe(positiveNumber.lt(100, 'stop-loss must be below 100%'));

const signalTypeSchema = z.enum(SIGNAL_TYPES, {
  errorMap: () => ({ message: `must be one of ${SIGNAL_TYPES.join(', ')}` }),
});

const takeProfitSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('fixed'),
    value: positive,
  }),
  z.object({
    type: z.literal('levels'),
    values: z
      .array(positive)
      .min(1, 'at least one take-profit level is required')
      .refine((levels) => new Set(levels).size === levels.length, 'levels must be distinct'),
  }),
]);

export const strategyDocumentSchema = z.object({
  name: z.string().min(1).max(200).optional(),
  signal_type: signalTypeSchema,
  portfolio: z.object({
    size: positive,
  }),
  position_sizing: z.object({
    max_risk_per_trade: percent,
    max_position_size: percent.optional(),
  }),
  trade: z.object({
    stop_loss: z.object({
      value: stopLossPercent,
    }),
    take_profit: takeProfitSchema,
  }),
});

export type StrategyDocument = z.input<typeof strategyDocumentSchema>;

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object') deepFreeze(child);
  }
  return Object.freeze(value);
}

/**
 * Validate a stored strategy document and turn it into the engine's
 * configuration record. The first validation issue is raised as a
 * ConfigurationError naming the offending field.
 */
export function parseStrategyConfig(input: unknown, name?: string): StrategyConfig {
  const result = strategyDocumentSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigurationError(field, issue.message);
  }

  const doc = result.data;
  const tp = doc.trade.take_profit;
  const resolvedName = name ?? doc.name;
  const config: StrategyConfig = {
    ...(resolvedName !== undefined && { name: resolvedName }),
    signalType: doc.signal_type,
    portfolio: { initialCapital: doc.portfolio.size },
    positionSizing: {
      maxRiskPerTradePct: doc.position_sizing.max_risk_per_trade,
      ...(doc.position_sizing.max_position_size !== undefined && {
        maxPositionSizePct: doc.position_sizing.max_position_size,
      }),
    },
    trade: {
      stopLoss: { valuePct: doc.trade.stop_loss.value },
      takeProfit:
        tp.type === 'fixed'
          ? { type: 'fixed', valuePct: tp.value }
          : { type: 'levels', valuesPct: [...tp.values].sort((a, b) => a - b) },
    },
  };
  return deepFreeze(config);
}

export function toStrategyDocument(config: StrategyConfig): StrategyDocument {
  const tp = config.trade.takeProfit;
  return {
    ...(config.name !== undefined && { name: config.name }),
    signal_type: config.signalType,
    portfolio: { size: config.portfolio.initialCapital },
    position_sizing: {
      max_risk_per_trade: config.positionSizing.maxRiskPerTradePct,
      ...(config.positionSizing.maxPositionSizePct !== undefined && {
        max_position_size: config.positionSizing.maxPositionSizePct,
      }),
    },
    trade: {
      stop_loss: { value: config.trade.stopLoss.valuePct },
      take_profit:
        tp.type === 'fixed'
          ? { type: 'fixed', value: tp.valuePct }
          : { type: 'levels', values: [...tp.valuesPct] },
    },
  };
}
