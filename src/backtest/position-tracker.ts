import { ConfigurationError } from './errors.js';
import { isOpposite, usable } from './signals.js';
import type {
  Bar,
  ClosedTrade,
  ExitReason,
  Position,
  PositionSide,
  StrategyConfig,
  TakeProfitLevelReason,
  TradeSignal,
} from './types.js';

function positiveNumber(value: number | undefined): value is number {
  return usable(value) && value > 0;
}

/** Price at which a bar can fill an order: finite and strictly positive. */
export function fillPrice(price: number | undefined): number | null {
  return positiveNumber(price) ? price : null;
}

function takeProfitLabel(level: number): TakeProfitLevelReason {
  return `take_profit_${level}%`;
}

/**
 * Sign-adjusted percent move from entry to price: positive when the move is
 * in the position's favour.
 */
export function movePct(side: PositionSide, entryPrice: number, price: number): number {
  const diff = side === 'long' ? price - entryPrice : entryPrice - price;
  return (diff / entryPrice) * 100;
}

/**
 * Owns the single open position of a backtest run and decides when it
 * exits. Exit checks run in a fixed order (stop-loss, take-profit, signal
 * reversal) and the first hit wins.
 */
export class PositionTracker {
  private readonly initialCapital: number;
  private readonly maxRiskPerTradePct: number;
  private readonly maxPositionSizePct: number | undefined;
  private readonly stopLossPct: number;
  private readonly takeProfitType: 'fixed' | 'levels';
  private readonly takeProfitLevels: readonly number[];
  private position: Position | null = null;

  constructor(config: StrategyConfig) {
    const { portfolio, positionSizing, trade } = config;

    if (!positiveNumber(portfolio.initialCapital)) {
      throw new ConfigurationError('portfolio.size', 'initial capital must be greater than 0');
    }
    if (
      !positiveNumber(positionSizing.maxRiskPerTradePct) ||
      positionSizing.maxRiskPerTradePct > 100
    ) {
      throw new ConfigurationError(
        'position_sizing.max_risk_per_trade',
        'must be greater than 0 and at most 100',
      );
    }
    if (
      positionSizing.maxPositionSizePct !== undefined &&
      (!positiveNumber(positionSizing.maxPositionSizePct) ||
        positionSizing.maxPositionSizePct > 100)
    ) {
      throw new ConfigurationError(
        'position_sizing.max_position_size',
        'must be greater than 0 and at most 100',
      );
    }
    if (!positiveNumber(trade.stopLoss.valuePct) || trade.stopLoss.valuePct >= 100) {
      throw new ConfigurationError(
        'trade.stop_loss.value',
        'stop-loss percent must be greater than 0 and below 100',
      );
    }

    const takeProfit = trade.takeProfit;
    let levels: number[];
    if (takeProfit.type === 'fixed') {
      if (!positiveNumber(takeProfit.valuePct)) {
        throw new ConfigurationError(
          'trade.take_profit.value',
          'take-profit percent must be greater than 0',
        );
      }
      levels = [takeProfit.valuePct];
    } else if (takeProfit.type === 'levels') {
      if (takeProfit.valuesPct.length === 0) {
        throw new ConfigurationError('trade.take_profit.values', 'at least one level is required');
      }
      takeProfit.valuesPct.forEach((level, i) => {
        if (!positiveNumber(level)) {
          throw new ConfigurationError(
            `trade.take_profit.values.${i}`,
            'take-profit percent must be greater than 0',
          );
        }
      });
      levels = [...takeProfit.valuesPct].sort((a, b) => a - b);
    } else {
      throw new ConfigurationError('trade.take_profit.type', 'must be "fixed" or "levels"');
    }

    this.initialCapital = portfolio.initialCapital;
    this.maxRiskPerTradePct = positionSizing.maxRiskPerTradePct;
    this.maxPositionSizePct = positionSizing.maxPositionSizePct;
    this.stopLossPct = trade.stopLoss.valuePct;
    this.takeProfitType = takeProfit.type;
    this.takeProfitLevels = Object.freeze(levels);
  }

  get current(): Position | null {
    return this.position;
  }

  isOpen(): boolean {
    return this.position !== null;
  }

  reset(): void {
    this.position = null;
  }

  /**
   * Whole shares bought for one trade: the configured risk budget divided by
   * the stop distance, optionally capped, at the fill price.
   */
  sizePosition(price: number): number {
    const riskAmount = (this.initialCapital * this.maxRiskPerTradePct) / 100;
    let positionValue = (riskAmount * 100) / this.stopLossPct;
    if (this.maxPositionSizePct !== undefined) {
      positionValue = Math.min(
        positionValue,
        (this.initialCapital * this.maxPositionSizePct) / 100,
      );
    }
    return Math.floor(positionValue / price);
  }

  stopPrice(side: PositionSide, price: number): number {
    return side === 'long'
      ? (price * (100 - this.stopLossPct)) / 100
      : (price * (100 + this.stopLossPct)) / 100;
  }

  /**
   * Open a position filled at the execution bar's open. Returns null when a
   * position is already open, the signal is a hold, the open is unusable, or
   * the budget does not buy a single share.
   */
  open(signal: TradeSignal, executionBar: Bar, index: number): Position | null {
    if (this.position || signal === 'hold') return null;

    const price = fillPrice(executionBar.open);
    if (price === null) return null;

    const shares = this.sizePosition(price);
    if (shares < 1) return null;

    const side: PositionSide = signal === 'buy' ? 'long' : 'short';
    this.position = {
      side,
      entryPrice: price,
      entryTime: executionBar.timestamp,
      entryIndex: index,
      shares,
      stopLossPrice: this.stopPrice(side, price),
      takeProfitLevels: this.takeProfitLevels,
    };
    return this.position;
  }

  /**
   * Evaluate the open position against the current bar. The take-profit
   * check uses the next bar's open, the price the exit would fill at.
   */
  checkExit(bar: Bar, nextBar: Bar, signal: TradeSignal): ExitReason | null {
    const position = this.position;
    if (!position) return null;

    if (position.side === 'long') {
      if (usable(bar.low) && bar.low <= position.stopLossPrice) return 'stop_loss';
    } else if (usable(bar.high) && bar.high >= position.stopLossPrice) {
      return 'stop_loss';
    }

    const nextOpen = fillPrice(nextBar.open);
    if (nextOpen !== null) {
      const pnlPct = movePct(position.side, position.entryPrice, nextOpen);
      for (const level of position.takeProfitLevels) {
        if (pnlPct >= level) {
          return this.takeProfitType === 'levels' ? takeProfitLabel(level) : 'take_profit';
        }
      }
    }

    if (isOpposite(signal, position.side)) return 'signal_reversal';

    return null;
  }

  /** Close the open position at the given price and hand back the trade record. */
  close(exitPrice: number, exitTime: string, reason: ExitReason): ClosedTrade | null {
    const position = this.position;
    if (!position) return null;

    const direction = position.side === 'long' ? 1 : -1;
    const pnl = (exitPrice - position.entryPrice) * direction * position.shares;

    this.position = null;

    return {
      entryTime: position.entryTime,
      exitTime,
      side: position.side,
      entryPrice: position.entryPrice,
      exitPrice,
      shares: position.shares,
      pnl,
      pnlPct: movePct(position.side, position.entryPrice, exitPrice),
      exitReason: reason,
    };
  }
}
