import type { StrategyConfig } from '../backtest/types.js';

/**
 * Named, durable strategy configurations. `load` throws
 * StrategyNotFoundError for an unknown name and ConfigurationError when the
 * stored document does not validate.
 */
export interface StrategyStore {
  load(name: string): Promise<StrategyConfig>;
  save(name: string, config: StrategyConfig): Promise<void>;
  has(name: string): Promise<boolean>;
  list(): Promise<string[]>;
  remove(name: string): Promise<boolean>;
}
