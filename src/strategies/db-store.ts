import { ConfigurationError, StrategyNotFoundError } from '../backtest/errors.js';
import type { StrategyConfig } from '../backtest/types.js';
import { parseStrategyConfig, toStrategyDocument } from '../config/strategy-schema.js';
import * as strategyRepo from '../db/repositories/strategies.js';
import { createLogger } from '../utils/logger.js';
import type { StrategyStore } from './store.js';

const log = createLogger('strategy-store');

/** Strategies kept as JSON documents in the SQLite `strategies` table. */
export class DbStrategyStore implements StrategyStore {
  async load(name: string): Promise<StrategyConfig> {
    const row = strategyRepo.getStrategy(name);
    if (!row) {
      throw new StrategyNotFoundError(name);
    }

    let document: unknown;
    try {
      document = JSON.parse(row.config);
    } catch (err) {
      log.error({ name, err }, 'Failed to parse stored strategy');
      throw new ConfigurationError(name, 'stored strategy is not valid JSON');
    }
    return parseStrategyConfig(document, name);
  }

  async save(name: string, config: StrategyConfig): Promise<void> {
    strategyRepo.upsertStrategy(name, toStrategyDocument({ ...config, name }));
    log.info({ name }, 'Strategy saved');
  }

  async has(name: string): Promise<boolean> {
    return strategyRepo.getStrategy(name) !== undefined;
  }

  async list(): Promise<string[]> {
    return strategyRepo.getStrategyNames();
  }

  async remove(name: string): Promise<boolean> {
    const removed = strategyRepo.deleteStrategy(name);
    if (removed) log.info({ name }, 'Strategy removed');
    return removed;
  }
}
