import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { ConfigurationError, StrategyNotFoundError } from '../backtest/errors.js';
import type { StrategyConfig } from '../backtest/types.js';
import { parseStrategyConfig, toStrategyDocument } from '../config/strategy-schema.js';
import { createLogger } from '../utils/logger.js';
import type { StrategyStore } from './store.js';

const log = createLogger('strategy-store');

const documentSchema = z.record(z.string(), z.unknown());

type StrategiesDocument = z.infer<typeof documentSchema>;

// Assigning these on a plain object reaches Object.prototype instead of an own key.
const RESERVED_NAMES = new Set(['__proto__']);

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Strategies kept as one JSON document mapping strategy name to its
 * configuration (the strategies.json layout). A missing file reads as an
 * empty store and is created on the first save.
 */
export class JsonFileStrategyStore implements StrategyStore {
  constructor(private readonly filePath: string) {}

  async load(name: string): Promise<StrategyConfig> {
    const document = await this.read();
    if (!Object.hasOwn(document, name)) {
      throw new StrategyNotFoundError(name);
    }
    return parseStrategyConfig(document[name], name);
  }

  async save(name: string, config: StrategyConfig): Promise<void> {
    if (RESERVED_NAMES.has(name)) {
      throw new ConfigurationError('name', `"${name}" cannot be used as a strategy name`);
    }
    const document = await this.read();
    document[name] = toStrategyDocument({ ...config, name });
    await this.write(document);
    log.info({ name, path: this.filePath }, 'Strategy saved');
  }

  async has(name: string): Promise<boolean> {
    return Object.hasOwn(await this.read(), name);
  }

  async list(): Promise<string[]> {
    return Object.keys(await this.read()).sort();
  }

  async remove(name: string): Promise<boolean> {
    const document = await this.read();
    if (!Object.hasOwn(document, name)) return false;
    delete document[name];
    await this.write(document);
    log.info({ name, path: this.filePath }, 'Strategy removed');
    return true;
  }

  private async read(): Promise<StrategiesDocument> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return {};
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      log.error({ path: this.filePath, err }, 'Failed to parse strategies document');
      throw new ConfigurationError(this.filePath, 'strategies document is not valid JSON');
    }

    const result = documentSchema.safeParse(parsed);
    if (!result.success) {
      throw new ConfigurationError(this.filePath, 'strategies document must be a JSON object');
    }
    return result.data;
  }

  private async write(document: StrategiesDocument): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${JSON.stringify(document, null, 4)}\n`, 'utf8');
  }
}
