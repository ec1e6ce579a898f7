export class BacktestError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'BacktestError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * A strategy configuration field is missing or out of range. Fatal to the
 * run: nothing is simulated once this is raised.
 */
export class ConfigurationError extends BacktestError {
  readonly field: string;
  readonly reason: string;

  constructor(field: string, reason: string) {
    super(`Invalid strategy configuration at "${field}": ${reason}`, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    this.field = field;
    this.reason = reason;
  }
}

export class StrategyNotFoundError extends BacktestError {
  readonly strategyName: string;

  constructor(strategyName: string) {
    super(`Strategy not found: ${strategyName}`, 'STRATEGY_NOT_FOUND');
    this.name = 'StrategyNotFoundError';
    this.strategyName = strategyName;
  }
}

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  field?: string;
}

export function serializeError(err: unknown): SerializedError {
  if (err instanceof ConfigurationError) {
    return { name: err.name, message: err.message, code: err.code, field: err.field };
  }
  if (err instanceof BacktestError) {
    return { name: err.name, message: err.message, code: err.code };
  }
  if (err instanceof Error) {
    return { name: err.name, message: err.message };
  }
  return { name: 'UnknownError', message: String(err) };
}
