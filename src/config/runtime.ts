import { isRuntimeConfigKey, validateRuntimeValue } from './validator.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';

export interface RuntimeConfig {
  maxRetries: number;
  retryBaseDelayMs: number;
  fallbackTimeoutMs: number;
  /** Orchestrator answers must be longer than this many characters. */
  sufficiencyThreshold: number;
  cacheTtlMs: number;
  minQueryLength: number;
  maxQueryLength: number;
  enableFallback: boolean;
}

export const DEFAULT_RUNTIME_CONFIG: Readonly<RuntimeConfig> = Object.freeze({
  maxRetries: 3,
  retryBaseDelayMs: 1000,
  fallbackTimeoutMs: 30000,
  sufficiencyThreshold: 10,
  cacheTtlMs: 5 * 60 * 1000,
  minQueryLength: 1,
  maxQueryLength: 1000,
  enableFallback: true
});

export interface RuntimeConfigUpdate {
  config: RuntimeConfig;
  applied: (keyof RuntimeConfig)[];
  ignored: string[];
}

/**
 * Merges `partial` into `current`. Unknown keys and invalid values are
 * skipped with a warning; the result always keeps minQueryLength <= maxQueryLength.
 */
export function applyRuntimeConfigUpdate(
  current: RuntimeConfig,
  partial: Record<string, unknown>,
  logger: Logger = defaultLogger
): RuntimeConfigUpdate {
  const next: RuntimeConfig = { ...current };
  const applied: (keyof RuntimeConfig)[] = [];
  const ignored: string[] = [];

  for (const [key, value] of Object.entries(partial)) {
    if (!isRuntimeConfigKey(key)) {
      logger.warn(`Unknown configuration parameter: ${key}`);
      ignored.push(key);
      continue;
    }

    const problem = validateRuntimeValue(key, value);
    if (problem) {
      logger.warn(`Invalid value for ${key} (${JSON.stringify(value)}): ${problem}`);
      ignored.push(key);
      continue;
    }

    Object.assign(next, { [key]: value });
    applied.push(key);
  }

  if (next.minQueryLength > next.maxQueryLength) {
    logger.warn(
      `minQueryLength (${next.minQueryLength}) exceeds maxQueryLength (${next.maxQueryLength}); keeping previous bounds`
    );
    next.minQueryLength = current.minQueryLength;
    next.maxQueryLength = current.maxQueryLength;
    for (const key of ['minQueryLength', 'maxQueryLength'] as const) {
      const index = applied.indexOf(key);
      if (index !== -1) {
        applied.splice(index, 1);
        ignored.push(key);
      }
    }
  }

  for (const key of applied) {
    logger.info(`Configuration updated: ${key} = ${JSON.stringify(next[key])}`);
  }

  return { config: next, applied, ignored };
}
