import { RuntimeConfig } from './runtime.js';

type Validator = (value: unknown) => string | null;

const nonNegativeInteger: Validator = value =>
  typeof value === 'number' && Number.isInteger(value) && value >= 0 ? null : 'expected a non-negative integer';

const positiveInteger: Validator = value =>
  typeof value === 'number' && Number.isInteger(value) && value >= 1 ? null : 'expected a positive integer';

const nonNegativeNumber: Validator = value =>
  typeof value === 'number' && Number.isFinite(value) && value >= 0 ? null : 'expected a non-negative number';

const positiveNumber: Validator = value =>
  typeof value === 'number' && Number.isFinite(value) && value > 0 ? null : 'expected a positive number';

/** Longest delay setTimeout honours; larger values fire almost at once. */
export const MAX_TIMER_MS = 2_147_483_647;

const timerDelay: Validator = value =>
  nonNegativeNumber(value) ?? (typeof value === 'number' && value <= MAX_TIMER_MS ? null : `expected at most ${MAX_TIMER_MS}`);

const positiveTimerDelay: Validator = value =>
  positiveNumber(value) ?? (typeof value === 'number' && value <= MAX_TIMER_MS ? null : `expected at most ${MAX_TIMER_MS}`);

const boolean: Validator = value =>
  typeof value === 'boolean' ? null : 'expected true or false';

export const RUNTIME_VALIDATORS: Record<keyof RuntimeConfig, Validator> = {
  maxRetries: nonNegativeInteger,
  retryBaseDelayMs: timerDelay,
  fallbackTimeoutMs: positiveTimerDelay,
  sufficiencyThreshold: nonNegativeInteger,
  cacheTtlMs: nonNegativeNumber,
  minQueryLength: positiveInteger,
  maxQueryLength: positiveInteger,
  enableFallback: boolean
};

export function isRuntimeConfigKey(key: string): key is keyof RuntimeConfig {
  return Object.prototype.hasOwnProperty.call(RUNTIME_VALIDATORS, key);
}

/** Returns why `value` is not acceptable for `key`, or null. */
export function validateRuntimeValue(key: keyof RuntimeConfig, value: unknown): string | null {
  return RUNTIME_VALIDATORS[key](value);
}

/** Turns command-line text into the value type a runtime setting expects. */
export function parseConfigValue(raw: string): unknown {
  const trimmed = raw.trim();
  if (trimmed === 'true') return true;
  if (trimmed === 'false') return false;
  if (trimmed !== '' && !Number.isNaN(Number(trimmed))) return Number(trimmed);
  return trimmed;
}
