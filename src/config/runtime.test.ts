import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_RUNTIME_CONFIG, applyRuntimeConfigUpdate } from './runtime.js';
import { MAX_TIMER_MS, parseConfigValue, validateRuntimeValue } from './validator.js';
import { Logger } from '../utils/logger.js';

function quietLogger(): Logger {
  const logger = new Logger('debug');
  logger.setSilent(true);
  return logger;
}

describe('applyRuntimeConfigUpdate', () => {
  it('applies known, valid keys', () => {
    const { config, applied, ignored } = applyRuntimeConfigUpdate(
      { ...DEFAULT_RUNTIME_CONFIG },
      { maxRetries: 5, enableFallback: false },
      quietLogger()
    );

    expect(config.maxRetries).toBe(5);
    expect(config.enableFallback).toBe(false);
    expect(applied).toEqual(['maxRetries', 'enableFallback']);
    expect(ignored).toEqual([]);
  });

  it('warns about and skips unknown keys', () => {
    const logger = quietLogger();
    const warn = vi.spyOn(logger, 'warn');

    const { config, applied, ignored } = applyRuntimeConfigUpdate({ ...DEFAULT_RUNTIME_CONFIG }, { turbo: true }, logger);

    expect(warn).toHaveBeenCalledWith('Unknown configuration parameter: turbo');
    expect(applied).toEqual([]);
    expect(ignored).toEqual(['turbo']);
    expect(config).toEqual(DEFAULT_RUNTIME_CONFIG);
  });

  it('skips ill-typed values', () => {
    const { config, ignored } = applyRuntimeConfigUpdate(
      { ...DEFAULT_RUNTIME_CONFIG },
      { maxRetries: 'three', fallbackTimeoutMs: 0, minQueryLength: 2.5 },
      quietLogger()
    );

    expect(ignored).toEqual(['maxRetries', 'fallbackTimeoutMs', 'minQueryLength']);
    expect(config.maxRetries).toBe(3);
    expect(config.fallbackTimeoutMs).toBe(30000);
    expect(config.minQueryLength).toBe(1);
  });

  it('keeps the previous length bounds when they would cross', () => {
    const { config, applied, ignored } = applyRuntimeConfigUpdate(
      { ...DEFAULT_RUNTIME_CONFIG },
      { minQueryLength: 50, maxQueryLength: 20, maxRetries: 1 },
      quietLogger()
    );

    expect(config.minQueryLength).toBe(1);
    expect(config.maxQueryLength).toBe(1000);
    expect(applied).toEqual(['maxRetries']);
    expect(ignored).toEqual(['minQueryLength', 'maxQueryLength']);
  });

  it('does not modify the input', () => {
    const current = { ...DEFAULT_RUNTIME_CONFIG };
    applyRuntimeConfigUpdate(current, { maxRetries: 0 }, quietLogger());
    expect(current.maxRetries).toBe(3);
  });
});

describe('validateRuntimeValue', () => {
  it('accepts zero retries and rejects negatives', () => {
    expect(validateRuntimeValue('maxRetries', 0)).toBeNull();
    expect(validateRuntimeValue('maxRetries', -1)).toBe('expected a non-negative integer');
  });

  it('caps timer settings at the longest delay a timer can wait', () => {
    expect(validateRuntimeValue('fallbackTimeoutMs', MAX_TIMER_MS)).toBeNull();
    expect(validateRuntimeValue('fallbackTimeoutMs', MAX_TIMER_MS + 1)).toBe('expected at most 2147483647');
    expect(validateRuntimeValue('fallbackTimeoutMs', 0)).toBe('expected a positive number');
    expect(validateRuntimeValue('retryBaseDelayMs', 3_000_000_000)).toBe('expected at most 2147483647');
  });

  it('keeps the previous fallback timeout when the new one is too long', () => {
    const { config, ignored } = applyRuntimeConfigUpdate(
      { ...DEFAULT_RUNTIME_CONFIG },
      { fallbackTimeoutMs: 3_000_000_000 },
      quietLogger()
    );
    expect(config.fallbackTimeoutMs).toBe(DEFAULT_RUNTIME_CONFIG.fallbackTimeoutMs);
    expect(ignored).toEqual(['fallbackTimeoutMs']);
  });
});

describe('parseConfigValue', () => {
  it('turns command text into typed values', () => {
    expect(parseConfigValue('true')).toBe(true);
    expect(parseConfigValue(' false ')).toBe(false);
    expect(parseConfigValue('2500')).toBe(2500);
    expect(parseConfigValue('0.5')).toBe(0.5);
    expect(parseConfigValue('llama3')).toBe('llama3');
  });
});
