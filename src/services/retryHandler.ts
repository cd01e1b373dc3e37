import { AssistantError } from './errors.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  backoffMultiplier: 2
};

export interface RetryOptions {
  signal?: AbortSignal;
  operationName?: string;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

/**
 * Resolves after `ms`, or rejects with a cancellation error as soon as the
 * signal aborts.
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(AssistantError.cancelled());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(AssistantError.cancelled());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function isRetryable(error: unknown): boolean {
  if (error instanceof AssistantError) {
    return error.retryable;
  }
  return true;
}

export class RetryHandler {
  private config: RetryConfig;
  private logger: Logger;

  constructor(config: Partial<RetryConfig> = {}, logger: Logger = defaultLogger) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.logger = logger;
  }

  configure(config: Partial<RetryConfig>): void {
    this.config = { ...this.config, ...config };
  }

  getConfig(): RetryConfig {
    return { ...this.config };
  }

  calculateDelay(attemptNumber: number): number {
    const delay = this.config.baseDelayMs * Math.pow(this.config.backoffMultiplier, attemptNumber);
    return Math.min(delay, this.config.maxDelayMs);
  }

  /**
   * Runs `operation` up to `maxRetries + 1` times, sleeping
   * `baseDelay * multiplier^attempt` between attempts. Errors flagged as not
   * retryable are rethrown as they are; exhaustion throws RetryExhausted.
   */
  async executeWithRetry<T>(
    operation: (signal?: AbortSignal) => Promise<T>,
    options: RetryOptions = {}
  ): Promise<T> {
    const { signal, operationName = 'operation', onRetry } = options;
    const { maxRetries } = this.config;
    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (signal?.aborted) {
        throw AssistantError.cancelled();
      }

      try {
        return await operation(signal);
      } catch (error) {
        if (!isRetryable(error)) {
          throw error;
        }

        lastError = error;

        if (attempt < maxRetries) {
          const delay = this.calculateDelay(attempt);
          const message = error instanceof Error ? error.message : String(error);
          this.logger.warn(`${operationName} attempt ${attempt + 1} failed: ${message}. Retrying in ${delay}ms...`);
          onRetry?.(attempt + 1, delay, error);
          await abortableSleep(delay, signal);
        }
      }
    }

    this.logger.error(`All ${maxRetries + 1} attempts of ${operationName} failed`, lastError);
    throw AssistantError.retryExhausted(maxRetries + 1, lastError);
  }

  /**
   * Races `operation` against a timer. On expiry the signal handed to the
   * operation is aborted and ExecutionTimeout is thrown; an external abort
   * cancels it the same way.
   */
  async executeWithTimeout<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    externalSignal?: AbortSignal
  ): Promise<T> {
    if (externalSignal?.aborted) {
      throw AssistantError.cancelled();
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let onExternalAbort: (() => void) | undefined;

    const guard = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(AssistantError.timeout(timeoutMs));
      }, timeoutMs);

      onExternalAbort = () => {
        controller.abort();
        reject(AssistantError.cancelled());
      };
      externalSignal?.addEventListener('abort', onExternalAbort, { once: true });
    });

    try {
      return await Promise.race([operation(controller.signal), guard]);
    } finally {
      clearTimeout(timer);
      if (onExternalAbort) {
        externalSignal?.removeEventListener('abort', onExternalAbort);
      }
    }
  }
}
