import { describe, it, expect, vi, afterEach } from 'vitest';
import { RetryHandler, abortableSleep } from './retryHandler.js';
import { AssistantError, AssistantErrorCode } from './errors.js';
import { Logger } from '../utils/logger.js';

function quietLogger(): Logger {
  const logger = new Logger();
  logger.setSilent(true);
  return logger;
}

afterEach(() => {
  vi.useRealTimers();
});

describe('RetryHandler.calculateDelay', () => {
  it('doubles from the base delay and caps at the maximum', () => {
    const handler = new RetryHandler({ baseDelayMs: 1000, maxDelayMs: 5000 }, quietLogger());
    expect([0, 1, 2, 3].map(attempt => handler.calculateDelay(attempt))).toEqual([1000, 2000, 4000, 5000]);
  });
});

describe('RetryHandler.executeWithRetry', () => {
  it('sleeps base * 2^attempt between attempts', async () => {
    vi.useFakeTimers();
    const handler = new RetryHandler({ maxRetries: 3, baseDelayMs: 100 }, quietLogger());
    let calls = 0;
    const operation = vi.fn(async () => {
      calls++;
      if (calls < 3) throw new Error(`failure ${calls}`);
      return 'ok';
    });

    const result = handler.executeWithRetry(operation);

    await vi.advanceTimersByTimeAsync(99);
    expect(operation).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(operation).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(199);
    expect(operation).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1);

    await expect(result).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('passes non-retryable errors straight through', async () => {
    const handler = new RetryHandler({ maxRetries: 3, baseDelayMs: 0 }, quietLogger());
    const operation = vi.fn(async () => {
      throw AssistantError.invalidQuery();
    });

    await expect(handler.executeWithRetry(operation)).rejects.toMatchObject({
      code: AssistantErrorCode.INVALID_QUERY
    });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('wraps the last error once attempts run out', async () => {
    const handler = new RetryHandler({ maxRetries: 2, baseDelayMs: 0 }, quietLogger());
    let calls = 0;
    const operation = vi.fn(async () => {
      calls++;
      throw new Error(`failure ${calls}`);
    });

    await expect(handler.executeWithRetry(operation)).rejects.toMatchObject({
      code: AssistantErrorCode.RETRY_EXHAUSTED,
      message: 'Operation failed after 3 attempts: failure 3'
    });
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('cancels while sleeping', async () => {
    vi.useFakeTimers();
    const handler = new RetryHandler({ maxRetries: 3, baseDelayMs: 10_000 }, quietLogger());
    const controller = new AbortController();
    const operation = vi.fn(async () => {
      throw new Error('down');
    });

    const result = handler.executeWithRetry(operation, { signal: controller.signal });
    const assertion = expect(result).rejects.toMatchObject({ code: AssistantErrorCode.CANCELLED });

    await vi.advanceTimersByTimeAsync(5);
    controller.abort();
    await assertion;
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('reports each retry', async () => {
    const handler = new RetryHandler({ maxRetries: 1, baseDelayMs: 0 }, quietLogger());
    const onRetry = vi.fn();
    let calls = 0;

    await handler.executeWithRetry(
      async () => {
        calls++;
        if (calls === 1) throw new Error('once');
        return calls;
      },
      { onRetry }
    );

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toBe(1);
    expect(onRetry.mock.calls[0][1]).toBe(0);
  });
});

describe('RetryHandler.executeWithTimeout', () => {
  it('aborts the operation and throws ExecutionTimeout', async () => {
    vi.useFakeTimers();
    const handler = new RetryHandler({}, quietLogger());
    let seen: AbortSignal | undefined;

    const result = handler.executeWithTimeout(signal => {
      seen = signal;
      return new Promise<string>(() => {});
    }, 2000);
    const assertion = expect(result).rejects.toMatchObject({
      code: AssistantErrorCode.EXECUTION_TIMEOUT,
      message: 'Query execution timed out after 2s'
    });

    await vi.advanceTimersByTimeAsync(2000);
    await assertion;
    expect(seen?.aborted).toBe(true);
  });

  it('returns the value when the operation wins', async () => {
    const handler = new RetryHandler({}, quietLogger());
    await expect(handler.executeWithTimeout(async () => 'fast', 1000)).resolves.toBe('fast');
  });

  it('cancels on an external abort', async () => {
    const handler = new RetryHandler({}, quietLogger());
    const controller = new AbortController();

    const result = handler.executeWithTimeout(() => new Promise<string>(() => {}), 60_000, controller.signal);
    controller.abort();

    await expect(result).rejects.toMatchObject({ code: AssistantErrorCode.CANCELLED });
  });
});

describe('abortableSleep', () => {
  it('rejects at once when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(abortableSleep(10_000, controller.signal)).rejects.toMatchObject({
      code: AssistantErrorCode.CANCELLED
    });
  });
});
