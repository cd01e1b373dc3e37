import { describe, it, expect, vi, afterEach, type Mock } from 'vitest';
import { ReasoningDispatcher, DispatcherOptions } from './dispatcher.js';
import { AssistantErrorCode } from './errors.js';
import { FallbackAgent } from './fallbackAgent.js';
import { IntentTable, LexicalIntentClassifier } from '../orchestrator/planning/IntentClassifier.js';
import { ToolRegistry } from '../orchestrator/tools/registry.js';
import { ActivitySink, Tool } from '../orchestrator/types.js';
import { Logger } from '../utils/logger.js';

const table: IntentTable = {
  substitutions: {},
  categories: [{ name: 'utilities', keyword: 'time', patterns: ['time|clock'] }],
  categoryIntents: {}
};

const TIME_ANSWER = 'It is 10:30 on Monday';

function quietLogger(): Logger {
  const logger = new Logger('debug');
  logger.setSilent(true);
  return logger;
}

interface Harness {
  dispatcher: ReasoningDispatcher;
  registry: ToolRegistry;
  clock: Mock<Tool['invoke']>;
  logger: Logger;
}

function createHarness(options: DispatcherOptions & { answer?: () => Promise<string> } = {}): Harness {
  const { answer, config, ...rest } = options;
  const registry = new ToolRegistry();
  const clock = vi.fn<Tool['invoke']>(answer ?? (async () => TIME_ANSWER));
  registry.register(
    'clock',
    { category: 'utilities', description: 'Tell the time', keywords: ['time'], priority: 10, minConfidence: 0.3 },
    { name: 'clock', invoke: clock }
  );

  const logger = quietLogger();
  const dispatcher = new ReasoningDispatcher({
    registry,
    classifier: new LexicalIntentClassifier(table),
    logger,
    ...rest,
    config: { retryBaseDelayMs: 0, ...config }
  });

  return { dispatcher, registry, clock, logger };
}

function agentAnswering(invoke: FallbackAgent['invoke']) {
  const agent: FallbackAgent = { invoke: vi.fn(invoke) };
  const factory = vi.fn(async () => agent);
  return { agent, factory };
}

afterEach(() => {
  vi.useRealTimers();
});

describe('ReasoningDispatcher validation', () => {
  it('rejects an empty query', async () => {
    const { dispatcher } = createHarness();
    const result = await dispatcher.dispatch('');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errorCode).toBe(AssistantErrorCode.INVALID_QUERY);
    expect(result.error).toBe('Query must be a non-empty string');
  });

  it.each([42, null, undefined, '   '])('rejects %j as InvalidQuery', async query => {
    const { dispatcher } = createHarness();
    const result = await dispatcher.dispatch(query);
    expect(result).toMatchObject({ success: false, errorCode: AssistantErrorCode.INVALID_QUERY });
  });

  it('enforces length bounds on the trimmed query', async () => {
    const { dispatcher } = createHarness({ config: { minQueryLength: 3, maxQueryLength: 10, enableFallback: false } });

    const codeFor = async (query: string) => {
      const result = await dispatcher.dispatch(query);
      return result.success ? 'ok' : result.errorCode;
    };

    expect(await codeFor('ab')).toBe(AssistantErrorCode.QUERY_TOO_SHORT);
    expect(await codeFor('   ab   ')).toBe(AssistantErrorCode.QUERY_TOO_SHORT);
    expect(await codeFor('abc')).toBe(AssistantErrorCode.NO_METHOD_AVAILABLE);
    expect(await codeFor('a'.repeat(10))).toBe(AssistantErrorCode.NO_METHOD_AVAILABLE);
    expect(await codeFor('a'.repeat(11))).toBe(AssistantErrorCode.QUERY_TOO_LONG);
  });

  it('never retries validation errors', async () => {
    const { dispatcher, clock } = createHarness();
    await dispatcher.dispatch('x'.repeat(1001));
    expect(clock).not.toHaveBeenCalled();
  });
});

describe('ReasoningDispatcher primary path', () => {
  it('answers from the orchestrator when the output is long enough', async () => {
    const { factory } = agentAnswering(async () => 'unused');
    const { dispatcher } = createHarness({ agentFactory: factory });

    const result = await dispatcher.dispatch('what time is it');

    expect(result).toMatchObject({ success: true, response: TIME_ANSWER, method: 'orchestrator' });
    expect(factory).not.toHaveBeenCalled();
  });

  it('retries with delays of base * 2^attempt', async () => {
    vi.useFakeTimers();
    let calls = 0;
    const { dispatcher, clock } = createHarness({
      config: { maxRetries: 3, retryBaseDelayMs: 10 },
      answer: async () => {
        calls++;
        if (calls < 3) throw new Error('busy');
        return TIME_ANSWER;
      }
    });

    let settled = false;
    const pending = dispatcher.dispatch('what time is it').then(result => {
      settled = true;
      return result;
    });

    await vi.advanceTimersByTimeAsync(29);
    expect(settled).toBe(false);
    expect(clock).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(1);
    const result = await pending;

    expect(clock).toHaveBeenCalledTimes(3);
    expect(result).toMatchObject({ success: true, method: 'orchestrator' });
  });

  it('reports OrchestratorFailed when tools keep failing and fallback is off', async () => {
    const { dispatcher, clock } = createHarness({
      config: { maxRetries: 1, enableFallback: false },
      answer: async () => {
        throw new Error('offline');
      }
    });

    const result = await dispatcher.dispatch('what time is it');

    expect(result).toMatchObject({ success: false, errorCode: AssistantErrorCode.ORCHESTRATOR_FAILED });
    expect(clock).toHaveBeenCalledTimes(2);
  });

  it('reports NoMethodAvailable when no tool matches and fallback is off', async () => {
    const { dispatcher } = createHarness({ config: { enableFallback: false } });
    const result = await dispatcher.dispatch('sing me a song');
    expect(result).toMatchObject({ success: false, errorCode: AssistantErrorCode.NO_METHOD_AVAILABLE });
  });

  it('cancels promptly during the backoff sleep', async () => {
    const controller = new AbortController();
    const { dispatcher, clock } = createHarness({
      config: { maxRetries: 3, retryBaseDelayMs: 60_000 },
      answer: async () => {
        controller.abort();
        throw new Error('busy');
      }
    });

    const result = await dispatcher.dispatch('what time is it', { signal: controller.signal });

    expect(result).toMatchObject({ success: false, errorCode: AssistantErrorCode.CANCELLED });
    expect(clock).toHaveBeenCalledTimes(1);
  });
});

describe('ReasoningDispatcher fallback path', () => {
  it('falls back when nothing matches', async () => {
    const { agent, factory } = agentAnswering(async () => '  Hello! How can I help?  ');
    const { dispatcher } = createHarness({ agentFactory: factory });

    const result = await dispatcher.dispatch('hello there');

    expect(result).toMatchObject({ success: true, response: 'Hello! How can I help?', method: 'fallback' });
    expect(agent.invoke).toHaveBeenCalledWith('hello there', expect.objectContaining({ timeoutMs: 30000 }));
  });

  it('falls back when the orchestrator answer is too short', async () => {
    const { factory } = agentAnswering(async () => 'A longer answer from the agent');
    const { dispatcher } = createHarness({ agentFactory: factory, answer: async () => '10:30' });

    const result = await dispatcher.dispatch('time?');
    expect(result).toMatchObject({ success: true, method: 'fallback' });
  });

  it('falls back when the orchestrator keeps failing', async () => {
    const { factory } = agentAnswering(async () => 'I could not reach the clock, sorry.');
    const { dispatcher } = createHarness({
      agentFactory: factory,
      config: { maxRetries: 0 },
      answer: async () => {
        throw new Error('offline');
      }
    });

    const result = await dispatcher.dispatch('what time is it');
    expect(result).toMatchObject({ success: true, method: 'fallback' });
  });

  it('keeps using the cached agent, so the method stays the same', async () => {
    const { factory } = agentAnswering(async () => 'General answer here');
    const { dispatcher } = createHarness({ agentFactory: factory });

    const methods: string[] = [];
    for (let i = 0; i < 3; i++) {
      const result = await dispatcher.dispatch('tell me about rivers');
      methods.push(result.success ? result.method : result.errorCode);
    }

    expect(methods).toEqual(['fallback', 'fallback', 'fallback']);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('builds the agent for the same working directory as the tools', async () => {
    const { factory } = agentAnswering(async () => 'General answer here');
    const { dispatcher } = createHarness({ agentFactory: factory, workingDirectory: '/srv/hark-workspace' });

    await dispatcher.dispatch('tell me about rivers');

    expect(factory).toHaveBeenCalledWith(expect.objectContaining({ workingDirectory: '/srv/hark-workspace' }));
  });

  it('rebuilds the agent after invalidateAgent', async () => {
    const { factory } = agentAnswering(async () => 'General answer here');
    const { dispatcher } = createHarness({ agentFactory: factory });

    await dispatcher.dispatch('tell me about rivers');
    dispatcher.invalidateAgent();
    await dispatcher.dispatch('tell me about rivers');

    expect(factory).toHaveBeenCalledTimes(2);
  });

  it('times out a slow agent and aborts its call', async () => {
    let seen: AbortSignal | undefined;
    const { factory } = agentAnswering((_query, options) => {
      seen = options?.signal;
      return new Promise<string>(() => {});
    });
    const { dispatcher } = createHarness({ agentFactory: factory, config: { fallbackTimeoutMs: 20 } });

    const result = await dispatcher.dispatch('hello there');

    expect(result).toMatchObject({
      success: false,
      errorCode: AssistantErrorCode.EXECUTION_TIMEOUT,
      error: 'Query execution timed out after 0.02s'
    });
    expect(seen?.aborted).toBe(true);
  });

  it('reports EmptyResponse for a blank answer', async () => {
    const { factory } = agentAnswering(async () => '   ');
    const { dispatcher } = createHarness({ agentFactory: factory });

    const result = await dispatcher.dispatch('hello there');
    expect(result).toMatchObject({ success: false, errorCode: AssistantErrorCode.EMPTY_RESPONSE });
  });

  it('reports FallbackFailed when the agent throws', async () => {
    const { factory } = agentAnswering(async () => {
      throw new Error('model crashed');
    });
    const { dispatcher } = createHarness({ agentFactory: factory });

    const result = await dispatcher.dispatch('hello there');
    expect(result).toMatchObject({
      success: false,
      errorCode: AssistantErrorCode.FALLBACK_FAILED,
      error: 'Fallback agent failed: model crashed'
    });
  });

  it('reports AgentCreationFailed when the agent cannot be built', async () => {
    const factory = vi.fn(async (): Promise<FallbackAgent> => {
      throw new Error('no model');
    });
    const { dispatcher } = createHarness({ agentFactory: factory });

    const result = await dispatcher.dispatch('hello there');
    expect(result).toMatchObject({
      success: false,
      errorCode: AssistantErrorCode.AGENT_CREATION_FAILED,
      error: 'Failed to create fallback agent: no model'
    });
  });

  it('reports AgentCreationFailed when no agent is configured', async () => {
    const { dispatcher } = createHarness();
    const result = await dispatcher.dispatch('hello there');
    expect(result).toMatchObject({ success: false, errorCode: AssistantErrorCode.AGENT_CREATION_FAILED });
  });
});

describe('ReasoningDispatcher state', () => {
  it('updates metrics on every outcome', async () => {
    const { dispatcher } = createHarness({ config: { enableFallback: false } });

    await dispatcher.dispatch('what time is it');
    await dispatcher.dispatch('');

    const metrics = dispatcher.getMetrics();
    expect(metrics.totalQueries).toBe(2);
    expect(metrics.successfulQueries).toBe(1);
    expect(metrics.orchestratorQueries).toBe(1);
    expect(metrics.fallbackQueries).toBe(0);
    expect(metrics.errorCount).toBe(1);
    expect(metrics.lastError).toBe('Query must be a non-empty string');
    expect(metrics.successRate).toBe(50);

    dispatcher.resetMetrics();
    expect(dispatcher.getMetrics().totalQueries).toBe(0);
  });

  it('applies known config keys and warns about unknown ones', () => {
    const { dispatcher, logger } = createHarness();
    const warn = vi.spyOn(logger, 'warn');

    const applied = dispatcher.updateConfig({ sufficiencyThreshold: 3, speed: 'fast' });

    expect(applied).toEqual(['sufficiencyThreshold']);
    expect(dispatcher.getConfig().sufficiencyThreshold).toBe(3);
    expect(warn).toHaveBeenCalledWith('Unknown configuration parameter: speed');
  });

  it('uses an updated threshold on the next request', async () => {
    const { factory } = agentAnswering(async () => 'General answer here');
    const { dispatcher } = createHarness({ agentFactory: factory, answer: async () => '10:30' });

    expect(await dispatcher.dispatch('time?')).toMatchObject({ method: 'fallback' });
    dispatcher.updateConfig({ sufficiencyThreshold: 3 });
    expect(await dispatcher.dispatch('time?')).toMatchObject({ method: 'orchestrator', response: '10:30' });
  });

  it('registers tools through the registry', async () => {
    const { dispatcher, registry } = createHarness({ config: { enableFallback: false } });
    dispatcher.registerTool(
      'joke',
      { category: 'utilities', description: 'Tell a joke', keywords: ['joke'], priority: 10, minConfidence: 0.2 },
      { name: 'joke', invoke: async () => 'Why did the function return? It had closure.' }
    );

    expect(registry.has('joke')).toBe(true);
    expect(await dispatcher.dispatch('joke please')).toMatchObject({ success: true, method: 'orchestrator' });
  });

  it('is not affected by a failing activity sink', async () => {
    const activity: ActivitySink = {
      log: () => {
        throw new Error('display gone');
      },
      setState: () => {
        throw new Error('display gone');
      }
    };
    const { dispatcher } = createHarness({ activity });

    const result = await dispatcher.dispatch('what time is it');
    expect(result).toMatchObject({ success: true, method: 'orchestrator' });
  });
});
