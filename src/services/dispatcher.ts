import { Orchestrator } from '../orchestrator/Orchestrator.js';
import { ToolRegistry } from '../orchestrator/tools/registry.js';
import type { Classifier } from '../orchestrator/planning/IntentClassifier.js';
import type { ActivitySink, Tool, ToolMetadata, ToolMetadataInit } from '../orchestrator/types.js';
import { AssistantError, AssistantErrorCode, describeError } from './errors.js';
import { RetryHandler } from './retryHandler.js';
import { AgentCache } from './agentCache.js';
import { DispatchMethod, MetricsTracker, PerformanceMetrics } from './metrics.js';
import { FallbackAgent, FallbackAgentFactory } from './fallbackAgent.js';
import { NOOP_ACTIVITY, safeActivity } from './activity.js';
import { DEFAULT_RUNTIME_CONFIG, RuntimeConfig, applyRuntimeConfigUpdate } from '../config/runtime.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';

export interface DispatchSuccess {
  success: true;
  response: string;
  method: DispatchMethod;
  /** Seconds. */
  executionTime: number;
}

export interface DispatchFailure {
  success: false;
  error: string;
  errorCode: AssistantErrorCode;
  /** Seconds. */
  executionTime: number;
}

export type DispatchResult = DispatchSuccess | DispatchFailure;

export interface DispatchOptions {
  signal?: AbortSignal;
}

export interface DispatcherOptions {
  registry?: ToolRegistry;
  agentFactory?: FallbackAgentFactory;
  config?: Record<string, unknown>;
  classifier?: Classifier;
  activity?: ActivitySink;
  logger?: Logger;
  workingDirectory?: string;
  /** Clock for the agent cache, in milliseconds. */
  now?: () => number;
}

/**
 * Everything one dispatcher owns. Nothing here is shared between instances.
 */
interface DispatcherContext {
  config: RuntimeConfig;
  registry: ToolRegistry;
  orchestrator: Orchestrator;
  retryHandler: RetryHandler;
  agentCache: AgentCache<FallbackAgent>;
  metrics: MetricsTracker;
  activity: ActivitySink;
  logger: Logger;
}

type PrimaryOutcome =
  | { kind: 'answer'; response: string }
  | { kind: 'insufficient' }
  | { kind: 'failed'; error: unknown };

const missingAgentFactory: FallbackAgentFactory = async () => {
  throw new AssistantError({
    code: AssistantErrorCode.AGENT_CREATION_FAILED,
    message: 'No fallback agent is configured'
  });
};

function toAssistantError(error: unknown): AssistantError {
  if (error instanceof AssistantError) {
    return error;
  }
  return new AssistantError({
    code: AssistantErrorCode.UNEXPECTED_ERROR,
    message: `Unexpected error: ${describeError(error)}`,
    cause: error
  });
}

export class ReasoningDispatcher {
  private ctx: DispatcherContext;

  constructor(options: DispatcherOptions = {}) {
    const logger = options.logger ?? defaultLogger;
    const registry = options.registry ?? new ToolRegistry();
    const { config } = applyRuntimeConfigUpdate({ ...DEFAULT_RUNTIME_CONFIG }, options.config ?? {}, logger);
    const activity = safeActivity(options.activity ?? NOOP_ACTIVITY, logger);

    const orchestrator = new Orchestrator({
      registry,
      classifier: options.classifier,
      activity,
      logger,
      workingDirectory: options.workingDirectory
    });
    const agentFactory = options.agentFactory ?? missingAgentFactory;

    this.ctx = {
      config,
      registry,
      orchestrator,
      retryHandler: new RetryHandler(
        { maxRetries: config.maxRetries, baseDelayMs: config.retryBaseDelayMs },
        logger
      ),
      agentCache: new AgentCache(() => agentFactory(orchestrator.getToolContext()), {
        ttlMs: config.cacheTtlMs,
        now: options.now,
        logger
      }),
      metrics: new MetricsTracker(),
      activity,
      logger
    };
  }

  async dispatch(query: unknown, options: DispatchOptions = {}): Promise<DispatchResult> {
    const startTime = performance.now();
    const elapsed = () => (performance.now() - startTime) / 1000;
    const { signal } = options;

    try {
      const text = this.validate(query);
      const primary = await this.tryOrchestrator(text, signal);

      if (primary.kind === 'answer') {
        return this.succeed(primary.response, 'orchestrator', elapsed());
      }

      if (!this.ctx.config.enableFallback) {
        if (primary.kind === 'failed') {
          throw new AssistantError({
            code: AssistantErrorCode.ORCHESTRATOR_FAILED,
            message: `Orchestrator failed: ${describeError(primary.error)}`,
            cause: primary.error
          });
        }
        throw new AssistantError({
          code: AssistantErrorCode.NO_METHOD_AVAILABLE,
          message: 'No tool could handle the request and the fallback agent is disabled'
        });
      }

      const response = await this.tryFallback(text, signal);
      return this.succeed(response, 'fallback', elapsed());
    } catch (error) {
      return this.fail(toAssistantError(error), elapsed());
    }
  }

  private validate(query: unknown): string {
    if (typeof query !== 'string' || !query.trim()) {
      throw AssistantError.invalidQuery();
    }

    const text = query.trim();
    const { minQueryLength, maxQueryLength } = this.ctx.config;

    if (text.length < minQueryLength) {
      throw AssistantError.queryTooShort(minQueryLength);
    }
    if (text.length > maxQueryLength) {
      throw AssistantError.queryTooLong(maxQueryLength);
    }

    return text;
  }

  private async tryOrchestrator(query: string, signal?: AbortSignal): Promise<PrimaryOutcome> {
    const { orchestrator, retryHandler, config, logger } = this.ctx;

    try {
      const outcome = await retryHandler.executeWithRetry(
        attemptSignal => orchestrator.run(query, attemptSignal),
        { signal, operationName: 'Orchestrator' }
      );

      const response = outcome.response.trim();
      if (outcome.status !== 'no_match' && response.length > config.sufficiencyThreshold) {
        return { kind: 'answer', response };
      }

      logger.debug(`[Dispatcher] Orchestrator answer insufficient (status=${outcome.status})`);
      return { kind: 'insufficient' };
    } catch (error) {
      if (signal?.aborted || AssistantError.isCode(error, AssistantErrorCode.CANCELLED)) {
        throw AssistantError.cancelled();
      }
      logger.warn(`[Dispatcher] Orchestrator path failed: ${describeError(error)}`);
      return { kind: 'failed', error };
    }
  }

  private async tryFallback(query: string, signal?: AbortSignal): Promise<string> {
    const { agentCache, retryHandler, config, activity } = this.ctx;

    activity.log('Using fallback agent');
    activity.setState('thinking', 'Thinking...');

    let agent: FallbackAgent;
    try {
      agent = await agentCache.get();
    } catch (error) {
      if (error instanceof AssistantError) {
        throw error;
      }
      throw new AssistantError({
        code: AssistantErrorCode.AGENT_CREATION_FAILED,
        message: `Failed to create fallback agent: ${describeError(error)}`,
        cause: error
      });
    }

    const timeoutMs = config.fallbackTimeoutMs;
    let answer: string;

    try {
      answer = await retryHandler.executeWithTimeout(
        timeoutSignal => agent.invoke(query, { signal: timeoutSignal, timeoutMs }),
        timeoutMs,
        signal
      );
    } catch (error) {
      if (AssistantError.isCode(error, AssistantErrorCode.OLLAMA_NOT_RUNNING)) {
        agentCache.invalidate();
      }
      if (error instanceof AssistantError) {
        throw error;
      }
      throw new AssistantError({
        code: AssistantErrorCode.FALLBACK_FAILED,
        message: `Fallback agent failed: ${describeError(error)}`,
        cause: error
      });
    }

    const response = answer.trim();
    if (!response) {
      throw new AssistantError({
        code: AssistantErrorCode.EMPTY_RESPONSE,
        message: 'Fallback agent returned an empty response'
      });
    }

    return response;
  }

  private succeed(response: string, method: DispatchMethod, executionTime: number): DispatchSuccess {
    this.ctx.metrics.recordSuccess(executionTime, method);
    this.ctx.activity.setState('idle');
    this.ctx.logger.info(`[Dispatcher] answered via ${method} in ${executionTime.toFixed(2)}s`);
    return { success: true, response, method, executionTime };
  }

  private fail(error: AssistantError, executionTime: number): DispatchFailure {
    this.ctx.metrics.recordError(executionTime, error.message);
    this.ctx.activity.setState('error', error.message);
    this.ctx.logger.error(`[Dispatcher] ${error.code}: ${error.message}`);
    return { success: false, error: error.message, errorCode: error.code, executionTime };
  }

  getMetrics(): Readonly<PerformanceMetrics> {
    return this.ctx.metrics.snapshot();
  }

  resetMetrics(): void {
    this.ctx.metrics.reset();
  }

  getConfig(): Readonly<RuntimeConfig> {
    return { ...this.ctx.config };
  }

  /**
   * Applies the known, well-typed keys of `partial` and returns their names.
   */
  updateConfig(partial: Record<string, unknown>): (keyof RuntimeConfig)[] {
    const { config, applied } = applyRuntimeConfigUpdate(this.ctx.config, partial, this.ctx.logger);
    this.ctx.config = config;
    this.ctx.retryHandler.configure({ maxRetries: config.maxRetries, baseDelayMs: config.retryBaseDelayMs });
    this.ctx.agentCache.setTtl(config.cacheTtlMs);
    return applied;
  }

  registerTool(name: string, metadata: ToolMetadataInit, tool: Tool): ToolMetadata {
    return this.ctx.registry.register(name, metadata, tool);
  }

  getRegistry(): ToolRegistry {
    return this.ctx.registry;
  }

  invalidateAgent(): void {
    this.ctx.agentCache.invalidate();
  }
}
