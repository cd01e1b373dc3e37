import { ReasoningDispatcher } from './dispatcher.js';
import { createOllamaFallbackAgentFactory } from './fallbackAgent.js';
import { createDefaultRegistry, type ActivitySink } from '../orchestrator/index.js';
import { HarkConfig, OllamaSettings, loadConfig, resolveOllamaSettings } from '../config/manager.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';

export interface AssistantOptions {
  config?: HarkConfig;
  ollama?: Partial<OllamaSettings>;
  /** Overrides applied on top of the persisted runtime settings. */
  runtime?: Record<string, unknown>;
  activity?: ActivitySink;
  logger?: Logger;
  workingDirectory?: string;
}

/**
 * A dispatcher wired to the built-in tool catalog and an Ollama fallback agent.
 */
export function createAssistant(options: AssistantOptions = {}): ReasoningDispatcher {
  const logger = options.logger ?? defaultLogger;
  const config = options.config ?? loadConfig();
  const ollama = resolveOllamaSettings(config, options.ollama);
  const registry = createDefaultRegistry({ logger });

  return new ReasoningDispatcher({
    registry,
    agentFactory: createOllamaFallbackAgentFactory(ollama, registry, logger),
    config: { ...config.runtime, ...options.runtime },
    activity: options.activity,
    logger,
    workingDirectory: options.workingDirectory
  });
}
