import type { Message, Tool as OllamaTool, ToolCall } from 'ollama';
import { OllamaClient } from './ollamaClient.js';
import { AssistantError, AssistantErrorCode, describeError } from './errors.js';
import { ToolRegistry } from '../orchestrator/tools/registry.js';
import { ToolContext, ToolMetadata } from '../orchestrator/types.js';
import { buildFallbackSystemPrompt } from '../config/systemPrompt.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';

export interface FallbackInvokeOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface FallbackAgent {
  invoke: (query: string, options?: FallbackInvokeOptions) => Promise<string>;
}

/** Builds an agent whose tools run with the same context as the orchestrator's. */
export type FallbackAgentFactory = (toolContext: ToolContext) => Promise<FallbackAgent>;

export const MAX_TOOL_ROUNDS = 5;

export interface OllamaAgentSettings {
  host: string;
  model: string;
}

export function toOllamaTool(metadata: ToolMetadata): OllamaTool {
  return {
    type: 'function',
    function: {
      name: metadata.name,
      description: metadata.description,
      parameters: {
        type: 'object',
        required: ['query'],
        properties: {
          query: {
            type: 'string',
            description: 'What the tool should do, in plain language'
          }
        }
      }
    }
  };
}

function queryArgument(call: ToolCall, fallback: string): string {
  const value: unknown = call.function.arguments.query;
  return typeof value === 'string' && value.trim() ? value : fallback;
}

export class OllamaFallbackAgent implements FallbackAgent {
  private client: OllamaClient;
  private model: string;
  private registry: ToolRegistry;
  private logger: Logger;
  private toolContext: ToolContext;

  constructor(
    client: OllamaClient,
    model: string,
    registry: ToolRegistry,
    toolContext: ToolContext,
    logger: Logger = defaultLogger
  ) {
    this.client = client;
    this.model = model;
    this.registry = registry;
    this.toolContext = toolContext;
    this.logger = logger;
  }

  private async runToolCall(call: ToolCall, query: string, signal?: AbortSignal): Promise<string> {
    const name = call.function.name;
    const tool = this.registry.getTool(name);
    if (!tool) {
      return `Error: unknown function ${name}`;
    }

    try {
      this.logger.debug(`[Fallback] calling ${name}`);
      return await tool.invoke(queryArgument(call, query), { ...this.toolContext, signal });
    } catch (error) {
      if (AssistantError.isCode(error, AssistantErrorCode.CANCELLED)) {
        throw error;
      }
      return AssistantError.toolFailed(name, error).message;
    }
  }

  async invoke(query: string, options: FallbackInvokeOptions = {}): Promise<string> {
    const { signal } = options;
    const metadata = this.registry.all();
    const tools = metadata.map(toOllamaTool);

    const messages: Message[] = [
      { role: 'system', content: buildFallbackSystemPrompt(metadata) },
      { role: 'user', content: query }
    ];

    for (let round = 0; round < MAX_TOOL_ROUNDS; round++) {
      const turn = await this.client.chat(this.model, messages, tools, signal);

      if (turn.toolCalls.length === 0) {
        return turn.content;
      }

      messages.push({ role: 'assistant', content: turn.content, tool_calls: turn.toolCalls });

      for (const call of turn.toolCalls) {
        if (signal?.aborted) {
          throw AssistantError.cancelled();
        }
        const output = await this.runToolCall(call, query, signal);
        messages.push({ role: 'tool', content: output });
      }
    }

    this.logger.warn(`[Fallback] stopped after ${MAX_TOOL_ROUNDS} tool rounds`);
    const final = await this.client.chat(this.model, messages, [], signal);
    return final.content;
  }
}

/**
 * Connects to Ollama and makes sure the model is present. Every failure is
 * reported as AgentCreationFailed, except a server that is not running.
 */
export function createOllamaFallbackAgentFactory(
  settings: OllamaAgentSettings,
  registry: ToolRegistry,
  logger: Logger = defaultLogger
): FallbackAgentFactory {
  return async toolContext => {
    const client = new OllamaClient(settings.host, logger);

    try {
      await client.checkConnection();
      await client.ensureModelExists(settings.model);
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

    logger.info(`Fallback agent ready (${settings.model} at ${settings.host})`);
    return new OllamaFallbackAgent(client, settings.model, registry, toolContext, logger);
  };
}
