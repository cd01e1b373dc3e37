import { Ollama, type Message, type Tool, type ToolCall } from 'ollama';
import { AssistantError, AssistantErrorCode, describeError } from './errors.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';

export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

export interface OllamaModel {
  name: string;
  size: number;
}

export interface ChatTurn {
  content: string;
  toolCalls: ToolCall[];
}

function isConnectionRefused(message: string): boolean {
  const lower = message.toLowerCase();
  return lower.includes('econnrefused') || lower.includes('connection refused') || lower.includes('fetch failed');
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.message.toLowerCase().includes('aborted'));
}

export class OllamaClient {
  private client: Ollama;
  private baseUrl: string;
  private connectionVerified: boolean = false;
  private logger: Logger;

  constructor(baseUrl: string = DEFAULT_OLLAMA_HOST, logger: Logger = defaultLogger) {
    this.baseUrl = baseUrl;
    this.client = new Ollama({ host: baseUrl });
    this.logger = logger;
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  async checkConnection(): Promise<boolean> {
    try {
      await this.client.list();
      this.connectionVerified = true;
      return true;
    } catch (error) {
      this.connectionVerified = false;
      const message = describeError(error);

      if (isConnectionRefused(message)) {
        throw AssistantError.ollamaNotRunning();
      }

      throw new AssistantError({
        code: AssistantErrorCode.AGENT_CREATION_FAILED,
        message: `Could not reach Ollama at ${this.baseUrl}: ${message}`,
        cause: error
      });
    }
  }

  async ensureConnection(): Promise<void> {
    if (!this.connectionVerified) {
      await this.checkConnection();
    }
  }

  async listModels(): Promise<OllamaModel[]> {
    await this.ensureConnection();
    const response = await this.client.list();
    return response.models.map(model => ({ name: model.name, size: model.size }));
  }

  async checkModelExists(modelName: string): Promise<boolean> {
    const models = await this.listModels();
    return models.some(model => model.name === modelName || model.name.startsWith(`${modelName}:`));
  }

  async ensureModelExists(modelName: string): Promise<void> {
    if (await this.checkModelExists(modelName)) {
      return;
    }

    this.logger.info(`Downloading model "${modelName}"...`);

    let lastStatus = '';
    try {
      const stream = await this.client.pull({ model: modelName, stream: true });
      for await (const part of stream) {
        if (part.status === 'success') {
          return;
        }
        lastStatus = part.status;
      }
    } catch (error) {
      throw new AssistantError({
        code: AssistantErrorCode.AGENT_CREATION_FAILED,
        message: `Failed to pull Ollama model "${modelName}": ${describeError(error)}`,
        cause: error
      });
    }

    throw new AssistantError({
      code: AssistantErrorCode.AGENT_CREATION_FAILED,
      message: `Pull of Ollama model "${modelName}" ended without success${lastStatus ? ` (last status: ${lastStatus})` : ''}`
    });
  }

  /**
   * One streamed chat round. Aborting `signal` aborts the HTTP request,
   * including an abort that lands while the request is being opened.
   */
  async chat(model: string, messages: Message[], tools: Tool[], signal?: AbortSignal): Promise<ChatTurn> {
    if (signal?.aborted) {
      throw AssistantError.cancelled();
    }

    await this.ensureConnection();

    const stream = await this.client.chat({ model, messages, tools, stream: true });
    if (signal?.aborted) {
      stream.abort();
      throw AssistantError.cancelled();
    }
    const onAbort = () => stream.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let content = '';
    const toolCalls: ToolCall[] = [];

    try {
      for await (const part of stream) {
        content += part.message.content;
        if (part.message.tool_calls) {
          toolCalls.push(...part.message.tool_calls);
        }
      }
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        throw AssistantError.cancelled();
      }
      if (isConnectionRefused(describeError(error))) {
        this.connectionVerified = false;
        throw AssistantError.ollamaNotRunning();
      }
      throw new AssistantError({
        code: AssistantErrorCode.FALLBACK_FAILED,
        message: `Ollama chat failed: ${describeError(error)}`,
        cause: error
      });
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    return { content, toolCalls };
  }
}
