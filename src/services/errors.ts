export enum AssistantErrorCode {
  INVALID_QUERY = 'InvalidQuery',
  QUERY_TOO_SHORT = 'QueryTooShort',
  QUERY_TOO_LONG = 'QueryTooLong',
  TOOL_EXECUTION_ERROR = 'ToolExecutionError',
  ORCHESTRATOR_FAILED = 'OrchestratorFailed',
  EXECUTION_TIMEOUT = 'ExecutionTimeout',
  EMPTY_RESPONSE = 'EmptyResponse',
  RETRY_EXHAUSTED = 'RetryExhausted',
  NO_METHOD_AVAILABLE = 'NoMethodAvailable',
  AGENT_CREATION_FAILED = 'AgentCreationFailed',
  FALLBACK_FAILED = 'FallbackFailed',
  CANCELLED = 'Cancelled',
  INVALID_TOOL_METADATA = 'InvalidToolMetadata',
  CONFIG_ERROR = 'ConfigError',
  OLLAMA_NOT_RUNNING = 'OllamaNotRunning',
  UNEXPECTED_ERROR = 'UnexpectedError'
}

export interface AssistantErrorDetails {
  code: AssistantErrorCode;
  message: string;
  retryable?: boolean;
  cause?: unknown;
}

export class AssistantError extends Error {
  public readonly code: AssistantErrorCode;
  public readonly retryable: boolean;
  public readonly cause?: unknown;
  public readonly timestamp: number;

  constructor(details: AssistantErrorDetails) {
    super(details.message);
    this.name = 'AssistantError';
    this.code = details.code;
    this.retryable = details.retryable ?? false;
    this.cause = details.cause;
    this.timestamp = Date.now();

    Object.setPrototypeOf(this, AssistantError.prototype);
  }

  static invalidQuery(): AssistantError {
    return new AssistantError({
      code: AssistantErrorCode.INVALID_QUERY,
      message: 'Query must be a non-empty string'
    });
  }

  static queryTooShort(minLength: number): AssistantError {
    return new AssistantError({
      code: AssistantErrorCode.QUERY_TOO_SHORT,
      message: `Query too short (minimum ${minLength} characters)`
    });
  }

  static queryTooLong(maxLength: number): AssistantError {
    return new AssistantError({
      code: AssistantErrorCode.QUERY_TOO_LONG,
      message: `Query too long (maximum ${maxLength} characters)`
    });
  }

  static toolFailed(toolName: string, error: unknown): AssistantError {
    return new AssistantError({
      code: AssistantErrorCode.TOOL_EXECUTION_ERROR,
      message: `Error executing ${toolName}: ${describeError(error)}`,
      retryable: true,
      cause: error
    });
  }

  static retryExhausted(attempts: number, lastError: unknown): AssistantError {
    return new AssistantError({
      code: AssistantErrorCode.RETRY_EXHAUSTED,
      message: `Operation failed after ${attempts} attempts: ${describeError(lastError)}`,
      cause: lastError
    });
  }

  static timeout(timeoutMs: number): AssistantError {
    return new AssistantError({
      code: AssistantErrorCode.EXECUTION_TIMEOUT,
      message: `Query execution timed out after ${timeoutMs / 1000}s`
    });
  }

  static cancelled(): AssistantError {
    return new AssistantError({
      code: AssistantErrorCode.CANCELLED,
      message: 'Request was cancelled'
    });
  }

  static ollamaNotRunning(): AssistantError {
    return new AssistantError({
      code: AssistantErrorCode.OLLAMA_NOT_RUNNING,
      message: 'Ollama is not running. Please start Ollama with "ollama serve" or ensure it is running in the background.'
    });
  }

  static isCode(error: unknown, code: AssistantErrorCode): boolean {
    return error instanceof AssistantError && error.code === code;
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable
    };
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
