export class MarketAgentError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'MarketAgentError';
  }
}

export class AgentError extends MarketAgentError {
  constructor(message: string, cause?: Error) {
    super(message, 'AGENT_ERROR', cause);
    this.name = 'AgentError';
  }
}

export type LlmFailureKind = 'timeout' | 'transport' | 'http' | 'malformed';

export class LlmError extends MarketAgentError {
  constructor(
    message: string,
    public readonly kind: LlmFailureKind,
    cause?: Error,
  ) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmError';
  }
}

export class ToolExecutionError extends MarketAgentError {
  constructor(message: string, cause?: Error) {
    super(message, 'TOOL_EXECUTION_ERROR', cause);
    this.name = 'ToolExecutionError';
  }
}

export class QuizError extends MarketAgentError {
  constructor(message: string, cause?: Error) {
    super(message, 'QUIZ_ERROR', cause);
    this.name = 'QuizError';
  }
}

export class PersistenceError extends MarketAgentError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}

export class SchemaValidationError extends MarketAgentError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends MarketAgentError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
