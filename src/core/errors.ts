// src/core/errors.ts

/**
 * @file Defines custom error classes for the application.
 * Using custom errors allows for more specific error handling and identification.
 */

/**
 * Base class for custom application errors.
 * This allows catching all application-specific errors with `instanceof ApplicationError`.
 */
export class ApplicationError extends Error {
  /**
   * Optional additional data associated with the error.
   * Can be used to store context, error codes, etc.
   */
  public readonly metadata?: Record<string, unknown>;

  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;

    // Restores the prototype chain when compiled down to ES5.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error thrown when the environment does not describe a usable model backend,
 * or describes one only partially.
 */
export class ConfigError extends ApplicationError {
  /** Names of the environment variables that are missing or invalid. */
  public readonly variables: string[];

  constructor(message: string, variables: string[] = [], metadata?: Record<string, unknown>) {
    super(message, { ...metadata, variables });
    this.name = 'ConfigError';
    this.variables = variables;
  }
}

/**
 * Error thrown when a specified tool cannot be found.
 */
export class ToolNotFoundError extends ApplicationError {
  constructor(toolName: string, message?: string) {
    super(message || `Tool "${toolName}" not found.`, { toolName });
    this.name = 'ToolNotFoundError';
  }
}

/**
 * Error thrown when an LLM interaction fails or returns an unexpected response.
 */
export class LLMError extends ApplicationError {
  /**
   * The type of LLM error (e.g., 'api_error', 'rate_limit', 'authentication', 'invalid_request').
   */
  public readonly errorType?: string;

  constructor(message: string, errorType?: string, metadata?: Record<string, unknown>) {
    super(message, metadata);
    this.name = 'LLMError';
    this.errorType = errorType;
  }
}

/**
 * Error thrown when an input validation fails.
 */
export class ValidationError extends ApplicationError {
  public readonly validationDetails?: Record<string, unknown>;

  constructor(message: string, validationDetails?: Record<string, unknown>, metadata?: Record<string, unknown>) {
    super(message, metadata);
    this.name = 'ValidationError';
    this.validationDetails = validationDetails;
  }
}

/**
 * Error surfaced by `runAgent` when an agent run ends in the failed state.
 */
export class AgentRunError extends ApplicationError {
  /** Failure code reported by the agent (e.g. 'max_turns_exceeded', 'LLMError'). */
  public readonly code: string;

  constructor(message: string, code: string, metadata?: Record<string, unknown>) {
    super(message, { ...metadata, code });
    this.name = 'AgentRunError';
    this.code = code;
  }
}
