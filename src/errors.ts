/**
 * Structured error types
 *
 * Every error raised on purpose carries a machine-readable code and details
 * so the MCP layer can decide what is safe to show to a client.
 */

import crypto from 'crypto';

export class MCPError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MCPError';
  }
}

export class ValidationError extends MCPError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class ToolNotFoundError extends MCPError {
  constructor(toolName: string) {
    super(
      `Tool not found: ${toolName}`,
      'TOOL_NOT_FOUND',
      { toolName }
    );
    this.name = 'ToolNotFoundError';
  }
}

export class ConfigurationError extends MCPError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * The spec source could not be read, fetched or parsed. Always fatal for
 * that load.
 */
export class SpecLoadError extends MCPError {
  constructor(source: string, reason: string, cause?: unknown) {
    super(`Failed to load OpenAPI spec from ${source}: ${reason}`, 'SPEC_LOAD_ERROR', { source, reason });
    this.name = 'SpecLoadError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class NetworkError extends MCPError {
  constructor(message: string, statusCode?: number, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', { statusCode, ...details });
    this.name = 'NetworkError';
  }
}

export class UpstreamTimeoutError extends MCPError {
  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`, 'UPSTREAM_TIMEOUT', { url, timeoutMs });
    this.name = 'UpstreamTimeoutError';
  }
}

export function isMCPError(error: unknown): error is MCPError {
  return error instanceof MCPError;
}

/**
 * Helper function to get error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (isMCPError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      details: error.details,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Correlation ID handed to clients in place of internal error details
 */
export function generateCorrelationId(): string {
  return crypto.randomUUID();
}
