import type { ServiceError } from '@teamwork-mcp/shared-types';

const DEFAULT_SERVICE = 'teamwork-mcp';

/**
 * Base error for everything the server raises on purpose.
 * Serializes to the ServiceError shape used in tool results and HTTP bodies.
 */
export class TeamworkMcpError extends Error {
  readonly code: string;
  readonly service: string;
  readonly timestamp: string;
  readonly details?: unknown;
  readonly status?: number;

  constructor(message: string, code: string, service: string = DEFAULT_SERVICE, details?: unknown, status?: number) {
    super(message);
    this.name = 'TeamworkMcpError';
    this.code = code;
    this.service = service;
    this.timestamp = new Date().toISOString();
    this.details = details;
    this.status = status;
  }

  toJSON(): ServiceError {
    const json: ServiceError = {
      code: this.code,
      message: this.message,
      service: this.service,
      timestamp: this.timestamp,
    };
    if (this.status !== undefined) json.status = this.status;
    if (this.details !== undefined) json.details = this.details;
    return json;
  }
}

export class ValidationError extends TeamworkMcpError {
  constructor(message: string, service?: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', service, details, 400);
    this.name = 'ValidationError';
  }
}

export class AuthenticationError extends TeamworkMcpError {
  constructor(message: string, service?: string) {
    super(message, 'AUTHENTICATION_ERROR', service, undefined, 401);
    this.name = 'AuthenticationError';
  }
}

export class ConfigurationError extends TeamworkMcpError {
  constructor(message: string, service?: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', service, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Non-2xx answer from the Teamwork API. `body` is the raw response text.
 */
export class TeamworkApiError extends TeamworkMcpError {
  readonly body: string;

  constructor(status: number, body: string, service?: string, details?: unknown) {
    super(`Teamwork API error ${status}: ${body}`, 'TEAMWORK_API_ERROR', service, details, status);
    this.name = 'TeamworkApiError';
    this.body = body;
  }
}

export class TimeoutError extends TeamworkMcpError {
  constructor(operation: string, service: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT', service, { operation, timeoutMs }, 504);
    this.name = 'TimeoutError';
  }
}

export class ServiceUnavailableError extends TeamworkMcpError {
  constructor(service: string, details?: unknown) {
    super(`Service ${service} is unavailable`, 'SERVICE_UNAVAILABLE', service, details, 503);
    this.name = 'ServiceUnavailableError';
  }
}

/**
 * Normalize anything thrown into a ServiceError payload.
 */
export function toServiceError(error: unknown, service: string = DEFAULT_SERVICE): ServiceError {
  if (error instanceof TeamworkMcpError) {
    return error.toJSON();
  }
  return {
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : String(error),
    service,
    timestamp: new Date().toISOString(),
  };
}
