/**
 * Typed errors raised by the gateway. The ErrorHandler middleware reads
 * `statusCode` and `code` off these to build the HTTP response.
 */

export type ErrorDetails = Record<string, unknown>;

export class GatewayError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: ErrorDetails;

  constructor(message: string, code: string, statusCode: number, details?: ErrorDetails) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class ValidationError extends GatewayError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

export class AuthenticationError extends GatewayError {
  constructor(message: string = 'Admin authentication required') {
    super(message, 'AUTHENTICATION_REQUIRED', 401);
  }
}

export class NotFoundError extends GatewayError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'NOT_FOUND', 404, details);
  }
}

export class AccountNotFoundError extends GatewayError {
  constructor(accountSlug: string) {
    super(`Account not found: ${accountSlug}`, 'ACCOUNT_NOT_FOUND', 404, { accountSlug });
  }
}

export class InstanceNotFoundError extends GatewayError {
  constructor(accountSlug: string, instanceSlug: string) {
    super(
      `Agent instance not found: ${accountSlug}/${instanceSlug}`,
      'INSTANCE_NOT_FOUND',
      404,
      { accountSlug, instanceSlug }
    );
  }
}

export class InstanceInactiveError extends GatewayError {
  constructor(accountSlug: string, instanceSlug: string, status: string) {
    super(
      `Agent instance ${accountSlug}/${instanceSlug} is not active (status: ${status})`,
      'INSTANCE_INACTIVE',
      403,
      { accountSlug, instanceSlug, status }
    );
  }
}

export class ConfigurationError extends GatewayError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'CONFIGURATION_ERROR', 500, details);
  }
}

export class SessionError extends GatewayError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'SESSION_ERROR', 500, details);
  }
}

export class CapacityError extends GatewayError {
  constructor(message: string) {
    super(message, 'CAPACITY_EXCEEDED', 503);
  }
}

export class LlmProviderError extends GatewayError {
  readonly upstreamStatus?: number;
  readonly retryable: boolean;

  constructor(message: string, upstreamStatus?: number, retryable: boolean = false) {
    super(message, 'LLM_PROVIDER_ERROR', 502, { upstreamStatus });
    this.upstreamStatus = upstreamStatus;
    this.retryable = retryable;
  }
}

/** Recorded on a streamed turn whose client went away before the final frame. */
export class ClientDisconnectedError extends GatewayError {
  constructor() {
    super('Client disconnected before the response finished', 'CLIENT_DISCONNECTED', 499);
  }
}

export class DuplicateKeyError extends Error {
  constructor(readonly constraint: string) {
    super(`Duplicate key violates ${constraint}`);
    this.name = 'DuplicateKeyError';
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
