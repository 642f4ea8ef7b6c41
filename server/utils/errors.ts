/**
 * Custom Error Classes
 * Typed errors with HTTP status codes for consistent error handling
 */

export type ErrorMetadata = Record<string, unknown>;

/**
 * Base Application Error
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly errorCode?: string;
  public readonly metadata?: ErrorMetadata;

  constructor(
    message: string,
    statusCode: number = 500,
    errorCode?: string,
    isOperational: boolean = true,
    metadata?: ErrorMetadata
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.errorCode = errorCode;
    this.isOperational = isOperational;
    this.metadata = metadata;

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Bad Request Error (400)
 */
export class BadRequestError extends AppError {
  constructor(message: string = "Bad request", errorCode?: string, metadata?: ErrorMetadata) {
    super(message, 400, errorCode || "bad_request", true, metadata);
  }
}

/**
 * Unauthorized Error (401)
 */
export class UnauthorizedError extends AppError {
  constructor(message: string = "Unauthorized", errorCode?: string, metadata?: ErrorMetadata) {
    super(message, 401, errorCode || "unauthorized", true, metadata);
  }
}

/**
 * Forbidden Error (403)
 * Wrong webhook id, secret or dispatch token
 */
export class ForbiddenError extends AppError {
  constructor(message: string = "Forbidden", errorCode?: string, metadata?: ErrorMetadata) {
    super(message, 403, errorCode || "forbidden", true, metadata);
  }
}

/**
 * Not Found Error (404)
 */
export class NotFoundError extends AppError {
  constructor(message: string = "Resource not found", errorCode?: string, metadata?: ErrorMetadata) {
    super(message, 404, errorCode || "not_found", true, metadata);
  }
}

/**
 * Helpdesk API Error (502)
 * The helpdesk answered with an error status or an unusable body
 */
export class HelpdeskApiError extends AppError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, 502, "helpdesk_error", true, metadata);
  }
}

/**
 * Channel API Error (502)
 * A chat network rejected an outbound call
 */
export class ChannelApiError extends AppError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, 502, "channel_error", true, metadata);
  }
}

/**
 * Configuration Error (500)
 * Missing or invalid configuration (e.g. no inbox for a channel)
 */
export class ConfigurationError extends AppError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, 500, "configuration_error", true, metadata);
  }
}

/**
 * Service Unavailable Error (503)
 * Used when a manual dispatch could not be delivered
 */
export class ServiceUnavailableError extends AppError {
  constructor(message: string = "Service unavailable", errorCode?: string, metadata?: ErrorMetadata) {
    super(message, 503, errorCode || "service_unavailable", true, metadata);
  }
}

export class DispatchError extends ServiceUnavailableError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, "dispatch_failed", metadata);
  }
}

/**
 * Check if an error is operational (expected) or programming error
 */
export function isOperationalError(error: Error): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
