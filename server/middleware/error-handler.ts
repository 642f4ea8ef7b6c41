import { Request, Response, NextFunction } from "express";
import { AppError, isOperationalError, type ErrorMetadata } from "../utils/errors";
import { logError, logWarn } from "../utils/logger";

/**
 * Error response interface
 */
interface ErrorResponse {
  error: string;
  message: string;
  details?: ErrorMetadata;
  requestId?: string;
  stack?: string;
}

/**
 * Errors raised by Express body parsing carry their own 4xx status.
 */
function clientErrorStatus(err: Error): number | undefined {
  if ("status" in err && typeof err.status === "number" && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return undefined;
}

/**
 * Global error handler middleware
 * Catches all errors and formats them consistently
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  // Default to 500 if no status code
  let statusCode = 500;
  let errorCode = "internal_error";
  let message = "An unexpected error occurred";
  let metadata: ErrorMetadata | undefined;

  if (err instanceof AppError) {
    statusCode = err.statusCode;
    errorCode = err.errorCode || errorCode;
    message = err.message;
    metadata = err.metadata;
  } else {
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      statusCode = status;
      errorCode = "bad_request";
      message = err.message;
    }
  }

  const context = {
    statusCode,
    errorCode,
    path: req.path,
    method: req.method,
    ip: req.ip,
    requestId: req.id,
    metadata,
  };
  if (statusCode >= 500) {
    logError(message, err, context);
  } else {
    logWarn(message, context);
  }

  const errorResponse: ErrorResponse = {
    error: errorCode,
    message,
    requestId: req.id,
  };

  if (metadata) {
    errorResponse.details = metadata;
  }

  // Add stack trace in development
  if (process.env.NODE_ENV === "development" && err.stack) {
    errorResponse.stack = err.stack;
  }

  res.status(statusCode).json(errorResponse);
}

/**
 * Not Found handler - handles 404 errors
 */
export function notFoundHandler(req: Request, res: Response, _next: NextFunction): void {
  res.status(404).json({
    error: "not_found",
    message: `Cannot ${req.method} ${req.path}`,
  });
}

/**
 * Async error wrapper
 * Wraps async route handlers to catch errors and pass to error handler
 */
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Log unhandled promise rejections instead of crashing on them
 */
export function setupUnhandledRejectionHandler(): void {
  process.on("unhandledRejection", (reason: unknown) => {
    logError("Unhandled promise rejection", reason, { fatal: false });
  });
}

/**
 * Handle uncaught exceptions
 */
export function setupUncaughtExceptionHandler(): void {
  process.on("uncaughtException", (error: Error) => {
    logError("Uncaught Exception", error, {
      fatal: true,
    });

    // Non-operational errors (programming bugs) crash the app
    if (!isOperationalError(error)) {
      process.exit(1);
    }
  });
}
