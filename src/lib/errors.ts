import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { getLogger } from '../middleware/logging';

/**
 * Custom HTTP error class with status code and optional details
 */
export class HttpError extends Error {
  status: number;
  details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error (400)
 * Non-positive amount or limit, malformed date, bad payload
 */
export class ValidationError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(400, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * Not found error (404)
 */
export class NotFoundError extends HttpError {
  constructor(message = 'Resource not found', details?: unknown) {
    super(404, message, details);
    this.name = 'NotFoundError';
  }
}

/**
 * Account not found error (404)
 * The caller should send the user through registration first
 */
export class AccountNotFoundError extends HttpError {
  constructor(username: string) {
    super(404, `Account not found: ${username}`, { username });
    this.name = 'AccountNotFound';
  }
}

/**
 * Conflict error (409)
 * A store write collided with an existing row
 */
export class ConflictError extends HttpError {
  constructor(message = 'Resource already exists', details?: unknown) {
    super(409, message, details);
    this.name = 'ConflictError';
  }
}

/**
 * Storage error (503)
 * Wraps any persistence failure. The driver error stays on `cause` and is never rendered.
 */
export class StorageError extends HttpError {
  constructor(message = 'Storage operation failed', cause?: unknown) {
    super(503, message);
    this.name = 'StorageError';
    this.cause = cause;
  }
}

/**
 * Error response format
 */
interface ErrorResponse {
  error: string;
  message: string;
  details?: unknown;
  status: number;
}

/**
 * Global error handler middleware
 * Catches all errors and formats them consistently
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const log = getLogger(req);

  // Log error with structured logging
  const errorContext: Record<string, unknown> = {
    event: 'error',
    errorName: err.name,
    errorMessage: err.message,
    path: req.path,
    method: req.method,
  };

  if (err instanceof HttpError) {
    errorContext.status = err.status;
    errorContext.details = err.details;
  }

  if (process.env.NODE_ENV === 'development') {
    errorContext.stack = err.stack;
  }

  log.error(errorContext);

  // Handle Zod validation errors
  if (err instanceof ZodError) {
    const response: ErrorResponse = {
      error: 'ValidationError',
      message: 'Request validation failed',
      details: err.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
        code: e.code,
      })),
      status: 400,
    };

    res.status(400).json(response);
    return;
  }

  // Storage failures are opaque to the caller
  if (err instanceof StorageError) {
    const response: ErrorResponse = {
      error: err.name,
      message: 'Storage is unavailable, try again later',
      status: err.status,
    };

    res.status(err.status).json(response);
    return;
  }

  // Handle custom HTTP errors
  if (err instanceof HttpError) {
    const response: ErrorResponse = {
      error: err.name,
      message: err.message,
      details: err.details,
      status: err.status,
    };

    res.status(err.status).json(response);
    return;
  }

  // Malformed JSON bodies surface from express.json() as SyntaxError with a status
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    const response: ErrorResponse = {
      error: 'ValidationError',
      message: 'Malformed JSON body',
      status: 400,
    };

    res.status(400).json(response);
    return;
  }

  // Handle unknown errors
  const response: ErrorResponse = {
    error: 'InternalError',
    message: process.env.NODE_ENV === 'production'
      ? 'An unexpected error occurred'
      : err.message,
    status: 500,
  };

  res.status(500).json(response);
}

/**
 * 404 handler for unknown routes
 */
export function notFoundHandler(_req: Request, res: Response): void {
  const response: ErrorResponse = {
    error: 'NotFoundError',
    message: 'The requested endpoint does not exist',
    status: 404,
  };

  res.status(404).json(response);
}

/**
 * Async route wrapper to catch errors
 * Eliminates need for try-catch in every route
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
