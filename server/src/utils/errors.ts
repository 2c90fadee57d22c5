import { Request, Response, NextFunction } from 'express';
import logger from './logger';

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * 400 Bad Request - validation errors
 */
export class ValidationError extends AppError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 400);
    this.field = field;
  }
}

/**
 * 404 Not Found - resource not found
 */
export class NotFoundError extends AppError {
  public readonly resource: string;

  constructor(resource: string) {
    super(`${resource} not found`, 404);
    this.resource = resource;
  }
}

/**
 * 409 Conflict - duplicate or already exists
 */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/**
 * 401 Unauthorized - not authenticated
 */
export class UnauthorizedError extends AppError {
  constructor(message = 'Not authenticated') {
    super(message, 401);
  }
}

/**
 * 403 Forbidden - insufficient permissions
 */
export class ForbiddenError extends AppError {
  constructor(message = 'Access denied') {
    super(message, 403);
  }
}

/**
 * Standard error response shape
 */
export interface ErrorResponse {
  error: string;
  field?: string;
}

/**
 * True when a better-sqlite3 error reports a UNIQUE violation, optionally
 * restricted to one `table.column`.
 */
export function isUniqueConstraintError(error: unknown, column?: string): boolean {
  // Matched by shape: the driver's error class may come from another realm
  if (typeof error !== 'object' || error === null || !('code' in error) || !('message' in error)) {
    return false;
  }
  if (error.code !== 'SQLITE_CONSTRAINT_UNIQUE' || typeof error.message !== 'string') {
    return false;
  }
  return column === undefined || error.message.includes(column);
}

/**
 * Format an error for JSON response.
 * AppError subclasses are operational and their messages are safe to
 * return to clients. Everything else gets a generic message.
 */
export function formatError(error: unknown): ErrorResponse {
  if (error instanceof ValidationError) {
    return {
      error: error.message,
      ...(error.field && { field: error.field }),
    };
  }

  if (error instanceof AppError) {
    return { error: error.message };
  }

  // body-parser rejects malformed JSON with an expose-able 400
  if (isClientHttpError(error)) {
    return { error: error.message };
  }

  return { error: 'Internal server error' };
}

/**
 * Get status code from error
 */
export function getErrorStatusCode(error: unknown): number {
  if (error instanceof AppError) {
    return error.statusCode;
  }
  if (isClientHttpError(error)) {
    return error.status;
  }
  return 500;
}

function isClientHttpError(error: unknown): error is Error & { status: number } {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

/**
 * Express error handling middleware
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = getErrorStatusCode(error);

  if (statusCode >= 500) {
    logger.error({ err: error, method: req.method, path: req.path }, 'unhandled error');
  }

  res.status(statusCode).json(formatError(error));
}

/**
 * Send a standardized error response. Logs server errors and returns a
 * sanitized response to the client.
 */
export function sendErrorResponse(
  res: Response,
  error: unknown,
  context: string,
): void {
  const statusCode = getErrorStatusCode(error);
  if (statusCode >= 500) {
    logger.error({ err: error }, `error ${context}`);
  } else {
    logger.debug({ statusCode, reason: error instanceof Error ? error.message : String(error) }, `rejected ${context}`);
  }
  res.status(statusCode).json(formatError(error));
}
