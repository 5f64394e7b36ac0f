import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { error as logError } from 'firebase-functions/logger';
import type { ApiError } from '../types/api.js';
import { AppError } from '../types/errors.js';

// Re-export error classes so handler imports stay in one place
export {
  AppError,
  NotFoundError,
  ValidationError,
  ConfigurationError,
  GenerationError,
  GenerationParseError,
  PersistenceError,
} from '../types/errors.js';

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    const response: ApiError = {
      error: 'Invalid request data',
      code: 'VALIDATION_ERROR',
      details: err.errors,
    };
    res.status(400).json(response);
    return;
  }

  // Body-parser rejects malformed JSON with a 400-typed error
  if (isMalformedBodyError(err)) {
    const response: ApiError = {
      error: 'Request body is not valid JSON',
      code: 'VALIDATION_ERROR',
    };
    res.status(400).json(response);
    return;
  }

  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logError('request:failed', {
        path: req.path,
        code: err.code,
        error_message: err.message,
      });
    }
    const response: ApiError = {
      error: err.message,
      code: err.code,
      ...(err.details !== undefined ? { details: err.details } : {}),
    };
    res.status(err.statusCode).json(response);
    return;
  }

  logError('request:unhandled_error', {
    path: req.path,
    error_message: err.message,
    stack: err.stack,
  });
  const response: ApiError = {
    error: `An unexpected error occurred: ${err.message}`,
    code: 'INTERNAL_ERROR',
  };
  res.status(500).json(response);
}

function isMalformedBodyError(err: Error): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}
