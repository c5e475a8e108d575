/**
 * Error Handler Middleware
 *
 * Last middleware in the chain; turns thrown errors into JSON responses.
 */

import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../errors';
import { logError, logger, type Logger } from '../utils/logger';

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export interface FieldIssue {
  field: string;
  message: string;
}

interface BodyParserError extends Error {
  status: number;
  type: string;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    'type' in error &&
    typeof error.type === 'string'
  );
}

export function toFieldIssues(error: ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

export interface ErrorHandlerOptions {
  verbose: boolean;
  log?: Logger;
}

export function createErrorHandler({
  verbose,
  log = logger,
}: ErrorHandlerOptions): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (error instanceof ZodError) {
      log.debug({ method: req.method, url: req.originalUrl }, 'Request validation failed');
      res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: toFieldIssues(error),
        },
      } satisfies ErrorResponse);
      return;
    }

    if (isBodyParserError(error) && error.type === 'entity.parse.failed') {
      res.status(400).json({
        error: { code: 'INVALID_JSON', message: 'Malformed JSON body' },
      } satisfies ErrorResponse);
      return;
    }

    if (error instanceof AppError) {
      const level = error.statusCode >= 500 ? 'error' : 'info';
      log[level]({ code: error.code, method: req.method, url: req.originalUrl }, error.message);
      res.status(error.statusCode).json({
        error: { code: error.code, message: error.message },
      } satisfies ErrorResponse);
      return;
    }

    if (isBodyParserError(error) && error.status < 500) {
      res.status(error.status).json({
        error: { code: 'BAD_REQUEST', message: error.message },
      } satisfies ErrorResponse);
      return;
    }

    logError(error, { method: req.method, url: req.originalUrl }, log);

    res.status(500).json({
      error: {
        code: 'INTERNAL_ERROR',
        message:
          verbose && error instanceof Error ? error.message : 'An internal error occurred',
      },
    } satisfies ErrorResponse);
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: { code: 'NOT_FOUND', message: `Route ${req.method} ${req.path} not found` },
  } satisfies ErrorResponse);
}
