import type { Request, Response, NextFunction } from 'express';
import { isAppError } from '../domain/errors.js';
import { logger, redactLogFields } from '../infra/logger.js';
import type { Env } from '../infra/env.js';

export interface ErrorResponse {
  status: number;
  body: { error: string; message: string; details?: unknown };
}

/**
 * Maps ledger errors to their HTTP status and stable code; everything else is a 500.
 * Logs with the given request context.
 */
export function toErrorResponse(
  err: Error,
  context: Record<string, unknown>,
  env: Pick<Env, 'NODE_ENV'>
): ErrorResponse {
  if (isAppError(err)) {
    const meta = {
      code: err.code,
      message: err.message,
      details: redactLogFields(err.details),
      stack: env.NODE_ENV === 'development' ? err.stack : undefined,
      ...context,
    };
    if (err.statusCode >= 500) {
      logger.error('Application error', meta);
    } else {
      logger.warn('Application error', meta);
    }

    return {
      status: err.statusCode,
      body: {
        error: err.code,
        message: err.message,
        ...(err.details ? { details: redactLogFields(err.details) } : {}),
      },
    };
  }

  if (err.name === 'SyntaxError' && 'body' in err) {
    logger.warn('Invalid JSON in request', {
      message: err.message,
      ...context,
    });
    return {
      status: 400,
      body: { error: 'INVALID_JSON', message: 'Invalid JSON in request body' },
    };
  }

  logger.error('Unexpected error', {
    message: err.message,
    name: err.name,
    stack: err.stack,
    ...context,
  });
  return {
    status: 500,
    body: {
      error: 'INTERNAL_SERVER_ERROR',
      message: env.NODE_ENV === 'development' ? err.message : 'An unexpected error occurred',
    },
  };
}

/**
 * Global error handler middleware
 */
export function createErrorHandler(env: Pick<Env, 'NODE_ENV'>) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const { status, body } = toErrorResponse(
      err,
      {
        method: req.method,
        path: req.path,
        ip: req.ip,
        userAgent: req.get('user-agent'),
        body: redactLogFields(req.body),
      },
      env
    );
    res.status(status).json(body);
  };
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({
    error: 'NOT_FOUND',
    message: 'The requested resource was not found',
  });
}
