import type { ErrorRequestHandler, RequestHandler } from 'express';
import { ZodError } from 'zod';

import logger from '../services/logger.js';

export interface HttpErrorOptions extends ErrorOptions {
  details?: unknown;
}

export class HttpError extends Error {
  public readonly statusCode: number;
  public readonly details?: unknown;

  constructor(statusCode: number, message: string, options: HttpErrorOptions = {}) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.details = options.details;
  }
}

interface ResolvedError {
  statusCode: number;
  message: string;
  details?: unknown;
}

// body-parser and other express middleware attach `status`
const hasStatus = (value: unknown): value is { status: number; message?: unknown } =>
  typeof value === 'object' &&
  value !== null &&
  'status' in value &&
  typeof value.status === 'number' &&
  value.status >= 400 &&
  value.status < 600;

const resolveError = (err: unknown): ResolvedError => {
  if (err instanceof HttpError) {
    return { statusCode: err.statusCode, message: err.message, details: err.details };
  }

  if (err instanceof ZodError) {
    return { statusCode: 400, message: 'Validation failed', details: err.flatten() };
  }

  if (hasStatus(err) && err.status < 500) {
    return { statusCode: err.status, message: typeof err.message === 'string' ? err.message : 'Bad request' };
  }

  return { statusCode: hasStatus(err) ? err.status : 500, message: 'Internal server error' };
};

export const requestLogger: RequestHandler = (req, res, next) => {
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    logger.info('Request completed', {
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      durationMs: Number(durationMs.toFixed(2)),
    });
  });

  next();
};

/**
 * Renders every error as `{ error: { message, statusCode, details? }, meta }`.
 * Messages of unexpected 5xx errors are not sent to the client.
 */
export const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  const { statusCode, message, details } = resolveError(err);
  const level = statusCode >= 500 ? 'error' : 'warn';
  logger[level]('Request failed', { method: req.method, path: req.originalUrl, statusCode, error: err });

  res.status(statusCode).json({
    error: {
      message,
      statusCode,
      ...(details !== undefined ? { details } : {}),
    },
    meta: {
      timestamp: new Date().toISOString(),
      path: req.originalUrl,
      method: req.method,
    },
  });
};

export default errorHandler;
