import type { ErrorRequestHandler, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { AppError, ErrorCodes, formatZodError } from '../utils/errors';
import { logger } from '../utils/logger';

export type ErrorBody = {
  code: number;
  errors: string;
  details?: Record<string, unknown>;
};

export function toErrorResponse(err: unknown): ErrorBody {
  if (err instanceof ZodError) {
    const appError = formatZodError(err);
    return { code: appError.statusCode, errors: appError.code, details: appError.details };
  }

  if (err instanceof AppError) {
    return { code: err.statusCode, errors: err.code, details: err.details };
  }

  // JSON mal formado que rechaza express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    return { code: 400, errors: ErrorCodes.VALIDATION_ERROR };
  }

  return { code: 500, errors: ErrorCodes.INTERNAL_ERROR };
}

export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  const body = toErrorResponse(err);
  if (body.code >= 500) {
    logger.error({ err, method: req.method, url: req.originalUrl }, 'Unhandled error');
  } else {
    logger.warn({ err, method: req.method, url: req.originalUrl }, body.errors);
  }
  return res.status(body.code).json(body);
};

export const notFoundHandler: RequestHandler = (_req, res) => {
  return res.status(404).json({ code: 404, data: {} });
};
