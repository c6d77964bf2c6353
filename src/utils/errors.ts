import { ZodError } from 'zod';

export const ErrorCodes = {
  VALIDATION_ERROR: 'invalid_request',
  DUPLICATE_FLIGHT: 'duplicate_flight',
  DATABASE_UNAVAILABLE: 'database_unavailable',
  INTERNAL_ERROR: 'unexpected_error',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public isOperational: boolean = true,
    public code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export function formatZodError(error: ZodError): AppError {
  const issues = error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));

  return new AppError('Validation failed', 400, true, ErrorCodes.VALIDATION_ERROR, { issues });
}
