import { describe, expect, it } from 'vitest';
import { FlightSearchQuerySchema } from '../schemas';
import { AppError, ErrorCodes } from '../utils/errors';
import { toErrorResponse } from './error-handler';

describe('toErrorResponse', () => {
  it('turns zod errors into a 400 with the failing fields', () => {
    const parsed = FlightSearchQuerySchema.safeParse({ airlineId: '1', from: '2024-1-01', to: '2024-12-31' });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;

    expect(toErrorResponse(parsed.error)).toEqual({
      code: 400,
      errors: ErrorCodes.VALIDATION_ERROR,
      details: { issues: [{ field: 'from', message: 'expected YYYY-MM-DD' }] },
    });
  });

  it('keeps the status and code of an AppError', () => {
    const err = new AppError('Flight already exists', 409, true, ErrorCodes.DUPLICATE_FLIGHT, {
      flightNumber: 'AV101',
    });

    expect(toErrorResponse(err)).toEqual({
      code: 409,
      errors: 'duplicate_flight',
      details: { flightNumber: 'AV101' },
    });
  });

  it('maps malformed JSON bodies to 400', () => {
    const err = Object.assign(new SyntaxError('Unexpected token }'), { body: '{"a":}' });

    expect(toErrorResponse(err)).toEqual({ code: 400, errors: 'invalid_request' });
  });

  it('hides unknown errors behind a 500', () => {
    expect(toErrorResponse(new Error('connection lost'))).toEqual({
      code: 500,
      errors: 'unexpected_error',
    });
  });
});
