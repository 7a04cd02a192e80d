import { describe, it, expect, vi, beforeEach } from 'vitest';
import { toErrorResponse } from '../../../src/api/errorHandler.js';
import {
  ClosedMonthError,
  DatabaseError,
  UnsettledAccountError,
} from '../../../src/domain/errors.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
  redactLogFields: (value: unknown) => value,
  setLogger: vi.fn(),
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

const context = { method: 'POST', path: '/api/transactions' };

describe('toErrorResponse', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should map ledger errors to their status and code', () => {
    const response = toErrorResponse(new ClosedMonthError('2026-01'), context, { NODE_ENV: 'test' });

    expect(response).toEqual({
      status: 409,
      body: {
        error: 'CLOSED_MONTH',
        message: 'Month 2026-01 is closed',
        details: { month: '2026-01' },
      },
    });
    expect(loggerMock.logger.warn).toHaveBeenCalledWith(
      'Application error',
      expect.objectContaining({ code: 'CLOSED_MONTH', path: '/api/transactions' })
    );
  });

  it('should carry domain details into the body', () => {
    const response = toErrorResponse(
      new UnsettledAccountError(3, 'Account 3 still holds money', { endingBalance: 12 }),
      context,
      { NODE_ENV: 'test' }
    );

    expect(response.body).toEqual({
      error: 'UNSETTLED_ACCOUNT',
      message: 'Account 3 still holds money',
      details: { accountId: 3, endingBalance: 12 },
    });
  });

  it('should log server-side failures as errors', () => {
    const response = toErrorResponse(new DatabaseError('Execute failed'), context, { NODE_ENV: 'test' });

    expect(response.status).toBe(500);
    expect(response.body.error).toBe('DATABASE_ERROR');
    expect(loggerMock.logger.error).toHaveBeenCalledTimes(1);
    expect(loggerMock.logger.warn).not.toHaveBeenCalled();
  });

  it('should hide unexpected error messages outside development', () => {
    expect(toErrorResponse(new Error('disk on fire'), context, { NODE_ENV: 'production' })).toEqual({
      status: 500,
      body: { error: 'INTERNAL_SERVER_ERROR', message: 'An unexpected error occurred' },
    });
    expect(toErrorResponse(new Error('disk on fire'), context, { NODE_ENV: 'development' }).body.message).toBe(
      'disk on fire'
    );
  });

  it('should answer malformed JSON with 400', () => {
    const error = Object.assign(new SyntaxError('Unexpected token'), { body: '{' });

    expect(toErrorResponse(error, context, { NODE_ENV: 'test' })).toEqual({
      status: 400,
      body: { error: 'INVALID_JSON', message: 'Invalid JSON in request body' },
    });
  });
});
