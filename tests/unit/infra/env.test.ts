import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { parseEnv } from '../../../src/infra/env.js';

describe('parseEnv', () => {
  it('should fill defaults for an empty environment', () => {
    expect(parseEnv({})).toEqual({
      NODE_ENV: 'development',
      PORT: 3000,
      SQLITE_DB_PATH: './data/ledger.db',
      LOG_LEVEL: 'info',
      LOG_FILE: undefined,
      CLOSE_POLICY: 'strict',
      RECURRENCE_AUTO_EXPAND: true,
      RATE_LIMIT_WINDOW_MS: 60000,
      RATE_LIMIT_MAX_REQUESTS: 120,
    });
  });

  it('should coerce numbers and flags', () => {
    const env = parseEnv({
      PORT: '8080',
      CLOSE_POLICY: 'permissive',
      RECURRENCE_AUTO_EXPAND: '0',
      RATE_LIMIT_MAX_REQUESTS: '0',
    });

    expect(env.PORT).toBe(8080);
    expect(env.CLOSE_POLICY).toBe('permissive');
    expect(env.RECURRENCE_AUTO_EXPAND).toBe(false);
    expect(env.RATE_LIMIT_MAX_REQUESTS).toBe(0);
  });

  it('should reject an unknown close policy', () => {
    expect(() => parseEnv({ CLOSE_POLICY: 'lenient' })).toThrow(ZodError);
  });

  it('should reject flags other than true/false/1/0', () => {
    expect(() => parseEnv({ RECURRENCE_AUTO_EXPAND: 'yes' })).toThrow(ZodError);
  });
});
