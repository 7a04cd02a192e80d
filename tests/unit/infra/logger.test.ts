import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import winston from 'winston';
import { createLogger, redactLogFields } from '../../../src/infra/logger.js';

describe('redactLogFields', () => {
  it('should mask transaction notes at any depth', () => {
    expect(
      redactLogFields({ body: { amount: 45, note: 'gift for Sam' }, items: [{ note: 'pharmacy' }] })
    ).toEqual({
      body: { amount: 45, note: '[redacted]' },
      items: [{ note: '[redacted]' }],
    });
  });

  it('should mask request credentials regardless of case', () => {
    expect(redactLogFields({ Authorization: 'Bearer test-secret', path: '/api/months' })).toEqual({
      Authorization: '[redacted]',
      path: '/api/months',
    });
  });

  it('should keep empty notes and plain values as they are', () => {
    expect(redactLogFields({ note: null })).toEqual({ note: null });
    expect(redactLogFields('2026-01')).toBe('2026-01');
    expect(redactLogFields(42)).toBe(42);
  });
});

describe('createLogger', () => {
  it('should redact metadata before it reaches a transport', async () => {
    let deliver: (info: unknown) => void = () => undefined;
    const delivered = new Promise<unknown>((resolve) => {
      deliver = resolve;
    });
    const stream = new Writable({
      objectMode: true,
      write(info: unknown, _encoding, done) {
        deliver(info);
        done();
      },
    });

    const logger = createLogger({ NODE_ENV: 'test', LOG_LEVEL: 'info', LOG_FILE: undefined });
    logger.add(new winston.transports.Stream({ stream }));
    logger.info('Transaction recorded', { month: '2026-01', note: 'gift for Sam', amount: -45 });

    expect(await delivered).toMatchObject({
      message: 'Transaction recorded',
      month: '2026-01',
      note: '[redacted]',
      amount: -45,
      service: 'household-ledger',
    });
  });
});
