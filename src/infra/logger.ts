import winston from 'winston';
import type { Env } from './env.js';

/**
 * Transaction notes are free text and may carry personal details; request credentials
 * never reach the logs either.
 */
const REDACTED_KEYS = new Set(['note', 'authorization', 'cookie', 'password', 'token']);

const REDACTED = '[redacted]';

/**
 * Copies a log payload with sensitive fields masked at any depth
 */
export function redactLogFields(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redactLogFields);
  }
  if (value && typeof value === 'object' && !(value instanceof Error)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, field]) => [
        key,
        REDACTED_KEYS.has(key.toLowerCase()) && field !== null && field !== undefined
          ? REDACTED
          : redactLogFields(field),
      ])
    );
  }
  return value;
}

const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (REDACTED_KEYS.has(key.toLowerCase())) {
      info[key] = REDACTED;
    } else if (key !== 'level' && key !== 'message') {
      info[key] = redactLogFields(info[key]);
    }
  }
  return info;
})();

// "2026-01-31 09:00:00 [info] (2026-01): Month closed {...}"
const consoleLine = winston.format.printf(({ timestamp, level, message, month, ...meta }) => {
  const scope = typeof month === 'string' ? ` (${month})` : '';
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} [${level}]${scope}: ${String(message)}${metaStr}`;
});

/**
 * Console logger, plus a JSON file in production when LOG_FILE is set
 */
export function createLogger(env: Pick<Env, 'NODE_ENV' | 'LOG_LEVEL' | 'LOG_FILE'>): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      silent: env.NODE_ENV === 'test',
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        consoleLine
      ),
    }),
  ];

  if (env.NODE_ENV === 'production' && env.LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: env.LOG_FILE,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: env.LOG_LEVEL,
    format: winston.format.combine(redactFormat, winston.format.errors({ stack: true })),
    defaultMeta: { service: 'household-ledger' },
    transports,
    exitOnError: false,
  });
}

/**
 * Global logger instance (initialized in server.ts)
 */
export let logger: winston.Logger;

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}
