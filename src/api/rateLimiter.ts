import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Env } from '../infra/env.js';
import { logger } from '../infra/logger.js';

type RateLimitState = {
  count: number;
  resetAt: number;
};

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  resetAt: number;
  retryAfterSeconds: number;
}

/**
 * Fixed-window request counter per client key
 */
export class RateLimitWindow {
  private hits = new Map<string, RateLimitState>();

  constructor(
    private windowMs: number,
    private max: number,
    private now: () => number = Date.now
  ) {}

  hit(key: string): RateLimitDecision {
    const current = this.now();
    let state = this.hits.get(key);
    if (!state || current >= state.resetAt) {
      state = { count: 0, resetAt: current + this.windowMs };
      this.hits.set(key, state);
    }
    state.count += 1;

    return {
      allowed: state.count <= this.max,
      limit: this.max,
      remaining: Math.max(0, this.max - state.count),
      resetAt: state.resetAt,
      retryAfterSeconds: Math.ceil((state.resetAt - current) / 1000),
    };
  }
}

/**
 * Per-IP limiter for the API. A zero window or limit disables it.
 */
export function createRateLimiter(
  env: Pick<Env, 'RATE_LIMIT_WINDOW_MS' | 'RATE_LIMIT_MAX_REQUESTS'>
): RequestHandler {
  if (env.RATE_LIMIT_WINDOW_MS <= 0 || env.RATE_LIMIT_MAX_REQUESTS <= 0) {
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  const window = new RateLimitWindow(env.RATE_LIMIT_WINDOW_MS, env.RATE_LIMIT_MAX_REQUESTS);

  return (req: Request, res: Response, next: NextFunction) => {
    const key = req.ip || 'unknown';
    const decision = window.hit(key);

    res.setHeader('X-RateLimit-Limit', String(decision.limit));
    res.setHeader('X-RateLimit-Remaining', String(decision.remaining));
    res.setHeader('X-RateLimit-Reset', String(decision.resetAt));

    if (!decision.allowed) {
      logger.warn('Rate limit exceeded', { ip: key, path: req.path });
      res.setHeader('Retry-After', String(decision.retryAfterSeconds));
      res.status(429).json({
        error: 'RATE_LIMITED',
        message: 'Too many requests. Please retry later.',
      });
      return;
    }

    next();
  };
}
