import { Request, Response, NextFunction, RequestHandler } from 'express';
import { RateLimitError } from '../utils/errors';
import { logger } from '../utils/logger';
import '../types/express';

interface RateLimitEntry {
  count: number;
  resetTime: number;
}

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
  message?: string;
  skipSuccessfulRequests?: boolean; // only failed attempts count against the limit
  keyGenerator?: (req: Request) => string;
}

const LOGIN_WINDOW_MS = 15 * 60 * 1000;

function getDefaultKey(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

/**
 * Fixed-window limiter. Each instance owns its counters, so two apps in one
 * process never share a budget.
 */
export function createRateLimit(config: RateLimitConfig): RequestHandler {
  const store = new Map<string, RateLimitEntry>();

  return (req: Request, res: Response, next: NextFunction): void => {
    const key = config.keyGenerator ? config.keyGenerator(req) : getDefaultKey(req);
    const now = Date.now();

    for (const [storedKey, entry] of store) {
      if (entry.resetTime <= now) {
        store.delete(storedKey);
      }
    }

    let entry = store.get(key);
    if (!entry) {
      entry = { count: 0, resetTime: now + config.windowMs };
      store.set(key, entry);
    }

    if (entry.count >= config.maxRequests) {
      const retryAfter = Math.ceil((entry.resetTime - now) / 1000);

      logger.warn('Rate limit exceeded', {
        key,
        limit: config.maxRequests,
        retryAfter,
        path: req.path,
        method: req.method,
        requestId: req.correlationId
      });

      res.setHeader('Retry-After', retryAfter);
      next(new RateLimitError(config.message ?? 'Rate limit exceeded', retryAfter, config.maxRequests));
      return;
    }

    entry.count++;
    const counted = entry;

    res.setHeader('X-RateLimit-Limit', config.maxRequests);
    res.setHeader('X-RateLimit-Remaining', Math.max(0, config.maxRequests - counted.count));
    res.setHeader('X-RateLimit-Reset', Math.ceil(counted.resetTime / 1000));

    if (config.skipSuccessfulRequests) {
      res.on('finish', () => {
        if (res.statusCode < 400 && counted.count > 0) {
          counted.count--;
        }
      });
    }

    next();
  };
}

export function createLoginRateLimit(maxAttempts: number): RequestHandler {
  return createRateLimit({
    windowMs: LOGIN_WINDOW_MS,
    maxRequests: maxAttempts,
    message: 'Too many authentication attempts, please try again later',
    skipSuccessfulRequests: true
  });
}
