import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';

const WINDOW_MS = 60 * 1000;

/**
 * General API rate limiter, per client per minute.
 * Uses the in-memory store (resets on server restart); each call gets its
 * own store.
 */
export function createApiRateLimiter(limit: number): RateLimitRequestHandler {
  return rateLimit({
    windowMs: WINDOW_MS,
    limit,
    message: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Stricter limiter for the login endpoint, keyed by IP.
 */
export function createLoginRateLimiter(limit: number): RateLimitRequestHandler {
  return rateLimit({
    windowMs: WINDOW_MS,
    limit,
    message: { code: 'RATE_LIMITED', message: 'Too many login attempts, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req) => {
      return req.ip || req.socket.remoteAddress || 'unknown';
    },
  });
}
