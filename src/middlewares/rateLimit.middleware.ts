import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

/**
 * Rate Limiting Store (In-memory, per limiter)
 */
interface RateLimitEntry {
  count: number;
  resetTime: number;
}

/**
 * Get client identifier for rate limiting
 */
const getClientId = (req: Request): string => req.ip || 'unknown';

/**
 * Rate Limiting Middleware
 */
export const rateLimit = (
  windowMs: number = 15 * 60 * 1000, // 15 minutes default
  maxRequests: number = 5, // 5 requests per window
  message?: string
) => {
  const store = new Map<string, RateLimitEntry>();
  let lastSweep = Date.now();

  return (req: Request, res: Response, next: NextFunction) => {
    const clientId = getClientId(req);
    const now = Date.now();
    const key = `${req.path}:${clientId}`;

    // Drop expired entries once per window
    if (now - lastSweep > windowMs) {
      for (const [storedKey, stored] of store) {
        if (stored.resetTime < now) {
          store.delete(storedKey);
        }
      }
      lastSweep = now;
    }

    let entry = store.get(key);

    if (!entry || entry.resetTime < now) {
      entry = {
        count: 0,
        resetTime: now + windowMs,
      };
      store.set(key, entry);
    }

    entry.count++;

    res.setHeader('X-RateLimit-Limit', maxRequests.toString());
    res.setHeader('X-RateLimit-Remaining', Math.max(0, maxRequests - entry.count).toString());
    res.setHeader('X-RateLimit-Reset', new Date(entry.resetTime).toISOString());

    if (entry.count > maxRequests) {
      const retryAfter = Math.ceil((entry.resetTime - now) / 1000);

      logger.warn('[Rate Limit Exceeded]', {
        clientId,
        path: req.path,
        count: entry.count,
        limit: maxRequests,
      });

      return ResponseHandler.tooManyRequests(
        res,
        message || `Too many requests. Try again in ${retryAfter} seconds.`,
        retryAfter
      );
    }

    next();
  };
};

/**
 * Limiters for the unauthenticated OTP endpoints. Each call returns fresh counters.
 */
export const createRateLimiters = () => ({
  // Registration and login requests (5 per 15 minutes)
  auth: rateLimit(15 * 60 * 1000, 5, 'Too many attempts. Try again in 15 minutes.'),

  // Code re-sends (3 per minute)
  verification: rateLimit(60 * 1000, 3, 'Too many code requests. Wait a minute before asking again.'),
});
