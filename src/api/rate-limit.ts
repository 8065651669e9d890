/**
 * In-memory sliding-window rate limiter middleware.
 *
 * Planning calls the completion provider, so workflow creation is limited
 * per session (falling back to the client address). Single-process only.
 */

import { Request, Response, NextFunction } from 'express';
import { createTypedError, apiError } from '../domain/errors';

export interface RateLimitOptions {
  /** Maximum requests allowed within the window. Default: 30 */
  maxRequests?: number;
  /** Window duration in milliseconds. Default: 60_000 (1 minute) */
  windowMs?: number;
  /** Bucket key for a request; defaults to the client address. */
  keyBy?: (req: Request) => string;
  now?: () => number;
}

function clientAddress(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

/** Key by `sessionId` in the JSON body when present, else by client address. */
export function sessionKey(req: Request): string {
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && 'sessionId' in body && typeof body.sessionId === 'string' && body.sessionId) {
    return `session:${body.sessionId}`;
  }
  return `ip:${clientAddress(req)}`;
}

/**
 * Create a rate-limiting middleware.
 *
 * Returns 429 with a typed error when the limit is exceeded, plus
 * RateLimit-Limit, RateLimit-Remaining and Retry-After headers.
 */
export function rateLimit(options?: RateLimitOptions) {
  const maxRequests = options?.maxRequests ?? 30;
  const windowMs = options?.windowMs ?? 60_000;
  const keyBy = options?.keyBy ?? clientAddress;
  const now = options?.now ?? Date.now;
  const buckets = new Map<string, number[]>();

  return (req: Request, res: Response, next: NextFunction) => {
    const key = keyBy(req);
    const at = now();
    const cutoff = at - windowMs;

    const timestamps = (buckets.get(key) ?? []).filter((t) => t > cutoff);

    if (timestamps.length >= maxRequests) {
      buckets.set(key, timestamps);
      const retryAfterMs = timestamps[0] + windowMs - at;
      const retryAfterSec = Math.ceil(retryAfterMs / 1000);

      res.set('RateLimit-Limit', String(maxRequests));
      res.set('RateLimit-Remaining', '0');
      res.set('Retry-After', String(retryAfterSec));

      res.status(429).json(
        apiError(
          createTypedError({
            code: 'RATE_LIMIT.EXCEEDED',
            message: `Rate limit exceeded. Try again in ${retryAfterSec} seconds.`,
            retryable: true,
            details: { retryAfterMs, limit: maxRequests, windowMs },
          }),
        ),
      );
      return;
    }

    timestamps.push(at);
    // Empty buckets are dropped so idle keys do not accumulate.
    for (const [other, list] of buckets) {
      if (other !== key && list[list.length - 1] <= cutoff) buckets.delete(other);
    }
    buckets.set(key, timestamps);

    res.set('RateLimit-Limit', String(maxRequests));
    res.set('RateLimit-Remaining', String(maxRequests - timestamps.length));

    next();
  };
}
