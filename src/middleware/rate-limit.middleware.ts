/**
 * Rate Limit Middleware
 * Express middleware that enforces a RateLimitManager's decisions
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { RateLimitManager, nowInSeconds } from '../lib/rate-limit/rate-limit.manager';
import { QuotaInfo, UNKNOWN_CLIENT_KEY } from '../lib/rate-limit/rate-limit.types';
import { RateLimitExceededError } from './error-handler';

export interface RateLimitMiddlewareOptions {
  keyGenerator?: (req: Request) => string;
  clock?: () => number;              // Epoch seconds
  message?: string;
}

/**
 * Default key generator - uses the client address
 * (req.ip honours the app's "trust proxy" setting)
 */
export function defaultKeyGenerator(req: Request): string {
  return req.ip || req.socket.remoteAddress || UNKNOWN_CLIENT_KEY;
}

function setQuotaHeaders(res: Response, quota: QuotaInfo): void {
  res.setHeader('X-RateLimit-Limit', quota.limit.toString());
  res.setHeader('X-RateLimit-Remaining', quota.remaining.toString());
  res.setHeader('X-RateLimit-Reset', Math.floor(quota.reset).toString());
}

/**
 * Create rate limit middleware
 */
export function rateLimitMiddleware(
  limiter: RateLimitManager,
  options: RateLimitMiddlewareOptions = {}
): RequestHandler {
  const keyGenerator = options.keyGenerator || defaultKeyGenerator;
  const clock = options.clock || nowInSeconds;
  const { maxCalls, windowSeconds } = limiter.getConfig();
  const message = options.message || `Rate limit exceeded: ${maxCalls} requests per ${windowSeconds} seconds`;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (limiter.isExempt(req.path)) {
      next();
      return;
    }

    const decision = limiter.check(keyGenerator(req), req.path, clock());

    if (decision.kind === 'reject') {
      setQuotaHeaders(res, decision);
      next(new RateLimitExceededError(message, decision.retryAfter));
      return;
    }

    if (!decision.exempt) {
      setQuotaHeaders(res, decision);
    }

    next();
  };
}
