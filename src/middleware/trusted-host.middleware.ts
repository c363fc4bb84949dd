/**
 * Trusted Host Middleware
 * Rejects requests whose Host header is not on the allow list
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ApiError } from './error-handler';

/**
 * Match a hostname against allowed patterns.
 * `*` allows any host; `*.example.com` allows subdomains of example.com.
 */
export function isHostAllowed(hostname: string, allowedHosts: readonly string[]): boolean {
  const host = hostname.toLowerCase();

  return allowedHosts.some(pattern => {
    const allowed = pattern.toLowerCase();
    if (allowed === '*') {
      return true;
    }
    if (allowed.startsWith('*.')) {
      return host.endsWith(allowed.slice(1));
    }
    return host === allowed;
  });
}

export function trustedHostMiddleware(allowedHosts: readonly string[]): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    // req.hostname drops the port and honours "trust proxy"
    if (isHostAllowed(req.hostname || '', allowedHosts)) {
      next();
      return;
    }
    next(new ApiError(400, 'Invalid host header', 'INVALID_HOST'));
  };
}
