/**
 * Security Headers Middleware
 * Helmet configured for a JSON API, plus HSTS on HTTPS requests only
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import helmet from 'helmet';

const HSTS_VALUE = 'max-age=31536000; includeSubDomains';

export function securityHeadersMiddleware(): RequestHandler[] {
  const helmetMiddleware = helmet({
    contentSecurityPolicy: {
      useDefaults: false,
      directives: {
        defaultSrc: ["'self'"],
      },
    },
    xFrameOptions: { action: 'deny' },
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    strictTransportSecurity: false,
    // Helmet only emits "0"; the legacy block mode is set below
    xXssProtection: false,
  });

  const extraHeaders = (req: Request, res: Response, next: NextFunction): void => {
    res.setHeader('X-XSS-Protection', '1; mode=block');
    if (req.secure) {
      res.setHeader('Strict-Transport-Security', HSTS_VALUE);
    }
    next();
  };

  return [helmetMiddleware, extraHeaders];
}
