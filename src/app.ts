/**
 * Express Application Configuration
 */

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { Settings } from './config/env';
import { APP_VERSION } from './config/constants';
import { RateLimitManager } from './lib/rate-limit/rate-limit.manager';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { rateLimitMiddleware, RateLimitMiddlewareOptions } from './middleware/rate-limit.middleware';
import { requestLoggingMiddleware } from './middleware/request-logging.middleware';
import { securityHeadersMiddleware } from './middleware/security-headers.middleware';
import { trustedHostMiddleware } from './middleware/trusted-host.middleware';
import { HealthService } from './modules/health/health.service';

// Import routers
import { createHealthRouter } from './modules/health/health.router';
import { createApiV1Router } from './modules/api/api.router';

export interface AppDependencies {
  settings: Readonly<Settings>;
  limiter: RateLimitManager;
  healthService: HealthService;
  rateLimitOptions?: RateLimitMiddlewareOptions;
}

export const createApp = (deps: AppDependencies): Application => {
  const { settings, limiter, healthService } = deps;
  const app = express();

  app.set('trust proxy', settings.TRUST_PROXY);
  app.disable('x-powered-by');

  // ============================================================================
  // Security & Middleware
  // ============================================================================

  // Request id + access log (first, so every later response carries the id)
  app.use(requestLoggingMiddleware);

  // Host header allow list outside debug mode
  if (!settings.DEBUG) {
    app.use(trustedHostMiddleware(settings.ALLOWED_HOSTS));
  }

  // Helmet for security headers
  app.use(securityHeadersMiddleware());

  // CORS configuration
  app.use(
    cors({
      origin: settings.DEBUG ? true : settings.ALLOWED_HOSTS,
      credentials: true,
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
      exposedHeaders: [
        'X-Total-Count',
        'X-Request-ID',
        'X-RateLimit-Limit',
        'X-RateLimit-Remaining',
        'X-RateLimit-Reset',
        'Retry-After',
      ],
    })
  );

  // Body parsing middleware
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true, limit: '10mb' }));

  // Rate limiting middleware (if enabled)
  if (settings.RATE_LIMIT_ENABLED) {
    app.use(rateLimitMiddleware(limiter, deps.rateLimitOptions));
  }

  // ============================================================================
  // Routes
  // ============================================================================

  app.get('/', (req: Request, res: Response) => {
    res.json({
      message: '🌱 Welcome to Plant Care API',
      version: APP_VERSION,
      docs: '/docs',
      health: '/health',
    });
  });

  app.use('/health', createHealthRouter(healthService));
  app.use('/api/v1', createApiV1Router(healthService, { debugRoutes: settings.DEBUG }));

  // 404 Handler
  app.use(notFoundHandler);

  // ============================================================================
  // Error Handler (must be last)
  // ============================================================================

  app.use(errorHandler);

  return app;
};
