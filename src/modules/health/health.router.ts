/**
 * Health Router
 * Route definitions for health endpoints
 */

import { Router } from 'express';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

export function createHealthRouter(healthService: HealthService): Router {
  const router = Router();
  const controller = new HealthController(healthService);

  /**
   * @route   GET /health
   * @desc    Basic health check
   * @access  Public (exempt from rate limiting)
   */
  router.get('/', controller.getHealth);

  /**
   * @route   GET /health/detailed
   * @desc    Health check including Redis and rate limiter state
   * @access  Public (exempt from rate limiting)
   */
  router.get('/detailed', controller.getDetailedHealth);

  return router;
}
