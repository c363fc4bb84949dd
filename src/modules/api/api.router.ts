/**
 * API v1 Router
 * Route definitions mounted under /api/v1
 */

import { RequestHandler, Router } from 'express';
import { HealthService } from '../health/health.service';
import { ApiController, BASE, RouteInfo } from './api.controller';

export interface ApiV1RouterOptions {
  debugRoutes?: boolean;            // Mount GET /debug/routes
}

export function createApiV1Router(healthService: HealthService, options: ApiV1RouterOptions = {}): Router {
  const router = Router();
  const routes: RouteInfo[] = [];
  const controller = new ApiController(healthService, routes);

  const get = (path: string, name: string, tag: string, handler: RequestHandler): void => {
    router.get(path, handler);
    routes.push({ path: path === '/' ? BASE : `${BASE}${path}`, methods: ['GET'], name, tags: [tag] });
  };

  /**
   * @route   GET /api/v1
   * @desc    API directory
   * @access  Public
   */
  get('/', 'api_v1_root', 'Root', controller.getIndex);

  /**
   * @route   GET /api/v1/health
   * @desc    API health including dependencies
   * @access  Public
   */
  get('/health', 'api_health_check', 'Health', controller.getHealth);

  /**
   * @route   GET /api/v1/debug/routes
   * @desc    List registered v1 routes
   * @access  Development only
   */
  if (options.debugRoutes) {
    get('/debug/routes', 'list_routes', 'Development', controller.listRoutes);
  }

  return router;
}
