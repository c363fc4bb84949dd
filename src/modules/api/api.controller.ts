/**
 * API v1 Controller
 * Directory and health endpoints for the versioned API
 */

import { Request, Response } from 'express';
import { API_VERSION, APP_VERSION } from '../../config/constants';
import { asyncHandler } from '../../middleware/error-handler';
import { HealthService } from '../health/health.service';

export const BASE = `/api/${API_VERSION}`;

export interface RouteInfo {
  path: string;
  methods: string[];
  name: string;
  tags: string[];
}

// Endpoint groups reserved for the plant-care domain modules
const PLANNED_ENDPOINTS = [
  'auth',
  'users',
  'plants',
  'care',
  'plant-health',
  'growth',
  'community',
  'ai',
  'weather',
  'analytics',
  'notifications',
  'payments',
  'content',
  'admin',
] as const;

export class ApiController {
  constructor(
    private readonly healthService: HealthService,
    private readonly routes: readonly RouteInfo[] = []
  ) {}

  /**
   * GET /api/v1
   */
  getIndex = (req: Request, res: Response): void => {
    res.json({
      message: '🌱 Plant Care API v1',
      version: APP_VERSION,
      api_version: API_VERSION,
      health: `${BASE}/health`,
      endpoints: Object.fromEntries(PLANNED_ENDPOINTS.map(name => [name, `${BASE}/${name}`])),
    });
  };

  /**
   * GET /api/v1/health
   */
  getHealth = asyncHandler(async (req: Request, res: Response) => {
    const dependencies = await this.healthService.checkDependencies();
    const healthy = dependencies.redis === 'healthy';

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      version: APP_VERSION,
      api_version: API_VERSION,
      dependencies,
    });
  });

  /**
   * GET /api/v1/debug/routes
   * Registered v1 routes (development only)
   */
  listRoutes = (req: Request, res: Response): void => {
    res.json({
      total_routes: this.routes.length,
      routes: this.routes,
    });
  };
}
