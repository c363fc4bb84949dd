/**
 * Health Controller
 * HTTP request/response handling for health endpoints
 */

import { Request, Response } from 'express';
import { asyncHandler } from '../../middleware/error-handler';
import { HealthService } from './health.service';

export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  /**
   * GET /health
   * Liveness check for container monitoring
   */
  getHealth = (req: Request, res: Response): void => {
    res.json(this.healthService.basic());
  };

  /**
   * GET /health/detailed
   * Health including dependencies; 503 when any dependency is down
   */
  getDetailedHealth = asyncHandler(async (req: Request, res: Response) => {
    const report = await this.healthService.detailed();
    res.status(report.status === 'healthy' ? 200 : 503).json(report);
  });
}
