import { Router } from 'express';
import { config } from '../config';
import { GeneQueryService } from '../services/query-service';
import { logger } from '../utils/logger';
import { HealthCheckResponse } from '../types';

export function createHealthRouter(queryService: GeneQueryService): Router {
  const router = Router();

  /**
   * GET /health
   * Health check endpoint
   */
  router.get('/', async (_req, res) => {
    const health: HealthCheckResponse = {
      status: 'healthy',
      records: 0,
      version: config.api.version,
      timestamp: Date.now(),
    };

    try {
      health.records = await queryService.countGenes();
    } catch (error) {
      logger.error('Health check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      health.status = 'degraded';
    }

    res.status(health.status === 'healthy' ? 200 : 503).json(health);
  });

  return router;
}

export default createHealthRouter;
