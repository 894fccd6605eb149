import { Router, Request, Response } from 'express';
import { GatewayServices } from './types.js';

/**
 * Create health check routes
 * @param services - Gateway services
 * @returns Express router with health endpoints
 */
export function createHealthRoutes(services: GatewayServices): Router {
  const router = Router();

  /**
   * Detailed health report
   */
  router.get('/', (req: Request, res: Response): void => {
    const health = services.healthMonitor.getHealthMetrics();
    const status = services.pools.getStatus();

    res.status(health.status === 'unhealthy' ? 503 : 200).json({
      status: health.status,
      service: 'agent-gateway',
      version: '1.0.0',
      timestamp: health.timestamp,
      uptime: health.uptime,
      memory: services.healthMonitor.getMemoryUsageMB(),
      performance: health.performance,
      problems: health.problems,
      poolManager: {
        isInitialized: status.isInitialized,
        activePools: status.activePools,
        maxPools: status.maxPools,
        maxAgentsPerPool: status.maxAgentsPerPool,
        totalAgents: status.systemMetrics.totalAgents,
      },
      errors: services.errorHandler.getErrorStats(),
      recommendations: services.healthMonitor.getResourceRecommendations(),
    });
  });

  /**
   * Readiness check endpoint
   */
  router.get('/ready', (req: Request, res: Response): void => {
    if (services.healthMonitor.isReady()) {
      res.json({ status: 'ready', message: 'Service is ready to accept requests', timestamp: new Date().toISOString() });
    } else {
      res.status(503).json({
        status: 'not_ready',
        message: 'Service is not ready to accept requests',
        timestamp: new Date().toISOString(),
      });
    }
  });

  /**
   * Liveness check endpoint
   */
  router.get('/live', (req: Request, res: Response): void => {
    res.json({ status: 'alive', timestamp: new Date().toISOString(), uptime: process.uptime() });
  });

  return router;
}
