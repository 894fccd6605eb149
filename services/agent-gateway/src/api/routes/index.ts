import { Application, Request, Response } from 'express';
import { RateLimitPresets } from '../../middleware/rate-limiter.js';
import { createAccountAgentRoutes } from './account-agents.js';
import { createAdminRoutes } from './admin.js';
import { createHealthRoutes } from './health.js';
import { GatewayServices } from './types.js';

/**
 * Setup all API routes
 * @param app - Express application instance
 * @param urlPrefix - URL prefix for all routes
 * @param services - Gateway services
 */
export function setupRoutes(app: Application, urlPrefix: string, services: GatewayServices): void {
  console.log('[routes] Setting up API routes...');
  const chatLimiter = RateLimitPresets.chatPerInstance(services.appConfig.rate_limits.chat_per_minute);

  app.use(`${urlPrefix}/health`, createHealthRoutes(services));
  app.use(`${urlPrefix}/accounts`, createAccountAgentRoutes(services, chatLimiter));
  app.use(`${urlPrefix}/api/admin`, createAdminRoutes(services));

  // Root endpoint
  app.get(urlPrefix || '/', (req: Request, res: Response) => {
    res.json({
      service: 'agent-gateway',
      version: '1.0.0',
      status: 'running',
      endpoints: {
        health: `${urlPrefix}/health`,
        agents: `${urlPrefix}/accounts/{account}/agents`,
        admin: `${urlPrefix}/api/admin`,
      },
      timestamp: new Date().toISOString(),
    });
  });

  // 404 handler for undefined routes
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Not Found',
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      timestamp: new Date().toISOString(),
    });
  });

  console.log('[routes] All API routes configured');
}
