import cookieParser from 'cookie-parser';
import express, { Express } from 'express';
import { createAgentFactory } from './agents/agent-factory.js';
import { VectorSearchDependencies } from './agents/tools/vector-search.js';
import { setupRoutes } from './api/routes/index.js';
import { GatewayServices } from './api/routes/types.js';
import { LlmClient } from './clients/llm-client.js';
import { AppConfig } from './config/app-config.js';
import { ConfigCascade } from './config/cascade.js';
import { AdminCredentials } from './middleware/admin-auth.js';
import { RateLimitPresets } from './middleware/rate-limiter.js';
import { sessionMiddleware } from './middleware/session-middleware.js';
import { ErrorHandler } from './monitoring/error-handler.js';
import { HealthMonitor } from './monitoring/health-monitor.js';
import { ChatService } from './services/chat-service.js';
import { CostCalculator } from './services/cost-calculator.js';
import { ICache } from './services/instance-cache.js';
import { InstanceLoader } from './services/instance-loader.js';
import { LlmRequestTracker } from './services/llm-request-tracker.js';
import { MessageService } from './services/message-service.js';
import { PoolManager } from './services/pool-manager.js';
import { SessionService } from './services/session-service.js';
import { DataStore } from './store/types.js';

export interface GatewayDependencies {
  appConfig: AppConfig;
  store: DataStore;
  cache: ICache;
  llm: LlmClient;
  vectorSearch: VectorSearchDependencies | null;
  adminCredentials: AdminCredentials;
  costs?: CostCalculator;
  exposeErrorDetails?: boolean;
}

/**
 * Wires every service from its dependencies. Nothing here touches the
 * network; clients and stores arrive already constructed.
 */
export function createGatewayServices(deps: GatewayDependencies): GatewayServices {
  const { appConfig, store } = deps;
  const cascade = new ConfigCascade(appConfig, appConfig.agents.configs_directory);

  const loader = new InstanceLoader(store, {
    configsDirectory: appConfig.agents.configs_directory,
    cache: deps.cache,
    cacheTtlSeconds: appConfig.cache.ttl_seconds,
    availableAgents: appConfig.agents.available_agents,
  });

  const pools = new PoolManager(
    loader,
    createAgentFactory({ llm: deps.llm, cascade, chatConfig: appConfig.chat, vectorSearch: deps.vectorSearch }),
    { maxPools: appConfig.pools.max_pools, maxAgentsPerPool: appConfig.pools.max_agents_per_pool }
  );
  pools.initialize();

  const sessions = new SessionService(store.sessions, appConfig.session);
  const messages = new MessageService(store.messages);
  const tracker = new LlmRequestTracker(store.llmRequests);
  const costs = deps.costs ?? CostCalculator.fromFile(appConfig.pricing.fallback_pricing_file);

  const chat = new ChatService({
    pools,
    sessions,
    messages,
    tracker,
    costs,
    cascade,
    chatConfig: appConfig.chat,
  });

  return {
    appConfig,
    loader,
    pools,
    sessions,
    messages,
    tracker,
    chat,
    healthMonitor: new HealthMonitor(pools),
    errorHandler: new ErrorHandler({ exposeDetails: deps.exposeErrorDetails }),
    adminCredentials: deps.adminCredentials,
  };
}

export function createApp(services: GatewayServices, urlPrefix: string = ''): Express {
  const app = express();
  const globalRateLimiter = RateLimitPresets.moderate(services.appConfig.rate_limits.global_per_15_minutes);

  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));
  app.use(cookieParser());
  app.use(globalRateLimiter.middleware());
  app.use(
    sessionMiddleware(services.sessions, {
      excludedPrefixes: [`${urlPrefix}/health`, `${urlPrefix}/api/admin`],
    })
  );

  setupRoutes(app, urlPrefix, services);

  // Error handling middleware (must be last)
  app.use(services.errorHandler.middleware());
  return app;
}
