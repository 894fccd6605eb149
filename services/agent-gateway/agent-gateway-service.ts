import dotenv from 'dotenv';
import type { Server } from 'http';
import { createApp, createGatewayServices } from './src/app.js';
import { VectorSearchDependencies } from './src/agents/tools/vector-search.js';
import { EmbeddingClient } from './src/clients/embedding-client.js';
import { OpenRouterClient } from './src/clients/openrouter-client.js';
import { PineconeVectorStore } from './src/clients/vector-store.js';
import { AppConfig, GatewayEnvironment, getAppConfig, loadEnvironment } from './src/config/app-config.js';
import { createDatabase } from './src/db/database.js';
import { runMigrations } from './src/db/run-migration.js';
import { GracefulShutdown } from './src/monitoring/graceful-shutdown.js';
import { createCache } from './src/services/instance-cache.js';
import { DrizzleDataStore } from './src/store/drizzle-store.js';
import { InMemoryDataStore } from './src/store/memory-store.js';
import { seedFromConfigDirectory } from './src/store/seed.js';
import { DataStore } from './src/store/types.js';

dotenv.config();

async function openStore(env: GatewayEnvironment): Promise<DataStore> {
  if (env.storeDriver === 'memory' || !env.databaseUrl) {
    console.log('⚡ Using in-memory store (data is lost on restart)');
    return new InMemoryDataStore();
  }

  const handle = createDatabase({ connectionString: env.databaseUrl });
  const applied = await runMigrations(handle.pool, env.migrationsDir ?? undefined);
  console.log(`✅ PostgreSQL ready (${applied.length} new migration(s))`);
  return new DrizzleDataStore(handle);
}

function vectorSearchDependencies(env: GatewayEnvironment, config: AppConfig): VectorSearchDependencies | null {
  if (!env.pineconeApiKey || !env.embeddingApiKey) {
    console.log('ℹ️  Vector search disabled (PINECONE_API_KEY and EMBEDDING_API_KEY are both required)');
    return null;
  }
  return {
    embedder: new EmbeddingClient({
      apiKey: env.embeddingApiKey,
      baseUrl: config.vector.embedding_base_url,
      model: config.vector.embedding_model,
    }),
    vectorStore: new PineconeVectorStore(env.pineconeApiKey, config.vector.index_name),
  };
}

// Initialize the service
async function startService(): Promise<void> {
  const env = loadEnvironment();
  const appConfig = getAppConfig();

  console.log('🚀 Starting Agent Gateway...');
  console.log(`Environment: ${env.nodeEnv}`);
  console.log(`Port: ${env.port}`);
  console.log(`URL Prefix: ${env.urlPrefix || '(none)'}`);
  console.log(`Default model: ${appConfig.llm.model}`);

  if (env.usingDefaultAdminCredentials) {
    console.warn('⚠️  ADMIN_USERNAME / ADMIN_PASSWORD not set; admin API is using the default credentials');
  }
  if (!env.openrouterApiKey) {
    console.warn('⚠️  OPENROUTER_API_KEY not set; chat requests will fail until it is configured');
  }

  const store = await openStore(env);
  if (env.seedFromConfigs) {
    await seedFromConfigDirectory(store, appConfig.agents.configs_directory, appConfig.agents.default_agent);
  }
  const cache = await createCache(env.redisUrl);

  const llm = new OpenRouterClient({
    apiKey: env.openrouterApiKey,
    baseUrl: appConfig.llm.base_url,
    timeoutMs: appConfig.llm.timeout_ms,
    maxRetries: appConfig.llm.max_retries,
  });

  const services = createGatewayServices({
    appConfig,
    store,
    cache,
    llm,
    vectorSearch: vectorSearchDependencies(env, appConfig),
    adminCredentials: { username: env.adminUsername, password: env.adminPassword },
    exposeErrorDetails: env.nodeEnv === 'development',
  });
  const app = createApp(services, env.urlPrefix);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(env.port, () => resolve(listening));
    listening.once('error', reject);
  });
  console.log('🌐 Agent Gateway running on port', env.port);
  console.log(`📡 API endpoints available at: http://localhost:${env.port}${env.urlPrefix}/accounts/{account}/agents`);
  console.log(`🔍 Health check available at: http://localhost:${env.port}${env.urlPrefix}/health`);

  const gracefulShutdown = new GracefulShutdown({
    timeout: parseInt(process.env['SHUTDOWN_TIMEOUT_MS'] || '30000', 10),
    forceExit: process.env['FORCE_EXIT_ON_SHUTDOWN'] !== 'false',
  });
  gracefulShutdown.addCleanupTask(
    '🛑 Closing HTTP server',
    () => new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())))
  );
  gracefulShutdown.addCleanupTask('🧹 Shutting down agent pools', async () => services.pools.shutdown());
  gracefulShutdown.addCleanupTask('🧹 Closing cache', () => cache.close());
  gracefulShutdown.addCleanupTask('🧹 Closing data store', () => store.close());
  gracefulShutdown.setupSignalHandlers();

  console.log(`💚 Initial health status: ${services.healthMonitor.getHealthMetrics().status}`);
  console.log('🎉 Agent Gateway started successfully!');
}

startService().catch((error: unknown) => {
  console.error('💥 Failed to start service:', error);
  process.exit(1);
});
