import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { isRecord } from '../utils/objects.js';
import { parseYamlMapping } from '../utils/yaml-files.js';

const SERVICE_CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../config');
export const DEFAULT_APP_CONFIG_PATH = path.join(SERVICE_CONFIG_DIR, 'app.yaml');

// Every leaf uses .catch() so a bad value degrades to its default instead of failing startup.
const llmSchema = z.object({
  provider: z.string().min(1).catch('openrouter'),
  model: z.string().min(1).catch('openai/gpt-oss-20b:free'),
  temperature: z.number().min(0).max(2).catch(0.3),
  max_tokens: z.number().int().positive().catch(1024),
  base_url: z.string().url().catch('https://openrouter.ai/api/v1'),
  timeout_ms: z.number().int().positive().catch(60000),
  max_retries: z.number().int().min(0).max(5).catch(2),
});

const chatSchema = z.object({
  history_limit: z.number().int().positive().catch(50),
  max_message_length: z.number().int().positive().catch(8000),
  max_tool_rounds: z.number().int().positive().catch(5),
});

const sessionSchema = z.object({
  cookie_name: z.string().min(1).catch('agent_session'),
  cookie_max_age: z.number().int().positive().catch(604800),
  cookie_secure: z.boolean().catch(false),
  cookie_httponly: z.boolean().catch(true),
  cookie_samesite: z.enum(['lax', 'strict', 'none']).catch('lax'),
  inactivity_minutes: z.number().int().positive().catch(1440),
});

const agentsSchema = z.object({
  configs_directory: z.string().min(1).catch('./agent_configs'),
  default_agent: z.string().min(1).catch('simple_chat'),
  available_agents: z.array(z.string().min(1)).min(1).catch(['simple_chat']),
});

const poolsSchema = z.object({
  max_pools: z.number().int().positive().catch(10),
  max_agents_per_pool: z.number().int().positive().catch(500),
});

const cacheSchema = z.object({
  ttl_seconds: z.number().int().positive().catch(300),
});

const pricingSchema = z.object({
  fallback_pricing_file: z.string().min(1).catch('./fallback_pricing.yaml'),
});

const vectorSchema = z.object({
  embedding_model: z.string().min(1).catch('text-embedding-3-small'),
  embedding_base_url: z.string().url().catch('https://api.openai.com/v1'),
  index_name: z.string().min(1).catch('agent-gateway'),
});

const rateLimitSchema = z.object({
  global_per_15_minutes: z.number().int().positive().catch(1000),
  chat_per_minute: z.number().int().positive().catch(30),
});

export const appConfigSchema = z.object({
  llm: llmSchema.default({}),
  chat: chatSchema.default({}),
  session: sessionSchema.default({}),
  agents: agentsSchema.default({}),
  pools: poolsSchema.default({}),
  cache: cacheSchema.default({}),
  pricing: pricingSchema.default({}),
  vector: vectorSchema.default({}),
  rate_limits: rateLimitSchema.default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

export interface GatewayEnvironment {
  port: number;
  urlPrefix: string;
  nodeEnv: string;
  storeDriver: 'postgres' | 'memory';
  databaseUrl: string | null;
  redisUrl: string | null;
  openrouterApiKey: string | null;
  embeddingApiKey: string | null;
  pineconeApiKey: string | null;
  adminUsername: string;
  adminPassword: string;
  usingDefaultAdminCredentials: boolean;
  /** Create missing accounts and instances from the agent configs directory at startup. */
  seedFromConfigs: boolean;
  migrationsDir: string | null;
}

function readYamlDocument(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) {
    console.warn(`[app-config] ${filePath} not found, using built-in defaults`);
    return {};
  }
  return parseYamlMapping(fs.readFileSync(filePath, 'utf-8'), filePath);
}

function applyEnvOverrides(document: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const current = document['llm'];
  const llm: Record<string, unknown> = isRecord(current) ? { ...current } : {};

  if (env['LLM_MODEL']) llm['model'] = env['LLM_MODEL'];
  if (env['LLM_TEMPERATURE']) llm['temperature'] = Number(env['LLM_TEMPERATURE']);
  if (env['LLM_MAX_TOKENS']) llm['max_tokens'] = Number(env['LLM_MAX_TOKENS']);

  return { ...document, llm };
}

/**
 * Loads app.yaml, applies LLM_* environment overrides and validates the result.
 * Relative file paths inside the document are resolved against the YAML file's directory.
 */
export function loadAppConfig(
  filePath: string = DEFAULT_APP_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const document = applyEnvOverrides(readYamlDocument(filePath), env);
  const result = appConfigSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration in ${filePath}: ${result.error.message}`);
  }

  const baseDir = path.dirname(filePath);
  const config = result.data;
  return {
    ...config,
    agents: {
      ...config.agents,
      configs_directory: path.resolve(baseDir, config.agents.configs_directory),
    },
    pricing: {
      fallback_pricing_file: path.resolve(baseDir, config.pricing.fallback_pricing_file),
    },
  };
}

let cachedConfig: AppConfig | null = null;

export function getAppConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadAppConfig(process.env['APP_CONFIG_PATH'] || DEFAULT_APP_CONFIG_PATH);
  }
  return cachedConfig;
}

export function resetAppConfig(): void {
  cachedConfig = null;
}

export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): GatewayEnvironment {
  const storeDriver = env['STORE_DRIVER'] === 'memory' ? 'memory' : 'postgres';
  const databaseUrl = env['DATABASE_URL'] || null;
  if (storeDriver === 'postgres' && !databaseUrl) {
    throw new ConfigurationError('DATABASE_URL is required unless STORE_DRIVER=memory');
  }

  const adminUsername = env['ADMIN_USERNAME'] || 'admin';
  const adminPassword = env['ADMIN_PASSWORD'] || 'changeme';

  return {
    port: parseInt(env['PORT'] || '5001', 10),
    urlPrefix: env['URL_PREFIX'] || '',
    nodeEnv: env['NODE_ENV'] || 'development',
    storeDriver,
    databaseUrl,
    redisUrl: env['REDIS_URL'] || null,
    openrouterApiKey: env['OPENROUTER_API_KEY'] || null,
    embeddingApiKey: env['EMBEDDING_API_KEY'] || null,
    pineconeApiKey: env['PINECONE_API_KEY'] || null,
    adminUsername,
    adminPassword,
    usingDefaultAdminCredentials: !env['ADMIN_USERNAME'] || !env['ADMIN_PASSWORD'],
    seedFromConfigs: env['SEED_FROM_CONFIGS'] ? env['SEED_FROM_CONFIGS'] === 'true' : storeDriver === 'memory',
    migrationsDir: env['MIGRATIONS_DIR'] || null,
  };
}
