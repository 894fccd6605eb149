import { Express } from 'express';
import { Server } from 'http';
import path from 'path';
import { fileURLToPath } from 'url';
import { createGatewayServices } from '../src/app.js';
import { GatewayServices } from '../src/api/routes/types.js';
import { Embedder } from '../src/clients/embedding-client.js';
import { ChatCompletionRequest, ChatCompletionResult, LlmClient, LlmStreamEvent } from '../src/clients/llm-client.js';
import { InMemoryVectorStore } from '../src/clients/vector-store.js';
import { AppConfig, loadAppConfig } from '../src/config/app-config.js';
import { InMemoryCache } from '../src/services/instance-cache.js';
import { InMemoryDataStore } from '../src/store/memory-store.js';
import { seedFromConfigDirectory } from '../src/store/seed.js';
import { AgentInstance, ToolCall } from '../src/types/index.js';

export const FIXTURES_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures');
export const AGENT_CONFIGS_DIR = path.join(FIXTURES_DIR, 'agent_configs');

export const ADMIN_CREDENTIALS = { username: 'admin', password: 'test-secret' };

export function loadFixtureConfig(): AppConfig {
  return loadAppConfig(path.join(FIXTURES_DIR, 'app.yaml'), {});
}

type ScriptedResult = Omit<ChatCompletionResult, 'model'> & { model?: string };

type ScriptedStep =
  | { kind: 'result'; result: ScriptedResult; chunks: string[]; gate?: Promise<void> }
  | { kind: 'error'; error: Error; chunks: string[] };

export function reply(content: string, overrides: Partial<ScriptedResult> = {}): ScriptedResult {
  return {
    id: 'gen-1',
    content,
    toolCalls: [],
    finishReason: 'stop',
    usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    providerCost: null,
    ...overrides,
  };
}

/**
 * LlmClient stand-in that plays back queued completions in order and keeps
 * every request it was sent. A result without a model echoes the requested one.
 */
export class ScriptedLlmClient implements LlmClient {
  readonly provider = 'scripted';
  readonly requests: ChatCompletionRequest[] = [];
  private readonly steps: ScriptedStep[] = [];

  queueReply(content: string, overrides: Partial<ScriptedResult> = {}, chunks?: string[]): this {
    this.steps.push({ kind: 'result', result: reply(content, overrides), chunks: chunks ?? (content ? [content] : []) });
    return this;
  }

  /** Streams the first chunk, then holds the rest until `gate` settles. */
  queueGatedReply(content: string, chunks: string[], gate: Promise<void>): this {
    this.steps.push({ kind: 'result', result: reply(content), chunks, gate });
    return this;
  }

  queueToolCalls(toolCalls: ToolCall[], overrides: Partial<ScriptedResult> = {}): this {
    this.steps.push({ kind: 'result', result: reply('', { toolCalls, finishReason: 'tool_calls', ...overrides }), chunks: [] });
    return this;
  }

  queueError(error: Error, chunks: string[] = []): this {
    this.steps.push({ kind: 'error', error, chunks });
    return this;
  }

  get pending(): number {
    return this.steps.length;
  }

  async complete(request: ChatCompletionRequest): Promise<ChatCompletionResult> {
    const step = this.next(request);
    if (step.kind === 'error') {
      throw step.error;
    }
    return { ...step.result, model: step.result.model ?? request.model };
  }

  async *stream(request: ChatCompletionRequest): AsyncGenerator<LlmStreamEvent> {
    const step = this.next(request);
    for (const [index, content] of step.chunks.entries()) {
      if (index === 1 && step.kind === 'result' && step.gate) {
        await step.gate;
      }
      yield { type: 'delta', content };
    }
    if (step.kind === 'error') {
      throw step.error;
    }
    yield { type: 'complete', result: { ...step.result, model: step.result.model ?? request.model } };
  }

  private next(request: ChatCompletionRequest): ScriptedStep {
    this.requests.push(request);
    const step = this.steps.shift();
    if (!step) {
      throw new Error('ScriptedLlmClient has no scripted response left');
    }
    return step;
  }
}

/** Returns one fixed vector for every text and remembers what it embedded. */
export class StaticEmbedder implements Embedder {
  readonly texts: string[] = [];

  constructor(private readonly vector: number[] = [1, 0]) {}

  async embed(text: string): Promise<number[]> {
    this.texts.push(text);
    return [...this.vector];
  }
}

export function makeInstance(overrides: Partial<AgentInstance> = {}): AgentInstance {
  return {
    id: 'instance-1',
    accountId: 'account-1',
    accountSlug: 'acme',
    instanceSlug: 'support',
    agentType: 'simple_chat',
    displayName: 'Acme Support',
    status: 'active',
    lastUsedAt: null,
    config: {},
    accountConfig: null,
    systemPrompt: null,
    configFingerprint: 'fingerprint-1',
    ...overrides,
  };
}

export interface GatewayHarness {
  appConfig: AppConfig;
  store: InMemoryDataStore;
  cache: InMemoryCache;
  llm: ScriptedLlmClient;
  embedder: StaticEmbedder;
  vectorStore: InMemoryVectorStore;
  services: GatewayServices;
}

/**
 * Gateway services over the fixture configs and an in-memory store seeded
 * from them. Vector search is wired unless `vectorSearch` is false.
 */
export async function createHarness(options: { vectorSearch?: boolean } = {}): Promise<GatewayHarness> {
  const appConfig = loadFixtureConfig();
  const store = new InMemoryDataStore();
  await seedFromConfigDirectory(store, appConfig.agents.configs_directory, appConfig.agents.default_agent);

  const cache = new InMemoryCache();
  const llm = new ScriptedLlmClient();
  const embedder = new StaticEmbedder();
  const vectorStore = new InMemoryVectorStore();

  const services = createGatewayServices({
    appConfig,
    store,
    cache,
    llm,
    vectorSearch: options.vectorSearch === false ? null : { embedder, vectorStore },
    adminCredentials: ADMIN_CREDENTIALS,
    exposeErrorDetails: false,
  });

  return { appConfig, store, cache, llm, embedder, vectorStore, services };
}

export interface RunningServer {
  baseUrl: string;
  close(): Promise<void>;
}

/** Listens on an ephemeral loopback port. */
export async function startServer(app: Express): Promise<RunningServer> {
  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    listening.once('error', reject);
  });

  const address = server.address();
  if (!address || typeof address === 'string') {
    server.close();
    throw new Error('Test server did not bind to a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close(error => (error ? reject(error) : resolve()));
      }),
  };
}
