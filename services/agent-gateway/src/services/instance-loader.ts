import { createHash } from 'crypto';
import { promises as fsp } from 'fs';
import path from 'path';
import { z } from 'zod';
import { resolveAccountConfigPath, resolveConfigPath } from '../config/cascade.js';
import {
  AccountNotFoundError,
  ConfigurationError,
  InstanceInactiveError,
  InstanceNotFoundError,
  ValidationError,
} from '../errors/index.js';
import { DataStore } from '../store/types.js';
import {
  Account,
  AgentInstance,
  AgentInstanceRecord,
  InstanceMetadata,
  InstanceSummary,
  JsonObject,
} from '../types/index.js';
import { isMissingFileError, readYamlMapping } from '../utils/yaml-files.js';
import { ICache, instanceDocumentsKey } from './instance-cache.js';

const SLUG_PATTERN = /^[a-z0-9][a-z0-9_-]{0,99}$/;

const cachedDocumentsSchema = z.object({
  config: z.record(z.unknown()),
  accountConfig: z.record(z.unknown()).nullable(),
  systemPrompt: z.string().nullable(),
});

type InstanceDocuments = z.infer<typeof cachedDocumentsSchema>;

export interface InstanceLoaderOptions {
  configsDirectory: string;
  cache: ICache;
  cacheTtlSeconds?: number;
  /** Agent types this deployment can run; instances of other types fail to load. */
  availableAgents?: string[];
  now?: () => Date;
}

export function isValidSlug(slug: string): boolean {
  return SLUG_PATTERN.test(slug);
}

export function assertValidSlug(kind: 'account' | 'instance', slug: string): void {
  if (!isValidSlug(slug)) {
    throw new ValidationError(`Invalid ${kind} slug: ${JSON.stringify(slug)}`, { [kind]: slug });
  }
}

function toSummary(record: AgentInstanceRecord): InstanceSummary {
  return {
    id: record.id,
    instanceSlug: record.instanceSlug,
    agentType: record.agentType,
    displayName: record.displayName,
    status: record.status,
    lastUsedAt: record.lastUsedAt ? record.lastUsedAt.toISOString() : null,
  };
}

/**
 * Loads agent instances for an account: database status first, then the
 * config documents from `{configsDirectory}/{account}/{instance}/`.
 */
export class InstanceLoader {
  private readonly store: DataStore;
  private readonly configsDirectory: string;
  private readonly cache: ICache;
  private readonly cacheTtlSeconds: number;
  private readonly availableAgents: string[] | null;
  private readonly now: () => Date;

  constructor(store: DataStore, options: InstanceLoaderOptions) {
    this.store = store;
    this.configsDirectory = options.configsDirectory;
    this.cache = options.cache;
    this.cacheTtlSeconds = options.cacheTtlSeconds ?? 300;
    this.availableAgents = options.availableAgents ?? null;
    this.now = options.now ?? (() => new Date());
  }

  async loadAgentInstance(accountSlug: string, instanceSlug: string): Promise<AgentInstance> {
    const { account, record } = await this.findActiveInstance(accountSlug, instanceSlug);

    if (this.availableAgents && !this.availableAgents.includes(record.agentType)) {
      throw new ConfigurationError(`Agent type ${record.agentType} is not available`, {
        agentType: record.agentType,
        availableAgents: this.availableAgents,
      });
    }

    const documents = await this.getDocuments(accountSlug, instanceSlug, record.agentType);

    const lastUsedAt = this.now();
    await this.store.instances.touchLastUsed(record.id, lastUsedAt);

    return {
      id: record.id,
      accountId: account.id,
      accountSlug: account.slug,
      instanceSlug: record.instanceSlug,
      agentType: record.agentType,
      displayName: record.displayName,
      status: record.status,
      lastUsedAt,
      config: documents.config,
      accountConfig: documents.accountConfig,
      systemPrompt: documents.systemPrompt,
      configFingerprint: fingerprint(documents),
    };
  }

  async listAccountInstances(accountSlug: string): Promise<InstanceSummary[]> {
    assertValidSlug('account', accountSlug);
    const account = await this.store.accounts.findBySlug(accountSlug);
    if (!account) {
      throw new AccountNotFoundError(accountSlug);
    }
    const records = await this.store.instances.listActive(account.id);
    return records.map(toSummary);
  }

  async getInstanceMetadata(accountSlug: string, instanceSlug: string): Promise<InstanceMetadata> {
    const { account, record } = await this.findActiveInstance(accountSlug, instanceSlug);
    return {
      ...toSummary(record),
      accountId: account.id,
      accountSlug: account.slug,
      createdAt: record.createdAt.toISOString(),
      updatedAt: record.updatedAt.toISOString(),
    };
  }

  async invalidate(accountSlug: string, instanceSlug: string): Promise<void> {
    await this.cache.delete(instanceDocumentsKey(accountSlug, instanceSlug));
  }

  private async findActiveInstance(
    accountSlug: string,
    instanceSlug: string
  ): Promise<{ account: Account; record: AgentInstanceRecord }> {
    assertValidSlug('account', accountSlug);
    assertValidSlug('instance', instanceSlug);

    const account = await this.store.accounts.findBySlug(accountSlug);
    if (!account) {
      throw new AccountNotFoundError(accountSlug);
    }

    const record = await this.store.instances.findBySlug(account.id, instanceSlug);
    if (!record) {
      throw new InstanceNotFoundError(accountSlug, instanceSlug);
    }
    if (account.status !== 'active') {
      throw new InstanceInactiveError(accountSlug, instanceSlug, `account ${account.status}`);
    }
    if (record.status !== 'active') {
      throw new InstanceInactiveError(accountSlug, instanceSlug, record.status);
    }

    return { account, record };
  }

  private async getDocuments(accountSlug: string, instanceSlug: string, agentType: string): Promise<InstanceDocuments> {
    const key = instanceDocumentsKey(accountSlug, instanceSlug);
    const cached = cachedDocumentsSchema.safeParse(await this.cache.get(key));
    if (cached.success) {
      return cached.data;
    }

    const documents = await this.readDocuments(accountSlug, instanceSlug, agentType);
    await this.cache.set(key, documents, this.cacheTtlSeconds);
    return documents;
  }

  private async readDocuments(accountSlug: string, instanceSlug: string, agentType: string): Promise<InstanceDocuments> {
    const configPath = resolveConfigPath(this.configsDirectory, agentType, accountSlug, instanceSlug);
    const config = await readYamlMapping(configPath);
    if (!config) {
      throw new ConfigurationError(`Config file not found for ${accountSlug}/${instanceSlug}`, { configPath });
    }

    const systemPrompt = await readOptionalText(path.join(path.dirname(configPath), 'system_prompt.md'));
    const accountConfig = await readYamlMapping(resolveAccountConfigPath(this.configsDirectory, accountSlug));

    console.log(`[instance-loader] Loaded config for ${accountSlug}/${instanceSlug} (${agentType})`);
    return { config, accountConfig, systemPrompt };
  }
}

async function readOptionalText(filePath: string): Promise<string | null> {
  try {
    return await fsp.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
}

function fingerprint(documents: { config: JsonObject; accountConfig: JsonObject | null; systemPrompt: string | null }): string {
  return createHash('sha256').update(JSON.stringify(documents)).digest('hex').slice(0, 16);
}
