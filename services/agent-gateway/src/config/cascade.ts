import path from 'path';
import { errorMessage } from '../errors/index.js';
import { JsonObject, ModelSettings } from '../types/index.js';
import { getNestedValue } from '../utils/objects.js';
import { readYamlMapping } from '../utils/yaml-files.js';
import { AppConfig } from './app-config.js';
import { CascadeAttempt, CascadeAuditTrail, CascadeSource } from './cascade-audit.js';
import {
  CascadeValue,
  HISTORY_LIMIT_SPEC,
  MODEL_PARAMETER_SPECS,
  ParameterSpec,
  ParameterSpecMap,
  TOOL_PARAMETER_SPECS,
  ToolName,
} from './config-specs.js';

export { getNestedValue };

export interface CascadeContext {
  agentType: string;
  accountSlug?: string;
  instanceSlug?: string;
  /** Pre-loaded instance document; `null` means known to be absent. */
  instanceConfig?: JsonObject | null;
  /** Pre-loaded account document; `null` means known to be absent. */
  accountConfig?: JsonObject | null;
}

export interface CascadeResult<T extends CascadeValue> {
  value: T;
  source: CascadeSource;
  /** Every source consulted, in order, the winning one last. */
  attempts: CascadeAttempt[];
  audit: CascadeAuditTrail;
}

export interface VectorSearchConfig {
  enabled: boolean;
  maxResults: number;
  similarityThreshold: number;
  namespaceIsolation: boolean;
  indexName: string;
  /** Explicit namespace, or DEFAULT_VECTOR_NAMESPACE when none is configured. */
  namespace: string;
}

interface LoadedDocument {
  path: string | null;
  document: JsonObject | null;
  error?: string;
}

interface LoadedDocuments {
  instance: LoadedDocument;
  account: LoadedDocument;
}

/**
 * Path of an agent's config.yaml. Instance-aware when both slugs are given,
 * otherwise the legacy per-agent-type location.
 */
export function resolveConfigPath(
  configsDirectory: string,
  agentType: string,
  accountSlug?: string,
  instanceSlug?: string
): string {
  if (accountSlug && instanceSlug) {
    return path.join(configsDirectory, accountSlug, instanceSlug, 'config.yaml');
  }
  return path.join(configsDirectory, agentType, 'config.yaml');
}

export function resolveAccountConfigPath(configsDirectory: string, accountSlug: string): string {
  return path.join(configsDirectory, accountSlug, 'account.yaml');
}

function isSameKind<T extends CascadeValue>(value: unknown, fallback: T): value is T {
  if (typeof fallback === 'number') {
    return typeof value === 'number' && Number.isFinite(value);
  }
  return typeof value === typeof fallback;
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Resolves agent parameters through instance config → account config →
 * app.yaml → hardcoded fallback, keeping an audit trail of every lookup.
 */
export class ConfigCascade {
  private readonly appConfig: AppConfig;
  private readonly configsDirectory: string;

  constructor(appConfig: AppConfig, configsDirectory?: string) {
    this.appConfig = appConfig;
    this.configsDirectory = configsDirectory ?? appConfig.agents.configs_directory;
  }

  async getAgentParameter<T extends CascadeValue>(
    ctx: CascadeContext,
    parameterName: string,
    spec: ParameterSpec<T>
  ): Promise<CascadeResult<T>> {
    const documents = await this.loadDocuments(ctx);
    return this.resolveWith(documents, ctx, parameterName, spec);
  }

  /**
   * Resolves a map of specs against one load of the documents. A spec whose
   * resolution throws yields its fallback.
   */
  async cascadeParameters(ctx: CascadeContext, specs: ParameterSpecMap): Promise<Record<string, CascadeValue>> {
    const documents = await this.loadDocuments(ctx);
    const resolved: Record<string, CascadeValue> = {};
    for (const [name, spec] of Object.entries(specs)) {
      resolved[name] = this.resolveOrFallback(documents, ctx, name, spec);
    }
    return resolved;
  }

  async getModelSettings(ctx: CascadeContext): Promise<ModelSettings> {
    const documents = await this.loadDocuments(ctx);
    return {
      model: this.resolveOrFallback(documents, ctx, 'model', MODEL_PARAMETER_SPECS.model),
      temperature: this.resolveOrFallback(documents, ctx, 'temperature', MODEL_PARAMETER_SPECS.temperature),
      maxTokens: this.resolveOrFallback(documents, ctx, 'max_tokens', MODEL_PARAMETER_SPECS.max_tokens),
    };
  }

  async getToolConfig(ctx: CascadeContext, toolName: ToolName): Promise<Record<string, CascadeValue>> {
    return this.cascadeParameters(ctx, TOOL_PARAMETER_SPECS[toolName]);
  }

  async getVectorSearchConfig(ctx: CascadeContext): Promise<VectorSearchConfig> {
    const documents = await this.loadDocuments(ctx);
    const specs = TOOL_PARAMETER_SPECS.vector_search;
    return {
      enabled: this.resolveOrFallback(documents, ctx, 'vector_search.enabled', specs.enabled),
      maxResults: this.resolveOrFallback(documents, ctx, 'vector_search.max_results', specs.max_results),
      similarityThreshold: this.resolveOrFallback(
        documents,
        ctx,
        'vector_search.similarity_threshold',
        specs.similarity_threshold
      ),
      namespaceIsolation: this.resolveOrFallback(
        documents,
        ctx,
        'vector_search.namespace_isolation',
        specs.namespace_isolation
      ),
      indexName: this.resolveOrFallback(documents, ctx, 'vector_search.pinecone.index_name', specs.index_name),
      namespace: this.resolveOrFallback(documents, ctx, 'vector_search.pinecone.namespace', specs.namespace),
    };
  }

  async getHistoryLimit(ctx: CascadeContext): Promise<number> {
    const result = await this.getAgentParameter(ctx, 'history_limit', HISTORY_LIMIT_SPEC);
    return result.value;
  }

  private resolveOrFallback<T extends CascadeValue>(
    documents: LoadedDocuments,
    ctx: CascadeContext,
    parameterName: string,
    spec: ParameterSpec<T>
  ): T {
    try {
      return this.resolveWith(documents, ctx, parameterName, spec).value;
    } catch (error) {
      console.error(`[cascade] Failed to resolve ${parameterName}, using fallback:`, errorMessage(error));
      return spec.fallback;
    }
  }

  private resolveWith<T extends CascadeValue>(
    documents: LoadedDocuments,
    ctx: CascadeContext,
    parameterName: string,
    spec: ParameterSpec<T>
  ): CascadeResult<T> {
    const audit = new CascadeAuditTrail(parameterName, ctx.agentType, ctx.accountSlug, ctx.instanceSlug);

    const sources: Array<[CascadeSource, LoadedDocument, string]> = [
      ['instance_config', documents.instance, spec.agentPath],
      ['account_config', documents.account, spec.agentPath],
    ];
    if (spec.globalPath) {
      sources.push(['global_config', { path: 'app.yaml', document: this.appConfig }, spec.globalPath]);
    }

    for (const [source, loaded, dotPath] of sources) {
      const value = this.tryDocument(audit, source, loaded, dotPath, spec.fallback);
      if (value !== undefined) {
        audit.resolve(value, source);
        audit.log();
        return { value, source, attempts: audit.getAttempts(), audit };
      }
    }

    audit.recordAttempt({ source: 'hardcoded_fallback', path: null, found: true, value: spec.fallback });
    audit.resolve(spec.fallback, 'hardcoded_fallback');
    audit.log();
    return { value: spec.fallback, source: 'hardcoded_fallback', attempts: audit.getAttempts(), audit };
  }

  private tryDocument<T extends CascadeValue>(
    audit: CascadeAuditTrail,
    source: CascadeSource,
    loaded: LoadedDocument,
    dotPath: string,
    fallback: T
  ): T | undefined {
    const location = loaded.path ? `${loaded.path}#${dotPath}` : dotPath;

    if (!loaded.document) {
      audit.recordAttempt({ source, path: loaded.path, found: false, reason: loaded.error ?? 'document not loaded' });
      return undefined;
    }

    const value = getNestedValue(loaded.document, dotPath);
    if (value === undefined) {
      audit.recordAttempt({ source, path: location, found: false });
      return undefined;
    }

    if (!isSameKind(value, fallback)) {
      audit.recordAttempt({
        source,
        path: location,
        found: true,
        value,
        reason: `expected ${typeof fallback}, got ${describeValue(value)}`,
      });
      return undefined;
    }

    audit.recordAttempt({ source, path: location, found: true, value });
    return value;
  }

  private async loadDocuments(ctx: CascadeContext): Promise<LoadedDocuments> {
    const instancePath = resolveConfigPath(this.configsDirectory, ctx.agentType, ctx.accountSlug, ctx.instanceSlug);
    const instance: LoadedDocument =
      ctx.instanceConfig !== undefined
        ? { path: instancePath, document: ctx.instanceConfig, error: ctx.instanceConfig ? undefined : 'no instance config' }
        : await this.readDocument(instancePath);

    let account: LoadedDocument;
    if (ctx.accountConfig !== undefined) {
      account = {
        path: ctx.accountSlug ? resolveAccountConfigPath(this.configsDirectory, ctx.accountSlug) : null,
        document: ctx.accountConfig,
        error: ctx.accountConfig ? undefined : 'no account config',
      };
    } else if (ctx.accountSlug) {
      account = await this.readDocument(resolveAccountConfigPath(this.configsDirectory, ctx.accountSlug));
    } else {
      account = { path: null, document: null, error: 'no account context' };
    }

    return { instance, account };
  }

  private async readDocument(filePath: string): Promise<LoadedDocument> {
    try {
      const document = await readYamlMapping(filePath);
      return document ? { path: filePath, document } : { path: filePath, document: null, error: 'file not found' };
    } catch (error) {
      return { path: filePath, document: null, error: errorMessage(error) };
    }
  }
}
