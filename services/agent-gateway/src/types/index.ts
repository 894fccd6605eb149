export type JsonObject = Record<string, unknown>;

// Tenancy Types
export type AccountStatus = 'active' | 'suspended';
export type InstanceStatus = 'active' | 'inactive';

export interface Account {
  id: string;
  slug: string;
  name: string;
  status: AccountStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface AgentInstanceRecord {
  id: string;
  accountId: string;
  instanceSlug: string;
  agentType: string;
  displayName: string;
  status: InstanceStatus;
  lastUsedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/** A fully loaded instance: database row plus the documents read from the configs directory. */
export interface AgentInstance {
  id: string;
  accountId: string;
  accountSlug: string;
  instanceSlug: string;
  agentType: string;
  displayName: string;
  status: InstanceStatus;
  lastUsedAt: Date | null;
  config: JsonObject;
  accountConfig: JsonObject | null;
  systemPrompt: string | null;
  configFingerprint: string;
}

export interface InstanceSummary {
  id: string;
  instanceSlug: string;
  agentType: string;
  displayName: string;
  status: InstanceStatus;
  lastUsedAt: string | null;
}

export interface InstanceMetadata extends InstanceSummary {
  accountId: string;
  accountSlug: string;
  createdAt: string;
  updatedAt: string;
}

// Session Types
export interface Session {
  id: string;
  sessionKey: string;
  email: string | null;
  isAnonymous: boolean;
  accountId: string | null;
  accountSlug: string | null;
  agentInstanceId: string | null;
  agentInstanceSlug: string | null;
  createdAt: Date;
  lastActivityAt: Date;
  updatedAt: Date;
  meta: JsonObject;
}

export interface SessionContext {
  accountId: string;
  accountSlug: string;
  agentInstanceId: string;
  agentInstanceSlug: string;
}

export interface CookieConfig {
  name: string;
  maxAgeMs: number;
  secure: boolean;
  httpOnly: boolean;
  sameSite: 'lax' | 'strict' | 'none';
}

// Message Types
export type MessageRole = 'user' | 'assistant' | 'system' | 'tool';

export interface MessageRecord {
  id: string;
  sessionId: string;
  agentInstanceId: string | null;
  llmRequestId: string | null;
  role: MessageRole;
  content: string;
  meta: JsonObject;
  createdAt: Date;
}

// LLM Types
export interface ToolCall {
  id: string;
  name: string;
  arguments: string;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string | null;
  toolCalls?: ToolCall[];
  toolCallId?: string;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: JsonObject;
}

export interface ModelSettings {
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/** Cost as reported by the provider itself (OpenRouter `usage.cost`). */
export interface ProviderCost {
  totalCost: number;
  promptCost?: number;
  completionCost?: number;
}

export type CostMethod = 'provider' | 'fallback_pricing' | 'unpriced';

export interface CostBreakdown {
  promptCost: number;
  completionCost: number;
  totalCost: number;
  method: CostMethod;
}

export type CompletionStatus = 'complete' | 'partial' | 'error';

export interface LlmRequestRecord {
  id: string;
  sessionId: string;
  agentInstanceId: string | null;
  accountId: string | null;
  accountSlug: string | null;
  agentInstanceSlug: string | null;
  agentType: string | null;
  provider: string;
  model: string;
  requestBody: JsonObject;
  responseBody: JsonObject;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  promptCost: number;
  completionCost: number;
  totalCost: number;
  costMethod: CostMethod;
  latencyMs: number;
  completionStatus: CompletionStatus;
  createdAt: Date;
}

// Pool Types
export interface PoolMetrics {
  poolId: string;
  isInitialized: boolean;
  agentCount: number;
  maxAgents: number;
  messageCount: number;
  responseTime: number; // average response time per pool
  errorCount: number;
  rebuilds: number;
}

export interface SystemMetrics {
  totalPools: number;
  totalAgents: number;
  totalMessages: number;
  totalErrors: number;
  averageResponseTime: number; // average across pools
  pools: PoolMetrics[];
}
