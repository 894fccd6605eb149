import {
  Account,
  AccountStatus,
  AgentInstanceRecord,
  InstanceStatus,
  JsonObject,
  LlmRequestRecord,
  MessageRecord,
  MessageRole,
  Session,
  SessionContext,
} from '../types/index.js';

export interface NewAccount {
  slug: string;
  name: string;
  status?: AccountStatus;
}

export interface NewAgentInstance {
  accountId: string;
  instanceSlug: string;
  agentType: string;
  displayName: string;
  status?: InstanceStatus;
}

export interface NewSession {
  sessionKey: string;
  email: string | null;
  isAnonymous: boolean;
  meta: JsonObject;
}

export interface NewMessage {
  id: string;
  sessionId: string;
  role: MessageRole;
  content: string;
  agentInstanceId: string | null;
  llmRequestId: string | null;
  meta: JsonObject;
}

export type NewLlmRequest = Omit<LlmRequestRecord, 'createdAt'>;

export interface SessionListFilter {
  accountSlug?: string;
  agentInstanceSlug?: string;
  limit: number;
  offset: number;
}

export interface SessionListItem extends Session {
  messageCount: number;
}

export interface PageOptions {
  limit: number;
  offset: number;
}

export interface DateRange {
  from?: Date;
  to?: Date;
}

export interface CostSummaryRow {
  agentInstanceSlug: string | null;
  model: string;
  requestCount: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  totalCost: number;
}

export interface AccountRepository {
  findBySlug(slug: string): Promise<Account | null>;
  create(input: NewAccount): Promise<Account>;
}

export interface AgentInstanceRepository {
  findBySlug(accountId: string, instanceSlug: string): Promise<AgentInstanceRecord | null>;
  /** Active instances of an account, oldest first. */
  listActive(accountId: string): Promise<AgentInstanceRecord[]>;
  touchLastUsed(id: string, at: Date): Promise<void>;
  create(input: NewAgentInstance): Promise<AgentInstanceRecord>;
}

export interface SessionRepository {
  /** Rejects with DuplicateKeyError when the session key is taken. */
  create(input: NewSession): Promise<Session>;
  findByKey(sessionKey: string): Promise<Session | null>;
  findById(id: string): Promise<Session | null>;
  updateContext(id: string, context: SessionContext, at: Date): Promise<Session | null>;
  touch(id: string, at: Date): Promise<void>;
  updateEmail(id: string, email: string, at: Date): Promise<Session | null>;
  /** Newest first. */
  list(filter: SessionListFilter): Promise<{ sessions: SessionListItem[]; total: number }>;
}

export interface MessageRepository {
  insert(input: NewMessage): Promise<MessageRecord>;
  /** Oldest first. */
  listBySession(sessionId: string, page: PageOptions): Promise<MessageRecord[]>;
  /** The latest `limit` messages with one of `roles`, returned oldest first. */
  listRecent(sessionId: string, limit: number, roles: MessageRole[]): Promise<MessageRecord[]>;
  countBySession(sessionId: string): Promise<number>;
}

export interface LlmRequestRepository {
  insert(input: NewLlmRequest): Promise<LlmRequestRecord>;
  findById(id: string): Promise<LlmRequestRecord | null>;
  summarizeCosts(accountSlug: string, range: DateRange): Promise<CostSummaryRow[]>;
}

export interface DataStore {
  accounts: AccountRepository;
  instances: AgentInstanceRepository;
  sessions: SessionRepository;
  messages: MessageRepository;
  llmRequests: LlmRequestRepository;
  close(): Promise<void>;
}
