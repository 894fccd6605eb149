import { v4 as uuidv4 } from 'uuid';
import { DuplicateKeyError } from '../errors/index.js';
import {
  Account,
  AgentInstanceRecord,
  LlmRequestRecord,
  MessageRecord,
  MessageRole,
  Session,
  SessionContext,
} from '../types/index.js';
import {
  AccountRepository,
  AgentInstanceRepository,
  CostSummaryRow,
  DataStore,
  DateRange,
  LlmRequestRepository,
  MessageRepository,
  NewAccount,
  NewAgentInstance,
  NewLlmRequest,
  NewMessage,
  NewSession,
  PageOptions,
  SessionListFilter,
  SessionListItem,
  SessionRepository,
} from './types.js';

type Clock = () => Date;

class InMemoryAccountRepository implements AccountRepository {
  readonly rows = new Map<string, Account>();

  constructor(private readonly now: Clock) {}

  async findBySlug(slug: string): Promise<Account | null> {
    for (const account of this.rows.values()) {
      if (account.slug === slug) return { ...account };
    }
    return null;
  }

  async create(input: NewAccount): Promise<Account> {
    if (await this.findBySlug(input.slug)) {
      throw new DuplicateKeyError('accounts_slug_key');
    }
    const at = this.now();
    const account: Account = {
      id: uuidv4(),
      slug: input.slug,
      name: input.name,
      status: input.status ?? 'active',
      createdAt: at,
      updatedAt: at,
    };
    this.rows.set(account.id, account);
    return { ...account };
  }
}

class InMemoryAgentInstanceRepository implements AgentInstanceRepository {
  readonly rows = new Map<string, AgentInstanceRecord>();

  constructor(private readonly now: Clock) {}

  async findBySlug(accountId: string, instanceSlug: string): Promise<AgentInstanceRecord | null> {
    for (const instance of this.rows.values()) {
      if (instance.accountId === accountId && instance.instanceSlug === instanceSlug) {
        return { ...instance };
      }
    }
    return null;
  }

  async listActive(accountId: string): Promise<AgentInstanceRecord[]> {
    return Array.from(this.rows.values())
      .filter(instance => instance.accountId === accountId && instance.status === 'active')
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map(instance => ({ ...instance }));
  }

  async touchLastUsed(id: string, at: Date): Promise<void> {
    const instance = this.rows.get(id);
    if (instance) {
      instance.lastUsedAt = at;
    }
  }

  async create(input: NewAgentInstance): Promise<AgentInstanceRecord> {
    if (await this.findBySlug(input.accountId, input.instanceSlug)) {
      throw new DuplicateKeyError('agent_instances_account_slug_idx');
    }
    const at = this.now();
    const instance: AgentInstanceRecord = {
      id: uuidv4(),
      accountId: input.accountId,
      instanceSlug: input.instanceSlug,
      agentType: input.agentType,
      displayName: input.displayName,
      status: input.status ?? 'active',
      lastUsedAt: null,
      createdAt: at,
      updatedAt: at,
    };
    this.rows.set(instance.id, instance);
    return { ...instance };
  }

  setStatus(id: string, status: AgentInstanceRecord['status']): void {
    const instance = this.rows.get(id);
    if (instance) {
      instance.status = status;
    }
  }
}

class InMemorySessionRepository implements SessionRepository {
  readonly rows = new Map<string, Session>();

  constructor(
    private readonly now: Clock,
    private readonly messages: InMemoryMessageRepository
  ) {}

  async create(input: NewSession): Promise<Session> {
    for (const existing of this.rows.values()) {
      if (existing.sessionKey === input.sessionKey) {
        throw new DuplicateKeyError('sessions_session_key_key');
      }
    }
    const at = this.now();
    const session: Session = {
      id: uuidv4(),
      sessionKey: input.sessionKey,
      email: input.email,
      isAnonymous: input.isAnonymous,
      accountId: null,
      accountSlug: null,
      agentInstanceId: null,
      agentInstanceSlug: null,
      createdAt: at,
      lastActivityAt: at,
      updatedAt: at,
      meta: { ...input.meta },
    };
    this.rows.set(session.id, session);
    return { ...session };
  }

  async findByKey(sessionKey: string): Promise<Session | null> {
    for (const session of this.rows.values()) {
      if (session.sessionKey === sessionKey) return { ...session };
    }
    return null;
  }

  async findById(id: string): Promise<Session | null> {
    const session = this.rows.get(id);
    return session ? { ...session } : null;
  }

  async updateContext(id: string, context: SessionContext, at: Date): Promise<Session | null> {
    const session = this.rows.get(id);
    if (!session) return null;
    Object.assign(session, context, { updatedAt: at });
    return { ...session };
  }

  async touch(id: string, at: Date): Promise<void> {
    const session = this.rows.get(id);
    if (session) {
      session.lastActivityAt = at;
      session.updatedAt = at;
    }
  }

  async updateEmail(id: string, email: string, at: Date): Promise<Session | null> {
    const session = this.rows.get(id);
    if (!session) return null;
    session.email = email;
    session.isAnonymous = false;
    session.updatedAt = at;
    return { ...session };
  }

  async list(filter: SessionListFilter): Promise<{ sessions: SessionListItem[]; total: number }> {
    const matching = Array.from(this.rows.values())
      .filter(session => !filter.accountSlug || session.accountSlug === filter.accountSlug)
      .filter(session => !filter.agentInstanceSlug || session.agentInstanceSlug === filter.agentInstanceSlug)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

    const page = matching.slice(filter.offset, filter.offset + filter.limit);
    const sessions = await Promise.all(
      page.map(async session => ({ ...session, messageCount: await this.messages.countBySession(session.id) }))
    );
    return { sessions, total: matching.length };
  }
}

class InMemoryMessageRepository implements MessageRepository {
  readonly rows: MessageRecord[] = [];

  constructor(private readonly now: Clock) {}

  async insert(input: NewMessage): Promise<MessageRecord> {
    const message: MessageRecord = { ...input, meta: { ...input.meta }, createdAt: this.now() };
    this.rows.push(message);
    return { ...message };
  }

  async listBySession(sessionId: string, page: PageOptions): Promise<MessageRecord[]> {
    return this.forSession(sessionId)
      .slice(page.offset, page.offset + page.limit)
      .map(message => ({ ...message }));
  }

  async listRecent(sessionId: string, limit: number, roles: MessageRole[]): Promise<MessageRecord[]> {
    const matching = this.forSession(sessionId).filter(message => roles.includes(message.role));
    return matching.slice(Math.max(0, matching.length - limit)).map(message => ({ ...message }));
  }

  async countBySession(sessionId: string): Promise<number> {
    return this.forSession(sessionId).length;
  }

  private forSession(sessionId: string): MessageRecord[] {
    // insertion order breaks ties between equal timestamps
    return this.rows
      .filter(message => message.sessionId === sessionId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }
}

class InMemoryLlmRequestRepository implements LlmRequestRepository {
  readonly rows = new Map<string, LlmRequestRecord>();

  constructor(private readonly now: Clock) {}

  async insert(input: NewLlmRequest): Promise<LlmRequestRecord> {
    const record: LlmRequestRecord = { ...input, createdAt: this.now() };
    this.rows.set(record.id, record);
    return { ...record };
  }

  async findById(id: string): Promise<LlmRequestRecord | null> {
    const record = this.rows.get(id);
    return record ? { ...record } : null;
  }

  async summarizeCosts(accountSlug: string, range: DateRange): Promise<CostSummaryRow[]> {
    const groups = new Map<string, CostSummaryRow>();
    for (const record of this.rows.values()) {
      if (record.accountSlug !== accountSlug) continue;
      if (range.from && record.createdAt < range.from) continue;
      if (range.to && record.createdAt >= range.to) continue;

      const key = `${record.agentInstanceSlug ?? ''}|${record.model}`;
      const row = groups.get(key) ?? {
        agentInstanceSlug: record.agentInstanceSlug,
        model: record.model,
        requestCount: 0,
        promptTokens: 0,
        completionTokens: 0,
        totalTokens: 0,
        totalCost: 0,
      };
      row.requestCount += 1;
      row.promptTokens += record.promptTokens;
      row.completionTokens += record.completionTokens;
      row.totalTokens += record.totalTokens;
      row.totalCost += record.totalCost;
      groups.set(key, row);
    }
    return Array.from(groups.values());
  }
}

/**
 * Process-local DataStore. Backs the test suites and `STORE_DRIVER=memory`.
 */
export class InMemoryDataStore implements DataStore {
  readonly accounts: InMemoryAccountRepository;
  readonly instances: InMemoryAgentInstanceRepository;
  readonly sessions: InMemorySessionRepository;
  readonly messages: InMemoryMessageRepository;
  readonly llmRequests: InMemoryLlmRequestRepository;

  constructor(options: { now?: Clock } = {}) {
    const now = options.now ?? (() => new Date());
    this.accounts = new InMemoryAccountRepository(now);
    this.instances = new InMemoryAgentInstanceRepository(now);
    this.messages = new InMemoryMessageRepository(now);
    this.sessions = new InMemorySessionRepository(now, this.messages);
    this.llmRequests = new InMemoryLlmRequestRepository(now);
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
