import { and, asc, count, desc, eq, gte, inArray, lt, sql } from 'drizzle-orm';
import { Database, DatabaseHandle } from '../db/database.js';
import { accounts, agentInstances, llmRequests, messages, sessions } from '../db/schema.js';
import { DuplicateKeyError } from '../errors/index.js';
import {
  Account,
  AccountStatus,
  AgentInstanceRecord,
  CompletionStatus,
  CostMethod,
  InstanceStatus,
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

type AccountRow = typeof accounts.$inferSelect;
type InstanceRow = typeof agentInstances.$inferSelect;
type SessionRow = typeof sessions.$inferSelect;
type MessageRow = typeof messages.$inferSelect;
type LlmRequestRow = typeof llmRequests.$inferSelect;

const MESSAGE_ROLES: MessageRole[] = ['user', 'assistant', 'system', 'tool'];
const COST_METHODS: CostMethod[] = ['provider', 'fallback_pricing', 'unpriced'];
const COMPLETION_STATUSES: CompletionStatus[] = ['complete', 'partial', 'error'];

function pick<T extends string>(value: string, allowed: readonly T[], fallback: T): T {
  return allowed.find(candidate => candidate === value) ?? fallback;
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === '23505';
}

function toAccount(row: AccountRow): Account {
  const status: AccountStatus = row.status === 'active' ? 'active' : 'suspended';
  return { ...row, status };
}

function toInstance(row: InstanceRow): AgentInstanceRecord {
  const status: InstanceStatus = row.status === 'active' ? 'active' : 'inactive';
  return { ...row, status };
}

function toSession(row: SessionRow): Session {
  return { ...row };
}

function toMessage(row: MessageRow): MessageRecord {
  return { ...row, role: pick(row.role, MESSAGE_ROLES, 'user') };
}

function toLlmRequest(row: LlmRequestRow): LlmRequestRecord {
  return {
    ...row,
    promptCost: Number(row.promptCost),
    completionCost: Number(row.completionCost),
    totalCost: Number(row.totalCost),
    costMethod: pick(row.costMethod, COST_METHODS, 'unpriced'),
    completionStatus: pick(row.completionStatus, COMPLETION_STATUSES, 'complete'),
  };
}

class DrizzleAccountRepository implements AccountRepository {
  constructor(private readonly db: Database) {}

  async findBySlug(slug: string): Promise<Account | null> {
    const rows = await this.db.select().from(accounts).where(eq(accounts.slug, slug)).limit(1);
    return rows[0] ? toAccount(rows[0]) : null;
  }

  async create(input: NewAccount): Promise<Account> {
    try {
      const rows = await this.db
        .insert(accounts)
        .values({ slug: input.slug, name: input.name, status: input.status ?? 'active' })
        .returning();
      return toAccount(rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) throw new DuplicateKeyError('accounts_slug_key');
      throw error;
    }
  }
}

class DrizzleAgentInstanceRepository implements AgentInstanceRepository {
  constructor(private readonly db: Database) {}

  async findBySlug(accountId: string, instanceSlug: string): Promise<AgentInstanceRecord | null> {
    const rows = await this.db
      .select()
      .from(agentInstances)
      .where(and(eq(agentInstances.accountId, accountId), eq(agentInstances.instanceSlug, instanceSlug)))
      .limit(1);
    return rows[0] ? toInstance(rows[0]) : null;
  }

  async listActive(accountId: string): Promise<AgentInstanceRecord[]> {
    const rows = await this.db
      .select()
      .from(agentInstances)
      .where(and(eq(agentInstances.accountId, accountId), eq(agentInstances.status, 'active')))
      .orderBy(asc(agentInstances.createdAt));
    return rows.map(toInstance);
  }

  async touchLastUsed(id: string, at: Date): Promise<void> {
    await this.db.update(agentInstances).set({ lastUsedAt: at }).where(eq(agentInstances.id, id));
  }

  async create(input: NewAgentInstance): Promise<AgentInstanceRecord> {
    try {
      const rows = await this.db
        .insert(agentInstances)
        .values({
          accountId: input.accountId,
          instanceSlug: input.instanceSlug,
          agentType: input.agentType,
          displayName: input.displayName,
          status: input.status ?? 'active',
        })
        .returning();
      return toInstance(rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) throw new DuplicateKeyError('agent_instances_account_slug_idx');
      throw error;
    }
  }
}

class DrizzleSessionRepository implements SessionRepository {
  constructor(private readonly db: Database) {}

  async create(input: NewSession): Promise<Session> {
    try {
      const rows = await this.db
        .insert(sessions)
        .values({
          sessionKey: input.sessionKey,
          email: input.email,
          isAnonymous: input.isAnonymous,
          meta: input.meta,
        })
        .returning();
      return toSession(rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) throw new DuplicateKeyError('sessions_session_key_key');
      throw error;
    }
  }

  async findByKey(sessionKey: string): Promise<Session | null> {
    const rows = await this.db.select().from(sessions).where(eq(sessions.sessionKey, sessionKey)).limit(1);
    return rows[0] ? toSession(rows[0]) : null;
  }

  async findById(id: string): Promise<Session | null> {
    const rows = await this.db.select().from(sessions).where(eq(sessions.id, id)).limit(1);
    return rows[0] ? toSession(rows[0]) : null;
  }

  async updateContext(id: string, context: SessionContext, at: Date): Promise<Session | null> {
    const rows = await this.db
      .update(sessions)
      .set({ ...context, updatedAt: at })
      .where(eq(sessions.id, id))
      .returning();
    return rows[0] ? toSession(rows[0]) : null;
  }

  async touch(id: string, at: Date): Promise<void> {
    await this.db.update(sessions).set({ lastActivityAt: at, updatedAt: at }).where(eq(sessions.id, id));
  }

  async updateEmail(id: string, email: string, at: Date): Promise<Session | null> {
    const rows = await this.db
      .update(sessions)
      .set({ email, isAnonymous: false, updatedAt: at })
      .where(eq(sessions.id, id))
      .returning();
    return rows[0] ? toSession(rows[0]) : null;
  }

  async list(filter: SessionListFilter): Promise<{ sessions: SessionListItem[]; total: number }> {
    const where = and(
      filter.accountSlug ? eq(sessions.accountSlug, filter.accountSlug) : undefined,
      filter.agentInstanceSlug ? eq(sessions.agentInstanceSlug, filter.agentInstanceSlug) : undefined
    );

    const messageCount = sql<number>`(select count(*) from ${messages} where ${messages.sessionId} = ${sessions.id})`.mapWith(Number);

    const rows = await this.db
      .select({ session: sessions, messageCount })
      .from(sessions)
      .where(where)
      .orderBy(desc(sessions.createdAt))
      .limit(filter.limit)
      .offset(filter.offset);

    const totals = await this.db.select({ total: count() }).from(sessions).where(where);

    return {
      sessions: rows.map(row => ({ ...toSession(row.session), messageCount: row.messageCount })),
      total: totals[0]?.total ?? 0,
    };
  }
}

class DrizzleMessageRepository implements MessageRepository {
  constructor(private readonly db: Database) {}

  async insert(input: NewMessage): Promise<MessageRecord> {
    const rows = await this.db.insert(messages).values(input).returning();
    return toMessage(rows[0]);
  }

  async listBySession(sessionId: string, page: PageOptions): Promise<MessageRecord[]> {
    const rows = await this.db
      .select()
      .from(messages)
      .where(eq(messages.sessionId, sessionId))
      .orderBy(asc(messages.createdAt), asc(messages.id))
      .limit(page.limit)
      .offset(page.offset);
    return rows.map(toMessage);
  }

  async listRecent(sessionId: string, limit: number, roles: MessageRole[]): Promise<MessageRecord[]> {
    const rows = await this.db
      .select()
      .from(messages)
      .where(and(eq(messages.sessionId, sessionId), inArray(messages.role, roles)))
      .orderBy(desc(messages.createdAt), desc(messages.id))
      .limit(limit);
    return rows.reverse().map(toMessage);
  }

  async countBySession(sessionId: string): Promise<number> {
    const rows = await this.db.select({ total: count() }).from(messages).where(eq(messages.sessionId, sessionId));
    return rows[0]?.total ?? 0;
  }
}

class DrizzleLlmRequestRepository implements LlmRequestRepository {
  constructor(private readonly db: Database) {}

  async insert(input: NewLlmRequest): Promise<LlmRequestRecord> {
    const rows = await this.db
      .insert(llmRequests)
      .values({
        ...input,
        promptCost: input.promptCost.toFixed(8),
        completionCost: input.completionCost.toFixed(8),
        totalCost: input.totalCost.toFixed(8),
      })
      .returning();
    return toLlmRequest(rows[0]);
  }

  async findById(id: string): Promise<LlmRequestRecord | null> {
    const rows = await this.db.select().from(llmRequests).where(eq(llmRequests.id, id)).limit(1);
    return rows[0] ? toLlmRequest(rows[0]) : null;
  }

  async summarizeCosts(accountSlug: string, range: DateRange): Promise<CostSummaryRow[]> {
    return this.db
      .select({
        agentInstanceSlug: llmRequests.agentInstanceSlug,
        model: llmRequests.model,
        requestCount: count(),
        promptTokens: sql<number>`coalesce(sum(${llmRequests.promptTokens}), 0)`.mapWith(Number),
        completionTokens: sql<number>`coalesce(sum(${llmRequests.completionTokens}), 0)`.mapWith(Number),
        totalTokens: sql<number>`coalesce(sum(${llmRequests.totalTokens}), 0)`.mapWith(Number),
        totalCost: sql<number>`coalesce(sum(${llmRequests.totalCost}), 0)`.mapWith(Number),
      })
      .from(llmRequests)
      .where(
        and(
          eq(llmRequests.accountSlug, accountSlug),
          range.from ? gte(llmRequests.createdAt, range.from) : undefined,
          range.to ? lt(llmRequests.createdAt, range.to) : undefined
        )
      )
      .groupBy(llmRequests.agentInstanceSlug, llmRequests.model);
  }
}

/**
 * PostgreSQL-backed DataStore over drizzle-orm.
 */
export class DrizzleDataStore implements DataStore {
  readonly accounts: AccountRepository;
  readonly instances: AgentInstanceRepository;
  readonly sessions: SessionRepository;
  readonly messages: MessageRepository;
  readonly llmRequests: LlmRequestRepository;

  constructor(private readonly handle: DatabaseHandle) {
    this.accounts = new DrizzleAccountRepository(handle.db);
    this.instances = new DrizzleAgentInstanceRepository(handle.db);
    this.sessions = new DrizzleSessionRepository(handle.db);
    this.messages = new DrizzleMessageRepository(handle.db);
    this.llmRequests = new DrizzleLlmRequestRepository(handle.db);
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}
