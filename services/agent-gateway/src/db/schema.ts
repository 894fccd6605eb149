import {
  boolean,
  index,
  integer,
  jsonb,
  numeric,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from 'drizzle-orm/pg-core';

export const accounts = pgTable('accounts', {
  id: uuid('id').primaryKey().defaultRandom(),
  slug: varchar('slug', { length: 100 }).notNull().unique(),
  name: varchar('name', { length: 255 }).notNull(),
  status: varchar('status', { length: 20 }).notNull().default('active'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

export const agentInstances = pgTable(
  'agent_instances',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    accountId: uuid('account_id')
      .notNull()
      .references(() => accounts.id, { onDelete: 'cascade' }),
    instanceSlug: varchar('instance_slug', { length: 100 }).notNull(),
    agentType: varchar('agent_type', { length: 50 }).notNull(),
    displayName: varchar('display_name', { length: 255 }).notNull(),
    status: varchar('status', { length: 20 }).notNull().default('active'),
    lastUsedAt: timestamp('last_used_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    accountSlugIdx: uniqueIndex('agent_instances_account_slug_idx').on(table.accountId, table.instanceSlug),
  })
);

export const sessions = pgTable(
  'sessions',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    sessionKey: varchar('session_key', { length: 255 }).notNull().unique(),
    email: varchar('email', { length: 255 }),
    isAnonymous: boolean('is_anonymous').notNull().default(true),
    accountId: uuid('account_id').references(() => accounts.id),
    accountSlug: varchar('account_slug', { length: 100 }),
    agentInstanceId: uuid('agent_instance_id').references(() => agentInstances.id),
    agentInstanceSlug: varchar('agent_instance_slug', { length: 100 }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    lastActivityAt: timestamp('last_activity_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    meta: jsonb('meta').$type<Record<string, unknown>>().notNull().default({}),
  },
  (table) => ({
    accountIdx: index('sessions_account_slug_idx').on(table.accountSlug),
    instanceIdx: index('sessions_agent_instance_slug_idx').on(table.agentInstanceSlug),
  })
);

export const llmRequests = pgTable(
  'llm_requests',
  {
    id: uuid('id').primaryKey(),
    sessionId: uuid('session_id')
      .notNull()
      .references(() => sessions.id, { onDelete: 'cascade' }),
    agentInstanceId: uuid('agent_instance_id').references(() => agentInstances.id),
    accountId: uuid('account_id').references(() => accounts.id),
    accountSlug: varchar('account_slug', { length: 100 }),
    agentInstanceSlug: varchar('agent_instance_slug', { length: 100 }),
    agentType: varchar('agent_type', { length: 50 }),
    provider: varchar('provider', { length: 50 }).notNull(),
    model: varchar('model', { length: 255 }).notNull(),
    requestBody: jsonb('request_body').$type<Record<string, unknown>>().notNull(),
    responseBody: jsonb('response_body').$type<Record<string, unknown>>().notNull(),
    promptTokens: integer('prompt_tokens').notNull().default(0),
    completionTokens: integer('completion_tokens').notNull().default(0),
    totalTokens: integer('total_tokens').notNull().default(0),
    promptCost: numeric('prompt_cost', { precision: 12, scale: 8 }).notNull().default('0'),
    completionCost: numeric('completion_cost', { precision: 12, scale: 8 }).notNull().default('0'),
    totalCost: numeric('total_cost', { precision: 12, scale: 8 }).notNull().default('0'),
    costMethod: varchar('cost_method', { length: 30 }).notNull(),
    latencyMs: integer('latency_ms').notNull().default(0),
    completionStatus: varchar('completion_status', { length: 20 }).notNull().default('complete'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    accountCreatedIdx: index('llm_requests_account_created_idx').on(table.accountSlug, table.createdAt),
    sessionIdx: index('llm_requests_session_idx').on(table.sessionId),
  })
);

export const messages = pgTable(
  'messages',
  {
    id: uuid('id').primaryKey(),
    sessionId: uuid('session_id')
      .notNull()
      .references(() => sessions.id, { onDelete: 'cascade' }),
    agentInstanceId: uuid('agent_instance_id').references(() => agentInstances.id),
    llmRequestId: uuid('llm_request_id').references(() => llmRequests.id),
    role: varchar('role', { length: 20 }).notNull(),
    content: text('content').notNull(),
    meta: jsonb('meta').$type<Record<string, unknown>>().notNull().default({}),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    sessionCreatedIdx: index('messages_session_created_idx').on(table.sessionId, table.createdAt),
  })
);

export const schema = { accounts, agentInstances, sessions, llmRequests, messages };
