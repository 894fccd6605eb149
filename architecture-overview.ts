/**
 * Architecture Overview
 * =====================
 * This file documents the architecture of the agent gateway service.
 * It does not contain executable code, but serves as in-repo technical documentation.
 * Diagrams are written in Mermaid syntax for visualization.
 */

/**
 * 1. Chat Turn Flow
 * -----------------
 * ```mermaid
 * sequenceDiagram
 *     participant Client
 *     participant API as Express routes
 *     participant Chat as ChatService
 *     participant PoolMgr as PoolManager
 *     participant Agent as ChatAgent
 *     participant LLM as OpenRouter
 *     participant DB as DataStore
 *
 *     Client->>API: POST /accounts/{account}/agents/{instance}/chat
 *     API->>Chat: prepareTurn(message, cookie session)
 *     Chat->>PoolMgr: acquireAgent(account, instance)
 *     Chat->>DB: resolve session, load recent history
 *     Chat->>Agent: run(message, history)
 *     Agent->>LLM: chat completion (tool rounds, then final answer)
 *     LLM-->>Agent: content, usage, provider cost
 *     Chat->>DB: llm_requests row, message pair, last activity
 *     Chat-->>API: response, sessionId, usage, cost
 *     API-->>Client: JSON or server-sent events
 * ```
 */

/**
 * 2. Configuration Cascade
 * ------------------------
 * ```mermaid
 * graph LR
 *     A[instance config.yaml] -->|missing or wrong type| B[account.yaml]
 *     B -->|missing or wrong type| C[app.yaml]
 *     C -->|missing or wrong type| D[hardcoded fallback]
 * ```
 * Every lookup keeps an audit of the sources it tried.
 */

/**
 * 3. Pool Management
 * ------------------
 * ```mermaid
 * graph TD
 *     A[PoolManager] -->|Manages| B[AgentPool pool-1]
 *     A[PoolManager] -->|Manages| C[AgentPool pool-N]
 *
 *     B --> B1[acme/support: ChatAgent]
 *     B --> B2[acme/sales: ChatAgent]
 *     C --> C1[globex/helpdesk: ChatAgent]
 * ```
 * - Agents are keyed `account/instance` and rebuilt when the config fingerprint changes
 * - Concurrent requests for the same key share one build
 * - A new pool opens when every pool is full, up to `pools.max_pools`
 */

/**
 * 4. Storage
 * ----------
 * - PostgreSQL through drizzle-orm: accounts, agent_instances, sessions, messages, llm_requests
 * - Redis (or an in-process map) caches the YAML documents of each instance
 * - Pinecone holds knowledge-base vectors, one namespace per account
 */

/**
 * 5. Limitations
 * --------------
 * - Pools live in one process; several processes do not share agents
 * - Rate limits are counted per process
 */

export {};
