import { AgentFactory } from '../agents/agent-factory.js';
import { ChatAgent } from '../agents/chat-agent.js';
import { CapacityError } from '../errors/index.js';
import { PoolMetrics, SystemMetrics } from '../types/index.js';
import { AgentPool } from './agent-pool.js';
import { InstanceLoader } from './instance-loader.js';

export const DEFAULT_POOL_ID = 'pool-1';

export function agentKey(accountSlug: string, instanceSlug: string): string {
  return `${accountSlug}/${instanceSlug}`;
}

export interface PoolManagerOptions {
  maxPools?: number;
  maxAgentsPerPool?: number;
}

export interface PoolManagerStatus {
  isInitialized: boolean;
  maxPools: number;
  maxAgentsPerPool: number;
  activePools: number;
  systemMetrics: SystemMetrics;
}

/**
 * Spreads built agents over a bounded set of pools. Each `account/instance`
 * lives in exactly one pool and is rebuilt when its config fingerprint changes.
 */
export class PoolManager {
  private readonly pools: Map<string, AgentPool> = new Map();
  private readonly agentLocations: Map<string, string> = new Map();
  private readonly maxPools: number;
  private readonly maxAgentsPerPool: number;
  private isInitialized: boolean = false;

  private poolCreationLock: Promise<AgentPool> | null = null;
  private readonly acquireLocks: Map<string, Promise<ChatAgent>> = new Map();

  constructor(
    private readonly loader: InstanceLoader,
    private readonly buildAgent: AgentFactory,
    options: PoolManagerOptions = {}
  ) {
    this.maxPools = options.maxPools ?? 10;
    this.maxAgentsPerPool = options.maxAgentsPerPool ?? 500;
  }

  initialize(): void {
    console.log('[pool-manager] Initializing...');
    if (!this.pools.has(DEFAULT_POOL_ID)) {
      this.createPool(DEFAULT_POOL_ID);
    }
    this.isInitialized = true;
  }

  /**
   * Returns the agent for an instance, building or rebuilding it as needed.
   * Concurrent calls for the same instance share one build.
   */
  async acquireAgent(accountSlug: string, instanceSlug: string): Promise<ChatAgent> {
    const key = agentKey(accountSlug, instanceSlug);
    const inFlight = this.acquireLocks.get(key);
    if (inFlight) {
      return inFlight;
    }

    const task = this.loadOrBuild(key, accountSlug, instanceSlug);
    this.acquireLocks.set(key, task);
    try {
      return await task;
    } finally {
      this.acquireLocks.delete(key);
    }
  }

  recordResult(key: string, responseTimeMs: number, isError: boolean): void {
    this.poolFor(key)?.recordResult(responseTimeMs, isError);
  }

  removeAgent(key: string): boolean {
    const pool = this.poolFor(key);
    this.agentLocations.delete(key);
    if (!pool) {
      return false;
    }
    const removed = pool.removeAgent(key);
    this.cleanupEmptyPools();
    return removed;
  }

  createPool(poolId: string, maxAgents?: number): AgentPool {
    if (!this.canCreateMorePools()) {
      throw new CapacityError(`Maximum number of pools (${this.maxPools}) reached`);
    }
    if (this.pools.has(poolId)) {
      throw new Error(`Pool ${poolId} already exists`);
    }

    const pool = new AgentPool(poolId, maxAgents ?? this.maxAgentsPerPool);
    pool.initialize();
    this.pools.set(poolId, pool);
    console.log(`[pool-manager] Created new pool: ${poolId}`);
    return pool;
  }

  getPool(poolId: string): AgentPool | null {
    return this.pools.get(poolId) ?? null;
  }

  getAllPools(): PoolMetrics[] {
    return Array.from(this.pools.values(), pool => pool.getMetrics());
  }

  getSystemMetrics(): SystemMetrics {
    const pools = this.getAllPools();
    const totalPools = pools.length;
    return {
      totalPools,
      totalAgents: pools.reduce((sum, p) => sum + p.agentCount, 0),
      totalMessages: pools.reduce((sum, p) => sum + p.messageCount, 0),
      totalErrors: pools.reduce((sum, p) => sum + p.errorCount, 0),
      averageResponseTime: totalPools > 0 ? pools.reduce((sum, p) => sum + p.responseTime, 0) / totalPools : 0,
      pools,
    };
  }

  getStatus(): PoolManagerStatus {
    return {
      isInitialized: this.isInitialized,
      maxPools: this.maxPools,
      maxAgentsPerPool: this.maxAgentsPerPool,
      activePools: this.pools.size,
      systemMetrics: this.getSystemMetrics(),
    };
  }

  shutdown(): void {
    console.log('[pool-manager] Shutting down all pools...');
    for (const pool of this.pools.values()) {
      pool.shutdown();
    }
    this.pools.clear();
    this.agentLocations.clear();
    this.isInitialized = false;
    console.log('[pool-manager] All pools shut down');
  }

  private async loadOrBuild(key: string, accountSlug: string, instanceSlug: string): Promise<ChatAgent> {
    const instance = await this.loader.loadAgentInstance(accountSlug, instanceSlug);

    const mappedPool = this.poolFor(key);
    if (mappedPool) {
      const existing = mappedPool.getAgent(key);
      if (existing && existing.instance.configFingerprint === instance.configFingerprint) {
        return existing;
      }
      if (existing) {
        const rebuilt = await this.buildAgent(instance);
        mappedPool.replaceAgent(key, rebuilt);
        console.log(`[pool-manager] Rebuilt ${key} after a config change`);
        return rebuilt;
      }
      this.agentLocations.delete(key);
    }

    const agent = await this.buildAgent(instance);
    const pool = this.findAvailablePool() ?? (await this.getOrCreateNewPool());
    pool.addAgent(key, agent);
    this.agentLocations.set(key, pool.getPoolId());
    return agent;
  }

  private poolFor(key: string): AgentPool | null {
    const poolId = this.agentLocations.get(key);
    return poolId ? this.getPool(poolId) : null;
  }

  private findAvailablePool(): AgentPool | null {
    for (const pool of this.pools.values()) {
      if (pool.hasCapacity()) {
        return pool;
      }
    }
    return null;
  }

  private canCreateMorePools(): boolean {
    return this.pools.size < this.maxPools;
  }

  private async getOrCreateNewPool(): Promise<AgentPool> {
    if (this.poolCreationLock) {
      await this.poolCreationLock;
      const available = this.findAvailablePool();
      if (available) return available;
    }
    if (!this.canCreateMorePools()) {
      throw new CapacityError(`Maximum number of pools (${this.maxPools}) reached. Cannot create new pool.`);
    }

    const poolId = this.pools.has(DEFAULT_POOL_ID) ? this.generatePoolId() : DEFAULT_POOL_ID;
    const creation = Promise.resolve().then(() => this.createPool(poolId));
    this.poolCreationLock = creation;
    try {
      return await creation;
    } finally {
      this.poolCreationLock = null;
    }
  }

  /** Remove empty pools except the default one */
  private cleanupEmptyPools(): void {
    for (const [poolId, pool] of this.pools) {
      if (poolId === DEFAULT_POOL_ID) continue;
      if (pool.getAgentCount() === 0) {
        pool.shutdown();
        this.pools.delete(poolId);
        console.log(`[pool-manager] Cleaned up empty pool: ${poolId}`);
      }
    }
  }

  // e.g. pool-1632902400-abc123xyz
  private generatePoolId(): string {
    return `pool-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
  }
}
