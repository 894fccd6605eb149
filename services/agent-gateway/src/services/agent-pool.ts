import { ChatAgent } from '../agents/chat-agent.js';
import { CapacityError } from '../errors/index.js';
import { PoolMetrics } from '../types/index.js';

interface PoolMetricsData {
  messageCount: number;
  responseTime: number;
  errorCount: number;
  rebuilds: number;
}

export class AgentPool {
  private readonly poolId: string;
  private readonly maxAgents: number;
  private isInitialized: boolean = false;
  private readonly agents: Map<string, ChatAgent> = new Map();
  private readonly metrics: PoolMetricsData = { messageCount: 0, responseTime: 0, errorCount: 0, rebuilds: 0 };

  constructor(poolId: string, maxAgents: number = 500) {
    this.poolId = poolId;
    this.maxAgents = maxAgents;
  }

  initialize(): void {
    this.isInitialized = true;
  }

  getAgent(key: string): ChatAgent | null {
    return this.agents.get(key) ?? null;
  }

  addAgent(key: string, agent: ChatAgent): void {
    if (!this.agents.has(key)) {
      this.ensureCapacity();
    }
    this.agents.set(key, agent);
  }

  /** Swaps in an agent rebuilt from changed config. */
  replaceAgent(key: string, agent: ChatAgent): void {
    this.agents.set(key, agent);
    this.metrics.rebuilds++;
  }

  removeAgent(key: string): boolean {
    return this.agents.delete(key);
  }

  hasCapacity(): boolean {
    return this.agents.size < this.maxAgents;
  }

  /** Folds one turn into the running average response time. */
  recordResult(responseTimeMs: number, isError: boolean): void {
    const total = this.metrics.messageCount + this.metrics.errorCount;
    this.metrics.responseTime = (this.metrics.responseTime * total + responseTimeMs) / (total + 1);
    if (isError) {
      this.metrics.errorCount++;
    } else {
      this.metrics.messageCount++;
    }
  }

  getMetrics(): PoolMetrics {
    return {
      poolId: this.poolId,
      isInitialized: this.isInitialized,
      agentCount: this.agents.size,
      maxAgents: this.maxAgents,
      ...this.metrics,
    };
  }

  getAgentKeys(): string[] {
    return Array.from(this.agents.keys());
  }

  shutdown(): void {
    this.agents.clear();
    this.isInitialized = false;
  }

  getPoolId(): string {
    return this.poolId;
  }

  getAgentCount(): number {
    return this.agents.size;
  }

  private ensureCapacity(): void {
    if (!this.hasCapacity()) {
      throw new CapacityError(`Pool ${this.poolId} is at maximum capacity (${this.maxAgents} agents)`);
    }
  }
}
