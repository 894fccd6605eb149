import { beforeEach, describe, expect, it, vi } from 'vitest';
import { AgentFactory } from '../../src/agents/agent-factory.js';
import { ChatAgent } from '../../src/agents/chat-agent.js';
import { CapacityError, InstanceNotFoundError } from '../../src/errors/index.js';
import { AgentPool } from '../../src/services/agent-pool.js';
import { InMemoryCache } from '../../src/services/instance-cache.js';
import { InstanceLoader } from '../../src/services/instance-loader.js';
import { DEFAULT_POOL_ID, PoolManager } from '../../src/services/pool-manager.js';
import { InMemoryDataStore } from '../../src/store/memory-store.js';
import { seedFromConfigDirectory } from '../../src/store/seed.js';
import { AGENT_CONFIGS_DIR, makeInstance, ScriptedLlmClient } from '../helpers.js';

const llm = new ScriptedLlmClient();
const modelSettings = { model: 'fixture/global-model', temperature: 0.2, maxTokens: 256 };

describe('PoolManager', () => {
  let loader: InstanceLoader;
  let builds: string[];
  let buildAgent: AgentFactory;

  beforeEach(async () => {
    const store = new InMemoryDataStore();
    await seedFromConfigDirectory(store, AGENT_CONFIGS_DIR, 'simple_chat');
    loader = new InstanceLoader(store, { configsDirectory: AGENT_CONFIGS_DIR, cache: new InMemoryCache() });
    builds = [];
    buildAgent = async instance => {
      builds.push(`${instance.accountSlug}/${instance.instanceSlug}`);
      return new ChatAgent({ instance, llm, modelSettings, tools: [], maxToolRounds: 0 });
    };
  });

  function createManager(maxPools: number = 2): PoolManager {
    const manager = new PoolManager(loader, buildAgent, { maxPools, maxAgentsPerPool: 2 });
    manager.initialize();
    return manager;
  }

  it('starts with the default pool', () => {
    const status = createManager().getStatus();

    expect(status).toMatchObject({ isInitialized: true, maxPools: 2, maxAgentsPerPool: 2, activePools: 1 });
    expect(status.systemMetrics.pools.map(pool => pool.poolId)).toEqual([DEFAULT_POOL_ID]);
  });

  describe('acquireAgent', () => {
    it('builds an agent once and reuses it', async () => {
      const manager = createManager();

      const first = await manager.acquireAgent('acme', 'support');
      const second = await manager.acquireAgent('acme', 'support');

      expect(second).toBe(first);
      expect(builds).toEqual(['acme/support']);
      expect(manager.getPool(DEFAULT_POOL_ID)?.getAgentKeys()).toEqual(['acme/support']);
    });

    it('shares one build between concurrent requests', async () => {
      const manager = createManager();

      const [a, b] = await Promise.all([manager.acquireAgent('acme', 'sales'), manager.acquireAgent('acme', 'sales')]);

      expect(a).toBe(b);
      expect(builds).toEqual(['acme/sales']);
    });

    it('rebuilds in place when the config fingerprint changes', async () => {
      const manager = createManager();
      const first = await manager.acquireAgent('acme', 'support');
      vi.spyOn(loader, 'loadAgentInstance').mockResolvedValue({ ...first.instance, configFingerprint: 'changed' });

      const rebuilt = await manager.acquireAgent('acme', 'support');

      expect(rebuilt).not.toBe(first);
      expect(rebuilt.instance.configFingerprint).toBe('changed');
      expect(manager.getPool(DEFAULT_POOL_ID)?.getAgent('acme/support')).toBe(rebuilt);
      expect(manager.getPool(DEFAULT_POOL_ID)?.getMetrics().rebuilds).toBe(1);
    });

    it('opens another pool when the existing ones are full', async () => {
      const manager = createManager();

      await manager.acquireAgent('acme', 'sales');
      await manager.acquireAgent('acme', 'support');
      await manager.acquireAgent('globex', 'helpdesk');

      const pools = manager.getAllPools();
      expect(pools.map(pool => pool.agentCount)).toEqual([2, 1]);
      expect(pools[1].poolId).toMatch(/^pool-\d+-[a-z0-9]+$/);
    });

    it('refuses new agents once every pool is full', async () => {
      const manager = createManager(1);
      await manager.acquireAgent('acme', 'sales');
      await manager.acquireAgent('acme', 'support');

      await expect(manager.acquireAgent('globex', 'helpdesk')).rejects.toThrow(CapacityError);
      await expect(manager.acquireAgent('globex', 'helpdesk')).rejects.toThrow(
        'Maximum number of pools (1) reached. Cannot create new pool.'
      );
    });

    it('propagates load failures without caching them', async () => {
      const manager = createManager();

      await expect(manager.acquireAgent('acme', 'missing')).rejects.toThrow(InstanceNotFoundError);
      await expect(manager.acquireAgent('acme', 'missing')).rejects.toThrow(InstanceNotFoundError);
      expect(builds).toEqual([]);
    });
  });

  describe('removeAgent', () => {
    it('drops the agent and cleans up empty extra pools', async () => {
      const manager = createManager();
      await manager.acquireAgent('acme', 'sales');
      await manager.acquireAgent('acme', 'support');
      await manager.acquireAgent('globex', 'helpdesk');

      expect(manager.removeAgent('globex/helpdesk')).toBe(true);
      expect(manager.getStatus().activePools).toBe(1);

      expect(manager.removeAgent('acme/sales')).toBe(true);
      expect(manager.removeAgent('acme/sales')).toBe(false);
      expect(manager.getPool(DEFAULT_POOL_ID)?.getAgentKeys()).toEqual(['acme/support']);
    });

    it('builds a fresh agent on the next request', async () => {
      const manager = createManager();
      const first = await manager.acquireAgent('acme', 'support');
      manager.removeAgent('acme/support');

      expect(await manager.acquireAgent('acme', 'support')).not.toBe(first);
      expect(builds).toEqual(['acme/support', 'acme/support']);
    });
  });

  describe('metrics', () => {
    it('averages response times over successes and errors', async () => {
      const manager = createManager();
      await manager.acquireAgent('acme', 'support');

      manager.recordResult('acme/support', 100, false);
      manager.recordResult('acme/support', 200, false);
      manager.recordResult('acme/support', 300, true);
      manager.recordResult('nobody/here', 5000, true);

      const metrics = manager.getSystemMetrics();
      expect(metrics).toMatchObject({
        totalPools: 1,
        totalAgents: 1,
        totalMessages: 2,
        totalErrors: 1,
        averageResponseTime: 200,
      });
    });
  });

  it('shuts every pool down', async () => {
    const manager = createManager();
    await manager.acquireAgent('acme', 'support');

    manager.shutdown();

    expect(manager.getStatus()).toMatchObject({ isInitialized: false, activePools: 0 });
  });

  it('rejects a duplicate pool id', () => {
    expect(() => createManager().createPool(DEFAULT_POOL_ID)).toThrow('Pool pool-1 already exists');
  });
});

describe('AgentPool', () => {
  const agent = new ChatAgent({ instance: makeInstance(), llm, modelSettings, tools: [], maxToolRounds: 0 });

  it('enforces its capacity for new keys only', () => {
    const pool = new AgentPool('pool-test', 1);
    pool.initialize();
    pool.addAgent('acme/support', agent);

    expect(pool.hasCapacity()).toBe(false);
    expect(() => pool.addAgent('acme/sales', agent)).toThrow('Pool pool-test is at maximum capacity (1 agents)');
    expect(() => pool.addAgent('acme/support', agent)).not.toThrow();
  });

  it('reports its metrics', () => {
    const pool = new AgentPool('pool-test', 3);
    pool.initialize();
    pool.addAgent('acme/support', agent);
    pool.recordResult(50, false);

    expect(pool.getMetrics()).toEqual({
      poolId: 'pool-test',
      isInitialized: true,
      agentCount: 1,
      maxAgents: 3,
      messageCount: 1,
      responseTime: 50,
      errorCount: 0,
      rebuilds: 0,
    });
  });
});
