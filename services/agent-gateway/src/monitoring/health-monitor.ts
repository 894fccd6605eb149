import os from 'os';
import { PoolManager } from '../services/pool-manager.js';
import { SystemMetrics } from '../types/index.js';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthMetrics {
  status: HealthStatus;
  timestamp: string;
  uptime: number;
  memory: {
    used: number;
    total: number;
    percentage: number;
  };
  cpu: {
    usage: number;
    loadAverage: number[];
  };
  pools: {
    total: number;
    agents: number;
  };
  performance: {
    averageResponseTime: number;
    totalMessages: number;
    errorRate: number;
  };
  problems: string[];
}

export interface HealthThresholds {
  memory: number;
  responseTimeMs: number;
  errorRate: number;
}

const DEFAULT_THRESHOLDS: HealthThresholds = {
  memory: 0.8, // 80% heap usage
  responseTimeMs: 5000,
  errorRate: 0.05,
};

type MemoryReader = () => Pick<NodeJS.MemoryUsage, 'heapUsed' | 'heapTotal'>;

export class HealthMonitor {
  private readonly poolManager: PoolManager;
  private readonly startTime: number;
  private readonly thresholds: HealthThresholds;
  private readonly readMemory: MemoryReader;

  constructor(poolManager: PoolManager, thresholds: Partial<HealthThresholds> = {}, readMemory: MemoryReader = () => process.memoryUsage()) {
    this.poolManager = poolManager;
    this.startTime = Date.now();
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };
    this.readMemory = readMemory;
  }

  /**
   * Get comprehensive health metrics
   */
  getHealthMetrics(): HealthMetrics {
    const memoryUsage = this.readMemory();
    const systemMetrics = this.poolManager.getSystemMetrics();
    const errorRate = this.errorRate(systemMetrics);
    const memoryPercentage = memoryUsage.heapTotal > 0 ? memoryUsage.heapUsed / memoryUsage.heapTotal : 0;
    const problems = this.findProblems(memoryPercentage, systemMetrics, errorRate);

    return {
      status: HealthMonitor.statusFor(problems.length),
      timestamp: new Date().toISOString(),
      uptime: Date.now() - this.startTime,
      memory: {
        used: memoryUsage.heapUsed,
        total: memoryUsage.heapTotal,
        percentage: memoryPercentage,
      },
      cpu: {
        usage: process.cpuUsage().user / 1000000, // seconds
        loadAverage: os.loadavg(),
      },
      pools: {
        total: systemMetrics.totalPools,
        agents: systemMetrics.totalAgents,
      },
      performance: {
        averageResponseTime: systemMetrics.averageResponseTime,
        totalMessages: systemMetrics.totalMessages,
        errorRate,
      },
      problems,
    };
  }

  static statusFor(problemCount: number): HealthStatus {
    if (problemCount === 0) return 'healthy';
    if (problemCount <= 2) return 'degraded';
    return 'unhealthy';
  }

  isReady(): boolean {
    const metrics = this.getHealthMetrics();
    return metrics.status !== 'unhealthy' && metrics.pools.total > 0;
  }

  /**
   * Get memory usage in MB
   */
  getMemoryUsageMB(): { used: number; total: number; percentage: number } {
    const memoryUsage = this.readMemory();
    return {
      used: Math.round(memoryUsage.heapUsed / 1024 / 1024),
      total: Math.round(memoryUsage.heapTotal / 1024 / 1024),
      percentage: memoryUsage.heapTotal > 0 ? memoryUsage.heapUsed / memoryUsage.heapTotal : 0,
    };
  }

  getResourceRecommendations(): string[] {
    const metrics = this.getHealthMetrics();
    const recommendations: string[] = [];

    if (metrics.memory.percentage > 0.7) {
      recommendations.push('Consider increasing memory allocation or lowering pools.max_agents_per_pool');
    }
    if (metrics.performance.averageResponseTime > 2000) {
      recommendations.push('Consider a faster model or fewer tool rounds per turn');
    }
    if (metrics.performance.errorRate > 0.02) {
      recommendations.push('Investigate LLM provider errors in llm_requests');
    }
    if (metrics.pools.total >= 8) {
      recommendations.push('Consider scaling to multiple instances');
    }
    return recommendations;
  }

  private errorRate(systemMetrics: SystemMetrics): number {
    const totalRequests = systemMetrics.totalMessages + systemMetrics.totalErrors;
    return totalRequests > 0 ? systemMetrics.totalErrors / totalRequests : 0;
  }

  private findProblems(memoryPercentage: number, systemMetrics: SystemMetrics, errorRate: number): string[] {
    const problems: string[] = [];

    if (memoryPercentage > this.thresholds.memory) {
      problems.push(`High memory usage: ${(memoryPercentage * 100).toFixed(1)}%`);
    }
    if (systemMetrics.averageResponseTime > this.thresholds.responseTimeMs) {
      problems.push(`High response time: ${Math.round(systemMetrics.averageResponseTime)}ms`);
    }
    if (errorRate > this.thresholds.errorRate) {
      problems.push(`High error rate: ${(errorRate * 100).toFixed(1)}%`);
    }
    if (systemMetrics.totalPools === 0) {
      problems.push('No active pools');
    }
    return problems;
  }
}
