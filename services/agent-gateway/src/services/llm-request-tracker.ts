import { v4 as uuidv4 } from 'uuid';
import { CostSummaryRow, DateRange, LlmRequestRepository } from '../store/types.js';
import {
  AgentInstance,
  CompletionStatus,
  CostBreakdown,
  JsonObject,
  LlmRequestRecord,
  TokenUsage,
} from '../types/index.js';

export interface TrackRequestInput {
  sessionId: string;
  instance: AgentInstance | null;
  provider: string;
  model: string;
  requestBody: JsonObject;
  responseBody: JsonObject;
  usage: TokenUsage;
  cost: CostBreakdown;
  latencyMs: number;
  completionStatus: CompletionStatus;
}

export interface CostTotals {
  requestCount: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  totalCost: number;
}

export interface CostSummary {
  accountSlug: string;
  from: string | null;
  to: string | null;
  totals: CostTotals;
  byInstance: Array<CostTotals & { instanceSlug: string | null }>;
  byModel: Array<CostTotals & { model: string }>;
}

function emptyTotals(): CostTotals {
  return { requestCount: 0, promptTokens: 0, completionTokens: 0, totalTokens: 0, totalCost: 0 };
}

function addRow(target: CostTotals, row: CostSummaryRow): void {
  target.requestCount += row.requestCount;
  target.promptTokens += row.promptTokens;
  target.completionTokens += row.completionTokens;
  target.totalTokens += row.totalTokens;
  target.totalCost = Math.round((target.totalCost + row.totalCost) * 1e8) / 1e8;
}

/**
 * Persists one llm_requests row per chat turn, denormalizing account and
 * instance attribution so billing queries need no joins.
 */
export class LlmRequestTracker {
  constructor(private readonly requests: LlmRequestRepository) {}

  /** Resolves to the new record id, or null when the row could not be written. */
  async track(input: TrackRequestInput): Promise<string | null> {
    const id = uuidv4();
    try {
      await this.requests.insert({
        id,
        sessionId: input.sessionId,
        agentInstanceId: input.instance?.id ?? null,
        accountId: input.instance?.accountId ?? null,
        accountSlug: input.instance?.accountSlug ?? null,
        agentInstanceSlug: input.instance?.instanceSlug ?? null,
        agentType: input.instance?.agentType ?? null,
        provider: input.provider,
        model: input.model,
        requestBody: input.requestBody,
        responseBody: input.responseBody,
        promptTokens: input.usage.promptTokens,
        completionTokens: input.usage.completionTokens,
        totalTokens: input.usage.totalTokens,
        promptCost: input.cost.promptCost,
        completionCost: input.cost.completionCost,
        totalCost: input.cost.totalCost,
        costMethod: input.cost.method,
        latencyMs: Math.round(input.latencyMs),
        completionStatus: input.completionStatus,
      });
      return id;
    } catch (error) {
      console.error(
        `[llm-tracker] Failed to record request for session ${input.sessionId} (model ${input.model}, cost ${input.cost.totalCost}):`,
        error
      );
      return null;
    }
  }

  async getLlmRequest(id: string): Promise<LlmRequestRecord | null> {
    return this.requests.findById(id);
  }

  async getCostSummary(accountSlug: string, range: DateRange = {}): Promise<CostSummary> {
    const rows = await this.requests.summarizeCosts(accountSlug, range);

    const totals = emptyTotals();
    const byInstance = new Map<string | null, CostTotals & { instanceSlug: string | null }>();
    const byModel = new Map<string, CostTotals & { model: string }>();

    for (const row of rows) {
      addRow(totals, row);

      const instanceEntry = byInstance.get(row.agentInstanceSlug) ?? {
        instanceSlug: row.agentInstanceSlug,
        ...emptyTotals(),
      };
      addRow(instanceEntry, row);
      byInstance.set(row.agentInstanceSlug, instanceEntry);

      const modelEntry = byModel.get(row.model) ?? { model: row.model, ...emptyTotals() };
      addRow(modelEntry, row);
      byModel.set(row.model, modelEntry);
    }

    return {
      accountSlug,
      from: range.from ? range.from.toISOString() : null,
      to: range.to ? range.to.toISOString() : null,
      totals,
      byInstance: Array.from(byInstance.values()).sort((a, b) => b.totalCost - a.totalCost),
      byModel: Array.from(byModel.values()).sort((a, b) => b.totalCost - a.totalCost),
    };
  }
}
