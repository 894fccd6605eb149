import { AgentRunInput, AgentRunResult, ChatAgent, TurnTotals } from '../agents/chat-agent.js';
import { cascadeContextFor } from '../agents/tools/registry.js';
import { buildRequestBody, emptyUsage } from '../clients/llm-client.js';
import { AppConfig } from '../config/app-config.js';
import { ConfigCascade } from '../config/cascade.js';
import { ClientDisconnectedError, ValidationError, errorMessage, isGatewayError } from '../errors/index.js';
import { CompletionStatus, CostBreakdown, JsonObject, MessageRecord, Session, TokenUsage } from '../types/index.js';
import { CostCalculator } from './cost-calculator.js';
import { LlmRequestTracker } from './llm-request-tracker.js';
import { MessageService } from './message-service.js';
import { agentKey, PoolManager } from './pool-manager.js';
import { SessionService } from './session-service.js';

export interface ChatTurnInput {
  accountSlug: string;
  instanceSlug: string;
  message: unknown;
  session: Session | null;
}

/** Everything resolved before the first LLM call; the route sets the cookie from `session`. */
export interface PreparedTurn {
  agent: ChatAgent;
  session: Session;
  replacedSession: boolean;
  message: string;
  history: MessageRecord[];
}

export interface ChatTurnResult {
  response: string;
  sessionId: string;
  llmRequestId: string | null;
  model: string;
  usage: TokenUsage;
  cost: CostBreakdown;
}

export type ChatStreamEvent = { type: 'chunk'; content: string } | { type: 'done'; data: ChatTurnResult };

export interface ChatServiceDependencies {
  pools: PoolManager;
  sessions: SessionService;
  messages: MessageService;
  tracker: LlmRequestTracker;
  costs: CostCalculator;
  cascade: ConfigCascade;
  chatConfig: AppConfig['chat'];
  now?: () => number;
}

class TurnProgress {
  totals: TurnTotals | null = null;

  update(totals: TurnTotals): void {
    this.totals = totals;
  }
}

/**
 * Runs chat turns end to end: agent lookup, session isolation, history,
 * the LLM call, cost attribution and persistence.
 */
export class ChatService {
  private readonly deps: ChatServiceDependencies;
  private readonly now: () => number;

  constructor(deps: ChatServiceDependencies) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  validateMessage(message: unknown): string {
    if (typeof message !== 'string' || message.trim().length === 0) {
      throw new ValidationError('message is required and must be a non-empty string');
    }
    const maxLength = this.deps.chatConfig.max_message_length;
    if (message.length > maxLength) {
      throw new ValidationError(`message exceeds the maximum length of ${maxLength} characters`, {
        maxLength,
        length: message.length,
      });
    }
    return message.trim();
  }

  async prepareTurn(input: ChatTurnInput): Promise<PreparedTurn> {
    const message = this.validateMessage(input.message);
    const agent = await this.deps.pools.acquireAgent(input.accountSlug, input.instanceSlug);
    const { session, replaced } = await this.deps.sessions.resolveChatSession(input.session, agent.instance);

    const historyLimit = await this.deps.cascade.getHistoryLimit(cascadeContextFor(agent.instance));
    const history = await this.deps.messages.getRecentContext(session.id, historyLimit);

    return { agent, session, replacedSession: replaced, message, history };
  }

  async chat(input: ChatTurnInput): Promise<ChatTurnResult & { session: Session }> {
    const turn = await this.prepareTurn(input);
    const result = await this.runTurn(turn);
    return { ...result, session: turn.session };
  }

  async runTurn(turn: PreparedTurn): Promise<ChatTurnResult> {
    const started = this.now();
    const progress = new TurnProgress();
    let result: AgentRunResult;
    try {
      result = await turn.agent.run(this.runInput(turn, progress));
    } catch (error) {
      await this.recordFailure(turn, started, progress, '', false, error);
      throw error;
    }
    return this.completeTurn(turn, result, started, false);
  }

  /**
   * Streams a turn. A consumer that stops early (client disconnect) still
   * leaves an llm_requests row for the rounds already paid for.
   */
  async *streamTurn(turn: PreparedTurn): AsyncGenerator<ChatStreamEvent> {
    const started = this.now();
    const progress = new TurnProgress();
    let streamed = '';
    let settled = false;
    try {
      for await (const event of turn.agent.runStream(this.runInput(turn, progress))) {
        if (event.type === 'chunk') {
          streamed += event.content;
          yield event;
        } else {
          const data = await this.completeTurn(turn, event.result, started, true);
          settled = true;
          yield { type: 'done', data };
        }
      }
    } catch (error) {
      settled = true;
      await this.recordFailure(turn, started, progress, streamed, true, error);
      throw error;
    } finally {
      if (!settled) {
        await this.recordFailure(turn, started, progress, streamed, true, new ClientDisconnectedError());
      }
    }
  }

  private runInput(turn: PreparedTurn, progress: TurnProgress): AgentRunInput {
    return {
      message: turn.message,
      history: turn.history.map(record => ({ role: record.role, content: record.content })),
      sessionId: turn.session.id,
      onRound: totals => progress.update(totals),
    };
  }

  private async completeTurn(
    turn: PreparedTurn,
    result: AgentRunResult,
    started: number,
    stream: boolean
  ): Promise<ChatTurnResult> {
    const latencyMs = this.now() - started;
    const { agent, session } = turn;
    const cost = this.deps.costs.calculate(result.model, result.usage, result.providerCost);

    const llmRequestId = await this.deps.tracker.track({
      sessionId: session.id,
      instance: agent.instance,
      provider: agent.provider,
      model: result.model,
      requestBody: this.requestBody(agent, result.requestMessages, stream),
      responseBody: {
        id: result.responseId,
        model: result.model,
        content: result.content,
        finish_reason: result.finishReason,
        rounds: result.rounds,
        tool_calls: result.toolCalls.map(call => ({ id: call.id, name: call.name, arguments: call.arguments })),
      },
      usage: result.usage,
      cost,
      latencyMs,
      completionStatus: 'complete',
    });

    const response = result.content.length > 0 ? result.content : 'I was unable to generate a response. Please try again.';
    await this.deps.messages.saveMessagePair({
      sessionId: session.id,
      agentInstanceId: agent.instance.id,
      userMessage: turn.message,
      assistantMessage: response,
      llmRequestId,
      meta: { model: result.model, stream, toolCalls: result.toolCalls.map(call => call.name) },
    });
    await this.deps.sessions.updateLastActivity(session.id);
    this.deps.pools.recordResult(this.key(agent), latencyMs, false);

    return { response, sessionId: session.id, llmRequestId, model: result.model, usage: result.usage, cost };
  }

  /**
   * Failed turns still leave an llm_requests row; partial when text had already
   * streamed. Rounds completed before the failure keep their usage and cost.
   */
  private async recordFailure(
    turn: PreparedTurn,
    started: number,
    progress: TurnProgress,
    partialContent: string,
    stream: boolean,
    error: unknown
  ): Promise<void> {
    const latencyMs = this.now() - started;
    const { agent, session } = turn;
    const status: CompletionStatus = partialContent.length > 0 ? 'partial' : 'error';
    console.error(`[chat-service] Turn failed for ${this.key(agent)} (${status}):`, errorMessage(error));

    const model = agent.modelSettings.model;
    const totals = progress.totals;
    const cost: CostBreakdown = totals
      ? this.deps.costs.calculate(model, totals.usage, totals.providerCost)
      : { promptCost: 0, completionCost: 0, totalCost: 0, method: 'unpriced' };

    await this.deps.tracker.track({
      sessionId: session.id,
      instance: agent.instance,
      provider: agent.provider,
      model,
      requestBody: this.requestBody(agent, [{ role: 'user', content: turn.message }], stream),
      responseBody: {
        content: partialContent,
        error: errorMessage(error),
        code: isGatewayError(error) ? error.code : null,
        rounds: totals?.rounds ?? 0,
      },
      usage: totals?.usage ?? emptyUsage(),
      cost,
      latencyMs,
      completionStatus: status,
    });
    this.deps.pools.recordResult(this.key(agent), latencyMs, true);
  }

  private requestBody(agent: ChatAgent, messages: AgentRunResult['requestMessages'], stream: boolean): JsonObject {
    return buildRequestBody(
      {
        model: agent.modelSettings.model,
        temperature: agent.modelSettings.temperature,
        maxTokens: agent.modelSettings.maxTokens,
        messages,
      },
      stream
    );
  }

  private key(agent: ChatAgent): string {
    return agentKey(agent.instance.accountSlug, agent.instance.instanceSlug);
  }
}
