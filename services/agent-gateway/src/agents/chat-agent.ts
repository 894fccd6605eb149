import {
  addProviderCost,
  addUsage,
  ChatCompletionRequest,
  ChatCompletionResult,
  emptyUsage,
  LlmClient,
} from '../clients/llm-client.js';
import { LlmProviderError, errorMessage } from '../errors/index.js';
import { AgentInstance, ChatMessage, MessageRole, ModelSettings, ProviderCost, TokenUsage, ToolCall } from '../types/index.js';
import { buildSystemPrompt } from './prompt-builder.js';
import { AgentTool, ToolContext } from './tools/types.js';

export interface HistoryMessage {
  role: MessageRole;
  content: string;
}

/** Running totals of a turn, reported after every completed round. */
export interface TurnTotals {
  usage: TokenUsage;
  providerCost: ProviderCost | null;
  rounds: number;
}

export interface AgentRunInput {
  message: string;
  history: HistoryMessage[];
  sessionId: string;
  onRound?: (totals: TurnTotals) => void;
}

export interface ExecutedToolCall {
  id: string;
  name: string;
  arguments: string;
  output: string;
}

export interface AgentRunResult {
  content: string;
  model: string;
  responseId: string | null;
  finishReason: string | null;
  usage: TokenUsage;
  providerCost: ProviderCost | null;
  /** Number of completion calls made for this turn. */
  rounds: number;
  toolCalls: ExecutedToolCall[];
  /** Conversation as sent on the last call, tool exchanges included. */
  requestMessages: ChatMessage[];
}

export type AgentStreamEvent = { type: 'chunk'; content: string } | { type: 'done'; result: AgentRunResult };

export interface ChatAgentOptions {
  instance: AgentInstance;
  llm: LlmClient;
  modelSettings: ModelSettings;
  tools: AgentTool[];
  maxToolRounds: number;
}

interface TurnState {
  messages: ChatMessage[];
  usage: TokenUsage;
  providerCost: ProviderCost | null;
  toolCalls: ExecutedToolCall[];
  rounds: number;
  onRound?: (totals: TurnTotals) => void;
}

/**
 * One configured agent instance. Holds its prompt, model settings and tools;
 * conversation state lives in the caller's message history.
 */
export class ChatAgent {
  readonly instance: AgentInstance;
  readonly systemPrompt: string;
  readonly modelSettings: ModelSettings;
  private readonly llm: LlmClient;
  private readonly tools: Map<string, AgentTool>;
  private readonly maxToolRounds: number;

  constructor(options: ChatAgentOptions) {
    this.instance = options.instance;
    this.llm = options.llm;
    this.modelSettings = options.modelSettings;
    this.tools = new Map(options.tools.map(tool => [tool.definition.name, tool]));
    this.maxToolRounds = Math.max(0, options.maxToolRounds);
    this.systemPrompt = buildSystemPrompt(options.instance, options.tools);
  }

  get provider(): string {
    return this.llm.provider;
  }

  get toolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  async run(input: AgentRunInput): Promise<AgentRunResult> {
    const state = this.startTurn(input);

    for (;;) {
      const withTools = this.toolsAvailable(state.rounds);
      const result = await this.llm.complete(this.buildRequest(state.messages, withTools));
      this.recordRound(state, result);

      if (!withTools || result.toolCalls.length === 0) {
        return this.finish(state, result);
      }
      await this.resolveToolCalls(state, result, input.sessionId);
    }
  }

  async *runStream(input: AgentRunInput): AsyncGenerator<AgentStreamEvent> {
    const state = this.startTurn(input);

    for (;;) {
      const withTools = this.toolsAvailable(state.rounds);
      let result: ChatCompletionResult | null = null;

      for await (const event of this.llm.stream(this.buildRequest(state.messages, withTools))) {
        if (event.type === 'delta') {
          yield { type: 'chunk', content: event.content };
        } else {
          result = event.result;
        }
      }
      if (!result) {
        throw new LlmProviderError('Stream ended without a completion result');
      }
      this.recordRound(state, result);

      if (!withTools || result.toolCalls.length === 0) {
        yield { type: 'done', result: this.finish(state, result) };
        return;
      }
      await this.resolveToolCalls(state, result, input.sessionId);
    }
  }

  private startTurn(input: AgentRunInput): TurnState {
    const history: ChatMessage[] = input.history
      .filter(item => item.role === 'user' || item.role === 'assistant')
      .map(item => ({ role: item.role, content: item.content }));

    return {
      messages: [{ role: 'system', content: this.systemPrompt }, ...history, { role: 'user', content: input.message }],
      usage: emptyUsage(),
      providerCost: null,
      toolCalls: [],
      rounds: 0,
      onRound: input.onRound,
    };
  }

  /** Tools are offered until the round limit; the call after that must answer in text. */
  private toolsAvailable(rounds: number): boolean {
    return this.tools.size > 0 && rounds < this.maxToolRounds;
  }

  private buildRequest(messages: ChatMessage[], withTools: boolean): ChatCompletionRequest {
    return {
      model: this.modelSettings.model,
      temperature: this.modelSettings.temperature,
      maxTokens: this.modelSettings.maxTokens,
      messages: [...messages],
      tools: withTools ? Array.from(this.tools.values()).map(tool => tool.definition) : undefined,
    };
  }

  private recordRound(state: TurnState, result: ChatCompletionResult): void {
    state.rounds += 1;
    state.usage = addUsage(state.usage, result.usage);
    state.providerCost = addProviderCost(state.providerCost, result.providerCost);
    state.onRound?.({ usage: state.usage, providerCost: state.providerCost, rounds: state.rounds });
  }

  private async resolveToolCalls(state: TurnState, result: ChatCompletionResult, sessionId: string): Promise<void> {
    state.messages.push({
      role: 'assistant',
      content: result.content.length > 0 ? result.content : null,
      toolCalls: result.toolCalls,
    });

    const context: ToolContext = { instance: this.instance, sessionId };
    for (const call of result.toolCalls) {
      const output = await this.executeToolCall(call, context);
      state.toolCalls.push({ ...call, output });
      state.messages.push({ role: 'tool', content: output, toolCallId: call.id });
    }
  }

  /** Failures become the tool result so the model can recover in its next round. */
  private async executeToolCall(call: ToolCall, context: ToolContext): Promise<string> {
    const tool = this.tools.get(call.name);
    if (!tool) {
      console.warn(`[chat-agent] ${this.key()} requested unknown tool ${call.name}`);
      return `Error: unknown tool "${call.name}"`;
    }

    let args: unknown;
    try {
      args = call.arguments.trim().length > 0 ? JSON.parse(call.arguments) : {};
    } catch {
      return `Error: arguments for ${call.name} are not valid JSON`;
    }

    try {
      return await tool.execute(args, context);
    } catch (error) {
      console.error(`[chat-agent] Tool ${call.name} failed for ${this.key()}:`, error);
      return `Error: ${call.name} failed: ${errorMessage(error)}`;
    }
  }

  private finish(state: TurnState, result: ChatCompletionResult): AgentRunResult {
    return {
      content: result.content,
      model: result.model,
      responseId: result.id,
      finishReason: result.finishReason,
      usage: state.usage,
      providerCost: state.providerCost,
      rounds: state.rounds,
      toolCalls: state.toolCalls,
      requestMessages: state.messages,
    };
  }

  private key(): string {
    return `${this.instance.accountSlug}/${this.instance.instanceSlug}`;
  }
}
