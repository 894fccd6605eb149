import { ChatMessage, JsonObject, ProviderCost, TokenUsage, ToolCall, ToolDefinition } from '../types/index.js';

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  tools?: ToolDefinition[];
}

export interface ChatCompletionResult {
  id: string | null;
  model: string;
  content: string;
  toolCalls: ToolCall[];
  finishReason: string | null;
  usage: TokenUsage;
  providerCost: ProviderCost | null;
}

export type LlmStreamEvent =
  | { type: 'delta'; content: string }
  | { type: 'complete'; result: ChatCompletionResult };

/**
 * A chat-completions provider. `stream` yields content deltas and finishes
 * with one `complete` event carrying the accumulated result.
 */
export interface LlmClient {
  readonly provider: string;
  complete(request: ChatCompletionRequest): Promise<ChatCompletionResult>;
  stream(request: ChatCompletionRequest): AsyncGenerator<LlmStreamEvent>;
}

export function emptyUsage(): TokenUsage {
  return { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
}

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    promptTokens: a.promptTokens + b.promptTokens,
    completionTokens: a.completionTokens + b.completionTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  };
}

export function addProviderCost(a: ProviderCost | null, b: ProviderCost | null): ProviderCost | null {
  if (!a) return b;
  if (!b) return a;
  return {
    totalCost: a.totalCost + b.totalCost,
    promptCost: (a.promptCost ?? 0) + (b.promptCost ?? 0),
    completionCost: (a.completionCost ?? 0) + (b.completionCost ?? 0),
  };
}

/** Wire-format request body, also what gets stored on the llm_requests row. */
export function buildRequestBody(request: ChatCompletionRequest, stream: boolean): JsonObject {
  const body: JsonObject = {
    model: request.model,
    messages: request.messages.map(message => {
      const wire: JsonObject = { role: message.role, content: message.content };
      if (message.toolCalls && message.toolCalls.length > 0) {
        wire['tool_calls'] = message.toolCalls.map(call => ({
          id: call.id,
          type: 'function',
          function: { name: call.name, arguments: call.arguments },
        }));
      }
      if (message.toolCallId) {
        wire['tool_call_id'] = message.toolCallId;
      }
      return wire;
    }),
    temperature: request.temperature,
    max_tokens: request.maxTokens,
    usage: { include: true },
  };

  if (request.tools && request.tools.length > 0) {
    body['tools'] = request.tools.map(tool => ({
      type: 'function',
      function: { name: tool.name, description: tool.description, parameters: tool.parameters },
    }));
  }
  if (stream) {
    body['stream'] = true;
  }
  return body;
}
