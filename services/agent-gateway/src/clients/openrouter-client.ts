/**
 * OpenRouter chat-completions client.
 * Requests usage accounting so every response carries the provider-reported cost.
 */

import axios, { AxiosInstance } from 'axios';
import type { Readable } from 'stream';
import { z } from 'zod';
import { ConfigurationError, LlmProviderError } from '../errors/index.js';
import { ProviderCost, TokenUsage, ToolCall } from '../types/index.js';
import { isRecord } from '../utils/objects.js';
import {
  buildRequestBody,
  ChatCompletionRequest,
  ChatCompletionResult,
  emptyUsage,
  LlmClient,
  LlmStreamEvent,
} from './llm-client.js';

const usageSchema = z.object({
  prompt_tokens: z.number().default(0),
  completion_tokens: z.number().default(0),
  total_tokens: z.number().optional(),
  cost: z.number().optional(),
  cost_details: z
    .object({
      upstream_inference_prompt_cost: z.number().nullish(),
      upstream_inference_completions_cost: z.number().nullish(),
    })
    .nullish(),
});

const completionSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.string().default('') }),
              })
            )
            .nullish(),
        }),
        finish_reason: z.string().nullish(),
      })
    )
    .min(1),
  usage: usageSchema.nullish(),
});

const chunkSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  index: z.number(),
                  id: z.string().optional(),
                  function: z.object({ name: z.string().optional(), arguments: z.string().optional() }).optional(),
                })
              )
              .nullish(),
          })
          .default({}),
        finish_reason: z.string().nullish(),
      })
    )
    .default([]),
  usage: usageSchema.nullish(),
  error: z.object({ message: z.string() }).optional(),
});

type WireUsage = z.infer<typeof usageSchema>;

export function parseUsage(usage: WireUsage | null | undefined): { usage: TokenUsage; providerCost: ProviderCost | null } {
  if (!usage) {
    return { usage: emptyUsage(), providerCost: null };
  }
  const promptTokens = usage.prompt_tokens;
  const completionTokens = usage.completion_tokens;
  const providerCost: ProviderCost | null =
    usage.cost === undefined
      ? null
      : {
          totalCost: usage.cost,
          promptCost: usage.cost_details?.upstream_inference_prompt_cost ?? undefined,
          completionCost: usage.cost_details?.upstream_inference_completions_cost ?? undefined,
        };
  return {
    usage: { promptTokens, completionTokens, totalTokens: usage.total_tokens ?? promptTokens + completionTokens },
    providerCost,
  };
}

export function parseCompletion(data: unknown, requestedModel: string): ChatCompletionResult {
  const parsed = completionSchema.safeParse(data);
  if (!parsed.success) {
    throw new LlmProviderError(`Malformed completion response: ${parsed.error.message}`);
  }
  const choice = parsed.data.choices[0];
  const { usage, providerCost } = parseUsage(parsed.data.usage);
  return {
    id: parsed.data.id ?? null,
    model: parsed.data.model ?? requestedModel,
    content: choice.message.content ?? '',
    toolCalls: (choice.message.tool_calls ?? []).map(call => ({
      id: call.id,
      name: call.function.name,
      arguments: call.function.arguments,
    })),
    finishReason: choice.finish_reason ?? null,
    usage,
    providerCost,
  };
}

/**
 * Folds streamed `data:` payloads into a ChatCompletionResult. Tool-call
 * fragments are joined by their `index`.
 */
export class StreamAccumulator {
  private id: string | null = null;
  private model: string;
  private content = '';
  private finishReason: string | null = null;
  private usage: TokenUsage = emptyUsage();
  private providerCost: ProviderCost | null = null;
  private readonly toolCalls = new Map<number, ToolCall>();
  private pending = '';
  private done = false;

  constructor(requestedModel: string) {
    this.model = requestedModel;
  }

  /** Feeds raw bytes from the SSE body; returns the content deltas they completed. */
  pushText(text: string): string[] {
    this.pending += text;
    const lines = this.pending.split('\n');
    this.pending = lines.pop() ?? '';

    const deltas: string[] = [];
    for (const rawLine of lines) {
      const delta = this.pushLine(rawLine.trim());
      if (delta) deltas.push(delta);
    }
    return deltas;
  }

  get isDone(): boolean {
    return this.done;
  }

  result(): ChatCompletionResult {
    return {
      id: this.id,
      model: this.model,
      content: this.content,
      toolCalls: Array.from(this.toolCalls.entries())
        .sort(([a], [b]) => a - b)
        .map(([, call]) => call),
      finishReason: this.finishReason,
      usage: this.usage,
      providerCost: this.providerCost,
    };
  }

  private pushLine(line: string): string | null {
    // blank lines separate events; ':' lines are keep-alive comments
    if (!line.startsWith('data:')) return null;

    const payload = line.slice(5).trim();
    if (payload === '[DONE]') {
      this.done = true;
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(payload);
    } catch {
      console.warn('[openrouter] Skipping unparseable stream payload');
      return null;
    }

    const parsed = chunkSchema.safeParse(json);
    if (!parsed.success) return null;
    const chunk = parsed.data;

    if (chunk.error) {
      throw new LlmProviderError(`Stream error from provider: ${chunk.error.message}`);
    }
    if (chunk.id) this.id = chunk.id;
    if (chunk.model) this.model = chunk.model;
    if (chunk.usage) {
      const { usage, providerCost } = parseUsage(chunk.usage);
      this.usage = usage;
      this.providerCost = providerCost;
    }

    let delta: string | null = null;
    for (const choice of chunk.choices) {
      if (choice.finish_reason) this.finishReason = choice.finish_reason;
      if (choice.delta.content) {
        this.content += choice.delta.content;
        delta = (delta ?? '') + choice.delta.content;
      }
      for (const fragment of choice.delta.tool_calls ?? []) {
        const existing = this.toolCalls.get(fragment.index) ?? { id: '', name: '', arguments: '' };
        if (fragment.id) existing.id = fragment.id;
        if (fragment.function?.name) existing.name += fragment.function.name;
        if (fragment.function?.arguments) existing.arguments += fragment.function.arguments;
        this.toolCalls.set(fragment.index, existing);
      }
    }
    return delta;
  }
}

export interface OpenRouterClientOptions {
  apiKey: string | null;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  appTitle?: string;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export class OpenRouterClient implements LlmClient {
  readonly provider = 'openrouter';
  private readonly client: AxiosInstance;
  private readonly apiKey: string | null;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: OpenRouterClientOptions) {
    this.apiKey = options.apiKey;
    this.maxRetries = options.maxRetries ?? 2;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 500;
    this.sleep = options.sleep ?? defaultSleep;

    this.client = axios.create({
      baseURL: options.baseUrl ?? 'https://openrouter.ai/api/v1',
      timeout: options.timeoutMs ?? 60000,
      headers: {
        'Content-Type': 'application/json',
        'X-Title': options.appTitle ?? 'agent-gateway',
        'User-Agent': 'agent-gateway/1.0.0',
      },
    });

    // Add response interceptor for error logging
    this.client.interceptors.response.use(
      response => response,
      error => {
        if (axios.isAxiosError(error)) {
          console.error('[openrouter] API error:', {
            message: error.message,
            status: error.response?.status,
          });
        }
        return Promise.reject(error);
      }
    );
  }

  async complete(request: ChatCompletionRequest): Promise<ChatCompletionResult> {
    const body = buildRequestBody(request, false);
    const response = await this.withRetry(() =>
      this.client.post<unknown>('/chat/completions', body, { headers: this.authHeaders() })
    );
    return parseCompletion(response.data, request.model);
  }

  async *stream(request: ChatCompletionRequest): AsyncGenerator<LlmStreamEvent> {
    const body = buildRequestBody(request, true);
    const response = await this.withRetry(() =>
      this.client.post<Readable>('/chat/completions', body, {
        headers: { ...this.authHeaders(), Accept: 'text/event-stream' },
        responseType: 'stream',
      })
    );

    const accumulator = new StreamAccumulator(request.model);
    // decode on the stream so multi-byte characters split across chunks stay intact
    response.data.setEncoding('utf8');
    for await (const chunk of response.data) {
      const text = typeof chunk === 'string' ? chunk : '';
      for (const content of accumulator.pushText(text)) {
        yield { type: 'delta', content };
      }
      if (accumulator.isDone) break;
    }
    for (const content of accumulator.pushText('\n')) {
      yield { type: 'delta', content };
    }

    yield { type: 'complete', result: accumulator.result() };
  }

  private authHeaders(): Record<string, string> {
    if (!this.apiKey) {
      throw new ConfigurationError('OPENROUTER_API_KEY is not configured');
    }
    return { Authorization: `Bearer ${this.apiKey}` };
  }

  /** Retries 429, 5xx and network failures with exponential backoff. */
  private async withRetry<T>(call: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await call();
      } catch (error) {
        const providerError = toProviderError(error);
        if (!providerError) throw error;
        if (!providerError.retryable || attempt >= this.maxRetries) {
          throw providerError;
        }
        const delay = this.retryBaseDelayMs * 2 ** attempt;
        console.warn(`[openrouter] ${providerError.message}; retrying in ${delay}ms (attempt ${attempt + 1}/${this.maxRetries})`);
        await this.sleep(delay);
      }
    }
  }
}

function toProviderError(error: unknown): LlmProviderError | null {
  if (!axios.isAxiosError(error)) return null;

  const status = error.response?.status;
  const data: unknown = error.response?.data;
  const errorField = isRecord(data) ? data['error'] : undefined;
  const upstreamMessage = isRecord(errorField) ? errorField['message'] : undefined;
  const detail = typeof upstreamMessage === 'string' ? upstreamMessage : error.message;

  const retryable = status === undefined || status === 429 || status >= 500;
  return new LlmProviderError(
    status ? `OpenRouter request failed with status ${status}: ${detail}` : `OpenRouter request failed: ${detail}`,
    status,
    retryable
  );
}
