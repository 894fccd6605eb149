import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ConfigurationError, LlmProviderError } from '../errors/index.js';

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

const embeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
});

export interface EmbeddingClientOptions {
  apiKey: string | null;
  baseUrl: string;
  model: string;
  timeoutMs?: number;
}

/**
 * Client for an OpenAI-compatible `/embeddings` endpoint.
 */
export class EmbeddingClient implements Embedder {
  private readonly client: AxiosInstance;
  private readonly apiKey: string | null;
  private readonly model: string;

  constructor(options: EmbeddingClientOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? 30000,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  async embed(text: string): Promise<number[]> {
    if (!this.apiKey) {
      throw new ConfigurationError('EMBEDDING_API_KEY is not configured');
    }

    let data: unknown;
    try {
      const response = await this.client.post<unknown>(
        '/embeddings',
        { model: this.model, input: text },
        { headers: { Authorization: `Bearer ${this.apiKey}` } }
      );
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new LlmProviderError(`Embedding request failed: ${error.message}`, error.response?.status);
      }
      throw error;
    }

    const parsed = embeddingResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new LlmProviderError('Malformed embedding response');
    }
    return parsed.data.data[0].embedding;
  }
}
