import { z } from 'zod';
import { Embedder } from '../../clients/embedding-client.js';
import { VectorMatch, VectorStore } from '../../clients/vector-store.js';
import { VectorSearchConfig } from '../../config/cascade.js';
import { DEFAULT_VECTOR_NAMESPACE } from '../../config/config-specs.js';
import { AgentTool, ToolContext } from './types.js';

export const VECTOR_SEARCH_TOOL_NAME = 'vector_search';
export const NO_RESULTS_MESSAGE = 'No relevant information found.';

const argumentsSchema = z.object({
  query: z.string().trim().min(1).max(1000),
  max_results: z.number().int().min(1).max(20).optional(),
});

export interface VectorSearchDependencies {
  embedder: Embedder;
  vectorStore: VectorStore;
}

function metadataString(match: VectorMatch, key: string): string | null {
  const value = match.metadata[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

export function formatMatches(matches: VectorMatch[]): string {
  if (matches.length === 0) {
    return NO_RESULTS_MESSAGE;
  }

  const sections = matches.map((match, i) => {
    const title = metadataString(match, 'title') ?? 'Untitled';
    const lines = [`${i + 1}. ${title} (relevance: ${match.score.toFixed(2)})`];
    const text = metadataString(match, 'text');
    if (text) lines.push(text);
    const url = metadataString(match, 'url');
    if (url) lines.push(`Source: ${url}`);
    return lines.join('\n');
  });

  return `Found ${matches.length} relevant result(s):\n\n${sections.join('\n\n')}`;
}

/**
 * Namespace to search: the configured one, else the account slug under
 * isolation, else the index default (null).
 */
export function targetNamespace(config: VectorSearchConfig, accountSlug: string): string | null {
  if (config.namespace !== DEFAULT_VECTOR_NAMESPACE) {
    return config.namespace;
  }
  return config.namespaceIsolation ? accountSlug : null;
}

/**
 * Knowledge-base search over the account's vectors. With namespace isolation
 * each account only ever sees its own namespace.
 */
export function createVectorSearchTool(deps: VectorSearchDependencies, config: VectorSearchConfig): AgentTool {
  return {
    definition: {
      name: VECTOR_SEARCH_TOOL_NAME,
      description: 'Search the knowledge base for passages relevant to the user question.',
      parameters: {
        type: 'object',
        properties: {
          query: { type: 'string', description: 'Natural-language search query' },
          max_results: {
            type: 'integer',
            minimum: 1,
            maximum: 20,
            description: `Number of passages to return (default ${config.maxResults})`,
          },
        },
        required: ['query'],
      },
    },
    promptGuidance:
      'You can search the knowledge base with the vector_search tool. Use it for questions about products, policies or documentation, and base your answer on the passages it returns. If nothing relevant is found, say so instead of guessing.',

    async execute(args: unknown, context: ToolContext): Promise<string> {
      const parsed = argumentsSchema.safeParse(args);
      if (!parsed.success) {
        return `Invalid arguments for ${VECTOR_SEARCH_TOOL_NAME}: ${parsed.error.issues.map(issue => issue.message).join('; ')}`;
      }

      const topK = Math.min(parsed.data.max_results ?? config.maxResults, config.maxResults);
      const namespace = targetNamespace(config, context.instance.accountSlug);
      const vector = await deps.embedder.embed(parsed.data.query);
      const matches = await deps.vectorStore.query({ vector, topK, namespace, indexName: config.indexName });
      const relevant = matches.filter(match => match.score >= config.similarityThreshold);

      console.log(
        `[vector-search] ${context.instance.accountSlug}/${context.instance.instanceSlug}: ${relevant.length}/${matches.length} match(es) above ${config.similarityThreshold}`
      );
      return formatMatches(relevant);
    },
  };
}
