import { Pinecone } from '@pinecone-database/pinecone';

export type VectorMetadata = Record<string, string | number | boolean | string[]>;

export interface VectorRecord {
  id: string;
  values: number[];
  metadata: VectorMetadata;
}

export interface VectorMatch {
  id: string;
  score: number;
  metadata: Record<string, unknown>;
}

export interface VectorQuery {
  vector: number[];
  topK: number;
  /** null targets the index's default namespace. */
  namespace: string | null;
  /** Index to search; the store's default index when omitted. */
  indexName?: string;
}

export interface VectorStore {
  query(query: VectorQuery): Promise<VectorMatch[]>;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Brute-force cosine search over records held in memory, one list per
 * index and namespace. Records are loaded with `add`.
 */
export class InMemoryVectorStore implements VectorStore {
  private readonly collections = new Map<string, VectorRecord[]>();

  constructor(private readonly defaultIndexName: string = 'agent-gateway') {}

  async query(query: VectorQuery): Promise<VectorMatch[]> {
    const records = this.collections.get(this.key(query.indexName, query.namespace)) ?? [];
    return records
      .map(record => ({ id: record.id, score: cosineSimilarity(query.vector, record.values), metadata: { ...record.metadata } }))
      .sort((a, b) => b.score - a.score)
      .slice(0, query.topK);
  }

  /** Inserts records, replacing any with the same id. */
  add(namespace: string | null, records: VectorRecord[], indexName?: string): void {
    const key = this.key(indexName, namespace);
    const existing = this.collections.get(key) ?? [];
    for (const record of records) {
      const index = existing.findIndex(item => item.id === record.id);
      if (index >= 0) {
        existing[index] = record;
      } else {
        existing.push(record);
      }
    }
    this.collections.set(key, existing);
  }

  private key(indexName: string | undefined, namespace: string | null): string {
    return `${indexName ?? this.defaultIndexName}/${namespace ?? ''}`;
  }
}

export class PineconeVectorStore implements VectorStore {
  private readonly client: Pinecone;
  private readonly defaultIndexName: string;

  constructor(apiKey: string, defaultIndexName: string) {
    this.client = new Pinecone({ apiKey });
    this.defaultIndexName = defaultIndexName;
  }

  async query(query: VectorQuery): Promise<VectorMatch[]> {
    const index = this.client.index(query.indexName ?? this.defaultIndexName);
    const target = query.namespace ? index.namespace(query.namespace) : index;
    const response = await target.query({ vector: query.vector, topK: query.topK, includeMetadata: true });
    return response.matches.map(match => ({
      id: match.id,
      score: match.score ?? 0,
      metadata: match.metadata ? { ...match.metadata } : {},
    }));
  }
}
