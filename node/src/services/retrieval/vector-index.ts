// node/src/services/retrieval/vector-index.ts: vector index contract plus an in-process implementation
import { cosineSimilarity, clamp01, type Embedding } from './vector-utils';

export type VectorMetadata = Record<string, string | number>;

export interface VectorMatch {
  id: string;
  /** Similarity in [0, 1]. */
  similarity: number;
}

export interface VectorQuery {
  vector: Embedding;
  k: number;
  /** Search only within these ids. */
  ids?: readonly string[];
  /** Exact-match metadata filter. */
  where?: VectorMetadata;
}

export interface VectorItem {
  id: string;
  vector: Embedding;
  document?: string;
  metadata?: VectorMetadata;
}

export interface VectorIndex {
  readonly name: string;
  query(q: VectorQuery): Promise<VectorMatch[]>;
  upsert(items: readonly VectorItem[]): Promise<void>;
  count(): Promise<number>;
}

function matchesWhere(metadata: VectorMetadata | undefined, where: VectorMetadata | undefined): boolean {
  if (!where) return true;
  if (!metadata) return false;
  return Object.entries(where).every(([k, v]) => metadata[k] === v);
}

/** Brute-force cosine index for development and tests. */
export class InMemoryVectorIndex implements VectorIndex {
  readonly name = 'in-memory';
  private readonly items = new Map<string, VectorItem>();

  async query(q: VectorQuery): Promise<VectorMatch[]> {
    if (q.k <= 0) return [];
    const restrict = q.ids ? new Set(q.ids) : null;

    const scored: VectorMatch[] = [];
    for (const item of this.items.values()) {
      if (restrict && !restrict.has(item.id)) continue;
      if (!matchesWhere(item.metadata, q.where)) continue;
      scored.push({ id: item.id, similarity: clamp01(cosineSimilarity(q.vector, item.vector)) });
    }

    scored.sort((a, b) => b.similarity - a.similarity);
    return scored.slice(0, q.k);
  }

  async upsert(items: readonly VectorItem[]): Promise<void> {
    for (const item of items) {
      this.items.set(item.id, { ...item, vector: [...item.vector] });
    }
  }

  async count(): Promise<number> {
    return this.items.size;
  }
}
