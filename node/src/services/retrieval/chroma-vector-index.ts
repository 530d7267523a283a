// node/src/services/retrieval/chroma-vector-index.ts: Chroma HTTP API client behind the VectorIndex contract
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger, errorMessage } from '@/services/logger';
import { VectorIndexError } from '@/utils/errors';
import { clamp01 } from './vector-utils';
import type { VectorIndex, VectorItem, VectorMatch, VectorMetadata, VectorQuery } from './vector-index';

const log = logger.getSubLogger({ name: 'chroma' });

export interface ChromaVectorIndexOptions {
  baseUrl: string;
  collection: string;
  tenant?: string;
  database?: string;
  timeoutMs?: number;
  /** Upsert batch size; Chroma rejects very large payloads. */
  batchSize?: number;
}

const collectionSchema = z.object({ id: z.string(), name: z.string() });

const queryResponseSchema = z.object({
  ids: z.array(z.array(z.string())),
  distances: z.array(z.array(z.number().nullable())).nullable().optional(),
});

type ChromaWhere = Record<string, unknown>;

/** Chroma needs `$and` once there is more than one condition. */
export function toChromaWhere(where: VectorMetadata | undefined): ChromaWhere | undefined {
  if (!where) return undefined;
  const clauses = Object.entries(where).map(([k, v]) => ({ [k]: { $eq: v } }));
  if (clauses.length === 0) return undefined;
  if (clauses.length === 1) return clauses[0];
  return { $and: clauses };
}

export class ChromaVectorIndex implements VectorIndex {
  readonly name = 'chroma';
  private readonly http: AxiosInstance;
  private readonly basePath: string;
  private collectionId: string | null = null;

  constructor(private readonly options: ChromaVectorIndexOptions) {
    this.http = axios.create({
      baseURL: options.baseUrl.replace(/\/+$/, ''),
      timeout: options.timeoutMs ?? 10000,
      headers: { 'Content-Type': 'application/json' },
    });
    const tenant = encodeURIComponent(options.tenant ?? 'default_tenant');
    const database = encodeURIComponent(options.database ?? 'default_database');
    this.basePath = `/api/v2/tenants/${tenant}/databases/${database}/collections`;
  }

  /** Gets or creates the collection and remembers its id. */
  async connect(): Promise<void> {
    try {
      const { data } = await this.http.post(this.basePath, {
        name: this.options.collection,
        get_or_create: true,
        metadata: { description: 'Customer reviews with embeddings', 'hnsw:space': 'cosine' },
      });
      const collection = collectionSchema.parse(data);
      this.collectionId = collection.id;
      log.info('chroma:connected', { collection: collection.name, id: collection.id });
    } catch (err) {
      throw new VectorIndexError(`Chroma connect failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private collectionPath(): string {
    if (!this.collectionId) {
      throw new VectorIndexError('Chroma collection not initialized; call connect() first');
    }
    return `${this.basePath}/${this.collectionId}`;
  }

  async query(q: VectorQuery): Promise<VectorMatch[]> {
    if (q.k <= 0) return [];
    if (q.ids && q.ids.length === 0) return [];

    const body: Record<string, unknown> = {
      query_embeddings: [q.vector],
      n_results: q.k,
      include: ['distances'],
    };
    const where = toChromaWhere(q.where);
    if (where) body.where = where;
    if (q.ids) body.ids = q.ids;

    try {
      const { data } = await this.http.post(`${this.collectionPath()}/query`, body);
      const parsed = queryResponseSchema.parse(data);
      const ids = parsed.ids[0] ?? [];
      const distances = parsed.distances?.[0] ?? [];
      return ids.map((id, i) => ({ id, similarity: clamp01(1 - (distances[i] ?? 1)) }));
    } catch (err) {
      if (err instanceof VectorIndexError) throw err;
      throw new VectorIndexError(`Chroma query failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async upsert(items: readonly VectorItem[]): Promise<void> {
    const batchSize = this.options.batchSize ?? 500;
    for (let start = 0; start < items.length; start += batchSize) {
      const batch = items.slice(start, start + batchSize);
      try {
        await this.http.post(`${this.collectionPath()}/upsert`, {
          ids: batch.map((i) => i.id),
          embeddings: batch.map((i) => i.vector),
          documents: batch.map((i) => i.document ?? ''),
          metadatas: batch.map((i) => i.metadata ?? {}),
        });
        log.debug('chroma:upsert_batch', { start, size: batch.length });
      } catch (err) {
        throw new VectorIndexError(`Chroma upsert failed: ${errorMessage(err)}`, { cause: err });
      }
    }
  }

  async count(): Promise<number> {
    try {
      const { data } = await this.http.get(`${this.collectionPath()}/count`);
      return z.number().int().nonnegative().parse(data);
    } catch (err) {
      throw new VectorIndexError(`Chroma count failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
