// node/src/services/cache/semantic-cache.ts: answer cache keyed by question similarity
//
// Each entry (question, embedding, answer, context count, timestamp) is written as a single value
// so a concurrent lookup sees either the whole entry or nothing. Lookup is a linear scan over the
// live entries in the namespace; the best cosine match at or above the threshold is a hit.
import { createHash } from 'crypto';
import { z } from 'zod';
import { logger, errorMessage } from '@/services/logger';
import { cosineSimilarity, type Embedder, type Embedding } from '@/services/retrieval/vector-utils';
import type { KeyValueStore } from './kv-store';

const log = logger.getSubLogger({ name: 'cache' });

export interface CacheEntry {
  question: string;
  answer: string;
  embedding: Embedding;
  contextCount: number;
  /** Epoch millis. */
  createdAt: number;
}

export type CacheLookupResult =
  | { hit: true; entry: CacheEntry; similarity: number; key: string }
  | { hit: false; bestSimilarity: number | null };

export interface CacheStats {
  entryCount: number;
  oldestEntryTime: string | null;
  newestEntryTime: string | null;
  similarityThreshold: number;
  ttlSeconds: number;
  store: string;
  error?: string;
}

export interface SemanticCacheOptions {
  similarityThreshold?: number;
  ttlSeconds?: number;
  namespace?: string;
  now?: () => number;
}

const storedEntrySchema = z.object({
  question: z.string(),
  answer: z.string(),
  embedding: z.array(z.number()),
  contextCount: z.number().int().nonnegative(),
  createdAt: z.string().datetime(),
});

type StoredEntry = z.infer<typeof storedEntrySchema>;

export function normalizeQuestion(question: string): string {
  return question.trim().toLowerCase().replace(/\s+/g, ' ');
}

export class SemanticCache {
  readonly similarityThreshold: number;
  readonly ttlSeconds: number;
  private readonly prefix: string;
  private readonly now: () => number;

  constructor(
    private readonly kv: KeyValueStore,
    private readonly embedder: Embedder,
    options: SemanticCacheOptions = {},
  ) {
    this.similarityThreshold = options.similarityThreshold ?? 0.95;
    this.ttlSeconds = options.ttlSeconds ?? 24 * 3600;
    this.prefix = `${options.namespace ?? 'review_cache'}:`;
    this.now = options.now ?? Date.now;
  }

  keyFor(question: string): string {
    const digest = createHash('sha256').update(normalizeQuestion(question)).digest('hex').slice(0, 16);
    return `${this.prefix}${digest}`;
  }

  async lookup(question: string): Promise<CacheLookupResult> {
    let queryEmbedding: Embedding;
    try {
      queryEmbedding = await this.embedder.embed(question);
    } catch (err) {
      log.error('cache:embed_failed', { error: errorMessage(err) });
      return { hit: false, bestSimilarity: null };
    }

    let live: Array<{ key: string; entry: CacheEntry }>;
    try {
      live = await this.liveEntries();
    } catch (err) {
      log.error('cache:lookup_failed', { store: this.kv.name, error: errorMessage(err) });
      return { hit: false, bestSimilarity: null };
    }

    let best: { key: string; entry: CacheEntry; similarity: number } | null = null;
    for (const candidate of live) {
      const similarity = cosineSimilarity(queryEmbedding, candidate.entry.embedding);
      // strict '>' keeps the first entry on ties
      if (best === null || similarity > best.similarity) {
        best = { ...candidate, similarity };
      }
    }

    if (best && best.similarity >= this.similarityThreshold) {
      log.info('cache:hit', {
        similarity: Number(best.similarity.toFixed(4)),
        original: best.entry.question,
        query: question,
      });
      return { hit: true, entry: best.entry, similarity: best.similarity, key: best.key };
    }

    log.debug('cache:miss', {
      bestSimilarity: best ? Number(best.similarity.toFixed(4)) : null,
      threshold: this.similarityThreshold,
    });
    return { hit: false, bestSimilarity: best ? best.similarity : null };
  }

  /** Never throws: caching is an optimization. */
  async store(question: string, answer: string, contextCount: number): Promise<void> {
    try {
      const embedding = await this.embedder.embed(question);
      const key = this.keyFor(question);
      const value: StoredEntry = {
        question,
        answer,
        embedding,
        contextCount,
        createdAt: new Date(this.now()).toISOString(),
      };
      await this.kv.put(key, JSON.stringify(value), this.ttlSeconds);
      log.info('cache:stored', { key, question });
    } catch (err) {
      log.error('cache:store_failed', { store: this.kv.name, error: errorMessage(err) });
    }
  }

  async clear(): Promise<number> {
    try {
      const keys = await this.kv.scanKeys(this.prefix);
      await Promise.all(keys.map((k) => this.kv.delete(k)));
      log.info(keys.length > 0 ? 'cache:cleared' : 'cache:already_empty', { count: keys.length });
      return keys.length;
    } catch (err) {
      log.error('cache:clear_failed', { store: this.kv.name, error: errorMessage(err) });
      return 0;
    }
  }

  async stats(): Promise<CacheStats> {
    const base = {
      similarityThreshold: this.similarityThreshold,
      ttlSeconds: this.ttlSeconds,
      store: this.kv.name,
    };
    try {
      const live = await this.liveEntries();
      const times = live.map((e) => e.entry.createdAt);
      return {
        ...base,
        entryCount: live.length,
        oldestEntryTime: times.length ? new Date(Math.min(...times)).toISOString() : null,
        newestEntryTime: times.length ? new Date(Math.max(...times)).toISOString() : null,
      };
    } catch (err) {
      log.error('cache:stats_failed', { store: this.kv.name, error: errorMessage(err) });
      return { ...base, entryCount: 0, oldestEntryTime: null, newestEntryTime: null, error: errorMessage(err) };
    }
  }

  /** Entries in scan order, skipping expired or unreadable ones. */
  private async liveEntries(): Promise<Array<{ key: string; entry: CacheEntry }>> {
    const keys = await this.kv.scanKeys(this.prefix);
    const raws = await Promise.all(keys.map((k) => this.kv.get(k)));
    const now = this.now();
    const out: Array<{ key: string; entry: CacheEntry }> = [];

    for (let i = 0; i < keys.length; i++) {
      const raw = raws[i];
      if (raw == null) continue;
      const entry = this.decode(keys[i], raw);
      if (!entry) continue;
      if (now >= entry.createdAt + this.ttlSeconds * 1000) {
        await this.evict(keys[i]);
        continue;
      }
      out.push({ key: keys[i], entry });
    }
    return out;
  }

  private decode(key: string, raw: string): CacheEntry | null {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      log.warn('cache:corrupt_entry', { key, error: errorMessage(err) });
      return null;
    }
    const parsed = storedEntrySchema.safeParse(json);
    if (!parsed.success) {
      log.warn('cache:invalid_entry', { key });
      return null;
    }
    return { ...parsed.data, createdAt: Date.parse(parsed.data.createdAt) };
  }

  private async evict(key: string): Promise<void> {
    try {
      await this.kv.delete(key);
      log.debug('cache:evicted_expired', { key });
    } catch (err) {
      log.warn('cache:evict_failed', { key, error: errorMessage(err) });
    }
  }
}
