import { describe, it, expect, vi } from 'vitest';
import { SemanticCache, normalizeQuestion } from '@/services/cache/semantic-cache';
import { InMemoryKeyValueStore, type KeyValueStore } from '@/services/cache/kv-store';
import type { Embedder } from '@/services/retrieval/vector-utils';
import { StoreUnavailableError } from '@/utils/errors';

const START = Date.parse('2024-03-01T12:00:00.000Z');

// Exactly 0.95 and 0.949 cosine similarity against [1, 0].
const AT_THRESHOLD = [0.95, 0.31224989991991997];
const BELOW_THRESHOLD = [0.949, 0.3152760695010012];

function embedderFor(vectors: Record<string, number[]>): Embedder {
  return {
    embed: vi.fn(async (text: string) => vectors[text] ?? [0, 1]),
  };
}

function setup(vectors: Record<string, number[]>, ttlSeconds = 3600) {
  const clock = { t: START };
  const now = () => clock.t;
  const kv = new InMemoryKeyValueStore(now);
  const cache = new SemanticCache(kv, embedderFor(vectors), { ttlSeconds, now });
  return { clock, kv, cache };
}

class FailingStore implements KeyValueStore {
  readonly name = 'failing';
  async put(): Promise<void> {
    throw new StoreUnavailableError('redis unreachable');
  }
  async get(): Promise<string | null> {
    throw new StoreUnavailableError('redis unreachable');
  }
  async delete(): Promise<void> {
    throw new StoreUnavailableError('redis unreachable');
  }
  async scanKeys(): Promise<string[]> {
    throw new StoreUnavailableError('redis unreachable');
  }
  isAvailable(): boolean {
    return false;
  }
}

describe('normalizeQuestion / keyFor', () => {
  it('collapses case and whitespace before hashing', () => {
    const { cache } = setup({});
    expect(normalizeQuestion('  How   long are\tthe QUEUES? ')).toBe('how long are the queues?');
    expect(cache.keyFor('How long are the queues?')).toBe(cache.keyFor('  how LONG are   the queues?'));
    expect(cache.keyFor('anything')).toMatch(/^review_cache:[0-9a-f]{16}$/);
  });
});

describe('SemanticCache', () => {
  it('returns a stored answer for the same question', async () => {
    const { cache } = setup({ 'Are the rides fun?': [1, 0] });
    await cache.store('Are the rides fun?', 'Mostly, yes.', 3);

    const result = await cache.lookup('Are the rides fun?');

    expect(result.hit).toBe(true);
    if (!result.hit) return;
    expect(result.similarity).toBe(1);
    expect(result.entry).toEqual({
      question: 'Are the rides fun?',
      answer: 'Mostly, yes.',
      embedding: [1, 0],
      contextCount: 3,
      createdAt: START,
    });
    expect(result.key).toBe(cache.keyFor('Are the rides fun?'));
  });

  it('writes one entry with its embedding to the backing store', async () => {
    const { kv, cache } = setup({ 'Is staff friendly?': [0, 1] }, 120);

    await cache.store('Is staff friendly?', 'yes', 1);

    expect(await kv.scanKeys('review_cache:')).toEqual([cache.keyFor('Is staff friendly?')]);
    const raw = await kv.get(cache.keyFor('Is staff friendly?'));
    expect(raw === null ? null : JSON.parse(raw)).toEqual({
      question: 'Is staff friendly?',
      answer: 'yes',
      embedding: [0, 1],
      contextCount: 1,
      createdAt: '2024-03-01T12:00:00.000Z',
    });
  });

  it('treats a similarity equal to the threshold as a hit', async () => {
    const { cache } = setup({ original: [1, 0], close: AT_THRESHOLD, near: BELOW_THRESHOLD });
    await cache.store('original', 'cached answer', 1);

    const hit = await cache.lookup('close');
    const miss = await cache.lookup('near');

    expect(hit.hit).toBe(true);
    if (hit.hit) {
      expect(hit.similarity).toBe(0.95);
      expect(hit.entry.question).toBe('original');
    }
    expect(miss).toEqual({ hit: false, bestSimilarity: 0.949 });
  });

  it('misses with no best similarity on an empty cache', async () => {
    const { cache } = setup({});
    expect(await cache.lookup('anything')).toEqual({ hit: false, bestSimilarity: null });
  });

  it('prefers the first stored entry when similarities tie', async () => {
    const { cache } = setup({ first: [1, 0], second: [2, 0], probe: [5, 0] });
    await cache.store('first', 'answer one', 1);
    await cache.store('second', 'answer two', 2);

    const result = await cache.lookup('probe');

    expect(result.hit).toBe(true);
    if (result.hit) expect(result.entry.answer).toBe('answer one');
  });

  it('hides and evicts entries once their TTL has passed', async () => {
    const clock = { t: START };
    // the store itself never expires anything, so expiry here is the cache's own check
    const kv = new InMemoryKeyValueStore(() => START);
    const cache = new SemanticCache(kv, embedderFor({ q: [1, 0] }), { ttlSeconds: 60, now: () => clock.t });
    await cache.store('q', 'a', 1);

    clock.t = START + 59_999;
    expect((await cache.lookup('q')).hit).toBe(true);

    clock.t = START + 60_000;
    expect(await cache.lookup('q')).toEqual({ hit: false, bestSimilarity: null });
    expect(kv.rawSize).toBe(0);
    expect((await cache.stats()).entryCount).toBe(0);
  });

  it('relies on the store TTL as well', async () => {
    const { clock, kv, cache } = setup({ q: [1, 0] }, 10);
    await cache.store('q', 'a', 1);

    clock.t = START + 10_000;

    expect((await cache.lookup('q')).hit).toBe(false);
    expect(kv.rawSize).toBe(0);
  });

  it('reports stats for live entries', async () => {
    const { clock, cache } = setup({ a: [1, 0], b: [0, 1] });
    await cache.store('a', 'x', 1);
    clock.t = START + 5_000;
    await cache.store('b', 'y', 2);

    expect(await cache.stats()).toEqual({
      entryCount: 2,
      oldestEntryTime: '2024-03-01T12:00:00.000Z',
      newestEntryTime: '2024-03-01T12:00:05.000Z',
      similarityThreshold: 0.95,
      ttlSeconds: 3600,
      store: 'memory',
    });
  });

  it('clears only its own namespace', async () => {
    const { kv, cache } = setup({ a: [1, 0], b: [0, 1] });
    await kv.put('other:key', 'keep me', 3600);
    await cache.store('a', 'x', 1);
    await cache.store('b', 'y', 1);

    expect(await cache.clear()).toBe(2);

    const stats = await cache.stats();
    expect(stats.entryCount).toBe(0);
    expect(stats.oldestEntryTime).toBeNull();
    expect(await kv.get('other:key')).toBe('keep me');
  });

  it('clearing an empty cache removes nothing', async () => {
    const { cache } = setup({});
    expect(await cache.clear()).toBe(0);
  });

  it('overwrites the entry for a repeated question', async () => {
    const { cache } = setup({ q: [1, 0], 'Q ': [1, 0] });
    await cache.store('q', 'old', 1);
    await cache.store('Q ', 'new', 2);

    expect((await cache.stats()).entryCount).toBe(1);
    const result = await cache.lookup('q');
    if (!result.hit) throw new Error('expected a hit');
    expect(result.entry.answer).toBe('new');
  });

  it('skips unreadable entries', async () => {
    const { kv, cache } = setup({ q: [1, 0] });
    await kv.put('review_cache:broken', '{not json', 3600);
    await kv.put('review_cache:partial', JSON.stringify({ question: 'q' }), 3600);

    expect(await cache.lookup('q')).toEqual({ hit: false, bestSimilarity: null });
    expect((await cache.stats()).entryCount).toBe(0);
  });

  it('turns store failures into misses and no-ops', async () => {
    const cache = new SemanticCache(new FailingStore(), embedderFor({ q: [1, 0] }));

    expect(await cache.lookup('q')).toEqual({ hit: false, bestSimilarity: null });
    await expect(cache.store('q', 'a', 1)).resolves.toBeUndefined();
    expect(await cache.clear()).toBe(0);
    expect(await cache.stats()).toEqual({
      entryCount: 0,
      oldestEntryTime: null,
      newestEntryTime: null,
      similarityThreshold: 0.95,
      ttlSeconds: 86400,
      store: 'failing',
      error: 'redis unreachable',
    });
  });

  it('misses when the question cannot be embedded', async () => {
    const embedder: Embedder = {
      embed: vi.fn(async (): Promise<number[]> => {
        throw new Error('embedding service down');
      }),
    };
    const cache = new SemanticCache(new InMemoryKeyValueStore(), embedder);

    expect(await cache.lookup('q')).toEqual({ hit: false, bestSimilarity: null });
  });
});
