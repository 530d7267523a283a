// Pipeline dependencies for the query flow, built once at startup from config.
import type { AppConfig } from '@/config/app.config';
import { logger, errorMessage } from '@/services/logger';
import { RecordStore } from '@/services/records/record-store';
import { loadRecordsFromFile } from '@/services/records/record-loader';
import { HybridRetriever } from '@/services/retrieval/hybrid-retriever';
import { InMemoryVectorIndex, type VectorIndex } from '@/services/retrieval/vector-index';
import { ChromaVectorIndex } from '@/services/retrieval/chroma-vector-index';
import { indexRecords } from '@/services/retrieval/record-indexer';
import type { Embedder } from '@/services/retrieval/vector-utils';
import { SimpleEmbedder } from '@/services/embeddings/simple-embedder';
import { OpenAIEmbedder } from '@/services/embeddings/openai-embedder';
import { OpenAIAnswerGenerator, type AnswerGenerator } from '@/services/answer/answer-generator';
import { SemanticCache } from '@/services/cache/semantic-cache';
import { InMemoryKeyValueStore, type KeyValueStore } from '@/services/cache/kv-store';
import { RedisKeyValueStore } from '@/services/cache/redis-kv-store';
import { QueryService } from '@/services/query-service';
import { CircuitBreaker } from '@/stability/circuitBreaker';
import { ServiceUnavailableError } from '@/utils/errors';

export interface PipelineDeps {
  store: RecordStore;
  embedder: Embedder;
  vectorIndex: VectorIndex | null;
  cacheStore: KeyValueStore;
  cache: SemanticCache;
  retriever: HybridRetriever;
  queryService: QueryService;
  vectorBreaker: CircuitBreaker;
  generatorBreaker: CircuitBreaker;
  close(): Promise<void>;
}

const log = logger.getSubLogger({ name: 'deps' });

class UnconfiguredAnswerGenerator implements AnswerGenerator {
  async generate(): Promise<string> {
    throw new ServiceUnavailableError('OPENAI_API_KEY not set; answer generation is unavailable');
  }
}

function createEmbedder(config: AppConfig): Embedder {
  const { apiKey, embeddingModel, embeddingDimensions } = config.openai;
  if (apiKey) {
    return new OpenAIEmbedder({ apiKey, model: embeddingModel, dimensions: embeddingDimensions });
  }
  log.warn('deps:embedder_fallback', { reason: 'OPENAI_API_KEY not set', embedder: 'simple' });
  return new SimpleEmbedder(embeddingDimensions);
}

async function createVectorIndex(config: AppConfig): Promise<VectorIndex | null> {
  if (!config.chroma.url) {
    return new InMemoryVectorIndex();
  }
  const chroma = new ChromaVectorIndex({
    baseUrl: config.chroma.url,
    collection: config.chroma.collection,
    timeoutMs: config.retrieval.vectorTimeoutMs,
  });
  try {
    await chroma.connect();
    return chroma;
  } catch (err) {
    log.warn('deps:vector_index_unavailable', { error: errorMessage(err), mode: 'keyword-only' });
    return null;
  }
}

async function createCacheStore(config: AppConfig): Promise<KeyValueStore> {
  if (!config.redisUrl) {
    log.info('deps:cache_store', { store: 'memory', reason: 'REDIS_URL not set' });
    return new InMemoryKeyValueStore();
  }
  const redis = new RedisKeyValueStore(config.redisUrl);
  await redis.connect();
  return redis;
}

export async function buildPipelineDeps(config: AppConfig): Promise<PipelineDeps> {
  const { records } = await loadRecordsFromFile(config.dataPath);
  const store = new RecordStore(records);

  const embedder = createEmbedder(config);
  const vectorIndex = await createVectorIndex(config);

  if (vectorIndex) {
    try {
      const existing = await vectorIndex.count();
      if (existing < store.size) {
        await indexRecords(store, embedder, vectorIndex);
      } else {
        log.info('deps:index_up_to_date', { index: vectorIndex.name, count: existing });
      }
    } catch (err) {
      log.warn('deps:indexing_failed', { error: errorMessage(err), mode: 'keyword fallback' });
    }
  }

  const vectorBreaker = new CircuitBreaker('vector-index', {
    failureThreshold: 3,
    successThreshold: 1,
    timeout: config.retrieval.vectorTimeoutMs,
    resetTimeout: 60000,
  });
  const generatorBreaker = new CircuitBreaker('answer-generator', {
    failureThreshold: 3,
    successThreshold: 1,
    timeout: 30000,
    resetTimeout: 120000,
  });

  const retriever = new HybridRetriever(
    store,
    embedder,
    vectorIndex,
    {
      lexicalWeight: config.retrieval.lexicalWeight,
      vectorWeight: config.retrieval.vectorWeight,
      strategyMultiplier: config.retrieval.strategyMultiplier,
      phraseBoost: config.retrieval.phraseBoost,
    },
    vectorBreaker,
  );

  const cacheStore = await createCacheStore(config);
  const cache = new SemanticCache(cacheStore, embedder, {
    similarityThreshold: config.cache.similarityThreshold,
    ttlSeconds: Math.round(config.cache.ttlHours * 3600),
    namespace: config.cache.namespace,
  });

  const generator: AnswerGenerator = config.openai.apiKey
    ? new OpenAIAnswerGenerator({ apiKey: config.openai.apiKey, model: config.openai.answerModel })
    : new UnconfiguredAnswerGenerator();

  const queryService = new QueryService({
    retriever,
    generator,
    cache,
    generatorBreaker,
    defaultTopK: config.retrieval.topK,
  });

  return {
    store,
    embedder,
    vectorIndex,
    cacheStore,
    cache,
    retriever,
    queryService,
    vectorBreaker,
    generatorBreaker,
    async close() {
      if (cacheStore instanceof RedisKeyValueStore) {
        await cacheStore.destroy();
      }
    },
  };
}
