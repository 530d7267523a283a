/** App configuration, parsed from the environment once at startup. */
import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

const numberFromEnv = (fallback: number) =>
  z.preprocess((v) => (v === undefined || v === '' ? undefined : Number(v)), z.number().finite().default(fallback));

const optionalString = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() === '' ? undefined : v),
  z.string().optional(),
);

const envSchema = z.object({
  PORT: numberFromEnv(4000).pipe(z.number().int().positive()),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  DATA_PATH: z.string().default('data/reviews.csv'),
  REDIS_URL: optionalString,
  CHROMA_URL: optionalString,
  CHROMA_COLLECTION: z.string().default('park_reviews'),
  OPENAI_API_KEY: optionalString,
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_DIMENSIONS: numberFromEnv(384).pipe(z.number().int().positive()),
  ANSWER_MODEL: z.string().default('gpt-4o-mini'),
  CACHE_SIMILARITY_THRESHOLD: numberFromEnv(0.95).pipe(z.number().min(0).max(1)),
  CACHE_TTL_HOURS: numberFromEnv(24).pipe(z.number().positive()),
  CACHE_NAMESPACE: z.string().default('review_cache'),
  RETRIEVAL_TOP_K: numberFromEnv(10).pipe(z.number().int().positive()),
  RETRIEVAL_LEXICAL_WEIGHT: numberFromEnv(0.4).pipe(z.number().min(0)),
  RETRIEVAL_VECTOR_WEIGHT: numberFromEnv(0.6).pipe(z.number().min(0)),
  RETRIEVAL_STRATEGY_MULTIPLIER: numberFromEnv(5).pipe(z.number().positive()),
  RETRIEVAL_PHRASE_BOOST: numberFromEnv(1.5).pipe(z.number().min(1)),
  VECTOR_TIMEOUT_MS: numberFromEnv(5000).pipe(z.number().int().positive()),
});

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  dataPath: string;
  redisUrl?: string;
  chroma: { url?: string; collection: string };
  openai: { apiKey?: string; embeddingModel: string; embeddingDimensions: number; answerModel: string };
  cache: { similarityThreshold: number; ttlHours: number; namespace: string };
  retrieval: {
    topK: number;
    lexicalWeight: number;
    vectorWeight: number;
    strategyMultiplier: number;
    phraseBoost: number;
    vectorTimeoutMs: number;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map((e) => `${e.path.join('.') || 'env'}: ${e.message}`),
    );
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    dataPath: path.resolve(process.cwd(), e.DATA_PATH),
    redisUrl: e.REDIS_URL,
    chroma: { url: e.CHROMA_URL, collection: e.CHROMA_COLLECTION },
    openai: {
      apiKey: e.OPENAI_API_KEY,
      embeddingModel: e.EMBEDDING_MODEL,
      embeddingDimensions: e.EMBEDDING_DIMENSIONS,
      answerModel: e.ANSWER_MODEL,
    },
    cache: {
      similarityThreshold: e.CACHE_SIMILARITY_THRESHOLD,
      ttlHours: e.CACHE_TTL_HOURS,
      namespace: e.CACHE_NAMESPACE,
    },
    retrieval: {
      topK: e.RETRIEVAL_TOP_K,
      lexicalWeight: e.RETRIEVAL_LEXICAL_WEIGHT,
      vectorWeight: e.RETRIEVAL_VECTOR_WEIGHT,
      strategyMultiplier: e.RETRIEVAL_STRATEGY_MULTIPLIER,
      phraseBoost: e.RETRIEVAL_PHRASE_BOOST,
      vectorTimeoutMs: e.VECTOR_TIMEOUT_MS,
    },
  };
}

/** Reads `.env` from the working directory, then parses the environment. */
export function loadAppConfig(): AppConfig {
  dotenv.config({ path: path.resolve(process.cwd(), '.env') });
  return loadConfig(process.env);
}
