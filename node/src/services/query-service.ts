// node/src/services/query-service.ts: cache → hybrid retrieval → answer generation → cache store
import type { ReviewRecord } from '@/types/records';
import { logger, errorMessage } from '@/services/logger';
import type { HybridRetriever, RetrievalStrategy } from '@/services/retrieval/hybrid-retriever';
import type { SemanticCache } from '@/services/cache/semantic-cache';
import type { AnswerGenerator } from '@/services/answer/answer-generator';
import { extractFilters, filtersToPredicates, type ExtractedFilters } from '@/services/filter-extraction';
import { estimateQueryComplexity, type QueryComplexity } from '@/services/query-complexity';
import type { CircuitBreaker } from '@/stability/circuitBreaker';
import { AnswerGenerationError, ValidationError } from '@/utils/errors';

const log = logger.getSubLogger({ name: 'query' });

export interface QueryRequest {
  question: string;
  branch?: string;
  location?: string;
  topK?: number;
}

export interface QueryResult {
  question: string;
  answer: string;
  numReviewsUsed: number;
  cached: boolean;
  cacheSimilarity?: number;
  originalQuestion?: string;
  strategy?: RetrievalStrategy;
  candidateCount?: number;
  fallback?: boolean;
  filters: ExtractedFilters;
  complexity: QueryComplexity;
}

export interface QueryServiceDeps {
  retriever: HybridRetriever;
  generator: AnswerGenerator;
  cache?: SemanticCache | null;
  generatorBreaker?: CircuitBreaker;
  defaultTopK?: number;
}

export class QueryService {
  private readonly defaultTopK: number;

  constructor(private readonly deps: QueryServiceDeps) {
    this.defaultTopK = deps.defaultTopK ?? 10;
  }

  async answer(request: QueryRequest): Promise<QueryResult> {
    const question = request.question.trim();
    if (!question) {
      throw new ValidationError('question is required and must be a non-empty string');
    }

    const complexity = estimateQueryComplexity(question);
    // Explicit filters change the answer, so only question-derived filters are cacheable.
    const explicit = request.branch !== undefined || request.location !== undefined;
    const filters: ExtractedFilters = explicit
      ? {
          ...(request.branch ? { branch: request.branch } : {}),
          ...(request.location ? { location: request.location } : {}),
        }
      : extractFilters(question);
    const cache = explicit ? null : this.deps.cache ?? null;

    if (cache) {
      const lookup = await cache.lookup(question);
      if (lookup.hit) {
        return {
          question,
          answer: lookup.entry.answer,
          numReviewsUsed: lookup.entry.contextCount,
          cached: true,
          cacheSimilarity: lookup.similarity,
          originalQuestion: lookup.entry.question,
          filters,
          complexity,
        };
      }
    }

    const topK = request.topK ?? this.defaultTopK;
    const retrieval = await this.deps.retriever.retrieve(question, filtersToPredicates(filters), topK);
    const context = retrieval.results.map((r) => r.record);

    const answer = await this.generate(question, context);
    log.info('query:answered', {
      reviews: context.length,
      strategy: retrieval.strategy,
      fallback: retrieval.fallback,
      complexity: complexity.level,
    });

    if (cache) {
      await cache.store(question, answer, context.length);
    }

    return {
      question,
      answer,
      numReviewsUsed: context.length,
      cached: false,
      strategy: retrieval.strategy,
      candidateCount: retrieval.candidateCount,
      fallback: retrieval.fallback,
      filters,
      complexity,
    };
  }

  private async generate(question: string, context: readonly ReviewRecord[]): Promise<string> {
    const run = () => this.deps.generator.generate(question, context);
    try {
      return this.deps.generatorBreaker ? await this.deps.generatorBreaker.execute(run) : await run();
    } catch (err) {
      log.error('query:generation_failed', { error: errorMessage(err) });
      throw new AnswerGenerationError(`Answer generation failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
