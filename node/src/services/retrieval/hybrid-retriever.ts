// Hybrid retriever: predicate filtering, lexical overlap + vector similarity, weighted fusion.
import type { RecordPredicate, ReviewRecord } from '@/types/records';
import type { RecordStore } from '@/services/records/record-store';
import { logger, errorMessage } from '@/services/logger';
import type { CircuitBreaker } from '@/stability/circuitBreaker';
import { lexicalScore, DEFAULT_PHRASE_BOOST } from './lexical-scorer';
import type { VectorIndex, VectorMatch } from './vector-index';
import { clamp01, type Embedder } from './vector-utils';

const log = logger.getSubLogger({ name: 'retrieval' });

export type RetrievalStrategy = 'id_restricted' | 'full_search' | 'lexical_only' | 'none';

export interface RankedRecord {
  record: ReviewRecord;
  combinedScore: number;
  lexicalScore: number;
  vectorScore: number;
}

export interface HybridRetrievalResult {
  results: RankedRecord[];
  strategy: RetrievalStrategy;
  candidateCount: number;
  fallback: boolean;
  fallbackReason?: string;
}

export interface HybridRetrieverOptions {
  lexicalWeight?: number;
  vectorWeight?: number;
  /** Candidate count at or above `topK * strategyMultiplier` searches only within the candidates. */
  strategyMultiplier?: number;
  phraseBoost?: number;
  restrictedKFactor?: number;
  fullSearchKFactor?: number;
}

type ResolvedOptions = Required<HybridRetrieverOptions>;

const DEFAULTS: ResolvedOptions = {
  lexicalWeight: 0.4,
  vectorWeight: 0.6,
  strategyMultiplier: 5,
  phraseBoost: DEFAULT_PHRASE_BOOST,
  restrictedKFactor: 2,
  fullSearchKFactor: 3,
};

export class HybridRetriever {
  private readonly options: ResolvedOptions;

  constructor(
    private readonly store: RecordStore,
    private readonly embedder: Embedder | null,
    private readonly vectorIndex: VectorIndex | null,
    options: HybridRetrieverOptions = {},
    private readonly breaker?: CircuitBreaker,
  ) {
    this.options = { ...DEFAULTS, ...options };
  }

  selectStrategy(candidateCount: number, topK: number): 'id_restricted' | 'full_search' {
    return candidateCount >= topK * this.options.strategyMultiplier ? 'id_restricted' : 'full_search';
  }

  async retrieve(
    query: string,
    predicates: readonly RecordPredicate[],
    topK: number,
  ): Promise<HybridRetrievalResult> {
    const k = Math.floor(topK);
    if (!query.trim() || !Number.isFinite(k) || k <= 0) {
      return { results: [], strategy: 'none', candidateCount: 0, fallback: false };
    }

    const candidates = this.store.filter(predicates);
    if (candidates.length === 0) {
      log.info('retrieval:no_candidates', { predicates: predicates.length });
      return { results: [], strategy: 'none', candidateCount: 0, fallback: false };
    }

    const lexical = new Map<string, number>();
    for (const id of candidates) {
      const record = this.store.get(id);
      if (!record) continue;
      const score = lexicalScore(query, record.text, this.options.phraseBoost);
      if (score > 0) lexical.set(id, score);
    }

    const strategy = this.selectStrategy(candidates.length, k);
    let vector = new Map<string, number>();
    let fallbackReason: string | undefined;

    if (!this.embedder || !this.vectorIndex) {
      fallbackReason = 'vector_index_not_configured';
    } else {
      try {
        const matches = await this.runVectorSearch(this.embedder, this.vectorIndex, query, candidates, strategy, k);
        vector = this.collectVectorScores(matches, new Set(candidates));
      } catch (err) {
        fallbackReason = errorMessage(err);
        log.warn('retrieval:vector_fallback', { strategy, error: fallbackReason });
      }
    }

    const results = this.fuse(candidates, lexical, vector).slice(0, k);
    const usedStrategy: RetrievalStrategy = fallbackReason === undefined ? strategy : 'lexical_only';

    log.info('retrieval:strategy', {
      strategy: usedStrategy,
      candidateCount: candidates.length,
      returned: results.length,
      topK: k,
    });

    return {
      results,
      strategy: usedStrategy,
      candidateCount: candidates.length,
      fallback: fallbackReason !== undefined,
      ...(fallbackReason !== undefined ? { fallbackReason } : {}),
    };
  }

  private async runVectorSearch(
    embedder: Embedder,
    index: VectorIndex,
    query: string,
    candidates: readonly string[],
    strategy: 'id_restricted' | 'full_search',
    topK: number,
  ): Promise<VectorMatch[]> {
    const search = async (): Promise<VectorMatch[]> => {
      const vector = await embedder.embed(query);
      if (strategy === 'id_restricted') {
        return index.query({ vector, k: this.options.restrictedKFactor * topK, ids: candidates });
      }
      return index.query({ vector, k: this.options.fullSearchKFactor * topK });
    };
    return this.breaker ? this.breaker.execute(search) : search();
  }

  /** Keeps ids that are candidates (post-filter) and known to the store. */
  private collectVectorScores(matches: readonly VectorMatch[], candidates: ReadonlySet<string>): Map<string, number> {
    const out = new Map<string, number>();
    for (const m of matches) {
      if (!candidates.has(m.id) || !this.store.has(m.id)) continue;
      const score = clamp01(m.similarity);
      const prev = out.get(m.id);
      if (prev === undefined || score > prev) out.set(m.id, score);
    }
    return out;
  }

  private fuse(
    candidates: readonly string[],
    lexical: ReadonlyMap<string, number>,
    vector: ReadonlyMap<string, number>,
  ): RankedRecord[] {
    const { lexicalWeight, vectorWeight } = this.options;
    const combined: RankedRecord[] = [];

    // candidate order is the tie-break; Array.prototype.sort is stable
    for (const id of candidates) {
      const lex = lexical.get(id);
      const vec = vector.get(id);
      if (lex === undefined && vec === undefined) continue;
      const record = this.store.get(id);
      if (!record) continue;
      const lexicalValue = lex ?? 0;
      const vectorValue = vec ?? 0;
      combined.push({
        record,
        lexicalScore: lexicalValue,
        vectorScore: vectorValue,
        combinedScore: lexicalWeight * lexicalValue + vectorWeight * vectorValue,
      });
    }

    combined.sort((a, b) => b.combinedScore - a.combinedScore);
    return combined;
  }
}
