import path from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect } from 'vitest';
import { loadConfig } from '@/config/app.config';
import { buildPipelineDeps } from '@/services/pipeline-deps';
import { CircuitState } from '@/stability/circuitBreaker';
import { AnswerGenerationError } from '@/utils/errors';

const dataPath = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../data/reviews.csv');

describe('buildPipelineDeps', () => {
  it('wires in-process backends when no external services are configured', async () => {
    const deps = await buildPipelineDeps(loadConfig({ DATA_PATH: dataPath }));

    expect(deps.store.size).toBe(8);
    expect(deps.vectorIndex?.name).toBe('in-memory');
    expect(await deps.vectorIndex?.count()).toBe(8);
    expect(deps.cacheStore.name).toBe('memory');
    expect(deps.generatorBreaker.name).toBe('answer-generator');

    const retrieval = await deps.retriever.retrieve('friendly staff', [], 3);
    expect(retrieval.strategy).toBe('full_search');
    expect(retrieval.fallback).toBe(false);
    expect(retrieval.results).toHaveLength(3);

    await deps.close();
  });

  it('routes questions through the generator breaker and caches nothing without an API key', async () => {
    const deps = await buildPipelineDeps(loadConfig({ DATA_PATH: dataPath }));

    await expect(deps.queryService.answer({ question: 'Were the staff in Paris friendly?' })).rejects.toThrow(
      new AnswerGenerationError('Answer generation failed: OPENAI_API_KEY not set; answer generation is unavailable'),
    );
    expect(deps.generatorBreaker.snapshot()).toMatchObject({ state: CircuitState.CLOSED, failureCount: 1 });
    expect((await deps.cache.stats()).entryCount).toBe(0);

    await deps.close();
  });
});
