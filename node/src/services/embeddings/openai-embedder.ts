/**
 * OpenAI embeddings behind the Embedder contract.
 * The same model must serve both retrieval and cache lookups so similarities stay comparable.
 */

import OpenAI from 'openai';
import type { Embedder, Embedding } from '@/services/retrieval/vector-utils';

export interface OpenAIEmbedderConfig {
  apiKey: string;
  model?: string; // e.g. 'text-embedding-3-small'
  dimensions?: number;
  batchSize?: number;
}

// Empty input is rejected by the API.
function prepare(text: string): string {
  const clean = text.trim();
  return clean.length > 0 ? clean : 'No content';
}

export class OpenAIEmbedder implements Embedder {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly dimensions?: number;
  private readonly batchSize: number;

  constructor(config: OpenAIEmbedderConfig, client?: OpenAI) {
    this.client = client ?? new OpenAI({ apiKey: config.apiKey });
    this.model = config.model ?? 'text-embedding-3-small';
    this.dimensions = config.dimensions;
    this.batchSize = config.batchSize ?? 256;
  }

  async embed(text: string): Promise<Embedding> {
    const [vector] = await this.embedBatch([text]);
    if (!vector) {
      throw new Error('Embedding response was empty');
    }
    return vector;
  }

  async embedBatch(texts: string[]): Promise<Embedding[]> {
    const out: Embedding[] = [];
    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize).map(prepare);
      const res = await this.client.embeddings.create({
        model: this.model,
        input: batch,
        ...(this.dimensions ? { dimensions: this.dimensions } : {}),
      });
      const ordered = [...res.data].sort((a, b) => a.index - b.index);
      for (const item of ordered) out.push(item.embedding);
    }
    return out;
  }
}
