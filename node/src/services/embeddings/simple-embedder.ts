// node/src/services/embeddings/simple-embedder.ts
// Deterministic hashed bag-of-words embedding; used when no embedding API key is configured.

import type { Embedder, Embedding } from '@/services/retrieval/vector-utils';
import { tokenize } from '@/services/retrieval/vector-utils';

export class SimpleEmbedder implements Embedder {
  private readonly dim: number;

  constructor(dim = 384) {
    this.dim = dim;
  }

  async embed(text: string): Promise<Embedding> {
    const tokens = tokenize(text);
    const vec: number[] = new Array<number>(this.dim).fill(0);

    for (const token of tokens) {
      let hash = 0;
      for (let i = 0; i < token.length; i++) {
        hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
      }
      vec[hash % this.dim] += 1;
    }

    const norm = Math.sqrt(vec.reduce((s, x) => s + x * x, 0));
    if (norm === 0) return vec;
    return vec.map((x) => x / norm);
  }

  async embedBatch(texts: string[]): Promise<Embedding[]> {
    return Promise.all(texts.map((t) => this.embed(t)));
  }
}
