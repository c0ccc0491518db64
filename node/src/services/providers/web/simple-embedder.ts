// node/src/services/providers/web/simple-embedder.ts
// Deterministic hashed bag-of-words embedding. Same text, same vector; no network.

import type { Embedder, Embedding } from '../retrieval-vector-utils';

export class SimpleEmbedder implements Embedder {
  private dim: number;

  constructor(dim = 64) {
    this.dim = dim;
  }

  async embed(text: string): Promise<Embedding> {
    const source = text.trim() ? text : 'empty';
    const tokens = source.toLowerCase().split(/[^\p{L}\p{N}]+/gu).filter(Boolean);
    const vec: number[] = new Array(this.dim).fill(0);

    for (const token of tokens) {
      let hash = 0;
      for (let i = 0; i < token.length; i++) {
        hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
      }
      const idx = hash % this.dim;
      vec[idx] += 1;
    }

    const norm = Math.sqrt(vec.reduce((s, x) => s + x * x, 0));
    if (norm === 0) return vec;
    return vec.map((x) => x / norm);
  }
}
