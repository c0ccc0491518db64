// node/src/services/providers/retrieval-vector-utils.ts: shared vector helpers for hybrid retrieval

export type Embedding = number[];

export interface Embedder {
  embed(text: string): Promise<Embedding>;
}

export function cosineSimilarity(a: Embedding, b: Embedding): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

/** FLOAT32 little-endian blob, the layout RediSearch expects for VECTOR fields and $BLOB params. */
export function toFloat32Buffer(vec: Embedding): Buffer {
  const arr = Float32Array.from(vec);
  return Buffer.from(arr.buffer, arr.byteOffset, arr.byteLength);
}
