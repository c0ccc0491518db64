// In-process KNN over cosine distance. Used when no Redis is configured, and in tests.
import type {
  VectorDocument,
  VectorFilter,
  VectorHit,
  VectorIndexWriter,
  VectorSearch,
} from '@/services/providers/retrieval-types';
import { cosineSimilarity, type Embedding } from '@/services/providers/retrieval-vector-utils';

export function matchesVectorFilter(fields: Record<string, string>, filter: VectorFilter): boolean {
  for (const [field, expected] of Object.entries(filter.tags)) {
    const actual = fields[field];
    // TAG fields compare case-insensitively, as RediSearch does.
    if (actual === undefined || actual.trim().toLowerCase() !== expected.trim().toLowerCase()) {
      return false;
    }
  }
  for (const [field, range] of Object.entries(filter.ranges ?? {})) {
    const value = Number(fields[field]);
    if (!Number.isFinite(value)) return false;
    if (range.min !== undefined && value < range.min) return false;
    if (range.max !== undefined && value > range.max) return false;
  }
  return true;
}

export class InMemoryVectorSearch implements VectorSearch, VectorIndexWriter {
  readonly name = 'in-memory-vector';
  private readonly indexes = new Map<string, Map<string, VectorDocument>>();

  async ensureIndex(index: string): Promise<void> {
    if (!this.indexes.has(index)) this.indexes.set(index, new Map());
  }

  async upsert(index: string, docs: VectorDocument[]): Promise<number> {
    await this.ensureIndex(index);
    const target = this.indexes.get(index);
    if (!target) return 0;
    for (const doc of docs) {
      target.set(doc.key, { key: doc.key, fields: { ...doc.fields }, vector: [...doc.vector] });
    }
    return docs.length;
  }

  size(index: string): number {
    return this.indexes.get(index)?.size ?? 0;
  }

  async search(
    index: string,
    vector: Embedding,
    k: number,
    filter: VectorFilter,
    excludeIds: string[] = [],
  ): Promise<VectorHit[]> {
    const docs = this.indexes.get(index);
    if (!docs || k <= 0) return [];
    const excluded = new Set(excludeIds);

    const hits: VectorHit[] = [];
    for (const doc of docs.values()) {
      if (excluded.has(doc.fields.id ?? doc.key)) continue;
      if (!matchesVectorFilter(doc.fields, filter)) continue;
      const distance = 1 - cosineSimilarity(vector, doc.vector);
      hits.push({ key: doc.key, score: distance, fields: { ...doc.fields, score: String(distance) } });
    }
    hits.sort((a, b) => a.score - b.score);
    return hits.slice(0, k);
  }
}
