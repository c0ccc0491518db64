// Shared retrieval types for the hybrid inventory layer (vector index + document store)
import type { InventoryCategory } from '@/types/inventory';
import type { Embedding } from './retrieval-vector-utils';

/** Structured filter; the Redis backend compiles it to RediSearch syntax, the in-memory one evaluates it directly. */
export interface VectorFilter {
  /** Exact-match tag fields, e.g. `{ cityName: 'Jeddah' }`. */
  tags: Record<string, string>;
  /** Inclusive numeric ranges, e.g. `{ price: { max: 400 } }`. */
  ranges?: Record<string, { min?: number; max?: number }>;
}

export interface VectorHit {
  key: string;
  score: number;
  fields: Record<string, string>;
}

export interface VectorSearch {
  readonly name: string;
  search(
    index: string,
    vector: Embedding,
    k: number,
    filter: VectorFilter,
    excludeIds?: string[],
  ): Promise<VectorHit[]>;
}

export interface VectorDocument {
  key: string;
  fields: Record<string, string>;
  vector: Embedding;
}

export interface VectorIndexWriter {
  ensureIndex(index: string, prefix: string, dim: number): Promise<void>;
  upsert(index: string, docs: VectorDocument[]): Promise<number>;
}

export interface StoreFilter {
  location: string;
  /** Flights: arrival city must match as well. */
  destination?: string;
  /** Transports: match `location` against either end of the record. */
  matchEitherEnd?: boolean;
  excludeIds?: string[];
  limit: number;
}

/** A row as the document store keeps it; field names are the store's own. */
export type StoredDoc = Record<string, unknown>;

export interface DocumentStore {
  readonly name: string;
  find(category: InventoryCategory, filter: StoreFilter): Promise<StoredDoc[]>;
  all(category: InventoryCategory): Promise<StoredDoc[]>;
}

export interface IndexSpec {
  index: string;
  prefix: string;
}

export const INDEX_SPECS: Record<InventoryCategory, IndexSpec> = {
  hotel: { index: 'idx:hotels', prefix: 'hotel:' },
  attraction: { index: 'idx:attractions', prefix: 'attraction:' },
  event: { index: 'idx:events', prefix: 'event:' },
  flight: { index: 'idx:flights', prefix: 'flight:' },
  transport: { index: 'idx:transports', prefix: 'transport:' },
};

/** Cap on candidates requested per category and city. */
export const DEFAULT_RETRIEVAL_LIMITS: Record<InventoryCategory, number> = {
  hotel: 8,
  attraction: 20,
  event: 10,
  flight: 5,
  transport: 5,
};
