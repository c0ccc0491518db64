// Hybrid retriever: semantic KNN against the vector index, exact-location lookup in the
// document store when the index errors, times out or comes back empty.
import type { InventoryCategory, InventoryRecord, RetrievalCriteria } from '@/types/inventory';
import type { InventoryRetriever } from './inventory-retriever';
import {
  DEFAULT_RETRIEVAL_LIMITS,
  INDEX_SPECS,
  type DocumentStore,
  type StoreFilter,
  type VectorFilter,
  type VectorSearch,
} from '@/services/providers/retrieval-types';
import type { Embedder } from '@/services/providers/retrieval-vector-utils';
import { normalizeRecord } from './inventory-normalize';
import { CircuitBreaker } from '@/stability/circuitBreaker';
import { logger, errMessage } from '@/services/logger';

export interface HybridInventoryRetrieverOptions {
  /** Per-search timeout; a timed-out search counts as no results. */
  vectorTimeoutMs?: number;
  currency?: string;
  limits?: Partial<Record<InventoryCategory, number>>;
}

/** Natural-language need that gets embedded into the query vector. */
export function describeNeed(
  category: InventoryCategory,
  location: string,
  criteria: RetrievalCriteria,
  currency: string,
): string {
  switch (category) {
    case 'hotel':
      return criteria.maxPrice !== undefined
        ? `best hotels in ${location} under ${Math.floor(criteria.maxPrice)} ${criteria.currency ?? currency}`
        : `best hotels in ${location}`;
    case 'attraction': {
      const intent = criteria.interests?.length ? criteria.interests.join(', ') : 'top attractions';
      return `${intent} in ${location} best tourist spots`;
    }
    case 'event':
      return criteria.startDate && criteria.endDate
        ? `events and festivals in ${location} between ${criteria.startDate} and ${criteria.endDate}`
        : `events and festivals in ${location}`;
    case 'flight':
      return `direct flights from ${location} to ${criteria.destination ?? 'anywhere'}`;
    case 'transport':
      return `public and private transport options in ${location}`;
  }
}

export function buildVectorFilter(
  category: InventoryCategory,
  location: string,
  criteria: RetrievalCriteria,
): VectorFilter {
  const filter: VectorFilter =
    category === 'flight'
      ? {
          tags: criteria.destination
            ? { origin: location, destination: criteria.destination }
            : { origin: location },
        }
      : { tags: { cityName: location } };

  if (criteria.minPrice !== undefined || criteria.maxPrice !== undefined) {
    filter.ranges = { price: { min: criteria.minPrice, max: criteria.maxPrice } };
  }
  return filter;
}

function buildStoreFilter(
  category: InventoryCategory,
  location: string,
  criteria: RetrievalCriteria,
  limit: number,
): StoreFilter {
  return {
    location,
    destination: category === 'flight' ? criteria.destination : undefined,
    matchEitherEnd: category === 'transport',
    excludeIds: criteria.excludeIds,
    limit,
  };
}

export class HybridInventoryRetriever implements InventoryRetriever {
  private readonly breaker: CircuitBreaker;
  private readonly currency: string;

  constructor(
    private readonly vector: VectorSearch | null,
    private readonly store: DocumentStore,
    private readonly embedder: Embedder,
    private readonly options: HybridInventoryRetrieverOptions = {},
  ) {
    this.currency = options.currency ?? 'SAR';
    this.breaker = new CircuitBreaker(vector?.name ?? 'vector', {
      timeout: options.vectorTimeoutMs ?? 2000,
      failureThreshold: 5,
      resetTimeout: 30000,
    });
  }

  getMaxItems(category: InventoryCategory): number {
    return this.options.limits?.[category] ?? DEFAULT_RETRIEVAL_LIMITS[category];
  }

  async retrieve(
    category: InventoryCategory,
    location: string,
    criteria: RetrievalCriteria = {},
    limit?: number,
  ): Promise<InventoryRecord[]> {
    const max = limit ?? this.getMaxItems(category);
    if (!location.trim() || max <= 0) return [];
    const excluded = new Set(criteria.excludeIds ?? []);

    const fromVector = (await this.searchVector(category, location, criteria, max)).filter(
      (r) => !excluded.has(r.id),
    );
    if (fromVector.length > 0) {
      return fromVector.slice(0, max);
    }

    try {
      const docs = await this.store.find(category, buildStoreFilter(category, location, criteria, max));
      const records: InventoryRecord[] = [];
      for (const doc of docs) {
        const record = normalizeRecord(category, doc, 'fallback-store');
        if (record && !excluded.has(record.id)) records.push(record);
      }
      logger.debug(`${category} fallback-store for ${location}`, { count: records.length });
      return records.slice(0, max);
    } catch (err) {
      logger.error(`${category} fallback-store lookup failed`, { location, err: errMessage(err) });
      return [];
    }
  }

  private async searchVector(
    category: InventoryCategory,
    location: string,
    criteria: RetrievalCriteria,
    k: number,
  ): Promise<InventoryRecord[]> {
    const vector = this.vector;
    if (!vector) return [];

    try {
      const need = describeNeed(category, location, criteria, this.currency);
      const queryVector = await this.embedder.embed(need);
      const spec = INDEX_SPECS[category];
      const hits = await this.breaker.execute(() =>
        vector.search(spec.index, queryVector, k, buildVectorFilter(category, location, criteria), criteria.excludeIds ?? []),
      );

      const records: InventoryRecord[] = [];
      for (const hit of hits) {
        const fallbackId = hit.key.startsWith(spec.prefix) ? hit.key.slice(spec.prefix.length) : hit.key;
        const record = normalizeRecord(category, hit.fields, 'vector', fallbackId);
        if (record) records.push(record);
      }
      return records;
    } catch (err) {
      logger.warn(`${category} vector search failed; using fallback store`, {
        location,
        err: errMessage(err),
      });
      return [];
    }
  }
}
