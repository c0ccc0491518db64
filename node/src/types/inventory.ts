// src/types/inventory.ts
// Canonical inventory shape for every backend. Redis hashes and SQLite rows are
// normalized into this at the retriever boundary; nothing downstream reads raw docs.

export type InventoryCategory = 'hotel' | 'attraction' | 'event' | 'flight' | 'transport';

export const INVENTORY_CATEGORIES: readonly InventoryCategory[] = [
  'hotel',
  'attraction',
  'event',
  'flight',
  'transport',
] as const;

export type InventorySource = 'vector' | 'fallback-store';

export interface InventoryRecord {
  id: string;
  category: InventoryCategory;
  name: string;
  /** City the record belongs to; for flights, the departure city. */
  location: string;
  /** Arrival city (flights only). */
  destination?: string;
  /** Nightly rate, entry fee, ticket or fare. */
  price: number;
  rating?: number;
  /** Attraction category, event type or transport mode. */
  tag?: string;
  /** Airline or transport operator. */
  provider?: string;
  durationMinutes?: number;
  /** Event date (ISO). */
  date?: string;
  description?: string;
  source: InventorySource;
}

export interface RetrievalCriteria {
  /** Arrival city for flights. */
  destination?: string;
  minPrice?: number;
  maxPrice?: number;
  interests?: string[];
  startDate?: string;
  endDate?: string;
  currency?: string;
  /** Ids already used in this build; excluded from both backends. */
  excludeIds?: string[];
}
