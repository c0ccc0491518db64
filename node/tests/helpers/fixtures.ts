// Shared test doubles: an in-process retriever keyed by category/location and canned narrators.
import type { InventoryCategory, InventoryRecord, RetrievalCriteria } from '@/types/inventory';
import type { InventoryRetriever } from '@/services/providers/inventory/inventory-retriever';
import type { Narrative, NarrativeGenerator, NarrativeRequest } from '@/services/narrative-generator';

export function makeRecord(
  category: InventoryCategory,
  overrides: Partial<InventoryRecord> & Pick<InventoryRecord, 'id' | 'location'>,
): InventoryRecord {
  return {
    category,
    name: overrides.id,
    price: 0,
    source: 'fallback-store',
    ...overrides,
  };
}

export interface RetrieveCall {
  category: InventoryCategory;
  location: string;
  criteria: RetrievalCriteria;
}

/**
 * Returns the records whose location matches (and destination, for flights), minus excludeIds.
 * Every call is recorded for assertions.
 */
export class FakeRetriever implements InventoryRetriever {
  readonly calls: RetrieveCall[] = [];

  constructor(private readonly records: InventoryRecord[] = []) {}

  async retrieve(
    category: InventoryCategory,
    location: string,
    criteria: RetrievalCriteria = {},
  ): Promise<InventoryRecord[]> {
    this.calls.push({ category, location, criteria });
    const excluded = new Set(criteria.excludeIds ?? []);
    return this.records.filter(
      (r) =>
        r.category === category &&
        r.location === location &&
        (category !== 'flight' || criteria.destination === undefined || r.destination === criteria.destination) &&
        !excluded.has(r.id),
    );
  }

  flightQueries(): string[] {
    return this.calls
      .filter((c) => c.category === 'flight')
      .map((c) => `${c.location}->${c.criteria.destination ?? ''}`);
  }
}

export class StubNarrator implements NarrativeGenerator {
  readonly requests: NarrativeRequest[] = [];

  constructor(private readonly narrative: Narrative = {
    summaryText: 'A short trip.',
    highlights: ['Old town walk'],
    commentary: 'Fits the budget.',
  }) {}

  async narrate(request: NarrativeRequest): Promise<Narrative> {
    this.requests.push(request);
    return this.narrative;
  }
}

export class FailingNarrator implements NarrativeGenerator {
  constructor(private readonly message = 'model unavailable') {}

  async narrate(): Promise<Narrative> {
    throw new Error(this.message);
  }
}
