// Flight routing between two stops: cheapest direct flight, else the first hub with both legs
// available, else a synthetic placeholder leg. Never returns an empty route.
import type { InventoryRecord } from '@/types/inventory';
import type { FlightSegment, RouteScope } from '@/types/itinerary';
import type { InventoryRetriever } from '@/services/providers/inventory/inventory-retriever';
import type { FlightLedger } from './trip-cost-ledger';
import { logger } from '@/services/logger';

export const DEFAULT_HUBS: Record<RouteScope, readonly string[]> = {
  international: ['Dubai', 'Doha', 'Abu Dhabi'],
  domestic: ['Riyadh', 'Jeddah', 'Dammam'],
};

export interface FallbackSegmentSpec {
  carrier: string;
  price: number;
  durationMinutes: number;
}

export const FALLBACK_SEGMENTS: Record<RouteScope, FallbackSegmentSpec> = {
  international: { carrier: 'Fallback Route', price: 1800, durationMinutes: 420 },
  domestic: { carrier: 'Road Route', price: 300, durationMinutes: 360 },
};

export interface RoutePlannerOptions {
  hubs?: Partial<Record<RouteScope, readonly string[]>>;
  fallbacks?: Partial<Record<RouteScope, FallbackSegmentSpec>>;
}

function sameCity(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/** First of the lowest-priced records, so ties keep retrieval order. */
export function cheapest(records: readonly InventoryRecord[]): InventoryRecord | null {
  let best: InventoryRecord | null = null;
  for (const r of records) {
    if (!best || r.price < best.price) best = r;
  }
  return best;
}

function toSegment(flight: InventoryRecord, from: string, to: string): FlightSegment {
  const segment: FlightSegment = {
    carrier: flight.provider ?? flight.name,
    from: flight.location || from,
    to: flight.destination ?? to,
    price: flight.price,
    source: flight.source,
  };
  if (flight.durationMinutes !== undefined) segment.durationMinutes = flight.durationMinutes;
  return segment;
}

export class RoutePlanner {
  constructor(
    private readonly retriever: InventoryRetriever,
    private readonly options: RoutePlannerOptions = {},
  ) {}

  hubsFor(scope: RouteScope): readonly string[] {
    return this.options.hubs?.[scope] ?? DEFAULT_HUBS[scope];
  }

  fallbackFor(scope: RouteScope): FallbackSegmentSpec {
    return this.options.fallbacks?.[scope] ?? FALLBACK_SEGMENTS[scope];
  }

  /**
   * Resolves `from -> to` into one or two segments and charges each segment's price to `ledger`.
   * Calls must be sequential within a build; the ledger has a single writer.
   */
  async planRoute(
    from: string,
    to: string,
    scope: RouteScope,
    ledger: FlightLedger,
  ): Promise<FlightSegment[]> {
    const segments = await this.resolve(from, to, scope);
    for (const segment of segments) {
      ledger.addFlight(segment.price);
    }
    return segments;
  }

  private async cheapestFlight(from: string, to: string): Promise<InventoryRecord | null> {
    const flights = await this.retriever.retrieve('flight', from, { destination: to });
    return cheapest(flights);
  }

  private async resolve(from: string, to: string, scope: RouteScope): Promise<FlightSegment[]> {
    const direct = await this.cheapestFlight(from, to);
    if (direct) {
      return [toSegment(direct, from, to)];
    }

    for (const hub of this.hubsFor(scope)) {
      if (sameCity(hub, from) || sameCity(hub, to)) continue;
      const firstLeg = await this.cheapestFlight(from, hub);
      if (!firstLeg) continue;
      const secondLeg = await this.cheapestFlight(hub, to);
      if (!secondLeg) continue;
      logger.debug(`route ${from} -> ${to} via ${hub}`);
      return [toSegment(firstLeg, from, hub), toSegment(secondLeg, hub, to)];
    }

    const fallback = this.fallbackFor(scope);
    logger.warn(`no flights ${from} -> ${to}; using ${fallback.carrier} placeholder`, { scope });
    return [
      {
        carrier: fallback.carrier,
        from,
        to,
        price: fallback.price,
        durationMinutes: fallback.durationMinutes,
        source: 'synthetic',
      },
    ];
  }
}
