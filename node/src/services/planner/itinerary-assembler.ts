// src/services/planner/itinerary-assembler.ts
// City-by-city itinerary construction: entry route, per-city hotel + daily activities + local legs,
// inter-city routes, return route, actual-spend totals, then the narrative.
import { randomUUID } from 'crypto';
import type { InventoryRecord } from '@/types/inventory';
import type {
  Activity,
  DayPlan,
  FlightSegment,
  Hotel,
  Itinerary,
  MissingHotelPolicy,
  TransportSegment,
  TravelerPreferences,
} from '@/types/itinerary';
import type { InventoryRetriever } from '@/services/providers/inventory/inventory-retriever';
import type { NarrativeGenerator } from '@/services/narrative-generator';
import { allocateBudget, roundCurrency } from './budget-allocator';
import { selectActivities, selectHotel, DEFAULT_ACTIVITY_SLOTS } from './selection-engine';
import { cheapest, type RoutePlanner } from './route-planner';
import { TripCostLedger } from './trip-cost-ledger';
import { inclusiveDayCount, parseIsoDate } from '@/utils/dates';
import { ItineraryValidationError, type ValidationIssue } from '@/utils/errors';
import { logger, errMessage } from '@/services/logger';

export const DEFAULT_LOCAL_LEGS_PER_DAY = 3;
export const AIRPORT_TRANSFER_FALLBACK_PRICE = 100;

export interface ItineraryAssemblerDeps {
  retriever: InventoryRetriever;
  routePlanner: RoutePlanner;
  narrator: NarrativeGenerator;
}

export interface ItineraryAssemblerOptions {
  /** What to do with a city that has no hotel: drop its days, or stay at a zero-cost placeholder. */
  missingHotelPolicy?: MissingHotelPolicy;
  /** Local transport legs charged per city day in the cost totals. */
  localLegsPerDay?: number;
  activitySlots?: number;
  currency?: string;
  airportTransferFallbackPrice?: number;
}

interface ValidatedTrip {
  origin?: string;
  destinations: string[];
  totalDays: number;
}

export function validatePreferences(prefs: TravelerPreferences): ValidatedTrip {
  const issues: ValidationIssue[] = [];

  const destinations = prefs.destinations.map((d) => d.trim()).filter(Boolean);
  if (destinations.length === 0) {
    issues.push({ path: 'destinations', message: 'At least one destination is required' });
  }

  const start = parseIsoDate(prefs.startDate);
  const end = parseIsoDate(prefs.endDate);
  if (!start) issues.push({ path: 'startDate', message: 'start date must be a valid YYYY-MM-DD date' });
  if (!end) issues.push({ path: 'endDate', message: 'end date must be a valid YYYY-MM-DD date' });
  if (start && end && end.getTime() < start.getTime()) {
    issues.push({ path: 'endDate', message: 'end date must be on or after start date' });
  }

  if (!Number.isFinite(prefs.budgetTotal) || prefs.budgetTotal <= 0) {
    issues.push({ path: 'budgetTotal', message: 'budget must be greater than 0' });
  }

  if (issues.length > 0 || !start || !end) {
    throw new ItineraryValidationError('Invalid trip preferences', issues);
  }

  const origin = prefs.origin?.trim() || undefined;
  return { origin, destinations, totalDays: inclusiveDayCount(start, end) };
}

/** Even split of trip days over cities; the remainder goes to the earliest cities. */
export function cityDayShare(totalDays: number, cityCount: number, cityIndex: number): number {
  const base = Math.floor(totalDays / cityCount);
  const extra = cityIndex < totalDays % cityCount ? 1 : 0;
  return Math.max(1, base + extra);
}

function placeholderHotel(city: string): Hotel {
  return {
    id: `placeholder-${city.toLowerCase().replace(/\s+/g, '-')}`,
    name: `Accommodation in ${city} (to be booked)`,
    city,
    pricePerNight: 0,
    source: 'placeholder',
  };
}

/** hotel -> a1 -> a2 -> ... -> hotel, each leg on the cheapest local option. */
export function buildLocalLegs(
  hotel: Hotel,
  activities: readonly Activity[],
  transport: InventoryRecord | null,
): TransportSegment[] {
  if (!transport || activities.length === 0) return [];
  const stops = [hotel.name, ...activities.map((a) => a.name), hotel.name];
  const mode = transport.tag ?? 'car';
  const provider = transport.provider ?? transport.name;
  return stops.slice(1).map((to, i) => ({
    mode,
    provider,
    from: stops[i],
    to,
    price: transport.price,
  }));
}

function sum(values: readonly number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

function describePlan(days: readonly DayPlan[]): string {
  return days
    .map((d) => {
      const parts = [`Day ${d.dayIndex} (${d.city})`];
      if (d.flight) parts.push(`${d.flight.carrier} ${d.flight.from} → ${d.flight.to}`);
      if (d.hotel) parts.push(`stay at ${d.hotel.name}`);
      if (d.activities.length > 0) {
        parts.push(`activities: ${d.activities.map((a) => `${a.name} (${a.category})`).join('; ')}`);
      }
      return parts.join(', ');
    })
    .join('\n');
}

function newTripId(): string {
  return `TRIP-${randomUUID().replace(/-/g, '').slice(0, 8).toUpperCase()}`;
}

export class ItineraryAssembler {
  private readonly missingHotelPolicy: MissingHotelPolicy;
  private readonly localLegsPerDay: number;
  private readonly activitySlots: number;
  private readonly currency: string;
  private readonly airportTransferFallbackPrice: number;

  constructor(
    private readonly deps: ItineraryAssemblerDeps,
    options: ItineraryAssemblerOptions = {},
  ) {
    this.missingHotelPolicy = options.missingHotelPolicy ?? 'skip';
    this.localLegsPerDay = options.localLegsPerDay ?? DEFAULT_LOCAL_LEGS_PER_DAY;
    this.activitySlots = options.activitySlots ?? DEFAULT_ACTIVITY_SLOTS;
    this.currency = options.currency ?? 'SAR';
    this.airportTransferFallbackPrice = options.airportTransferFallbackPrice ?? AIRPORT_TRANSFER_FALLBACK_PRICE;
  }

  /**
   * Validation failures throw ItineraryValidationError before any retrieval. Past that point,
   * retrieval, routing and narrative failures degrade the plan instead of failing it.
   */
  async buildItinerary(prefs: TravelerPreferences): Promise<Itinerary> {
    const { origin, destinations, totalDays } = validatePreferences(prefs);
    const currency = prefs.currency ?? this.currency;
    const { retriever, routePlanner } = this.deps;

    const allocation = allocateBudget(prefs.budgetTotal);
    const dailyCap = allocation.activitiesTotal / totalDays;
    const nightlyCap = allocation.hotelTotal / totalDays;

    const ledger = new TripCostLedger();
    const usedActivityIds = new Set<string>();
    const days: DayPlan[] = [];
    const notes: string[] = [];
    let dayIndex = 1;

    logger.info('building itinerary', { origin, destinations, totalDays, budget: allocation.total });

    const appendTravelDays = (segments: FlightSegment[], describe: (s: FlightSegment) => string): void => {
      for (const segment of segments) {
        if (segment.source === 'synthetic') {
          notes.push(
            `No flights found for ${segment.from} → ${segment.to}; an estimated ${segment.carrier} leg (${segment.price} ${currency}) was used.`,
          );
        }
        days.push({
          dayIndex: dayIndex++,
          city: segment.from,
          hotel: null,
          activities: [],
          transportSegments: [],
          flight: segment,
          notes: describe(segment),
          estimatedDayCost: roundCurrency(segment.price),
        });
      }
    };

    let entryPlanned = false;
    if (origin) {
      const entry = await routePlanner.planRoute(origin, destinations[0], 'international', ledger);
      appendTravelDays(entry, (s) => `Travel day from ${s.from} → ${s.to}`);
      entryPlanned = true;
    }

    for (const [idx, city] of destinations.entries()) {
      const cityDays = cityDayShare(totalDays, destinations.length, idx);

      const [hotels, attractions, events, transports] = await Promise.all([
        retriever.retrieve('hotel', city, { maxPrice: nightlyCap, currency }),
        retriever.retrieve('attraction', city, {
          interests: prefs.interests,
          excludeIds: [...usedActivityIds],
        }),
        retriever.retrieve('event', city, {
          startDate: prefs.startDate,
          endDate: prefs.endDate,
          excludeIds: [...usedActivityIds],
        }),
        retriever.retrieve('transport', city),
      ]);

      const cityLodgingBudget = (allocation.hotelTotal * cityDays) / totalDays;
      let hotel = selectHotel(hotels, cityDays, cityLodgingBudget);
      if (!hotel && this.missingHotelPolicy === 'placeholder') {
        hotel = placeholderHotel(city);
        notes.push(`No hotel found in ${city}; a placeholder stay was used.`);
      }

      if (!hotel) {
        logger.warn(`no hotel in ${city}; skipping its ${cityDays} day(s)`);
        notes.push(`No hotel found in ${city}; its ${cityDays} planned day(s) were left out.`);
      } else {
        const localTransport = cheapest(transports);
        ledger.addHotel(hotel.pricePerNight * cityDays);
        if (localTransport) {
          ledger.addTransport(localTransport.price * cityDays * this.localLegsPerDay);
        }

        const pool = [...attractions, ...events];
        for (let d = 0; d < cityDays; d++) {
          const activities = selectActivities(pool, dailyCap, dayIndex, usedActivityIds, this.activitySlots);
          const activityFees = sum(activities.map((a) => a.entryFee));
          ledger.addActivities(activityFees);

          const segments = buildLocalLegs(hotel, activities, localTransport);
          if (idx === 0 && d === 0 && entryPlanned) {
            const transfer: TransportSegment = {
              mode: 'car',
              provider: 'Airport Transfer',
              from: `${city} Airport`,
              to: hotel.name,
              price: localTransport?.price ?? this.airportTransferFallbackPrice,
            };
            segments.unshift(transfer);
            ledger.addTransport(transfer.price);
          }

          const hotelCharge = d === 0 ? hotel.pricePerNight * cityDays : 0;
          days.push({
            dayIndex: dayIndex++,
            city,
            hotel: d === 0 ? hotel : null,
            activities,
            transportSegments: segments,
            flight: null,
            notes: `Day ${d + 1} of ${cityDays} in ${city}.`,
            estimatedDayCost: roundCurrency(activityFees + sum(segments.map((s) => s.price)) + hotelCharge),
          });
        }
      }

      if (idx < destinations.length - 1) {
        const next = destinations[idx + 1];
        const hop = await routePlanner.planRoute(city, next, 'domestic', ledger);
        appendTravelDays(hop, (s) => `Travel day: ${s.from} → ${s.to}`);
      }
    }

    if (origin) {
      const last = destinations[destinations.length - 1];
      const back = await routePlanner.planRoute(last, origin, 'international', ledger);
      appendTravelDays(back, (s) => `Return flight from ${s.from} → ${s.to}`);
    }

    notes.push(
      `Costs are estimates in ${currency}; local transport assumes ${this.localLegsPerDay} legs per city day.`,
    );

    let summaryText: string;
    let highlights: string[];
    let narrativeNote: string;
    try {
      const narrative = await this.deps.narrator.narrate({
        origin,
        destinations,
        startDate: prefs.startDate,
        endDate: prefs.endDate,
        travelerType: prefs.travelerType,
        budgetTotal: prefs.budgetTotal,
        currency,
        interests: prefs.interests,
        context: describePlan(days),
      });
      summaryText = narrative.summaryText;
      highlights = narrative.highlights;
      narrativeNote = narrative.commentary;
    } catch (err) {
      logger.warn('narrative generation failed; using fallback text', { err: errMessage(err) });
      summaryText = `${totalDays}-day trip covering ${destinations.join(', ')} (${prefs.startDate} to ${prefs.endDate}).`;
      highlights = ['AI summary unavailable; using fallback description.'];
      narrativeNote = `AI summary generation failed: ${errMessage(err)}`;
    }

    const itinerary: Itinerary = {
      tripId: newTripId(),
      summaryText,
      highlights,
      days,
      cost: ledger.toTripCost(),
      assumptions: [narrativeNote, ...notes],
    };
    logger.info('itinerary built', {
      tripId: itinerary.tripId,
      days: days.length,
      total: itinerary.cost.total,
    });
    return itinerary;
  }
}
