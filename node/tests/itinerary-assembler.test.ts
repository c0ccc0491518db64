import { describe, it, expect } from 'vitest';
import { ItineraryAssembler, cityDayShare, validatePreferences } from '@/services/planner/itinerary-assembler';
import { RoutePlanner } from '@/services/planner/route-planner';
import { roundCurrency } from '@/services/planner/budget-allocator';
import { ItineraryValidationError } from '@/utils/errors';
import type { InventoryRecord } from '@/types/inventory';
import type { TravelerPreferences } from '@/types/itinerary';
import { FailingNarrator, FakeRetriever, StubNarrator, makeRecord } from './helpers/fixtures';

function assemblerFor(records: InventoryRecord[], options: ConstructorParameters<typeof ItineraryAssembler>[1] = {}) {
  const retriever = new FakeRetriever(records);
  const narrator = new StubNarrator();
  const assembler = new ItineraryAssembler(
    { retriever, routePlanner: new RoutePlanner(retriever), narrator },
    options,
  );
  return { assembler, retriever, narrator };
}

const JEDDAH_TRIP: TravelerPreferences = {
  origin: 'Riyadh',
  destinations: ['Jeddah'],
  startDate: '2025-01-01',
  endDate: '2025-01-03',
  budgetTotal: 3000,
  interests: ['history'],
  travelerType: 'solo',
};

const JEDDAH_INVENTORY: InventoryRecord[] = [
  makeRecord('flight', { id: 'f-out', location: 'Riyadh', destination: 'Jeddah', price: 450, provider: 'flyadeal' }),
  makeRecord('flight', { id: 'f-back', location: 'Jeddah', destination: 'Riyadh', price: 480, provider: 'Saudia' }),
  makeRecord('hotel', { id: 'h1', name: 'Corniche Sea Breeze', location: 'Jeddah', price: 360, rating: 4.4 }),
  makeRecord('hotel', { id: 'h2', name: 'Al Balad Inn', location: 'Jeddah', price: 280, rating: 4.1 }),
  makeRecord('attraction', { id: 'a1', location: 'Jeddah', tag: 'heritage', price: 0 }),
  makeRecord('attraction', { id: 'a2', location: 'Jeddah', tag: 'museum', price: 50 }),
  makeRecord('attraction', { id: 'a3', location: 'Jeddah', tag: 'family', price: 85 }),
  makeRecord('transport', { id: 't1', location: 'Jeddah', tag: 'car', provider: 'Uber', price: 30 }),
];

describe('ItineraryAssembler', () => {
  describe('single city with origin', () => {
    it('builds entry flight, city days and return flight', async () => {
      const { assembler } = assemblerFor(JEDDAH_INVENTORY);
      const itinerary = await assembler.buildItinerary(JEDDAH_TRIP);

      expect(itinerary.tripId).toMatch(/^TRIP-[0-9A-F]{8}$/);
      expect(itinerary.days.map((d) => [d.dayIndex, d.city, d.flight?.carrier ?? null])).toEqual([
        [1, 'Riyadh', 'flyadeal'],
        [2, 'Jeddah', null],
        [3, 'Jeddah', null],
        [4, 'Jeddah', null],
        [5, 'Jeddah', 'Saudia'],
      ]);
      expect(itinerary.days[0].estimatedDayCost).toBe(450);
      expect(itinerary.days[4].notes).toBe('Return flight from Jeddah → Riyadh');
    });

    it('stays at the best-rated hotel and books it on the first city day', async () => {
      const { assembler } = assemblerFor(JEDDAH_INVENTORY);
      const { days } = await assembler.buildItinerary(JEDDAH_TRIP);

      expect(days[1].hotel).toEqual({
        id: 'h1',
        name: 'Corniche Sea Breeze',
        city: 'Jeddah',
        pricePerNight: 360,
        rating: 4.4,
        source: 'fallback-store',
      });
      expect(days[2].hotel).toBeNull();
      expect(days[3].hotel).toBeNull();
    });

    it('spends activities once and adds the airport transfer to the first day', async () => {
      const { assembler } = assemblerFor(JEDDAH_INVENTORY);
      const { days } = await assembler.buildItinerary(JEDDAH_TRIP);
      const [first, second, third] = days.slice(1, 4);

      expect(first.activities.map((a) => a.id).sort()).toEqual(['a1', 'a2', 'a3']);
      expect(second.activities).toEqual([]);
      expect(third.activities).toEqual([]);

      expect(first.transportSegments[0]).toEqual({
        mode: 'car',
        provider: 'Airport Transfer',
        from: 'Jeddah Airport',
        to: 'Corniche Sea Breeze',
        price: 30,
      });
      const legs = first.transportSegments.slice(1);
      expect(legs).toHaveLength(4);
      expect(legs[0].from).toBe('Corniche Sea Breeze');
      expect(legs[3].to).toBe('Corniche Sea Breeze');
      expect(legs.every((l) => l.provider === 'Uber' && l.price === 30)).toBe(true);

      // fees 135 + five 30 legs + three nights at 360
      expect(first.estimatedDayCost).toBe(1365);
      expect(second.estimatedDayCost).toBe(0);
    });

    it('totals actual spend per category', async () => {
      const { assembler } = assemblerFor(JEDDAH_INVENTORY);
      const { cost } = await assembler.buildItinerary(JEDDAH_TRIP);
      expect(cost).toEqual({
        hotelTotal: 1080,
        activitiesTotal: 135,
        transportTotal: 300,
        flightsTotal: 930,
        total: 2445,
      });
    });

    it('passes the built plan to the narrator', async () => {
      const { assembler, narrator } = assemblerFor(JEDDAH_INVENTORY);
      const itinerary = await assembler.buildItinerary(JEDDAH_TRIP);

      expect(itinerary.summaryText).toBe('A short trip.');
      expect(itinerary.highlights).toEqual(['Old town walk']);
      expect(itinerary.assumptions).toEqual([
        'Fits the budget.',
        'Costs are estimates in SAR; local transport assumes 3 legs per city day.',
      ]);

      const [request] = narrator.requests;
      expect(request.destinations).toEqual(['Jeddah']);
      expect(request.currency).toBe('SAR');
      expect(request.context.split('\n')[0]).toBe('Day 1 (Riyadh), flyadeal Riyadh → Jeddah');
      expect(request.context.split('\n')[1]).toMatch(/^Day 2 \(Jeddah\), stay at Corniche Sea Breeze, activities: /);
    });

    it('queries hotels with the nightly ceiling and attractions with interests', async () => {
      const { assembler, retriever } = assemblerFor(JEDDAH_INVENTORY);
      await assembler.buildItinerary(JEDDAH_TRIP);

      const hotelCall = retriever.calls.find((c) => c.category === 'hotel');
      expect(hotelCall?.criteria).toEqual({ maxPrice: 600, currency: 'SAR' });
      const attractionCall = retriever.calls.find((c) => c.category === 'attraction');
      expect(attractionCall?.criteria).toEqual({ interests: ['history'], excludeIds: [] });
      const eventCall = retriever.calls.find((c) => c.category === 'event');
      expect(eventCall?.criteria).toEqual({ startDate: '2025-01-01', endDate: '2025-01-03', excludeIds: [] });
    });
  });

  describe('no inventory at all', () => {
    const TWO_CITIES: TravelerPreferences = {
      origin: 'London',
      destinations: ['Riyadh', 'Jeddah'],
      startDate: '2025-03-01',
      endDate: '2025-03-04',
      budgetTotal: 5000,
      interests: [],
      travelerType: 'family',
    };

    it('returns flight-only days built from placeholder routes', async () => {
      const { assembler } = assemblerFor([]);
      const itinerary = await assembler.buildItinerary(TWO_CITIES);

      expect(itinerary.days.map((d) => [d.dayIndex, d.city, d.flight?.carrier, d.flight?.source])).toEqual([
        [1, 'London', 'Fallback Route', 'synthetic'],
        [2, 'Riyadh', 'Road Route', 'synthetic'],
        [3, 'Jeddah', 'Fallback Route', 'synthetic'],
      ]);
      expect(itinerary.days.every((d) => d.hotel === null && d.activities.length === 0)).toBe(true);
      expect(itinerary.cost).toEqual({
        hotelTotal: 0,
        activitiesTotal: 0,
        transportTotal: 0,
        flightsTotal: 3900,
        total: 3900,
      });
      expect(itinerary.assumptions).toEqual([
        'Fits the budget.',
        'No flights found for London → Riyadh; an estimated Fallback Route leg (1800 SAR) was used.',
        'No hotel found in Riyadh; its 2 planned day(s) were left out.',
        'No flights found for Riyadh → Jeddah; an estimated Road Route leg (300 SAR) was used.',
        'No hotel found in Jeddah; its 2 planned day(s) were left out.',
        'No flights found for Jeddah → London; an estimated Fallback Route leg (1800 SAR) was used.',
        'Costs are estimates in SAR; local transport assumes 3 legs per city day.',
      ]);
    });

    it('uses fallback narrative text when the narrator fails', async () => {
      const retriever = new FakeRetriever();
      const assembler = new ItineraryAssembler({
        retriever,
        routePlanner: new RoutePlanner(retriever),
        narrator: new FailingNarrator(),
      });
      const itinerary = await assembler.buildItinerary(TWO_CITIES);

      expect(itinerary.summaryText).toBe('4-day trip covering Riyadh, Jeddah (2025-03-01 to 2025-03-04).');
      expect(itinerary.highlights).toEqual(['AI summary unavailable; using fallback description.']);
      expect(itinerary.assumptions[0]).toBe('AI summary generation failed: model unavailable');
    });

    it('keeps the city with a placeholder stay when configured', async () => {
      const { assembler, retriever } = assemblerFor([], { missingHotelPolicy: 'placeholder' });
      const itinerary = await assembler.buildItinerary({
        destinations: ['Abha'],
        startDate: '2025-05-10',
        endDate: '2025-05-11',
        budgetTotal: 1000,
        interests: [],
        travelerType: 'solo',
      });

      expect(retriever.flightQueries()).toEqual([]);
      expect(itinerary.days).toHaveLength(2);
      expect(itinerary.days[0].hotel).toEqual({
        id: 'placeholder-abha',
        name: 'Accommodation in Abha (to be booked)',
        city: 'Abha',
        pricePerNight: 0,
        source: 'placeholder',
      });
      expect(itinerary.days[0].transportSegments).toEqual([]);
      expect(itinerary.cost.total).toBe(0);
      expect(itinerary.assumptions).toContain('No hotel found in Abha; a placeholder stay was used.');
    });
  });

  describe('multi-city invariants', () => {
    const tags = ['history', 'museum', 'nature', 'market', 'food', 'art', 'family', 'viewpoint'];
    const attractions = (city: string, prefix: string) =>
      tags.map((tag, i) => makeRecord('attraction', { id: `${prefix}${i}`, location: city, tag, price: (i * 37) % 160 }));

    const inventory: InventoryRecord[] = [
      makeRecord('hotel', { id: 'rh', location: 'Riyadh', price: 200, rating: 4 }),
      makeRecord('hotel', { id: 'jh', location: 'Jeddah', price: 250, rating: 4 }),
      makeRecord('transport', { id: 'rt', location: 'Riyadh', tag: 'metro', price: 20 }),
      makeRecord('transport', { id: 'jt', location: 'Jeddah', tag: 'car', price: 30 }),
      makeRecord('flight', { id: 'rj', location: 'Riyadh', destination: 'Jeddah', price: 450, provider: 'flyadeal' }),
      makeRecord('event', { id: 'ev', location: 'Jeddah', tag: 'show', price: 40, date: '2025-01-05' }),
      ...attractions('Riyadh', 'r'),
      ...attractions('Jeddah', 'j'),
    ];

    const TRIP: TravelerPreferences = {
      destinations: ['Riyadh', 'Jeddah'],
      startDate: '2025-01-01',
      endDate: '2025-01-05',
      budgetTotal: 4000,
      interests: ['history'],
      travelerType: 'couple',
    };

    it('lays out contiguous days with the travel day between cities', async () => {
      const { assembler } = assemblerFor(inventory);
      const { days } = await assembler.buildItinerary(TRIP);
      expect(days.map((d) => d.dayIndex)).toEqual([1, 2, 3, 4, 5, 6]);
      expect(days.map((d) => d.city)).toEqual(['Riyadh', 'Riyadh', 'Riyadh', 'Riyadh', 'Jeddah', 'Jeddah']);
      expect(days[3].flight).toMatchObject({ carrier: 'flyadeal', from: 'Riyadh', to: 'Jeddah' });
      expect(days[3].notes).toBe('Travel day: Riyadh → Jeddah');
    });

    it('never repeats an activity and keeps each day under the cap', async () => {
      const { assembler } = assemblerFor(inventory);
      const { days, cost } = await assembler.buildItinerary(TRIP);
      const dailyCap = (4000 * 0.25) / 5;

      const ids = days.flatMap((d) => d.activities.map((a) => a.id));
      expect(new Set(ids).size).toBe(ids.length);
      for (const day of days) {
        expect(day.activities.reduce((acc, a) => acc + a.entryFee, 0)).toBeLessThanOrEqual(dailyCap);
        expect(new Set(day.activities.map((a) => a.category)).size).toBe(day.activities.length);
        expect(day.activities.every((a) => a.city === day.city)).toBe(true);
      }
      const fees = days.flatMap((d) => d.activities.map((a) => a.entryFee)).reduce((acc, f) => acc + f, 0);
      expect(cost.activitiesTotal).toBe(roundCurrency(fees));
    });

    it('keeps totals consistent with the subtotals', async () => {
      const { assembler } = assemblerFor(inventory);
      const { cost } = await assembler.buildItinerary(TRIP);
      expect(cost.hotelTotal).toBe(1100);
      expect(cost.transportTotal).toBe(360);
      expect(cost.flightsTotal).toBe(450);
      expect(cost.total).toBe(roundCurrency(cost.hotelTotal + cost.activitiesTotal + cost.transportTotal + cost.flightsTotal));
    });

    it('excludes activities already used in earlier cities from later lookups', async () => {
      const { assembler, retriever } = assemblerFor(inventory);
      const { days } = await assembler.buildItinerary(TRIP);
      const riyadhIds = days.filter((d) => d.city === 'Riyadh').flatMap((d) => d.activities.map((a) => a.id));
      const jeddahCall = retriever.calls.find((c) => c.category === 'attraction' && c.location === 'Jeddah');
      expect([...(jeddahCall?.criteria.excludeIds ?? [])].sort()).toEqual([...riyadhIds].sort());
    });

    it('is reproducible apart from the trip id', async () => {
      const first = await assemblerFor(inventory).assembler.buildItinerary(TRIP);
      const second = await assemblerFor(inventory).assembler.buildItinerary(TRIP);
      expect(second.days).toEqual(first.days);
      expect(second.cost).toEqual(first.cost);
    });
  });

  describe('validation', () => {
    const base: TravelerPreferences = {
      destinations: ['Riyadh'],
      startDate: '2025-01-01',
      endDate: '2025-01-02',
      budgetTotal: 1000,
      interests: [],
      travelerType: 'solo',
    };

    const invalid: Array<[string, Partial<TravelerPreferences>, string]> = [
      ['no destinations', { destinations: ['  '] }, 'destinations'],
      ['end before start', { endDate: '2024-12-31' }, 'endDate'],
      ['impossible date', { startDate: '2025-02-30' }, 'startDate'],
      ['non-positive budget', { budgetTotal: 0 }, 'budgetTotal'],
    ];

    it.each(invalid)('rejects %s before any retrieval', async (_label, patch, path) => {
      const { assembler, retriever } = assemblerFor(JEDDAH_INVENTORY);
      const error = await assembler.buildItinerary({ ...base, ...patch }).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ItineraryValidationError);
      if (error instanceof ItineraryValidationError) {
        expect(error.issues.map((i) => i.path)).toContain(path);
      }
      expect(retriever.calls).toEqual([]);
    });

    it('counts trip days inclusively', () => {
      expect(validatePreferences({ ...base, endDate: '2025-01-01' }).totalDays).toBe(1);
      expect(validatePreferences({ ...base, origin: '  ' }).origin).toBeUndefined();
    });
  });
});

describe('cityDayShare', () => {
  it('gives the remainder to the earliest cities', () => {
    expect([0, 1, 2].map((i) => cityDayShare(7, 3, i))).toEqual([3, 2, 2]);
  });

  it('gives every city at least one day', () => {
    expect([0, 1, 2].map((i) => cityDayShare(2, 3, i))).toEqual([1, 1, 1]);
  });
});
