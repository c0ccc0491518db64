import { describe, it, expect } from 'vitest';
import { selectActivities, selectHotel } from '@/services/planner/selection-engine';
import { makeRecord } from './helpers/fixtures';

describe('selectHotel', () => {
  const hotels = [
    makeRecord('hotel', { id: 'A', location: 'Riyadh', price: 500, rating: 4.8 }),
    makeRecord('hotel', { id: 'B', location: 'Riyadh', price: 200, rating: 4.5 }),
    makeRecord('hotel', { id: 'C', location: 'Riyadh', price: 400, rating: 4.8 }),
  ];

  it('prefers the highest rating, cheaper first on ties', () => {
    expect(selectHotel(hotels, 2, 900)?.id).toBe('C');
  });

  it('falls through to a lower-rated hotel that fits', () => {
    expect(selectHotel(hotels, 2, 500)?.id).toBe('B');
  });

  it('takes the cheapest when nothing fits', () => {
    const hotel = selectHotel(hotels, 2, 100);
    expect(hotel).toEqual({ id: 'B', name: 'B', city: 'Riyadh', pricePerNight: 200, rating: 4.5, source: 'fallback-store' });
  });

  it('treats a missing rating as zero', () => {
    const unrated = makeRecord('hotel', { id: 'U', location: 'Riyadh', price: 50 });
    const rated = makeRecord('hotel', { id: 'R', location: 'Riyadh', price: 90, rating: 1 });
    expect(selectHotel([unrated, rated], 1, 1000)?.id).toBe('R');
  });

  it('returns null for no candidates', () => {
    expect(selectHotel([], 3, 1000)).toBeNull();
  });
});

describe('selectActivities', () => {
  const distinct = [
    makeRecord('attraction', { id: 'a1', location: 'Jeddah', tag: 'museum', price: 0 }),
    makeRecord('attraction', { id: 'a2', location: 'Jeddah', tag: 'heritage', price: 0 }),
    makeRecord('attraction', { id: 'a3', location: 'Jeddah', tag: 'nature', price: 0 }),
  ];

  it('fills every slot from a varied pool and marks ids used', () => {
    const used = new Set<string>();
    const picked = selectActivities(distinct, 100, 1, used);
    expect(picked.map((a) => a.id).sort()).toEqual(['a1', 'a2', 'a3']);
    expect([...used].sort()).toEqual(['a1', 'a2', 'a3']);
  });

  it('never picks two activities of one category in a day', () => {
    const sameTag = ['m1', 'm2', 'm3'].map((id) => makeRecord('attraction', { id, location: 'Jeddah', tag: 'museum' }));
    expect(selectActivities(sameTag, 100, 2, new Set())).toHaveLength(1);
  });

  it('skips ids already used in the trip', () => {
    const picked = selectActivities(distinct, 100, 1, new Set(['a2']));
    expect(picked.map((a) => a.id).sort()).toEqual(['a1', 'a3']);
  });

  it('keeps the day under the activity cap', () => {
    const priced = [
      makeRecord('attraction', { id: 'p1', location: 'Abha', tag: 'x', price: 100 }),
      makeRecord('attraction', { id: 'p2', location: 'Abha', tag: 'y', price: 200 }),
      makeRecord('attraction', { id: 'p3', location: 'Abha', tag: 'z', price: 300 }),
    ];
    for (const day of [1, 2, 3, 4, 5]) {
      const picked = selectActivities(priced, 250, day, new Set());
      const spent = picked.reduce((acc, a) => acc + a.entryFee, 0);
      expect(picked.length).toBeGreaterThan(0);
      expect(spent).toBeLessThanOrEqual(250);
    }
  });

  it('is deterministic for a day number', () => {
    const pool = ['q', 'r', 's', 't', 'u', 'v'].map((id) => makeRecord('attraction', { id, location: 'AlUla', tag: id }));
    const first = selectActivities(pool, 100, 4, new Set()).map((a) => a.id);
    expect(selectActivities(pool, 100, 4, new Set()).map((a) => a.id)).toEqual(first);
  });

  it('fills activity defaults from the record', () => {
    const event = makeRecord('event', { id: 'e1', location: 'Riyadh', name: 'Night Show', price: 40, date: '2025-01-02' });
    const [activity] = selectActivities([event], 100, 1, new Set());
    expect(activity).toEqual({
      id: 'e1',
      name: 'Night Show',
      city: 'Riyadh',
      category: 'general',
      entryFee: 40,
      durationMinutes: 120,
      bestTimeHint: 'Evening',
      date: '2025-01-02',
      source: 'fallback-store',
    });
  });

  it('returns nothing for an empty pool or zero slots', () => {
    expect(selectActivities([], 100, 1, new Set())).toEqual([]);
    expect(selectActivities(distinct, 100, 1, new Set(), 0)).toEqual([]);
  });
});
