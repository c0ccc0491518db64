// Rule-based selection: one hotel per city stay, and a diversified, budget-capped,
// never-repeating set of activities per day.
import type { InventoryRecord } from '@/types/inventory';
import type { Activity, Hotel } from '@/types/itinerary';
import { seededShuffle } from './seeded-random';

export const DEFAULT_ACTIVITY_SLOTS = 3;
export const DEFAULT_ACTIVITY_DURATION_MIN = 120;
export const DEFAULT_ACTIVITY_CATEGORY = 'general';

function toHotel(record: InventoryRecord): Hotel {
  const hotel: Hotel = {
    id: record.id,
    name: record.name,
    city: record.location,
    pricePerNight: record.price,
    source: record.source,
  };
  if (record.rating !== undefined) hotel.rating = record.rating;
  return hotel;
}

/**
 * Best-rated hotel whose `price * nights` fits the lodging budget (cheaper first on equal rating).
 * When nothing fits, the cheapest candidate regardless of budget. Null only for an empty list.
 */
export function selectHotel(
  candidates: readonly InventoryRecord[],
  nights: number,
  lodgingBudget: number,
): Hotel | null {
  if (candidates.length === 0) return null;

  const sorted = [...candidates].sort(
    (a, b) => (b.rating ?? 0) - (a.rating ?? 0) || a.price - b.price,
  );

  const fitting = sorted.find((h) => h.price * nights <= lodgingBudget);
  if (fitting) return toHotel(fitting);

  let cheapest = sorted[0];
  for (const h of sorted) {
    if (h.price < cheapest.price) cheapest = h;
  }
  return toHotel(cheapest);
}

export function activityCategory(record: InventoryRecord): string {
  return record.tag?.trim() || DEFAULT_ACTIVITY_CATEGORY;
}

function toActivity(record: InventoryRecord): Activity {
  const activity: Activity = {
    id: record.id,
    name: record.name,
    city: record.location,
    category: activityCategory(record),
    entryFee: record.price,
    durationMinutes: record.durationMinutes ?? DEFAULT_ACTIVITY_DURATION_MIN,
    bestTimeHint: record.category === 'event' ? 'Evening' : 'Morning',
    source: record.source,
  };
  if (record.date) activity.date = record.date;
  return activity;
}

/**
 * Picks up to `slots` activities for one day.
 *
 * The pool is shuffled with `dayNumber` as seed, then scanned greedily: used ids, repeated
 * categories and anything that would push the day over `dailyCap` are skipped. Picked ids are
 * added to `usedIds` in place, so consecutive calls in one build never repeat an activity.
 * A pool without category variety can leave a day empty.
 */
export function selectActivities(
  pool: readonly InventoryRecord[],
  dailyCap: number,
  dayNumber: number,
  usedIds: Set<string>,
  slots: number = DEFAULT_ACTIVITY_SLOTS,
): Activity[] {
  if (pool.length === 0 || slots <= 0) return [];

  const picked: Activity[] = [];
  const categories = new Set<string>();
  let spent = 0;

  for (const candidate of seededShuffle(pool, dayNumber)) {
    if (usedIds.has(candidate.id)) continue;
    const category = activityCategory(candidate);
    if (categories.has(category)) continue;
    if (spent + candidate.price > dailyCap) continue;

    picked.push(toActivity(candidate));
    usedIds.add(candidate.id);
    categories.add(category);
    spent += candidate.price;

    if (picked.length >= slots) break;
  }
  return picked;
}
