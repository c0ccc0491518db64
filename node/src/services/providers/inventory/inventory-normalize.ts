// Maps raw documents from either backend into InventoryRecord.
// Redis hashes carry the seed's field names (hotelName, cityName, entry_fee, airline, ...),
// SQLite rows carry the store's own (location, price, provider, ...). Both land here.
import type { InventoryCategory, InventoryRecord, InventorySource } from '@/types/inventory';

type RawDoc = Record<string, unknown>;

const ALIASES = {
  id: ['id', 'hotelId', '_id'],
  name: ['name', 'hotelName', 'title'],
  location: ['location', 'cityName', 'city', 'from_city'],
  flightOrigin: ['origin', 'location', 'from', 'cityName'],
  destination: ['destination', 'to', 'to_city'],
  price: ['price', 'entry_fee', 'fare'],
  rating: ['rating'],
  tag: ['tag', 'category', 'type', 'mode'],
  provider: ['provider', 'airline'],
  durationMinutes: ['durationMinutes', 'duration_minutes', 'duration'],
  date: ['date'],
  description: ['description'],
} as const;

function pickString(raw: RawDoc, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = raw[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return undefined;
}

function pickNumber(raw: RawDoc, keys: readonly string[]): number | undefined {
  for (const key of keys) {
    const value = raw[key];
    if (value === null || value === undefined || value === '') continue;
    const n = typeof value === 'number' ? value : Number(value);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}

/**
 * Returns null when the document has no usable id or name.
 * `fallbackId` covers Redis hits whose hash lacks an `id` field (the key suffix is used).
 */
export function normalizeRecord(
  category: InventoryCategory,
  raw: RawDoc,
  source: InventorySource,
  fallbackId?: string,
): InventoryRecord | null {
  const id = pickString(raw, ALIASES.id) ?? fallbackId;
  const location = pickString(raw, category === 'flight' ? ALIASES.flightOrigin : ALIASES.location);
  const destination = category === 'flight' ? pickString(raw, ALIASES.destination) : undefined;
  const provider = pickString(raw, ALIASES.provider);
  const name =
    pickString(raw, ALIASES.name) ??
    (category === 'flight' && provider ? `${provider} ${location ?? ''}-${destination ?? ''}` : undefined);

  if (!id || !name || !location) return null;

  const record: InventoryRecord = {
    id,
    category,
    name,
    location,
    price: Math.max(0, pickNumber(raw, ALIASES.price) ?? 0),
    source,
  };
  if (destination) record.destination = destination;
  const rating = pickNumber(raw, ALIASES.rating);
  if (rating !== undefined) record.rating = rating;
  const tag = pickString(raw, ALIASES.tag);
  if (tag) record.tag = tag;
  if (provider) record.provider = provider;
  const duration = pickNumber(raw, ALIASES.durationMinutes);
  if (duration !== undefined) record.durationMinutes = duration;
  const date = pickString(raw, ALIASES.date);
  if (date) record.date = date;
  const description = pickString(raw, ALIASES.description);
  if (description) record.description = description;
  return record;
}

/** Text embedded for a record when it is written to the vector index. */
export function recordToText(r: InventoryRecord): string {
  return [r.name, r.tag, r.location, r.destination, r.provider, r.description]
    .filter(Boolean)
    .join(' ');
}

/** Hash fields written to the vector index; tag fields match what the retriever filters on. */
export function recordToIndexFields(r: InventoryRecord): Record<string, string> {
  const fields: Record<string, string> = {
    id: r.id,
    name: r.name,
    price: String(r.price),
    category: r.tag ?? '',
  };
  if (r.category === 'flight') {
    fields.origin = r.location;
    fields.destination = r.destination ?? '';
  } else {
    fields.cityName = r.location;
  }
  if (r.rating !== undefined) fields.rating = String(r.rating);
  if (r.provider) fields.provider = r.provider;
  if (r.durationMinutes !== undefined) fields.duration_minutes = String(r.durationMinutes);
  if (r.date) fields.date = r.date;
  if (r.description) fields.description = r.description;
  return fields;
}
