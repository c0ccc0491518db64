// Seed fixtures (JSON) -> document store rows.
import fs from 'fs';
import { z } from 'zod';
import type { NewInventoryRow } from '@/db/schema';
import type { SqlInventoryStore } from './sql-inventory-store';

const seedRecordSchema = z.object({
  id: z.string().min(1),
  category: z.enum(['hotel', 'attraction', 'event', 'flight', 'transport']),
  name: z.string().min(1),
  location: z.string().min(1),
  destination: z.string().optional(),
  price: z.number().nonnegative().default(0),
  rating: z.number().min(0).max(5).optional(),
  tag: z.string().optional(),
  provider: z.string().optional(),
  durationMinutes: z.number().int().positive().optional(),
  date: z.string().optional(),
  description: z.string().optional(),
});

export const seedFileSchema = z.object({
  records: z.array(seedRecordSchema),
});

export type SeedRecord = z.infer<typeof seedRecordSchema>;

export function parseSeedFile(contents: string): SeedRecord[] {
  const json: unknown = JSON.parse(contents);
  return seedFileSchema.parse(json).records;
}

export function loadSeedFile(filePath: string): SeedRecord[] {
  return parseSeedFile(fs.readFileSync(filePath, 'utf8'));
}

export async function seedInventory(store: SqlInventoryStore, records: SeedRecord[]): Promise<number> {
  const rows: NewInventoryRow[] = records.map((r) => ({
    id: r.id,
    category: r.category,
    name: r.name,
    location: r.location,
    destination: r.destination ?? null,
    price: r.price,
    rating: r.rating ?? null,
    tag: r.tag ?? null,
    provider: r.provider ?? null,
    durationMinutes: r.durationMinutes ?? null,
    date: r.date ?? null,
    description: r.description ?? null,
  }));
  return store.insertMany(rows);
}
