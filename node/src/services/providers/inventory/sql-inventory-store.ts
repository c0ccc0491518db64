// SQLite-backed document store: the retriever's fallback when the vector index has nothing.
import { and, asc, eq, notInArray, or, sql, type SQL } from 'drizzle-orm';
import type { InventoryDb } from '@/db';
import { inventory, type InventoryRow, type NewInventoryRow } from '@/db/schema';
import type { InventoryCategory } from '@/types/inventory';
import type { DocumentStore, StoreFilter, StoredDoc } from '@/services/providers/retrieval-types';

function sameText(column: typeof inventory.location | typeof inventory.destination, value: string): SQL {
  return sql`lower(trim(${column})) = ${value.trim().toLowerCase()}`;
}

/** Drops the bookkeeping columns so `category` is never mistaken for an attraction category. */
function toDoc(row: InventoryRow): StoredDoc {
  const { rowId: _rowId, category: _category, ...doc } = row;
  return doc;
}

export class SqlInventoryStore implements DocumentStore {
  readonly name = 'sql-inventory';

  constructor(private readonly db: InventoryDb) {}

  async find(category: InventoryCategory, filter: StoreFilter): Promise<StoredDoc[]> {
    if (filter.limit <= 0) return [];

    const conditions: SQL[] = [eq(inventory.category, category)];
    if (filter.matchEitherEnd) {
      const either = or(sameText(inventory.location, filter.location), sameText(inventory.destination, filter.location));
      if (either) conditions.push(either);
    } else {
      conditions.push(sameText(inventory.location, filter.location));
    }
    if (filter.destination !== undefined) {
      conditions.push(sameText(inventory.destination, filter.destination));
    }
    if (filter.excludeIds && filter.excludeIds.length > 0) {
      conditions.push(notInArray(inventory.id, filter.excludeIds));
    }

    const rows = this.db
      .select()
      .from(inventory)
      .where(and(...conditions))
      .orderBy(asc(inventory.rowId))
      .limit(filter.limit)
      .all();
    return rows.map(toDoc);
  }

  async all(category: InventoryCategory): Promise<StoredDoc[]> {
    const rows = this.db
      .select()
      .from(inventory)
      .where(eq(inventory.category, category))
      .orderBy(asc(inventory.rowId))
      .all();
    return rows.map(toDoc);
  }

  /** Inserts rows, skipping any (category, id) already present. Returns rows written. */
  async insertMany(rows: NewInventoryRow[]): Promise<number> {
    let written = 0;
    for (const row of rows) {
      const result = this.db.insert(inventory).values(row).onConflictDoNothing().run();
      written += result.changes;
    }
    return written;
  }

  async count(category?: InventoryCategory): Promise<number> {
    const rows = this.db
      .select({ n: sql<number>`count(*)` })
      .from(inventory)
      .where(category ? eq(inventory.category, category) : undefined)
      .all();
    return Number(rows[0]?.n ?? 0);
  }
}
