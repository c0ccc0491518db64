/**
 * Drizzle ORM setup for the inventory store (better-sqlite3).
 * Pass ':memory:' for an in-process database.
 */

import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import * as schema from './schema';

export type InventoryDb = BetterSQLite3Database<typeof schema>;

export interface InventoryDbHandle {
  db: InventoryDb;
  close(): void;
}

export function openInventoryDb(filename: string): InventoryDbHandle {
  if (filename !== ':memory:') {
    const dataDir = path.dirname(filename);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const sqlite = new Database(filename);
  sqlite.pragma('journal_mode = WAL');
  sqlite.exec(schema.CREATE_INVENTORY_TABLE_SQL);

  const db = drizzle(sqlite, { schema });
  return {
    db,
    close: () => sqlite.close(),
  };
}
