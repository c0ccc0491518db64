/**
 * Drizzle schema for the inventory document store (SQLite).
 * One table for every category; `category` + `id` is unique.
 */

import { integer, real, text, sqliteTable, index, uniqueIndex } from 'drizzle-orm/sqlite-core';

export const inventory = sqliteTable('inventory', {
  rowId: integer('row_id').primaryKey({ autoIncrement: true }),
  id: text('id').notNull(),
  category: text('category', {
    enum: ['hotel', 'attraction', 'event', 'flight', 'transport'],
  }).notNull(),
  name: text('name').notNull(),
  location: text('location').notNull(),
  destination: text('destination'),
  price: real('price').notNull().default(0),
  rating: real('rating'),
  tag: text('tag'),
  provider: text('provider'),
  durationMinutes: integer('duration_minutes'),
  date: text('date'),
  description: text('description'),
}, (table) => ({
  categoryIdIdx: uniqueIndex('ux_inventory_category_id').on(table.category, table.id),
  locationIdx: index('idx_inventory_location').on(table.category, table.location),
}));

export type InventoryRow = typeof inventory.$inferSelect;
export type NewInventoryRow = typeof inventory.$inferInsert;

export const CREATE_INVENTORY_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS inventory (
  row_id INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL,
  category TEXT NOT NULL,
  name TEXT NOT NULL,
  location TEXT NOT NULL,
  destination TEXT,
  price REAL NOT NULL DEFAULT 0,
  rating REAL,
  tag TEXT,
  provider TEXT,
  duration_minutes INTEGER,
  date TEXT,
  description TEXT
);
CREATE UNIQUE INDEX IF NOT EXISTS ux_inventory_category_id ON inventory (category, id);
CREATE INDEX IF NOT EXISTS idx_inventory_location ON inventory (category, location);
`;
