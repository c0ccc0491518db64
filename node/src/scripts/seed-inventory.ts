// src/scripts/seed-inventory.ts: load JSON fixtures into the SQLite document store
// Usage: npm run seed [-- path/to/seed.json]
import path from 'path';
import { appConfig } from '@/config/app.config';
import { openInventoryDb } from '@/db';
import { SqlInventoryStore } from '@/services/providers/inventory/sql-inventory-store';
import { loadSeedFile, seedInventory } from '@/services/providers/inventory/seed-loader';
import { logger, errMessage } from '@/services/logger';

async function main(): Promise<void> {
  const file = path.resolve(process.cwd(), process.argv[2] ?? 'data/seed-inventory.json');
  const handle = openInventoryDb(appConfig.inventoryDbPath);
  try {
    const store = new SqlInventoryStore(handle.db);
    const records = loadSeedFile(file);
    const inserted = await seedInventory(store, records);
    logger.info(`seeded ${inserted} of ${records.length} records from ${file}`, {
      db: appConfig.inventoryDbPath,
      total: await store.count(),
    });
  } finally {
    handle.close();
  }
}

main().catch((err: unknown) => {
  logger.error('seed failed', { err: errMessage(err) });
  process.exitCode = 1;
});
