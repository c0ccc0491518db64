// Copies every document-store record into the vector index (embedding + tag fields).
// Idempotent: keys are `{prefix}{id}`, so re-running overwrites rather than duplicates.
import { INVENTORY_CATEGORIES, type InventoryCategory } from '@/types/inventory';
import {
  INDEX_SPECS,
  type DocumentStore,
  type VectorDocument,
  type VectorIndexWriter,
} from '@/services/providers/retrieval-types';
import type { Embedder } from '@/services/providers/retrieval-vector-utils';
import { normalizeRecord, recordToIndexFields, recordToText } from './inventory-normalize';
import { logger } from '@/services/logger';

export type SyncReport = Record<InventoryCategory, number>;

export async function syncEmbeddings(
  store: DocumentStore,
  writer: VectorIndexWriter,
  embedder: Embedder,
  dim: number,
): Promise<SyncReport> {
  const report: SyncReport = { hotel: 0, attraction: 0, event: 0, flight: 0, transport: 0 };

  for (const category of INVENTORY_CATEGORIES) {
    const spec = INDEX_SPECS[category];
    await writer.ensureIndex(spec.index, spec.prefix, dim);

    const docs: VectorDocument[] = [];
    for (const raw of await store.all(category)) {
      const record = normalizeRecord(category, raw, 'fallback-store');
      if (!record) continue;
      docs.push({
        key: `${spec.prefix}${record.id}`,
        fields: recordToIndexFields(record),
        vector: await embedder.embed(recordToText(record)),
      });
    }
    report[category] = await writer.upsert(spec.index, docs);
    logger.info(`synced ${report[category]} ${category} embeddings into ${spec.index}`);
  }
  return report;
}
