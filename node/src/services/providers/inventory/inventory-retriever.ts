import type { InventoryCategory, InventoryRecord, RetrievalCriteria } from '@/types/inventory';

export interface InventoryRetriever {
  retrieve(
    category: InventoryCategory,
    location: string,
    criteria?: RetrievalCriteria,
    limit?: number,
  ): Promise<InventoryRecord[]>;
}
