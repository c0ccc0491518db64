// src/scripts/sync-embeddings.ts: embed every stored record into the Redis vector index
import { appConfig } from '@/config/app.config';
import { createPlannerDeps } from '@/services/pipeline-deps';
import { syncEmbeddings } from '@/services/providers/inventory/embedding-sync';
import { logger, errMessage } from '@/services/logger';

async function main(): Promise<void> {
  if (!appConfig.redisUrl) {
    logger.warn('REDIS_URL not set; syncing into an in-process index that exits with this script');
  }
  const deps = createPlannerDeps(appConfig);
  try {
    const report = await syncEmbeddings(deps.store, deps.vector, deps.embedder, deps.embeddingDim);
    logger.info('embedding sync complete', report);
  } finally {
    await deps.close();
  }
}

main().catch((err: unknown) => {
  logger.error('embedding sync failed', { err: errMessage(err) });
  process.exitCode = 1;
});
