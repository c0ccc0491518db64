// src/services/pipeline-deps.ts: shared planner dependencies for the HTTP route and the scripts
import Redis from 'ioredis';
import { appConfig, type AppConfig } from '@/config/app.config';
import { openInventoryDb } from '@/db';
import { SqlInventoryStore } from '@/services/providers/inventory/sql-inventory-store';
import { HybridInventoryRetriever } from '@/services/providers/inventory/inventory-retriever-hybrid';
import { InMemoryVectorSearch } from '@/services/providers/inventory/in-memory-vector-search';
import { RedisVectorSearch, fromIoredis } from '@/services/providers/inventory/redis-vector-search';
import type { VectorIndexWriter, VectorSearch } from '@/services/providers/retrieval-types';
import type { Embedder } from '@/services/providers/retrieval-vector-utils';
import { SimpleEmbedder } from '@/services/providers/web/simple-embedder';
import { RoutePlanner } from '@/services/planner/route-planner';
import { ItineraryAssembler } from '@/services/planner/itinerary-assembler';
import { LlmNarrativeGenerator } from '@/services/narrative-generator';
import { OpenAiLlmClient } from '@/services/llm-client';
import { logger, errMessage } from '@/services/logger';

export interface PlannerDeps {
  assembler: ItineraryAssembler;
  store: SqlInventoryStore;
  vector: VectorSearch & VectorIndexWriter;
  embedder: Embedder;
  embeddingDim: number;
  close(): Promise<void>;
}

let cachedDeps: PlannerDeps | null = null;

/**
 * Builds the planner from config: Redis KNN when REDIS_URL is set, otherwise an in-process index
 * (empty until embeddings are synced, so lookups go to the SQLite store).
 */
export function createPlannerDeps(config: AppConfig = appConfig): PlannerDeps {
  const handle = openInventoryDb(config.inventoryDbPath);
  const store = new SqlInventoryStore(handle.db);
  const embedder = new SimpleEmbedder(config.embeddingDim);

  let redis: Redis | null = null;
  let vector: VectorSearch & VectorIndexWriter;
  if (config.redisUrl) {
    redis = new Redis(config.redisUrl, { maxRetriesPerRequest: 1, lazyConnect: true });
    redis.on('error', (err) => logger.warn('redis connection error', { err: errMessage(err) }));
    vector = new RedisVectorSearch(fromIoredis(redis));
  } else {
    vector = new InMemoryVectorSearch();
  }
  logger.info(`inventory vector backend: ${vector.name}`);

  const retriever = new HybridInventoryRetriever(vector, store, embedder, {
    vectorTimeoutMs: config.vectorSearchTimeoutMs,
    currency: config.currency,
  });
  const narrator = new LlmNarrativeGenerator(new OpenAiLlmClient(config.openaiApiKey, config.openaiModel), {
    timeoutMs: config.narrativeTimeoutMs,
  });
  const assembler = new ItineraryAssembler(
    { retriever, routePlanner: new RoutePlanner(retriever), narrator },
    { missingHotelPolicy: config.missingHotelPolicy, currency: config.currency },
  );

  return {
    assembler,
    store,
    vector,
    embedder,
    embeddingDim: config.embeddingDim,
    close: async () => {
      if (redis) await redis.quit();
      handle.close();
    },
  };
}

export function getPlannerDeps(): PlannerDeps {
  if (!cachedDeps) cachedDeps = createPlannerDeps();
  return cachedDeps;
}

export async function closePlannerDeps(): Promise<void> {
  if (!cachedDeps) return;
  const deps = cachedDeps;
  cachedDeps = null;
  await deps.close();
}
