// node/src/config/app.config.ts: environment-backed configuration, parsed once at startup
import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  REDIS_URL: z.string().optional(),
  INVENTORY_DB_PATH: z.string().default('./data/inventory.sqlite'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  EMBEDDING_DIM: z.coerce.number().int().positive().default(64),
  VECTOR_SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  NARRATIVE_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  MISSING_HOTEL_POLICY: z.enum(['skip', 'placeholder']).default('skip'),
  CURRENCY: z.string().default('SAR'),
  CORS_ORIGIN: z.string().optional(),
});

export type AppEnv = z.infer<typeof envSchema>;

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    redisUrl: parsed.REDIS_URL?.trim() || undefined,
    inventoryDbPath: path.resolve(process.cwd(), parsed.INVENTORY_DB_PATH),
    openaiApiKey: parsed.OPENAI_API_KEY?.trim() || undefined,
    openaiModel: parsed.OPENAI_MODEL,
    embeddingDim: parsed.EMBEDDING_DIM,
    vectorSearchTimeoutMs: parsed.VECTOR_SEARCH_TIMEOUT_MS,
    narrativeTimeoutMs: parsed.NARRATIVE_TIMEOUT_MS,
    missingHotelPolicy: parsed.MISSING_HOTEL_POLICY,
    currency: parsed.CURRENCY,
    corsOrigins: parsed.CORS_ORIGIN?.split(',').map((o) => o.trim()).filter(Boolean) ?? [
      'http://localhost:3000',
    ],
  };
}

export type AppConfig = ReturnType<typeof loadAppConfig>;

/** App configuration. */
export const appConfig: AppConfig = loadAppConfig();
