// src/services/providers/inventory/redis-vector-search.ts
// RediSearch KNN over HASH documents via ioredis raw commands (FT.CREATE / FT.SEARCH / HSET).
import type Redis from 'ioredis';
import type {
  VectorDocument,
  VectorFilter,
  VectorHit,
  VectorIndexWriter,
  VectorSearch,
} from '@/services/providers/retrieval-types';
import { toFloat32Buffer, type Embedding } from '@/services/providers/retrieval-vector-utils';
import { logger, errMessage } from '@/services/logger';

export type RedisArg = string | number | Buffer;

/** The slice of ioredis this backend needs; tests hand in a recording fake. */
export interface RedisCommandClient {
  call(command: string, ...args: RedisArg[]): Promise<unknown>;
}

export function fromIoredis(redis: Redis): RedisCommandClient {
  return {
    call: (command, ...args) => redis.call(command, ...args),
  };
}

export const VECTOR_FIELD = 'embedding';

const RETURN_FIELDS = [
  'id',
  'name',
  'hotelName',
  'cityName',
  'origin',
  'destination',
  'price',
  'entry_fee',
  'rating',
  'category',
  'type',
  'mode',
  'provider',
  'airline',
  'duration_minutes',
  'date',
  'description',
  'score',
];

/** Backslash-escape everything RediSearch treats as syntax inside a TAG value. */
export function escapeTagValue(value: string): string {
  return value.trim().replace(/[,.<>{}[\]"':;!@#$%^&*()\-+=~|/\\\s]/g, '\\$&');
}

function formatBound(n: number | undefined, fallback: string): string {
  return n === undefined || !Number.isFinite(n) ? fallback : String(n);
}

export function buildKnnQuery(
  k: number,
  filter: VectorFilter,
  excludeIds: string[] = [],
): string {
  const clauses: string[] = [];
  for (const [field, value] of Object.entries(filter.tags)) {
    clauses.push(`@${field}:{${escapeTagValue(value)}}`);
  }
  for (const [field, range] of Object.entries(filter.ranges ?? {})) {
    clauses.push(`@${field}:[${formatBound(range.min, '-inf')} ${formatBound(range.max, '+inf')}]`);
  }
  let base = clauses.length > 0 ? `(${clauses.join(' ')})` : '*';
  if (excludeIds.length > 0) {
    const exclusions = excludeIds.map((id) => `-@id:{${escapeTagValue(id)}}`).join(' ');
    base = clauses.length > 0 ? `${base} ${exclusions}` : `(${exclusions})`;
  }
  return `${base}=>[KNN ${k} @${VECTOR_FIELD} $BLOB AS score]`;
}

function decode(value: unknown): string {
  return Buffer.isBuffer(value) ? value.toString('utf8') : String(value);
}

/** FT.SEARCH reply: [total, key1, [f1, v1, ...], key2, [...], ...] */
export function parseSearchReply(reply: unknown): VectorHit[] {
  if (!Array.isArray(reply) || reply.length < 2) return [];
  const hits: VectorHit[] = [];
  for (let i = 1; i + 1 < reply.length; i += 2) {
    const key = decode(reply[i]);
    const raw: unknown = reply[i + 1];
    const fields: Record<string, string> = {};
    if (Array.isArray(raw)) {
      for (let j = 0; j + 1 < raw.length; j += 2) {
        fields[decode(raw[j])] = decode(raw[j + 1]);
      }
    }
    const score = Number(fields.score);
    hits.push({ key, score: Number.isFinite(score) ? score : 0, fields });
  }
  return hits;
}

export class RedisVectorSearch implements VectorSearch, VectorIndexWriter {
  readonly name = 'redis-vector';

  constructor(private readonly client: RedisCommandClient) {}

  async search(
    index: string,
    vector: Embedding,
    k: number,
    filter: VectorFilter,
    excludeIds: string[] = [],
  ): Promise<VectorHit[]> {
    const query = buildKnnQuery(k, filter, excludeIds);
    const reply = await this.client.call(
      'FT.SEARCH',
      index,
      query,
      'PARAMS',
      '2',
      'BLOB',
      toFloat32Buffer(vector),
      'SORTBY',
      'score',
      'RETURN',
      String(RETURN_FIELDS.length),
      ...RETURN_FIELDS,
      'LIMIT',
      '0',
      String(k),
      'DIALECT',
      '2',
    );
    return parseSearchReply(reply);
  }

  async ensureIndex(index: string, prefix: string, dim: number): Promise<void> {
    try {
      await this.client.call('FT.INFO', index);
      logger.debug(`vector index ${index} already exists`);
      return;
    } catch (err) {
      logger.info(`creating vector index ${index}`, { reason: errMessage(err) });
    }

    await this.client.call(
      'FT.CREATE',
      index,
      'ON',
      'HASH',
      'PREFIX',
      '1',
      prefix,
      'SCHEMA',
      'id', 'TAG',
      'cityName', 'TAG',
      'origin', 'TAG',
      'destination', 'TAG',
      'category', 'TAG',
      'name', 'TEXT',
      'description', 'TEXT',
      'price', 'NUMERIC',
      'rating', 'NUMERIC',
      VECTOR_FIELD, 'VECTOR', 'FLAT', '6',
      'TYPE', 'FLOAT32',
      'DIM', String(dim),
      'DISTANCE_METRIC', 'COSINE',
    );
  }

  async upsert(_index: string, docs: VectorDocument[]): Promise<number> {
    for (const doc of docs) {
      const args: RedisArg[] = [doc.key];
      for (const [field, value] of Object.entries(doc.fields)) {
        args.push(field, value);
      }
      args.push(VECTOR_FIELD, toFloat32Buffer(doc.vector));
      await this.client.call('HSET', ...args);
    }
    return docs.length;
  }
}
