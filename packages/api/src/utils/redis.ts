import { createHash } from 'node:crypto';
import Redis, { type RedisOptions } from 'ioredis';
import { z } from 'zod';
import { GUARDRAIL_FLAGS, type AnswerResult } from '@statute-rag/shared';
import type { Config } from '../config';
import type { AnswerCache } from '../services/orchestrator';
import type { EmbeddingCache } from './embeddings';
import { componentLogger } from './logger';

/**
 * Redis client for caching.
 *
 * Caching strategy:
 * - Embeddings: cache vectors per (model, text) to avoid redundant provider calls
 * - Answers: last successful answer per normalized query, read only when
 *   retrieval is down and the `cache` fallback policy is active
 */

const log = componentLogger('cache');

export function createRedis(redisConfig: Config['redis']): Redis {
  const common: RedisOptions = {
    retryStrategy: (times: number) => Math.min(times * 50, 2000),
    maxRetriesPerRequest: 1,
    connectTimeout: 10000,
    lazyConnect: true,
  };

  // Use REDIS_URL if available, otherwise individual settings
  const redis = redisConfig.url
    ? new Redis(redisConfig.url, common)
    : new Redis({
        ...common,
        host: redisConfig.host,
        port: redisConfig.port,
        password: redisConfig.password,
      });

  log.info({ redisUrl: !!redisConfig.url, host: redisConfig.host }, 'Initializing Redis connection');

  redis.on('error', (err) => {
    log.error({ err }, 'Redis connection error');
  });

  redis.on('connect', () => {
    log.info('Redis connected');
  });

  return redis;
}

/**
 * Health check: verify Redis connectivity.
 */
export async function checkRedisHealth(redis: Redis): Promise<void> {
  const reply = await redis.ping();
  if (reply !== 'PONG') {
    throw new Error(`Unexpected PING reply: ${reply}`);
  }
}

function hashText(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

export class RedisEmbeddingCache implements EmbeddingCache {
  constructor(private readonly redis: Redis, private readonly ttlSeconds: number) {}

  async get(model: string, text: string): Promise<number[] | null> {
    const cached = await this.redis.get(this.key(model, text));
    if (!cached) return null;
    const parsed = z.array(z.number()).safeParse(JSON.parse(cached));
    return parsed.success ? parsed.data : null;
  }

  async set(model: string, text: string, values: number[]): Promise<void> {
    await this.redis.setex(this.key(model, text), this.ttlSeconds, JSON.stringify(values));
  }

  private key(model: string, text: string): string {
    return `embed:${model}:${hashText(text)}`;
  }
}

const AnswerResultSchema = z.object({
  answerText: z.string(),
  citedChunkIds: z.array(z.string()),
  citations: z.array(z.string()),
  retrievalLatencyMs: z.number(),
  generationLatencyMs: z.number(),
  degraded: z.boolean(),
  mode: z.enum(['generated', 'model-knowledge', 'extractive', 'fallback-cached', 'fallback-static', 'quick-reply']),
  refused: z.boolean(),
  queryTruncated: z.boolean(),
  contextTruncated: z.boolean(),
  guardrailFlags: z.array(z.enum(GUARDRAIL_FLAGS)),
});

export class RedisAnswerCache implements AnswerCache {
  constructor(private readonly redis: Redis, private readonly ttlSeconds: number) {}

  async get(key: string): Promise<AnswerResult | null> {
    const cached = await this.redis.get(`answer:${hashText(key)}`);
    if (!cached) return null;
    const parsed = AnswerResultSchema.safeParse(JSON.parse(cached));
    if (!parsed.success) {
      log.warn({ issues: parsed.error.issues.length }, 'Discarding malformed cached answer');
      return null;
    }
    return parsed.data;
  }

  async set(key: string, result: AnswerResult): Promise<void> {
    await this.redis.setex(`answer:${hashText(key)}`, this.ttlSeconds, JSON.stringify(result));
  }
}
