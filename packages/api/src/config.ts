import dotenv from 'dotenv';
import { z } from 'zod';
import {
  CACHE_DEFAULTS,
  EMBEDDING_DEFAULTS,
  GENERATION_DEFAULTS,
  HEALTH_DEFAULTS,
  RAG_DEFAULTS,
} from '@statute-rag/shared';

dotenv.config();

const int = (fallback: number) => z.coerce.number().int().default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (child !== null && typeof child === 'object') {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

const EnvSchema = z.object({
  // Server
  NODE_ENV: z.string().default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: int(3000),
  CORS_ORIGINS: z.string().default('http://localhost:3001'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Database
  DB_HOST: z.string().default('localhost'),
  DB_PORT: int(5432),
  DB_NAME: z.string().default('statute_rag'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  DB_POOL_MAX: positiveInt(20),

  // Redis
  REDIS_URL: z.string().optional(),
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: int(6379),
  REDIS_PASSWORD: z.string().optional(),
  CACHE_ENABLED: flag(true),
  CACHE_TIMEOUT_MS: positiveInt(CACHE_DEFAULTS.TIMEOUT_MS),

  // Generation providers
  GENERATION_PROVIDER: z.enum(['groq', 'openai']).default('groq'),
  GROQ_API_KEY: z.string().default(''),
  GROQ_MODEL: z.string().default('llama-3.3-70b-versatile'),
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_BASE_URL: z.string().url().optional(),
  GENERATION_TIMEOUT_MS: positiveInt(GENERATION_DEFAULTS.TIMEOUT_MS),
  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(GENERATION_DEFAULTS.TEMPERATURE),
  GENERATION_MAX_TOKENS: positiveInt(GENERATION_DEFAULTS.MAX_TOKENS),

  // Embeddings
  EMBEDDING_PROVIDER: z.enum(['worker', 'openai']).default('openai'),
  WORKER_URL: z.string().default('http://localhost:8000'),
  EMBEDDINGS_MODEL: z.string().default(EMBEDDING_DEFAULTS.MODEL),
  EMBEDDINGS_DIMENSION: positiveInt(EMBEDDING_DEFAULTS.DIMENSION),
  EMBEDDINGS_MAX_BATCH: positiveInt(EMBEDDING_DEFAULTS.MAX_BATCH_SIZE),
  EMBEDDINGS_MAX_INPUT_TOKENS: positiveInt(EMBEDDING_DEFAULTS.MAX_INPUT_TOKENS),
  EMBEDDINGS_OVERSIZE_POLICY: z.enum(['truncate', 'reject']).default('truncate'),
  EMBEDDINGS_TIMEOUT_MS: positiveInt(EMBEDDING_DEFAULTS.TIMEOUT_MS),
  EMBEDDINGS_CACHE_TTL: positiveInt(EMBEDDING_DEFAULTS.CACHE_TTL),

  // RAG
  RAG_TOP_K: positiveInt(RAG_DEFAULTS.TOP_K),
  RAG_MIN_SIMILARITY: z.coerce.number().min(0).max(1).default(RAG_DEFAULTS.MIN_SIMILARITY),
  RAG_MAX_CONTEXT_TOKENS: positiveInt(RAG_DEFAULTS.MAX_CONTEXT_TOKENS),
  RAG_MAX_PASSAGES: positiveInt(RAG_DEFAULTS.MAX_PASSAGES),
  RAG_TRANSIENT_RETRIES: z.coerce.number().int().min(0).default(RAG_DEFAULTS.TRANSIENT_RETRIES),
  RAG_GENERATION_RETRIES: z.coerce.number().int().min(0).default(RAG_DEFAULTS.GENERATION_RETRIES),
  RAG_ALLOW_EMPTY_CONTEXT: flag(false),
  RAG_RETRIEVAL_FALLBACK: z.enum(['none', 'cache', 'static']).default('none'),
  RAG_STATIC_FALLBACK_ANSWER: z
    .string()
    .default(
      'The statute search service is temporarily unavailable. Please try again shortly or consult the official text of the relevant Act.'
    ),
  RAG_ANSWER_CACHE_TTL: positiveInt(3600),
  RAG_INTENT_ROUTING: flag(true),
  RAG_QUERY_FILTERS: flag(true),
  RAG_GUARDRAILS: flag(true),
  INDEX_TIMEOUT_MS: positiveInt(5000),
  DOCUMENT_TIMEOUT_MS: positiveInt(5000),

  // Pools
  POOL_EMBEDDING_SIZE: positiveInt(8),
  POOL_INDEX_SIZE: positiveInt(10),
  POOL_DOCUMENT_SIZE: positiveInt(10),
  POOL_GENERATION_SIZE: positiveInt(8),
  POOL_ACQUIRE_TIMEOUT_MS: positiveInt(2000),

  // Health
  HEALTH_REFRESH_INTERVAL_MS: positiveInt(HEALTH_DEFAULTS.REFRESH_INTERVAL_MS),
  HEALTH_CHECK_TIMEOUT_MS: positiveInt(HEALTH_DEFAULTS.CHECK_TIMEOUT_MS),
});

/**
 * Parse and validate environment variables into the nested config shape.
 * Throws with every invalid variable listed.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env) {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  return deepFreeze({
    // Server
    env: e.NODE_ENV,
    host: e.HOST,
    port: e.PORT,
    corsOrigins: e.CORS_ORIGINS.split(',').map((origin) => origin.trim()),
    logLevel: e.LOG_LEVEL ?? (e.NODE_ENV === 'test' ? 'silent' : 'info'),

    // Database
    database: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      database: e.DB_NAME,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      poolMax: e.DB_POOL_MAX,
    },

    // Redis
    redis: {
      url: e.REDIS_URL,
      host: e.REDIS_HOST,
      port: e.REDIS_PORT,
      password: e.REDIS_PASSWORD,
      enabled: e.CACHE_ENABLED,
      timeoutMs: e.CACHE_TIMEOUT_MS,
    },

    generation: {
      provider: e.GENERATION_PROVIDER,
      timeoutMs: e.GENERATION_TIMEOUT_MS,
      temperature: e.GENERATION_TEMPERATURE,
      maxTokens: e.GENERATION_MAX_TOKENS,
    },

    groq: {
      apiKey: e.GROQ_API_KEY,
      model: e.GROQ_MODEL,
    },

    openai: {
      apiKey: e.OPENAI_API_KEY,
      model: e.OPENAI_MODEL,
      baseUrl: e.OPENAI_BASE_URL,
    },

    embeddings: {
      provider: e.EMBEDDING_PROVIDER,
      workerUrl: e.WORKER_URL,
      model: e.EMBEDDINGS_MODEL,
      dimension: e.EMBEDDINGS_DIMENSION,
      maxBatchSize: e.EMBEDDINGS_MAX_BATCH,
      maxInputTokens: e.EMBEDDINGS_MAX_INPUT_TOKENS,
      oversizePolicy: e.EMBEDDINGS_OVERSIZE_POLICY,
      timeoutMs: e.EMBEDDINGS_TIMEOUT_MS,
      cacheTtl: e.EMBEDDINGS_CACHE_TTL,
    },

    // RAG Configuration
    rag: {
      topK: e.RAG_TOP_K,
      minSimilarity: e.RAG_MIN_SIMILARITY,
      maxContextTokens: e.RAG_MAX_CONTEXT_TOKENS,
      maxPassages: e.RAG_MAX_PASSAGES,
      transientRetries: e.RAG_TRANSIENT_RETRIES,
      generationRetries: e.RAG_GENERATION_RETRIES,
      allowEmptyContext: e.RAG_ALLOW_EMPTY_CONTEXT,
      retrievalFallback: e.RAG_RETRIEVAL_FALLBACK,
      staticFallbackAnswer: e.RAG_STATIC_FALLBACK_ANSWER,
      answerCacheTtl: e.RAG_ANSWER_CACHE_TTL,
      intentRouting: e.RAG_INTENT_ROUTING,
      queryFilters: e.RAG_QUERY_FILTERS,
      guardrails: e.RAG_GUARDRAILS,
      indexTimeoutMs: e.INDEX_TIMEOUT_MS,
      documentTimeoutMs: e.DOCUMENT_TIMEOUT_MS,
    },

    pools: {
      acquireTimeoutMs: e.POOL_ACQUIRE_TIMEOUT_MS,
      embedding: e.POOL_EMBEDDING_SIZE,
      index: e.POOL_INDEX_SIZE,
      document: e.POOL_DOCUMENT_SIZE,
      generation: e.POOL_GENERATION_SIZE,
    },

    health: {
      refreshIntervalMs: e.HEALTH_REFRESH_INTERVAL_MS,
      checkTimeoutMs: e.HEALTH_CHECK_TIMEOUT_MS,
    },
  } as const);
}

export type Config = ReturnType<typeof loadConfig>;

export const config: Config = loadConfig();
