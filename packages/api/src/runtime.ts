import Groq from 'groq-sdk';
import OpenAI from 'openai';
import type Redis from 'ioredis';
import { config as defaultConfig, type Config } from './config';
import type { RagComponent } from './errors';
import { ContextAssembler } from './services/context';
import { PostgresDocumentStore } from './services/document-store';
import { HealthAggregator, type HealthProbe } from './services/health';
import { RagOrchestrator } from './services/orchestrator';
import { Retriever } from './services/retrieval';
import { Generator } from './services/synthesis';
import { PgVectorIndex } from './services/vector-index';
import { createSql } from './utils/db';
import {
  EmbeddingClient,
  HttpEmbeddingProvider,
  OpenAIEmbeddingProvider,
  type EmbeddingProvider,
} from './utils/embeddings';
import { GroqProvider, OpenAIProvider, type GenerationProvider } from './utils/llm';
import { logger } from './utils/logger';
import { ResourcePool } from './utils/pool';
import { RedisAnswerCache, RedisEmbeddingCache, checkRedisHealth, createRedis } from './utils/redis';

/**
 * Composition root: builds every client and service from config and owns
 * their shutdown. Nothing here runs at import time.
 */

export interface Runtime {
  orchestrator: RagOrchestrator;
  health: HealthAggregator;
  close(): Promise<void>;
}

/**
 * Fail fast on provider selections that cannot work without a key.
 */
export function assertProviderKeys(cfg: Config): void {
  if (cfg.generation.provider === 'groq' && !cfg.groq.apiKey) {
    throw new Error(
      'GROQ_API_KEY is not set. Please configure it in .env file. Get free tier at: https://console.groq.com'
    );
  }
  const needsOpenAI = cfg.generation.provider === 'openai' || cfg.embeddings.provider === 'openai';
  if (needsOpenAI && !cfg.openai.apiKey) {
    throw new Error('OPENAI_API_KEY is not set but an OpenAI provider is selected. Please configure it in .env file.');
  }
}

export function createRuntime(cfg: Config = defaultConfig): Runtime {
  assertProviderKeys(cfg);

  const sql = createSql(cfg.database);
  const redis: Redis | undefined = cfg.redis.enabled ? createRedis(cfg.redis) : undefined;

  const poolOf = (name: string, component: RagComponent, maxSize: number) =>
    new ResourcePool(name, component, { maxSize, acquireTimeoutMs: cfg.pools.acquireTimeoutMs });

  // Retries and timeouts are owned by our clients, not the SDKs.
  const openai = cfg.openai.apiKey
    ? new OpenAI({ apiKey: cfg.openai.apiKey, baseURL: cfg.openai.baseUrl, maxRetries: 0 })
    : undefined;

  const limits = {
    model: cfg.embeddings.model,
    dimension: cfg.embeddings.dimension,
    maxBatchSize: cfg.embeddings.maxBatchSize,
    maxInputTokens: cfg.embeddings.maxInputTokens,
  };
  let embeddingProvider: EmbeddingProvider;
  if (cfg.embeddings.provider === 'worker') {
    embeddingProvider = new HttpEmbeddingProvider(cfg.embeddings.workerUrl, limits);
  } else if (openai) {
    embeddingProvider = new OpenAIEmbeddingProvider(openai, limits);
  } else {
    throw new Error('OpenAI embeddings selected without an OpenAI client');
  }

  const embeddings = new EmbeddingClient(embeddingProvider, {
    oversizePolicy: cfg.embeddings.oversizePolicy,
    timeoutMs: cfg.embeddings.timeoutMs,
    retries: cfg.rag.transientRetries,
    pool: poolOf('embedding', 'embedding', cfg.pools.embedding),
    cache: redis ? new RedisEmbeddingCache(redis, cfg.embeddings.cacheTtl) : undefined,
    cacheTimeoutMs: cfg.redis.timeoutMs,
  });

  const index = new PgVectorIndex(sql, {
    model: cfg.embeddings.model,
    dimension: cfg.embeddings.dimension,
    timeoutMs: cfg.rag.indexTimeoutMs,
    pool: poolOf('vector-index', 'vectorIndex', cfg.pools.index),
  });

  const documents = new PostgresDocumentStore(sql, {
    timeoutMs: cfg.rag.documentTimeoutMs,
    pool: poolOf('document-store', 'documentStore', cfg.pools.document),
  });

  let generationProvider: GenerationProvider;
  if (cfg.generation.provider === 'groq') {
    generationProvider = new GroqProvider(new Groq({ apiKey: cfg.groq.apiKey, maxRetries: 0 }), cfg.groq.model);
  } else if (openai) {
    generationProvider = new OpenAIProvider(openai, cfg.openai.model);
  } else {
    throw new Error('OpenAI generation selected without an OpenAI client');
  }

  const generator = new Generator(generationProvider, {
    timeoutMs: cfg.generation.timeoutMs,
    temperature: cfg.generation.temperature,
    maxTokens: cfg.generation.maxTokens,
    allowEmptyContext: cfg.rag.allowEmptyContext,
    pool: poolOf('generation', 'generator', cfg.pools.generation),
  });

  const orchestrator = new RagOrchestrator(
    {
      retriever: new Retriever(embeddings, index, documents, {
        topK: cfg.rag.topK,
        minSimilarity: cfg.rag.minSimilarity,
        transientRetries: cfg.rag.transientRetries,
        queryFilters: cfg.rag.queryFilters,
      }),
      assembler: new ContextAssembler({ maxTokens: cfg.rag.maxContextTokens, maxPassages: cfg.rag.maxPassages }),
      generator,
      answerCache: redis ? new RedisAnswerCache(redis, cfg.rag.answerCacheTtl) : undefined,
    },
    {
      generationRetries: cfg.rag.generationRetries,
      retrievalFallback: cfg.rag.retrievalFallback,
      staticFallbackAnswer: cfg.rag.staticFallbackAnswer,
      intentRouting: cfg.rag.intentRouting,
      guardrails: cfg.rag.guardrails,
      cacheTimeoutMs: cfg.redis.timeoutMs,
    }
  );

  const probes: HealthProbe[] = [
    {
      component: 'embedding',
      check: async (signal) => {
        await embeddings.ping(signal);
        return { detail: embeddingProvider.name };
      },
    },
    {
      component: 'vectorIndex',
      check: async (signal) => {
        await index.ping(signal);
        return {};
      },
    },
    {
      component: 'documentStore',
      check: async (signal) => {
        await documents.ping(signal);
        return {};
      },
    },
    {
      component: 'generator',
      check: async (signal) => {
        await generator.ping(signal);
        return { detail: generator.providerName };
      },
    },
  ];
  if (redis) {
    probes.push({
      component: 'cache',
      check: async () => {
        await checkRedisHealth(redis);
        return {};
      },
    });
  }

  const health = new HealthAggregator(probes, {
    refreshIntervalMs: cfg.health.refreshIntervalMs,
    checkTimeoutMs: cfg.health.checkTimeoutMs,
  });

  logger.info(
    {
      generation: `${generationProvider.name}:${generationProvider.model}`,
      embeddings: `${embeddingProvider.name}:${embeddingProvider.model}`,
      cache: !!redis,
    },
    'Runtime configured'
  );

  return {
    orchestrator,
    health,
    close: async () => {
      health.stop();
      await sql.end({ timeout: 5 });
      if (redis) await redis.quit();
    },
  };
}
