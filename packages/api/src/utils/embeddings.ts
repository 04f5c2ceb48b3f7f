import OpenAI from 'openai';
import { z } from 'zod';
import { CACHE_DEFAULTS, estimateTokens, truncateToTokens, type EmbeddingVector } from '@statute-rag/shared';
import {
  InvalidInputError,
  ProviderUnavailableError,
  RequestCancelledError,
  describeError,
  isRagError,
} from '../errors';
import { abortable, withDeadline, type Deadline } from './abort';
import { componentLogger } from './logger';
import type { ResourcePool } from './pool';
import { withRetry } from './retry';

/**
 * Embeddings
 *
 * The same model must embed both the statute chunks (at ingestion) and the
 * user query, otherwise similarity scores are meaningless. The client tags
 * every vector with model and dimension so the index can reject mismatches.
 *
 * Strategy:
 * 1. Validate or deterministically truncate each text (oversize policy)
 * 2. Check the embedding cache
 * 3. Send misses to the provider in batches of at most maxBatchSize
 * 4. Store new vectors in the cache
 */

const log = componentLogger('embedding');

export interface EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  readonly dimension: number;
  readonly maxBatchSize: number;
  readonly maxInputTokens: number;
  embedBatch(texts: string[], signal: AbortSignal): Promise<number[][]>;
  ping(signal: AbortSignal): Promise<void>;
}

export interface EmbeddingCache {
  get(model: string, text: string): Promise<number[] | null>;
  set(model: string, text: string, values: number[]): Promise<void>;
}

export type OversizePolicy = 'truncate' | 'reject';

export interface EmbeddingClientOptions {
  oversizePolicy: OversizePolicy;
  timeoutMs: number;
  retries: number;
  pool: ResourcePool;
  cache?: EmbeddingCache;
  /** Budget for each cache read or write. */
  cacheTimeoutMs?: number;
}

export interface EmbeddingResult {
  vectors: EmbeddingVector[];
  /** Input positions that were cut to the provider's token limit. */
  truncatedIndexes: number[];
  degraded: boolean;
}

interface PreparedText {
  text: string;
  truncated: boolean;
}

export class EmbeddingClient {
  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly options: EmbeddingClientOptions
  ) {}

  /**
   * Embed texts, preserving input order and length.
   */
  async embed(texts: readonly string[], signal?: AbortSignal): Promise<EmbeddingResult> {
    if (texts.length === 0) {
      return { vectors: [], truncatedIndexes: [], degraded: false };
    }

    const startTime = Date.now();
    const prepared = texts.map((text, idx) => this.prepare(text, idx));
    const truncatedIndexes = prepared.flatMap((p, idx) => (p.truncated ? [idx] : []));

    const resolved = new Map<number, number[]>();
    const cached = await Promise.all(prepared.map((p) => this.readCache(p.text, signal)));
    cached.forEach((values, idx) => {
      if (values) resolved.set(idx, values);
    });

    const misses = prepared.map((_, idx) => idx).filter((idx) => !resolved.has(idx));
    const batchSize = this.provider.maxBatchSize;
    let batchCount = 0;

    for (let start = 0; start < misses.length; start += batchSize) {
      const batchIdx = misses.slice(start, start + batchSize);
      const batchTexts = batchIdx.map((idx) => prepared[idx].text);
      const batchVectors = await this.callProvider(batchTexts, signal);
      batchCount++;

      await Promise.all(
        batchIdx.map((idx, j) => {
          resolved.set(idx, batchVectors[j]);
          return this.writeCache(prepared[idx].text, batchVectors[j], signal);
        })
      );
    }

    const vectors = prepared.map((_, idx) => {
      const values = resolved.get(idx);
      if (!values) {
        throw new ProviderUnavailableError(`No embedding returned for input ${idx}`, 'embedding');
      }
      return { values, model: this.provider.model, dimension: this.provider.dimension };
    });

    log.debug(
      {
        latency: Date.now() - startTime,
        inputCount: texts.length,
        cacheHits: texts.length - misses.length,
        batchCount,
        truncated: truncatedIndexes.length,
      },
      'Embeddings generated'
    );

    return { vectors, truncatedIndexes, degraded: truncatedIndexes.length > 0 };
  }

  async ping(signal: AbortSignal): Promise<void> {
    await this.provider.ping(signal);
  }

  private prepare(text: string, idx: number): PreparedText {
    if (text.trim() === '') {
      throw new InvalidInputError(`Text at position ${idx} is empty`, 'embedding');
    }

    const limit = this.provider.maxInputTokens;
    if (estimateTokens(text) <= limit) {
      return { text, truncated: false };
    }

    if (this.options.oversizePolicy === 'reject') {
      throw new InvalidInputError(
        `Text at position ${idx} exceeds the ${limit}-token embedding limit`,
        'embedding'
      );
    }
    return { text: truncateToTokens(text, limit), truncated: true };
  }

  private async callProvider(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    return withRetry(
      () =>
        this.options.pool.use(
          () =>
            withDeadline(this.options.timeoutMs, signal, async (deadline) => {
              try {
                const vectors = await abortable(this.provider.embedBatch(texts, deadline.signal), deadline.signal);
                this.validate(vectors, texts.length);
                return vectors;
              } catch (error) {
                throw this.normalizeError(error, deadline, signal);
              }
            }),
          signal
        ),
      {
        retries: this.options.retries,
        signal,
        onRetry: (error, attempt) =>
          log.warn({ error: describeError(error), attempt, provider: this.provider.name }, 'Retrying embedding call'),
      }
    );
  }

  private validate(vectors: number[][], expected: number): void {
    if (vectors.length !== expected) {
      throw new ProviderUnavailableError(
        `Embedding provider returned ${vectors.length} vectors for ${expected} inputs`,
        'embedding'
      );
    }
    for (const values of vectors) {
      if (values.length !== this.provider.dimension) {
        throw new ProviderUnavailableError(
          `Embedding provider returned dimension ${values.length}, expected ${this.provider.dimension}`,
          'embedding'
        );
      }
    }
  }

  private normalizeError(error: unknown, deadline: Deadline, signal?: AbortSignal): Error {
    if (signal?.aborted) {
      return new RequestCancelledError('embedding', { cause: error });
    }
    if (deadline.timedOut()) {
      return new ProviderUnavailableError(
        `Embedding provider timed out after ${this.options.timeoutMs}ms`,
        'embedding',
        { cause: error }
      );
    }
    if (isRagError(error)) {
      return error;
    }
    return new ProviderUnavailableError(`Embedding provider failed: ${describeError(error)}`, 'embedding', {
      cause: error,
    });
  }

  private async readCache(text: string, signal?: AbortSignal): Promise<number[] | null> {
    const cache = this.options.cache;
    if (!cache) return null;
    try {
      const values = await this.underCacheDeadline(signal, (cacheSignal) =>
        abortable(cache.get(this.provider.model, text), cacheSignal)
      );
      return values && values.length === this.provider.dimension ? values : null;
    } catch (error) {
      if (signal?.aborted) {
        throw new RequestCancelledError('embedding', { cause: error });
      }
      log.warn({ error: describeError(error) }, 'Embedding cache read failed, treating as miss');
      return null;
    }
  }

  private async writeCache(text: string, values: number[], signal?: AbortSignal): Promise<void> {
    const cache = this.options.cache;
    if (!cache) return;
    try {
      await this.underCacheDeadline(signal, (cacheSignal) =>
        abortable(cache.set(this.provider.model, text, values), cacheSignal)
      );
    } catch (error) {
      log.warn({ error: describeError(error) }, 'Embedding cache write failed');
    }
  }

  private underCacheDeadline<T>(
    signal: AbortSignal | undefined,
    task: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const timeoutMs = this.options.cacheTimeoutMs ?? CACHE_DEFAULTS.TIMEOUT_MS;
    return withDeadline(timeoutMs, signal, (deadline) => task(deadline.signal));
  }
}

export interface ProviderLimits {
  model: string;
  dimension: number;
  maxBatchSize: number;
  maxInputTokens: number;
}

const WorkerResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

/**
 * Embedding worker over HTTP.
 *
 * Expected contract:
 * - POST {workerUrl}/embed  { texts: string[], model }  ->  { embeddings: number[][] }
 * - GET  {workerUrl}/health -> 2xx when ready
 */
export class HttpEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'worker';
  readonly model: string;
  readonly dimension: number;
  readonly maxBatchSize: number;
  readonly maxInputTokens: number;

  constructor(private readonly workerUrl: string, limits: ProviderLimits) {
    this.model = limits.model;
    this.dimension = limits.dimension;
    this.maxBatchSize = limits.maxBatchSize;
    this.maxInputTokens = limits.maxInputTokens;
  }

  async embedBatch(texts: string[], signal: AbortSignal): Promise<number[][]> {
    const response = await fetch(`${this.workerUrl}/embed`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ texts, model: this.model }),
      signal,
    });

    if (response.status === 400 || response.status === 413 || response.status === 422) {
      throw new InvalidInputError(`Embedding service rejected input (${response.status})`, 'embedding');
    }
    if (!response.ok) {
      throw new ProviderUnavailableError(`Embedding service returned ${response.status}`, 'embedding');
    }

    const parsed = WorkerResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderUnavailableError('Embedding service returned a malformed body', 'embedding');
    }
    return parsed.data.embeddings;
  }

  async ping(signal: AbortSignal): Promise<void> {
    const response = await fetch(`${this.workerUrl}/health`, { signal });
    if (!response.ok) {
      throw new ProviderUnavailableError(`Embedding service health returned ${response.status}`, 'embedding');
    }
  }
}

/**
 * OpenAI embeddings API (text-embedding-3-* models accept a target dimension).
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';
  readonly model: string;
  readonly dimension: number;
  readonly maxBatchSize: number;
  readonly maxInputTokens: number;

  constructor(private readonly client: OpenAI, limits: ProviderLimits) {
    this.model = limits.model;
    this.dimension = limits.dimension;
    this.maxBatchSize = limits.maxBatchSize;
    this.maxInputTokens = limits.maxInputTokens;
  }

  async embedBatch(texts: string[], signal: AbortSignal): Promise<number[][]> {
    try {
      const response = await this.client.embeddings.create(
        {
          model: this.model,
          input: texts,
          ...(this.model.startsWith('text-embedding-3') && { dimensions: this.dimension }),
        },
        { signal }
      );
      return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
    } catch (error) {
      if (error instanceof OpenAI.APIError && (error.status === 400 || error.status === 422)) {
        throw new InvalidInputError(`Embedding request rejected: ${error.message}`, 'embedding', { cause: error });
      }
      throw error;
    }
  }

  async ping(signal: AbortSignal): Promise<void> {
    await this.client.models.retrieve(this.model, { signal });
  }
}
