import {
  compareMatches,
  cosineSimilarity,
  normalizeScore,
  type EmbeddingVector,
  type IndexMatch,
  type MetadataFilters,
} from '@statute-rag/shared';
import {
  IndexUnavailableError,
  InvalidInputError,
  RequestCancelledError,
  describeError,
  isRagError,
} from '../errors';
import { withDeadline } from '../utils/abort';
import { checkDatabaseHealth, runCancellable, type Sql } from '../utils/db';
import type { ResourcePool } from '../utils/pool';

/**
 * Vector Index Client
 *
 * query() returns matches sorted by descending similarity with ties broken
 * by chunk id ascending, so identical inputs always yield identical order.
 * Scores are normalized to 0-1.
 */

export interface VectorIndexClient {
  readonly model: string;
  readonly dimension: number;
  query(
    vector: EmbeddingVector,
    topK: number,
    filters?: MetadataFilters,
    signal?: AbortSignal
  ): Promise<IndexMatch[]>;
  upsert(chunkId: string, vector: EmbeddingVector, metadata: MetadataFilters): Promise<void>;
  ping(signal: AbortSignal): Promise<void>;
}

export interface IndexSpace {
  model: string;
  dimension: number;
}

/**
 * All vectors in one index share model and dimension.
 */
export function assertCompatible(vector: EmbeddingVector, space: IndexSpace): void {
  if (vector.model !== space.model) {
    throw new InvalidInputError(
      `Vector from model "${vector.model}" cannot be used with index built from "${space.model}"`,
      'vectorIndex'
    );
  }
  if (vector.dimension !== space.dimension || vector.values.length !== space.dimension) {
    throw new InvalidInputError(
      `Vector dimension ${vector.values.length} does not match index dimension ${space.dimension}`,
      'vectorIndex'
    );
  }
}

function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new InvalidInputError(`topK must be a positive integer, got ${topK}`, 'vectorIndex');
  }
}

export function rankMatches(matches: IndexMatch[], topK: number): IndexMatch[] {
  return matches
    .map((m) => ({ chunkId: m.chunkId, score: normalizeScore(m.score) }))
    .sort(compareMatches)
    .slice(0, topK);
}

export interface PgVectorIndexOptions extends IndexSpace {
  timeoutMs: number;
  pool: ResourcePool;
}

type MatchRow = {
  chunk_id: string;
  score: number | string;
};

/**
 * pgvector-backed index.
 *
 * Uses <=> for cosine distance (lower = more similar); similarity = 1 - distance.
 */
export class PgVectorIndex implements VectorIndexClient {
  readonly model: string;
  readonly dimension: number;

  constructor(private readonly sql: Sql, private readonly options: PgVectorIndexOptions) {
    this.model = options.model;
    this.dimension = options.dimension;
  }

  async query(
    vector: EmbeddingVector,
    topK: number,
    filters: MetadataFilters = {},
    signal?: AbortSignal
  ): Promise<IndexMatch[]> {
    assertCompatible(vector, this);
    assertTopK(topK);

    // Format embedding as PostgreSQL array literal for pgvector
    const vectorString = `[${vector.values.join(',')}]`;

    const rows = await this.run(signal, (querySignal) =>
      runCancellable(
        this.sql<MatchRow[]>`
          SELECT
            chunk_id,
            1 - (embedding <=> ${vectorString}::vector) AS score
          FROM chunk_embeddings
          WHERE model = ${this.model}
            AND metadata @> ${this.sql.json(filters)}::jsonb
          ORDER BY embedding <=> ${vectorString}::vector
          LIMIT ${topK}
        `,
        querySignal
      )
    );

    // SQL orders by distance alone; equal scores are ordered here.
    return rankMatches(
      rows.map((row) => ({ chunkId: row.chunk_id, score: Number(row.score) })),
      topK
    );
  }

  async upsert(chunkId: string, vector: EmbeddingVector, metadata: MetadataFilters): Promise<void> {
    assertCompatible(vector, this);
    const vectorString = `[${vector.values.join(',')}]`;

    await this.run(undefined, (querySignal) =>
      runCancellable(
        this.sql`
          INSERT INTO chunk_embeddings (chunk_id, model, embedding, metadata)
          VALUES (${chunkId}, ${this.model}, ${vectorString}::vector, ${this.sql.json(metadata)})
          ON CONFLICT (chunk_id) DO UPDATE
            SET model = EXCLUDED.model,
                embedding = EXCLUDED.embedding,
                metadata = EXCLUDED.metadata
        `,
        querySignal
      )
    );
  }

  async ping(signal: AbortSignal): Promise<void> {
    await this.run(signal, () => checkDatabaseHealth(this.sql));
  }

  private async run<T>(signal: AbortSignal | undefined, task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return this.options.pool.use(
      () =>
        withDeadline(this.options.timeoutMs, signal, async (deadline) => {
          try {
            return await task(deadline.signal);
          } catch (error) {
            if (signal?.aborted) {
              throw new RequestCancelledError('vectorIndex', { cause: error });
            }
            if (isRagError(error)) throw error;
            const reason = deadline.timedOut() ? `timed out after ${this.options.timeoutMs}ms` : describeError(error);
            throw new IndexUnavailableError(`Vector index query failed: ${reason}`, { cause: error });
          }
        }),
      signal
    );
  }
}

interface IndexEntry {
  values: number[];
  metadata: MetadataFilters;
}

function matchesFilters(metadata: MetadataFilters, filters: MetadataFilters): boolean {
  return Object.entries(filters).every(([key, value]) => metadata[key] === value);
}

/**
 * In-process index using exact cosine similarity. Used for local development
 * and as the stand-in for the hosted index in tests.
 */
export class InMemoryVectorIndex implements VectorIndexClient {
  readonly model: string;
  readonly dimension: number;
  private readonly entries = new Map<string, IndexEntry>();
  private available = true;

  constructor(space: IndexSpace) {
    this.model = space.model;
    this.dimension = space.dimension;
  }

  async query(
    vector: EmbeddingVector,
    topK: number,
    filters: MetadataFilters = {},
    signal?: AbortSignal
  ): Promise<IndexMatch[]> {
    if (signal?.aborted) {
      throw new RequestCancelledError('vectorIndex', { cause: signal.reason });
    }
    this.assertAvailable();
    assertCompatible(vector, this);
    assertTopK(topK);

    const matches: IndexMatch[] = [];
    for (const [chunkId, entry] of this.entries) {
      if (!matchesFilters(entry.metadata, filters)) continue;
      matches.push({ chunkId, score: cosineSimilarity(vector.values, entry.values) });
    }
    return rankMatches(matches, topK);
  }

  async upsert(chunkId: string, vector: EmbeddingVector, metadata: MetadataFilters): Promise<void> {
    this.assertAvailable();
    assertCompatible(vector, this);
    this.entries.set(chunkId, { values: [...vector.values], metadata: { ...metadata } });
  }

  async ping(): Promise<void> {
    this.assertAvailable();
  }

  /** Simulate connectivity loss (or recovery). */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  private assertAvailable(): void {
    if (!this.available) {
      throw new IndexUnavailableError('In-memory index is marked unavailable');
    }
  }
}
