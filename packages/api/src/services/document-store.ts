import { z } from 'zod';
import type { Chunk } from '@statute-rag/shared';
import {
  NotFoundError,
  ProviderUnavailableError,
  RequestCancelledError,
  describeError,
  isRagError,
} from '../errors';
import { withDeadline } from '../utils/abort';
import { checkDatabaseHealth, runCancellable, type Sql } from '../utils/db';
import type { ResourcePool } from '../utils/pool';

/**
 * Document Store
 *
 * Canonical statute chunks keyed by stable id. Read-only on the request path,
 * so concurrent readers need no coordination.
 */

export interface ManyChunks {
  /** Found chunks, in the order their ids were requested. */
  chunks: Chunk[];
  missing: string[];
}

export interface DocumentStore {
  get(chunkId: string, signal?: AbortSignal): Promise<Chunk>;
  getMany(chunkIds: readonly string[], signal?: AbortSignal): Promise<ManyChunks>;
  ping(signal: AbortSignal): Promise<void>;
}

function collect(chunkIds: readonly string[], lookup: (id: string) => Chunk | undefined): ManyChunks {
  const chunks: Chunk[] = [];
  const missing: string[] = [];
  for (const id of chunkIds) {
    const chunk = lookup(id);
    if (chunk) {
      chunks.push(chunk);
    } else {
      missing.push(id);
    }
  }
  return { chunks, missing };
}

const SectionSchema = z
  .object({
    act: z.string().optional(),
    sectionNumber: z.string().optional(),
    title: z.string().optional(),
    jurisdiction: z.string().optional(),
  })
  .catchall(z.union([z.string(), z.number(), z.boolean()]));

type ChunkRow = {
  id: string;
  text: string;
  source_citation: string;
  section: unknown;
};

function toChunk(row: ChunkRow): Chunk {
  const section = SectionSchema.safeParse(row.section ?? {});
  return {
    id: row.id,
    text: row.text,
    sourceCitation: row.source_citation,
    section: section.success ? section.data : {},
  };
}

export interface PostgresDocumentStoreOptions {
  timeoutMs: number;
  pool: ResourcePool;
}

export class PostgresDocumentStore implements DocumentStore {
  constructor(private readonly sql: Sql, private readonly options: PostgresDocumentStoreOptions) {}

  async get(chunkId: string, signal?: AbortSignal): Promise<Chunk> {
    const { chunks } = await this.getMany([chunkId], signal);
    if (chunks.length === 0) {
      throw new NotFoundError(chunkId);
    }
    return chunks[0];
  }

  async getMany(chunkIds: readonly string[], signal?: AbortSignal): Promise<ManyChunks> {
    if (chunkIds.length === 0) {
      return { chunks: [], missing: [] };
    }

    const unique = [...new Set(chunkIds)];
    const rows = await this.run(signal, (querySignal) =>
      runCancellable(
        this.sql<ChunkRow[]>`
          SELECT id, text, source_citation, section
          FROM chunks
          WHERE id IN ${this.sql(unique)}
        `,
        querySignal
      )
    );

    const byId = new Map(rows.map((row) => [row.id, toChunk(row)]));
    return collect(chunkIds, (id) => byId.get(id));
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
              throw new RequestCancelledError('documentStore', { cause: error });
            }
            if (isRagError(error)) throw error;
            const reason = deadline.timedOut() ? `timed out after ${this.options.timeoutMs}ms` : describeError(error);
            throw new ProviderUnavailableError(`Document store read failed: ${reason}`, 'documentStore', {
              cause: error,
            });
          }
        }),
      signal
    );
  }
}

/**
 * In-process store for local development and tests.
 */
export class InMemoryDocumentStore implements DocumentStore {
  private readonly chunks: ReadonlyMap<string, Chunk>;
  private available = true;

  constructor(chunks: readonly Chunk[]) {
    this.chunks = new Map(chunks.map((chunk) => [chunk.id, Object.freeze({ ...chunk })]));
  }

  async get(chunkId: string, signal?: AbortSignal): Promise<Chunk> {
    const { chunks } = await this.getMany([chunkId], signal);
    if (chunks.length === 0) {
      throw new NotFoundError(chunkId);
    }
    return chunks[0];
  }

  async getMany(chunkIds: readonly string[], signal?: AbortSignal): Promise<ManyChunks> {
    if (signal?.aborted) {
      throw new RequestCancelledError('documentStore', { cause: signal.reason });
    }
    this.assertAvailable();
    return collect(chunkIds, (id) => this.chunks.get(id));
  }

  async ping(): Promise<void> {
    this.assertAvailable();
  }

  setAvailable(available: boolean): void {
    this.available = available;
  }

  private assertAvailable(): void {
    if (!this.available) {
      throw new ProviderUnavailableError('In-memory document store is marked unavailable', 'documentStore');
    }
  }
}
