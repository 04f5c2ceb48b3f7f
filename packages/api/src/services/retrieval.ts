import {
  compareMatches,
  type EmbeddingVector,
  type IndexMatch,
  type MetadataFilters,
  type RetrievedPassage,
} from '@statute-rag/shared';
import {
  InvalidInputError,
  RetrievalFailedError,
  RequestCancelledError,
  describeError,
  isRagError,
  isTransient,
} from '../errors';
import type { EmbeddingClient } from '../utils/embeddings';
import { componentLogger } from '../utils/logger';
import { withRetry } from '../utils/retry';
import type { DocumentStore } from './document-store';
import { deriveQueryFilters } from './query-filters';
import type { VectorIndexClient } from './vector-index';

/**
 * Retrieval Service
 *
 * 1. Embed the query
 * 2. Over-fetch topK candidates from the vector index (recall)
 * 3. Drop candidates below the similarity threshold (precision)
 * 4. Resolve ids to statute text via the document store
 *
 * Filters read from the question (a named Act or section) narrow step 2.
 * When nothing qualifies under them, the search runs again with only the
 * caller's filters.
 *
 * Zero qualifying candidates is a valid, empty result. Only infrastructure
 * failures become RetrievalFailed; the orchestrator decides what to do next.
 */

const log = componentLogger('retriever');

export interface RetrieverOptions {
  topK: number;
  minSimilarity: number;
  /** Extra attempts on a transient index or document store failure. */
  transientRetries: number;
  /** Narrow the search with filters read from the question. */
  queryFilters: boolean;
}

export interface RetrieveParams {
  topK?: number;
  filters?: MetadataFilters;
  signal?: AbortSignal;
}

export interface RetrievalResult {
  passages: RetrievedPassage[];
  candidateCount: number;
  missingChunkIds: string[];
  queryTruncated: boolean;
  /** Filters of the search that produced the candidates. */
  appliedFilters: MetadataFilters;
}

export class Retriever {
  constructor(
    private readonly embeddings: EmbeddingClient,
    private readonly index: VectorIndexClient,
    private readonly documents: DocumentStore,
    private readonly options: RetrieverOptions
  ) {}

  async retrieve(query: string, params: RetrieveParams = {}): Promise<RetrievalResult> {
    const startTime = Date.now();
    const topK = params.topK ?? this.options.topK;
    const { signal } = params;

    try {
      const embedded = await this.embeddings.embed([query], signal);
      const queryVector = embedded.vectors[0];

      const explicit = params.filters ?? {};
      const derived = this.options.queryFilters ? deriveQueryFilters(query) : {};
      const narrowed = Object.keys(derived).some((key) => !(key in explicit));

      let appliedFilters: MetadataFilters = { ...derived, ...explicit };
      let candidates = await this.search(queryVector, topK, appliedFilters, signal);
      let qualifying = this.applyThreshold(candidates);

      if (qualifying.length === 0 && narrowed) {
        log.info({ derived }, 'Nothing qualifies under query filters, searching without them');
        appliedFilters = explicit;
        candidates = await this.search(queryVector, topK, appliedFilters, signal);
        qualifying = this.applyThreshold(candidates);
      }

      if (qualifying.length === 0) {
        log.info(
          { latency: Date.now() - startTime, candidateCount: candidates.length },
          'No candidates above similarity threshold'
        );
        return {
          passages: [],
          candidateCount: candidates.length,
          missingChunkIds: [],
          queryTruncated: embedded.degraded,
          appliedFilters,
        };
      }

      const chunkIds = qualifying.map((m) => m.chunkId);
      const { chunks, missing } = await withRetry(() => this.documents.getMany(chunkIds, signal), {
        retries: this.options.transientRetries,
        signal,
        shouldRetry: isTransient,
        onRetry: (error, attempt) =>
          log.warn({ error: describeError(error), attempt }, 'Document store unavailable, retrying'),
      });
      if (missing.length > 0) {
        log.warn({ missing }, 'Indexed chunks missing from document store, returning partial result');
      }

      const scores = new Map(qualifying.map((m) => [m.chunkId, m.score]));
      const passages = chunks.map((chunk, idx): RetrievedPassage => ({
        chunkId: chunk.id,
        text: chunk.text,
        sourceCitation: chunk.sourceCitation,
        section: chunk.section,
        similarityScore: scores.get(chunk.id) ?? 0,
        rank: idx + 1,
      }));

      log.info(
        {
          latency: Date.now() - startTime,
          candidateCount: candidates.length,
          passageCount: passages.length,
          topScore: passages[0]?.similarityScore,
        },
        'Retrieval completed'
      );

      return {
        passages,
        candidateCount: candidates.length,
        missingChunkIds: missing,
        queryTruncated: embedded.degraded,
        appliedFilters,
      };
    } catch (error) {
      throw this.toRetrievalError(error);
    }
  }

  private search(
    vector: EmbeddingVector,
    topK: number,
    filters: MetadataFilters,
    signal?: AbortSignal
  ): Promise<IndexMatch[]> {
    return withRetry(() => this.index.query(vector, topK, filters, signal), {
      retries: this.options.transientRetries,
      signal,
      shouldRetry: (error) => isRagError(error) && error.code === 'INDEX_UNAVAILABLE',
      onRetry: (error, attempt) =>
        log.warn({ error: describeError(error), attempt }, 'Vector index unavailable, retrying'),
    });
  }

  /**
   * Threshold is inclusive; output keeps the deterministic score order even
   * if an index implementation returns matches unsorted.
   */
  private applyThreshold(candidates: IndexMatch[]): IndexMatch[] {
    return candidates.filter((m) => m.score >= this.options.minSimilarity).sort(compareMatches);
  }

  private toRetrievalError(error: unknown): Error {
    if (error instanceof InvalidInputError || error instanceof RequestCancelledError) {
      return error;
    }
    if (error instanceof RetrievalFailedError) {
      return error;
    }
    const component = isRagError(error) ? error.component : 'retriever';
    log.error({ error: describeError(error), component }, 'Retrieval failed');
    return new RetrievalFailedError(`Retrieval failed in ${component}: ${describeError(error)}`, { cause: error });
  }
}
