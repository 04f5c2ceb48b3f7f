import type { AnswerResult, Chunk, IndexMatch } from '@statute-rag/shared';
import { ContextAssembler } from '../services/context';
import { InMemoryDocumentStore } from '../services/document-store';
import { RagOrchestrator, type AnswerCache, type RetrievalFallbackPolicy } from '../services/orchestrator';
import { Retriever } from '../services/retrieval';
import { Generator } from '../services/synthesis';
import { EmbeddingClient } from '../utils/embeddings';
import {
  FakeEmbeddingProvider,
  ScriptedGenerationProvider,
  StubVectorIndex,
  makeChunk,
  testPool,
  type CompletionStep,
} from './fakes';

export const STATUTE_CHUNKS: Chunk[] = [
  makeChunk('c1', 'three years from cause of action', 'Limitation Act, s. 3'),
  makeChunk('c2', 'Time runs from the date of breach.', 'Limitation Act, s. 5'),
  makeChunk('c3', 'A contract is an agreement enforceable by law.', 'Contract Act, s. 2'),
];

export const STATUTE_MATCHES: IndexMatch[] = [
  { chunkId: 'c1', score: 0.92 },
  { chunkId: 'c2', score: 0.71 },
  { chunkId: 'c3', score: 0.4 },
];

export const STATIC_FALLBACK = 'Statute search is unavailable. Please try again later.';

export class MapAnswerCache implements AnswerCache {
  readonly entries = new Map<string, AnswerResult>();
  failWrites = false;

  async get(key: string): Promise<AnswerResult | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, result: AnswerResult): Promise<void> {
    if (this.failWrites) {
      throw new Error('cache offline');
    }
    this.entries.set(key, result);
  }
}

export interface HarnessOptions {
  matches?: IndexMatch[];
  chunks?: Chunk[];
  steps?: CompletionStep[];
  allowEmptyContext?: boolean;
  retrievalFallback?: RetrievalFallbackPolicy;
  answerCache?: AnswerCache;
  generationTimeoutMs?: number;
  guardrails?: boolean;
}

export function buildHarness(options: HarnessOptions = {}) {
  const embeddingProvider = new FakeEmbeddingProvider();
  const index = new StubVectorIndex(options.matches ?? STATUTE_MATCHES);
  const documents = new InMemoryDocumentStore(options.chunks ?? STATUTE_CHUNKS);
  const generation = new ScriptedGenerationProvider(options.steps ?? []);

  const embeddings = new EmbeddingClient(embeddingProvider, {
    oversizePolicy: 'truncate',
    timeoutMs: 1000,
    retries: 0,
    pool: testPool('embedding'),
  });

  const orchestrator = new RagOrchestrator(
    {
      retriever: new Retriever(embeddings, index, documents, {
        topK: 20,
        minSimilarity: 0.5,
        transientRetries: 1,
        queryFilters: true,
      }),
      assembler: new ContextAssembler({ maxTokens: 3000, maxPassages: 5 }),
      generator: new Generator(generation, {
        timeoutMs: options.generationTimeoutMs ?? 50,
        temperature: 0,
        maxTokens: 1000,
        allowEmptyContext: options.allowEmptyContext ?? false,
        pool: testPool('generator'),
      }),
      answerCache: options.answerCache,
      clock: { now: () => 0 },
    },
    {
      generationRetries: 1,
      retrievalFallback: options.retrievalFallback ?? 'none',
      staticFallbackAnswer: STATIC_FALLBACK,
      intentRouting: true,
      guardrails: options.guardrails ?? true,
      cacheTimeoutMs: 50,
    }
  );

  return { orchestrator, index, documents, generation, embeddingProvider };
}
