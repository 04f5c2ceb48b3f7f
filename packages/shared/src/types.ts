/**
 * Core types for Statute RAG.
 * Shared between the API package and anything that consumes its answers.
 */

import type { GUARDRAIL_FLAGS } from './constants';

export type MetadataValue = string | number | boolean;

/** Flat key/value constraints matched against index entry metadata. */
export type MetadataFilters = Record<string, MetadataValue>;

export interface SectionMetadata {
  act?: string;
  sectionNumber?: string;
  title?: string;
  jurisdiction?: string;
  [key: string]: MetadataValue | undefined;
}

/**
 * A stored unit of legal text. Immutable once ingested.
 */
export interface Chunk {
  id: string;
  text: string;
  sourceCitation: string;
  section: SectionMetadata;
}

export interface EmbeddingVector {
  values: number[];
  model: string;
  dimension: number;
}

export interface IndexMatch {
  chunkId: string;
  score: number;
}

export interface RetrievedPassage {
  chunkId: string;
  text: string;
  sourceCitation: string;
  section: SectionMetadata;
  similarityScore: number; // normalized 0-1
  rank: number; // 1-based
}

export interface ContextPassage extends RetrievedPassage {
  truncated: boolean;
}

export interface PromptContext {
  passages: ContextPassage[];
  tokenCount: number;
  maxTokens: number;
  truncated: boolean;
  droppedDuplicates: string[];
  droppedOverBudget: string[];
}

export type AnswerMode =
  | 'generated'
  | 'model-knowledge'
  | 'extractive'
  | 'fallback-cached'
  | 'fallback-static'
  | 'quick-reply';

export type GuardrailFlag = (typeof GUARDRAIL_FLAGS)[number];

export interface AnswerResult {
  answerText: string;
  citedChunkIds: string[];
  citations: string[];
  retrievalLatencyMs: number;
  generationLatencyMs: number;
  degraded: boolean;
  mode: AnswerMode;
  refused: boolean;
  queryTruncated: boolean;
  contextTruncated: boolean;
  /** Guardrail checks the answer text tripped; their notices are already appended. */
  guardrailFlags: GuardrailFlag[];
}

export interface AskOptions {
  topK?: number;
  maxContextTokens?: number;
  filters?: MetadataFilters;
}

export type HealthState = 'up' | 'degraded' | 'down';

export type ComponentName =
  | 'embedding'
  | 'vectorIndex'
  | 'documentStore'
  | 'generator'
  | 'cache';

export interface HealthStatus {
  component: ComponentName;
  state: HealthState;
  lastCheckedAt: string | null;
  detail: string;
  latencyMs?: number;
}

export interface HealthReport {
  overall: HealthState;
  checkedAt: string | null;
  components: HealthStatus[];
}

export interface QueryRequest {
  query: string;
  options?: AskOptions;
}

export interface QueryResponse {
  requestId: string;
  query: string;
  status: 'DONE' | 'DEGRADED_DONE';
  answer: AnswerResult;
  latencyBudgetViolations: string[];
}
