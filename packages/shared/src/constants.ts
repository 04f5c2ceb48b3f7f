/**
 * Shared constants for Statute RAG.
 */

export const LATENCY_BUDGETS = {
  RETRIEVAL: 800, // ms, includes query embedding
  SYNTHESIS: 30000, // ms
  TOTAL: 32000, // ms
} as const;

export const RAG_DEFAULTS = {
  TOP_K: 20,
  MIN_SIMILARITY: 0.5,
  MAX_CONTEXT_TOKENS: 3000,
  MAX_PASSAGES: 5,
  TRANSIENT_RETRIES: 1,
  GENERATION_RETRIES: 1,
} as const;

export const GENERATION_DEFAULTS = {
  TIMEOUT_MS: 30000,
  TEMPERATURE: 0,
  MAX_TOKENS: 1000,
} as const;

export const EMBEDDING_DEFAULTS = {
  MODEL: 'text-embedding-3-small',
  DIMENSION: 1536,
  MAX_BATCH_SIZE: 64,
  MAX_INPUT_TOKENS: 8000,
  TIMEOUT_MS: 10000,
  CACHE_TTL: 86400, // 24 hours
} as const;

/** Rough characters-per-token ratio used for all budget arithmetic. */
export const CHARS_PER_TOKEN = 4;

export const HEALTH_DEFAULTS = {
  REFRESH_INTERVAL_MS: 15000,
  CHECK_TIMEOUT_MS: 3000,
} as const;

export const CACHE_DEFAULTS = {
  TIMEOUT_MS: 250, // per cache read or write; a slow cache counts as a miss
} as const;

/** Checks run over generated answers, in the order they are reported. */
export const GUARDRAIL_FLAGS = ['legal-advice', 'outcome-prediction', 'sensitive-topic', 'personal-data'] as const;
