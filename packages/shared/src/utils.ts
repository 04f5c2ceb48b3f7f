import { CHARS_PER_TOKEN } from './constants';

/**
 * Shared utility functions for Statute RAG.
 */

/**
 * Check if a latency exceeds its budget.
 */
export function checkLatencyBudget(
  actual: number,
  budget: number,
  stage: string
): { exceeded: boolean; violation?: string } {
  if (actual > budget) {
    return {
      exceeded: true,
      violation: `${stage}: ${actual}ms exceeded budget of ${budget}ms`,
    };
  }
  return { exceeded: false };
}

/**
 * Token estimate used for every budget decision: ceil(chars / 4).
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Cut text so that estimateTokens(result) <= maxTokens.
 * The cut is at a fixed character offset, so it is deterministic.
 */
export function truncateToTokens(text: string, maxTokens: number): string {
  const limit = Math.max(0, Math.floor(maxTokens)) * CHARS_PER_TOKEN;
  return text.length <= limit ? text : text.slice(0, limit);
}

/**
 * Keep the first occurrence of every value, preserving order.
 */
export function dedupeOrdered<T>(values: readonly T[]): T[] {
  const seen = new Set<T>();
  const out: T[] = [];
  for (const value of values) {
    if (!seen.has(value)) {
      seen.add(value);
      out.push(value);
    }
  }
  return out;
}

/**
 * Score order for index matches: descending score, ties by id ascending.
 */
export function compareMatches(
  a: { chunkId: string; score: number },
  b: { chunkId: string; score: number }
): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.chunkId < b.chunkId) return -1;
  if (a.chunkId > b.chunkId) return 1;
  return 0;
}

/**
 * Clamp a raw similarity into the normalized 0-1 range.
 */
export function normalizeScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.max(0, Math.min(1, score));
}

/**
 * Calculate cosine similarity between two vectors.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have same dimensions');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Normalize a query for cache keys (lowercase, collapsed whitespace).
 */
export function normalizeQuery(query: string): string {
  return query.toLowerCase().trim().replace(/\s+/g, ' ');
}
