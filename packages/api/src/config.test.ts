import { describe, it, expect } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const cfg = loadConfig({});

    expect(cfg.port).toBe(3000);
    expect(cfg.logLevel).toBe('info');
    expect(cfg.corsOrigins).toEqual(['http://localhost:3001']);
    expect(cfg.generation).toEqual({ provider: 'groq', timeoutMs: 30000, temperature: 0, maxTokens: 1000 });
    expect(cfg.rag.topK).toBe(20);
    expect(cfg.rag.minSimilarity).toBe(0.5);
    expect(cfg.rag.maxContextTokens).toBe(3000);
    expect(cfg.rag.transientRetries).toBe(1);
    expect(cfg.rag.generationRetries).toBe(1);
    expect(cfg.rag.allowEmptyContext).toBe(false);
    expect(cfg.rag.retrievalFallback).toBe('none');
    expect(cfg.rag.intentRouting).toBe(true);
    expect(cfg.embeddings.oversizePolicy).toBe('truncate');
    expect(cfg.redis.enabled).toBe(true);
  });

  it('coerces numbers and flags from strings', () => {
    const cfg = loadConfig({
      PORT: '8080',
      RAG_MIN_SIMILARITY: '0.65',
      RAG_ALLOW_EMPTY_CONTEXT: '1',
      RAG_INTENT_ROUTING: 'false',
      RAG_GENERATION_RETRIES: '0',
    });

    expect(cfg.port).toBe(8080);
    expect(cfg.rag.minSimilarity).toBe(0.65);
    expect(cfg.rag.allowEmptyContext).toBe(true);
    expect(cfg.rag.intentRouting).toBe(false);
    expect(cfg.rag.generationRetries).toBe(0);
  });

  it('splits and trims CORS origins', () => {
    expect(loadConfig({ CORS_ORIGINS: 'https://a.test, https://b.test' }).corsOrigins).toEqual([
      'https://a.test',
      'https://b.test',
    ]);
  });

  it('silences logs under test unless a level is given', () => {
    expect(loadConfig({ NODE_ENV: 'test' }).logLevel).toBe('silent');
    expect(loadConfig({ NODE_ENV: 'test', LOG_LEVEL: 'debug' }).logLevel).toBe('debug');
  });

  it('rejects out-of-range values', () => {
    expect(() => loadConfig({ RAG_MIN_SIMILARITY: '1.5' })).toThrow(/^Invalid configuration: RAG_MIN_SIMILARITY/);
    expect(() => loadConfig({ RAG_RETRIEVAL_FALLBACK: 'maybe' })).toThrow(/RAG_RETRIEVAL_FALLBACK/);
    expect(() => loadConfig({ RAG_TOP_K: '0' })).toThrow(/RAG_TOP_K/);
  });

  it('returns a frozen config down to its groups', () => {
    const cfg = loadConfig({});

    expect(Object.isFrozen(cfg)).toBe(true);
    expect(Object.isFrozen(cfg.rag)).toBe(true);
    expect(Object.isFrozen(cfg.corsOrigins)).toBe(true);
    expect(Reflect.set(cfg.rag, 'topK', 5)).toBe(false);
    expect(cfg.rag.topK).toBe(20);
  });

  it('enables query filters and guardrails by default', () => {
    const cfg = loadConfig({});

    expect(cfg.rag.queryFilters).toBe(true);
    expect(cfg.rag.guardrails).toBe(true);
    expect(cfg.redis.timeoutMs).toBe(250);
    expect(loadConfig({ RAG_GUARDRAILS: 'false' }).rag.guardrails).toBe(false);
  });
});
