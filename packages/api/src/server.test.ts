import { afterEach, describe, it, expect } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { AnswerResult } from '@statute-rag/shared';
import { IndexUnavailableError } from './errors';
import { latencyBudgetViolations } from './routes/query';
import { buildServer } from './server';
import { HealthAggregator, type HealthProbe } from './services/health';
import { buildHarness, type HarnessOptions } from './testing/harness';

const probes: HealthProbe[] = [
  { component: 'vectorIndex', check: async () => ({}) },
  { component: 'documentStore', check: async () => ({}) },
  { component: 'generator', check: async () => ({}) },
];

let server: FastifyInstance | undefined;

afterEach(async () => {
  await server?.close();
  server = undefined;
});

async function setup(options: HarnessOptions = {}) {
  const harness = buildHarness(options);
  const health = new HealthAggregator(probes, { refreshIntervalMs: 60_000, checkTimeoutMs: 100 });
  server = await buildServer({
    orchestrator: harness.orchestrator,
    health,
    corsOrigins: ['http://localhost:3001'],
    logger: false,
  });
  return { server, health, harness };
}

describe('GET /health', () => {
  it('reports liveness', async () => {
    const { server } = await setup();

    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok', service: 'statute-rag-api', version: '0.1.0' });
  });

  it('reports not ready before the first refresh and ready after it', async () => {
    const { server, health } = await setup();

    const before = await server.inject({ method: 'GET', url: '/health/ready' });
    expect(before.statusCode).toBe(503);
    expect(before.json()).toMatchObject({ overall: 'down', checkedAt: null });

    await health.refresh();
    const after = await server.inject({ method: 'GET', url: '/health/ready' });
    expect(after.statusCode).toBe(200);
    expect(after.json()).toMatchObject({ overall: 'up' });
  });
});

describe('POST /api/v1/query', () => {
  it('returns the answer with its status', async () => {
    const { server } = await setup();

    const response = await server.inject({
      method: 'POST',
      url: '/api/v1/query',
      payload: { query: 'limitation period for contract disputes', options: { topK: 5 } },
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe('DONE');
    expect(body.query).toBe('limitation period for contract disputes');
    expect(body.answer.answerText).toBe('Generated answer [1].');
    expect(body.answer.citedChunkIds).toEqual(['c1', 'c2']);
    expect(body.latencyBudgetViolations).toEqual([]);
    expect(typeof body.requestId).toBe('string');
  });

  it('rejects a malformed body', async () => {
    const { server } = await setup();

    const response = await server.inject({ method: 'POST', url: '/api/v1/query', payload: { question: 'x' } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'Invalid request', code: 'INVALID_INPUT' });
  });

  it('rejects unknown options', async () => {
    const { server } = await setup();

    const response = await server.inject({
      method: 'POST',
      url: '/api/v1/query',
      payload: { query: 'section 3', options: { includeDebug: true } },
    });

    expect(response.statusCode).toBe(400);
  });

  it('maps a blank query to 400', async () => {
    const { server } = await setup();

    const response = await server.inject({ method: 'POST', url: '/api/v1/query', payload: { query: '   ' } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: 'Invalid request',
      code: 'INVALID_INPUT',
      component: 'orchestrator',
      requestId: expect.any(String),
    });
  });

  it('maps an empty context to 422', async () => {
    const { server } = await setup({ matches: [{ chunkId: 'c3', score: 0.1 }] });

    const response = await server.inject({
      method: 'POST',
      url: '/api/v1/query',
      payload: { query: 'limitation period for contract disputes' },
    });

    expect(response.statusCode).toBe(422);
    expect(response.json()).toMatchObject({ code: 'EMPTY_CONTEXT', component: 'generator' });
  });

  it('maps a retrieval outage to 503 without partial data', async () => {
    const { server, harness } = await setup();
    harness.index.failures.push(new IndexUnavailableError('down'), new IndexUnavailableError('down'));

    const response = await server.inject({
      method: 'POST',
      url: '/api/v1/query',
      payload: { query: 'limitation period for contract disputes' },
    });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({
      error: 'Service temporarily unavailable',
      code: 'RETRIEVAL_FAILED',
      component: 'retriever',
      requestId: expect.any(String),
    });
  });

  it('returns a degraded answer with 200', async () => {
    const { server, harness } = await setup({ retrievalFallback: 'static' });
    harness.index.failures.push(new IndexUnavailableError('down'), new IndexUnavailableError('down'));

    const response = await server.inject({
      method: 'POST',
      url: '/api/v1/query',
      payload: { query: 'limitation period for contract disputes' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'DEGRADED_DONE', answer: { degraded: true, mode: 'fallback-static' } });
  });
});

describe('latencyBudgetViolations', () => {
  const answer: AnswerResult = {
    answerText: 'x',
    citedChunkIds: [],
    citations: [],
    retrievalLatencyMs: 900,
    generationLatencyMs: 100,
    degraded: false,
    mode: 'generated',
    refused: false,
    queryTruncated: false,
    contextTruncated: false,
    guardrailFlags: [],
  };

  it('lists each stage over budget', () => {
    expect(latencyBudgetViolations(answer, 1200)).toEqual(['retrieval: 900ms exceeded budget of 800ms']);
    expect(latencyBudgetViolations(answer, 40000)).toEqual([
      'retrieval: 900ms exceeded budget of 800ms',
      'total: 40000ms exceeded budget of 32000ms',
    ]);
  });
});
