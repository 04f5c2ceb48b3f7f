import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { LATENCY_BUDGETS, checkLatencyBudget, type AnswerResult, type QueryRequest, type QueryResponse } from '@statute-rag/shared';
import { isRagError } from '../errors';
import { AskOptionsSchema, type RagOrchestrator } from '../services/orchestrator';

const QueryRequestSchema = z.object({
  query: z.string().min(1).max(1000),
  options: AskOptionsSchema.optional(),
});

export interface QueryRouteOptions {
  orchestrator: RagOrchestrator;
}

function failureStatus(error: Error): { statusCode: number; message: string } {
  if (isRagError(error) && error.code === 'INVALID_INPUT') {
    return { statusCode: 400, message: 'Invalid request' };
  }
  if (isRagError(error) && error.code === 'EMPTY_CONTEXT') {
    return { statusCode: 422, message: 'No relevant statutory text found for this question' };
  }
  return { statusCode: 503, message: 'Service temporarily unavailable' };
}

export function latencyBudgetViolations(answer: AnswerResult, totalLatencyMs: number): string[] {
  return [
    checkLatencyBudget(answer.retrievalLatencyMs, LATENCY_BUDGETS.RETRIEVAL, 'retrieval'),
    checkLatencyBudget(answer.generationLatencyMs, LATENCY_BUDGETS.SYNTHESIS, 'synthesis'),
    checkLatencyBudget(totalLatencyMs, LATENCY_BUDGETS.TOTAL, 'total'),
  ].flatMap((check) => (check.violation ? [check.violation] : []));
}

export const queryRoutes: FastifyPluginAsync<QueryRouteOptions> = async (fastify, { orchestrator }) => {
  /**
   * POST /api/v1/query
   * Main RAG query endpoint
   *
   * Pipeline (inside the orchestrator):
   * 1. Intent routing
   * 2. Retrieval (embed + vector search + chunk lookup)
   * 3. Context assembly
   * 4. Answer synthesis, with extractive fallback
   */
  fastify.post('/', async (request, reply) => {
    const startTime = Date.now();
    const requestId = request.id;

    const validation = QueryRequestSchema.safeParse(request.body);
    if (!validation.success) {
      return reply.code(400).send({
        error: 'Invalid request',
        code: 'INVALID_INPUT',
        component: 'orchestrator',
        requestId,
        details: validation.error.issues,
      });
    }

    const body: QueryRequest = validation.data;
    const { query, options } = body;

    // Client disconnect cancels in-flight provider calls.
    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableEnded) controller.abort(new Error('Client disconnected'));
    });

    request.log.info({ requestId, query }, 'Processing query');
    const outcome = await orchestrator.run(query, options, controller.signal);

    if (outcome.status === 'FAILED') {
      const { statusCode, message } = failureStatus(outcome.error);
      request.log.error({ requestId, error: outcome.error.message, trail: outcome.trail }, 'Query failed');
      return reply.code(statusCode).send({
        error: message,
        code: isRagError(outcome.error) ? outcome.error.code : 'INTERNAL',
        component: isRagError(outcome.error) ? outcome.error.component : 'orchestrator',
        requestId,
      });
    }

    const totalLatency = Date.now() - startTime;
    const violations = latencyBudgetViolations(outcome.result, totalLatency);
    if (violations.length > 0) {
      request.log.warn({ requestId, violations }, 'Latency budget exceeded');
    }

    request.log.info(
      { requestId, totalLatency, status: outcome.status, mode: outcome.result.mode },
      'Query processed successfully'
    );

    const response: QueryResponse = {
      requestId,
      query,
      status: outcome.status,
      answer: outcome.result,
      latencyBudgetViolations: violations,
    };
    return response;
  });
};
