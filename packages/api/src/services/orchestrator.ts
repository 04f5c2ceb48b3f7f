import { z } from 'zod';
import {
  CACHE_DEFAULTS,
  dedupeOrdered,
  normalizeQuery,
  type AnswerMode,
  type AnswerResult,
  type AskOptions,
  type PromptContext,
} from '@statute-rag/shared';
import {
  GenerationProviderError,
  GenerationTimeoutError,
  InvalidInputError,
  PoolExhaustedError,
  RetrievalFailedError,
  RequestCancelledError,
  describeError,
  isRagError,
} from '../errors';
import { abortable, throwIfCancelled, withDeadline } from '../utils/abort';
import { componentLogger } from '../utils/logger';
import { withRetry } from '../utils/retry';
import type { ContextAssembler } from './context';
import { reviewAnswer, type GuardrailReview } from './guardrails';
import { classifyIntent, quickReply } from './intent';
import type { RetrievalResult, Retriever } from './retrieval';
import type { Generator } from './synthesis';

/**
 * RAG Orchestrator
 *
 * One request runs RETRIEVING -> ASSEMBLING -> GENERATING -> DONE, ending in
 * DONE, DEGRADED_DONE or FAILED. The outcome is a tagged value, so callers
 * branch on `status` rather than on which exception escaped.
 *
 * Fallbacks:
 * - retrieval failure: cached or static answer when a policy is configured
 * - generation failure after retries: top retrieved passage verbatim (extractive)
 * - empty context: model-knowledge answer when the generator allows it
 *
 * Generated answers pass through the guardrails before they are returned.
 */

const log = componentLogger('orchestrator');

export type OrchestratorState = 'RETRIEVING' | 'ASSEMBLING' | 'GENERATING' | 'DONE' | 'DEGRADED_DONE' | 'FAILED';

export type DegradedReason = Extract<AnswerMode, 'model-knowledge' | 'extractive' | 'fallback-cached' | 'fallback-static'>;

export type AskOutcome =
  | { status: 'DONE'; result: AnswerResult; trail: OrchestratorState[] }
  | { status: 'DEGRADED_DONE'; result: AnswerResult; reason: DegradedReason; trail: OrchestratorState[] }
  | { status: 'FAILED'; error: Error; trail: OrchestratorState[] };

export type RetrievalFallbackPolicy = 'none' | 'cache' | 'static';

/**
 * Last successful answer per normalized query and options.
 */
export interface AnswerCache {
  get(key: string): Promise<AnswerResult | null>;
  set(key: string, result: AnswerResult): Promise<void>;
}

export interface Clock {
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

export interface RagOrchestratorOptions {
  /** Extra generation attempts with identical inputs. */
  generationRetries: number;
  retrievalFallback: RetrievalFallbackPolicy;
  staticFallbackAnswer: string;
  intentRouting: boolean;
  /** Append notices to generated answers that trip a guardrail. */
  guardrails: boolean;
  /** Budget for each answer cache read or write. */
  cacheTimeoutMs?: number;
}

export interface RagOrchestratorDeps {
  retriever: Retriever;
  assembler: ContextAssembler;
  generator: Generator;
  answerCache?: AnswerCache;
  clock?: Clock;
}

export const AskOptionsSchema = z
  .object({
    topK: z.number().int().positive().optional(),
    maxContextTokens: z.number().int().positive().optional(),
    filters: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
  })
  .strict();

export function answerCacheKey(query: string, options: AskOptions): string {
  const filters = Object.entries(options.filters ?? {}).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify({
    query: normalizeQuery(query),
    topK: options.topK ?? null,
    maxContextTokens: options.maxContextTokens ?? null,
    filters,
  });
}

function isGenerationFailure(error: unknown): boolean {
  return (
    error instanceof GenerationTimeoutError ||
    error instanceof GenerationProviderError ||
    error instanceof PoolExhaustedError
  );
}

class Trail {
  readonly states: OrchestratorState[] = [];

  enter(state: OrchestratorState): void {
    this.states.push(state);
    log.debug({ state }, 'State transition');
  }
}

export class RagOrchestrator {
  private readonly clock: Clock;

  constructor(private readonly deps: RagOrchestratorDeps, private readonly options: RagOrchestratorOptions) {
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Answer a question, or throw the error of a FAILED outcome.
   */
  async ask(query: string, options: AskOptions = {}, signal?: AbortSignal): Promise<AnswerResult> {
    const outcome = await this.run(query, options, signal);
    if (outcome.status === 'FAILED') {
      throw outcome.error;
    }
    return outcome.result;
  }

  async run(query: string, options: AskOptions = {}, signal?: AbortSignal): Promise<AskOutcome> {
    const trail = new Trail();
    try {
      const parsedOptions = this.validate(query, options);
      const question = query.trim();
      throwIfCancelled(signal, 'orchestrator');

      if (this.options.intentRouting) {
        const reply = quickReply(classifyIntent(question));
        if (reply !== null) {
          trail.enter('DONE');
          return { status: 'DONE', result: this.quickReplyResult(reply), trail: trail.states };
        }
      }

      trail.enter('RETRIEVING');
      const retrievalStart = this.clock.now();
      let retrieval: RetrievalResult;
      try {
        retrieval = await this.deps.retriever.retrieve(question, {
          topK: parsedOptions.topK,
          filters: parsedOptions.filters,
          signal,
        });
      } catch (error) {
        if (error instanceof RetrievalFailedError && !signal?.aborted) {
          return await this.retrievalFallback(
            question,
            parsedOptions,
            error,
            this.clock.now() - retrievalStart,
            trail,
            signal
          );
        }
        throw error;
      }
      const retrievalLatencyMs = this.clock.now() - retrievalStart;
      throwIfCancelled(signal, 'orchestrator');

      trail.enter('ASSEMBLING');
      const context = this.deps.assembler.assemble(retrieval.passages, {
        maxTokens: parsedOptions.maxContextTokens,
      });

      trail.enter('GENERATING');
      const generationStart = this.clock.now();
      try {
        const output = await withRetry(() => this.deps.generator.generate(question, context, signal), {
          retries: this.options.generationRetries,
          signal,
          shouldRetry: isGenerationFailure,
          onRetry: (error, attempt) =>
            log.warn({ error: describeError(error), attempt }, 'Generation failed, retrying with identical inputs'),
        });
        const generationLatencyMs = this.clock.now() - generationStart;
        throwIfCancelled(signal, 'orchestrator');

        const cited = output.refused ? [] : context.passages;
        const review = this.review(output.text);
        const result: AnswerResult = {
          answerText: review.text,
          citedChunkIds: dedupeOrdered(cited.map((p) => p.chunkId)),
          citations: dedupeOrdered(cited.map((p) => p.sourceCitation)),
          retrievalLatencyMs,
          generationLatencyMs,
          degraded: output.degraded,
          mode: output.mode,
          refused: output.refused,
          queryTruncated: retrieval.queryTruncated,
          contextTruncated: context.truncated,
          guardrailFlags: review.flags,
        };

        if (output.mode === 'model-knowledge') {
          trail.enter('DEGRADED_DONE');
          return { status: 'DEGRADED_DONE', result, reason: 'model-knowledge', trail: trail.states };
        }

        // Background write; failures are logged.
        void this.remember(question, parsedOptions, result);
        trail.enter('DONE');
        return { status: 'DONE', result, trail: trail.states };
      } catch (error) {
        if (signal?.aborted || !isGenerationFailure(error) || context.passages.length === 0) {
          throw error;
        }
        const result = this.extractiveResult(
          retrieval,
          context,
          retrievalLatencyMs,
          this.clock.now() - generationStart
        );
        log.warn({ error: describeError(error) }, 'Generation failed after retries, returning extractive answer');
        trail.enter('DEGRADED_DONE');
        return { status: 'DEGRADED_DONE', result, reason: 'extractive', trail: trail.states };
      }
    } catch (error) {
      const failure = this.toFailure(error, signal);
      log.error(
        {
          error: failure.message,
          code: isRagError(failure) ? failure.code : undefined,
          component: isRagError(failure) ? failure.component : 'orchestrator',
          trail: trail.states,
        },
        'Query failed'
      );
      trail.enter('FAILED');
      return { status: 'FAILED', error: failure, trail: trail.states };
    }
  }

  private validate(query: string, options: AskOptions): AskOptions {
    if (query.trim() === '') {
      throw new InvalidInputError('Query must not be empty', 'orchestrator');
    }
    const parsed = AskOptionsSchema.safeParse(options);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new InvalidInputError(`Invalid options: ${issues}`, 'orchestrator');
    }
    return parsed.data;
  }

  private async retrievalFallback(
    question: string,
    options: AskOptions,
    error: RetrievalFailedError,
    retrievalLatencyMs: number,
    trail: Trail,
    signal?: AbortSignal
  ): Promise<AskOutcome> {
    const policy = this.options.retrievalFallback;

    if (policy === 'static') {
      log.warn({ error: error.message }, 'Retrieval failed, returning static fallback answer');
      trail.enter('DEGRADED_DONE');
      return {
        status: 'DEGRADED_DONE',
        reason: 'fallback-static',
        trail: trail.states,
        result: {
          answerText: this.options.staticFallbackAnswer,
          citedChunkIds: [],
          citations: [],
          retrievalLatencyMs,
          generationLatencyMs: 0,
          degraded: true,
          mode: 'fallback-static',
          refused: false,
          queryTruncated: false,
          contextTruncated: false,
          guardrailFlags: [],
        },
      };
    }

    if (policy === 'cache' && this.deps.answerCache) {
      const cached = await this.readCachedAnswer(question, options, signal);
      if (cached) {
        log.warn({ error: error.message }, 'Retrieval failed, returning cached answer');
        trail.enter('DEGRADED_DONE');
        return {
          status: 'DEGRADED_DONE',
          reason: 'fallback-cached',
          trail: trail.states,
          result: { ...cached, retrievalLatencyMs, generationLatencyMs: 0, degraded: true, mode: 'fallback-cached' },
        };
      }
    }

    throw error;
  }

  private extractiveResult(
    retrieval: RetrievalResult,
    context: PromptContext,
    retrievalLatencyMs: number,
    generationLatencyMs: number
  ): AnswerResult {
    const top = retrieval.passages[0];
    return {
      answerText: top.text,
      citedChunkIds: [top.chunkId],
      citations: [top.sourceCitation],
      retrievalLatencyMs,
      generationLatencyMs,
      degraded: true,
      mode: 'extractive',
      refused: false,
      queryTruncated: retrieval.queryTruncated,
      contextTruncated: context.truncated,
      guardrailFlags: [],
    };
  }

  private quickReplyResult(answerText: string): AnswerResult {
    return {
      answerText,
      citedChunkIds: [],
      citations: [],
      retrievalLatencyMs: 0,
      generationLatencyMs: 0,
      degraded: false,
      mode: 'quick-reply',
      refused: false,
      queryTruncated: false,
      contextTruncated: false,
      guardrailFlags: [],
    };
  }

  private review(text: string): GuardrailReview {
    if (!this.options.guardrails) {
      return { text, flags: [] };
    }
    const review = reviewAnswer(text);
    if (review.flags.length > 0) {
      log.info({ flags: review.flags }, 'Answer tripped guardrails');
    }
    return review;
  }

  private async readCachedAnswer(
    question: string,
    options: AskOptions,
    signal?: AbortSignal
  ): Promise<AnswerResult | null> {
    const cache = this.deps.answerCache;
    if (!cache) return null;
    try {
      return await this.underCacheDeadline(signal, (cacheSignal) =>
        abortable(cache.get(answerCacheKey(question, options)), cacheSignal)
      );
    } catch (error) {
      if (signal?.aborted) {
        throw new RequestCancelledError('orchestrator', { cause: error });
      }
      log.warn({ error: describeError(error) }, 'Answer cache read failed');
      return null;
    }
  }

  private async remember(question: string, options: AskOptions, result: AnswerResult): Promise<void> {
    const cache = this.deps.answerCache;
    if (!cache || this.options.retrievalFallback !== 'cache') return;
    try {
      await this.underCacheDeadline(undefined, (cacheSignal) =>
        abortable(cache.set(answerCacheKey(question, options), result), cacheSignal)
      );
    } catch (error) {
      log.warn({ error: describeError(error) }, 'Answer cache write failed');
    }
  }

  private underCacheDeadline<T>(
    signal: AbortSignal | undefined,
    task: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const timeoutMs = this.options.cacheTimeoutMs ?? CACHE_DEFAULTS.TIMEOUT_MS;
    return withDeadline(timeoutMs, signal, (deadline) => task(deadline.signal));
  }

  private toFailure(error: unknown, signal?: AbortSignal): Error {
    if (error instanceof RequestCancelledError) {
      return error;
    }
    if (signal?.aborted) {
      return new RequestCancelledError('orchestrator', { cause: error });
    }
    return error instanceof Error ? error : new Error(describeError(error));
  }
}
