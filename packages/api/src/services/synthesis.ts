import type { PromptContext } from '@statute-rag/shared';
import {
  EmptyContextError,
  GenerationProviderError,
  GenerationTimeoutError,
  RequestCancelledError,
  describeError,
  isRagError,
} from '../errors';
import { abortable, withDeadline, type Deadline } from '../utils/abort';
import type { CompletionRequest, GenerationProvider } from '../utils/llm';
import { componentLogger } from '../utils/logger';
import type { ResourcePool } from '../utils/pool';

/**
 * Answer Synthesis Service
 *
 * Purpose: Generate grounded answers from assembled statute passages.
 *
 * STRICT GROUNDING POLICY:
 * - Answer ONLY from provided context
 * - Refuse to answer if context is insufficient
 * - Cite passages by their [n] markers
 *
 * Prompts are built from fixed templates and the context order alone, so
 * identical inputs produce byte-identical provider requests.
 */

const log = componentLogger('generator');

export interface GeneratorOptions {
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
  /** Answer from model knowledge (flagged degraded) when no passages qualify. */
  allowEmptyContext: boolean;
  pool: ResourcePool;
}

export interface GenerationOutput {
  text: string;
  mode: 'generated' | 'model-knowledge';
  degraded: boolean;
  refused: boolean;
}

/**
 * System prompt enforcing strict grounding.
 */
export function buildSystemPrompt(): string {
  return `You are a precise legal research assistant. Your job is to answer questions about statutory law using ONLY the statutory passages provided in the context.

STRICT RULES:
1. Answer ONLY using information from the provided passages
2. If the passages do not contain enough information to answer, respond with: "I don't have enough information to answer this question."
3. Do NOT use external knowledge or make assumptions
4. Cite the passages you rely on by their markers (e.g., "Under [1]...")
5. Be concise but complete, and quote statutory language where it decides the answer

Your goal is CORRECTNESS, not fluency. If unsure, refuse to answer.`;
}

/**
 * User prompt with numbered, cited passages and the question.
 */
export function buildUserPrompt(query: string, context: PromptContext): string {
  const passages = context.passages
    .map((passage, idx) => `[${idx + 1}] ${passage.sourceCitation}\n${passage.text}`)
    .join('\n\n');

  return `Context:
${passages}

Question: ${query}

Answer (using ONLY the context above):`;
}

function buildKnowledgeSystemPrompt(): string {
  return `You are a legal research assistant. No statutory passages matched this question, so you are answering from general legal knowledge.

Start your answer by stating that it is not based on retrieved statutory text and must be verified against the official text of the law. Do not invent section numbers. Be concise.`;
}

export function buildCompletionRequest(
  query: string,
  context: PromptContext,
  options: Pick<GeneratorOptions, 'temperature' | 'maxTokens'>
): CompletionRequest {
  if (context.passages.length === 0) {
    return {
      system: buildKnowledgeSystemPrompt(),
      prompt: `Question: ${query}\n\nAnswer:`,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
    };
  }
  return {
    system: buildSystemPrompt(),
    prompt: buildUserPrompt(query, context),
    temperature: options.temperature,
    maxTokens: options.maxTokens,
  };
}

/**
 * Check if answer is a refusal.
 */
export function checkIfRefusal(answer: string): boolean {
  const refusalPhrases = [
    "don't have enough information",
    'insufficient information',
    'cannot answer',
    'not enough context',
    'unable to answer',
  ];

  const lowerAnswer = answer.toLowerCase();
  return refusalPhrases.some((phrase) => lowerAnswer.includes(phrase));
}

export class Generator {
  constructor(private readonly provider: GenerationProvider, private readonly options: GeneratorOptions) {}

  get providerName(): string {
    return this.provider.name;
  }

  /**
   * Generate an answer for `query` from `context`.
   *
   * @throws EmptyContextError when the context is empty and the policy requires passages
   * @throws GenerationTimeoutError when the provider exceeds the timeout
   * @throws GenerationProviderError on any other provider failure or an empty completion
   */
  async generate(query: string, context: PromptContext, signal?: AbortSignal): Promise<GenerationOutput> {
    const knowledgeOnly = context.passages.length === 0;
    if (knowledgeOnly && !this.options.allowEmptyContext) {
      throw new EmptyContextError();
    }

    const startTime = Date.now();
    const request = buildCompletionRequest(query, context, this.options);

    const text = await this.options.pool.use(
      () =>
        withDeadline(this.options.timeoutMs, signal, async (deadline) => {
          try {
            return await abortable(this.provider.complete(request, deadline.signal), deadline.signal);
          } catch (error) {
            throw this.normalizeError(error, deadline, signal);
          }
        }),
      signal
    );

    if (text.trim() === '') {
      throw new GenerationProviderError(`Provider "${this.provider.name}" returned an empty completion`);
    }

    const refused = checkIfRefusal(text);
    log.info(
      {
        latency: Date.now() - startTime,
        provider: this.provider.name,
        model: this.provider.model,
        passagesUsed: context.passages.length,
        refused,
        knowledgeOnly,
      },
      'Answer synthesis completed'
    );

    return {
      text,
      mode: knowledgeOnly ? 'model-knowledge' : 'generated',
      degraded: knowledgeOnly,
      refused,
    };
  }

  async ping(signal: AbortSignal): Promise<void> {
    await this.provider.ping(signal);
  }

  private normalizeError(error: unknown, deadline: Deadline, signal?: AbortSignal): Error {
    if (signal?.aborted) {
      return new RequestCancelledError('generator', { cause: error });
    }
    if (deadline.timedOut()) {
      log.warn({ provider: this.provider.name, timeoutMs: this.options.timeoutMs }, 'Generation timed out');
      return new GenerationTimeoutError(this.options.timeoutMs, { cause: error });
    }
    if (isRagError(error)) {
      return error;
    }
    log.error({ error: describeError(error), provider: this.provider.name }, 'Answer synthesis failed');
    return new GenerationProviderError(`Provider "${this.provider.name}" failed: ${describeError(error)}`, {
      cause: error,
    });
  }
}
