import {
  estimateTokens,
  truncateToTokens,
  type ContextPassage,
  type PromptContext,
  type RetrievedPassage,
} from '@statute-rag/shared';
import { InvalidInputError } from '../errors';
import { componentLogger } from '../utils/logger';

/**
 * Context Assembler
 *
 * Greedy fill in rank order under a token budget:
 * - a passage whose citation equals the previous candidate's is skipped
 *   (adjacent duplicates; the higher-ranked one stays)
 * - filling stops at the first passage that would overflow the budget
 * - an oversized first passage is truncated instead of returning nothing
 *
 * Pure and deterministic for a given input order and budget.
 */

const log = componentLogger('context-assembler');

export interface AssembleOptions {
  maxTokens: number;
  maxPassages: number;
}

export class ContextAssembler {
  constructor(private readonly defaults: AssembleOptions) {}

  assemble(passages: readonly RetrievedPassage[], overrides: Partial<AssembleOptions> = {}): PromptContext {
    const maxTokens = overrides.maxTokens ?? this.defaults.maxTokens;
    const maxPassages = overrides.maxPassages ?? this.defaults.maxPassages;

    if (!Number.isInteger(maxTokens) || maxTokens < 1) {
      throw new InvalidInputError(`maxContextTokens must be a positive integer, got ${maxTokens}`, 'contextAssembler');
    }

    const ordered = [...passages].sort((a, b) => a.rank - b.rank);
    const selected: ContextPassage[] = [];
    const droppedDuplicates: string[] = [];
    const droppedOverBudget: string[] = [];
    let tokenCount = 0;
    let truncated = false;
    let full = false;
    let previousCitation: string | undefined;

    for (const passage of ordered) {
      const isAdjacentDuplicate = previousCitation !== undefined && passage.sourceCitation === previousCitation;
      previousCitation = passage.sourceCitation;

      if (isAdjacentDuplicate) {
        droppedDuplicates.push(passage.chunkId);
        continue;
      }
      if (full || selected.length >= maxPassages) {
        droppedOverBudget.push(passage.chunkId);
        full = true;
        continue;
      }

      const cost = estimateTokens(passage.text);
      if (tokenCount + cost <= maxTokens) {
        selected.push({ ...passage, truncated: false });
        tokenCount += cost;
        continue;
      }

      if (selected.length === 0) {
        const text = truncateToTokens(passage.text, maxTokens);
        selected.push({ ...passage, text, truncated: true });
        tokenCount = estimateTokens(text);
        truncated = true;
        full = true;
        log.debug({ chunkId: passage.chunkId, originalTokens: cost, maxTokens }, 'Truncated oversized first passage');
        continue;
      }

      droppedOverBudget.push(passage.chunkId);
      full = true;
    }

    return { passages: selected, tokenCount, maxTokens, truncated, droppedDuplicates, droppedOverBudget };
  }
}
