import { describe, it, expect } from 'vitest';
import { estimateTokens, type RetrievedPassage } from '@statute-rag/shared';
import { InvalidInputError } from '../errors';
import { ContextAssembler } from './context';

function passage(chunkId: string, text: string, rank: number, sourceCitation = `Act, s. ${chunkId}`): RetrievedPassage {
  return { chunkId, text, sourceCitation, section: {}, similarityScore: 1 - rank / 100, rank };
}

const tenTokens = 'x'.repeat(40);

describe('ContextAssembler', () => {
  const assembler = new ContextAssembler({ maxTokens: 3000, maxPassages: 5 });

  it('fills greedily in rank order within the budget', () => {
    const context = assembler.assemble(
      [passage('p3', tenTokens, 3), passage('p1', tenTokens, 1), passage('p2', tenTokens, 2)],
      { maxTokens: 25 }
    );

    expect(context.passages.map((p) => p.chunkId)).toEqual(['p1', 'p2']);
    expect(context.tokenCount).toBe(20);
    expect(context.maxTokens).toBe(25);
    expect(context.truncated).toBe(false);
    expect(context.droppedOverBudget).toEqual(['p3']);
  });

  it('stops at the first passage that does not fit', () => {
    const context = assembler.assemble(
      [passage('p1', tenTokens, 1), passage('p2', 'y'.repeat(120), 2), passage('p3', 'z'.repeat(8), 3)],
      { maxTokens: 20 }
    );

    expect(context.passages.map((p) => p.chunkId)).toEqual(['p1']);
    expect(context.droppedOverBudget).toEqual(['p2', 'p3']);
  });

  it('skips a passage citing the same source as the one before it', () => {
    const context = assembler.assemble([
      passage('p1', 'first', 1, 'Limitation Act, s. 3'),
      passage('p2', 'second', 2, 'Limitation Act, s. 3'),
      passage('p3', 'third', 3, 'Limitation Act, s. 5'),
      passage('p4', 'fourth', 4, 'Limitation Act, s. 3'),
    ]);

    expect(context.passages.map((p) => p.chunkId)).toEqual(['p1', 'p3', 'p4']);
    expect(context.droppedDuplicates).toEqual(['p2']);
  });

  it('truncates an oversized first passage to the budget', () => {
    const context = assembler.assemble([passage('big', 'w'.repeat(100), 1), passage('next', 'tiny', 2)], {
      maxTokens: 10,
    });

    expect(context.passages).toHaveLength(1);
    expect(context.passages[0].text).toBe('w'.repeat(40));
    expect(context.passages[0].truncated).toBe(true);
    expect(context.tokenCount).toBe(10);
    expect(context.truncated).toBe(true);
    expect(context.droppedOverBudget).toEqual(['next']);
  });

  it('caps the number of passages', () => {
    const context = assembler.assemble(
      [passage('p1', 'a', 1), passage('p2', 'b', 2), passage('p3', 'c', 3)],
      { maxPassages: 2 }
    );
    expect(context.passages.map((p) => p.chunkId)).toEqual(['p1', 'p2']);
    expect(context.droppedOverBudget).toEqual(['p3']);
  });

  it('returns an empty context for no passages', () => {
    expect(assembler.assemble([])).toEqual({
      passages: [],
      tokenCount: 0,
      maxTokens: 3000,
      truncated: false,
      droppedDuplicates: [],
      droppedOverBudget: [],
    });
  });

  it('rejects a budget below one token', () => {
    expect(() => assembler.assemble([passage('p1', 'a', 1)], { maxTokens: 0 })).toThrow(InvalidInputError);
  });

  it('never exceeds the budget', () => {
    const lengths = [3, 97, 41, 400, 12, 58, 7, 250, 1, 33];
    const passages = lengths.map((len, idx) => passage(`p${idx}`, 'q'.repeat(len), idx + 1));

    for (let maxTokens = 1; maxTokens <= 150; maxTokens++) {
      const context = assembler.assemble(passages, { maxTokens, maxPassages: 10 });
      const counted = context.passages.reduce((sum, p) => sum + estimateTokens(p.text), 0);

      expect(context.tokenCount).toBe(counted);
      expect(context.tokenCount).toBeLessThanOrEqual(maxTokens);
      expect(context.passages.length).toBeGreaterThan(0);
    }
  });
});
