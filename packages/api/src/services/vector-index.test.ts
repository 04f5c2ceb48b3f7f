import { describe, it, expect } from 'vitest';
import { IndexUnavailableError, InvalidInputError, RequestCancelledError } from '../errors';
import { TEST_DIMENSION, TEST_MODEL, vector } from '../testing/fakes';
import { InMemoryVectorIndex, rankMatches } from './vector-index';

function seededIndex() {
  return new InMemoryVectorIndex({ model: TEST_MODEL, dimension: TEST_DIMENSION });
}

describe('InMemoryVectorIndex', () => {
  it('sorts by descending score with ties broken by chunk id', async () => {
    const index = seededIndex();
    await index.upsert('b', vector([1, 0, 0]), {});
    await index.upsert('c', vector([0, 1, 0]), {});
    await index.upsert('a', vector([2, 0, 0]), {});

    const matches = await index.query(vector([1, 0, 0]), 10);

    expect(matches).toEqual([
      { chunkId: 'a', score: 1 },
      { chunkId: 'b', score: 1 },
      { chunkId: 'c', score: 0 },
    ]);
  });

  it('returns at most topK matches', async () => {
    const index = seededIndex();
    await index.upsert('a', vector([1, 0, 0]), {});
    await index.upsert('b', vector([0, 1, 0]), {});

    expect(await index.query(vector([1, 0, 0]), 1)).toEqual([{ chunkId: 'a', score: 1 }]);
  });

  it('clamps negative similarity to zero', async () => {
    const index = seededIndex();
    await index.upsert('opposite', vector([-1, 0, 0]), {});

    expect(await index.query(vector([1, 0, 0]), 5)).toEqual([{ chunkId: 'opposite', score: 0 }]);
  });

  it('applies metadata filters by strict equality', async () => {
    const index = seededIndex();
    await index.upsert('k1', vector([1, 0, 0]), { act: 'Contract Act', year: 1872 });
    await index.upsert('k2', vector([1, 0, 0]), { act: 'Limitation Act', year: 1963 });

    const matches = await index.query(vector([1, 0, 0]), 5, { act: 'Limitation Act' });
    expect(matches.map((m) => m.chunkId)).toEqual(['k2']);
    expect(await index.query(vector([1, 0, 0]), 5, { year: '1963' })).toEqual([]);
  });

  it('rejects a vector from another model', async () => {
    const index = seededIndex();
    await expect(index.query(vector([1, 0, 0], 'other-model'), 5)).rejects.toBeInstanceOf(InvalidInputError);
  });

  it('rejects a vector of the wrong dimension', async () => {
    const index = seededIndex();
    await expect(index.query(vector([1, 0]), 5)).rejects.toThrow(
      'Vector dimension 2 does not match index dimension 3'
    );
    await expect(index.upsert('x', vector([1, 0, 0, 0]), {})).rejects.toBeInstanceOf(InvalidInputError);
  });

  it('rejects a non-positive topK', async () => {
    await expect(seededIndex().query(vector([1, 0, 0]), 0)).rejects.toThrow('topK must be a positive integer, got 0');
  });

  it('reports connectivity loss as IndexUnavailable', async () => {
    const index = seededIndex();
    index.setAvailable(false);

    await expect(index.query(vector([1, 0, 0]), 5)).rejects.toBeInstanceOf(IndexUnavailableError);
    await expect(index.ping()).rejects.toMatchObject({ code: 'INDEX_UNAVAILABLE', retryable: true });

    index.setAvailable(true);
    await expect(index.ping()).resolves.toBeUndefined();
  });

  it('honours a cancelled request', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(seededIndex().query(vector([1, 0, 0]), 5, {}, controller.signal)).rejects.toBeInstanceOf(
      RequestCancelledError
    );
  });
});

describe('rankMatches', () => {
  it('normalizes out-of-range scores before sorting', () => {
    expect(
      rankMatches(
        [
          { chunkId: 'x', score: 1.2 },
          { chunkId: 'y', score: Number.NaN },
          { chunkId: 'z', score: 0.3 },
        ],
        3
      )
    ).toEqual([
      { chunkId: 'x', score: 1 },
      { chunkId: 'z', score: 0.3 },
      { chunkId: 'y', score: 0 },
    ]);
  });
});
