import { describe, it, expect } from 'vitest';
import { NotFoundError, ProviderUnavailableError, RequestCancelledError } from '../errors';
import { makeChunk } from '../testing/fakes';
import { InMemoryDocumentStore } from './document-store';

const store = () =>
  new InMemoryDocumentStore([makeChunk('s1', 'First section.'), makeChunk('s2', 'Second section.')]);

describe('InMemoryDocumentStore', () => {
  it('returns chunks in the requested order and lists missing ids', async () => {
    const { chunks, missing } = await store().getMany(['s2', 'nope', 's1']);

    expect(chunks.map((c) => c.id)).toEqual(['s2', 's1']);
    expect(missing).toEqual(['nope']);
  });

  it('gets a single chunk by id', async () => {
    await expect(store().get('s1')).resolves.toEqual({
      id: 's1',
      text: 'First section.',
      sourceCitation: 'Test Act, s. s1',
      section: { act: 'Test Act', sectionNumber: 's1' },
    });
  });

  it('throws NotFound for an unknown id', async () => {
    const pending = store().get('missing');
    await expect(pending).rejects.toBeInstanceOf(NotFoundError);
    await expect(pending).rejects.toMatchObject({ chunkId: 'missing', component: 'documentStore' });
  });

  it('hands out immutable chunks', async () => {
    const chunk = await store().get('s1');
    expect(Object.isFrozen(chunk)).toBe(true);
  });

  it('reports an outage as ProviderUnavailable', async () => {
    const documents = store();
    documents.setAvailable(false);

    await expect(documents.getMany(['s1'])).rejects.toBeInstanceOf(ProviderUnavailableError);
    await expect(documents.ping()).rejects.toMatchObject({ component: 'documentStore' });
  });

  it('honours a cancelled request', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(store().getMany(['s1'], controller.signal)).rejects.toBeInstanceOf(RequestCancelledError);
  });
});
