/**
 * Unit tests for retriever
 */

import { Retriever } from '../src/retriever';
import { HashingEmbedder } from '../src/embeddings';
import { VectorStore } from '../src/vectorStore';
import { EmbeddingModelMismatchError } from '../src/errors';
import { createTestChunk } from './test-helpers';

describe('Retriever', () => {
  const embedder = new HashingEmbedder(128);
  const texts = [
    'Rice requires flooded fields during the vegetative stage.',
    'Wheat is sown in November and harvested in April.',
    'Aphids on mustard can be controlled with neem oil.',
    'Drip irrigation reduces water use in sugarcane.'
  ];
  let store: VectorStore;

  beforeEach(async () => {
    store = new VectorStore();
    const embeddings = await embedder.embed(texts);
    await store.addChunks(
      texts.map((text, i) => createTestChunk(text, embeddings[i], `doc${i}.pdf`, i + 1)),
      embedder.model
    );
  });

  it('should return the default number of chunks, nearest first', async () => {
    const retriever = new Retriever(store, embedder, 3);

    const results = await retriever.retrieve('When is wheat sown and harvested?');

    expect(results).toHaveLength(3);
    expect(results[0].chunk.sourceFile).toBe('doc1.pdf');
    expect(results[0].distance).toBeLessThanOrEqual(results[1].distance);
    expect(results[1].distance).toBeLessThanOrEqual(results[2].distance);
  });

  it('should honour an explicit k', async () => {
    const retriever = new Retriever(store, embedder);

    await expect(retriever.retrieve('neem oil for aphids', 1)).resolves.toHaveLength(1);
    await expect(retriever.retrieve('neem oil for aphids', 10)).resolves.toHaveLength(4);
  });

  it('should return nothing from an empty store without embedding', async () => {
    const spy = jest.spyOn(embedder, 'embed');
    const retriever = new Retriever(new VectorStore(), embedder);

    await expect(retriever.retrieve('anything')).resolves.toEqual([]);
    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });

  it('should refuse a store built with another embedding model', async () => {
    const retriever = new Retriever(store, new HashingEmbedder(64));

    await expect(retriever.retrieve('rice')).rejects.toBeInstanceOf(EmbeddingModelMismatchError);
  });
});
