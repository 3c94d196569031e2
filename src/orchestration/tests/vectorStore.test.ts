/**
 * Unit tests for vector store module
 */

import * as fs from 'fs';
import * as path from 'path';
import { FileVectorStore, INDEX_FILE, VectorStore, cosineDistance } from '../src/vectorStore';
import { EmbeddingError, EmbeddingModelMismatchError } from '../src/errors';
import { createTestChunk, makeTempDir } from './test-helpers';

const MODEL = 'test-model';

describe('VectorStore Module', () => {
  let vectorStore: VectorStore;

  const sampleChunks = [
    createTestChunk('Rice needs standing water.', [1, 0], 'rice.pdf', 1),
    createTestChunk('Wheat prefers cool winters.', [0, 1], 'wheat.pdf', 1),
    createTestChunk('Rice paddies are puddled before transplanting.', [0.8, 0.6], 'rice.pdf', 2)
  ];

  beforeEach(() => {
    vectorStore = new VectorStore();
  });

  describe('Cosine distance', () => {
    it('should be 0 for identical directions and 1 for orthogonal vectors', () => {
      expect(cosineDistance([2, 0], [5, 0])).toBeCloseTo(0, 10);
      expect(cosineDistance([1, 0], [0, 1])).toBeCloseTo(1, 10);
    });

    it('should treat a zero vector as distance 1', () => {
      expect(cosineDistance([0, 0], [1, 0])).toBe(1);
    });

    it('should reject vectors of different length', () => {
      expect(() => cosineDistance([1, 0], [1, 0, 0])).toThrow('Vectors must have same length');
    });
  });

  describe('Adding chunks', () => {
    it('should add chunks and record the embedding model', async () => {
      await vectorStore.addChunks(sampleChunks, MODEL);

      expect(vectorStore.getCount()).toBe(3);
      expect(vectorStore.getEmbeddingModel()).toBe(MODEL);
    });

    it('should handle empty chunk array', async () => {
      await vectorStore.addChunks([], MODEL);

      expect(vectorStore.getCount()).toBe(0);
      expect(vectorStore.getEmbeddingModel()).toBeNull();
    });

    it('should reject a chunk of different dimensionality and keep existing entries', async () => {
      await vectorStore.addChunks(sampleChunks, MODEL);

      await expect(
        vectorStore.addChunks([createTestChunk('Odd one', [1, 0, 0], 'odd.pdf', 1)], MODEL)
      ).rejects.toBeInstanceOf(EmbeddingError);

      expect(vectorStore.getCount()).toBe(3);
      expect(vectorStore.getStats().dimensions).toBe(2);
    });

    it('should reject chunks embedded with another model', async () => {
      await vectorStore.addChunks(sampleChunks, MODEL);

      await expect(
        vectorStore.addChunks([createTestChunk('Other', [1, 0], 'other.pdf', 1)], 'other-model')
      ).rejects.toBeInstanceOf(EmbeddingModelMismatchError);
    });
  });

  describe('Replacing a source', () => {
    it('should swap all entries of one file and keep the others', async () => {
      await vectorStore.addChunks(sampleChunks, MODEL);

      await vectorStore.replaceSource('rice.pdf', [createTestChunk('Rice, second edition.', [1, 0], 'rice.pdf', 1)], MODEL);

      expect(vectorStore.getAllChunks().map(chunk => chunk.text)).toEqual([
        'Wheat prefers cool winters.',
        'Rice, second edition.'
      ]);
    });
  });

  describe('Nearest-neighbour search', () => {
    beforeEach(async () => {
      await vectorStore.addChunks(sampleChunks, MODEL);
    });

    it('should return the k nearest chunks, nearest first', async () => {
      const results = await vectorStore.search([1, 0], 2, MODEL);

      expect(results.map(result => result.chunk.text)).toEqual([
        'Rice needs standing water.',
        'Rice paddies are puddled before transplanting.'
      ]);
      expect(results[0].distance).toBeCloseTo(0, 10);
      expect(results[1].distance).toBeCloseTo(0.2, 10);
    });

    it('should return every chunk when k exceeds the store size', async () => {
      const results = await vectorStore.search([1, 0], 10, MODEL);

      expect(results).toHaveLength(3);
      expect(results[2].chunk.sourceFile).toBe('wheat.pdf');
    });

    it('should keep insertion order for equal distances', async () => {
      const store = new VectorStore();
      await store.addChunks(
        [
          createTestChunk('first', [0, 1], 'a.pdf', 1),
          createTestChunk('second', [0, 1], 'b.pdf', 1),
          createTestChunk('third', [0, 1], 'c.pdf', 1)
        ],
        MODEL
      );

      const results = await store.search([0, 1], 3, MODEL);

      expect(results.map(result => result.chunk.text)).toEqual(['first', 'second', 'third']);
    });

    it('should return nothing for k of 0', async () => {
      await expect(vectorStore.search([1, 0], 0, MODEL)).resolves.toEqual([]);
    });

    it('should refuse a query embedded with another model', async () => {
      await expect(vectorStore.search([1, 0], 3, 'other-model')).rejects.toThrow(
        'Vector store was built with embedding model "test-model" but "other-model" was used.'
      );
    });

    it('should refuse a query of different dimensionality', async () => {
      await expect(vectorStore.search([1, 0, 0], 3, MODEL)).rejects.toThrow(
        'Query embedding has 3 dimensions, store expects 2'
      );
    });

    it('should return nothing from an empty store', async () => {
      await expect(new VectorStore().search([1, 0], 3, MODEL)).resolves.toEqual([]);
    });
  });

  describe('Store management', () => {
    it('should clear all data', async () => {
      await vectorStore.addChunks(sampleChunks, MODEL);
      await vectorStore.clear();

      expect(vectorStore.getCount()).toBe(0);
      expect(vectorStore.getEmbeddingModel()).toBeNull();
    });

    it('should report chunks per source file', async () => {
      await vectorStore.addChunks(sampleChunks, MODEL);

      expect(vectorStore.getStats()).toEqual({
        chunkCount: 3,
        embeddingModel: MODEL,
        dimensions: 2,
        metric: 'cosine',
        chunksBySource: { 'rice.pdf': 2, 'wheat.pdf': 1 }
      });
    });
  });

  describe('FileVectorStore', () => {
    let directory: string;

    beforeEach(() => {
      directory = path.join(makeTempDir(), 'db');
    });

    afterEach(() => {
      fs.rmSync(path.dirname(directory), { recursive: true, force: true });
    });

    it('should open a missing directory as an empty store', async () => {
      const store = await FileVectorStore.open(directory);

      expect(store.getCount()).toBe(0);
      expect(FileVectorStore.exists(directory)).toBe(false);
    });

    it('should persist entries across reopen', async () => {
      const store = await FileVectorStore.open(directory);
      await store.addChunks(sampleChunks, MODEL);

      const reopened = await FileVectorStore.open(directory);

      expect(reopened.getAllChunks()).toEqual(sampleChunks);
      expect(reopened.getEmbeddingModel()).toBe(MODEL);
      const results = await reopened.search([0, 1], 1, MODEL);
      expect(results[0].chunk.text).toBe('Wheat prefers cool winters.');
    });

    it('should leave only the index file behind after a write', async () => {
      const store = await FileVectorStore.open(directory);
      await store.addChunks(sampleChunks, MODEL);
      await store.replaceSource('wheat.pdf', [], MODEL);

      expect(fs.readdirSync(directory)).toEqual([INDEX_FILE]);
      expect((await FileVectorStore.open(directory)).getCount()).toBe(2);
    });

    it('should refuse a corrupted index', async () => {
      fs.mkdirSync(directory, { recursive: true });
      fs.writeFileSync(path.join(directory, INDEX_FILE), JSON.stringify({ version: 1 }));

      await expect(FileVectorStore.open(directory)).rejects.toThrow('is corrupted: missing entries');
    });
  });
});
