/**
 * Unit tests for embedding module
 */

import axios from 'axios';
import {
  Embedder,
  HashingEmbedder,
  OpenAICompatibleEmbedder,
  createEmbedder,
  embedInBatches,
  tokenize
} from '../src/embeddings';
import { cosineDistance } from '../src/vectorStore';
import { EmbeddingError } from '../src/errors';
import { axiosResponse } from './test-helpers';

jest.mock('axios');

const mockedPost = jest.mocked(axios.post);

describe('Embeddings Module', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('Tokenization', () => {
    it('should lowercase and drop punctuation', () => {
      expect(tokenize('Rice, wheat & Maize!')).toEqual(['rice', 'wheat', 'maize']);
    });
  });

  describe('HashingEmbedder', () => {
    const embedder = new HashingEmbedder(384);

    it('should name the model after its dimensions', () => {
      expect(embedder.model).toBe('hashing-384');
    });

    it('should be deterministic', async () => {
      const [first] = await embedder.embed(['Rice requires flooded fields']);
      const [second] = await embedder.embed(['Rice requires flooded fields']);

      expect(first).toEqual(second);
      expect(first).toHaveLength(384);
    });

    it('should produce unit-length vectors', async () => {
      const [vector] = await embedder.embed(['Drip irrigation saves water']);
      const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));

      expect(norm).toBeCloseTo(1, 10);
    });

    it('should return a zero vector for text without words', async () => {
      const [vector] = await embedder.embed(['...']);

      expect(vector.every(v => v === 0)).toBe(true);
    });

    it('should place texts sharing words closer together', async () => {
      const [query, related, unrelated] = await embedder.embed([
        'rice flooded fields',
        'flooded rice fields',
        'tractor engine maintenance'
      ]);

      expect(cosineDistance(query, related)).toBeLessThan(cosineDistance(query, unrelated));
    });

    it('should reject invalid dimensions', () => {
      expect(() => new HashingEmbedder(0)).toThrow('Embedding dimensions must be a positive integer');
    });
  });

  describe('OpenAICompatibleEmbedder', () => {
    const embedder = new OpenAICompatibleEmbedder({
      apiUrl: 'https://embeddings.test/v1/',
      apiKey: 'test-key',
      model: 'test-embed'
    });

    it('should post texts and return vectors in input order', async () => {
      mockedPost.mockResolvedValueOnce(
        axiosResponse({
          data: [
            { index: 1, embedding: [0, 1] },
            { index: 0, embedding: [1, 0] }
          ]
        })
      );

      const vectors = await embedder.embed(['first', 'second']);

      expect(vectors).toEqual([[1, 0], [0, 1]]);
      expect(mockedPost).toHaveBeenCalledWith(
        'https://embeddings.test/v1/embeddings',
        { model: 'test-embed', input: ['first', 'second'] },
        expect.objectContaining({
          headers: expect.objectContaining({ Authorization: 'Bearer test-key' })
        })
      );
    });

    it('should not call the API for an empty batch', async () => {
      await expect(embedder.embed([])).resolves.toEqual([]);
      expect(mockedPost).not.toHaveBeenCalled();
    });

    it('should reject a response with the wrong number of vectors', async () => {
      mockedPost.mockResolvedValueOnce(axiosResponse({ data: [{ index: 0, embedding: [1, 0] }] }));

      await expect(embedder.embed(['first', 'second'])).rejects.toThrow('Invalid embedding response shape');
    });

    it('should wrap request failures in EmbeddingError', async () => {
      mockedPost.mockRejectedValueOnce(new Error('network down'));

      const promise = embedder.embed(['first']);

      await expect(promise).rejects.toBeInstanceOf(EmbeddingError);
      await expect(promise).rejects.toThrow('Embedding request failed: network down');
    });
  });

  describe('createEmbedder', () => {
    it('should default to the hashing embedder', () => {
      const embedder = createEmbedder({ provider: 'hashing', dimensions: 64, batchSize: 8 });

      expect(embedder).toBeInstanceOf(HashingEmbedder);
      expect(embedder.model).toBe('hashing-64');
    });

    it('should require endpoint settings for the openai provider', () => {
      expect(() => createEmbedder({ provider: 'openai', dimensions: 64, batchSize: 8 })).toThrow(EmbeddingError);
    });
  });

  describe('embedInBatches', () => {
    it('should call the embedder once per batch', async () => {
      const inner = new HashingEmbedder(16);
      const spy = jest.spyOn(inner, 'embed');

      const vectors = await embedInBatches(inner, ['a', 'b', 'c', 'd', 'e'], 2);

      expect(vectors).toHaveLength(5);
      expect(spy).toHaveBeenCalledTimes(3);
      expect(spy.mock.calls.map(call => call[0])).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
    });

    it('should wrap embedder failures in EmbeddingError', async () => {
      const broken: Embedder = {
        model: 'broken',
        embed: async () => {
          throw new Error('boom');
        }
      };

      await expect(embedInBatches(broken, ['a'], 4)).rejects.toThrow('Embedding failed: boom');
    });

    it('should reject vectors of inconsistent length', async () => {
      const uneven: Embedder = {
        model: 'uneven',
        embed: async texts => texts.map((_, i) => new Array<number>(i + 1).fill(1))
      };

      await expect(embedInBatches(uneven, ['a', 'b'], 4)).rejects.toThrow('Embedder returned vectors of inconsistent length');
    });
  });
});
