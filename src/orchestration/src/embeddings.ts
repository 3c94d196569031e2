/**
 * Embedding module
 * The embedding model is a black box text -> fixed-length vector. The same
 * embedder must be used at ingestion and at query time; its `model` id is
 * recorded in the vector store and checked on every search.
 */

import axios from 'axios';
import { EmbeddingConfig } from './types';
import { EmbeddingError, describeError } from './errors';
import { logger } from './logger';

export interface Embedder {
  readonly model: string;
  embed(texts: string[]): Promise<number[][]>;
}

/**
 * Lowercased word tokens
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(/\s+/)
    .filter(token => token.length > 0);
}

/**
 * 32-bit FNV-1a hash
 */
function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Local feature-hashing embedder
 * Each word (and each adjacent word pair) is hashed into one of `dimensions`
 * buckets; the vector is L2-normalized. Deterministic and offline.
 */
export class HashingEmbedder implements Embedder {
  readonly model: string;
  private dimensions: number;

  constructor(dimensions: number = 384) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new Error(`Embedding dimensions must be a positive integer, got ${dimensions}`);
    }
    this.dimensions = dimensions;
    this.model = `hashing-${dimensions}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(text => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const embedding = new Array<number>(this.dimensions).fill(0);
    const tokens = tokenize(text);

    tokens.forEach((token, i) => {
      embedding[fnv1a(token) % this.dimensions] += 1;
      if (i > 0) {
        embedding[fnv1a(`${tokens[i - 1]} ${token}`) % this.dimensions] += 0.5;
      }
    });

    const magnitude = Math.sqrt(embedding.reduce((sum, val) => sum + val * val, 0));
    if (magnitude === 0) {
      return embedding;
    }
    return embedding.map(val => val / magnitude);
  }
}

interface EmbeddingsResponse {
  data?: Array<{ embedding?: unknown; index?: number }>;
}

function isVector(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(v => typeof v === 'number' && Number.isFinite(v));
}

/**
 * Embedder for any OpenAI-compatible `/embeddings` endpoint
 */
export class OpenAICompatibleEmbedder implements Embedder {
  readonly model: string;
  private apiUrl: string;
  private apiKey: string;

  constructor(options: { apiUrl: string; apiKey: string; model: string }) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.model = options.model;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    try {
      const response = await axios.post<EmbeddingsResponse>(
        `${this.apiUrl}/embeddings`,
        { model: this.model, input: texts },
        {
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.apiKey}`
          }
        }
      );

      const items = response.data.data;
      if (!Array.isArray(items) || items.length !== texts.length) {
        throw new EmbeddingError('Invalid embedding response shape');
      }

      const ordered = [...items].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
      return ordered.map(item => {
        if (!isVector(item.embedding)) {
          throw new EmbeddingError('Invalid embedding vector in response');
        }
        return item.embedding;
      });
    } catch (error) {
      if (error instanceof EmbeddingError) {
        throw error;
      }
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        throw new EmbeddingError(
          `Embedding request failed${status ? `: HTTP ${status}` : ''} - ${error.message}`,
          { cause: error }
        );
      }
      throw new EmbeddingError(`Embedding request failed: ${describeError(error)}`, { cause: error });
    }
  }
}

/**
 * Build the embedder named by configuration
 */
export function createEmbedder(config: EmbeddingConfig): Embedder {
  if (config.provider === 'openai') {
    if (!config.apiUrl || !config.apiKey || !config.model) {
      throw new EmbeddingError('The openai embedding provider needs EMBEDDING_API_URL, EMBEDDING_API_KEY and EMBEDDING_MODEL');
    }
    return new OpenAICompatibleEmbedder({
      apiUrl: config.apiUrl,
      apiKey: config.apiKey,
      model: config.model
    });
  }

  return new HashingEmbedder(config.dimensions);
}

/**
 * Embed texts in batches, checking that every vector has the same length
 * Any failure surfaces as an EmbeddingError.
 */
export async function embedInBatches(
  embedder: Embedder,
  texts: string[],
  batchSize: number
): Promise<number[][]> {
  const vectors: number[][] = [];
  const size = Math.max(1, batchSize);

  for (let i = 0; i < texts.length; i += size) {
    const batch = texts.slice(i, i + size);
    logger.debug(`Embedding batch ${Math.floor(i / size) + 1}/${Math.ceil(texts.length / size)}`);

    let batchVectors: number[][];
    try {
      batchVectors = await embedder.embed(batch);
    } catch (error) {
      if (error instanceof EmbeddingError) {
        throw error;
      }
      throw new EmbeddingError(`Embedding failed: ${describeError(error)}`, { cause: error });
    }

    if (batchVectors.length !== batch.length) {
      throw new EmbeddingError(`Embedder returned ${batchVectors.length} vectors for ${batch.length} texts`);
    }
    vectors.push(...batchVectors);
  }

  const dims = vectors[0]?.length ?? 0;
  if (vectors.some(vector => vector.length !== dims || vector.length === 0)) {
    throw new EmbeddingError('Embedder returned vectors of inconsistent length');
  }

  return vectors;
}
