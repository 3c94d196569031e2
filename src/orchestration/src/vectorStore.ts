/**
 * Vector store module
 * Stores chunks with their embeddings and provenance and answers
 * nearest-neighbour queries by cosine distance.
 *
 * VectorStore keeps everything in memory; FileVectorStore persists the same
 * state to `<directory>/index.json`. Every mutation builds the next state
 * first and only swaps it in after it has been written, so a failed write
 * never leaves half-written entries behind.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Chunk, DistanceMetric, RetrievalResult, ScoredChunk } from './types';
import { EmbeddingError, EmbeddingModelMismatchError } from './errors';
import { logger } from './logger';

export const INDEX_FILE = 'index.json';
const INDEX_VERSION = 1;

export interface StoreState {
  version: number;
  embeddingModel: string | null;
  dimensions: number | null;
  metric: DistanceMetric;
  entries: Chunk[];
}

export interface StoreStats {
  chunkCount: number;
  embeddingModel: string | null;
  dimensions: number | null;
  metric: DistanceMetric;
  chunksBySource: Record<string, number>;
}

function emptyState(): StoreState {
  return {
    version: INDEX_VERSION,
    embeddingModel: null,
    dimensions: null,
    metric: 'cosine',
    entries: []
  };
}

/**
 * Cosine distance (1 - cosine similarity). A zero vector is at distance 1 from everything.
 */
export function cosineDistance(vec1: number[], vec2: number[]): number {
  if (vec1.length !== vec2.length) {
    throw new Error('Vectors must have same length');
  }

  let dotProduct = 0;
  let norm1 = 0;
  let norm2 = 0;

  for (let i = 0; i < vec1.length; i++) {
    dotProduct += vec1[i] * vec2[i];
    norm1 += vec1[i] * vec1[i];
    norm2 += vec2[i] * vec2[i];
  }

  if (norm1 === 0 || norm2 === 0) {
    return 1;
  }

  return 1 - dotProduct / (Math.sqrt(norm1) * Math.sqrt(norm2));
}

/**
 * In-memory vector store
 */
export class VectorStore {
  protected state: StoreState;

  constructor(state: StoreState = emptyState()) {
    this.state = state;
  }

  /**
   * Bulk-append chunks embedded with `embeddingModel`
   */
  async addChunks(chunks: Chunk[], embeddingModel: string): Promise<void> {
    const next = this.withChunks(this.state.entries, chunks, embeddingModel);
    await this.commit(next);
    logger.debug(`Stored ${chunks.length} chunks (total ${next.entries.length})`);
  }

  /**
   * Replace every entry of one source file with new chunks in a single write
   */
  async replaceSource(sourceFile: string, chunks: Chunk[], embeddingModel: string): Promise<void> {
    const kept = this.state.entries.filter(entry => entry.sourceFile !== sourceFile);
    const removed = this.state.entries.length - kept.length;
    const next = this.withChunks(kept, chunks, embeddingModel);

    await this.commit(next);

    if (removed > 0) {
      logger.info(`Replaced ${removed} existing chunks of ${sourceFile}`);
    }
  }

  async clear(): Promise<void> {
    await this.commit(emptyState());
  }

  /**
   * k nearest chunks to the query embedding, nearest first
   * Ties keep insertion order, so results are deterministic.
   */
  async search(queryEmbedding: number[], k: number, embeddingModel: string): Promise<RetrievalResult> {
    const { entries, dimensions } = this.state;

    if (entries.length === 0 || k <= 0) {
      return [];
    }

    this.assertModel(embeddingModel);

    if (dimensions !== null && queryEmbedding.length !== dimensions) {
      throw new EmbeddingError(
        `Query embedding has ${queryEmbedding.length} dimensions, store expects ${dimensions}`
      );
    }

    const scored: ScoredChunk[] = entries.map(chunk => ({
      chunk,
      distance: cosineDistance(queryEmbedding, chunk.embedding)
    }));

    scored.sort((a, b) => a.distance - b.distance);

    const results = scored.slice(0, k);
    logger.debug(`Vector search returned ${results.length} of ${entries.length} chunks`);
    return results;
  }

  getAllChunks(): Chunk[] {
    return this.state.entries;
  }

  getCount(): number {
    return this.state.entries.length;
  }

  getEmbeddingModel(): string | null {
    return this.state.embeddingModel;
  }

  getStats(): StoreStats {
    const chunksBySource: Record<string, number> = {};
    for (const entry of this.state.entries) {
      chunksBySource[entry.sourceFile] = (chunksBySource[entry.sourceFile] || 0) + 1;
    }

    return {
      chunkCount: this.state.entries.length,
      embeddingModel: this.state.embeddingModel,
      dimensions: this.state.dimensions,
      metric: this.state.metric,
      chunksBySource
    };
  }

  /**
   * Persist the next state, then adopt it
   */
  protected async commit(next: StoreState): Promise<void> {
    await this.write(next);
    this.state = next;
  }

  protected async write(_next: StoreState): Promise<void> {
    // memory only
  }

  private assertModel(embeddingModel: string): void {
    const storeModel = this.state.embeddingModel;
    if (storeModel !== null && storeModel !== embeddingModel) {
      throw new EmbeddingModelMismatchError(storeModel, embeddingModel);
    }
  }

  private withChunks(base: Chunk[], chunks: Chunk[], embeddingModel: string): StoreState {
    const isEmpty = base.length === 0;
    if (!isEmpty) {
      this.assertModel(embeddingModel);
    }

    let dimensions = isEmpty ? null : this.state.dimensions;
    for (const chunk of chunks) {
      if (chunk.embedding.length === 0) {
        throw new EmbeddingError(`Empty embedding for chunk of ${chunk.sourceFile} page ${chunk.pageNumber}`);
      }
      if (dimensions === null) {
        dimensions = chunk.embedding.length;
      } else if (chunk.embedding.length !== dimensions) {
        throw new EmbeddingError(
          `Embedding for ${chunk.sourceFile} page ${chunk.pageNumber} has ${chunk.embedding.length} dimensions, expected ${dimensions}`
        );
      }
    }

    const entries = [...base, ...chunks];
    return {
      version: INDEX_VERSION,
      embeddingModel: entries.length > 0 ? embeddingModel : null,
      dimensions: entries.length > 0 ? dimensions : null,
      metric: 'cosine',
      entries
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isChunk(value: unknown): value is Chunk {
  return (
    isRecord(value) &&
    typeof value.text === 'string' &&
    typeof value.sourceFile === 'string' &&
    typeof value.pageNumber === 'number' &&
    Array.isArray(value.embedding) &&
    value.embedding.every(v => typeof v === 'number')
  );
}

/**
 * Validate a parsed index.json
 */
export function parseStoreState(raw: unknown, source: string): StoreState {
  if (!isRecord(raw) || !Array.isArray(raw.entries)) {
    throw new Error(`Vector store index at ${source} is corrupted: missing entries`);
  }
  if (raw.version !== INDEX_VERSION) {
    throw new Error(`Vector store index at ${source} has unsupported version ${String(raw.version)}`);
  }
  if (raw.metric !== 'cosine') {
    throw new Error(`Vector store index at ${source} uses unsupported metric ${String(raw.metric)}`);
  }

  const entries: Chunk[] = [];
  for (const entry of raw.entries) {
    if (!isChunk(entry)) {
      throw new Error(`Vector store index at ${source} is corrupted: invalid entry`);
    }
    entries.push(entry);
  }

  return {
    version: INDEX_VERSION,
    embeddingModel: typeof raw.embeddingModel === 'string' ? raw.embeddingModel : null,
    dimensions: typeof raw.dimensions === 'number' ? raw.dimensions : null,
    metric: 'cosine',
    entries
  };
}

/**
 * Directory-backed vector store
 */
export class FileVectorStore extends VectorStore {
  readonly directory: string;

  private constructor(directory: string, state: StoreState) {
    super(state);
    this.directory = directory;
  }

  static indexPath(directory: string): string {
    return path.join(directory, INDEX_FILE);
  }

  static exists(directory: string): boolean {
    return fs.existsSync(FileVectorStore.indexPath(directory));
  }

  /**
   * Open the store in `directory`; a missing index opens as an empty store
   */
  static async open(directory: string): Promise<FileVectorStore> {
    const indexPath = FileVectorStore.indexPath(directory);

    if (!fs.existsSync(indexPath)) {
      logger.debug(`No vector store at ${indexPath}; starting empty`);
      return new FileVectorStore(directory, emptyState());
    }

    const raw: unknown = JSON.parse(await fs.promises.readFile(indexPath, 'utf-8'));
    const state = parseStoreState(raw, indexPath);
    logger.debug(`Loaded ${state.entries.length} chunks from ${indexPath}`);
    return new FileVectorStore(directory, state);
  }

  protected async write(next: StoreState): Promise<void> {
    const indexPath = FileVectorStore.indexPath(this.directory);
    const tempPath = `${indexPath}.${process.pid}.tmp`;

    await fs.promises.mkdir(this.directory, { recursive: true });
    try {
      await fs.promises.writeFile(tempPath, JSON.stringify(next), 'utf-8');
      await fs.promises.rename(tempPath, indexPath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }
  }
}
