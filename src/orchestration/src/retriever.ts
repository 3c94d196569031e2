/**
 * Retriever
 * Embeds a question with the ingestion embedder and returns the nearest chunks
 */

import { RetrievalResult } from './types';
import { Embedder, embedInBatches } from './embeddings';
import { VectorStore } from './vectorStore';
import { logger } from './logger';

export class Retriever {
  private store: VectorStore;
  private embedder: Embedder;
  private defaultK: number;

  constructor(store: VectorStore, embedder: Embedder, defaultK: number = 3) {
    this.store = store;
    this.embedder = embedder;
    this.defaultK = defaultK;
  }

  /**
   * k nearest chunks to the question, nearest first
   * @param k - defaults to the configured top-k
   */
  async retrieve(question: string, k: number = this.defaultK): Promise<RetrievalResult> {
    if (this.store.getCount() === 0) {
      logger.warn('Vector store is empty; retrieval returns no chunks');
      return [];
    }

    const [queryEmbedding] = await embedInBatches(this.embedder, [question], 1);
    const results = await this.store.search(queryEmbedding, k, this.embedder.model);

    logger.info(`Retrieved ${results.length} chunks (k=${k})`);
    results.forEach((result, i) => {
      logger.debug(
        `  ${i + 1}. ${result.chunk.sourceFile} p.${result.chunk.pageNumber} distance=${result.distance.toFixed(4)}`
      );
    });

    return results;
  }
}
