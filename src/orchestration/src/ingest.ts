/**
 * Ingestion pipeline
 * 1. List the PDFs of the corpus directory
 * 2. Extract text page by page
 * 3. Chunk each page
 * 4. Embed the chunks
 * 5. Write the document's chunks to the vector store in one write
 *
 * A document that cannot be read or embedded is skipped and reported.
 */

import * as fs from 'fs';
import * as path from 'path';
import { AppConfig, Chunk, ChunkingConfig, IngestReport, PageText, SkippedDocument } from './types';
import { chunkPages } from './chunking';
import { Embedder, createEmbedder, embedInBatches } from './embeddings';
import { PageLoader, PdfPageLoader, listPdfFiles } from './pdfLoader';
import { FileVectorStore, VectorStore } from './vectorStore';
import { DocumentUnreadableError, EmbeddingError, EmbeddingModelMismatchError, describeError } from './errors';
import { logger } from './logger';

export interface IngestDependencies {
  store: VectorStore;
  embedder: Embedder;
  pageLoader: PageLoader;
  chunking: ChunkingConfig;
  embeddingBatchSize: number;
}

export interface IngestOptions {
  reset?: boolean;
}

type DocumentOutcome =
  | { status: 'stored'; pages: number; chunks: number }
  | { status: 'skipped'; pages: number; reason: string };

/**
 * Load, chunk, embed and store a single document
 */
export async function ingestDocument(filePath: string, deps: IngestDependencies): Promise<DocumentOutcome> {
  const sourceFile = path.basename(filePath);

  let pages: PageText[];
  try {
    pages = await deps.pageLoader.loadPages(filePath);
  } catch (error) {
    const reason = error instanceof DocumentUnreadableError ? error.message : `Cannot read ${sourceFile}: ${describeError(error)}`;
    logger.warn(`Skipping unreadable document ${sourceFile}`, reason);
    return { status: 'skipped', pages: 0, reason };
  }

  const textChunks = chunkPages(pages, deps.chunking);
  if (textChunks.length === 0) {
    logger.warn(`Skipping ${sourceFile}: no extractable text`);
    return { status: 'skipped', pages: pages.length, reason: `No extractable text in ${sourceFile}` };
  }

  let embeddings: number[][];
  try {
    embeddings = await embedInBatches(
      deps.embedder,
      textChunks.map(chunk => chunk.text),
      deps.embeddingBatchSize
    );
  } catch (error) {
    logger.error(`Embedding failed for ${sourceFile}; nothing stored for it`, error);
    return { status: 'skipped', pages: pages.length, reason: describeError(error) };
  }

  const chunks: Chunk[] = textChunks.map((chunk, i) => ({ ...chunk, embedding: embeddings[i] }));

  try {
    await deps.store.replaceSource(sourceFile, chunks, deps.embedder.model);
  } catch (error) {
    if (error instanceof EmbeddingError) {
      logger.error(`Could not store ${sourceFile}`, error);
      return { status: 'skipped', pages: pages.length, reason: error.message };
    }
    throw error;
  }

  logger.info(`Stored ${chunks.length} chunks from ${pages.length} pages of ${sourceFile}`);
  return { status: 'stored', pages: pages.length, chunks: chunks.length };
}

/**
 * Ingest every PDF of `corpusDirectory` into the store
 */
export async function ingestCorpus(
  corpusDirectory: string,
  deps: IngestDependencies,
  options: IngestOptions = {}
): Promise<IngestReport> {
  logger.section('Ingestion Started');
  logger.info('Configuration:', {
    corpusDirectory,
    embeddingModel: deps.embedder.model,
    chunking: deps.chunking,
    reset: Boolean(options.reset)
  });

  const startTime = Date.now();

  try {
    const files = await listPdfFiles(corpusDirectory);
    if (files.length === 0) {
      logger.warn(`No PDF files found in ${corpusDirectory}`);
    } else {
      logger.info(`Found ${files.length} PDF files`);
    }

    if (options.reset) {
      logger.info('Clearing vector store');
      await deps.store.clear();
    }

    const storeModel = deps.store.getEmbeddingModel();
    if (storeModel !== null && storeModel !== deps.embedder.model) {
      throw new EmbeddingModelMismatchError(storeModel, deps.embedder.model);
    }

    const skipped: SkippedDocument[] = [];
    let documentsIngested = 0;
    let pagesLoaded = 0;
    let chunksStored = 0;

    for (const filePath of files) {
      const outcome = await ingestDocument(filePath, deps);
      pagesLoaded += outcome.pages;

      if (outcome.status === 'stored') {
        documentsIngested++;
        chunksStored += outcome.chunks;
      } else {
        skipped.push({ sourceFile: path.basename(filePath), reason: outcome.reason });
      }
    }

    const report: IngestReport = {
      corpusDirectory,
      documentsFound: files.length,
      documentsIngested,
      pagesLoaded,
      chunksStored,
      skipped,
      durationMs: Date.now() - startTime
    };

    logger.section('Ingestion Complete');
    logger.success(
      `Ingested ${documentsIngested}/${files.length} documents: ${pagesLoaded} pages, ${chunksStored} chunks ` +
        `in ${(report.durationMs / 1000).toFixed(2)}s`
    );
    if (skipped.length > 0) {
      logger.warn(`Skipped ${skipped.length} documents`, skipped);
    }

    return report;
  } catch (error) {
    logger.error('Ingestion failed', error);
    throw error;
  }
}

/**
 * Ingest the configured corpus into the configured store directory
 */
export async function runIngestion(config: AppConfig, options: IngestOptions = {}): Promise<IngestReport> {
  const store = await FileVectorStore.open(config.dbDirectory);

  return ingestCorpus(
    config.dataDirectory,
    {
      store,
      embedder: createEmbedder(config.embedding),
      pageLoader: new PdfPageLoader(),
      chunking: config.chunking,
      embeddingBatchSize: config.embedding.batchSize
    },
    options
  );
}

/**
 * Open the configured store, building it from the corpus on first use
 * Without a corpus directory the store stays empty and questions are
 * answered without documents.
 */
export async function openOrBuildStore(config: AppConfig): Promise<FileVectorStore> {
  if (!FileVectorStore.exists(config.dbDirectory)) {
    if (!fs.existsSync(config.dataDirectory)) {
      logger.warn(`No vector store in '${config.dbDirectory}' and no corpus in '${config.dataDirectory}'; answering without documents`);
    } else {
      logger.info(`First time setup: building the vector store in '${config.dbDirectory}'`);
      const report = await runIngestion(config);
      if (report.documentsIngested === 0) {
        logger.warn(`No documents ingested from '${config.dataDirectory}'; answering without documents`);
      }
    }
  }

  return FileVectorStore.open(config.dbDirectory);
}
