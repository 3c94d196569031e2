/**
 * Type definitions for the crop Q&A assistant
 */

export interface PageText {
  sourceFile: string;
  pageNumber: number;
  text: string;
}

export interface TextChunk {
  text: string;
  sourceFile: string;
  pageNumber: number;
}

export interface Chunk extends TextChunk {
  embedding: number[];
}

export interface ScoredChunk {
  chunk: Chunk;
  distance: number;
}

export type RetrievalResult = ScoredChunk[];

export type DistanceMetric = 'cosine';

export interface Citation {
  sourceFile: string;
  pageNumber: number;
}

export interface Query {
  question: string;
  weatherEnabled: boolean;
  location?: string;
  topK?: number;
}

export interface WeatherSnapshot {
  location: string;
  temperature: number;
  conditions: string;
  precipitation: number;
  humidity?: number;
  timestamp: Date;
}

export type WeatherLookup =
  | { status: 'available'; snapshot: WeatherSnapshot }
  | { status: 'unavailable'; location: string; reason: string };

export interface Prompt {
  text: string;
  includedChunks: ScoredChunk[];
  droppedChunks: number;
  citations: Citation[];
  hasWeatherSection: boolean;
}

export interface Answer {
  text: string;
  citations: Citation[];
}

export type AnswerOutcome =
  | { status: 'ok'; query: Query; answer: Answer; weather: WeatherSnapshot | null }
  | { status: 'degraded'; query: Query; answer: Answer; weather: null; reason: string }
  | { status: 'failed'; query: Query; reason: string };

export interface SkippedDocument {
  sourceFile: string;
  reason: string;
}

export interface IngestReport {
  corpusDirectory: string;
  documentsFound: number;
  documentsIngested: number;
  pagesLoaded: number;
  chunksStored: number;
  skipped: SkippedDocument[];
  durationMs: number;
}

export interface ChunkingConfig {
  chunkSize: number;
  overlap: number;
}

export interface GroqConfig {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  maxRetries: number;
  timeoutMs: number;
}

export type EmbeddingProvider = 'hashing' | 'openai';

export interface EmbeddingConfig {
  provider: EmbeddingProvider;
  dimensions: number;
  batchSize: number;
  model?: string;
  apiUrl?: string;
  apiKey?: string;
}

export interface AppConfig {
  dataDirectory: string;
  dbDirectory: string;
  chunking: ChunkingConfig;
  embedding: EmbeddingConfig;
  groq: GroqConfig;
  topK: number;
  maxPromptChars: number;
  defaultLocation: string;
  weatherTimeoutMs: number;
}
